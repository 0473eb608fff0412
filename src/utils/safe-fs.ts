/**
 * Path-validated file access for config sources.
 *
 * Every path is checked and resolved to an absolute path before the file
 * system is touched, so a malformed pointer string in a config file fails with
 * a {@link PathValidationError} instead of reaching `node:fs`.
 *
 * @packageDocumentation
 */

import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Checks that a value is usable as a file path.
 *
 * @param filePath - The value to check.
 * @returns The same string, narrowed.
 * @throws {PathValidationError} If the value is not a string, is empty, or contains null bytes.
 */
export function assertPathString(filePath: unknown): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.trim().length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  return filePath;
}

/**
 * Validates a path and resolves it against a base directory.
 *
 * @param filePath - The path to validate.
 * @param baseDir - Directory relative paths are resolved against.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is invalid.
 */
export function validatePath(filePath: string, baseDir: string = process.cwd()): string {
  const resolved = path.resolve(baseDir, assertPathString(filePath));

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Synchronously reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., file not found, permission denied).
 */
export function safeReadTextSync(filePath: string): string {
  const validatedPath = validatePath(filePath);
  return fsSync.readFileSync(validatedPath, 'utf8');
}
