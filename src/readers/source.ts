/**
 * Shared plumbing for file readers.
 *
 * @packageDocumentation
 */

import { SourceReadError, describeValue } from '../errors/index.js';
import { isMapping, type RawMapping } from '../merge/cascade.js';
import { safeReadTextSync } from '../utils/safe-fs.js';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads a source file as text.
 *
 * @param source - Path of the file.
 * @returns The file contents.
 * @throws SourceReadError with kind `not_found` for missing files and
 *   `read_error` for invalid paths or any other I/O failure.
 */
export function readSourceText(source: string): string {
  try {
    return safeReadTextSync(source);
  } catch (error) {
    if (isNotFound(error)) {
      throw new SourceReadError(source, 'not_found', 'no such file', error);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceReadError(source, 'read_error', message, error);
  }
}

/**
 * Checks that a parsed document is a mapping.
 *
 * @param source - Path of the file, for the error message.
 * @param document - The parsed document.
 * @throws SourceReadError with kind `format_error` for anything but a mapping.
 */
export function requireMapping(source: string, document: unknown): RawMapping {
  if (!isMapping(document)) {
    throw new SourceReadError(
      source,
      'format_error',
      `expected a mapping at the top level, got ${describeValue(document)}`
    );
  }
  return document;
}
