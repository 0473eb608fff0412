/**
 * Format readers for config files.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { SourceReadError } from '../errors/index.js';
import type { Reader } from '../materialize/context.js';
import type { RawMapping } from '../merge/cascade.js';
import { readJson } from './json.js';
import { readToml } from './toml.js';
import { readYaml } from './yaml.js';

export { parseJson, readJson } from './json.js';
export { readSourceText, requireMapping } from './source.js';
export { parseToml, readToml } from './toml.js';
export { parseYaml, readYaml } from './yaml.js';

const READERS_BY_EXTENSION: ReadonlyMap<string, Reader> = new Map<string, Reader>([
  ['.toml', readToml],
  ['.yaml', readYaml],
  ['.yml', readYaml],
  ['.json', readJson],
]);

/**
 * File extensions {@link readerForPath} knows about.
 */
export const SUPPORTED_EXTENSIONS: readonly string[] = [...READERS_BY_EXTENSION.keys()];

/**
 * Picks a reader from a file's extension (case-insensitive).
 *
 * @param source - Path of the file.
 * @returns The reader, or `undefined` for an unknown extension.
 */
export function readerForPath(source: string): Reader | undefined {
  return READERS_BY_EXTENSION.get(path.extname(source).toLowerCase());
}

/**
 * Reads a file with the reader matching its extension.
 *
 * Pointers inside such files may name files of any supported format.
 *
 * @param source - Path of the file.
 * @throws SourceReadError with kind `format_error` for an unknown extension.
 */
export function readByExtension(source: string): RawMapping {
  const reader = readerForPath(source);
  if (reader === undefined) {
    throw new SourceReadError(
      source,
      'format_error',
      `unsupported file extension '${path.extname(source)}' (expected one of ${SUPPORTED_EXTENSIONS.join(', ')})`
    );
  }
  return reader(source);
}
