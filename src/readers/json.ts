/**
 * JSON reader.
 *
 * @packageDocumentation
 */

import { SourceReadError } from '../errors/index.js';
import type { RawMapping } from '../merge/cascade.js';
import { readSourceText, requireMapping } from './source.js';

/**
 * Parses a JSON document into a raw mapping.
 *
 * JSON has no date type; date-time fields receive strings, which the
 * built-in date-time converter parses.
 *
 * @param text - JSON document.
 * @param source - Name of the source, for error messages.
 * @throws SourceReadError with kind `parse_error` for invalid JSON and
 *   `format_error` when the document is not an object.
 */
export function parseJson(text: string, source: string): RawMapping {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceReadError(source, 'parse_error', `Invalid JSON: ${message}`, error);
  }
  return requireMapping(source, document);
}

/**
 * Reads a JSON file into a raw mapping.
 *
 * @param source - Path of the file.
 */
export function readJson(source: string): RawMapping {
  return parseJson(readSourceText(source), source);
}
