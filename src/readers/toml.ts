/**
 * TOML reader.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { SourceReadError } from '../errors/index.js';
import type { RawMapping } from '../merge/cascade.js';
import { readSourceText } from './source.js';

/**
 * Parses TOML text into a raw mapping.
 *
 * TOML dates and date-times come back as `Date`s; local date-times are read
 * as UTC.
 *
 * @param text - TOML document.
 * @param source - Name of the source, for error messages.
 * @throws SourceReadError with kind `parse_error` for invalid TOML.
 */
export function parseToml(text: string, source: string): RawMapping {
  try {
    return TOML.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceReadError(source, 'parse_error', `Invalid TOML syntax: ${message}`, error);
  }
}

/**
 * Reads a TOML file into a raw mapping.
 *
 * @param source - Path of the file.
 */
export function readToml(source: string): RawMapping {
  return parseToml(readSourceText(source), source);
}
