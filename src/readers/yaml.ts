/**
 * YAML reader.
 *
 * @packageDocumentation
 */

import { YAMLException, load } from 'js-yaml';
import { SourceReadError } from '../errors/index.js';
import type { RawMapping } from '../merge/cascade.js';
import { readSourceText, requireMapping } from './source.js';

/**
 * Parses a YAML document into a raw mapping.
 *
 * Timestamps become `Date`s. An empty document is an empty mapping.
 *
 * @param text - YAML document.
 * @param source - Name of the source, for error messages.
 * @throws SourceReadError with kind `parse_error` for invalid YAML and
 *   `format_error` when the document is not a mapping.
 */
export function parseYaml(text: string, source: string): RawMapping {
  let document: unknown;
  try {
    document = load(text, { filename: source });
  } catch (error) {
    if (error instanceof YAMLException) {
      throw new SourceReadError(source, 'parse_error', `Invalid YAML: ${error.reason}`, error);
    }
    throw error;
  }

  if (document === undefined || document === null) {
    return {};
  }
  return requireMapping(source, document);
}

/**
 * Reads a YAML file into a raw mapping.
 *
 * @param source - Path of the file.
 */
export function readYaml(source: string): RawMapping {
  return parseYaml(readSourceText(source), source);
}
