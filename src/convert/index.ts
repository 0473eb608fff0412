/**
 * Declared-type-driven value conversion.
 *
 * @packageDocumentation
 */

export { convertDateTime, convertPath, parseIsoDateTime } from './builtins.js';
export { ConversionRegistry, buildRegistry, converter } from './registry.js';
export type { Converter, ConverterEntry, ConverterSource, RegistryOptions } from './registry.js';
