/**
 * Cascade merging of raw mappings.
 *
 * @packageDocumentation
 */

export { isMapping, mergeCascade, mergeMappings } from './cascade.js';
export type { RawMapping } from './cascade.js';
