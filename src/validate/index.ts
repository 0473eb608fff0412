/**
 * Validation of constructed configs.
 *
 * @packageDocumentation
 */

export { jsonSchemaHook } from './json-schema.js';
export { validateConfig } from './validator.js';
export type { ValidateConfigOptions } from './validator.js';
