/**
 * JSON Schema validation hooks backed by Ajv.
 *
 * @packageDocumentation
 */

import AjvModule from 'ajv';
import type { AnySchema, ErrorObject } from 'ajv';
import type { ValidationIssue } from '../errors/index.js';

const Ajv = AjvModule.default;

function toIssue(error: ErrorObject): ValidationIssue {
  return {
    field: error.instancePath === '' ? '/' : error.instancePath,
    value: error.data,
    message: error.message ?? 'Unknown error',
  };
}

/**
 * Builds a validation hook that checks an instance against a JSON Schema.
 *
 * Every schema violation is reported as one issue, keyed by its JSON pointer.
 * Values the schema cannot describe (such as `Date`s) should be left out of
 * the schema.
 *
 * @example
 * ```typescript
 * const Server = defineConfig(
 *   'Server',
 *   { port: field.number() },
 *   { validate: jsonSchemaHook({ type: 'object', properties: { port: { minimum: 1 } } }) }
 * );
 * ```
 *
 * @param schema - The JSON Schema the instance must satisfy.
 * @returns A hook for the `validate` option of `defineConfig`.
 */
export function jsonSchemaHook<T>(schema: AnySchema): (instance: T) => ValidationIssue[] {
  const ajv = new Ajv({ allErrors: true, verbose: true });
  const check = ajv.compile(schema);

  return (instance) => {
    if (check(instance)) {
      return [];
    }
    return (check.errors ?? []).map(toIssue);
  };
}
