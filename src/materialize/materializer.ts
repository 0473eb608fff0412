/**
 * The materializer: builds one config instance from one raw mapping.
 *
 * @packageDocumentation
 */

import {
  ConfigError,
  ConfigValidationError,
  ConversionError,
  MissingRequiredFieldError,
} from '../errors/index.js';
import type { RawMapping } from '../merge/cascade.js';
import { introspect } from '../schema/introspect.js';
import type { ConfigType, FieldSpec } from '../schema/types.js';
import type { ResolutionContext } from './context.js';
import { resolveSubConfig } from './resolver.js';

function assignField(values: Record<string, unknown>, name: string, value: unknown): void {
  Object.defineProperty(values, name, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

function resolveField(
  typeName: string,
  field: FieldSpec,
  mapping: RawMapping,
  context: ResolutionContext
): unknown {
  const raw = Object.hasOwn(mapping, field.name) ? mapping[field.name] : undefined;

  if (raw === undefined) {
    if (field.presence.kind === 'default') {
      return field.presence.value();
    }
    throw new MissingRequiredFieldError(field.name, typeName);
  }

  if (raw === null && field.nullable) {
    return undefined;
  }

  if (field.isNestedConfig) {
    return resolveSubConfig(field, raw, context);
  }

  const convert = context.registry.lookup(field.key);
  if (convert === undefined) {
    return raw;
  }
  try {
    return convert(raw);
  } catch (error) {
    throw new ConversionError(field.name, field.typeName, raw, error);
  }
}

/**
 * Builds an instance of `type` from `mapping`.
 *
 * Fields are resolved in declaration order and the first failure aborts the
 * whole instance. Callers run this inside a provenance frame
 * (`withinFrame`), which attaches context to any error.
 *
 * @param type - The target config type.
 * @param mapping - Raw data for this config (already merged).
 * @param context - The call state.
 * @returns The constructed instance.
 */
export function materialize<T>(
  type: ConfigType<T>,
  mapping: RawMapping,
  context: ResolutionContext
): T {
  const spec = introspect(type, context.subClasses);
  const values: Record<string, unknown> = {};

  for (const field of spec.fields) {
    assignField(values, field.name, resolveField(spec.name, field, mapping, context));
  }

  try {
    return type.construct(values);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(type.name, message, [], [], error);
  }
}
