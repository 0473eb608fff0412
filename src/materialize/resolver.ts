/**
 * Sub-config resolution: ready-made instances, inline blocks and file pointers.
 *
 * A sub-config field holds an instance of its type (kept as is), a mapping
 * (inline data) or, when materializing from files, a string naming another
 * source. Pointer targets
 * are tracked along the current recursion path so that a chain of pointers
 * leading back to a source still being resolved fails with
 * `ConfigCycleError`, while two siblings pointing at the same file is fine.
 *
 * @packageDocumentation
 */

import {
  ConfigCycleError,
  ConversionError,
  SourceReadError,
  describeValue,
} from '../errors/index.js';
import { isMapping, type RawMapping } from '../merge/cascade.js';
import type { ConfigType, FieldSpec } from '../schema/types.js';
import { validatePath } from '../utils/safe-fs.js';
import { currentFrame, withinFrame, type Reader, type ResolutionContext } from './context.js';
import { materialize } from './materializer.js';

/**
 * Where a sub-config's data comes from.
 */
export type SubConfigSource =
  | { readonly kind: 'instance'; readonly value: unknown }
  | { readonly kind: 'inline'; readonly data: RawMapping }
  | { readonly kind: 'pointer'; readonly path: string; readonly reader: Reader };

/**
 * A field spec known to describe a sub-config.
 */
export type NestedFieldSpec = Extract<FieldSpec, { readonly isNestedConfig: true }>;

/**
 * Decides whether a raw sub-config value is an instance, inline data or a
 * file pointer.
 *
 * @param raw - The raw field value.
 * @param type - The sub-config type; its `is` predicate recognizes instances.
 * @param reader - The reader for pointers; without one, strings are not pointers.
 * @returns The source, or `undefined` when the value is none of these.
 */
export function classifySubConfig(
  raw: unknown,
  type: ConfigType<unknown>,
  reader: Reader | undefined
): SubConfigSource | undefined {
  if (type.is?.(raw) === true) {
    return { kind: 'instance', value: raw };
  }
  if (isMapping(raw)) {
    return { kind: 'inline', data: raw };
  }
  if (typeof raw === 'string' && reader !== undefined) {
    return { kind: 'pointer', path: raw, reader };
  }
  return undefined;
}

/**
 * Reads one source through a reader, enforcing the reader contract.
 *
 * @param reader - The reader to call.
 * @param source - Canonical path of the source.
 * @returns The mapping read from the source.
 * @throws SourceReadError if the reader fails or returns something other than a mapping.
 */
export function readSource(reader: Reader, source: string): RawMapping {
  let data: unknown;
  try {
    data = reader(source);
  } catch (error) {
    if (error instanceof SourceReadError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceReadError(source, 'read_error', message, error);
  }

  if (!isMapping(data)) {
    throw new SourceReadError(
      source,
      'format_error',
      `expected a mapping at the top level, got ${describeValue(data)}`
    );
  }
  return data;
}

function resolveInline(field: NestedFieldSpec, data: RawMapping, context: ResolutionContext): unknown {
  const parent = currentFrame(context)?.source ?? 'mapping';
  const frame = {
    targetType: field.nestedType.name,
    source: `inline '${field.name}' in ${parent}`,
  };
  context.logger.debug('subconfig_inline', { field: field.name, type: field.nestedType.name });
  return withinFrame(context, frame, () => materialize(field.nestedType, data, context));
}

function resolvePointer(
  field: NestedFieldSpec,
  pointer: string,
  reader: Reader,
  context: ResolutionContext
): unknown {
  let canonical: string;
  try {
    canonical = validatePath(pointer, context.cwd);
  } catch (error) {
    throw new ConversionError(field.name, field.typeName, pointer, error);
  }

  const frame = { targetType: field.nestedType.name, source: canonical };
  return withinFrame(context, frame, () => {
    if (context.cycle.has(canonical)) {
      throw new ConfigCycleError([...context.cycle, canonical]);
    }

    context.cycle.add(canonical);
    try {
      context.logger.debug('subconfig_pointer', {
        field: field.name,
        type: field.nestedType.name,
        source: canonical,
      });
      return materialize(field.nestedType, readSource(reader, canonical), context);
    } finally {
      context.cycle.delete(canonical);
    }
  });
}

/**
 * Resolves the value of a sub-config field.
 *
 * @param field - The sub-config field.
 * @param raw - Its raw value (neither `undefined` nor an accepted `null`).
 * @param context - The call state.
 * @returns The materialized sub-config.
 * @throws ConversionError if the value is not an instance, a mapping or, with a
 *   reader, a string.
 */
export function resolveSubConfig(
  field: NestedFieldSpec,
  raw: unknown,
  context: ResolutionContext
): unknown {
  const source = classifySubConfig(raw, field.nestedType, context.reader);
  if (source === undefined) {
    const reason =
      typeof raw === 'string'
        ? 'file pointers are only resolved when loading from files'
        : 'expected a mapping or a path to a config file';
    throw new ConversionError(field.name, field.typeName, raw, new TypeError(reason));
  }

  switch (source.kind) {
    case 'instance':
      context.logger.debug('subconfig_instance', { field: field.name, type: field.nestedType.name });
      return source.value;
    case 'inline':
      return resolveInline(field, source.data, context);
    case 'pointer':
      return resolvePointer(field, source.path, source.reader, context);
  }
}
