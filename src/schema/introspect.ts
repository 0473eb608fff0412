/**
 * Normalizes declared config types into {@link TypeSpec}s.
 *
 * @packageDocumentation
 */

import { InvalidTargetTypeError } from '../errors/index.js';
import { DateTimeType, PathType, isField } from './define.js';
import {
  CONFIG_TYPE,
  type ConfigType,
  type FieldLike,
  type FieldSpec,
  type TypeSpec,
  type TypeTag,
} from './types.js';

/**
 * Specs computed without an allow-list depend only on the type itself, so
 * they are computed once per type. Entries are never replaced.
 */
const specCache = new WeakMap<ConfigType<unknown>, TypeSpec>();

/**
 * Checks whether a value was declared with `defineConfig`.
 */
export function isConfigType(value: unknown): value is ConfigType<unknown> {
  return typeof value === 'object' && value !== null && CONFIG_TYPE in value;
}

/**
 * Whether fields declared with `type` are materialized as sub-configs.
 *
 * @param type - The declared field type.
 * @param subClasses - Types treated as sub-configs without the marker.
 */
export function isNestable(
  type: ConfigType<unknown>,
  subClasses: ReadonlySet<ConfigType<unknown>>
): boolean {
  return type.nested || subClasses.has(type);
}

function describeTarget(target: unknown): string {
  if (typeof target === 'function') {
    return target.name.length > 0 ? target.name : 'anonymous function';
  }
  if (target === null) {
    return 'null';
  }
  return typeof target;
}

function classifyField(
  name: string,
  declaration: FieldLike<unknown>,
  subClasses: ReadonlySet<ConfigType<unknown>>
): FieldSpec {
  const declared = declaration.declared;
  const base = {
    name,
    presence: declaration.presence,
    nullable: declaration.nullable,
  };

  switch (declared.kind) {
    case 'primitive':
      return {
        ...base,
        tag: 'primitive',
        key: undefined,
        typeName: declared.primitive,
        isNestedConfig: false,
      };
    case 'token': {
      let tag: TypeTag = 'custom';
      if (declared.token === PathType) {
        tag = 'path';
      } else if (declared.token === DateTimeType) {
        tag = 'datetime';
      }
      return {
        ...base,
        tag,
        key: declared.token,
        typeName: declared.token.name,
        isNestedConfig: false,
      };
    }
    case 'config':
      if (isNestable(declared.type, subClasses)) {
        return {
          ...base,
          tag: 'nested',
          key: declared.type,
          typeName: declared.type.name,
          isNestedConfig: true,
          nestedType: declared.type,
        };
      }
      return {
        ...base,
        tag: 'other',
        key: declared.type,
        typeName: declared.type.name,
        isNestedConfig: false,
      };
    case 'other':
      return {
        ...base,
        tag: 'other',
        key: undefined,
        typeName: declared.label,
        isNestedConfig: false,
      };
  }
}

function buildSpec(
  target: ConfigType<unknown>,
  subClasses: ReadonlySet<ConfigType<unknown>>
): TypeSpec {
  const fields: FieldSpec[] = [];
  for (const [name, declaration] of Object.entries(target.fields)) {
    if (!isField(declaration)) {
      throw new InvalidTargetTypeError(target.name, `field '${name}' is not a field builder`);
    }
    fields.push(Object.freeze(classifyField(name, declaration, subClasses)));
  }
  return Object.freeze({ name: target.name, type: target, fields: Object.freeze(fields) });
}

/**
 * Produces the field list of a config type.
 *
 * @param target - The config type (any other value is rejected).
 * @param subClasses - Types to treat as sub-configs even without the nested marker.
 * @returns The normalized type spec.
 * @throws InvalidTargetTypeError if `target` was not declared with `defineConfig`.
 */
export function introspect(
  target: unknown,
  subClasses: ReadonlySet<ConfigType<unknown>> = new Set()
): TypeSpec {
  if (!isConfigType(target)) {
    throw new InvalidTargetTypeError(
      describeTarget(target),
      'expected a config type declared with defineConfig'
    );
  }

  if (subClasses.size > 0) {
    return buildSpec(target, subClasses);
  }

  const cached = specCache.get(target);
  if (cached !== undefined) {
    return cached;
  }
  const spec = buildSpec(target, subClasses);
  specCache.set(target, spec);
  return spec;
}
