/**
 * Declaration API for config target types.
 *
 * @example
 * ```typescript
 * const Palette = defineConfig('Palette', { cmap: field.string() }, { nested: true });
 *
 * const Plot = defineConfig('Plot', {
 *   title: field.string(),
 *   output: field.path().default('plot.png'),
 *   palette: field.config(Palette),
 *   created: field.datetime().optional(),
 * });
 * ```
 *
 * @packageDocumentation
 */

import { InvalidTargetTypeError } from '../errors/index.js';
import {
  CONFIG_TYPE,
  FIELD,
  TYPE_TOKEN,
  type ConfigType,
  type DeclaredType,
  type FieldLike,
  type FieldMap,
  type InferFields,
  type Presence,
  type TypeToken,
  type ValidationOutcome,
} from './types.js';

/**
 * Creates the identity of a custom value type.
 *
 * Register a converter for the token with `converter(token, fn)` and declare
 * fields of that type with `field.custom(token)`.
 *
 * @param name - Display name used in error messages.
 */
export function typeToken<T>(name: string): TypeToken<T> {
  return Object.freeze({ [TYPE_TOKEN]: true as const, name });
}

/** Path-like values: strings converted to normalized paths. */
export const PathType: TypeToken<string> = typeToken<string>('path');

/** Date-time values: `Date`s, or ISO-8601 strings parsed to `Date`s. */
export const DateTimeType: TypeToken<Date> = typeToken<Date>('datetime');

/**
 * Immutable builder describing one field of a config type.
 *
 * @typeParam T - The materialized value type.
 */
export class Field<T> implements FieldLike<T> {
  readonly [FIELD] = true as const;
  declare readonly __value?: T;

  private constructor(
    readonly declared: DeclaredType,
    readonly presence: Presence,
    readonly nullable: boolean
  ) {}

  /**
   * Creates a required field of the given declared type.
   */
  static of<T>(declared: DeclaredType): Field<T> {
    return new Field<T>(declared, { kind: 'required' }, false);
  }

  /**
   * Returns a copy of this field that falls back to `value` when absent.
   *
   * The same value is shared by every materialized instance; use
   * {@link Field.defaultFactory} for mutable defaults.
   */
  default(value: T): Field<T> {
    return new Field<T>(this.declared, { kind: 'default', value: () => value }, this.nullable);
  }

  /**
   * Returns a copy of this field whose default is built per instance.
   */
  defaultFactory(factory: () => T): Field<T> {
    return new Field<T>(this.declared, { kind: 'default', value: factory }, this.nullable);
  }

  /**
   * Returns a copy of this field that may be absent or `null`, both of which
   * materialize as `undefined` (unless a default is set).
   */
  optional(): Field<T | undefined> {
    const presence: Presence =
      this.presence.kind === 'default' ? this.presence : { kind: 'default', value: () => undefined };
    return new Field<T | undefined>(this.declared, presence, true);
  }
}

/**
 * Field builders.
 */
export const field = {
  string: (): Field<string> => Field.of<string>({ kind: 'primitive', primitive: 'string' }),
  number: (): Field<number> => Field.of<number>({ kind: 'primitive', primitive: 'number' }),
  boolean: (): Field<boolean> => Field.of<boolean>({ kind: 'primitive', primitive: 'boolean' }),
  path: (): Field<string> => Field.of<string>({ kind: 'token', token: PathType }),
  datetime: (): Field<Date> => Field.of<Date>({ kind: 'token', token: DateTimeType }),
  /** A field holding another config type, materialized as a sub-config when nestable. */
  config: <T>(type: ConfigType<T>): Field<T> => Field.of<T>({ kind: 'config', type }),
  /** A field of a custom value type, converted by the converter registered for `token`. */
  custom: <T>(token: TypeToken<T>): Field<T> => Field.of<T>({ kind: 'token', token }),
  /** A sequence, passed through as read. */
  list: <T = unknown>(): Field<T[]> => Field.of<T[]>({ kind: 'other', label: 'list' }),
  /** Any value, passed through as read. */
  unknown: <T = unknown>(): Field<T> => Field.of<T>({ kind: 'other', label: 'unknown' }),
} as const;

/**
 * Options shared by every config type declaration.
 */
export interface ConfigTypeOptions<T> {
  /**
   * Marks the type as usable as a sub-config without listing it in
   * `subClasses`.
   * @defaultValue false
   */
  readonly nested?: boolean | undefined;
  /** Validation hook; may throw or return a list of issues. */
  readonly validate?: ((instance: T) => ValidationOutcome) | undefined;
  /**
   * Recognizes ready-made instances, which sub-config fields then accept
   * unchanged. Plain-object types do not need one: their instances are
   * mappings and are rebuilt field by field.
   */
  readonly is?: ((value: unknown) => value is T) | undefined;
}

/**
 * Checks whether a value is a field builder.
 */
export function isField(value: unknown): value is FieldLike<unknown> {
  return typeof value === 'object' && value !== null && FIELD in value;
}

function buildConfigType<F extends FieldMap, T>(
  name: string,
  fields: F,
  options: ConfigTypeOptions<T>,
  construct: (values: InferFields<F>) => T
): ConfigType<T> {
  if (name.trim().length === 0) {
    throw new InvalidTargetTypeError(JSON.stringify(name), 'name must not be empty');
  }
  for (const [fieldName, declaration] of Object.entries(fields)) {
    if (!isField(declaration)) {
      throw new InvalidTargetTypeError(name, `field '${fieldName}' is not a field builder`);
    }
  }

  const { validate, is } = options;
  const type: ConfigType<T> = {
    [CONFIG_TYPE]: true,
    name,
    fields: Object.freeze({ ...fields }),
    nested: options.nested ?? false,
    // The materializer assembles one value per declared field.
    construct: (values) => construct(values as InferFields<F>),
    ...(validate !== undefined ? { validate } : {}),
    ...(is !== undefined ? { is } : {}),
  };
  return Object.freeze(type);
}

/**
 * Declares a config type whose instances are plain objects.
 *
 * @param name - Display name used in errors and provenance frames.
 * @param fields - Field declarations; key order is declaration order.
 * @param options - Nested marker and validation hook.
 */
export function defineConfig<F extends FieldMap>(
  name: string,
  fields: F,
  options: ConfigTypeOptions<InferFields<F>> = {}
): ConfigType<InferFields<F>> {
  return buildConfigType(name, fields, options, (values) => values);
}

/**
 * Declares a config type whose instances are built by a factory, such as a
 * class constructor. A factory that throws is reported as a validation
 * failure.
 *
 * @example
 * ```typescript
 * class Server {
 *   constructor(readonly host: string, readonly port: number) {}
 * }
 * const ServerConfig = defineConfigFactory(
 *   'Server',
 *   { host: field.string(), port: field.number().default(8080) },
 *   ({ host, port }) => new Server(host, port),
 *   { nested: true, is: (value): value is Server => value instanceof Server }
 * );
 * ```
 */
export function defineConfigFactory<F extends FieldMap, T>(
  name: string,
  fields: F,
  construct: (values: InferFields<F>) => T,
  options: ConfigTypeOptions<T> = {}
): ConfigType<T> {
  return buildConfigType(name, fields, options, construct);
}
