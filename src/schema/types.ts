/**
 * Types describing config targets and their fields.
 *
 * A target type is declared once with `defineConfig` and normalized by
 * `introspect` into a {@link TypeSpec}: the ordered field list the
 * materializer walks.
 *
 * @packageDocumentation
 */

import type { ValidationIssue } from '../errors/index.js';

/** Brand carried by every value created with `defineConfig`. */
export const CONFIG_TYPE: unique symbol = Symbol.for('cascade-config.config-type');

/** Brand carried by every value created with `typeToken`. */
export const TYPE_TOKEN: unique symbol = Symbol.for('cascade-config.type-token');

/** Brand carried by every field builder. */
export const FIELD: unique symbol = Symbol.for('cascade-config.field');

/**
 * Identity of a value type that is not itself a config, such as a path, a
 * date-time, or a user-defined type with a registered converter.
 *
 * @typeParam T - The converted value type.
 */
export interface TypeToken<T> {
  readonly [TYPE_TOKEN]: true;
  /** Display name used in error messages. */
  readonly name: string;
  /** Phantom member carrying the converted value type; never set. */
  readonly __value?: T;
}

/**
 * Primitive scalar kinds. Values of these kinds pass through unconverted.
 */
export type PrimitiveKind = 'string' | 'number' | 'boolean';

/**
 * The type a field was declared with.
 */
export type DeclaredType =
  | { readonly kind: 'primitive'; readonly primitive: PrimitiveKind }
  | { readonly kind: 'token'; readonly token: TypeToken<unknown> }
  | { readonly kind: 'config'; readonly type: ConfigType<unknown> }
  | { readonly kind: 'other'; readonly label: string };

/**
 * Whether a field must be present, or what it falls back to.
 */
export type Presence =
  | { readonly kind: 'required' }
  | { readonly kind: 'default'; readonly value: () => unknown };

/**
 * Outcome of a validation hook: nothing (or an empty list) when valid.
 */
export type ValidationOutcome = void | readonly ValidationIssue[];

/**
 * Fields of a config type, keyed by name. Declaration order is key order.
 */
export type FieldMap = Readonly<Record<string, FieldLike<unknown>>>;

/**
 * Structural view of a field builder, used for type inference.
 *
 * @typeParam T - The materialized value type of the field.
 */
export interface FieldLike<T> {
  readonly [FIELD]: true;
  readonly declared: DeclaredType;
  readonly presence: Presence;
  readonly nullable: boolean;
  /** Phantom member carrying the value type; never set. */
  readonly __value?: T;
}

/**
 * Value type of a single field.
 */
export type FieldValue<F> = F extends FieldLike<infer T> ? T : never;

/**
 * Plain-object shape produced for a field map.
 */
export type InferFields<F extends FieldMap> = { -readonly [K in keyof F]: FieldValue<F[K]> };

/**
 * A declared config target type.
 *
 * @typeParam T - Type of the instances produced for this config.
 */
export interface ConfigType<T> {
  readonly [CONFIG_TYPE]: true;
  /** Display name used in errors and provenance frames. */
  readonly name: string;
  /** Field declarations in declaration order. */
  readonly fields: FieldMap;
  /**
   * Nested-config capability marker: a field declared with this type is
   * materialized as a sub-config even when the type is not listed in
   * `subClasses`.
   */
  readonly nested: boolean;
  /** Builds an instance from the materialized field values. */
  construct(values: Record<string, unknown>): T;
  /** Optional validation hook run by `validateConfig`. */
  validate?(instance: T): ValidationOutcome;
  /**
   * Recognizes values that already are instances of this type. A sub-config
   * field holding such a value keeps it as is.
   */
  is?(value: unknown): value is T;
}

/**
 * Instance type of a config type.
 */
export type ConfigOf<C> = C extends ConfigType<infer T> ? T : never;

/**
 * Semantic tag of a field, as classified by `introspect`.
 */
export type TypeTag = 'primitive' | 'path' | 'datetime' | 'nested' | 'custom' | 'other';

/**
 * Key under which a converter is registered.
 */
export type ConversionKey = TypeToken<unknown> | ConfigType<unknown>;

interface FieldSpecBase {
  readonly name: string;
  readonly tag: TypeTag;
  /** Registry key for the declared type, when it has one. */
  readonly key: ConversionKey | undefined;
  /** Display name of the declared type. */
  readonly typeName: string;
  readonly presence: Presence;
  /** Whether `null`/`undefined` values are accepted without conversion. */
  readonly nullable: boolean;
}

/**
 * Normalized description of one field.
 */
export type FieldSpec =
  | (FieldSpecBase & { readonly isNestedConfig: true; readonly nestedType: ConfigType<unknown> })
  | (FieldSpecBase & { readonly isNestedConfig: false });

/**
 * Normalized description of a config type.
 */
export interface TypeSpec {
  readonly name: string;
  readonly type: ConfigType<unknown>;
  readonly fields: readonly FieldSpec[];
}
