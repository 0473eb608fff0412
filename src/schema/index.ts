/**
 * Config type declarations and their normalized field lists.
 *
 * @packageDocumentation
 */

export {
  DateTimeType,
  Field,
  PathType,
  defineConfig,
  defineConfigFactory,
  field,
  isField,
  typeToken,
} from './define.js';
export type { ConfigTypeOptions } from './define.js';
export { introspect, isConfigType, isNestable } from './introspect.js';
export { CONFIG_TYPE, FIELD, TYPE_TOKEN } from './types.js';
export type {
  ConfigOf,
  ConfigType,
  ConversionKey,
  DeclaredType,
  FieldLike,
  FieldMap,
  FieldSpec,
  FieldValue,
  InferFields,
  Presence,
  PrimitiveKind,
  TypeSpec,
  TypeTag,
  TypeToken,
  ValidationOutcome,
} from './types.js';
