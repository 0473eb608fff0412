/**
 * cascade-config
 *
 * Materializes typed configuration objects from layered TOML, YAML and JSON
 * files or in-memory mappings: cascades are deep-merged, declared field types
 * drive value conversion, and sub-configs may be inline or point at other
 * files.
 *
 * @example
 * ```typescript
 * import { configFromToml, defineConfig, field } from 'cascade-config';
 *
 * const Palette = defineConfig('Palette', { cmap: field.string() }, { nested: true });
 * const Plot = defineConfig('Plot', {
 *   foo: field.number(),
 *   output: field.path(),
 *   palette: field.config(Palette),
 * });
 *
 * const plot = configFromToml(['base.toml', 'local.toml'], Plot);
 * ```
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export {
  ConversionRegistry,
  buildRegistry,
  convertDateTime,
  convertPath,
  converter,
  parseIsoDateTime,
  type Converter,
  type ConverterEntry,
  type ConverterSource,
  type RegistryOptions,
} from './convert/index.js';

export {
  ConfigCycleError,
  ConfigError,
  ConfigValidationError,
  ConversionError,
  EmptyCascadeError,
  InvalidTargetTypeError,
  MissingRequiredFieldError,
  SourceReadError,
  type ProvenanceFrame,
  type SourceReadErrorKind,
  type ValidationIssue,
} from './errors/index.js';

export {
  configFromDict,
  configFromFile,
  configFromFiles,
  configFromJson,
  configFromToml,
  configFromYaml,
  type FileMaterializeOptions,
  type MaterializeOptions,
  type Reader,
  type SourcePaths,
} from './loader/index.js';

export { isMapping, mergeCascade, mergeMappings, type RawMapping } from './merge/index.js';

export {
  SUPPORTED_EXTENSIONS,
  parseJson,
  parseToml,
  parseYaml,
  readByExtension,
  readJson,
  readToml,
  readYaml,
  readerForPath,
} from './readers/index.js';

export {
  DateTimeType,
  Field,
  PathType,
  defineConfig,
  defineConfigFactory,
  field,
  introspect,
  isConfigType,
  typeToken,
  type ConfigOf,
  type ConfigType,
  type ConfigTypeOptions,
  type FieldSpec,
  type InferFields,
  type TypeSpec,
  type TypeTag,
  type TypeToken,
  type ValidationOutcome,
} from './schema/index.js';

export { DEBUG_ENV_VAR, Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';

export { jsonSchemaHook, validateConfig, type ValidateConfigOptions } from './validate/index.js';
