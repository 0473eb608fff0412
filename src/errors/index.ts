/**
 * Configuration error kinds and provenance frames.
 *
 * @packageDocumentation
 */

export {
  ConfigCycleError,
  ConfigError,
  ConfigValidationError,
  ConversionError,
  EmptyCascadeError,
  InvalidTargetTypeError,
  MissingRequiredFieldError,
  SourceReadError,
  describeValue,
  formatFrame,
} from './config-error.js';
export type {
  ProvenanceFrame,
  SourceReadErrorKind,
  ValidationIssue,
} from './config-error.js';
