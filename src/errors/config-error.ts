/**
 * Error types raised while materializing configuration.
 *
 * Every failure is a subclass of {@link ConfigError}. As an error unwinds
 * through nested materialization frames, each frame appends a
 * {@link ProvenanceFrame} describing the type it was building and the source it
 * was reading, so the final error explains exactly which nested config, from
 * which file, was being built when it failed.
 *
 * @packageDocumentation
 */

/**
 * A record of which target type and which source were being processed.
 */
export interface ProvenanceFrame {
  /** Name of the config type being built. */
  readonly targetType: string;
  /** Description of the source (a file path, a cascade, or an inline block). */
  readonly source: string;
}

/**
 * Renders one provenance frame as a context line.
 *
 * @param frame - The frame to render.
 * @returns A single indented line.
 */
export function formatFrame(frame: ProvenanceFrame): string {
  return `  while building ${frame.targetType} from ${frame.source}`;
}

/**
 * Base class for every configuration error.
 *
 * `frames` is ordered innermost first: the first entry is the most specific
 * frame, the last entry is the top-level call.
 */
export class ConfigError extends Error {
  /** The failure description without any provenance context. */
  public readonly reason: string;
  /** The original error that caused this failure, if any. */
  public override readonly cause: unknown;
  private readonly provenance: ProvenanceFrame[] = [];

  /**
   * Creates a new ConfigError.
   *
   * @param reason - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(reason: string, cause?: unknown) {
    super(reason);
    this.name = 'ConfigError';
    this.reason = reason;
    this.cause = cause;
  }

  /** Provenance frames collected so far, innermost first. */
  get frames(): readonly ProvenanceFrame[] {
    return this.provenance;
  }

  /**
   * Appends a provenance frame and re-renders the message.
   *
   * @param frame - The frame the error is unwinding through.
   * @returns This error, for rethrowing.
   */
  addFrame(frame: ProvenanceFrame): this {
    this.provenance.push(frame);
    this.message = [this.reason, ...this.provenance.map(formatFrame)].join('\n');
    return this;
  }
}

/**
 * Raised when a value passed as a target type was not declared with
 * `defineConfig`, or declares a field that is not a field builder.
 */
export class InvalidTargetTypeError extends ConfigError {
  /** Description of the rejected target. */
  public readonly target: string;

  constructor(target: string, detail: string) {
    super(`Invalid config type ${target}: ${detail}`);
    this.name = 'InvalidTargetTypeError';
    this.target = target;
  }
}

/**
 * Raised when a required field is absent from the mapping.
 */
export class MissingRequiredFieldError extends ConfigError {
  /** Name of the missing field. */
  public readonly field: string;
  /** Name of the config type that declares the field. */
  public readonly targetType: string;

  constructor(field: string, targetType: string) {
    super(`Missing required field '${field}' for config type ${targetType}`);
    this.name = 'MissingRequiredFieldError';
    this.field = field;
    this.targetType = targetType;
  }
}

/**
 * Raised when a raw value cannot be converted to the declared field type.
 */
export class ConversionError extends ConfigError {
  /** Name of the field being converted. */
  public readonly field: string;
  /** Name of the declared type the value was converted to. */
  public readonly targetType: string;
  /** The raw value that failed conversion. */
  public readonly rawValue: unknown;

  constructor(field: string, targetType: string, rawValue: unknown, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      `Cannot convert field '${field}' to ${targetType} (given ${describeValue(rawValue)})${detail}`,
      cause
    );
    this.name = 'ConversionError';
    this.field = field;
    this.targetType = targetType;
    this.rawValue = rawValue;
  }
}

/**
 * Raised when file pointers lead back to a source that is still being resolved.
 */
export class ConfigCycleError extends ConfigError {
  /** The sources along the current path, ending with the re-entered one. */
  public readonly chain: readonly string[];

  constructor(chain: readonly string[]) {
    super(`Cyclic file reference detected: ${chain.join(' -> ')}`);
    this.name = 'ConfigCycleError';
    this.chain = chain;
  }
}

/**
 * Classification of a source read failure.
 */
export type SourceReadErrorKind = 'not_found' | 'parse_error' | 'format_error' | 'read_error';

/**
 * Raised when a reader cannot produce a mapping from a source.
 */
export class SourceReadError extends ConfigError {
  /** The source that could not be read. */
  public readonly source: string;
  /** What went wrong. */
  public readonly kind: SourceReadErrorKind;

  constructor(source: string, kind: SourceReadErrorKind, message: string, cause?: unknown) {
    super(`Cannot read config source ${source} (${kind}): ${message}`, cause);
    this.name = 'SourceReadError';
    this.source = source;
    this.kind = kind;
  }
}

/**
 * Raised when a cascade contains no sources.
 */
export class EmptyCascadeError extends ConfigError {
  constructor() {
    super('Config cascade must contain at least one source');
    this.name = 'EmptyCascadeError';
  }
}

/**
 * One problem reported by a validation hook.
 */
export interface ValidationIssue {
  /** The field that failed validation. */
  readonly field: string;
  /** The invalid value, when the hook reports one. */
  readonly value?: unknown;
  /** Human-readable description of the failure. */
  readonly message: string;
}

/**
 * Raised when a constructed config, or one of its sub-configs, fails validation.
 */
export class ConfigValidationError extends ConfigError {
  /** Issues reported by the failing hook (empty when the hook threw). */
  public readonly issues: readonly ValidationIssue[];
  /** Field names leading from the validated root to the failing config. */
  public readonly fieldPath: readonly string[];
  /** Name of the config type whose validation failed. */
  public readonly targetType: string;

  constructor(
    targetType: string,
    message: string,
    issues: readonly ValidationIssue[],
    fieldPath: readonly string[] = [],
    cause?: unknown
  ) {
    const at = fieldPath.length > 0 ? ` at '${fieldPath.join('.')}'` : '';
    super(`Validation failed for config type ${targetType}${at}: ${message}`, cause);
    this.name = 'ConfigValidationError';
    this.targetType = targetType;
    this.issues = issues;
    this.fieldPath = fieldPath;
  }
}

/**
 * Short description of a raw value for error messages.
 *
 * @param value - The value to describe.
 * @returns The value's type, with its contents for short scalars.
 */
export function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (value instanceof Date) {
    return 'Date';
  }
  if (typeof value === 'string') {
    return value.length > 40 ? 'string' : `string '${value}'`;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return `${typeof value} ${String(value)}`;
  }
  return typeof value;
}
