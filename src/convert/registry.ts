/**
 * Conversion registry: which function converts values of which declared type.
 *
 * Built per materialization request by overlaying user converters on the
 * built-in path and date-time converters, then shared read-only by every
 * nested materialization of that request.
 *
 * @packageDocumentation
 */

import { DateTimeType, PathType } from '../schema/define.js';
import type { ConfigType, ConversionKey, TypeToken } from '../schema/types.js';
import { convertDateTime, convertPath } from './builtins.js';

/**
 * Converts a raw value to the declared type, throwing on failure.
 */
export type Converter<T = unknown> = (raw: unknown) => T;

/**
 * A converter bound to the declared type it handles.
 */
export interface ConverterEntry {
  readonly key: ConversionKey;
  readonly convert: Converter;
}

/**
 * Binds a converter to a declared type.
 *
 * @example
 * ```typescript
 * const Celsius = typeToken<number>('Celsius');
 * const entry = converter(Celsius, (raw) => Number.parseFloat(String(raw)));
 * ```
 *
 * @param key - The type token or config type the converter produces.
 * @param convert - The conversion function.
 */
export function converter<T>(
  key: TypeToken<T> | ConfigType<T>,
  convert: (raw: unknown) => T
): ConverterEntry {
  return { key, convert };
}

/**
 * User-supplied converters: a list of entries, or a map from declared type to
 * conversion function.
 */
export type ConverterSource =
  | readonly ConverterEntry[]
  | ReadonlyMap<ConversionKey, Converter>;

/**
 * Options for building a registry.
 */
export interface RegistryOptions {
  /** Custom converters; these take precedence over the built-ins. */
  readonly converters?: ConverterSource | undefined;
  /**
   * Convert `field.path()` values with the built-in path converter.
   * @defaultValue true
   */
  readonly convertPaths?: boolean | undefined;
  /**
   * Convert `field.datetime()` values with the built-in date-time converter.
   * @defaultValue true
   */
  readonly convertDates?: boolean | undefined;
}

function isConverterMap(source: ConverterSource): source is ReadonlyMap<ConversionKey, Converter> {
  return source instanceof Map;
}

function entriesOf(source: ConverterSource): Iterable<readonly [ConversionKey, Converter]> {
  if (isConverterMap(source)) {
    return source.entries();
  }
  return source.map((entry) => [entry.key, entry.convert] as const);
}

/**
 * Immutable lookup from declared type to converter.
 */
export class ConversionRegistry {
  private readonly converters: ReadonlyMap<ConversionKey, Converter>;

  private constructor(converters: ReadonlyMap<ConversionKey, Converter>) {
    this.converters = converters;
  }

  /**
   * Builds a registry from user converters and built-in switches.
   *
   * @param options - Converters and built-in switches.
   */
  static build(options: RegistryOptions = {}): ConversionRegistry {
    const converters = new Map<ConversionKey, Converter>();
    if (options.converters !== undefined) {
      for (const [key, convert] of entriesOf(options.converters)) {
        converters.set(key, convert);
      }
    }

    if ((options.convertPaths ?? true) && !converters.has(PathType)) {
      converters.set(PathType, convertPath);
    }
    if ((options.convertDates ?? true) && !converters.has(DateTimeType)) {
      converters.set(DateTimeType, convertDateTime);
    }

    return new ConversionRegistry(converters);
  }

  /**
   * Returns the converter for a declared type.
   *
   * @param key - The declared type, or `undefined` for types without a key.
   */
  lookup(key: ConversionKey | undefined): Converter | undefined {
    return key === undefined ? undefined : this.converters.get(key);
  }

  has(key: ConversionKey): boolean {
    return this.converters.has(key);
  }

  get size(): number {
    return this.converters.size;
  }
}

/**
 * Builds a conversion registry.
 *
 * @param options - Converters and built-in switches.
 */
export function buildRegistry(options: RegistryOptions = {}): ConversionRegistry {
  return ConversionRegistry.build(options);
}
