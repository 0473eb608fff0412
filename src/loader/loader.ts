/**
 * Entry points: materialize a config from a mapping or from files.
 *
 * Each call builds its own conversion registry, provenance stack and cycle
 * set, so concurrent calls share nothing but the introspection cache.
 *
 * @packageDocumentation
 */

import { buildRegistry, type RegistryOptions } from '../convert/registry.js';
import { EmptyCascadeError, SourceReadError } from '../errors/index.js';
import {
  createContext,
  withinFrame,
  type Reader,
  type ResolutionContext,
} from '../materialize/context.js';
import { materialize } from '../materialize/materializer.js';
import { readSource } from '../materialize/resolver.js';
import { isMapping, mergeCascade, type RawMapping } from '../merge/cascade.js';
import { readByExtension } from '../readers/index.js';
import { readJson } from '../readers/json.js';
import { readToml } from '../readers/toml.js';
import { readYaml } from '../readers/yaml.js';
import type { ConfigType } from '../schema/types.js';
import { createDefaultLogger, type Logger } from '../utils/logger.js';
import { validatePath } from '../utils/safe-fs.js';
import { validateConfig } from '../validate/validator.js';

/**
 * Options accepted by every entry point.
 */
export interface MaterializeOptions extends RegistryOptions {
  /** Types treated as sub-configs without the nested marker. */
  readonly subClasses?: Iterable<ConfigType<unknown>> | undefined;
  /**
   * Run validation hooks on the result and its sub-configs.
   * @defaultValue true
   */
  readonly validate?: boolean | undefined;
  /**
   * Logger for debug tracing. Defaults to a stderr logger whose debug output
   * is switched on by `CASCADE_CONFIG_DEBUG`.
   */
  readonly logger?: Logger | undefined;
}

/**
 * Options accepted by the file entry points.
 */
export interface FileMaterializeOptions extends MaterializeOptions {
  /**
   * Directory relative source paths and file pointers are resolved against.
   * @defaultValue process.cwd()
   */
  readonly cwd?: string | undefined;
}

/**
 * One or more source paths, lowest precedence first.
 */
export type SourcePaths = string | readonly string[];

function finish<T>(type: ConfigType<T>, instance: T, context: ResolutionContext, validate: boolean): T {
  if (validate) {
    validateConfig(type, instance, { subClasses: context.subClasses });
  }
  context.logger.debug('config_materialized', { type: type.name });
  return instance;
}

/**
 * Materializes a config from an in-memory mapping.
 *
 * Sub-config fields must hold mappings here; file pointers are only followed by
 * the file entry points.
 *
 * @example
 * ```typescript
 * const Plot = defineConfig('Plot', { foo: field.number(), flag: field.boolean().default(false) });
 * configFromDict({ foo: 10 }, Plot); // { foo: 10, flag: false }
 * ```
 *
 * @param mapping - Raw field values.
 * @param type - The target config type.
 * @param options - Conversion switches, converters, sub-configs and validation.
 * @returns The materialized config.
 * @throws ConfigError subclasses, with provenance frames attached.
 */
export function configFromDict<T>(
  mapping: RawMapping,
  type: ConfigType<T>,
  options: MaterializeOptions = {}
): T {
  const context = createContext({
    registry: buildRegistry(options),
    subClasses: options.subClasses,
    logger: (options.logger ?? createDefaultLogger()).child('loader'),
  });

  return withinFrame(context, { targetType: type.name, source: 'mapping' }, () => {
    if (!isMapping(mapping)) {
      throw new SourceReadError('mapping', 'format_error', 'expected a mapping of field values');
    }
    const instance = materialize(type, mapping, context);
    return finish(type, instance, context, options.validate ?? true);
  });
}

function canonicalize(source: string, cwd: string): string {
  try {
    return validatePath(source, cwd);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceReadError(source, 'read_error', message, error);
  }
}

function describeCascade(sources: readonly string[]): string {
  return sources.length === 1 ? (sources[0] ?? '') : `cascade [${sources.join(', ')}]`;
}

/**
 * Materializes a config from a cascade of files read by `reader`.
 *
 * The files are read in order and deep-merged, later files overriding earlier
 * ones; sub-config fields holding strings are then followed as file pointers
 * with the same reader. Relative paths resolve against `options.cwd`.
 *
 * @param paths - One path, or a cascade in increasing order of precedence.
 * @param type - The target config type.
 * @param reader - Turns a file path into a raw mapping.
 * @param options - Conversion switches, converters, sub-configs, validation and cwd.
 * @returns The materialized config.
 * @throws EmptyCascadeError if `paths` is an empty list.
 * @throws ConfigError subclasses, with provenance frames attached.
 */
export function configFromFiles<T>(
  paths: SourcePaths,
  type: ConfigType<T>,
  reader: Reader,
  options: FileMaterializeOptions = {}
): T {
  const listed = typeof paths === 'string' ? [paths] : [...paths];
  if (listed.length === 0) {
    throw new EmptyCascadeError();
  }

  const context = createContext({
    registry: buildRegistry(options),
    subClasses: options.subClasses,
    reader,
    cwd: options.cwd,
    logger: (options.logger ?? createDefaultLogger()).child('loader'),
  });
  // A path that cannot be resolved is reported against the paths as given.
  const sources = withinFrame(context, { targetType: type.name, source: describeCascade(listed) }, () =>
    listed.map((source) => canonicalize(source, context.cwd))
  );

  return withinFrame(context, { targetType: type.name, source: describeCascade(sources) }, () => {
    // Top-level files stay on the resolution path for the whole call.
    for (const source of sources) {
      context.cycle.add(source);
    }

    const layers = sources.map((source) => {
      context.logger.debug('cascade_read', { source });
      return readSource(reader, source);
    });
    const merged = mergeCascade(layers);
    context.logger.debug('cascade_merged', { layers: layers.length, keys: Object.keys(merged) });

    const instance = materialize(type, merged, context);
    return finish(type, instance, context, options.validate ?? true);
  });
}

/**
 * Materializes a config from TOML files.
 *
 * @example
 * ```typescript
 * const config = configFromToml(['base.toml', 'local.toml'], Plot, { cwd: '/etc/plot' });
 * ```
 */
export function configFromToml<T>(
  paths: SourcePaths,
  type: ConfigType<T>,
  options: FileMaterializeOptions = {}
): T {
  return configFromFiles(paths, type, readToml, options);
}

/**
 * Materializes a config from YAML files.
 */
export function configFromYaml<T>(
  paths: SourcePaths,
  type: ConfigType<T>,
  options: FileMaterializeOptions = {}
): T {
  return configFromFiles(paths, type, readYaml, options);
}

/**
 * Materializes a config from JSON files.
 */
export function configFromJson<T>(
  paths: SourcePaths,
  type: ConfigType<T>,
  options: FileMaterializeOptions = {}
): T {
  return configFromFiles(paths, type, readJson, options);
}

/**
 * Materializes a config from files of any supported format, picking each
 * file's reader (pointer targets included) from its extension.
 */
export function configFromFile<T>(
  paths: SourcePaths,
  type: ConfigType<T>,
  options: FileMaterializeOptions = {}
): T {
  return configFromFiles(paths, type, readByExtension, options);
}

export type { Reader };
