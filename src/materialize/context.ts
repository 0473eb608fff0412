/**
 * Per-call state threaded through one top-level materialization.
 *
 * @packageDocumentation
 */

import type { ConversionRegistry } from '../convert/registry.js';
import { ConfigError, type ProvenanceFrame } from '../errors/index.js';
import type { RawMapping } from '../merge/cascade.js';
import type { ConfigType } from '../schema/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Reads a config source into a raw mapping.
 *
 * Implementations throw `SourceReadError` on failure; anything else they throw
 * is wrapped into one.
 */
export type Reader = (source: string) => RawMapping;

/**
 * State shared by every nested materialization of one top-level call.
 *
 * Nothing here outlives the call: the provenance stack and cycle set are
 * created fresh by each entry point.
 */
export interface ResolutionContext {
  /** Converters for this call. */
  readonly registry: ConversionRegistry;
  /** Types treated as sub-configs without the nested marker. */
  readonly subClasses: ReadonlySet<ConfigType<unknown>>;
  /** Frames being built, oldest first. */
  readonly provenance: ProvenanceFrame[];
  /** Canonical sources being resolved along the current path. */
  readonly cycle: Set<string>;
  /** Reader for file pointers; `undefined` disables pointer resolution. */
  readonly reader: Reader | undefined;
  /** Base directory for relative source paths. */
  readonly cwd: string;
  readonly logger: Logger;
}

/**
 * Inputs for {@link createContext}.
 */
export interface ContextInit {
  readonly registry: ConversionRegistry;
  readonly subClasses?: Iterable<ConfigType<unknown>> | undefined;
  readonly reader?: Reader | undefined;
  readonly cwd?: string | undefined;
  readonly logger: Logger;
}

/**
 * Creates the state for one top-level call.
 */
export function createContext(init: ContextInit): ResolutionContext {
  return {
    registry: init.registry,
    subClasses: new Set(init.subClasses ?? []),
    provenance: [],
    cycle: new Set(),
    reader: init.reader,
    cwd: init.cwd ?? process.cwd(),
    logger: init.logger,
  };
}

/**
 * The frame currently being built, if any.
 */
export function currentFrame(context: ResolutionContext): ProvenanceFrame | undefined {
  return context.provenance.at(-1);
}

/**
 * Runs `build` inside a provenance frame.
 *
 * The frame is pushed for the duration of the call and popped on every exit.
 * A {@link ConfigError} escaping `build` gets the frame appended before it is
 * rethrown.
 *
 * @param context - The call state.
 * @param frame - The type and source being built.
 * @param build - The work to run inside the frame.
 */
export function withinFrame<R>(
  context: ResolutionContext,
  frame: ProvenanceFrame,
  build: () => R
): R {
  context.provenance.push(frame);
  try {
    return build();
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error.addFrame(frame);
    }
    throw error;
  } finally {
    context.provenance.pop();
  }
}
