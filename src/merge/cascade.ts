/**
 * Cascade merging: collapses an ordered list of raw mappings into one.
 *
 * @packageDocumentation
 */

import { EmptyCascadeError } from '../errors/index.js';

/**
 * A string-keyed mapping as produced by a format reader.
 */
export type RawMapping = Record<string, unknown>;

/**
 * Checks whether a value is a plain mapping (not an array, a `Date`, or a
 * class instance).
 *
 * @param value - The value to check.
 */
export function isMapping(value: unknown): value is RawMapping {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype || Object.getPrototypeOf(proto) === null;
}

function setOwn(target: RawMapping, key: string, value: unknown): void {
  // A plain assignment to "__proto__" would replace the prototype instead.
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Deep-merges `layer` over `base` without mutating either.
 *
 * Mappings present on both sides merge key by key. Any other value from
 * `layer` replaces the value in `base` outright, including a mapping replacing
 * a scalar or a scalar replacing a mapping. Nested mappings in the result are
 * fresh copies.
 *
 * @param base - The mapping being overridden.
 * @param layer - The overriding mapping.
 * @returns The merged mapping.
 */
export function mergeMappings(base: RawMapping, layer: RawMapping): RawMapping {
  const merged: RawMapping = {};
  for (const [key, value] of Object.entries(base)) {
    setOwn(merged, key, isMapping(value) ? mergeMappings({}, value) : value);
  }

  for (const [key, value] of Object.entries(layer)) {
    if (!isMapping(value)) {
      setOwn(merged, key, value);
      continue;
    }
    const current = Object.hasOwn(merged, key) ? merged[key] : undefined;
    setOwn(merged, key, mergeMappings(isMapping(current) ? current : {}, value));
  }

  return merged;
}

/**
 * Merges a cascade of mappings, later layers overriding earlier ones.
 *
 * This is a left fold of {@link mergeMappings} starting from an empty
 * mapping, so a single-layer cascade yields a copy of that layer.
 *
 * @example
 * ```typescript
 * mergeCascade([
 *   { foo: 10, cmap: { v: 1 } },
 *   { foo: 999, cmap: { v: 2 } },
 * ]); // { foo: 999, cmap: { v: 2 } }
 * ```
 *
 * @param layers - Mappings in increasing order of precedence.
 * @returns The merged mapping.
 * @throws EmptyCascadeError if `layers` is empty.
 */
export function mergeCascade(layers: readonly RawMapping[]): RawMapping {
  if (layers.length === 0) {
    throw new EmptyCascadeError();
  }
  return layers.reduce<RawMapping>((merged, layer) => mergeMappings(merged, layer), {});
}
