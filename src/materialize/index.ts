/**
 * The materialization engine.
 *
 * @packageDocumentation
 */

export { createContext, currentFrame, withinFrame } from './context.js';
export type { ContextInit, Reader, ResolutionContext } from './context.js';
export { materialize } from './materializer.js';
export { classifySubConfig, readSource, resolveSubConfig } from './resolver.js';
export type { NestedFieldSpec, SubConfigSource } from './resolver.js';
