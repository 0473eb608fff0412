/**
 * Config entry points.
 *
 * @packageDocumentation
 */

export {
  configFromDict,
  configFromFile,
  configFromFiles,
  configFromJson,
  configFromToml,
  configFromYaml,
} from './loader.js';
export type {
  FileMaterializeOptions,
  MaterializeOptions,
  Reader,
  SourcePaths,
} from './loader.js';
