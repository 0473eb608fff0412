import { describe, expect, it } from 'vitest';
import * as path from 'node:path';
import { converter } from '../convert/registry.js';
import {
  ConfigCycleError,
  ConfigValidationError,
  ConversionError,
  EmptyCascadeError,
  MissingRequiredFieldError,
  SourceReadError,
} from '../errors/index.js';
import type { Reader } from '../materialize/context.js';
import type { RawMapping } from '../merge/cascade.js';
import { defineConfig, defineConfigFactory, field, typeToken } from '../schema/define.js';
import { Logger } from '../utils/logger.js';
import { configFromDict, configFromFiles } from './loader.js';

function memoryReader(files: Record<string, RawMapping>): Reader & { calls: string[] } {
  const calls: string[] = [];
  const reader = (source: string): RawMapping => {
    calls.push(source);
    const data = files[source];
    if (data === undefined) {
      throw new SourceReadError(source, 'not_found', 'no such file');
    }
    return data;
  };
  return Object.assign(reader, { calls });
}

function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

const silent = new Logger({ component: 'test', write: () => undefined });

const Simple = defineConfig('Simple', {
  foo: field.number(),
  flag: field.boolean().default(false),
});

const Palette = defineConfig('Palette', { cmap: field.string() }, { nested: true });

const Plot = defineConfig('Plot', {
  foo: field.number(),
  palette: field.config(Palette),
});

const Server = defineConfig(
  'Server',
  { port: field.number() },
  { validate: (server) => (server.port > 0 ? [] : [{ field: 'port', message: 'must be positive' }]) }
);

describe('configFromDict', () => {
  it('should materialize a mapping with defaults', () => {
    expect(configFromDict({ foo: 10 }, Simple, { logger: silent })).toEqual({ foo: 10, flag: false });
  });

  it('should frame failures with the mapping source', () => {
    const error = catchError(() => configFromDict({}, Simple, { logger: silent }));

    expect(error).toBeInstanceOf(MissingRequiredFieldError);
    expect(error).toHaveProperty(
      'message',
      "Missing required field 'foo' for config type Simple\n  while building Simple from mapping"
    );
  });

  it('should frame inline sub-config failures innermost first', () => {
    const error = catchError(() => configFromDict({ foo: 1, palette: {} }, Plot, { logger: silent }));

    expect(error).toHaveProperty('frames', [
      { targetType: 'Palette', source: "inline 'palette' in mapping" },
      { targetType: 'Plot', source: 'mapping' },
    ]);
  });

  it('should not follow file pointers', () => {
    const error = catchError(() => configFromDict({ foo: 1, palette: 'palette.toml' }, Plot, { logger: silent }));

    expect(error).toBeInstanceOf(ConversionError);
    expect(error).toHaveProperty('field', 'palette');
  });

  it('should accept a ready-made sub-config instance', () => {
    class Theme {
      constructor(readonly cmap: string) {}
    }
    const ThemeConfig = defineConfigFactory('Theme', { cmap: field.string() }, ({ cmap }) => new Theme(cmap), {
      nested: true,
      is: (value): value is Theme => value instanceof Theme,
    });
    const Chart = defineConfig('Chart', { theme: field.config(ThemeConfig) });
    const theme = new Theme('viridis');

    expect(configFromDict({ theme }, Chart, { logger: silent }).theme).toBe(theme);
  });

  it('should validate unless told not to', () => {
    const error = catchError(() => configFromDict({ port: 0 }, Server, { logger: silent }));

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error).toHaveProperty('frames', [{ targetType: 'Server', source: 'mapping' }]);
    expect(configFromDict({ port: 0 }, Server, { logger: silent, validate: false })).toEqual({ port: 0 });
  });

  it('should apply converters and switches', () => {
    const Celsius = typeToken<number>('Celsius');
    const Reading = defineConfig('Reading', { temperature: field.custom(Celsius), log: field.path() });

    const reading = configFromDict({ temperature: '21', log: 'logs/./today.log' }, Reading, {
      logger: silent,
      convertPaths: false,
      converters: [converter(Celsius, (raw) => Number(raw))],
    });

    expect(reading).toEqual({ temperature: 21, log: 'logs/./today.log' });
  });

  it('should honour the sub-config allow-list', () => {
    const Axis = defineConfig('Axis', { label: field.string() });
    const Chart = defineConfig('Chart', { axis: field.config(Axis) });

    const chart = configFromDict({ axis: { label: 'time', extra: true } }, Chart, {
      logger: silent,
      subClasses: [Axis],
    });

    expect(chart).toEqual({ axis: { label: 'time' } });
  });
});

describe('configFromFiles', () => {
  it('should reject an empty cascade', () => {
    expect(() => configFromFiles([], Simple, memoryReader({}), { logger: silent })).toThrow(EmptyCascadeError);
  });

  it('should resolve relative paths against cwd', () => {
    const reader = memoryReader({ '/cfg/plot.toml': { foo: 10 } });

    expect(configFromFiles('plot.toml', Simple, reader, { cwd: '/cfg', logger: silent })).toEqual({
      foo: 10,
      flag: false,
    });
    expect(reader.calls).toEqual(['/cfg/plot.toml']);
  });

  it('should merge a cascade with later files winning', () => {
    const reader = memoryReader({
      '/cfg/base.toml': { foo: 10, palette: { cmap: 'viridis' } },
      '/cfg/local.toml': { foo: 999 },
    });

    const plot = configFromFiles(['base.toml', 'local.toml'], Plot, reader, { cwd: '/cfg', logger: silent });

    expect(plot).toEqual({ foo: 999, palette: { cmap: 'viridis' } });
  });

  it('should follow a pointer through the same reader', () => {
    const reader = memoryReader({
      '/cfg/plot.toml': { foo: 1, palette: 'palette.toml' },
      '/cfg/palette.toml': { cmap: 'viridis' },
    });

    const plot = configFromFiles('/cfg/plot.toml', Plot, reader, { cwd: '/cfg', logger: silent });

    expect(plot.palette).toEqual({ cmap: 'viridis' });
  });

  it('should resolve pointers against the working directory by default', () => {
    const palette = path.resolve('palette.toml');
    const reader = memoryReader({
      '/cfg/plot.toml': { foo: 1, palette: 'palette.toml' },
      [palette]: { cmap: 'magma' },
    });

    configFromFiles('/cfg/plot.toml', Plot, reader, { logger: silent });

    expect(reader.calls).toEqual(['/cfg/plot.toml', palette]);
  });

  it('should merge before resolving pointers', () => {
    const reader = memoryReader({
      '/cfg/base.toml': { foo: 1, palette: 'palette.toml' },
      '/cfg/inline.toml': { palette: { cmap: 'gray' } },
      '/cfg/palette.toml': { cmap: 'viridis' },
    });
    const options = { cwd: '/cfg', logger: silent };

    expect(configFromFiles(['base.toml', 'inline.toml'], Plot, reader, options).palette).toEqual({
      cmap: 'gray',
    });
    expect(configFromFiles(['inline.toml', 'base.toml'], Plot, reader, options).palette).toEqual({
      cmap: 'viridis',
    });
  });

  it('should frame failures with the whole cascade', () => {
    const reader = memoryReader({ '/cfg/a.toml': {}, '/cfg/b.toml': {} });

    const error = catchError(() =>
      configFromFiles(['a.toml', 'b.toml'], Simple, reader, { cwd: '/cfg', logger: silent })
    );

    expect(error).toHaveProperty('frames', [
      { targetType: 'Simple', source: 'cascade [/cfg/a.toml, /cfg/b.toml]' },
    ]);
  });

  it('should report unreadable top-level files', () => {
    const error = catchError(() => configFromFiles('/cfg/missing.toml', Simple, memoryReader({}), { logger: silent }));

    expect(error).toBeInstanceOf(SourceReadError);
    expect(error).toHaveProperty('message', [
      'Cannot read config source /cfg/missing.toml (not_found): no such file',
      '  while building Simple from /cfg/missing.toml',
    ].join('\n'));
  });

  it('should reject invalid top-level paths', () => {
    const error = catchError(() => configFromFiles(['a.toml', ''], Simple, memoryReader({}), { logger: silent }));

    expect(error).toBeInstanceOf(SourceReadError);
    expect(error).toHaveProperty('kind', 'read_error');
    expect(error).toHaveProperty('frames', [{ targetType: 'Simple', source: 'cascade [a.toml, ]' }]);
  });

  it('should frame an invalid single path with the path as given', () => {
    const error = catchError(() => configFromFiles('bad\0.toml', Simple, memoryReader({}), { logger: silent }));

    expect(error).toHaveProperty(
      'message',
      [
        'Cannot read config source bad\0.toml (read_error): Path cannot contain null bytes',
        '  while building Simple from bad\0.toml',
      ].join('\n')
    );
  });

  it('should detect a pointer back to a top-level file', () => {
    const Leaf = defineConfig('Leaf', { name: field.string() }, { nested: true });
    const Mid = defineConfig('Mid', { name: field.string(), child: field.config(Leaf) }, { nested: true });
    const Root = defineConfig('Root', { name: field.string(), child: field.config(Mid) });
    const reader = memoryReader({
      '/cfg/a.toml': { name: 'a', child: 'b.toml' },
      '/cfg/b.toml': { name: 'b', child: 'a.toml' },
    });

    const error = catchError(() => configFromFiles('a.toml', Root, reader, { cwd: '/cfg', logger: silent }));

    expect(error).toBeInstanceOf(ConfigCycleError);
    expect(error).toHaveProperty('chain', ['/cfg/a.toml', '/cfg/b.toml', '/cfg/a.toml']);
    expect(error).toHaveProperty('frames', [
      { targetType: 'Leaf', source: '/cfg/a.toml' },
      { targetType: 'Mid', source: '/cfg/b.toml' },
      { targetType: 'Root', source: '/cfg/a.toml' },
    ]);
  });

  it('should trace loading at debug level', () => {
    const lines: string[] = [];
    const logger = new Logger({ component: 'app', debugMode: true, write: (line) => void lines.push(line) });
    const reader = memoryReader({
      '/cfg/plot.toml': { foo: 1, palette: 'palette.toml' },
      '/cfg/palette.toml': { cmap: 'viridis' },
    });

    configFromFiles('plot.toml', Plot, reader, { cwd: '/cfg', logger });

    const entries: unknown[] = lines.map((line) => JSON.parse(line));
    expect(entries).toEqual([
      expect.objectContaining({ component: 'loader', event: 'cascade_read', data: { source: '/cfg/plot.toml' } }),
      expect.objectContaining({ event: 'cascade_merged', data: { layers: 1, keys: ['foo', 'palette'] } }),
      expect.objectContaining({
        event: 'subconfig_pointer',
        data: { field: 'palette', type: 'Palette', source: '/cfg/palette.toml' },
      }),
      expect.objectContaining({ event: 'config_materialized', data: { type: 'Plot' } }),
    ]);
  });
});
