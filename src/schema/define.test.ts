import { describe, expect, it } from 'vitest';
import { InvalidTargetTypeError } from '../errors/index.js';
import { DateTimeType, PathType, defineConfig, defineConfigFactory, field, isField, typeToken } from './define.js';
import { isConfigType } from './introspect.js';
import { CONFIG_TYPE } from './types.js';

describe('field builders', () => {
  it('should declare required fields by default', () => {
    expect(field.string().presence).toEqual({ kind: 'required' });
    expect(field.number().nullable).toBe(false);
  });

  it('should return a new field from each modifier', () => {
    const base = field.number();
    const withDefault = base.default(8080);

    expect(withDefault).not.toBe(base);
    expect(base.presence.kind).toBe('required');
    expect(withDefault.presence.kind).toBe('default');
  });

  it('should share a plain default and rebuild a factory default', () => {
    const shared = field.list<string>().default(['a']);
    const fresh = field.list<string>().defaultFactory(() => ['a']);

    if (shared.presence.kind !== 'default' || fresh.presence.kind !== 'default') {
      throw new Error('expected defaults');
    }
    expect(shared.presence.value()).toBe(shared.presence.value());
    expect(fresh.presence.value()).not.toBe(fresh.presence.value());
    expect(fresh.presence.value()).toEqual(['a']);
  });

  it('should make optional fields nullable with an undefined default', () => {
    const optional = field.datetime().optional();

    expect(optional.nullable).toBe(true);
    if (optional.presence.kind !== 'default') {
      throw new Error('expected a default');
    }
    expect(optional.presence.value()).toBeUndefined();
  });

  it('should keep an existing default when made optional', () => {
    const optional = field.string().default('viridis').optional();

    if (optional.presence.kind !== 'default') {
      throw new Error('expected a default');
    }
    expect(optional.presence.value()).toBe('viridis');
  });

  it('should declare path and datetime fields with the built-in tokens', () => {
    expect(field.path().declared).toEqual({ kind: 'token', token: PathType });
    expect(field.datetime().declared).toEqual({ kind: 'token', token: DateTimeType });
  });

  it('should recognize field builders', () => {
    expect(isField(field.boolean())).toBe(true);
    expect(isField({ declared: { kind: 'other', label: 'x' } })).toBe(false);
    expect(isField(null)).toBe(false);
  });
});

describe('typeToken', () => {
  it('should create distinct identities for equal names', () => {
    const first = typeToken<number>('Celsius');
    const second = typeToken<number>('Celsius');

    expect(first).not.toBe(second);
    expect(first.name).toBe('Celsius');
  });
});

describe('defineConfig', () => {
  it('should build plain objects from field values', () => {
    const Plot = defineConfig('Plot', { foo: field.number() });

    expect(Plot.construct({ foo: 10 })).toEqual({ foo: 10 });
    expect(Plot.nested).toBe(false);
    expect(isConfigType(Plot)).toBe(true);
    expect(Plot[CONFIG_TYPE]).toBe(true);
  });

  it('should carry the nested marker and validation hook', () => {
    const validate = (): void => undefined;
    const Palette = defineConfig('Palette', { cmap: field.string() }, { nested: true, validate });

    expect(Palette.nested).toBe(true);
    expect(Palette.validate).toBe(validate);
  });

  it('should freeze the declaration', () => {
    const Plot = defineConfig('Plot', { foo: field.number() });

    expect(Object.isFrozen(Plot)).toBe(true);
    expect(Object.isFrozen(Plot.fields)).toBe(true);
  });

  it('should reject an empty name', () => {
    expect(() => defineConfig(' ', {})).toThrow(InvalidTargetTypeError);
  });

  it('should reject entries that are not field builders', () => {
    const fields = { foo: field.number(), bar: 'string' };

    expect(() => Reflect.apply(defineConfig, undefined, ['Plot', fields])).toThrow(
      "Invalid config type Plot: field 'bar' is not a field builder"
    );
  });
});

describe('defineConfigFactory', () => {
  class Server {
    constructor(
      readonly host: string,
      readonly port: number
    ) {}
  }

  it('should build instances with the factory', () => {
    const ServerConfig = defineConfigFactory(
      'Server',
      { host: field.string(), port: field.number() },
      ({ host, port }) => new Server(host, port)
    );

    const server = ServerConfig.construct({ host: 'localhost', port: 8080 });

    expect(server).toBeInstanceOf(Server);
    expect(server.port).toBe(8080);
  });
});
