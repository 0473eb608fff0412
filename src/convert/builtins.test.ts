import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';
import { PathValidationError } from '../utils/safe-fs.js';
import { convertDateTime, convertPath, parseIsoDateTime } from './builtins.js';

describe('convertPath', () => {
  it('should normalize separators and dot segments', () => {
    expect(convertPath('configs//./nested/../plot.toml')).toBe('configs/plot.toml');
  });

  it('should keep relative paths relative', () => {
    expect(convertPath('some_file.txt')).toBe('some_file.txt');
  });

  it.each([[''], ['  '], [42], [null]])('should reject %o', (raw) => {
    expect(() => convertPath(raw)).toThrow(PathValidationError);
  });

  it('should be idempotent', () => {
    fc.assert(
      fc.property(fc.stringMatching(/^[a-z./]{1,30}$/), (raw) => {
        const once = convertPath(raw);
        return convertPath(once) === once;
      }),
      { numRuns: 200 }
    );
  });
});

describe('parseIsoDateTime', () => {
  it.each([
    ['2025-02-06', '2025-02-06T00:00:00.000Z'],
    ['2025-02-06 12:05:01', '2025-02-06T12:05:01.000Z'],
    ['2025-02-06T12:05:01', '2025-02-06T12:05:01.000Z'],
    ['2025-02-06T12:05', '2025-02-06T12:05:00.000Z'],
    ['2025-02-06T12:05:01.5Z', '2025-02-06T12:05:01.500Z'],
    ['2025-02-06T12:05:01.123456Z', '2025-02-06T12:05:01.123Z'],
    ['2025-02-06T12:05:01+01:00', '2025-02-06T11:05:01.000Z'],
    ['2025-02-06T12:05:01-05:30', '2025-02-06T17:35:01.000Z'],
    ['0050-01-01', '0050-01-01T00:00:00.000Z'],
    ['0099-12-31T23:59:59Z', '0099-12-31T23:59:59.000Z'],
    ['0000-02-29', '0000-02-29T00:00:00.000Z'],
  ])('should parse %s', (text, iso) => {
    expect(parseIsoDateTime(text)?.toISOString()).toBe(iso);
  });

  it.each([['soon'], ['2025-02-30'], ['0050-02-29'], ['2025-13-01'], ['2025-02-06T25:00:00'], ['2025-02-06T12:05:01+24:00']])(
    'should reject %s',
    (text) => {
      expect(parseIsoDateTime(text)).toBeUndefined();
    }
  );
});

describe('convertDateTime', () => {
  it('should return a Date unchanged', () => {
    const value = new Date(Date.UTC(2025, 1, 6, 12, 5, 1));
    expect(convertDateTime(value)).toBe(value);
  });

  it('should convert dates in the first century', () => {
    expect(convertDateTime('0050-01-01').getUTCFullYear()).toBe(50);
  });

  it('should trim strings before parsing', () => {
    expect(convertDateTime('  2025-02-06 \n').toISOString()).toBe('2025-02-06T00:00:00.000Z');
  });

  it('should be idempotent on converted values', () => {
    fc.assert(
      fc.property(
        fc.date({ min: new Date(Date.UTC(1900, 0, 1)), max: new Date(Date.UTC(2999, 11, 31)), noInvalidDate: true }),
        (date) => {
          const once = convertDateTime(date.toISOString());
          return convertDateTime(once) === once && once.getTime() === date.getTime();
        }
      ),
      { numRuns: 200 }
    );
  });

  it('should reject invalid dates', () => {
    expect(() => convertDateTime(new Date(Number.NaN))).toThrow(new RangeError('Invalid Date'));
  });

  it('should reject strings that are not ISO-8601', () => {
    expect(() => convertDateTime('next tuesday')).toThrow(
      new RangeError("'next tuesday' is not an ISO-8601 date or date-time")
    );
  });

  it('should reject other types', () => {
    expect(() => convertDateTime(20250206)).toThrow(
      new TypeError('Expected a Date or an ISO-8601 string, got number 20250206')
    );
  });
});
