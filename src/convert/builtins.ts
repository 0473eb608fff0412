/**
 * Built-in conversions for path-like and date-time-like fields.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { describeValue } from '../errors/index.js';
import { assertPathString } from '../utils/safe-fs.js';

/**
 * Converts a string to a normalized path.
 *
 * The path is not resolved: relative paths stay relative. An empty or blank
 * string is rejected rather than read as the current directory.
 *
 * @param raw - The raw field value.
 * @returns The normalized path.
 * @throws PathValidationError if the value is not a non-empty string without null bytes.
 */
export function convertPath(raw: unknown): string {
  return path.normalize(assertPathString(raw));
}

const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[Tt ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?(?:([Zz])|([+-])(\d{2}):?(\d{2}))?)?$/;

function toInt(group: string | undefined): number {
  return group === undefined ? 0 : Number.parseInt(group, 10);
}

/**
 * Parses an ISO-8601 date or date-time string.
 *
 * A date without a time is midnight. A date-time without an offset is read as
 * UTC, the way TOML local date-times and YAML timestamps are read.
 *
 * @param text - The string to parse, without surrounding whitespace.
 * @returns The parsed date, or `undefined` when `text` is not ISO-8601 or names
 *   an impossible date or time.
 */
export function parseIsoDateTime(text: string): Date | undefined {
  const match = ISO_DATE_TIME.exec(text);
  if (match === null) {
    return undefined;
  }

  const year = toInt(match[1]);
  const month = toInt(match[2]);
  const day = toInt(match[3]);
  const hour = toInt(match[4]);
  const minute = toInt(match[5]);
  const second = toInt(match[6]);
  const millisecond = toInt((match[7] ?? '').padEnd(3, '0').slice(0, 3));

  // Date.UTC would map years 0-99 to 1900-1999.
  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  utc.setUTCHours(hour, minute, second, millisecond);
  // Out-of-range parts roll over (Feb 30 -> Mar 2); reject those.
  if (
    utc.getUTCFullYear() !== year ||
    utc.getUTCMonth() !== month - 1 ||
    utc.getUTCDate() !== day ||
    utc.getUTCHours() !== hour ||
    utc.getUTCMinutes() !== minute ||
    utc.getUTCSeconds() !== second
  ) {
    return undefined;
  }

  const sign = match[9];
  if (sign === undefined) {
    return utc;
  }
  const offsetHours = toInt(match[10]);
  const offsetMinutes = toInt(match[11]);
  if (offsetHours > 23 || offsetMinutes > 59) {
    return undefined;
  }
  const offsetMs = (offsetHours * 60 + offsetMinutes) * 60_000 * (sign === '-' ? -1 : 1);
  return new Date(utc.getTime() - offsetMs);
}

/**
 * Converts a raw value to a `Date`.
 *
 * A valid `Date` is returned unchanged, so converting twice is a no-op.
 * Strings are trimmed and parsed with {@link parseIsoDateTime}.
 *
 * @param raw - The raw field value.
 * @returns The converted date.
 * @throws TypeError if the value is neither a `Date` nor a string.
 * @throws RangeError if the value is an invalid `Date` or not an ISO-8601 string.
 */
export function convertDateTime(raw: unknown): Date {
  if (raw instanceof Date) {
    if (Number.isNaN(raw.getTime())) {
      throw new RangeError('Invalid Date');
    }
    return raw;
  }

  if (typeof raw === 'string') {
    const parsed = parseIsoDateTime(raw.trim());
    if (parsed === undefined) {
      throw new RangeError(`'${raw}' is not an ISO-8601 date or date-time`);
    }
    return parsed;
  }

  throw new TypeError(`Expected a Date or an ISO-8601 string, got ${describeValue(raw)}`);
}
