/**
 * ISO-8601 timestamp parsing for server payloads.
 *
 * Servers emit timestamps with or without fractional seconds and with or
 * without a zone designator. Formats are tried in a fixed order; the first
 * that matches and names a real calendar instant wins.
 *
 * @module time/iso-timestamp
 */

import { CodecError } from '../errors/index.js';

interface TimestampFormat {
  readonly name: string;
  readonly pattern: RegExp;
}

const DATE_TIME =
  '(?<year>\\d{4})-(?<month>\\d{2})-(?<day>\\d{2})T(?<hour>\\d{2}):(?<minute>\\d{2}):(?<second>\\d{2})';
const OFFSET = '(?<offset>Z|[+-]\\d{2}:?\\d{2})';

/** Formats in the order they are attempted */
export const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  { name: 'fractional-with-offset', pattern: new RegExp(`^${DATE_TIME}\\.(?<fraction>\\d+)${OFFSET}$`) },
  { name: 'seconds-with-offset', pattern: new RegExp(`^${DATE_TIME}${OFFSET}$`) },
  { name: 'utc-without-designator', pattern: new RegExp(`^${DATE_TIME}(?:\\.(?<fraction>\\d+))?$`) },
];

function offsetMinutes(offset: string | undefined): number {
  if (offset === undefined || offset === 'Z') return 0;
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  return sign * (hours * 60 + minutes);
}

function toInstant(groups: Record<string, string | undefined>): Date | null {
  const year = Number(groups.year);
  const month = Number(groups.month);
  const day = Number(groups.day);
  const hour = Number(groups.hour);
  const minute = Number(groups.minute);
  const second = Number(groups.second);
  // Sub-millisecond digits are truncated
  const millis = groups.fraction ? Number(groups.fraction.slice(0, 3).padEnd(3, '0')) : 0;

  const wallClock = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  if (
    wallClock.getUTCFullYear() !== year ||
    wallClock.getUTCMonth() !== month - 1 ||
    wallClock.getUTCDate() !== day ||
    wallClock.getUTCHours() !== hour ||
    wallClock.getUTCMinutes() !== minute ||
    wallClock.getUTCSeconds() !== second
  ) {
    return null;
  }

  return new Date(wallClock.getTime() - offsetMinutes(groups.offset) * 60_000);
}

/**
 * Parse an ISO-8601 timestamp, returning null when no supported format matches.
 */
export function tryParseIsoTimestamp(value: string): Date | null {
  for (const format of TIMESTAMP_FORMATS) {
    const match = format.pattern.exec(value);
    if (!match?.groups) continue;
    const instant = toInstant(match.groups);
    if (instant) return instant;
  }
  return null;
}

/**
 * Parse an ISO-8601 timestamp.
 *
 * @throws CodecError (REPSYNC_E701) when no supported format matches
 */
export function parseIsoTimestamp(value: string): Date {
  const parsed = tryParseIsoTimestamp(value);
  if (!parsed) {
    throw new CodecError('REPSYNC_E701', `Unable to decode date: ${value}`, { value });
  }
  return parsed;
}

/** Format an instant the way outgoing frames carry it */
export function formatIsoTimestamp(date: Date): string {
  return date.toISOString();
}
