/**
 * Timestamp normalization for rows coming back from the remote store.
 *
 * PostgREST serializes `timestamptz` as `2026-01-31 08:15:30.123456+00`, while
 * values written by clients usually look like `2026-01-31T08:15:30.123Z`. Both
 * (and the mixed forms in between) are parsed into a `Date`; anything else
 * becomes DISTANT_PAST so it loses every conflict instead of failing the cycle.
 */

import { isValid, parse } from 'date-fns';
import { createLogger } from '@/lib/logger';

const log = createLogger('timestamps');

/** Earliest instant a `Date` can hold. */
export const DISTANT_PAST = new Date(-8_640_000_000_000_000);

// Tried in order; the first format that consumes the whole string wins.
const TIMESTAMP_FORMATS = [
  "yyyy-MM-dd'T'HH:mm:ss.SSSXXX",
  'yyyy-MM-dd HH:mm:ss.SSSX',
  "yyyy-MM-dd'T'HH:mm:ssXXX",
  'yyyy-MM-dd HH:mm:ssX',
  "yyyy-MM-dd'T'HH:mm:ss.SSSX",
  'yyyy-MM-dd HH:mm:ss.SSSXXX',
  "yyyy-MM-dd'T'HH:mm:ssX",
  'yyyy-MM-dd HH:mm:ssXXX',
] as const;

const REFERENCE_DATE = new Date(0);

// date-fns reads exactly three fraction digits; Postgres sends up to six.
const FRACTION_PATTERN = /(\d{2}:\d{2}:\d{2})\.(\d+)/;

function normalizeFraction(raw: string): string {
  return raw.replace(FRACTION_PATTERN, (_match, time: string, fraction: string) =>
    `${time}.${fraction.slice(0, 3).padEnd(3, '0')}`
  );
}

/**
 * Parse a remote timestamp, or return `null` when no known encoding matches.
 */
export function tryParseTimestamp(raw: string): Date | null {
  const value = normalizeFraction(raw.trim());

  for (const format of TIMESTAMP_FORMATS) {
    const parsed = parse(value, format, REFERENCE_DATE);
    if (isValid(parsed)) {
      return parsed;
    }
  }

  return null;
}

/**
 * Parse a remote timestamp. Never throws; unknown encodings yield DISTANT_PAST.
 */
export function parseTimestamp(raw: string): Date {
  const parsed = tryParseTimestamp(raw);
  if (parsed) return parsed;

  log.warn(`Unparseable timestamp "${raw}", treating it as the distant past`);
  return DISTANT_PAST;
}

/**
 * Canonical form used for every timestamp stored locally or sent to the remote.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString();
}

export function isDistantPast(date: Date): boolean {
  return date.getTime() === DISTANT_PAST.getTime();
}

/**
 * Later of two instants, used to keep `updated_at` non-decreasing.
 */
export function latestOf(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}
