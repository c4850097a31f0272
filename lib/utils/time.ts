import { differenceInMilliseconds, isValid, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { ParseError } from '@/lib/errors';

export const DEFAULT_TIMEZONE = 'Australia/Sydney';

const DISPLAY_FORMAT = 'dd/MM/yyyy hh:mm:ss a';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME = /^[^T ]+[T ](.+)$/;
const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/;

// Timestamps without an offset are UTC, never host-local time
function withUtcDefault(value: string): string {
  if (DATE_ONLY.test(value)) {
    return `${value}T00:00:00Z`;
  }
  const match = DATE_TIME.exec(value);
  if (match && !ZONE_DESIGNATOR.test(match[1])) {
    return `${value}Z`;
  }
  return value;
}

export function parseTimestamp(value: string): Date {
  const date = parseISO(withUtcDefault(value));
  if (!isValid(date)) {
    throw new ParseError(`Invalid isoformat string: '${value}'`, value);
  }
  return date;
}

/**
 * Elapsed seconds between two ISO-8601 timestamps (end minus start, may be fractional).
 */
export function calculateDurationSeconds(startedAt: string, endedAt: string): number {
  const start = parseTimestamp(startedAt);
  const end = parseTimestamp(endedAt);
  return differenceInMilliseconds(end, start) / 1000;
}

/**
 * Format a UTC timestamp as `dd/MM/yyyy hh:mm:ss AM` in the given IANA timezone.
 */
export function formatTimestamp(value: string, timeZone: string = DEFAULT_TIMEZONE): string {
  return formatInTimeZone(parseTimestamp(value), timeZone, DISPLAY_FORMAT);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-AU', { timeZone });
    return true;
  } catch {
    return false;
  }
}
