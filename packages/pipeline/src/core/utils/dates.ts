/**
 * Timestamp and calendar-date helpers
 *
 * The calendar date of a timestamp is its UTC date. Timestamps without an
 * offset (`2024-03-01 14:00:00`) are read as UTC.
 */

const NAIVE_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

export const MS_PER_MINUTE = 60_000;
export const MS_PER_DAY = 86_400_000;

/**
 * Parse an ISO-like timestamp string or epoch milliseconds
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Date(value) : null;
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (trimmed === '') return null;

  const naive = NAIVE_TIMESTAMP.exec(trimmed);
  const text = naive ? `${naive[1]}T${naive[2]}Z` : trimmed;
  const ms = Date.parse(text);
  return Number.isNaN(ms) ? null : new Date(ms);
}

export function fromUnixSeconds(seconds: number | null): string | null {
  if (seconds === null) return null;
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * UTC calendar date, YYYY-MM-DD
 */
export function toCalendarDate(value: Date | string): string {
  const date = typeof value === 'string' ? new Date(value) : value;
  return date.toISOString().slice(0, 10);
}

/**
 * Midnight UTC of a YYYY-MM-DD date
 */
export function calendarDateToUtc(date: string): Date {
  return new Date(`${date}T00:00:00.000Z`);
}

/**
 * Fractional days from `from` to `to`
 */
export function daysBetween(from: string, to: string): number {
  return (Date.parse(to) - Date.parse(from)) / MS_PER_DAY;
}

/**
 * Signed minutes from `from` to `to`
 */
export function minutesBetween(from: string, to: string): number {
  return (Date.parse(to) - Date.parse(from)) / MS_PER_MINUTE;
}

/**
 * Chronological comparator for ISO 8601 UTC strings
 */
export function compareInstants(a: string, b: string): number {
  return Date.parse(a) - Date.parse(b);
}
