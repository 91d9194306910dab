import { describe, it, expect } from 'vitest';
import {
  daysBetween,
  fromUnixSeconds,
  minutesBetween,
  parseTimestamp,
  toCalendarDate,
} from '../../../core/utils/dates.js';

describe('parseTimestamp', () => {
  it('reads timestamps without an offset as UTC', () => {
    expect(parseTimestamp('2024-03-01 14:00:00')?.toISOString()).toBe('2024-03-01T14:00:00.000Z');
    expect(parseTimestamp('2024-03-01T14:00')?.toISOString()).toBe('2024-03-01T14:00:00.000Z');
  });

  it('honours an explicit offset', () => {
    expect(parseTimestamp('2024-03-01T14:00:00+02:00')?.toISOString()).toBe('2024-03-01T12:00:00.000Z');
  });

  it('accepts epoch milliseconds', () => {
    expect(parseTimestamp(0)?.toISOString()).toBe('1970-01-01T00:00:00.000Z');
  });

  it('returns null for anything else', () => {
    expect(parseTimestamp('not a time')).toBeNull();
    expect(parseTimestamp('')).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
    expect(parseTimestamp({})).toBeNull();
    expect(parseTimestamp(Number.NaN)).toBeNull();
  });
});

describe('calendar helpers', () => {
  it('takes the UTC date of a timestamp', () => {
    expect(toCalendarDate('2024-03-01T23:30:00.000Z')).toBe('2024-03-01');
    expect(toCalendarDate(new Date('2024-03-01T23:30:00-05:00'))).toBe('2024-03-02');
  });

  it('measures fractional days and signed minutes', () => {
    expect(daysBetween('2024-03-01T00:00:00Z', '2024-03-02T12:00:00Z')).toBe(1.5);
    expect(minutesBetween('2024-03-01T14:00:00Z', '2024-03-01T13:30:00Z')).toBe(-30);
  });

  it('converts unix seconds', () => {
    expect(fromUnixSeconds(1709301600)).toBe('2024-03-01T14:00:00.000Z');
    expect(fromUnixSeconds(null)).toBeNull();
  });
});
