/**
 * Aggregate helpers over nullable values
 *
 * Every helper ignores nulls; a group with no non-null value yields null,
 * never zero.
 */

import { compareInstants } from '../core/utils/dates.js';
import { roundTo } from '../core/utils/math.js';

export { roundOrNull, roundTo } from '../core/utils/math.js';

export function nonNull<T>(values: readonly (T | null)[]): T[] {
  return values.filter((value): value is T => value !== null);
}

export function mean(values: readonly (number | null)[]): number | null {
  const present = nonNull(values);
  if (present.length === 0) return null;
  return present.reduce((sum, value) => sum + value, 0) / present.length;
}

export function roundedMean(values: readonly (number | null)[], decimals: number): number | null {
  const avg = mean(values);
  return avg === null ? null : roundTo(avg, decimals);
}

export function min(values: readonly (number | null)[]): number | null {
  const present = nonNull(values);
  return present.length === 0 ? null : Math.min(...present);
}

export function max(values: readonly (number | null)[]): number | null {
  const present = nonNull(values);
  return present.length === 0 ? null : Math.max(...present);
}

/**
 * Most frequent non-null value; ties go to the lexicographically smallest
 */
export function mode(values: readonly (string | null)[]): string | null {
  const counts = new Map<string, number>();
  for (const value of nonNull(values)) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: string | null = null;
  let bestCount = 0;
  for (const [value, n] of counts) {
    if (n > bestCount || (n === bestCount && best !== null && value < best)) {
      best = value;
      bestCount = n;
    }
  }
  return best;
}

/**
 * Value from the latest item (by timestamp) whose value is non-null;
 * on equal timestamps the later item in input order wins
 */
export function latestBy<T, V>(
  items: readonly T[],
  timeOf: (item: T) => string,
  valueOf: (item: T) => V | null
): V | null {
  let latest: { time: string; value: V } | null = null;
  for (const item of items) {
    const value = valueOf(item);
    if (value === null) continue;
    const time = timeOf(item);
    if (latest === null || compareInstants(time, latest.time) >= 0) {
      latest = { time, value };
    }
  }
  return latest?.value ?? null;
}

export function earliestInstant(times: readonly string[]): string {
  return times.reduce((a, b) => (compareInstants(b, a) < 0 ? b : a));
}

export function latestInstant(times: readonly string[]): string {
  return times.reduce((a, b) => (compareInstants(b, a) > 0 ? b : a));
}

/**
 * Share of `part` in `whole` as a percentage
 */
export function percentage(part: number, whole: number, decimals: number): number {
  return whole === 0 ? 0 : roundTo((part / whole) * 100, decimals);
}
