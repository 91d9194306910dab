/**
 * Sequential trend fold
 *
 * Partitions rows by entity, orders each partition by date and walks it
 * once, carrying the previous value and a trailing buffer of up to
 * `windowSize` values. Lag follows adjacency in the ordered sequence: a gap
 * in dates does not null the previous value.
 *
 * @module trends/analyze
 */

import { InvariantViolationError } from '../core/errors.js';
import { groupBy } from '../core/utils/grouping.js';

export interface TrendOptions<T> {
  /** Partition key; rows of different keys never see each other */
  readonly keyOf: (row: T) => string;
  /** YYYY-MM-DD */
  readonly dateOf: (row: T) => string;
  readonly valueOf: (row: T) => number | null;
  readonly windowSize: number;
}

export interface TrendPoint<T> {
  readonly row: T;
  readonly previousValue: number | null;
  /** value - previousValue; null when either is null */
  readonly delta: number | null;
  /** Mean of the non-null values in the trailing window, current row included */
  readonly rollingAverage: number | null;
}

function averageOf(buffer: readonly (number | null)[]): number | null {
  let sum = 0;
  let count = 0;
  for (const value of buffer) {
    if (value === null) continue;
    sum += value;
    count += 1;
  }
  return count === 0 ? null : sum / count;
}

function foldPartition<T>(rows: readonly T[], options: TrendOptions<T>): TrendPoint<T>[] {
  const ordered = [...rows].sort((a, b) => {
    const da = options.dateOf(a);
    const db = options.dateOf(b);
    return da < db ? -1 : da > db ? 1 : 0;
  });

  const points: TrendPoint<T>[] = [];
  const buffer: (number | null)[] = [];
  let previous: { date: string; value: number | null } | null = null;

  for (const row of ordered) {
    const date = options.dateOf(row);
    if (previous !== null && previous.date === date) {
      throw new InvariantViolationError(
        `Duplicate date ${date} for entity ${options.keyOf(row)} in trend input`
      );
    }

    const value = options.valueOf(row);
    buffer.push(value);
    if (buffer.length > options.windowSize) buffer.shift();

    const previousValue: number | null = previous?.value ?? null;
    points.push({
      row,
      previousValue,
      delta: value !== null && previousValue !== null ? value - previousValue : null,
      rollingAverage: averageOf(buffer),
    });

    previous = { date, value };
  }

  return points;
}

/**
 * Points come back grouped by entity (first-seen order), dates ascending
 */
export function analyzeTrends<T>(rows: readonly T[], options: TrendOptions<T>): TrendPoint<T>[] {
  if (!Number.isInteger(options.windowSize) || options.windowSize < 1) {
    throw new InvariantViolationError(`windowSize must be a positive integer, got ${options.windowSize}`);
  }

  const points: TrendPoint<T>[] = [];
  for (const partition of groupBy(rows, options.keyOf).values()) {
    points.push(...foldPartition(partition, options));
  }
  return points;
}
