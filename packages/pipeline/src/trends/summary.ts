/**
 * Trend summary statistics over a recent window of one city
 *
 * @module trends/summary
 */

import type { NormalizedAirQualityObservation, NormalizedWeatherObservation } from '@airshed/types';
import { compareInstants, MS_PER_DAY } from '../core/utils/dates.js';
import { roundTo } from '../core/utils/math.js';
import { groupBy } from '../core/utils/grouping.js';

export type TrendDirection = 'increasing' | 'decreasing' | 'stable';

export interface SeriesSummary {
  readonly count: number;
  readonly average: number;
  readonly median: number;
  readonly min: number;
  readonly max: number;
  /** Sample standard deviation; 0 for a single value */
  readonly standardDeviation: number;
  readonly direction: TrendDirection;
  /** |second-half mean - first-half mean| */
  readonly magnitude: number;
}

function average(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

function sampleStandardDeviation(values: readonly number[], avg: number): number {
  if (values.length < 2) return 0;
  const squares = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

/**
 * Direction compares the mean of the second half against the first half,
 * with half a standard deviation of slack. Values in chronological order;
 * null for an empty series. All statistics rounded to 2 dp.
 */
export function summarizeSeries(values: readonly number[]): SeriesSummary | null {
  if (values.length === 0) return null;

  const avg = average(values);
  const std = sampleStandardDeviation(values, avg);
  const midpoint = Math.floor(values.length / 2);
  const firstHalf = midpoint > 0 ? average(values.slice(0, midpoint)) : avg;
  const secondHalf = average(values.slice(midpoint));

  let direction: TrendDirection = 'stable';
  if (secondHalf > firstHalf + std * 0.5) {
    direction = 'increasing';
  } else if (secondHalf < firstHalf - std * 0.5) {
    direction = 'decreasing';
  }

  return {
    count: values.length,
    average: roundTo(avg, 2),
    median: roundTo(median(values), 2),
    min: roundTo(Math.min(...values), 2),
    max: roundTo(Math.max(...values), 2),
    standardDeviation: roundTo(std, 2),
    direction,
    magnitude: roundTo(Math.abs(secondHalf - firstHalf), 2),
  };
}

export interface EntityTrendQuery {
  readonly city: string;
  /** Omitted: every country of the city */
  readonly country?: string | null;
  /** ISO instant the window ends at */
  readonly asOf: string;
  readonly days: number;
}

export interface EntityTrendSummary {
  readonly city: string;
  /** Null when the query named no country */
  readonly country: string | null;
  readonly periodDays: number;
  readonly totalObservations: number;
  readonly temperature: SeriesSummary | null;
  readonly humidity: SeriesSummary | null;
  /** Worst AQI reported with each observation */
  readonly aqi: SeriesSummary | null;
  readonly calculatedAt: string;
}

/**
 * Summaries over observations in [asOf - days, asOf]
 */
export function summarizeEntityTrends(
  weather: readonly NormalizedWeatherObservation[],
  airQuality: readonly NormalizedAirQualityObservation[],
  query: EntityTrendQuery
): EntityTrendSummary {
  const end = Date.parse(query.asOf);
  const start = end - query.days * MS_PER_DAY;

  const window = weather
    .filter((w) => w.city === query.city)
    .filter((w) => query.country === undefined || w.country === query.country)
    .filter((w) => {
      const t = Date.parse(w.observationTime);
      return t >= start && t <= end;
    })
    .sort((a, b) => compareInstants(a.observationTime, b.observationTime));

  const readingsByRecord = groupBy(airQuality, (r) => r.recordId);
  const worstAqi: number[] = [];
  for (const w of window) {
    const readings = readingsByRecord.get(w.id);
    if (readings && readings.length > 0) {
      worstAqi.push(Math.max(...readings.map((r) => r.aqiValue)));
    }
  }

  return {
    city: query.city,
    country: query.country ?? null,
    periodDays: query.days,
    totalObservations: window.length,
    temperature: summarizeSeries(
      window.flatMap((w) => (w.temperatureCelsius === null ? [] : [w.temperatureCelsius]))
    ),
    humidity: summarizeSeries(
      window.flatMap((w) => (w.humidityPercent === null ? [] : [w.humidityPercent]))
    ),
    aqi: summarizeSeries(worstAqi),
    calculatedAt: new Date(end).toISOString(),
  };
}
