/**
 * Batch normalization: dedupe, normalize, count
 *
 * @module normalization/batch
 */

import type {
  DataQualityIssue,
  NormalizedAirQualityObservation,
  NormalizedWeatherObservation,
  RawObservation,
} from '@airshed/types';
import type { PipelineConfig } from '../core/config.js';
import { silentLogger, type PipelineLogger } from '../core/utils/logger.js';
import { toText } from '../core/type-guards.js';
import { compareInstants, parseTimestamp } from '../core/utils/dates.js';
import { normalizeRecord } from './record-normalizer.js';

export interface RejectedRecord {
  readonly recordId: string;
  readonly issues: readonly DataQualityIssue[];
}

export interface NormalizedBatch {
  readonly weather: readonly NormalizedWeatherObservation[];
  readonly airQuality: readonly NormalizedAirQualityObservation[];
  /** Invalid records, excluded from everything downstream */
  readonly rejected: readonly RejectedRecord[];
  readonly dropped: number;
  readonly duplicates: number;
  readonly issues: readonly DataQualityIssue[];
}

/**
 * Numeric-aware id order ("9" < "10"), plain code-unit order on ties
 */
export function compareRecordIds(a: string, b: string): number {
  const byValue = a.localeCompare(b, 'en', { numeric: true });
  if (byValue !== 0) return byValue;
  return a < b ? -1 : a > b ? 1 : 0;
}

function duplicateKey(raw: RawObservation): string | null {
  const city = toText(raw.city)?.trim();
  const time = parseTimestamp(raw.observationTime);
  if (!city || time === null) return null;
  return JSON.stringify([city, toText(raw.country)?.trim() || null, time.toISOString()]);
}

function payloadText(raw: RawObservation): string {
  return JSON.stringify([
    raw.city,
    raw.country,
    raw.latitude,
    raw.longitude,
    raw.observationTime,
    raw.weatherData ?? null,
    raw.airQualityData ?? null,
  ]);
}

/**
 * Id order, then payload text for records sharing an id
 */
function compareRecords(a: RawObservation, b: RawObservation): number {
  const byId = compareRecordIds(a.id, b.id);
  if (byId !== 0) return byId;
  const left = payloadText(a);
  const right = payloadText(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

export interface DedupeResult {
  readonly records: readonly RawObservation[];
  readonly duplicates: number;
}

/**
 * Collapse records sharing (city, country, observation time), keeping the
 * greatest id (greatest payload text on equal ids). Records without a
 * usable key pass through untouched.
 */
export function dedupeRawObservations(raws: readonly RawObservation[]): DedupeResult {
  const kept = new Map<string, RawObservation>();
  const unkeyed: RawObservation[] = [];

  for (const raw of raws) {
    const key = duplicateKey(raw);
    if (key === null) {
      unkeyed.push(raw);
      continue;
    }
    const existing = kept.get(key);
    if (!existing || compareRecords(raw, existing) > 0) {
      kept.set(key, raw);
    }
  }

  const records = [...kept.values(), ...unkeyed].sort(compareRecords);
  return { records, duplicates: raws.length - records.length };
}

function compareText(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
}

export function compareWeather(a: NormalizedWeatherObservation, b: NormalizedWeatherObservation): number {
  return (
    compareText(a.city, b.city) ||
    compareText(a.country, b.country) ||
    compareInstants(a.observationTime, b.observationTime) ||
    compareRecordIds(a.id, b.id)
  );
}

export function compareAirQuality(
  a: NormalizedAirQualityObservation,
  b: NormalizedAirQualityObservation
): number {
  return (
    compareText(a.city, b.city) ||
    compareText(a.country, b.country) ||
    compareInstants(a.observedAt, b.observedAt) ||
    compareRecordIds(a.id, b.id)
  );
}

/**
 * Output order depends only on record content, never on input order
 */
export function normalizeBatch(
  raws: readonly RawObservation[],
  config: PipelineConfig,
  logger: PipelineLogger = silentLogger
): NormalizedBatch {
  const { records, duplicates } = dedupeRawObservations(raws);

  const weather: NormalizedWeatherObservation[] = [];
  const airQuality: NormalizedAirQualityObservation[] = [];
  const rejected: RejectedRecord[] = [];
  const issues: DataQualityIssue[] = [];

  for (const raw of records) {
    const result = normalizeRecord(raw, config);
    issues.push(...result.issues);

    if (!result.valid) {
      rejected.push({ recordId: result.recordId, issues: result.issues });
      logger.warn('Dropped invalid observation', {
        recordId: result.recordId,
        reasons: result.issues.map((issue) => issue.message),
      });
      continue;
    }

    for (const issue of result.issues) {
      logger.debug('Data quality issue', { recordId: issue.recordId, issue: issue.message });
    }

    weather.push(result.weather);
    airQuality.push(...result.airQuality);
  }

  weather.sort(compareWeather);
  airQuality.sort(compareAirQuality);

  return {
    weather,
    airQuality,
    rejected,
    dropped: rejected.length,
    duplicates,
    issues,
  };
}
