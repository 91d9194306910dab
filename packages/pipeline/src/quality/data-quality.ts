/**
 * Data-quality assessment over raw observations
 *
 * Structural checks (unparsable JSON, API error payload, missing `main`,
 * `weather` or `coord`, missing identity) invalidate a record. Range
 * violations are reported but leave the record valid.
 *
 * @module quality/data-quality
 */

import type { DataQualityIssue, RawObservation } from '@airshed/types';
import type { PipelineConfig, ValueRange } from '../core/config.js';
import { getPath, isRecord, parsePayload, toNumber, toText } from '../core/type-guards.js';
import { parseTimestamp } from '../core/utils/dates.js';
import { roundTo } from '../core/utils/math.js';
import { errorText } from '../normalization/weather.js';
import { createIssue } from '../normalization/issues.js';

const REQUIRED_WEATHER_FIELDS = ['main', 'weather', 'coord'] as const;

export interface RecordValidation {
  readonly recordId: string;
  readonly city: string | null;
  readonly isValid: boolean;
  readonly issues: readonly DataQualityIssue[];
}

export interface DataQualityReport {
  readonly totalRecordsChecked: number;
  readonly validRecords: number;
  readonly invalidRecords: number;
  /** Share of valid records, 2 dp; 0 when nothing was checked */
  readonly dataQualityScore: number;
  /** Issue count per category, keys sorted */
  readonly issueCategories: Readonly<Record<string, number>>;
  readonly checkedAt: string;
}

function outOfRange(value: number | null, range: ValueRange): value is number {
  return value !== null && (value < range.min || value > range.max);
}

export function validateObservationRecord(
  raw: RawObservation,
  config: PipelineConfig
): RecordValidation {
  const id = raw.id;
  const issues: DataQualityIssue[] = [];
  let isValid = true;
  const fail = (message: string, field?: string): void => {
    issues.push(createIssue(id, message, field));
    isValid = false;
  };

  if (!toText(raw.city)?.trim()) fail('Missing identity field: city', 'city');
  if (parseTimestamp(raw.observationTime) === null) {
    fail('Missing identity field: observationTime', 'observationTime');
  }

  const weather = parsePayload(raw.weatherData ?? '{}');
  if (!weather.success) {
    fail(`JSON parsing error: ${weather.error}`, 'weatherData');
  } else if (!isRecord(weather.data)) {
    fail('Missing weather field: main', 'weatherData');
  } else {
    const payload = weather.data;
    if ('error' in payload) {
      fail(`Weather API error: ${errorText(payload.error) ?? 'null'}`, 'error');
    } else {
      for (const field of REQUIRED_WEATHER_FIELDS) {
        if (!(field in payload)) fail(`Missing weather field: ${field}`, field);
      }

      const { validation } = config;
      const temp = toNumber(getPath(payload, 'main.temp'));
      if (outOfRange(temp, validation.temperatureCelsius)) {
        issues.push(createIssue(id, `Temperature out of range: ${temp}°C`, 'main.temp'));
      }
      const humidity = toNumber(getPath(payload, 'main.humidity'));
      if (outOfRange(humidity, validation.humidityPercent)) {
        issues.push(createIssue(id, `Humidity out of range: ${humidity}%`, 'main.humidity'));
      }
    }
  }

  if (raw.airQualityData !== null && raw.airQualityData !== undefined) {
    const airQuality = parsePayload(raw.airQualityData);
    if (!airQuality.success) {
      fail(`JSON parsing error: ${airQuality.error}`, 'airQualityData');
    } else if (isRecord(airQuality.data) && !('error' in airQuality.data)) {
      const observations = airQuality.data.observations;
      if (Array.isArray(observations)) {
        observations.forEach((entry: unknown, index) => {
          const aqi = isRecord(entry) ? toNumber(entry.AQI) : null;
          if (outOfRange(aqi, config.validation.aqi)) {
            issues.push(createIssue(id, `AQI out of range: ${aqi}`, `observations.${index}.AQI`));
          }
        });
      }
    }
  }

  return { recordId: id, city: toText(raw.city), isValid, issues };
}

/**
 * @param checkedAt - ISO instant stamped on the report
 */
export function assessDataQuality(
  raws: readonly RawObservation[],
  config: PipelineConfig,
  checkedAt: string
): DataQualityReport {
  const results = raws.map((raw) => validateObservationRecord(raw, config));
  const validRecords = results.filter((r) => r.isValid).length;

  const counts = new Map<string, number>();
  for (const issue of results.flatMap((r) => r.issues)) {
    counts.set(issue.category, (counts.get(issue.category) ?? 0) + 1);
  }
  const issueCategories = Object.fromEntries(
    [...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  );

  return {
    totalRecordsChecked: raws.length,
    validRecords,
    invalidRecords: raws.length - validRecords,
    dataQualityScore: raws.length === 0 ? 0 : roundTo((validRecords / raws.length) * 100, 2),
    issueCategories,
    checkedAt,
  };
}
