/**
 * Record Normalizer
 *
 * One raw observation in, one typed weather row plus its air-quality
 * readings out, or an invalid result carrying the reasons. Never throws
 * for a bad record: a malformed payload is a value, not an exception.
 *
 * @module normalization/record-normalizer
 */

import type {
  DataQualityIssue,
  NormalizationResult,
  NormalizedAirQualityObservation,
  RawObservation,
} from '@airshed/types';
import type { PipelineConfig } from '../core/config.js';
import { getPath, isRecord, parsePayload, toNumber, toText } from '../core/type-guards.js';
import { parseTimestamp, toCalendarDate } from '../core/utils/dates.js';
import { extractAirQuality } from './air-quality.js';
import { createIssue } from './issues.js';
import { errorText, extractWeather, type AirQualitySummary, type ObservationIdentity } from './weather.js';

function invalid(recordId: string, issues: DataQualityIssue[]): NormalizationResult {
  return { valid: false, recordId, issues };
}

interface AirQualityPayload {
  readonly summary: AirQualitySummary;
  readonly observations: readonly unknown[];
}

function readAirQualityPayload(recordId: string, value: unknown, issues: DataQualityIssue[]): AirQualityPayload {
  if (value === null || value === undefined) {
    return { summary: { observationCount: null, error: null }, observations: [] };
  }

  const parsed = parsePayload(value);
  if (!parsed.success) {
    const error = `JSON parsing error: ${parsed.error}`;
    issues.push(createIssue(recordId, `Air quality ${error}`, 'airQualityData'));
    return { summary: { observationCount: null, error }, observations: [] };
  }

  const payload = parsed.data;
  if (!isRecord(payload)) {
    issues.push(createIssue(recordId, 'Air quality payload is not an object', 'airQualityData'));
    return { summary: { observationCount: null, error: 'Payload is not an object' }, observations: [] };
  }

  const error = errorText(payload.error);
  if (error !== null) {
    issues.push(createIssue(recordId, `Air quality API error: ${error}`, 'airQualityData.error'));
  }

  const observations = getPath(payload, 'observations');
  return {
    summary: { observationCount: toNumber(payload.total_observations), error },
    // An error payload carries no usable readings
    observations: error === null && Array.isArray(observations) ? observations : [],
  };
}

export function normalizeRecord(raw: RawObservation, config: PipelineConfig): NormalizationResult {
  const issues: DataQualityIssue[] = [];
  const recordId = raw.id;

  const city = toText(raw.city)?.trim() ?? '';
  if (city === '') {
    issues.push(createIssue(recordId, 'Missing city', 'city'));
  }

  const observedAt = parseTimestamp(raw.observationTime);
  if (raw.observationTime === null || raw.observationTime === undefined) {
    issues.push(createIssue(recordId, 'Missing observation time', 'observationTime'));
  } else if (observedAt === null) {
    issues.push(
      createIssue(recordId, `Invalid observation time: ${String(raw.observationTime)}`, 'observationTime')
    );
  }

  let weatherPayload: unknown = null;
  if (raw.weatherData === null || raw.weatherData === undefined) {
    issues.push(createIssue(recordId, 'Missing weather payload', 'weatherData'));
  } else {
    const parsed = parsePayload(raw.weatherData);
    if (!parsed.success) {
      issues.push(createIssue(recordId, `JSON parsing error: ${parsed.error}`, 'weatherData'));
    } else if (!isRecord(parsed.data)) {
      issues.push(createIssue(recordId, 'Weather payload is not an object', 'weatherData'));
    } else {
      weatherPayload = parsed.data;
    }
  }

  if (city === '' || observedAt === null || weatherPayload === null) {
    return invalid(recordId, issues);
  }

  const observationTime = observedAt.toISOString();
  const identity: ObservationIdentity = {
    id: recordId,
    city,
    country: toText(raw.country)?.trim() || null,
    observationTime,
    observationDate: toCalendarDate(observedAt),
    latitude: toNumber(raw.latitude) ?? toNumber(getPath(weatherPayload, 'coord.lat')),
    longitude: toNumber(raw.longitude) ?? toNumber(getPath(weatherPayload, 'coord.lon')),
  };

  const airQualityPayload = readAirQualityPayload(recordId, raw.airQualityData, issues);
  const weather = extractWeather(
    identity,
    weatherPayload,
    airQualityPayload.summary,
    config.validation,
    issues
  );
  const airQuality: NormalizedAirQualityObservation[] = extractAirQuality(
    identity,
    airQualityPayload.observations,
    config.validation,
    config.bandTables,
    issues
  );

  return { valid: true, weather, airQuality, issues };
}
