/**
 * Cross-Source Reconciler
 *
 * Pairs each weather observation with the air-quality reading of the same
 * entity closest in time (then in space) inside the matching window.
 * A weather row without a candidate is kept with null air-quality fields.
 *
 * @module reconciliation/reconciler
 */

import type {
  NormalizedAirQualityObservation,
  NormalizedWeatherObservation,
  ReconciledAirQualityObservation,
  ReconciledObservation,
} from '@airshed/types';
import type { PipelineConfig } from '../core/config.js';
import { entityKeyString, groupBy } from '../core/utils/grouping.js';
import { minutesBetween } from '../core/utils/dates.js';
import { compareRecordIds } from '../normalization/batch.js';
import { approximateDistanceMiles } from './distance.js';

export interface ReconciliationResult {
  /** One per weather observation, same order as the input */
  readonly observations: readonly ReconciledObservation[];
  /** One per air-quality reading, same order as the input */
  readonly airQuality: readonly ReconciledAirQualityObservation[];
  readonly pairedCount: number;
  readonly unpairedCount: number;
}

interface Candidate {
  readonly reading: NormalizedAirQualityObservation;
  readonly offsetMinutes: number;
  readonly distanceMiles: number | null;
}

function compareNullableDistance(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    Math.abs(a.offsetMinutes) - Math.abs(b.offsetMinutes) ||
    compareNullableDistance(a.distanceMiles, b.distanceMiles) ||
    (a.reading.pollutant < b.reading.pollutant ? -1 : a.reading.pollutant > b.reading.pollutant ? 1 : 0) ||
    compareRecordIds(a.reading.id, b.reading.id)
  );
}

function pairWeather(
  weather: NormalizedWeatherObservation,
  readings: readonly NormalizedAirQualityObservation[],
  windowMinutes: number
): ReconciledObservation {
  const candidates: Candidate[] = [];
  for (const reading of readings) {
    const offsetMinutes = minutesBetween(weather.observationTime, reading.observedAt);
    if (Math.abs(offsetMinutes) > windowMinutes) continue;
    candidates.push({
      reading,
      offsetMinutes,
      distanceMiles: approximateDistanceMiles(
        weather.latitude,
        weather.longitude,
        reading.stationLatitude,
        reading.stationLongitude
      ),
    });
  }

  if (candidates.length === 0) {
    return {
      weather,
      airQuality: null,
      distanceMiles: null,
      timeOffsetMinutes: null,
      candidateCount: 0,
      worstCandidateAqi: null,
    };
  }

  candidates.sort(compareCandidates);
  const best = candidates[0];

  return {
    weather,
    airQuality: best.reading,
    distanceMiles: best.distanceMiles,
    timeOffsetMinutes: best.offsetMinutes,
    candidateCount: candidates.length,
    worstCandidateAqi: Math.max(...candidates.map((c) => c.reading.aqiValue)),
  };
}

function annotateReading(
  reading: NormalizedAirQualityObservation,
  weather: readonly NormalizedWeatherObservation[],
  windowMinutes: number
): ReconciledAirQualityObservation {
  let nearest: NormalizedWeatherObservation | null = null;
  let nearestOffset = Infinity;

  for (const candidate of weather) {
    const offset = Math.abs(minutesBetween(candidate.observationTime, reading.observedAt));
    if (offset > windowMinutes) continue;
    if (
      offset < nearestOffset ||
      (offset === nearestOffset && nearest !== null && compareRecordIds(candidate.id, nearest.id) < 0)
    ) {
      nearest = candidate;
      nearestOffset = offset;
    }
  }

  return {
    ...reading,
    pairedWeatherId: nearest?.id ?? null,
    distanceMiles: nearest
      ? approximateDistanceMiles(
          nearest.latitude,
          nearest.longitude,
          reading.stationLatitude,
          reading.stationLongitude
        )
      : null,
  };
}

export function reconcile(
  weather: readonly NormalizedWeatherObservation[],
  airQuality: readonly NormalizedAirQualityObservation[],
  config: PipelineConfig
): ReconciliationResult {
  const windowMinutes = config.reconciliation.maxTimeOffsetMinutes;
  const readingsByEntity = groupBy(airQuality, entityKeyString);
  const weatherByEntity = groupBy(weather, entityKeyString);

  const observations = weather.map((w) =>
    pairWeather(w, readingsByEntity.get(entityKeyString(w)) ?? [], windowMinutes)
  );
  const annotated = airQuality.map((reading) =>
    annotateReading(reading, weatherByEntity.get(entityKeyString(reading)) ?? [], windowMinutes)
  );

  const pairedCount = observations.filter((o) => o.airQuality !== null).length;

  return {
    observations,
    airQuality: annotated,
    pairedCount,
    unpairedCount: observations.length - pairedCount,
  };
}
