/**
 * Entity Dimension Builder
 *
 * One row per (city, country), recomputed from the full normalized
 * history. A pure function of (history, asOf): freshness is measured
 * against the `asOf` instant passed in, never the wall clock.
 *
 * @module dimensions/city-dimensions
 */

import type { CityDimension, NormalizedWeatherObservation } from '@airshed/types';
import type { PipelineConfig } from '../core/config.js';
import { entityId } from '../core/surrogate-key.js';
import { daysBetween } from '../core/utils/dates.js';
import { entityKeyString, groupBy } from '../core/utils/grouping.js';
import { classify } from '../classification/band-table.js';
import {
  classifyClimateZone,
  classifyRegion,
  estimateTimezone,
} from '../classification/classifiers.js';
import { earliestInstant, latestBy, latestInstant, percentage } from '../aggregation/stats.js';

function buildDimension(
  history: readonly NormalizedWeatherObservation[],
  asOf: string,
  config: PipelineConfig
): CityDimension {
  const { bandTables, quality } = config;
  const { city, country } = history[0];

  const total = history.length;
  const errorCount = history.filter((w) => w.hasWeatherError).length;
  const successCount = total - errorCount;
  const successRatePercent = percentage(successCount, total, 2);

  const position = latestBy(
    history,
    (w) => w.observationTime,
    (w) => (w.latitude !== null && w.longitude !== null ? { lat: w.latitude, lon: w.longitude } : null)
  );
  const latitude = position?.lat ?? null;
  const longitude = position?.lon ?? null;

  const lastObservation = latestInstant(history.map((w) => w.observationTime));
  const ageDays = daysBetween(lastObservation, asOf);

  return {
    id: entityId(city, country),
    city,
    country,
    latitude,
    longitude,

    climateZone: classifyClimateZone(bandTables, latitude),
    regionClassification: classifyRegion(bandTables, country, longitude),
    estimatedTimezone: estimateTimezone(bandTables, longitude),

    firstObservation: earliestInstant(history.map((w) => w.observationTime)),
    lastObservation,
    totalObservations: total,
    successCount,
    errorCount,
    successRatePercent,

    dataFreshness: classify(bandTables.freshness, ageDays).label,
    isActive: ageDays <= quality.activeWindowDays && successRatePercent >= quality.minActiveSuccessRate,
    dataQualityTier: classify(bandTables.dataQualityTier, successRatePercent).label,

    asOf,
  };
}

/**
 * @param asOf - ISO instant freshness and activity are measured against
 */
export function buildCityDimensions(
  weather: readonly NormalizedWeatherObservation[],
  asOf: string,
  config: PipelineConfig
): CityDimension[] {
  const reference = new Date(asOf).toISOString();
  return [...groupBy(weather, entityKeyString).values()]
    .map((history) => buildDimension(history, reference, config))
    .sort((a, b) => {
      if (a.city !== b.city) return a.city < b.city ? -1 : 1;
      if (a.country === b.country) return 0;
      if (a.country === null) return -1;
      if (b.country === null) return 1;
      return a.country < b.country ? -1 : 1;
    });
}
