/**
 * Daily air-quality aggregation
 *
 * Two stages: per (entity, date, pollutant), then per (entity, date) where
 * the worst pollutant dominates.
 *
 * @module aggregation/air-quality-daily
 */

import type {
  BandTableSet,
  DailyAirQualityAggregate,
  PollutantDailyAggregate,
  ReconciledAirQualityObservation,
} from '@airshed/types';
import { POLLUTANT_PRIORITY } from '../core/constants.js';
import { groupBy } from '../core/utils/grouping.js';
import { classifyAqi } from '../classification/classifiers.js';
import {
  earliestInstant,
  latestInstant,
  max,
  min,
  mode,
  roundOrNull,
  roundTo,
  roundedMean,
} from './stats.js';
import { compareEntityDate } from './ordering.js';

/**
 * Fixed pollutant order, unknown pollutants after it alphabetically
 */
export function comparePollutants(a: string, b: string): number {
  const ia = POLLUTANT_PRIORITY.indexOf(a);
  const ib = POLLUTANT_PRIORITY.indexOf(b);
  if (ia >= 0 && ib >= 0) return ia - ib;
  if (ia >= 0) return -1;
  if (ib >= 0) return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

// ============================================================================
// Per pollutant
// ============================================================================

function aggregatePollutantGroup(
  group: readonly ReconciledAirQualityObservation[]
): PollutantDailyAggregate {
  const first = group[0];
  const aqi = group.map((r) => r.aqiValue);
  const concentration = group.map((r) => r.concentrationValue);

  return {
    city: first.city,
    country: first.country,
    observationDate: first.observationDate,
    pollutant: first.pollutant,

    avgAqiValue: roundTo(aqi.reduce((sum, v) => sum + v, 0) / aqi.length, 0),
    minAqiValue: Math.min(...aqi),
    maxAqiValue: Math.max(...aqi),

    avgConcentrationValue: roundedMean(concentration, 3),
    minConcentrationValue: roundOrNull(min(concentration), 3),
    maxConcentrationValue: roundOrNull(max(concentration), 3),
    concentrationUnit: mode(group.map((r) => r.concentrationUnit)),

    primaryAqiCategory: mode(group.map((r) => r.aqiCategory)),
    primaryAqiColor: mode(group.map((r) => r.aqiColor)),
    avgHealthImpactLevel: roundTo(
      group.reduce((sum, r) => sum + r.healthImpactLevel, 0) / group.length,
      1
    ),

    avgLatitude: roundedMean(group.map((r) => r.latitude), 6),
    avgLongitude: roundedMean(group.map((r) => r.longitude), 6),
    avgDistanceMiles: roundedMean(group.map((r) => r.distanceMiles), 2),

    totalObservations: group.length,
    firstObservationTime: earliestInstant(group.map((r) => r.observedAt)),
    lastObservationTime: latestInstant(group.map((r) => r.observedAt)),
    primaryReportingArea: mode(group.map((r) => r.reportingArea)),
    primaryStateCode: mode(group.map((r) => r.stateCode)),
  };
}

export function aggregatePollutantDaily(
  readings: readonly ReconciledAirQualityObservation[]
): PollutantDailyAggregate[] {
  const groups = groupBy(readings, (r) =>
    JSON.stringify([r.city, r.country, r.observationDate, r.pollutant])
  );

  return [...groups.values()]
    .map(aggregatePollutantGroup)
    .sort((a, b) => compareEntityDate(a, b) || comparePollutants(a.pollutant, b.pollutant));
}

// ============================================================================
// Overall (dominance rule)
// ============================================================================

function aggregateOverallGroup(
  rows: readonly PollutantDailyAggregate[],
  tables: BandTableSet
): DailyAirQualityAggregate {
  const first = rows[0];
  const overallAqiValue = Math.max(...rows.map((r) => r.avgAqiValue));
  const pollutantList = rows.map((r) => r.pollutant).sort(comparePollutants);
  const primaryPollutant = rows
    .filter((r) => r.avgAqiValue === overallAqiValue)
    .map((r) => r.pollutant)
    .sort(comparePollutants)[0];
  const band = classifyAqi(tables, overallAqiValue);

  return {
    city: first.city,
    country: first.country,
    observationDate: first.observationDate,

    overallAqiValue,
    peakAqiValue: Math.max(...rows.map((r) => r.maxAqiValue)),
    primaryPollutant,
    overallAqiCategory: band.label,
    overallAqiColor: band.color ?? 'Gray',
    overallHealthImpactLevel: band.severity,

    pollutantsMeasured: pollutantList.length,
    pollutantList,

    avgLatitude: roundedMean(rows.map((r) => r.avgLatitude), 6),
    avgLongitude: roundedMean(rows.map((r) => r.avgLongitude), 6),
    avgDistanceMiles: roundedMean(rows.map((r) => r.avgDistanceMiles), 2),
    totalObservations: rows.reduce((sum, r) => sum + r.totalObservations, 0),
    firstObservationTime: earliestInstant(rows.map((r) => r.firstObservationTime)),
    lastObservationTime: latestInstant(rows.map((r) => r.lastObservationTime)),
    primaryReportingArea: mode(rows.map((r) => r.primaryReportingArea)),
    primaryStateCode: mode(rows.map((r) => r.primaryStateCode)),
  };
}

export function aggregateOverallAirQuality(
  pollutantRows: readonly PollutantDailyAggregate[],
  tables: BandTableSet
): DailyAirQualityAggregate[] {
  const groups = groupBy(pollutantRows, (r) => JSON.stringify([r.city, r.country, r.observationDate]));
  return [...groups.values()]
    .map((rows) => aggregateOverallGroup(rows, tables))
    .sort(compareEntityDate);
}
