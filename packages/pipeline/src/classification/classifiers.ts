/**
 * Domain classifiers built on the band tables
 *
 * @module classification/classifiers
 */

import type {
  BandTable,
  BandTableSet,
  Classification,
  DayOfWeek,
  Season,
  TrendLabel,
} from '@airshed/types';
import type { TrendThresholds } from '../core/config.js';
import { INTERNATIONAL_REGION, US_COUNTRY_CODE } from '../core/constants.js';
import { calendarDateToUtc } from '../core/utils/dates.js';
import { classify, createBandTable } from './band-table.js';

export function classifyAqi(tables: BandTableSet, aqi: number | null): Classification {
  return classify(tables.aqi, aqi);
}

// ============================================================================
// Trend
// ============================================================================

type TrendMagnitude = 'stable' | 'moderate' | 'significant';

const magnitudeTables = new Map<string, BandTable>();

/**
 * Absolute-change table for a threshold pair:
 * [0, stable] stable, (stable, significant] moderate, above that significant
 */
export function buildTrendMagnitudeTable(thresholds: TrendThresholds): BandTable {
  const cacheKey = `${thresholds.stableThreshold}:${thresholds.significantThreshold}`;
  const cached = magnitudeTables.get(cacheKey);
  if (cached) return cached;

  const table = createBandTable({
    name: 'trendMagnitude',
    closedSide: 'upper',
    bands: [
      { min: 0, max: thresholds.stableThreshold, label: 'stable', severity: 1 },
      {
        min: thresholds.stableThreshold,
        max: thresholds.significantThreshold,
        label: 'moderate',
        severity: 2,
      },
      { min: thresholds.significantThreshold, max: null, label: 'significant', severity: 3 },
    ],
    fallback: { label: 'unknown', severity: 0 },
  });
  magnitudeTables.set(cacheKey, table);
  return table;
}

function isMagnitude(label: string): label is TrendMagnitude {
  return label === 'stable' || label === 'moderate' || label === 'significant';
}

/**
 * Label a day-over-day change; rising values read as worsening
 */
export function classifyTrend(delta: number | null, thresholds: TrendThresholds): TrendLabel {
  if (delta === null || Number.isNaN(delta)) return 'Unknown';

  const magnitude = classify(buildTrendMagnitudeTable(thresholds), Math.abs(delta)).label;
  if (!isMagnitude(magnitude)) return 'Unknown';

  switch (magnitude) {
    case 'stable':
      return 'Stable';
    case 'moderate':
      return delta > 0 ? 'Worse' : 'Better';
    case 'significant':
      return delta > 0 ? 'Significantly Worse' : 'Significantly Better';
  }
}

// ============================================================================
// Geography
// ============================================================================

/**
 * US cities split by longitude; everything else is International
 */
export function classifyRegion(
  tables: BandTableSet,
  country: string | null,
  longitude: number | null
): string {
  if (country !== US_COUNTRY_CODE) return INTERNATIONAL_REGION;
  return classify(tables.usRegion, longitude).label;
}

export function classifyClimateZone(tables: BandTableSet, latitude: number | null): string {
  return classify(tables.climateZone, latitude).label;
}

/**
 * Offset estimated from 15-degree longitude bands
 */
export function estimateTimezone(tables: BandTableSet, longitude: number | null): string {
  return classify(tables.timezone, longitude).label;
}

// ============================================================================
// Calendar
// ============================================================================

const SEASONS_BY_MONTH: readonly Season[] = [
  'Winter', 'Winter', 'Spring', 'Spring', 'Spring', 'Summer',
  'Summer', 'Summer', 'Fall', 'Fall', 'Fall', 'Winter',
];

const DAYS: readonly DayOfWeek[] = [
  'Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday',
];

/**
 * Northern Hemisphere meteorological season of a YYYY-MM-DD date
 */
export function seasonOf(date: string): Season {
  return SEASONS_BY_MONTH[calendarDateToUtc(date).getUTCMonth()];
}

export function dayOfWeek(date: string): DayOfWeek {
  return DAYS[calendarDateToUtc(date).getUTCDay()];
}
