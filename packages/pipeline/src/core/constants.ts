/**
 * Fixed tables and defaults
 */

import { fileURLToPath } from 'node:url';
import type { StandardPollutant } from '@airshed/types';

/**
 * Band tables shipped with the package
 */
export const DEFAULT_BAND_TABLES_PATH = fileURLToPath(
  new URL('../../data/band-tables.json', import.meta.url)
);

/**
 * Ordered pollutant matchers: first match against the upper-cased
 * parameter name wins
 */
export const POLLUTANT_MATCHERS: ReadonlyArray<{
  readonly pollutant: StandardPollutant;
  readonly patterns: readonly string[];
}> = [
  { pollutant: 'PM2.5', patterns: ['PM2.5'] },
  { pollutant: 'PM10', patterns: ['PM10'] },
  { pollutant: 'Ozone', patterns: ['OZONE', 'O3'] },
  { pollutant: 'CO', patterns: ['CO'] },
  { pollutant: 'NO2', patterns: ['NO2'] },
  { pollutant: 'SO2', patterns: ['SO2'] },
];

/**
 * Tie-break order for the primary pollutant of a day; others follow
 * alphabetically
 */
export const POLLUTANT_PRIORITY: readonly string[] = [
  'PM2.5',
  'PM10',
  'Ozone',
  'NO2',
  'SO2',
  'CO',
];

/** Label for readings with no parameter name */
export const UNSPECIFIED_POLLUTANT = 'Unspecified';

/**
 * Offsets (minutes east of UTC) for the zone abbreviations air-quality
 * stations report
 */
export const TIMEZONE_OFFSETS_MINUTES: ReadonlyMap<string, number> = new Map([
  ['UTC', 0],
  ['GMT', 0],
  ['EST', -300],
  ['EDT', -240],
  ['CST', -360],
  ['CDT', -300],
  ['MST', -420],
  ['MDT', -360],
  ['PST', -480],
  ['PDT', -420],
  ['AKST', -540],
  ['AKDT', -480],
  ['HST', -600],
]);

export const US_COUNTRY_CODE = 'US';
export const INTERNATIONAL_REGION = 'International';

/** Statute miles per degree of latitude */
export const MILES_PER_DEGREE = 69;
