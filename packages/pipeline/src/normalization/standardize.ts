/**
 * Categorical standardization: ordered substring matchers, first match wins
 */

import type { WeatherCategory } from '@airshed/types';
import { POLLUTANT_MATCHERS, UNSPECIFIED_POLLUTANT } from '../core/constants.js';

const WEATHER_MATCHERS: ReadonlyArray<{
  readonly category: WeatherCategory;
  readonly patterns: readonly string[];
}> = [
  { category: 'Clear', patterns: ['clear'] },
  { category: 'Cloudy', patterns: ['cloud'] },
  { category: 'Rainy', patterns: ['rain'] },
  { category: 'Snowy', patterns: ['snow'] },
  { category: 'Stormy', patterns: ['storm', 'thunder'] },
  { category: 'Misty', patterns: ['mist', 'fog'] },
];

export function standardizeWeatherCategory(weatherMain: string | null): WeatherCategory {
  if (weatherMain === null) return 'Other';
  const needle = weatherMain.toLowerCase();
  const match = WEATHER_MATCHERS.find(({ patterns }) =>
    patterns.some((pattern) => needle.includes(pattern))
  );
  return match?.category ?? 'Other';
}

export interface StandardizedPollutant {
  readonly pollutant: string;
  readonly isStandard: boolean;
}

/**
 * Canonical pollutant label; an unmatched name passes through unchanged
 */
export function standardizePollutant(parameterName: string | null): StandardizedPollutant {
  if (parameterName === null || parameterName.trim() === '') {
    return { pollutant: UNSPECIFIED_POLLUTANT, isStandard: false };
  }

  const needle = parameterName.toUpperCase();
  const match = POLLUTANT_MATCHERS.find(({ patterns }) =>
    patterns.some((pattern) => needle.includes(pattern))
  );

  return match
    ? { pollutant: match.pollutant, isStandard: true }
    : { pollutant: parameterName, isStandard: false };
}
