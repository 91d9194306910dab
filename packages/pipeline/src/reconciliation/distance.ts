import { MILES_PER_DEGREE } from '../core/constants.js';
import { roundTo, toRadians } from '../core/utils/math.js';

/**
 * Flat-earth distance in miles, longitude scaled by cos(lat1); 2 dp.
 * Null when any coordinate is missing.
 */
export function approximateDistanceMiles(
  lat1: number | null,
  lon1: number | null,
  lat2: number | null,
  lon2: number | null
): number | null {
  if (lat1 === null || lon1 === null || lat2 === null || lon2 === null) {
    return null;
  }
  const dy = (lat1 - lat2) * MILES_PER_DEGREE;
  const dx = (lon1 - lon2) * MILES_PER_DEGREE * Math.cos(toRadians(lat1));
  return roundTo(Math.sqrt(dy * dy + dx * dx), 2);
}
