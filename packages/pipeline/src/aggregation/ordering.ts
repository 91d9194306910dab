import type { EntityKey } from '@airshed/types';

interface Dated extends EntityKey {
  readonly observationDate: string;
}

function compareNullable(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
}

/**
 * Canonical output order: city, country (null first), date
 */
export function compareEntityDate(a: Dated, b: Dated): number {
  return (
    compareNullable(a.city, b.city) ||
    compareNullable(a.country, b.country) ||
    compareNullable(a.observationDate, b.observationDate)
  );
}
