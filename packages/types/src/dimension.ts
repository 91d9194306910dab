/**
 * City dimension: one row per entity, recomputed from full history
 */

import type { EntityKey } from './observation.js';

export interface CityDimension extends EntityKey {
  /** Surrogate key of (city, country) */
  readonly id: string;
  readonly latitude: number | null;
  readonly longitude: number | null;

  readonly climateZone: string;
  readonly regionClassification: string;
  readonly estimatedTimezone: string;

  readonly firstObservation: string;
  readonly lastObservation: string;
  readonly totalObservations: number;
  readonly successCount: number;
  readonly errorCount: number;
  readonly successRatePercent: number;

  readonly dataFreshness: string;
  readonly isActive: boolean;
  readonly dataQualityTier: string;

  /** Reference instant freshness was computed against */
  readonly asOf: string;
}
