/**
 * Classification band tables
 *
 * A null bound is unbounded. `closedSide` selects which end of each band
 * is inclusive:
 *   lower: [min, max) ... [min, max]   (last band closed at both ends)
 *   upper: [min, max] ... (min, max]   (first band closed at both ends)
 */

export interface Band {
  readonly min: number | null;
  readonly max: number | null;
  readonly label: string;
  /** Ordinal tier, 0 is reserved for the fallback */
  readonly severity: number;
  readonly color?: string;
  readonly detail?: string;
}

export interface BandFallback {
  readonly label: string;
  readonly severity: number;
  readonly color?: string;
  readonly detail?: string;
}

export interface BandTable {
  readonly name: string;
  readonly closedSide: 'lower' | 'upper';
  readonly bands: readonly Band[];
  readonly fallback: BandFallback;
}

export interface Classification {
  readonly label: string;
  readonly severity: number;
  readonly color: string | null;
  readonly detail: string | null;
  /** False when the value resolved to the table fallback */
  readonly matched: boolean;
}

export type BandTableName =
  | 'aqi'
  | 'airQualityAssessment'
  | 'temperature'
  | 'humidity'
  | 'wind'
  | 'climateZone'
  | 'usRegion'
  | 'timezone'
  | 'freshness'
  | 'dataQualityTier';

export type BandTableSet = Readonly<Record<BandTableName, BandTable>>;
