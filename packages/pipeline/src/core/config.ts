/**
 * Pipeline configuration
 *
 * Every value has a default. Settings arrive as a loosely typed document
 * (YAML file, environment, CLI flags merged by the CLI layer) and are
 * validated with zod; any failure raises ConfigurationError, the only
 * error that aborts a run.
 *
 * @module core/config
 */

import { z } from 'zod';
import type { BandTableSet } from '@airshed/types';
import { loadBandTables } from '../classification/band-table.js';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Inclusive validity window for a measured field
 */
export interface ValueRange {
  readonly min: number;
  readonly max: number;
}

export interface ValidationRanges {
  /** Also applied to feels-like, min and max temperature */
  readonly temperatureCelsius: ValueRange;
  readonly humidityPercent: ValueRange;
  readonly aqi: ValueRange;
  readonly pressureHpa: ValueRange;
  readonly windSpeedMps: ValueRange;
  readonly cloudinessPercent: ValueRange;
  readonly visibilityMeters: ValueRange;
  readonly concentration: ValueRange;
}

export interface TrendThresholds {
  /** |delta| at or below this is Stable */
  readonly stableThreshold: number;
  /** |delta| above this is Significantly Worse/Better */
  readonly significantThreshold: number;
}

export interface ReconciliationConfig {
  /** Air-quality readings further apart in time are never paired */
  readonly maxTimeOffsetMinutes: number;
  /** Stations within this distance count as nearby */
  readonly nearbyStationMiles: number;
}

export interface QualityConfig {
  readonly sufficientWeatherObservations: number;
  readonly sufficientAirQualityObservations: number;
  /** Success rate (%) at which a weather day is high quality */
  readonly highQualitySuccessRate: number;
  /** A city is active if observed within this many days... */
  readonly activeWindowDays: number;
  /** ...and its success rate (%) is at least this */
  readonly minActiveSuccessRate: number;
}

export interface PipelineConfig {
  readonly validation: ValidationRanges;
  readonly rollingWindowDays: number;
  readonly reconciliation: ReconciliationConfig;
  readonly trends: {
    readonly aqi: TrendThresholds;
    readonly temperature: TrendThresholds;
  };
  readonly quality: QualityConfig;
  readonly bandTables: BandTableSet;
}

// ============================================================================
// Schema
// ============================================================================

function rangeSchema(min: number, max: number) {
  return z
    .object({
      min: z.number().finite().default(min),
      max: z.number().finite().default(max),
    })
    .default({})
    .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });
}

function trendSchema() {
  return z
    .object({
      stableThreshold: z.number().positive().default(5),
      significantThreshold: z.number().positive().default(20),
    })
    .default({})
    .refine((t) => t.stableThreshold < t.significantThreshold, {
      message: 'stableThreshold must be below significantThreshold',
    });
}

const percent = (value: number) => z.number().min(0).max(100).default(value);
const count = (value: number) => z.number().int().nonnegative().default(value);

/**
 * Settings document; everything optional, defaults filled in by parsing
 */
export const PipelineSettingsSchema = z
  .object({
    validation: z
      .object({
        temperatureCelsius: rangeSchema(-100, 70),
        humidityPercent: rangeSchema(0, 100),
        aqi: rangeSchema(0, 500),
        pressureHpa: rangeSchema(870, 1085),
        windSpeedMps: rangeSchema(0, 120),
        cloudinessPercent: rangeSchema(0, 100),
        visibilityMeters: rangeSchema(0, 100_000),
        concentration: rangeSchema(0, 100_000),
      })
      .default({}),
    rollingWindowDays: z.number().int().min(1).default(7),
    reconciliation: z
      .object({
        maxTimeOffsetMinutes: z.number().nonnegative().default(90),
        nearbyStationMiles: z.number().nonnegative().default(25),
      })
      .default({}),
    trends: z
      .object({
        aqi: trendSchema(),
        temperature: trendSchema(),
      })
      .default({}),
    quality: z
      .object({
        sufficientWeatherObservations: count(4),
        sufficientAirQualityObservations: count(3),
        highQualitySuccessRate: percent(80),
        activeWindowDays: z.number().nonnegative().default(7),
        minActiveSuccessRate: percent(70),
      })
      .default({}),
    /** Alternate band-table file */
    bandTablesPath: z.string().min(1).optional(),
  })
  .strict();

export type PipelineSettings = z.input<typeof PipelineSettingsSchema>;

// ============================================================================
// Resolution
// ============================================================================

let defaultBandTables: BandTableSet | null = null;

function bundledBandTables(): BandTableSet {
  if (defaultBandTables === null) {
    defaultBandTables = loadBandTables();
  }
  return defaultBandTables;
}

export interface ResolveConfigOptions {
  /** Where the settings came from, for error messages */
  readonly source?: string;
  /** Already-loaded tables; skips reading `bandTablesPath` */
  readonly bandTables?: BandTableSet;
}

/**
 * Validate a settings document and fill in defaults
 *
 * @throws ConfigurationError when any setting is invalid or the band
 *   tables cannot be loaded
 */
export function resolvePipelineConfig(
  settings: unknown = {},
  options: ResolveConfigOptions = {}
): PipelineConfig {
  const result = PipelineSettingsSchema.safeParse(settings ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid pipeline configuration',
      result.error.errors.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
      options.source ?? null
    );
  }

  const { bandTablesPath, ...values } = result.data;
  const bandTables =
    options.bandTables ??
    (bandTablesPath !== undefined ? loadBandTables(bandTablesPath) : bundledBandTables());

  return { ...values, bandTables };
}

/**
 * Defaults with the bundled band tables
 */
export function defaultPipelineConfig(): PipelineConfig {
  return resolvePipelineConfig({});
}
