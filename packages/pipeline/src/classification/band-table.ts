/**
 * Band tables: load, validate, classify
 *
 * A table maps a number onto exactly one label. Validation runs once at
 * load time so that `classify` can stay a plain scan: non-empty, bands in
 * ascending order, each band's `min` equal to the previous band's `max`,
 * and only the outermost bounds may be unbounded (null).
 *
 * @module classification/band-table
 */

import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import type {
  Band,
  BandTable,
  BandTableName,
  BandTableSet,
  Classification,
} from '@airshed/types';
import { ConfigurationError, errorMessage } from '../core/errors.js';
import { DEFAULT_BAND_TABLES_PATH } from '../core/constants.js';

// ============================================================================
// Schemas
// ============================================================================

const BandSchema = z.object({
  min: z.number().finite().nullable(),
  max: z.number().finite().nullable(),
  label: z.string().min(1),
  severity: z.number().int().nonnegative(),
  color: z.string().min(1).optional(),
  detail: z.string().min(1).optional(),
});

const BandFallbackSchema = z.object({
  label: z.string().min(1),
  severity: z.number().int().nonnegative(),
  color: z.string().min(1).optional(),
  detail: z.string().min(1).optional(),
});

export const BandTableSchema = z.object({
  name: z.string().min(1),
  closedSide: z.enum(['lower', 'upper']),
  bands: z.array(BandSchema).min(1, 'table has no bands'),
  fallback: BandFallbackSchema,
});

export const BAND_TABLE_NAMES: readonly BandTableName[] = [
  'aqi',
  'airQualityAssessment',
  'temperature',
  'humidity',
  'wind',
  'climateZone',
  'usRegion',
  'timezone',
  'freshness',
  'dataQualityTier',
];

const BandTableFileSchema = z.object({
  version: z.literal(1),
  tables: z.object({
    aqi: BandTableSchema,
    airQualityAssessment: BandTableSchema,
    temperature: BandTableSchema,
    humidity: BandTableSchema,
    wind: BandTableSchema,
    climateZone: BandTableSchema,
    usRegion: BandTableSchema,
    timezone: BandTableSchema,
    freshness: BandTableSchema,
    dataQualityTier: BandTableSchema,
  }),
});

// ============================================================================
// Validation
// ============================================================================

/**
 * Structural problems of one table, empty when the table is usable
 */
export function validateBandTable(table: BandTable): string[] {
  const issues: string[] = [];
  const { bands } = table;

  if (bands.length === 0) {
    return [`${table.name}: table has no bands`];
  }

  bands.forEach((band, index) => {
    const where = `${table.name}.bands[${index}] (${band.label})`;

    if (band.min === null && index !== 0) {
      issues.push(`${where}: only the first band may have an open lower bound`);
    }
    if (band.max === null && index !== bands.length - 1) {
      issues.push(`${where}: only the last band may have an open upper bound`);
    }
    if (band.min !== null && band.max !== null && band.min >= band.max) {
      issues.push(`${where}: empty band [${band.min}, ${band.max}]`);
    }

    if (index > 0) {
      const previous = bands[index - 1];
      if (previous.max !== band.min) {
        issues.push(
          `${where}: min ${String(band.min)} does not continue previous max ${String(previous.max)}`
        );
      }
    }
  });

  return issues;
}

function assertValidTable(table: BandTable, source: string | null): BandTable {
  const issues = validateBandTable(table);
  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid band table "${table.name}"`, issues, source);
  }
  return table;
}

/**
 * Build a table in code (trend magnitudes, tests) with load-time validation
 */
export function createBandTable(table: BandTable): BandTable {
  return assertValidTable(table, null);
}

/**
 * Parse and validate a band-table document
 */
export function parseBandTables(document: unknown, source: string | null = null): BandTableSet {
  const result = BandTableFileSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigurationError(
      'Malformed band tables',
      result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      source
    );
  }

  const { tables } = result.data;
  const issues = BAND_TABLE_NAMES.flatMap((name) => validateBandTable(tables[name]));
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid band tables', issues, source);
  }

  return tables;
}

/**
 * Read band tables from disk; missing or malformed tables are fatal
 */
export function loadBandTables(path: string = DEFAULT_BAND_TABLES_PATH): BandTableSet {
  if (!existsSync(path)) {
    throw new ConfigurationError('Band tables not found', [], path);
  }

  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      'Band tables are not valid JSON',
      [errorMessage(error)],
      path
    );
  }

  return parseBandTables(document, path);
}

// ============================================================================
// Classification
// ============================================================================

function bandContains(table: BandTable, band: Band, index: number, value: number): boolean {
  const lowerInclusive = table.closedSide === 'lower' || index === 0;
  const upperInclusive = table.closedSide === 'upper' || index === table.bands.length - 1;

  const aboveMin =
    band.min === null || (lowerInclusive ? value >= band.min : value > band.min);
  const belowMax =
    band.max === null || (upperInclusive ? value <= band.max : value < band.max);

  return aboveMin && belowMax;
}

/**
 * Total over numbers and null: anything outside the table resolves to the
 * table's fallback.
 */
export function classify(table: BandTable, value: number | null): Classification {
  if (value !== null && !Number.isNaN(value)) {
    const index = table.bands.findIndex((band, i) => bandContains(table, band, i, value));
    if (index >= 0) {
      const band = table.bands[index];
      return {
        label: band.label,
        severity: band.severity,
        color: band.color ?? null,
        detail: band.detail ?? null,
        matched: true,
      };
    }
  }

  return {
    label: table.fallback.label,
    severity: table.fallback.severity,
    color: table.fallback.color ?? null,
    detail: table.fallback.detail ?? null,
    matched: false,
  };
}
