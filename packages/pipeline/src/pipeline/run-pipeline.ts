/**
 * Pipeline orchestration
 *
 * Ordered stages, each consuming the previous stage's output and producing
 * a new immutable set:
 *
 *   dedupe -> normalize -> reconcile -> aggregate -> trend -> facts
 *
 * Dimensions are built from the normalized weather set alongside. Output
 * is a pure function of (records, config, asOf): input order does not
 * matter and reruns are byte-identical.
 *
 * @module pipeline/run-pipeline
 */

import { createHash } from 'node:crypto';
import type {
  CityDimension,
  DailyAirQualityFact,
  DailyWeatherFact,
  NormalizedWeatherObservation,
  PollutantDailyAggregate,
  RawObservation,
  ReconciledAirQualityObservation,
  ReconciledObservation,
} from '@airshed/types';
import type { PipelineConfig } from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import { parseTimestamp } from '../core/utils/dates.js';
import { silentLogger, type PipelineLogger } from '../core/utils/logger.js';
import { compareRecordIds, normalizeBatch } from '../normalization/batch.js';
import { reconcile } from '../reconciliation/reconciler.js';
import {
  aggregateOverallAirQuality,
  aggregatePollutantDaily,
} from '../aggregation/air-quality-daily.js';
import { aggregateDailyWeather } from '../aggregation/daily-weather.js';
import { buildDailyAirQualityFacts, buildDailyWeatherFacts } from '../trends/facts.js';
import { buildCityDimensions } from '../dimensions/city-dimensions.js';

export interface RunPipelineOptions {
  readonly config: PipelineConfig;
  /** Reference instant for freshness and activity */
  readonly asOf: string;
  readonly logger?: PipelineLogger;
}

export interface RunReport {
  readonly runId: string;
  readonly asOf: string;
  readonly rawRecords: number;
  readonly duplicateRecords: number;
  readonly invalidRecords: number;
  readonly normalizedObservations: number;
  readonly airQualityReadings: number;
  readonly pairedObservations: number;
  readonly unpairedObservations: number;
  readonly pollutantAggregates: number;
  readonly weatherFacts: number;
  readonly airQualityFacts: number;
  readonly dimensions: number;
  readonly issuesByCategory: Readonly<Record<string, number>>;
}

export interface PipelineResult {
  readonly weather: readonly NormalizedWeatherObservation[];
  readonly reconciled: readonly ReconciledObservation[];
  readonly airQuality: readonly ReconciledAirQualityObservation[];
  readonly pollutantAggregates: readonly PollutantDailyAggregate[];
  readonly weatherFacts: readonly DailyWeatherFact[];
  readonly airQualityFacts: readonly DailyAirQualityFact[];
  readonly dimensions: readonly CityDimension[];
  readonly report: RunReport;
}

/**
 * Run id from the record set and asOf; independent of record order
 */
export function deriveRunId(raws: readonly RawObservation[], asOf: string): string {
  const entries = raws
    .map((raw) => ({
      id: raw.id,
      json: JSON.stringify([
        raw.id,
        raw.city,
        raw.country,
        raw.latitude,
        raw.longitude,
        raw.observationTime,
        raw.weatherData,
        raw.airQualityData ?? null,
      ]),
    }))
    .sort((a, b) => compareRecordIds(a.id, b.id) || (a.json < b.json ? -1 : a.json > b.json ? 1 : 0));

  const hash = createHash('sha256');
  hash.update(asOf);
  for (const entry of entries) {
    hash.update('\n');
    hash.update(entry.json);
  }
  return hash.digest('hex').slice(0, 16);
}

function countByCategory(categories: readonly string[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const category of categories) {
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * @throws ConfigurationError when `asOf` is not a timestamp
 */
export function runPipeline(
  raws: readonly RawObservation[],
  options: RunPipelineOptions
): PipelineResult {
  const { config } = options;
  const parsedAsOf = parseTimestamp(options.asOf);
  if (parsedAsOf === null) {
    throw new ConfigurationError('Invalid asOf timestamp', [`asOf: ${options.asOf}`]);
  }
  const asOf = parsedAsOf.toISOString();
  const runId = deriveRunId(raws, asOf);
  const log = (options.logger ?? silentLogger).child({ module: 'pipeline', runId });
  const startedAt = Date.now();

  const batch = normalizeBatch(raws, config, log.child({ module: 'normalize' }));
  const reconciliation = reconcile(batch.weather, batch.airQuality, config);

  const weatherAggregates = aggregateDailyWeather(reconciliation.observations);
  const pollutantAggregates = aggregatePollutantDaily(reconciliation.airQuality);
  const airQualityAggregates = aggregateOverallAirQuality(pollutantAggregates, config.bandTables);

  const weatherFacts = buildDailyWeatherFacts(weatherAggregates, config);
  const airQualityFacts = buildDailyAirQualityFacts(airQualityAggregates, config);
  const dimensions = buildCityDimensions(batch.weather, asOf, config);

  const report: RunReport = {
    runId,
    asOf,
    rawRecords: raws.length,
    duplicateRecords: batch.duplicates,
    invalidRecords: batch.dropped,
    normalizedObservations: batch.weather.length,
    airQualityReadings: batch.airQuality.length,
    pairedObservations: reconciliation.pairedCount,
    unpairedObservations: reconciliation.unpairedCount,
    pollutantAggregates: pollutantAggregates.length,
    weatherFacts: weatherFacts.length,
    airQualityFacts: airQualityFacts.length,
    dimensions: dimensions.length,
    issuesByCategory: countByCategory(batch.issues.map((issue) => issue.category)),
  };

  log.info('Pipeline run complete', {
    ...report,
    durationMs: Date.now() - startedAt,
  });

  return {
    weather: batch.weather,
    reconciled: reconciliation.observations,
    airQuality: reconciliation.airQuality,
    pollutantAggregates,
    weatherFacts,
    airQualityFacts,
    dimensions,
    report,
  };
}
