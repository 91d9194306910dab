/**
 * Trends Command
 *
 * Summary statistics (average, median, spread, direction) for one city
 * over a recent window.
 *
 * Usage:
 *   airshed trends <city> [options]
 *
 * Options:
 *   --country <cc>   Country code of the city
 *   --days <n>       Window length in days (default: 7)
 *   --as-of <iso>    End of the window (default: now)
 */

import type { Command } from 'commander';
import type { PipelineConfig } from '../../core/config.js';
import type { SqliteObservationStore } from '../../persistence/sqlite-store.js';
import { normalizeBatch } from '../../normalization/batch.js';
import {
  summarizeEntityTrends,
  type EntityTrendSummary,
  type SeriesSummary,
} from '../../trends/summary.js';
import { getGlobalContext, withStore } from '../context.js';
import { parseAsOf, parsePositiveInt } from './options.js';

export const DEFAULT_TREND_DAYS = 7;

export interface TrendsCommandOptions {
  readonly country?: string;
  readonly days?: number;
  readonly asOf?: string;
}

export function executeTrends(
  city: string,
  options: TrendsCommandOptions,
  store: SqliteObservationStore,
  config: PipelineConfig
): EntityTrendSummary {
  const batch = normalizeBatch(store.listRawObservations(), config);
  return summarizeEntityTrends(batch.weather, batch.airQuality, {
    city,
    country: options.country,
    asOf: options.asOf ?? new Date().toISOString(),
    days: options.days ?? DEFAULT_TREND_DAYS,
  });
}

function printSeries(label: string, summary: SeriesSummary | null, unit: string): void {
  if (summary === null) {
    console.log(`${label}: no data`);
    return;
  }
  console.log(
    `${label}: ${summary.average}${unit} avg (median ${summary.median}, ` +
      `range ${summary.min}..${summary.max}, sd ${summary.standardDeviation}), ` +
      `trend ${summary.direction} (${summary.magnitude})`
  );
}

export function registerTrendsCommand(program: Command): void {
  program
    .command('trends <city>')
    .description('Trend summary for one city')
    .option('-c, --country <cc>', 'Country code of the city')
    .option('-d, --days <n>', `Window length in days (default: ${DEFAULT_TREND_DAYS})`, parsePositiveInt)
    .option('--as-of <iso>', 'End of the window (default: now)', parseAsOf)
    .action((city: string, options: TrendsCommandOptions) => {
      const { config } = getGlobalContext();
      const summary = withStore(config, (store) => executeTrends(city, options, store, config.pipeline));

      if (config.json) {
        console.log(JSON.stringify(summary, null, 2));
        return;
      }

      const where = summary.country ? `${summary.city}, ${summary.country}` : summary.city;
      console.log(`\nTrends for ${where} (last ${summary.periodDays} days)`);
      console.log('='.repeat(50));
      if (summary.totalObservations === 0) {
        console.log(`No data found for ${where} in the last ${summary.periodDays} days`);
        return;
      }
      console.log(`Observations: ${summary.totalObservations}`);
      printSeries('Temperature', summary.temperature, '°C');
      printSeries('Humidity', summary.humidity, '%');
      printSeries('AQI', summary.aqi, '');
    });
}
