/**
 * Run Command
 *
 * Run the pipeline over stored (or given) raw observations and upsert the
 * resulting facts and dimensions.
 *
 * Usage:
 *   airshed run [options]
 *
 * Options:
 *   --input <file>     Read raw observations from NDJSON instead of the store
 *   --as-of <iso>      Reference instant for freshness (default: now)
 *   --output <file>    Also write facts, dimensions and report as JSON
 */

import type { Command } from 'commander';
import type { PipelineConfig } from '../../core/config.js';
import type { PipelineLogger } from '../../core/utils/logger.js';
import type { SaveRunSummary, SqliteObservationStore } from '../../persistence/sqlite-store.js';
import { runPipeline, type RunReport } from '../../pipeline/run-pipeline.js';
import { getGlobalContext, openStore } from '../context.js';
import { EXIT_CODES } from '../exit-codes.js';
import { readRawObservations, writeJsonFile } from '../lib/ndjson.js';
import { parseAsOf } from './options.js';

export interface RunCommandOptions {
  readonly input?: string;
  readonly asOf?: string;
  readonly output?: string;
}

export interface RunCommandResult {
  readonly report: RunReport;
  readonly saved: SaveRunSummary;
  readonly outputPath: string | null;
}

export async function executeRun(
  options: RunCommandOptions,
  store: SqliteObservationStore,
  config: PipelineConfig,
  logger: PipelineLogger
): Promise<RunCommandResult> {
  const raws = options.input
    ? await readRawObservations(options.input)
    : store.listRawObservations();

  const result = runPipeline(raws, {
    config,
    asOf: options.asOf ?? new Date().toISOString(),
    logger,
  });
  const saved = store.saveRunResults(result);

  if (options.output) {
    await writeJsonFile(options.output, {
      report: result.report,
      weatherFacts: result.weatherFacts,
      airQualityFacts: result.airQualityFacts,
      dimensions: result.dimensions,
    });
  }

  return { report: result.report, saved, outputPath: options.output ?? null };
}

function printReport(result: RunCommandResult): void {
  const { report } = result;
  console.log('\nAirshed Pipeline Run');
  console.log('='.repeat(50));
  console.log(`Run:            ${report.runId}`);
  console.log(`As of:          ${report.asOf}`);
  console.log(`Raw records:    ${report.rawRecords}`);
  console.log(`  duplicates:   ${report.duplicateRecords}`);
  console.log(`  invalid:      ${report.invalidRecords}`);
  console.log(`Observations:   ${report.normalizedObservations}`);
  console.log(`AQ readings:    ${report.airQualityReadings}`);
  console.log(`  unpaired wx:  ${report.unpairedObservations}`);
  console.log(`Weather facts:  ${result.saved.weatherFacts}`);
  console.log(`AQ facts:       ${result.saved.airQualityFacts}`);
  console.log(`Cities:         ${result.saved.dimensions}`);
  if (result.saved.removedFacts > 0) {
    console.log(`Stale facts:    ${result.saved.removedFacts} removed`);
  }

  const categories = Object.entries(report.issuesByCategory);
  if (categories.length > 0) {
    console.log('\nIssues:');
    for (const [category, count] of categories) {
      console.log(`  ${category}: ${count}`);
    }
  }
  if (result.outputPath) {
    console.log(`\nOutput saved to: ${result.outputPath}`);
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Normalize, reconcile, aggregate and classify raw observations')
    .option('-i, --input <file>', 'Read raw observations from an NDJSON file')
    .option('--as-of <iso>', 'Reference instant for freshness (default: now)', parseAsOf)
    .option('-o, --output <file>', 'Write facts, dimensions and report as JSON')
    .action(async (options: RunCommandOptions) => {
      const { config, logger } = getGlobalContext();
      const store = openStore(config);
      try {
        const result = await executeRun(options, store, config.pipeline, logger);
        if (config.json) {
          console.log(JSON.stringify({ success: true, ...result }, null, 2));
        } else {
          printReport(result);
        }
        if (result.report.invalidRecords > 0) {
          process.exitCode = EXIT_CODES.WARNINGS;
        }
      } finally {
        store.close();
      }
    });
}
