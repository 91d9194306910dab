/**
 * Quality Command
 *
 * Data-quality report over the most recently stored raw observations.
 *
 * Usage:
 *   airshed quality [--limit <n>]
 */

import type { Command } from 'commander';
import type { PipelineConfig } from '../../core/config.js';
import type { SqliteObservationStore } from '../../persistence/sqlite-store.js';
import { assessDataQuality, type DataQualityReport } from '../../quality/data-quality.js';
import { getGlobalContext, withStore } from '../context.js';
import { EXIT_CODES } from '../exit-codes.js';
import { parsePositiveInt } from './options.js';

export const DEFAULT_QUALITY_LIMIT = 100;

export function executeQuality(
  limit: number,
  store: SqliteObservationStore,
  config: PipelineConfig,
  checkedAt: string
): DataQualityReport {
  const raws = store.listRawObservations({ limit });
  return assessDataQuality(raws, config, checkedAt);
}

function printReport(report: DataQualityReport): void {
  console.log('\nAirshed Data Quality Report');
  console.log('='.repeat(50));
  console.log(`Records checked: ${report.totalRecordsChecked}`);
  console.log(`Valid records:   ${report.validRecords}`);
  console.log(`Invalid records: ${report.invalidRecords}`);
  console.log(`Quality score:   ${report.dataQualityScore}%`);

  const categories = Object.entries(report.issueCategories);
  if (categories.length > 0) {
    console.log('\nIssue categories:');
    for (const [category, count] of categories) {
      console.log(`  ${category}: ${count}`);
    }
  }
}

export function registerQualityCommand(program: Command): void {
  program
    .command('quality')
    .description('Check the most recent raw observations for data-quality issues')
    .option('-l, --limit <n>', `Records to check (default: ${DEFAULT_QUALITY_LIMIT})`, parsePositiveInt)
    .action((options: { limit?: number }) => {
      const { config } = getGlobalContext();
      const report = withStore(config, (store) =>
        executeQuality(options.limit ?? DEFAULT_QUALITY_LIMIT, store, config.pipeline, new Date().toISOString())
      );

      if (config.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        printReport(report);
      }
      if (report.invalidRecords > 0) {
        process.exitCode = EXIT_CODES.WARNINGS;
      }
    });
}
