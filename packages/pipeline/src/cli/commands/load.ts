/**
 * Load Command
 *
 * Read raw observations from an NDJSON file into the store.
 *
 * Usage:
 *   airshed load <file>
 *
 * Examples:
 *   airshed load observations.ndjson
 *   airshed --db ./data/airshed.db load observations.ndjson --json
 */

import type { Command } from 'commander';
import type { PipelineLogger } from '../../core/utils/logger.js';
import type { SqliteObservationStore } from '../../persistence/sqlite-store.js';
import { getGlobalContext, openStore } from '../context.js';
import { readRawObservations } from '../lib/ndjson.js';

export interface LoadResult {
  readonly file: string;
  readonly records: number;
  readonly storedTotal: number;
}

export async function executeLoad(
  file: string,
  store: SqliteObservationStore,
  logger: PipelineLogger
): Promise<LoadResult> {
  const raws = await readRawObservations(file);
  const records = store.upsertRawObservations(raws);
  const storedTotal = store.countRawObservations();
  logger.info('Loaded raw observations', { file, records, storedTotal });
  return { file, records, storedTotal };
}

export function registerLoadCommand(program: Command): void {
  program
    .command('load <file>')
    .description('Load raw observations (NDJSON, one record per line) into the store')
    .action(async (file: string) => {
      const { config, logger } = getGlobalContext();
      const store = openStore(config);
      try {
        const result = await executeLoad(file, store, logger);
        if (config.json) {
          console.log(JSON.stringify({ success: true, ...result }, null, 2));
        } else {
          console.log(`Loaded ${result.records} records from ${result.file}`);
          console.log(`Store now holds ${result.storedTotal} raw observations`);
        }
      } finally {
        store.close();
      }
    });
}
