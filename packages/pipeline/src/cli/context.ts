/**
 * Per-invocation CLI context: configuration, logger, store
 *
 * @module cli/context
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { createLogger, type PipelineLogger } from '../core/utils/logger.js';
import { SqliteObservationStore } from '../persistence/sqlite-store.js';
import { loadConfig, type CLIConfig, type LoadConfigOptions } from './lib/config.js';

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly logger: PipelineLogger;
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * Context if a command has initialized it, for error reporting
 */
export function peekGlobalContext(): GlobalContext | null {
  return globalContext;
}

export function initializeContext(options: LoadConfigOptions): GlobalContext {
  const config = loadConfig(options);
  const logger = createLogger({ module: 'cli' }, { level: config.logLevel, json: config.json });
  globalContext = { config, logger, startTime: Date.now() };
  return globalContext;
}

/**
 * Open the configured store with migrations applied; the caller closes it
 */
export function openStore(config: CLIConfig): SqliteObservationStore {
  if (config.dbPath !== ':memory:') {
    mkdirSync(dirname(config.dbPath), { recursive: true });
  }
  const store = new SqliteObservationStore(config.dbPath);
  store.runMigrations();
  return store;
}

/**
 * Run `fn` with an open store, closing it afterwards
 */
export function withStore<T>(config: CLIConfig, fn: (store: SqliteObservationStore) => T): T {
  const store = openStore(config);
  try {
    return fn(store);
  } finally {
    store.close();
  }
}
