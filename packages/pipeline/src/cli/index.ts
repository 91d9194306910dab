/**
 * Airshed CLI program
 *
 * Global options are resolved into the shared context before any command
 * action runs.
 *
 * @module cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { registerCommands } from './commands/index.js';
import { initializeContext } from './context.js';
import { describeError, EXIT_CODES } from './exit-codes.js';

const PackageVersionSchema = z.object({ version: z.string() });

export function getVersion(): string {
  const packageJsonPath = fileURLToPath(new URL('../../package.json', import.meta.url));
  const parsed = PackageVersionSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly db?: string;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('airshed')
    .description('Weather and air-quality observation pipeline')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .airshedrc)')
    .option('--db <path>', 'SQLite database path')
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      try {
        initializeContext({
          configPath: options.config,
          overrides: { verbose: options.verbose, json: options.json, db: options.db },
        });
      } catch (error) {
        console.error(`Configuration error: ${describeError(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);
  return program;
}

export { EXIT_CODES, exitCodeFor, describeError, type ExitCode } from './exit-codes.js';
export {
  getGlobalContext,
  peekGlobalContext,
  initializeContext,
  openStore,
  withStore,
  type GlobalContext,
} from './context.js';
export { loadConfig, findConfigFile, DEFAULT_DB_PATH, type CLIConfig, type LoadConfigOptions } from './lib/config.js';
export { parseRawObservations, readRawObservations } from './lib/ndjson.js';
