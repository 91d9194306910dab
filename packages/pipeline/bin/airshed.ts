#!/usr/bin/env tsx
/**
 * Airshed CLI Entry Point
 *
 * Loads raw observations, runs the pipeline and reports on data quality
 * and trends from a local SQLite store.
 *
 * @module airshed-cli
 */

import { createProgram, describeError, exitCodeFor, peekGlobalContext } from '../src/cli/index.js';
import { EXIT_CODES } from '../src/cli/exit-codes.js';

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const context = peekGlobalContext();
    if (context) {
      context.logger.error('Command failed', {
        error: describeError(error),
        duration_ms: Date.now() - context.startTime,
      });
    }
    console.error(`Error: ${describeError(error)}`);
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
