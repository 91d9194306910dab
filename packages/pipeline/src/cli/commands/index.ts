/**
 * Command registration
 */

import type { Command } from 'commander';
import { registerLoadCommand } from './load.js';
import { registerQualityCommand } from './quality.js';
import { registerRunCommand } from './run.js';
import { registerTrendsCommand } from './trends.js';

export function registerCommands(program: Command): void {
  registerLoadCommand(program);
  registerRunCommand(program);
  registerQualityCommand(program);
  registerTrendsCommand(program);
}

export { executeLoad } from './load.js';
export { executeRun } from './run.js';
export { executeQuality } from './quality.js';
export { executeTrends } from './trends.js';
