/**
 * Airshed CLI Configuration Management
 *
 * Loads configuration from .airshedrc (YAML) with environment variable
 * overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (AIRSHED_*)
 * 3. Config file (.airshedrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { resolvePipelineConfig, type PipelineConfig } from '../../core/config.js';
import { ConfigurationError, errorMessage } from '../../core/errors.js';
import { isRecord } from '../../core/type-guards.js';
import { parseLogLevel, type LogLevel } from '../../core/utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CLIConfig {
  readonly pipeline: PipelineConfig;
  /** SQLite database file */
  readonly dbPath: string;
  readonly logLevel: LogLevel;
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    database: z.string().min(1).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    pipeline: z.record(z.unknown()).optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_DB_PATH = '.airshed/airshed.db';

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = ['.airshedrc', '.airshedrc.yaml', '.airshedrc.yml', '.airshedrc.json'];

/**
 * Numeric pipeline settings that can be set from the environment
 */
const ENV_PIPELINE_SETTINGS: ReadonlyArray<{
  readonly name: string;
  readonly path: readonly string[];
}> = [
  { name: 'ROLLING_WINDOW_DAYS', path: ['rollingWindowDays'] },
  { name: 'MAX_TIME_OFFSET_MINUTES', path: ['reconciliation', 'maxTimeOffsetMinutes'] },
  { name: 'NEARBY_STATION_MILES', path: ['reconciliation', 'nearbyStationMiles'] },
  { name: 'AQI_STABLE_THRESHOLD', path: ['trends', 'aqi', 'stableThreshold'] },
  { name: 'AQI_SIGNIFICANT_THRESHOLD', path: ['trends', 'aqi', 'significantThreshold'] },
  { name: 'TEMPERATURE_STABLE_THRESHOLD', path: ['trends', 'temperature', 'stableThreshold'] },
  { name: 'TEMPERATURE_SIGNIFICANT_THRESHOLD', path: ['trends', 'temperature', 'significantThreshold'] },
];

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse config file content; YAML also covers the .json variant
 */
function parseConfigFile(filePath: string): ConfigFile {
  let document: unknown;
  try {
    document = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      'Config file could not be parsed',
      [errorMessage(error)],
      filePath
    );
  }

  const result = ConfigFileSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid config file',
      result.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      filePath
    );
  }
  return result.data;
}

type Env = Readonly<Record<string, string | undefined>>;

function envNumber(env: Env, name: string): number | undefined {
  const value = env[`AIRSHED_${name}`];
  if (value === undefined || value.trim() === '') return undefined;
  const num = Number(value);
  if (!Number.isFinite(num)) {
    throw new ConfigurationError('Invalid environment variable', [`AIRSHED_${name}: not a number: ${value}`]);
  }
  return num;
}

/**
 * Copy of `target` with `value` set at `path`, creating objects on the way
 */
function setPath(
  target: Readonly<Record<string, unknown>>,
  path: readonly string[],
  value: unknown
): Record<string, unknown> {
  const [head, ...rest] = path;
  if (rest.length === 0) {
    return { ...target, [head]: value };
  }
  const child = target[head];
  return { ...target, [head]: setPath(isRecord(child) ? child : {}, rest, value) };
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly verbose?: boolean;
    readonly json?: boolean;
    readonly db?: string;
  };
  /** Defaults to process.env */
  readonly env?: Env;
  /** Where the config file search starts; defaults to process.cwd() */
  readonly cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError for a missing explicit config file or any
 *   invalid setting
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  const env = options.env ?? process.env;
  const explicitPath = options.configPath ?? env.AIRSHED_CONFIG;

  let configPath: string | null = null;
  if (explicitPath) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError('Config file not found', [], configPath);
    }
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
  }

  const fileConfig: ConfigFile = configPath ? parseConfigFile(configPath) : {};

  let settings: Record<string, unknown> = { ...(fileConfig.pipeline ?? {}) };
  for (const { name, path } of ENV_PIPELINE_SETTINGS) {
    const value = envNumber(env, name);
    if (value !== undefined) {
      settings = setPath(settings, path, value);
    }
  }
  const bandTablesPath = env.AIRSHED_BAND_TABLES;
  if (bandTablesPath) {
    settings = { ...settings, bandTablesPath };
  }

  const envLogLevel = env.AIRSHED_LOG_LEVEL;
  const parsedEnvLevel = envLogLevel === undefined ? null : parseLogLevel(envLogLevel);
  if (envLogLevel !== undefined && parsedEnvLevel === null) {
    throw new ConfigurationError('Invalid environment variable', [
      `AIRSHED_LOG_LEVEL: expected debug|info|warn|error, got ${envLogLevel}`,
    ]);
  }

  const verbose = options.overrides?.verbose ?? false;

  return {
    pipeline: resolvePipelineConfig(settings, { source: configPath ?? 'defaults' }),
    dbPath: options.overrides?.db ?? env.AIRSHED_DB ?? fileConfig.database ?? DEFAULT_DB_PATH,
    logLevel: verbose ? 'debug' : parsedEnvLevel ?? fileConfig.logLevel ?? 'warn',
    verbose,
    json: options.overrides?.json ?? false,
    configPath,
  };
}
