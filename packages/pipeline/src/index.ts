/**
 * Airshed - Weather and Air-Quality Observation Pipeline
 *
 * @airshed/pipeline provides:
 * - Normalization of raw weather and air-quality payloads
 * - Reconciliation of the two sources per city and time window
 * - Daily aggregates, trend enrichment and city dimensions
 * - A SQLite store and CLI for loading and re-running the pipeline
 *
 * @packageDocumentation
 */

export type * from '@airshed/types';

// Configuration
export {
    defaultPipelineConfig,
    resolvePipelineConfig,
    PipelineSettingsSchema,
    type PipelineConfig,
    type PipelineSettings,
    type QualityConfig,
    type ReconciliationConfig,
    type ResolveConfigOptions,
    type TrendThresholds,
    type ValidationRanges,
    type ValueRange,
} from './core/config.js';

// Errors
export {
    AirshedError,
    ConfigurationError,
    InputError,
    InvariantViolationError,
    StoreError,
    errorMessage,
    type AirshedErrorCode,
} from './core/errors.js';

export { surrogateKey, entityId, dailyFactId, type KeyField } from './core/surrogate-key.js';
export { roundTo } from './core/utils/math.js';
export {
    createLogger,
    logger,
    silentLogger,
    type LogLevel,
    type LogMetadata,
    type PipelineLogger,
} from './core/utils/logger.js';

// Classification
export * from './classification/index.js';

// Stages
export * from './normalization/index.js';
export * from './reconciliation/index.js';
export {
    aggregateDailyWeather,
    aggregateOverallAirQuality,
    aggregatePollutantDaily,
} from './aggregation/index.js';
export * from './trends/index.js';
export * from './dimensions/index.js';
export * from './quality/index.js';

// Orchestration
export * from './pipeline/index.js';

// Storage
export * from './persistence/index.js';
