export { normalizeRecord } from './record-normalizer.js';
export {
  compareAirQuality,
  compareRecordIds,
  compareWeather,
  dedupeRawObservations,
  normalizeBatch,
} from './batch.js';
export type { DedupeResult, NormalizedBatch, RejectedRecord } from './batch.js';
export { standardizePollutant, standardizeWeatherCategory } from './standardize.js';
export { resolveObservedAt } from './air-quality.js';
export { issueCategory } from './issues.js';
