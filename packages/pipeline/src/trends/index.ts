export { analyzeTrends } from './analyze.js';
export type { TrendOptions, TrendPoint } from './analyze.js';
export { buildDailyAirQualityFacts, buildDailyWeatherFacts } from './facts.js';
export { summarizeEntityTrends, summarizeSeries } from './summary.js';
export type {
  EntityTrendQuery,
  EntityTrendSummary,
  SeriesSummary,
  TrendDirection,
} from './summary.js';
