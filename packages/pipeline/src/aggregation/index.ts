export {
  earliestInstant,
  latestBy,
  latestInstant,
  max,
  mean,
  min,
  mode,
  percentage,
  roundTo,
  roundedMean,
} from './stats.js';
export { aggregateDailyWeather } from './daily-weather.js';
export {
  aggregateOverallAirQuality,
  aggregatePollutantDaily,
  comparePollutants,
} from './air-quality-daily.js';
export { compareEntityDate } from './ordering.js';
