export {
  BAND_TABLE_NAMES,
  BandTableSchema,
  classify,
  createBandTable,
  loadBandTables,
  parseBandTables,
  validateBandTable,
} from './band-table.js';
export {
  buildTrendMagnitudeTable,
  classifyAqi,
  classifyClimateZone,
  classifyRegion,
  classifyTrend,
  dayOfWeek,
  estimateTimezone,
  seasonOf,
} from './classifiers.js';
