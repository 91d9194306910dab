export { assessDataQuality, validateObservationRecord } from './data-quality.js';
export type { DataQualityReport, RecordValidation } from './data-quality.js';
