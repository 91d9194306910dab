export { reconcile } from './reconciler.js';
export type { ReconciliationResult } from './reconciler.js';
export { approximateDistanceMiles } from './distance.js';
