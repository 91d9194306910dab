export { SqliteObservationStore } from './sqlite-store.js';
export type { ListRawOptions, Migration, SaveRunSummary } from './sqlite-store.js';
