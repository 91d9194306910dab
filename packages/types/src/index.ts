/**
 * Airshed shared types
 * Used by the pipeline package and by downstream storage/presentation code
 */

export type * from './observation.js';
export type * from './aggregate.js';
export type * from './fact.js';
export type * from './dimension.js';
export type * from './band.js';
