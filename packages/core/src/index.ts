export * from './errors.js';
export * from './slot-finder.js';
export * from './summarize.js';
export * from './time-of-day.js';
export * from './zoned-day.js';
export type * from './types.js';
