/**
 * Endgame statistics aggregation
 */

export * from './histogram.js';
export * from './aggregate.js';
export * from './stats-aggregator.js';
