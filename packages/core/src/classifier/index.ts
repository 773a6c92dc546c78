/**
 * Classification exports
 */

export * from './outcome-rules.js';
export * from './move-classifier.js';
export * from './position-status.js';
