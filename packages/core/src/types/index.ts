/**
 * Type exports
 */

export * from './tablebase.js';
export * from './stats.js';
export * from './capabilities.js';
