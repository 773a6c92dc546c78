/**
 * Material key exports
 */

export * from './material-key.js';
export * from './dependencies.js';
