/**
 * @tbx/core - Tablebase result interpretation
 *
 * This package contains the pure core:
 * - Material key normalization and table dependencies
 * - Fifty-move rule aware outcomes, position status and move classification
 * - Endgame statistics aggregation and histogram compression
 */

export const VERSION = '0.1.0';

// Re-export types
export * from './types/index.js';

// Re-export material keys
export * from './material/index.js';

// Re-export classifier utilities
export * from './classifier/index.js';

// Re-export statistics
export * from './stats/index.js';

// Re-export formatting
export * from './format/index.js';

// Re-export pipeline
export * from './pipeline/index.js';
