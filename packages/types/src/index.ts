/**
 * @tbx/types - Shared type definitions for the tablebase explorer
 *
 * This package provides a stable import location for types used across
 * multiple packages. Types are re-exported from their canonical sources.
 *
 * Usage:
 *   import type { ProbeResult, RenderMove } from '@tbx/types';
 *   import type { ProbeCapability, StatsStore } from '@tbx/types/services';
 *   import type { EndgameStatsRecord } from '@tbx/types/stats';
 */

// Re-export tablebase result types
export * from './tablebase/index.js';

// Re-export statistics types
export * from './stats/index.js';

// Re-export service contracts
export * from './services/index.js';
