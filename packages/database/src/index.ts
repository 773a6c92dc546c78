/**
 * @tbx/database - Endgame statistics storage
 *
 * This package provides:
 * - A SQLite client over an imported statistics database
 * - An in-memory store over a parsed stats.json dump
 * - The loader that imports a dump into SQLite
 */

export const VERSION = '0.1.0';

// Re-export clients
export { StatsClient, DEFAULT_STATS_CONFIG, type StatsClientConfig } from './clients/index.js';

export { MemoryStatsStore } from './stores/index.js';
export { normalizeDump, swapStatsColors } from './schema/normalize-dump.js';

// Re-export loader
export { loadStatsDatabase, readStatsDump, type LoadProgressCallback } from './loaders/stats-loader.js';

export {
  rawEndgameStatsSchema,
  statsDumpSchema,
  tableFileInfoSchema,
  type StatsDump,
} from './schema/stats-schema.js';

// Re-export errors
export {
  DatabaseError,
  DatabaseNotFoundError,
  QueryError,
  ConnectionError,
  StatsFormatError,
} from './errors.js';
