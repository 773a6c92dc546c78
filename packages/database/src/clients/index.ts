/**
 * Database client exports
 */

export { StatsClient, DEFAULT_STATS_CONFIG, type StatsClientConfig } from './stats.js';
