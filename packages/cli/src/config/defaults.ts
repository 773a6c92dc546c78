/**
 * Default configuration values
 */

import { DEFAULT_HISTOGRAM_OPTIONS } from '@tbx/core';

import type {
  HistogramConfigSchema,
  OutputConfigSchema,
  ProbeServiceConfig,
  StatsSourceConfig,
  TbxConfig,
} from './schema.js';

/**
 * Default probe service endpoint
 */
export const DEFAULT_PROBE_CONFIG: ProbeServiceConfig = {
  host: 'localhost',
  port: 50061,
  timeoutMs: 10000,
};

/**
 * No statistics source unless configured
 */
export const DEFAULT_STATS_CONFIG: StatsSourceConfig = {
  dbPath: null,
  jsonPath: null,
};

/**
 * Histogram display defaults, shared with the aggregator
 */
export const DEFAULT_HISTOGRAM_CONFIG: HistogramConfigSchema = { ...DEFAULT_HISTOGRAM_OPTIONS };

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  format: 'text',
  color: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: TbxConfig = {
  probe: DEFAULT_PROBE_CONFIG,
  stats: DEFAULT_STATS_CONFIG,
  histogram: DEFAULT_HISTOGRAM_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
