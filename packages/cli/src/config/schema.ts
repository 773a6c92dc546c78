/**
 * Configuration schema types for the tbx CLI
 */

/**
 * Output format of every command
 */
export type OutputFormat = 'text' | 'json';

/**
 * Probe service endpoint
 */
export interface ProbeServiceConfig {
  /** Service host */
  host: string;
  /** Service port */
  port: number;
  /** Deadline per probe in milliseconds */
  timeoutMs: number;
}

/**
 * Statistics source; the database wins when both are set
 */
export interface StatsSourceConfig {
  /** SQLite database written by the stats loader */
  dbPath: string | null;
  /** Raw stats.json dump */
  jsonPath: string | null;
}

/**
 * Histogram display settings
 */
export interface HistogramConfigSchema {
  /** Runs of at least this many zero rows collapse into one marker */
  emptyRunThreshold: number;
  /** Minimum bar width in percent for nonzero rows */
  minBarWidth: number;
  /** Scale bars by log(count) instead of count */
  logScale: boolean;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Text for humans, JSON for scripts */
  format: OutputFormat;
  /** Colored text output */
  color: boolean;
}

/**
 * Complete tbx configuration
 */
export interface TbxConfig {
  probe: ProbeServiceConfig;
  stats: StatsSourceConfig;
  histogram: HistogramConfigSchema;
  output: OutputConfigSchema;
}

/**
 * CLI options from command line arguments
 */
export interface CliOptions {
  /** Path to config file */
  config?: string;
  /** Output format */
  format?: OutputFormat;
  /** Disable colored output */
  noColor?: boolean;
  /** Diagnostics on stderr */
  verbose?: boolean;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Probe service host */
  host?: string;
  /** Probe service port */
  port?: number;
  /** Probe deadline in milliseconds */
  timeout?: number;
  /** Statistics database path */
  statsDb?: string;
  /** Statistics dump path */
  statsJson?: string;
}
