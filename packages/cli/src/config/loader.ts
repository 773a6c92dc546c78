/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { existsSync } from 'node:fs';

import { cosmiconfig } from 'cosmiconfig';

import { ConfigError, resolveAbsolutePath } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, TbxConfig } from './schema.js';
import { validateConfig, validatePartialConfig, type PartialConfig } from './validation.js';

/**
 * Source environment, process.env by default
 */
export type Environment = Record<string, string | undefined>;

type ValueKind = 'string' | 'number' | 'boolean';

/**
 * Environment variable mapping
 * Maps env var names to config sections, keys and value kinds
 */
const ENV_VAR_MAP: Record<string, [section: keyof TbxConfig, key: string, kind: ValueKind]> = {
  TBX_PROBE_HOST: ['probe', 'host', 'string'],
  TBX_PROBE_PORT: ['probe', 'port', 'number'],
  TBX_PROBE_TIMEOUT: ['probe', 'timeoutMs', 'number'],
  TBX_STATS_DB: ['stats', 'dbPath', 'string'],
  TBX_STATS_JSON: ['stats', 'jsonPath', 'string'],
  TBX_EMPTY_RUN_THRESHOLD: ['histogram', 'emptyRunThreshold', 'number'],
  TBX_MIN_BAR_WIDTH: ['histogram', 'minBarWidth', 'number'],
  TBX_LOG_SCALE: ['histogram', 'logScale', 'boolean'],
  TBX_FORMAT: ['output', 'format', 'string'],
};

/**
 * Parse environment variable value based on expected type
 *
 * Unparsable numbers stay strings so validation reports them.
 */
function parseEnvValue(value: string, kind: ValueKind): unknown {
  if (kind === 'boolean') {
    return value.toLowerCase() === 'true' || value === '1';
  }
  if (kind === 'number') {
    const num = Number(value);
    return Number.isNaN(num) ? value : num;
  }
  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: Environment = process.env): PartialConfig {
  const config: Record<string, Record<string, unknown>> = {};

  for (const [envVar, [section, key, kind]] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      const target = (config[section] ??= {});
      target[key] = parseEnvValue(value, kind);
    }
  }

  return validatePartialConfig(config);
}

/**
 * Load configuration from config file using cosmiconfig
 *
 * Without an explicit path, a missing file is not an error.
 */
export async function loadConfigFile(configPath?: string): Promise<PartialConfig | null> {
  const explorer = cosmiconfig('tbx', {
    searchPlaces: [
      'package.json',
      '.tbxrc',
      '.tbxrc.json',
      '.tbxrc.yaml',
      '.tbxrc.yml',
      '.tbxrc.js',
      '.tbxrc.cjs',
      'tbx.config.js',
      'tbx.config.cjs',
    ],
  });

  if (configPath !== undefined && !existsSync(configPath)) {
    throw new ConfigError(
      `Config file not found: ${resolveAbsolutePath(configPath)}`,
      'Check the --config path, or omit it to search the current directory',
    );
  }

  const result = configPath !== undefined ? await explorer.load(configPath) : await explorer.search();
  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialConfig {
  const config: PartialConfig = {};

  if (options.host !== undefined || options.port !== undefined || options.timeout !== undefined) {
    config.probe = {
      host: options.host,
      port: options.port,
      timeoutMs: options.timeout,
    };
  }

  if (options.statsDb !== undefined || options.statsJson !== undefined) {
    config.stats = { dbPath: options.statsDb, jsonPath: options.statsJson };
  }

  if (options.format !== undefined || options.noColor !== undefined) {
    config.output = {
      format: options.format,
      color: options.noColor === true ? false : undefined,
    };
  }

  return config;
}

/**
 * Section with every key optional, as zod infers partial objects
 */
type PartialSection<T> = { [K in keyof T]?: T[K] | undefined };

/**
 * Shallow merge of one section; undefined source values keep the target's
 */
function mergeSection<T extends object>(target: T, source: PartialSection<T> | undefined): T {
  if (!source) {
    return { ...target };
  }
  const defined = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined),
  );
  return { ...target, ...defined };
}

/**
 * Merge a partial configuration over a complete one
 */
export function mergeConfig(target: TbxConfig, source: PartialConfig): TbxConfig {
  return {
    probe: mergeSection(target.probe, source.probe),
    stats: mergeSection(target.stats, source.stats),
    histogram: mergeSection(target.histogram, source.histogram),
    output: mergeSection(target.output, source.output),
  };
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: Environment = process.env,
): Promise<TbxConfig> {
  let config = mergeConfig(DEFAULT_CONFIG, {});

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig(env));
  config = mergeConfig(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: TbxConfig): string {
  return JSON.stringify(config, null, 2);
}
