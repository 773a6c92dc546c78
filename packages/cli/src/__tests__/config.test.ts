/**
 * Configuration system tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterAll, beforeAll, describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { loadConfig, loadEnvConfig, mapCliToConfig, mergeConfig } from '../config/loader.js';
import {
  validateConfig,
  validatePartialConfig,
  ConfigValidationError,
} from '../config/validation.js';
import { ConfigError } from '../errors/cli-errors.js';

describe('Config Defaults', () => {
  it('should have valid default probe endpoint', () => {
    expect(DEFAULT_CONFIG.probe).toEqual({ host: 'localhost', port: 50061, timeoutMs: 10000 });
  });

  it('should have no statistics source', () => {
    expect(DEFAULT_CONFIG.stats).toEqual({ dbPath: null, jsonPath: null });
  });

  it('should share histogram defaults with the aggregator', () => {
    expect(DEFAULT_CONFIG.histogram).toEqual({ emptyRunThreshold: 5, minBarWidth: 1, logScale: true });
  });

  it('should print colored text by default', () => {
    expect(DEFAULT_CONFIG.output).toEqual({ format: 'text', color: true });
  });
});

describe('Config Validation', () => {
  it('should accept the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
  });

  it('should reject an out of range port', () => {
    const config = { ...DEFAULT_CONFIG, probe: { ...DEFAULT_CONFIG.probe, port: 70000 } };

    try {
      validateConfig(config);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.errors.map((e) => e.path)).toEqual(['probe.port']);
      }
    }
  });

  it('should reject a negative bar width', () => {
    const config = { ...DEFAULT_CONFIG, histogram: { ...DEFAULT_CONFIG.histogram, minBarWidth: -1 } };
    expect(() => validateConfig(config)).toThrow(ConfigValidationError);
  });

  it('should accept partial sections', () => {
    expect(validatePartialConfig({ output: { format: 'json' } })).toEqual({ output: { format: 'json' } });
  });

  it('should reject an unknown format in partial config', () => {
    expect(() => validatePartialConfig({ output: { format: 'xml' } })).toThrow(ConfigValidationError);
  });

  it('should format errors with hints', () => {
    const error = new ConfigValidationError([{ path: 'probe.port', message: 'Expected number' }]);

    expect(error.format().split('\n')).toEqual([
      'Configuration validation failed:',
      '',
      '  probe.port: Expected number',
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ]);
  });
});

describe('Config Sources', () => {
  it('should read typed values from the environment', () => {
    const env = { TBX_PROBE_PORT: '6000', TBX_FORMAT: 'json', TBX_LOG_SCALE: 'false', TBX_STATS_DB: '' };

    expect(loadEnvConfig(env)).toEqual({
      probe: { port: 6000 },
      histogram: { logScale: false },
      output: { format: 'json' },
    });
  });

  it('should reject unparsable numbers from the environment', () => {
    expect(() => loadEnvConfig({ TBX_PROBE_PORT: 'abc' })).toThrow(ConfigValidationError);
  });

  it('should map CLI options to sections', () => {
    expect(mapCliToConfig({ port: 7000, noColor: true, statsJson: 'stats.json' })).toEqual({
      probe: { port: 7000 },
      stats: { jsonPath: 'stats.json' },
      output: { color: false },
    });
    expect(mapCliToConfig({ verbose: true })).toEqual({});
  });

  it('should keep target values for undefined source values', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { probe: { host: undefined, port: 6001 } });

    expect(merged.probe).toEqual({ host: 'localhost', port: 6001, timeoutMs: 10000 });
    expect(DEFAULT_CONFIG.probe.port).toBe(50061);
  });
});

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;
  let invalidPath: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tbx-config-'));
    configPath = path.join(dir, 'tbx.config.json');
    invalidPath = path.join(dir, 'invalid.json');
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        probe: { host: 'file-host', port: 6001 },
        histogram: { minBarWidth: 2 },
      }),
    );
    fs.writeFileSync(invalidPath, JSON.stringify({ output: { format: 'xml' } }));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should apply file, then environment, then CLI options', async () => {
    const config = await loadConfig(
      { config: configPath, host: 'cli-host' },
      { TBX_PROBE_PORT: '6002', TBX_FORMAT: 'json' },
    );

    expect(config.probe).toEqual({ host: 'cli-host', port: 6002, timeoutMs: 10000 });
    expect(config.histogram).toEqual({ emptyRunThreshold: 5, minBarWidth: 2, logScale: true });
    expect(config.output).toEqual({ format: 'json', color: true });
  });

  it('should let CLI options override the environment', async () => {
    const config = await loadConfig({ config: configPath, format: 'text', noColor: true }, { TBX_FORMAT: 'json' });

    expect(config.output).toEqual({ format: 'text', color: false });
  });

  it('should fail for a missing explicit config file', async () => {
    await expect(loadConfig({ config: path.join(dir, 'missing.json') }, {})).rejects.toThrow(ConfigError);
  });

  it('should validate the config file', async () => {
    await expect(loadConfig({ config: invalidPath }, {})).rejects.toThrow(ConfigValidationError);
  });
});
