/**
 * Service initialization for commands
 */

import { ChessRules } from '@tbx/chess';
import { StatsAggregator, type ProbeCapability, type StatsStore } from '@tbx/core';
import { MemoryStatsStore, readStatsDump, StatsClient } from '@tbx/database';
import { TablebaseClient } from '@tbx/grpc-client';

import type { TbxConfig } from './config/schema.js';
import type { Reporter } from './progress/reporter.js';

/**
 * Initialized services
 */
export interface Services {
  rules: ChessRules;
  prober: ProbeCapability;
  /** Null when no statistics source is configured */
  stats: StatsAggregator | null;
  /** Release connections and file handles */
  close(): void;
}

/**
 * Replacements for the configured backends (tests, embedding)
 */
export interface ServiceOverrides {
  prober?: ProbeCapability;
  store?: StatsStore;
}

/**
 * Statistics store from the configuration; the database wins over the dump
 */
function openStatsStore(config: TbxConfig, reporter?: Reporter): StatsClient | MemoryStatsStore | null {
  if (config.stats.dbPath !== null) {
    reporter?.debug(`statistics database ${config.stats.dbPath}`);
    return new StatsClient({ dbPath: config.stats.dbPath });
  }
  if (config.stats.jsonPath !== null) {
    reporter?.debug(`statistics dump ${config.stats.jsonPath}`);
    return new MemoryStatsStore(readStatsDump(config.stats.jsonPath));
  }
  return null;
}

/**
 * Create the services a command needs
 *
 * Connections are lazy: nothing is opened until first use.
 */
export function createServices(
  config: TbxConfig,
  reporter?: Reporter,
  overrides: ServiceOverrides = {},
): Services {
  const closers: Array<() => void> = [];

  let prober = overrides.prober;
  if (!prober) {
    reporter?.debug(`probe service ${config.probe.host}:${config.probe.port}`);
    const client = new TablebaseClient(config.probe);
    closers.push(() => client.close());
    prober = client;
  }

  let store: StatsStore | null = overrides.store ?? null;
  if (!store) {
    const opened = openStatsStore(config, reporter);
    if (opened instanceof StatsClient) {
      closers.push(() => opened.close());
    }
    store = opened;
  }

  return {
    rules: new ChessRules(),
    prober,
    stats: store ? new StatsAggregator(store, { histogram: config.histogram }) : null,
    close: () => {
      for (const close of closers) {
        close();
      }
    },
  };
}
