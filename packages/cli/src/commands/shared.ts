/**
 * Helpers shared by commands
 */

import { isTableMaterial, normalizeMaterial } from '@tbx/core';

import { ConfigError, InputError } from '../errors/cli-errors.js';
import type { Services } from '../services.js';

/**
 * Normalized material key of a command argument
 * @throws InputError if the key does not name a table endgame
 */
export function parseMaterialArg(input: string): string {
  const material = normalizeMaterial(input.trim());
  if (!isTableMaterial(material)) {
    throw new InputError(
      `Invalid material key: ${input}`,
      'Use piece letters for each side separated by "v", e.g. KRvKN',
    );
  }
  return material;
}

/**
 * Statistics aggregator of the services
 * @throws ConfigError if no statistics source is configured
 */
export function requireStats(services: Services): NonNullable<Services['stats']> {
  if (!services.stats) {
    throw new ConfigError(
      'No statistics source configured',
      'Pass --stats-db or --stats-json, or set TBX_STATS_DB or TBX_STATS_JSON',
    );
  }
  return services.stats;
}

/**
 * Pretty JSON for --format json
 */
export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
