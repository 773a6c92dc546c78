/**
 * Endgames command: list endgames with their longest phases
 */

import { MAX_TABLE_PIECES } from '@tbx/core';

import type { TbxConfig } from '../config/schema.js';
import { InputError } from '../errors/cli-errors.js';
import { formatEndgameList } from '../progress/formatters.js';
import type { ColorFunctions } from '../progress/types.js';
import type { Services } from '../services.js';

import { requireStats, toJson } from './shared.js';

/**
 * List endgames, optionally only those with the given piece count
 */
export function runEndgames(
  pieces: number | undefined,
  config: TbxConfig,
  services: Services,
  colors: ColorFunctions,
): string {
  if (pieces !== undefined && (!Number.isInteger(pieces) || pieces < 3 || pieces > MAX_TABLE_PIECES)) {
    throw new InputError(`Invalid piece count: ${pieces}`, `Use a number from 3 to ${MAX_TABLE_PIECES}`);
  }
  const endgames = requireStats(services).endgames(pieces);
  return config.output.format === 'json' ? toJson(endgames) : formatEndgameList(endgames, colors);
}
