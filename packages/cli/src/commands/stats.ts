/**
 * Stats command: aggregated statistics of one endgame
 */

import type { TbxConfig } from '../config/schema.js';
import { CliError } from '../errors/cli-errors.js';
import { formatStatsRecord } from '../progress/formatters.js';
import type { ColorFunctions } from '../progress/types.js';
import type { Services } from '../services.js';

import { parseMaterialArg, requireStats, toJson } from './shared.js';

export function runStats(
  input: string,
  config: TbxConfig,
  services: Services,
  colors: ColorFunctions,
): string {
  const material = parseMaterialArg(input);
  const record = requireStats(services).forMaterial(material);
  if (!record) {
    throw new CliError(`No statistics for ${material}`, "Run 'tbx endgames' to list known endgames");
  }
  return config.output.format === 'json' ? toJson(record) : formatStatsRecord(record, colors);
}
