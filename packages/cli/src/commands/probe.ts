/**
 * Probe command: classify the moves of a position
 */

import { ProbePipeline, probeReportToJson } from '@tbx/core';

import type { TbxConfig } from '../config/schema.js';
import { InputError } from '../errors/cli-errors.js';
import { formatProbeReport } from '../progress/formatters.js';
import type { Reporter } from '../progress/reporter.js';
import type { Services } from '../services.js';

import { toJson } from './shared.js';

/**
 * Probe a position and render the report
 *
 * Illegal positions are reported, not rejected; only an empty
 * argument is an input error.
 */
export async function runProbe(
  fen: string,
  config: TbxConfig,
  services: Services,
  reporter: Reporter,
): Promise<string> {
  if (fen.trim() === '') {
    throw new InputError('No position given', 'Pass a FEN, e.g. tbx probe "4k3/8/8/8/8/8/8/4K2R w - - 0 1"');
  }

  const pipeline = new ProbePipeline(
    services.rules,
    services.prober,
    services.stats ?? undefined,
    (phase) => reporter.startPhase(phase),
  );

  const report = await pipeline.run(fen.trim()).catch((error: unknown) => {
    reporter.fail();
    throw error;
  });
  reporter.complete();
  reporter.debug(`status ${report.status}, ${report.normalizedMaterial}`);

  return config.output.format === 'json'
    ? toJson(probeReportToJson(report))
    : formatProbeReport(report, reporter.colors);
}
