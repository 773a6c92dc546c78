/**
 * Probe Pipeline
 *
 * Coordinates one position lookup:
 * 1. Parse the FEN
 * 2. Probe the legal moves (skipped for illegal and terminal positions)
 * 3. Build the report
 * 4. Attach the endgame histogram, when statistics are available, marking
 *    the row of the position's own DTZ
 */

import type { StatsAggregator } from '../stats/stats-aggregator.js';
import type { FenRulesCapability, ProbeCapability } from '../types/capabilities.js';
import type { ProbeTable } from '../types/tablebase.js';

import { buildProbeReport, positionDtz, type ProbeReport } from './probe-report.js';

/**
 * Progress callback
 */
export type ProgressCallback = (phase: 'parse' | 'probe' | 'report') => void;

const EMPTY_TABLE: ProbeTable = new Map();

/**
 * Position lookup pipeline
 */
export class ProbePipeline<P> {
  private rules: FenRulesCapability<P>;
  private prober: ProbeCapability;
  private stats?: StatsAggregator;
  private onProgress?: ProgressCallback;

  constructor(
    rules: FenRulesCapability<P>,
    prober: ProbeCapability,
    stats?: StatsAggregator,
    onProgress?: ProgressCallback,
  ) {
    this.rules = rules;
    this.prober = prober;
    if (stats !== undefined) {
      this.stats = stats;
    }
    if (onProgress !== undefined) {
      this.onProgress = onProgress;
    }
  }

  /**
   * Look up a position
   *
   * Backend failures propagate; missing data does not.
   */
  async run(fen: string): Promise<ProbeReport> {
    this.onProgress?.('parse');
    const position = this.rules.parse(fen);

    let probe = EMPTY_TABLE;
    if (this.needsProbe(position)) {
      this.onProgress?.('probe');
      probe = await this.prober.probe(fen);
    }

    this.onProgress?.('report');
    const report = buildProbeReport({ fen, position, rules: this.rules, probe });

    if (this.stats && report.isTable && report.winningSide !== null) {
      const histogram = this.stats.forPosition(
        report.material,
        report.turn,
        report.winningSide === report.turn,
        positionDtz(report),
      );
      if (histogram) {
        report.histogram = histogram;
      }
    }

    return report;
  }

  private needsProbe(position: P): boolean {
    return (
      this.rules.isLegal(position) &&
      this.rules.terminalStatus(position) === 'none' &&
      this.rules.legalMoves(position).length > 0
    );
  }
}
