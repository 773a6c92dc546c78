/**
 * Histogram row compression
 *
 * Maps per-ply counts to display rows: linear bar widths relative to the
 * widest row, and long runs of empty plies collapsed into one marker.
 * Log scaling is the caller's business (see logWeights()).
 */

import type { HistogramRow } from '../types/stats.js';

/**
 * Display policy for histograms
 */
export interface HistogramOptions {
  /** Zero runs longer than this collapse into one marker; shorter runs are listed */
  emptyRunThreshold: number;
  /** Minimum width (percent) of a bar with a nonzero count */
  minBarWidth: number;
  /** Whether aggregators scale bars by log(count) */
  logScale: boolean;
}

export const DEFAULT_HISTOGRAM_OPTIONS: HistogramOptions = {
  emptyRunThreshold: 5,
  minBarWidth: 1,
  logScale: true,
};

/**
 * Per-call options for compressHistogram()
 */
export interface CompressOptions extends Partial<HistogramOptions> {
  /** Bar weights parallel to the counts (default: the counts) */
  weights?: readonly number[];
  /** Ply to mark as highlighted */
  highlightPly?: number | null;
}

/**
 * Natural-log weights, 0 for empty plies
 */
export function logWeights(counts: readonly number[]): number[] {
  return counts.map((count) => (count > 0 ? Math.log(count) : 0));
}

/**
 * Element-wise sum, padding the shorter series with zeros
 */
export function mergeHistograms(a: readonly number[], b: readonly number[]): number[] {
  const length = Math.max(a.length, b.length);
  const merged: number[] = [];
  for (let i = 0; i < length; i++) {
    merged.push((a[i] ?? 0) + (b[i] ?? 0));
  }
  return merged;
}

/**
 * Whether a series has any nonzero count
 */
export function hasData(counts: readonly number[]): boolean {
  return counts.some((count) => count > 0);
}

/**
 * Compress a per-ply series into display rows
 *
 * Every ply index appears exactly once: either as its own row or inside
 * an empty-run marker. A run holding the highlighted ply is never collapsed.
 *
 * @param counts - counts[ply], ascending ply
 */
export function compressHistogram(
  counts: readonly number[],
  options: CompressOptions = {},
): HistogramRow[] {
  const threshold = options.emptyRunThreshold ?? DEFAULT_HISTOGRAM_OPTIONS.emptyRunThreshold;
  const minBarWidth = options.minBarWidth ?? DEFAULT_HISTOGRAM_OPTIONS.minBarWidth;
  const weights = options.weights ?? counts;
  const highlightPly = options.highlightPly ?? null;

  let maxWeight = 0;
  counts.forEach((count, ply) => {
    if (count > 0) {
      maxWeight = Math.max(maxWeight, weights[ply] ?? 0);
    }
  });

  const width = (weight: number): number => {
    if (weight >= maxWeight) {
      return 100;
    }
    return Math.max(Math.round((weight / maxWeight) * 1000) / 10, minBarWidth);
  };

  const rows: HistogramRow[] = [];
  let run = 0;

  const flush = (end: number): void => {
    if (run === 0) {
      return;
    }
    const start = end - run;
    const holdsHighlight = highlightPly !== null && highlightPly >= start && highlightPly < end;
    if (run > threshold && !holdsHighlight) {
      rows.push({ kind: 'empty', empty: run });
    } else {
      for (let ply = start; ply < end; ply++) {
        rows.push({ kind: 'active', ply, width: 0, count: 0, highlighted: ply === highlightPly });
      }
    }
    run = 0;
  };

  counts.forEach((count, ply) => {
    if (count <= 0) {
      run++;
      return;
    }
    flush(ply);
    rows.push({
      kind: 'active',
      ply,
      width: width(weights[ply] ?? 0),
      count,
      highlighted: ply === highlightPly,
    });
  });
  flush(counts.length);

  return rows;
}
