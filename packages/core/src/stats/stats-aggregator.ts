/**
 * Statistics Aggregator
 *
 * Read-only view over a statistics store. Lookups normalize the material
 * key first; the store itself only knows normalized keys.
 */

import { buildMaterialKey, normalizeMaterial, parseMaterial, pieceCount } from '../material/material-key.js';
import type { StatsStore } from '../types/capabilities.js';
import type {
  EndgameStatsRecord,
  EndgameSummary,
  PositionHistogram,
  RawEndgameStats,
} from '../types/stats.js';
import type { Color } from '../types/tablebase.js';

import { aggregate, countsFromRaw, emptyCounts, extractLongest, histogramRows, longestOf, sumCounts } from './aggregate.js';
import { DEFAULT_HISTOGRAM_OPTIONS, mergeHistograms, type HistogramOptions } from './histogram.js';

/**
 * Aggregator configuration
 */
export interface StatsAggregatorOptions {
  histogram?: Partial<HistogramOptions>;
}

function opponent(color: Color): Color {
  return color === 'white' ? 'black' : 'white';
}

/**
 * Aggregates per-endgame statistics from a store
 *
 * @example
 * ```typescript
 * const stats = new StatsAggregator(store);
 * const record = stats.forMaterial('KNNvKRN'); // record.material === 'KRNvKNN'
 * ```
 */
export class StatsAggregator {
  private readonly store: StatsStore;
  private readonly histogramOptions: HistogramOptions;
  private maxPlyByPieces: Map<number, number> | null = null;

  constructor(store: StatsStore, options: StatsAggregatorOptions = {}) {
    this.store = store;
    this.histogramOptions = { ...DEFAULT_HISTOGRAM_OPTIONS, ...options.histogram };
  }

  /**
   * Aggregated record for an endgame class
   *
   * @param key - Material key in any side order
   * @returns Record, or null when the store has no entry
   */
  forMaterial(key: string): EndgameStatsRecord | null {
    const material = normalizeMaterial(key);
    const raw = this.store.get(material);
    if (!raw) {
      return null;
    }

    const counts = countsFromRaw(raw) ?? emptyCounts();
    const record = aggregate(counts, raw.total ?? sumCounts(counts), raw.histogram, {
      material,
      longest: raw.longest,
      files: this.files(raw),
      histogramOptions: this.histogramOptions,
    });
    record.maximal = this.isMaximal(material);
    return record;
  }

  /**
   * Histogram of the probed position's side to move
   *
   * The win histogram of a side joins its wins when to move and the
   * opponent's losses when the opponent is to move.
   *
   * @param key - Raw material key of the position, white first
   * @param turn - Side to move
   * @param winning - Whether the side to move wins
   * @param highlightPly - DTZ of the position, highlighted in the rows
   */
  forPosition(
    key: string,
    turn: Color,
    winning: boolean,
    highlightPly: number | null = null,
  ): PositionHistogram | null {
    const sides = parseMaterial(key.toUpperCase().replace('V', 'v'));
    if (!sides) {
      return null;
    }

    const rawKey = buildMaterialKey(sides.first, sides.second);
    const material = normalizeMaterial(rawKey);
    const histogram = this.store.get(material)?.histogram;
    if (!histogram) {
      return null;
    }

    // Stored colors follow the normalized key, which may list black first.
    const storeTurn = material === rawKey ? turn : opponent(turn);
    const side = histogram[storeTurn];
    const other = histogram[opponent(storeTurn)];
    const counts = winning
      ? mergeHistograms(side.win, other.loss)
      : mergeHistograms(side.loss, other.win);

    const white = parseMaterial(rawKey);
    return {
      materialSide: turn === 'white' ? (white?.first ?? '') : (white?.second ?? ''),
      materialOther: turn === 'white' ? (white?.second ?? '') : (white?.first ?? ''),
      verb: winning ? 'winning' : 'losing',
      rows: histogramRows(counts, this.histogramOptions, highlightPly),
    };
  }

  /**
   * Longest decisive phase of an endgame class in plies (0 when unknown)
   */
  longestPly(key: string): number {
    const material = normalizeMaterial(key);
    const raw = this.store.get(material);
    return raw ? (longestOf(extractLongest(material, raw.longest))?.ply ?? 0) : 0;
  }

  /**
   * Position of the longest decisive phase
   */
  longestFen(key: string): string | null {
    const material = normalizeMaterial(key);
    const raw = this.store.get(material);
    return raw ? (longestOf(extractLongest(material, raw.longest))?.fen ?? null) : null;
  }

  /**
   * Whether no endgame with the same number of pieces has a longer phase
   */
  isMaximal(key: string): boolean {
    const ply = this.longestPly(key);
    if (ply === 0) {
      return false;
    }
    return ply >= (this.maxPlyTable().get(pieceCount(normalizeMaterial(key))) ?? 0);
  }

  /**
   * All endgames in the store, by piece count then name
   *
   * @param pieces - Only endgames with this many pieces
   */
  endgames(pieces?: number): EndgameSummary[] {
    return this.store
      .materials()
      .map((material) => normalizeMaterial(material))
      .filter((material) => pieces === undefined || pieceCount(material) === pieces)
      .sort((a, b) => pieceCount(a) - pieceCount(b) || (a < b ? -1 : a > b ? 1 : 0))
      .map((material) => ({
        material,
        pieceCount: pieceCount(material),
        longestPly: this.longestPly(material),
        longestFen: this.longestFen(material),
        maximal: this.isMaximal(material),
      }));
  }

  private maxPlyTable(): Map<number, number> {
    if (this.maxPlyByPieces) {
      return this.maxPlyByPieces;
    }

    const table = new Map<number, number>();
    for (const material of this.store.materials()) {
      const pieces = pieceCount(material);
      table.set(pieces, Math.max(table.get(pieces) ?? 0, this.longestPly(material)));
    }
    this.maxPlyByPieces = table;
    return table;
  }

  private files(raw: RawEndgameStats): EndgameStatsRecord['files'] {
    if (!raw.rtbw && !raw.rtbz) {
      return undefined;
    }
    return {
      ...(raw.rtbw ? { rtbw: raw.rtbw } : {}),
      ...(raw.rtbz ? { rtbz: raw.rtbz } : {}),
    };
  }
}
