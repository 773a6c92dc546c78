/**
 * Endgame statistics type definitions
 */

import type { Color, Wdl } from './tablebase.js';

// ============================================================================
// Raw Store Types
// ============================================================================

/**
 * Size and checksums of one table file
 */
export interface TableFileInfo {
  /** File size in bytes */
  bytes: number;
  tbcheck?: string | undefined;
  md5?: string | undefined;
  sha1?: string | undefined;
  sha256?: string | undefined;
  sha512?: string | undefined;
  b2?: string | undefined;
  ipfs?: string | undefined;
}

/**
 * Candidate extremal position as stored in the statistics dump
 */
export interface RawLongestEntry {
  /** EPD (FEN without move counters) */
  epd: string;
  ply: number;
  /** WDL from the side to move of the EPD */
  wdl: Wdl;
}

/**
 * Histogram data for one side to move
 */
export interface RawSideHistogram {
  /** win[ply] = positions where the side to move wins with that DTZ */
  win: number[];
  /** loss[ply] = positions where the side to move loses with that DTZ */
  loss: number[];
  /** Number of positions for each WDL value, keyed "-2" .. "2" */
  wdl: Record<string, number>;
}

/**
 * One endgame entry of the machine readable statistics dump
 */
export interface RawEndgameStats {
  rtbw?: TableFileInfo | undefined;
  rtbz?: TableFileInfo | undefined;
  longest: RawLongestEntry[];
  histogram?: Record<Color, RawSideHistogram> | undefined;
  /** Unique positions, when the dump states it */
  total?: number | undefined;
}

// ============================================================================
// Aggregated Types
// ============================================================================

/**
 * Counters for the five result buckets
 *
 * cursed = frustrated white wins, blessed = frustrated black wins
 */
export interface EndgameCounts {
  white: number;
  cursed: number;
  draws: number;
  blessed: number;
  black: number;
}

/**
 * Percentages for the five result buckets (one decimal)
 */
export type EndgamePercentages = EndgameCounts;

/**
 * One displayable histogram row
 */
export type HistogramRow =
  | {
      readonly kind: 'active';
      readonly ply: number;
      /** Bar width in percent of the widest row */
      readonly width: number;
      readonly count: number;
      /** Row of the currently probed position */
      readonly highlighted: boolean;
    }
  | {
      readonly kind: 'empty';
      /** Number of consecutive zero rows represented by this marker */
      readonly empty: number;
    };

/**
 * Win and loss histograms for one side to move
 */
export interface SideHistogramRows {
  win: HistogramRow[];
  loss: HistogramRow[];
}

/**
 * Extremal position of an endgame class
 */
export interface LongestEntry {
  fen: string;
  ply: number;
  /** WDL from the side to move */
  wdl: Wdl;
  turn: Color;
  frustrated: boolean;
  winner: Color;
  label: string;
}

/**
 * Data-integrity warning surfaced by the aggregator
 */
export interface StatsWarning {
  code: 'inconsistent-counters';
  expectedTotal: number;
  actualSum: number;
  message: string;
}

/**
 * Aggregated statistics for one endgame class
 */
export interface EndgameStatsRecord {
  /** Normalized material key */
  material: string;
  counts: EndgameCounts;
  total: number;
  percentages: EndgamePercentages;
  longest: LongestEntry[];
  histogram?: Record<Color, SideHistogramRows>;
  files?: { rtbw?: TableFileInfo; rtbz?: TableFileInfo };
  /** Longest phase of all endgames with the same piece count */
  maximal: boolean;
  /** Position of the longest phase, if any */
  longestFen?: string;
  warnings: StatsWarning[];
}

/**
 * One line of the endgame listing
 */
export interface EndgameSummary {
  material: string;
  pieceCount: number;
  longestPly: number;
  longestFen: string | null;
  maximal: boolean;
}

/**
 * Histogram focused on the probed position
 */
export interface PositionHistogram {
  /** Pieces of the side to move, e.g. "KRN" */
  materialSide: string;
  /** Pieces of the other side, e.g. "KNN" */
  materialOther: string;
  verb: 'winning' | 'losing';
  rows: HistogramRow[];
}
