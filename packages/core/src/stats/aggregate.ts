/**
 * Endgame statistics aggregation
 *
 * Turns raw per-endgame counters into percentages, display histograms
 * and extremal positions. Inconsistent input is reported on the record,
 * never thrown.
 */

import type {
  EndgameCounts,
  EndgamePercentages,
  EndgameStatsRecord,
  LongestEntry,
  RawEndgameStats,
  RawLongestEntry,
  RawSideHistogram,
  SideHistogramRows,
  StatsWarning,
  TableFileInfo,
} from '../types/stats.js';
import type { Color } from '../types/tablebase.js';

import {
  compressHistogram,
  DEFAULT_HISTOGRAM_OPTIONS,
  hasData,
  logWeights,
  type HistogramOptions,
} from './histogram.js';

/**
 * Bucket keys in display order
 */
export const COUNT_KEYS: ReadonlyArray<keyof EndgameCounts> = [
  'white',
  'cursed',
  'draws',
  'blessed',
  'black',
];

/**
 * All-zero counters
 */
export function emptyCounts(): EndgameCounts {
  return { white: 0, cursed: 0, draws: 0, blessed: 0, black: 0 };
}

/**
 * Sum of the five buckets
 */
export function sumCounts(counts: EndgameCounts): number {
  return COUNT_KEYS.reduce((sum, key) => sum + counts[key], 0);
}

/**
 * Round a ratio to a percentage with one decimal
 */
export function roundPercentage(count: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Math.round((count / total) * 1000) / 10;
}

/**
 * Percentages of the total for each bucket (all 0 for an empty total)
 *
 * Rounded values need not add up to exactly 100.
 */
export function computePercentages(counts: EndgameCounts, total: number): EndgamePercentages {
  return {
    white: roundPercentage(counts.white, total),
    cursed: roundPercentage(counts.cursed, total),
    draws: roundPercentage(counts.draws, total),
    blessed: roundPercentage(counts.blessed, total),
    black: roundPercentage(counts.black, total),
  };
}

function wdlCount(side: RawSideHistogram, wdl: string): number {
  return side.wdl[wdl] ?? 0;
}

/**
 * Merge the WDL tables of both sides to move into the five buckets
 *
 * A white win is white to move winning or black to move losing, and so on.
 *
 * @returns Counters, or null when the entry has no histogram
 */
export function countsFromRaw(raw: RawEndgameStats): EndgameCounts | null {
  if (!raw.histogram) {
    return null;
  }
  const { white, black } = raw.histogram;
  return {
    white: wdlCount(white, '2') + wdlCount(black, '-2'),
    cursed: wdlCount(white, '1') + wdlCount(black, '-1'),
    draws: wdlCount(white, '0') + wdlCount(black, '0'),
    blessed: wdlCount(white, '-1') + wdlCount(black, '1'),
    black: wdlCount(white, '-2') + wdlCount(black, '2'),
  };
}

/**
 * Check that the buckets add up to the stated total
 */
export function checkCounters(counts: EndgameCounts, total: number): StatsWarning | null {
  const actualSum = sumCounts(counts);
  if (actualSum === total) {
    return null;
  }
  return {
    code: 'inconsistent-counters',
    expectedTotal: total,
    actualSum,
    message: `Result counters add up to ${actualSum}, expected ${total}`,
  };
}

function turnOfEpd(epd: string): Color | null {
  const turn = epd.trim().split(/\s+/)[1];
  if (turn === 'w') return 'white';
  if (turn === 'b') return 'black';
  return null;
}

/**
 * Full FEN of an EPD, with move counters added where missing
 */
function epdToFen(epd: string): string {
  const fields = epd.trim().split(/\s+/);
  const counters = ['0', '1'].slice(Math.max(fields.length - 4, 0));
  return [...fields, ...counters].join(' ');
}

function opponent(color: Color): Color {
  return color === 'white' ? 'black' : 'white';
}

/**
 * Pick the extremal positions of an endgame class
 *
 * At most one entry (the longest) per combination of side to move and
 * fifty-move limitation. Combinations without a decisive example are omitted.
 */
export function extractLongest(
  material: string,
  entries: readonly RawLongestEntry[],
): LongestEntry[] {
  const best = new Map<string, LongestEntry>();

  for (const entry of entries) {
    const turn = turnOfEpd(entry.epd);
    if (!turn || entry.wdl === 0 || !Number.isInteger(entry.ply) || entry.ply < 0) {
      continue;
    }

    const frustrated = Math.abs(entry.wdl) === 1;
    const winner = entry.wdl > 0 ? turn : opponent(turn);
    const key = `${turn}:${frustrated}`;
    const current = best.get(key);
    if (current && current.ply >= entry.ply) {
      continue;
    }

    const result = winner === 'white' ? '1-0' : '0-1';
    best.set(key, {
      fen: epdToFen(entry.epd),
      ply: entry.ply,
      wdl: entry.wdl,
      turn,
      frustrated,
      winner,
      label: `${material ? `${material} ` : ''}${result} in ${entry.ply} plies${frustrated ? ' (frustrated)' : ''}`,
    });
  }

  const order = ['white:false', 'white:true', 'black:false', 'black:true'];
  return order.flatMap((key) => {
    const entry = best.get(key);
    return entry ? [entry] : [];
  });
}

/**
 * Entry with the most plies, first one on ties
 */
export function longestOf(entries: readonly LongestEntry[]): LongestEntry | undefined {
  let best: LongestEntry | undefined;
  for (const entry of entries) {
    if (!best || entry.ply > best.ply) {
      best = entry;
    }
  }
  return best;
}

/**
 * Display rows for one series, empty when it has no data
 */
export function histogramRows(
  counts: readonly number[],
  options: HistogramOptions,
  highlightPly: number | null = null,
): ReturnType<typeof compressHistogram> {
  if (!hasData(counts)) {
    return [];
  }
  return compressHistogram(counts, {
    ...options,
    weights: options.logScale ? logWeights(counts) : counts,
    highlightPly,
  });
}

/**
 * Extra inputs of aggregate()
 */
export interface AggregateContext {
  /** Normalized material key */
  material?: string;
  longest?: readonly RawLongestEntry[];
  files?: { rtbw?: TableFileInfo; rtbz?: TableFileInfo } | undefined;
  histogramOptions?: Partial<HistogramOptions>;
}

/**
 * Aggregate raw counters into a statistics record
 *
 * @param counts - Five result buckets
 * @param total - Unique positions of the endgame class
 * @param histogram - Per side to move DTZ histograms, if available
 */
export function aggregate(
  counts: EndgameCounts,
  total: number,
  histogram?: Record<Color, RawSideHistogram>,
  context: AggregateContext = {},
): EndgameStatsRecord {
  const options: HistogramOptions = { ...DEFAULT_HISTOGRAM_OPTIONS, ...context.histogramOptions };
  const material = context.material ?? '';
  const warning = checkCounters(counts, total);

  const longest = extractLongest(material, context.longest ?? []);
  const record: EndgameStatsRecord = {
    material,
    counts: { ...counts },
    total,
    percentages: computePercentages(counts, total),
    longest,
    maximal: false,
    warnings: warning ? [warning] : [],
  };

  const top = longestOf(longest);
  if (top) {
    record.longestFen = top.fen;
  }

  if (histogram) {
    const side = (raw: RawSideHistogram): SideHistogramRows => ({
      win: histogramRows(raw.win, options),
      loss: histogramRows(raw.loss, options),
    });
    record.histogram = { white: side(histogram.white), black: side(histogram.black) };
  }

  if (context.files) {
    record.files = context.files;
  }

  return record;
}
