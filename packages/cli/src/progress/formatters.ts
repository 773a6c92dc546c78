/**
 * Output formatting utilities
 *
 * Plain text renderings of core results. Color is applied through the
 * given color functions, so tests pass createColorFns(false).
 */

import {
  formatBytes,
  MOVE_CATEGORIES,
  type EndgameStatsRecord,
  type EndgameSummary,
  type HistogramRow,
  type MoveCategory,
  type ProbeReport,
  type RenderMove,
  type TableFileInfo,
} from '@tbx/core';

import type { TbxConfig } from '../config/schema.js';

import type { ColorFn, ColorFunctions } from './types.js';

/**
 * Characters of a 100% histogram bar
 */
export const BAR_COLUMNS = 40;

const CATEGORY_TITLES: Record<MoveCategory, string> = {
  winning: 'Winning',
  cursed: 'Cursed (win, but fifty-move draw)',
  drawing: 'Drawing',
  blessed: 'Blessed (loss, but fifty-move draw)',
  losing: 'Losing',
  unknown: 'Unknown',
};

function categoryColor(category: MoveCategory, c: ColorFunctions): ColorFn {
  switch (category) {
    case 'winning':
      return c.green;
    case 'losing':
      return c.red;
    case 'cursed':
    case 'blessed':
      return c.yellow;
    default:
      return c.dim;
  }
}

function movesOf(report: ProbeReport, category: MoveCategory): readonly RenderMove[] {
  switch (category) {
    case 'winning':
      return report.winningMoves;
    case 'cursed':
      return report.cursedMoves;
    case 'drawing':
      return report.drawingMoves;
    case 'blessed':
      return report.blessedMoves;
    case 'losing':
      return report.losingMoves;
    case 'unknown':
      return report.unknownMoves;
  }
}

/**
 * Flags shown after a move badge
 */
function moveFlags(move: RenderMove): string[] {
  const flags: string[] = [];
  if (move.checkmate) flags.push('checkmate');
  if (move.stalemate) flags.push('stalemate');
  if (move.insufficientMaterial) flags.push('insufficient material');
  if (move.zeroing) flags.push('zeroing');
  return flags;
}

/**
 * One line per move: SAN, UCI and badge
 */
export function formatMoveLine(move: RenderMove, c: ColorFunctions): string {
  const flags = moveFlags(move);
  const suffix = flags.length > 0 ? c.dim(` [${flags.join(', ')}]`) : '';
  return `  ${move.san.padEnd(8)}${c.dim(move.uci.padEnd(7))}${categoryColor(move.category, c)(move.badge)}${suffix}`;
}

/**
 * Histogram rows as text bars
 *
 * Collapsed empty runs print as one marker line; the highlighted row
 * is flagged with an arrow.
 */
export function formatHistogramRows(rows: readonly HistogramRow[], c: ColorFunctions): string[] {
  return rows.map((row) => {
    if (row.kind === 'empty') {
      return c.dim(`  ${'...'.padStart(5)} ${row.empty} empty ${row.empty === 1 ? 'ply' : 'plies'}`);
    }
    const bar = '#'.repeat(Math.round((row.width / 100) * BAR_COLUMNS));
    const line = `  ${String(row.ply).padStart(5)} ${bar.padEnd(BAR_COLUMNS)} ${row.count}`;
    return row.highlighted ? c.cyan(`${line} <`) : line;
  });
}

/**
 * Full report of a probed position
 */
export function formatProbeReport(report: ProbeReport, c: ColorFunctions): string {
  const lines: string[] = [];
  const turn = report.turn === 'white' ? 'White' : 'Black';

  lines.push(c.bold(report.statusText));
  lines.push(`  FEN:      ${report.fen}`);
  if (!report.illegal) {
    lines.push(`  Material: ${report.normalizedMaterial} (${turn} to move)`);
  }
  if (report.wdl !== null) {
    lines.push(`  WDL:      ${report.wdl}`);
  }

  for (const category of MOVE_CATEGORIES) {
    const moves = movesOf(report, category);
    if (moves.length === 0) continue;
    lines.push('');
    lines.push(categoryColor(category, c)(`${CATEGORY_TITLES[category]} moves (${moves.length}):`));
    for (const move of moves) {
      lines.push(formatMoveLine(move, c));
    }
  }

  if (report.dependencies.length > 0) {
    lines.push('');
    lines.push(c.dim(`Requires: ${report.dependencies.join(' ')}`));
  }

  if (report.histogram) {
    const { materialSide, materialOther, verb, rows } = report.histogram;
    lines.push('');
    lines.push(c.bold(`${materialSide} ${verb} against ${materialOther}, positions by DTZ:`));
    lines.push(...formatHistogramRows(rows, c));
  }

  return lines.join('\n');
}

function formatFile(name: string, file: TableFileInfo | undefined): string | null {
  if (!file) return null;
  const checksum = file.md5 ? `  md5 ${file.md5}` : '';
  return `  ${name}  ${formatBytes(file.bytes)}${checksum}`;
}

/**
 * Aggregated statistics of one endgame
 */
export function formatStatsRecord(record: EndgameStatsRecord, c: ColorFunctions): string {
  const lines: string[] = [];
  const title = record.maximal ? `${record.material} ${c.magenta('(maximal)')}` : record.material;
  lines.push(c.bold(title));

  const buckets: Array<[label: string, count: number, percent: number, color: ColorFn]> = [
    ['White wins', record.counts.white, record.percentages.white, c.green],
    ['Frustrated wins', record.counts.cursed, record.percentages.cursed, c.yellow],
    ['Draws', record.counts.draws, record.percentages.draws, c.dim],
    ['Frustrated losses', record.counts.blessed, record.percentages.blessed, c.yellow],
    ['Black wins', record.counts.black, record.percentages.black, c.red],
  ];
  for (const [label, count, percent, color] of buckets) {
    lines.push(`  ${color(label.padEnd(18))}${String(count).padStart(14)}  ${percent.toFixed(1).padStart(5)}%`);
  }
  lines.push(`  ${'Total'.padEnd(18)}${String(record.total).padStart(14)}`);

  if (record.longest.length > 0) {
    lines.push('');
    lines.push('Longest phases:');
    for (const entry of record.longest) {
      lines.push(`  ${entry.label}`);
      lines.push(c.dim(`    ${entry.fen}`));
    }
  }

  const files = [formatFile('rtbw', record.files?.rtbw), formatFile('rtbz', record.files?.rtbz)].filter(
    (line): line is string => line !== null,
  );
  if (files.length > 0) {
    lines.push('');
    lines.push('Table files:');
    lines.push(...files);
  }

  for (const warning of record.warnings) {
    lines.push('');
    lines.push(c.yellow(`⚠ ${warning.message}`));
  }

  return lines.join('\n');
}

/**
 * Endgame listing, one per line
 */
export function formatEndgameList(endgames: readonly EndgameSummary[], c: ColorFunctions): string {
  if (endgames.length === 0) {
    return c.dim('No endgames found');
  }
  const width = Math.max(...endgames.map((entry) => entry.material.length));
  return endgames
    .map((entry) => {
      const line = `${entry.material.padEnd(width)}  ${entry.pieceCount} pieces  ${String(entry.longestPly).padStart(4)} plies`;
      return entry.maximal ? `${line}  ${c.magenta('maximal')}` : line;
    })
    .join('\n');
}

/**
 * Table dependencies of an endgame
 */
export function formatDependencies(material: string, dependencies: readonly string[], c: ColorFunctions): string {
  if (dependencies.length === 0) {
    return `${c.bold(material)}: no dependencies`;
  }
  return [`${c.bold(material)} requires ${dependencies.length} tables:`, ...dependencies.map((key) => `  ${key}`)].join(
    '\n',
  );
}

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: TbxConfig, c: ColorFunctions): string {
  const lines: string[] = [];
  const unset = c.yellow('not set');

  lines.push(c.bold('Configuration:'));
  lines.push('');

  lines.push(c.dim('Probe service:'));
  lines.push(`  Endpoint: ${config.probe.host}:${config.probe.port}`);
  lines.push(`  Timeout: ${config.probe.timeoutMs}ms`);
  lines.push('');

  lines.push(c.dim('Statistics:'));
  lines.push(`  Database: ${config.stats.dbPath ?? unset}`);
  lines.push(`  Dump: ${config.stats.jsonPath ?? unset}`);
  lines.push('');

  lines.push(c.dim('Histogram:'));
  lines.push(`  Empty run threshold: ${config.histogram.emptyRunThreshold}`);
  lines.push(`  Min bar width: ${config.histogram.minBarWidth}%`);
  lines.push(`  Log scale: ${config.histogram.logScale ? 'yes' : 'no'}`);
  lines.push('');

  lines.push(c.dim('Output:'));
  lines.push(`  Format: ${config.output.format}`);
  lines.push(`  Color: ${config.output.color ? 'yes' : 'no'}`);

  return lines.join('\n');
}
