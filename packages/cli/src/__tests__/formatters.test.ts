/**
 * Formatting utilities tests
 */

import type { EndgameStatsRecord, HistogramRow, ProbeReport, RenderMove } from '@tbx/core';
import { describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { createColorFns } from '../progress/colors.js';
import {
  formatConfigDisplay,
  formatDependencies,
  formatEndgameList,
  formatHistogramRows,
  formatMoveLine,
  formatProbeReport,
  formatStatsRecord,
} from '../progress/formatters.js';

const c = createColorFns(false);

function move(overrides: Partial<RenderMove> & Pick<RenderMove, 'uci' | 'san'>): RenderMove {
  return {
    fen: `after ${overrides.uci}`,
    category: 'winning',
    dtz: null,
    dtm: null,
    badge: 'Win',
    zeroing: false,
    checkmate: false,
    stalemate: false,
    insufficientMaterial: false,
    ...overrides,
  };
}

describe('formatMoveLine', () => {
  it('should align SAN, UCI and badge', () => {
    expect(formatMoveLine(move({ uci: 'a1a8', san: 'Ra8', badge: 'Win with DTZ 3' }), c)).toBe(
      '  Ra8     a1a8   Win with DTZ 3',
    );
  });

  it('should list terminal and zeroing flags', () => {
    const line = formatMoveLine(move({ uci: 'h1h8', san: 'Rh8#', badge: 'Checkmate', checkmate: true, zeroing: true }), c);
    expect(line).toBe('  Rh8#    h1h8   Checkmate [checkmate, zeroing]');
  });
});

describe('formatHistogramRows', () => {
  it('should draw bars, collapsed runs and the highlighted row', () => {
    const rows: HistogramRow[] = [
      { kind: 'active', ply: 0, width: 0, count: 0, highlighted: false },
      { kind: 'active', ply: 1, width: 100, count: 9, highlighted: true },
      { kind: 'empty', empty: 4 },
      { kind: 'active', ply: 6, width: 50, count: 3, highlighted: false },
    ];

    expect(formatHistogramRows(rows, c)).toEqual([
      '      0 ' + ' '.repeat(40) + ' 0',
      '      1 ' + '#'.repeat(40) + ' 9 <',
      '    ... 4 empty plies',
      '      6 ' + '#'.repeat(20) + ' '.repeat(20) + ' 3',
    ]);
  });

  it('should use the singular for a one-ply run', () => {
    expect(formatHistogramRows([{ kind: 'empty', empty: 1 }], c)).toEqual(['    ... 1 empty ply']);
  });
});

describe('formatProbeReport', () => {
  const report: ProbeReport = {
    fen: 'k7/8/1K6/8/8/8/8/7R w - - 0 1',
    turn: 'white',
    material: 'KRvK',
    normalizedMaterial: 'KRvK',
    status: 'win',
    frustrated: false,
    wdl: 2,
    winningSide: 'white',
    statusText: 'White is winning',
    illegal: false,
    insufficientMaterial: false,
    isTable: true,
    dependencies: [],
    winningMoves: [move({ uci: 'h1h8', san: 'Rh8#', badge: 'Checkmate', checkmate: true })],
    cursedMoves: [],
    drawingMoves: [move({ uci: 'h1b1', san: 'Rb1', category: 'drawing', badge: 'Stalemate', stalemate: true })],
    blessedMoves: [],
    losingMoves: [],
    unknownMoves: [],
    histogram: {
      materialSide: 'KR',
      materialOther: 'K',
      verb: 'winning',
      rows: [{ kind: 'active', ply: 1, width: 100, count: 2, highlighted: true }],
    },
  };

  it('should render status, moves by category and histogram', () => {
    expect(formatProbeReport(report, c).split('\n')).toEqual([
      'White is winning',
      '  FEN:      k7/8/1K6/8/8/8/8/7R w - - 0 1',
      '  Material: KRvK (White to move)',
      '  WDL:      2',
      '',
      'Winning moves (1):',
      '  Rh8#    h1h8   Checkmate [checkmate]',
      '',
      'Drawing moves (1):',
      '  Rb1     h1b1   Stalemate [stalemate]',
      '',
      'KR winning against K, positions by DTZ:',
      '      1 ' + '#'.repeat(40) + ' 2 <',
    ]);
  });

  it('should omit material and moves of illegal positions', () => {
    const illegal: ProbeReport = {
      ...report,
      fen: 'garbage',
      status: 'illegal',
      wdl: null,
      winningSide: null,
      statusText: 'Invalid position',
      illegal: true,
      isTable: false,
      winningMoves: [],
      drawingMoves: [],
    };
    delete illegal.histogram;

    expect(formatProbeReport(illegal, c).split('\n')).toEqual(['Invalid position', '  FEN:      garbage']);
  });

  it('should list dependencies', () => {
    const text = formatProbeReport({ ...report, dependencies: ['KNvK', 'KRvK'] }, c);
    expect(text.split('\n')).toContain('Requires: KNvK KRvK');
  });
});

describe('formatStatsRecord', () => {
  const record: EndgameStatsRecord = {
    material: 'KRvKN',
    counts: { white: 4, cursed: 0, draws: 4, blessed: 0, black: 2 },
    total: 12,
    percentages: { white: 33.3, cursed: 0, draws: 33.3, blessed: 0, black: 16.7 },
    longest: [
      {
        fen: '8/8/8/8/8/2k5/8/KRn5 w - - 0 1',
        ply: 33,
        wdl: 2,
        turn: 'white',
        frustrated: false,
        winner: 'white',
        label: 'KRvKN 1-0 in 33 plies',
      },
    ],
    files: { rtbw: { bytes: 4096, md5: 'test-md5' } },
    maximal: true,
    longestFen: '8/8/8/8/8/2k5/8/KRn5 w - - 0 1',
    warnings: [
      {
        code: 'inconsistent-counters',
        expectedTotal: 12,
        actualSum: 10,
        message: 'Result counters add up to 10, expected 12',
      },
    ],
  };

  it('should render buckets, longest phases, files and warnings', () => {
    expect(formatStatsRecord(record, c).split('\n')).toEqual([
      'KRvKN (maximal)',
      '  White wins' + ' '.repeat(21) + '4   33.3%',
      '  Frustrated wins' + ' '.repeat(16) + '0    0.0%',
      '  Draws' + ' '.repeat(26) + '4   33.3%',
      '  Frustrated losses' + ' '.repeat(14) + '0    0.0%',
      '  Black wins' + ' '.repeat(21) + '2   16.7%',
      '  Total' + ' '.repeat(25) + '12',
      '',
      'Longest phases:',
      '  KRvKN 1-0 in 33 plies',
      '    8/8/8/8/8/2k5/8/KRn5 w - - 0 1',
      '',
      'Table files:',
      '  rtbw  4.0 KiB  md5 test-md5',
      '',
      '⚠ Result counters add up to 10, expected 12',
    ]);
  });
});

describe('formatEndgameList', () => {
  it('should align names and mark maximal endgames', () => {
    const text = formatEndgameList(
      [
        { material: 'KQvK', pieceCount: 3, longestPly: 19, longestFen: null, maximal: false },
        { material: 'KRvKN', pieceCount: 4, longestPly: 120, longestFen: null, maximal: true },
      ],
      c,
    );

    expect(text.split('\n')).toEqual(['KQvK   3 pieces    19 plies', 'KRvKN  4 pieces   120 plies  maximal']);
  });

  it('should say when nothing matches', () => {
    expect(formatEndgameList([], c)).toBe('No endgames found');
  });
});

describe('formatDependencies', () => {
  it('should list one table per line', () => {
    expect(formatDependencies('KRvKN', ['KNvK', 'KRvK'], c)).toBe('KRvKN requires 2 tables:\n  KNvK\n  KRvK');
  });

  it('should handle endgames without dependencies', () => {
    expect(formatDependencies('KQvK', [], c)).toBe('KQvK: no dependencies');
  });
});

describe('formatConfigDisplay', () => {
  it('should show every section', () => {
    const lines = formatConfigDisplay(DEFAULT_CONFIG, c).split('\n');

    expect(lines).toContain('  Endpoint: localhost:50061');
    expect(lines).toContain('  Database: not set');
    expect(lines).toContain('  Empty run threshold: 5');
    expect(lines).toContain('  Format: text');
  });
});
