/**
 * Move Classification
 *
 * Assigns every legal move exactly one category from its probe result.
 * Moves are never re-sorted: each list keeps the enumeration order of
 * the rules collaborator.
 */

import type {
  CategorizedMoves,
  LegalMove,
  MoveCategory,
  OutcomeKind,
  ProbeResult,
  ProbeTable,
  RenderMove,
} from '../types/tablebase.js';

import { effectiveKind } from './outcome-rules.js';

const CATEGORY_BY_KIND: Record<OutcomeKind, MoveCategory> = {
  win: 'winning',
  'cursed-win': 'cursed',
  draw: 'drawing',
  'blessed-loss': 'blessed',
  loss: 'losing',
};

const CATEGORY_LABEL: Record<MoveCategory, string> = {
  winning: 'Win',
  cursed: 'Cursed win',
  drawing: 'Draw',
  blessed: 'Blessed loss',
  losing: 'Loss',
  unknown: 'Unknown',
};

/**
 * Category of a probe result (mover's perspective)
 */
export function categorize(result: ProbeResult | undefined): MoveCategory {
  if (!result) {
    return 'unknown';
  }
  return CATEGORY_BY_KIND[effectiveKind(result.outcome)];
}

/**
 * Whether a category shows distance badges
 */
function showsDistance(category: MoveCategory): boolean {
  return category !== 'drawing' && category !== 'unknown';
}

/**
 * Distance shown to the user: zero and missing values carry no information
 */
function displayedDistance(value: number | null, category: MoveCategory): number | null {
  if (value === null || value === 0 || !showsDistance(category)) {
    return null;
  }
  return value;
}

/**
 * Short label for a classified move
 */
export function moveBadge(move: LegalMove, category: MoveCategory, result?: ProbeResult): string {
  switch (move.terminal) {
    case 'checkmate':
      return 'Checkmate';
    case 'stalemate':
      return 'Stalemate';
    case 'insufficient-material':
      return 'Insufficient material';
    case 'none':
      break;
  }

  if (!result || category === 'unknown') {
    return 'Unknown';
  }
  if (category === 'drawing') {
    return 'Draw';
  }
  if (result.zeroing) {
    return 'Zeroing';
  }

  const label = CATEGORY_LABEL[category];

  const dtz = result.outcome.kind === 'draw' ? null : result.outcome.dtz;
  return dtz ? `${label} with DTZ ${Math.abs(dtz)}` : label;
}

/**
 * Classify one legal move
 *
 * @param move - Legal move from the rules collaborator
 * @param result - Probe data for the move, if any
 */
export function classify(move: LegalMove, result?: ProbeResult): RenderMove {
  const category = categorize(result);
  const dtz = result && result.outcome.kind !== 'draw' ? result.outcome.dtz : null;

  return {
    uci: move.uci,
    san: move.san,
    fen: move.fen,
    category,
    dtz: displayedDistance(dtz, category),
    dtm: displayedDistance(result?.dtm ?? null, category),
    badge: moveBadge(move, category, result),
    zeroing: result?.zeroing ?? false,
    checkmate: move.terminal === 'checkmate',
    stalemate: move.terminal === 'stalemate',
    insufficientMaterial: move.terminal === 'insufficient-material',
  };
}

/**
 * Classify all legal moves and partition them by category
 */
export function classifyAll(moves: readonly LegalMove[], probe: ProbeTable): CategorizedMoves {
  const lists: Record<MoveCategory, RenderMove[]> = {
    winning: [],
    cursed: [],
    drawing: [],
    blessed: [],
    losing: [],
    unknown: [],
  };

  for (const move of moves) {
    const rendered = classify(move, probe.get(move.uci));
    lists[rendered.category].push(rendered);
  }

  return {
    winningMoves: lists.winning,
    cursedMoves: lists.cursed,
    drawingMoves: lists.drawing,
    blessedMoves: lists.blessed,
    losingMoves: lists.losing,
    unknownMoves: lists.unknown,
  };
}
