/**
 * Fifty-move rule aware outcome semantics
 *
 * DTZ values follow the DTZ50'' convention of the Syzygy tables:
 * - 1 <= n <= 100: a zeroing move or checkmate can be forced in n or n + 1
 *   plies, and the result counts under the fifty-move rule.
 * - n > 100: winning in principle, but the conversion runs past the
 *   fifty-move line. The remaining distance is n - 100 or n + 1 - 100 plies.
 *
 * The n / n + 1 ambiguity comes from rounded tables and is passed through.
 */

import type {
  DecisiveOutcomeKind,
  OutcomeKind,
  ProbeOutcome,
  Wdl,
} from '../types/tablebase.js';

/**
 * Plies after which the fifty-move rule claims a draw
 */
export const FIFTY_MOVE_PLIES = 100;

/**
 * Outcome kinds from best to worst for the side they describe
 */
export const OUTCOME_RANK: Record<OutcomeKind, number> = {
  win: 4,
  'cursed-win': 3,
  draw: 2,
  'blessed-loss': 1,
  loss: 0,
};

const WDL_BY_KIND: Record<OutcomeKind, Wdl> = {
  win: 2,
  'cursed-win': 1,
  draw: 0,
  'blessed-loss': -1,
  loss: -2,
};

const NEGATED_KIND: Record<DecisiveOutcomeKind, DecisiveOutcomeKind> = {
  win: 'loss',
  'cursed-win': 'blessed-loss',
  'blessed-loss': 'cursed-win',
  loss: 'win',
};

/**
 * Possible range of remaining plies to a zeroing move or checkmate
 */
export interface PlyRange {
  min: number;
  max: number;
}

/**
 * Whether a DTZ magnitude lies beyond the fifty-move line
 */
export function isBeyondFiftyMoveRule(dtz: number): boolean {
  return Math.abs(dtz) > FIFTY_MOVE_PLIES;
}

/**
 * Usable DTZ: a finite nonzero number, otherwise null
 */
function usableDtz(dtz: number | null | undefined): number | null {
  return typeof dtz === 'number' && Number.isFinite(dtz) && dtz !== 0 ? dtz : null;
}

/**
 * Build an outcome from raw backend values
 *
 * When a DTZ is present its magnitude decides between a full and a
 * frustrated result; the raw WDL only contributes the side.
 *
 * @param wdl - Five-valued WDL (any sign convention agreeing with dtz)
 * @param dtz - Signed DTZ, or null/undefined when undetermined
 */
export function outcomeFromWdl(wdl: number, dtz?: number | null): ProbeOutcome {
  if (wdl === 0) {
    return { kind: 'draw' };
  }

  const winning = wdl > 0;
  const distance = usableDtz(dtz);

  let frustrated: boolean;
  if (distance !== null) {
    frustrated = isBeyondFiftyMoveRule(distance);
  } else {
    frustrated = Math.abs(wdl) === 1;
  }

  const kind: DecisiveOutcomeKind = winning
    ? frustrated
      ? 'cursed-win'
      : 'win'
    : frustrated
      ? 'blessed-loss'
      : 'loss';

  return { kind, dtz: distance === null ? null : winning ? Math.abs(distance) : -Math.abs(distance) };
}

/**
 * Kind of an outcome after applying the fifty-move threshold
 *
 * A variant carrying |dtz| > 100 is frustrated and one carrying
 * 1 <= |dtz| <= 100 is not, whatever kind it was built with.
 */
export function effectiveKind(outcome: ProbeOutcome): OutcomeKind {
  if (outcome.kind === 'draw') {
    return 'draw';
  }

  const distance = usableDtz(outcome.dtz);
  if (distance === null) {
    return outcome.kind;
  }

  const winning = outcome.kind === 'win' || outcome.kind === 'cursed-win';
  if (isBeyondFiftyMoveRule(distance)) {
    return winning ? 'cursed-win' : 'blessed-loss';
  }
  return winning ? 'win' : 'loss';
}

/**
 * Five-valued WDL of an outcome
 */
export function outcomeToWdl(outcome: ProbeOutcome): Wdl {
  return WDL_BY_KIND[effectiveKind(outcome)];
}

/**
 * Same outcome seen from the opponent
 */
export function negateOutcome(outcome: ProbeOutcome): ProbeOutcome {
  if (outcome.kind === 'draw') {
    return outcome;
  }
  return {
    kind: NEGATED_KIND[outcome.kind],
    dtz: outcome.dtz === null ? null : -outcome.dtz,
  };
}

/**
 * Remaining plies to a zeroing move or checkmate
 *
 * @returns Range [n, n + 1], shifted by 100 beyond the fifty-move line,
 *          or null for a zero or missing DTZ
 */
export function remainingPlies(dtz: number | null): PlyRange | null {
  const distance = usableDtz(dtz);
  if (distance === null) {
    return null;
  }

  const n = Math.abs(distance);
  const offset = n > FIFTY_MOVE_PLIES ? FIFTY_MOVE_PLIES : 0;
  return { min: n - offset, max: n + 1 - offset };
}

/**
 * Compare two outcome kinds for the side they describe
 *
 * @returns Positive when a is better than b
 */
export function compareOutcomes(a: OutcomeKind, b: OutcomeKind): number {
  return OUTCOME_RANK[a] - OUTCOME_RANK[b];
}
