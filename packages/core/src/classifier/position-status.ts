/**
 * Position Status Resolution
 *
 * Resolves a position to exactly one status, in priority order:
 * illegal, insufficient material, checkmate/stalemate, tablebase result.
 * Missing probe data degrades to 'unknown' and never raises.
 */

import type { RulesCapability } from '../types/capabilities.js';
import type {
  Color,
  OutcomeKind,
  PositionStatus,
  PositionStatusKind,
  ProbeOutcome,
  ProbeTable,
  Wdl,
} from '../types/tablebase.js';

import { compareOutcomes, effectiveKind } from './outcome-rules.js';

const STATUS_BY_KIND: Record<OutcomeKind, PositionStatusKind> = {
  win: 'win',
  'cursed-win': 'cursed-win',
  draw: 'draw',
  'blessed-loss': 'blessed-loss',
  loss: 'loss',
};

const WDL_BY_STATUS: Record<PositionStatusKind, Wdl | null> = {
  illegal: null,
  'insufficient-material': 0,
  checkmate: -2,
  stalemate: 0,
  win: 2,
  'cursed-win': 1,
  draw: 0,
  'blessed-loss': -1,
  loss: -2,
  unknown: null,
};

/**
 * Build a status value from its kind
 */
export function positionStatus(kind: PositionStatusKind): PositionStatus {
  return {
    kind,
    frustrated: kind === 'cursed-win' || kind === 'blessed-loss',
    wdl: WDL_BY_STATUS[kind],
  };
}

/**
 * Status from the outcomes of all legal moves (mover's perspective)
 *
 * A win on any move settles the position. Otherwise every move needs
 * data, since a move without data could still be better than the best known one.
 *
 * @param outcomes - One entry per legal move, undefined when not probed
 */
export function resolveFromOutcomes(
  outcomes: ReadonlyArray<ProbeOutcome | undefined>,
): PositionStatus {
  let best: OutcomeKind | null = null;
  let missing = false;

  for (const outcome of outcomes) {
    if (!outcome) {
      missing = true;
      continue;
    }
    const kind = effectiveKind(outcome);
    if (best === null || compareOutcomes(kind, best) > 0) {
      best = kind;
    }
  }

  if (best === 'win') {
    return positionStatus('win');
  }
  if (best === null || missing) {
    return positionStatus('unknown');
  }
  return positionStatus(STATUS_BY_KIND[best]);
}

/**
 * Resolve the status of a position
 *
 * @param position - Opaque position handle
 * @param rules - Rules collaborator for the handle type
 * @param probe - Probe data keyed by UCI move
 */
export function resolveStatus<P>(
  position: P,
  rules: RulesCapability<P>,
  probe: ProbeTable,
): PositionStatus {
  if (!rules.isLegal(position)) {
    return positionStatus('illegal');
  }

  const terminal = rules.terminalStatus(position);
  if (terminal === 'insufficient-material') {
    return positionStatus('insufficient-material');
  }

  const moves = rules.legalMoves(position);
  if (moves.length === 0 || terminal === 'checkmate' || terminal === 'stalemate') {
    return positionStatus(rules.isCheck(position) ? 'checkmate' : 'stalemate');
  }

  return resolveFromOutcomes(moves.map((move) => probe.get(move.uci)?.outcome));
}

function opponent(color: Color): Color {
  return color === 'white' ? 'black' : 'white';
}

function colorName(color: Color): string {
  return color === 'white' ? 'White' : 'Black';
}

/**
 * Side that wins the position, frustrated or not
 */
export function winningSide(status: PositionStatus, turn: Color): Color | null {
  switch (status.kind) {
    case 'win':
    case 'cursed-win':
      return turn;
    case 'loss':
    case 'blessed-loss':
    case 'checkmate':
      return opponent(turn);
    default:
      return null;
  }
}

/**
 * Headline describing a status
 */
export function statusText(status: PositionStatus, turn: Color): string {
  const winner = winningSide(status, turn);

  switch (status.kind) {
    case 'illegal':
      return 'Invalid position';
    case 'insufficient-material':
      return 'Draw by insufficient material';
    case 'checkmate':
      return `Checkmate. ${colorName(opponent(turn))} is victorious`;
    case 'stalemate':
      return 'Draw by stalemate';
    case 'draw':
      return 'Draw';
    case 'unknown':
      return 'Position not found in tablebases';
    default:
      break;
  }

  if (winner === null) {
    return 'Draw';
  }
  if (status.frustrated) {
    return `Win for ${colorName(winner)}, but drawn under the fifty-move rule`;
  }
  return `${colorName(winner)} is winning`;
}
