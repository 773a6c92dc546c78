/**
 * FEN transformations for board navigation
 *
 * Plain string operations on the piece placement; none of them checks
 * legality. Missing fields default to "w - - 0 1".
 */

import type { Color } from '@tbx/types';

/**
 * The six FEN fields
 */
interface FenFields {
  placement: string;
  turn: 'w' | 'b';
  castling: string;
  enPassant: string;
  halfmove: string;
  fullmove: string;
}

/**
 * Alternative positions offered next to a probed position
 */
export interface PositionVariants {
  whiteFen: string;
  blackFen: string;
  swappedFen: string;
  horizontalFen: string;
  verticalFen: string;
  clearFen: string;
}

export const EMPTY_PLACEMENT = '8/8/8/8/8/8/8/8';

const CASTLING_ORDER = 'KQkq';

function splitFen(fen: string): FenFields {
  const [placement, turn, castling, enPassant, halfmove, fullmove] = fen
    .trim()
    .replace(/_/g, ' ')
    .split(/\s+/);
  return {
    placement: placement || EMPTY_PLACEMENT,
    turn: turn === 'b' ? 'b' : 'w',
    castling: castling ?? '-',
    enPassant: enPassant ?? '-',
    halfmove: halfmove ?? '0',
    fullmove: fullmove ?? '1',
  };
}

function joinFen(fields: FenFields): string {
  return [
    fields.placement,
    fields.turn,
    fields.castling || '-',
    fields.enPassant || '-',
    fields.halfmove,
    fields.fullmove,
  ].join(' ');
}

/**
 * Expand a placement rank ("3p4") to eight cells ("...p....")
 */
function expandRank(rank: string): string[] {
  const cells: string[] = [];
  for (const c of rank) {
    if (c >= '1' && c <= '8') {
      cells.push(...'.'.repeat(Number(c)));
    } else {
      cells.push(c);
    }
  }
  return cells;
}

function compressRank(cells: readonly string[]): string {
  let out = '';
  let empty = 0;
  for (const cell of cells) {
    if (cell === '.') {
      empty++;
      continue;
    }
    if (empty > 0) {
      out += String(empty);
      empty = 0;
    }
    out += cell;
  }
  return empty > 0 ? out + String(empty) : out;
}

function swapCase(text: string): string {
  return [...text]
    .map((c) => (c === c.toUpperCase() ? c.toLowerCase() : c.toUpperCase()))
    .join('');
}

function mirrorFile(square: string): string {
  const file = square.charCodeAt(0);
  if (square.length !== 2 || file < 97 || file > 104) {
    return '-';
  }
  return String.fromCharCode(97 + 104 - file) + square.slice(1);
}

/**
 * Same placement with the given side to move
 *
 * Clears the en passant square, which only the previous mover's pawn can create.
 */
export function withTurn(fen: string, turn: Color): string {
  const fields = splitFen(fen);
  return joinFen({ ...fields, turn: turn === 'white' ? 'w' : 'b', enPassant: '-' });
}

/**
 * Color-swapped equivalent: ranks flipped, piece colors and side to move swapped
 */
export function swapColors(fen: string): string {
  const fields = splitFen(fen);
  const placement = fields.placement.split('/').reverse().map(swapCase).join('/');
  const castling =
    fields.castling === '-'
      ? '-'
      : [...swapCase(fields.castling)]
          .sort((a, b) => CASTLING_ORDER.indexOf(a) - CASTLING_ORDER.indexOf(b))
          .join('');
  const enPassant =
    fields.enPassant === '-'
      ? '-'
      : fields.enPassant.replace(/[36]$/, (rank) => (rank === '3' ? '6' : '3'));

  return joinFen({
    ...fields,
    placement,
    turn: fields.turn === 'w' ? 'b' : 'w',
    castling,
    enPassant,
  });
}

/**
 * Files mirrored (a <-> h); castling rights are dropped
 */
export function mirrorHorizontal(fen: string): string {
  const fields = splitFen(fen);
  const placement = fields.placement
    .split('/')
    .map((rank) => compressRank(expandRank(rank).reverse()))
    .join('/');
  const enPassant = fields.enPassant === '-' ? '-' : mirrorFile(fields.enPassant);
  return joinFen({ ...fields, placement, castling: '-', enPassant });
}

/**
 * Ranks mirrored (1 <-> 8) keeping piece colors; castling and en passant are dropped
 */
export function mirrorVertical(fen: string): string {
  const fields = splitFen(fen);
  const placement = fields.placement.split('/').reverse().join('/');
  return joinFen({ ...fields, placement, castling: '-', enPassant: '-' });
}

/**
 * Empty board with the same side to move
 */
export function clearBoard(fen: string): string {
  const { turn } = splitFen(fen);
  return joinFen({
    placement: EMPTY_PLACEMENT,
    turn,
    castling: '-',
    enPassant: '-',
    halfmove: '0',
    fullmove: '1',
  });
}

/**
 * All navigation variants of a position
 */
export function positionVariants(fen: string): PositionVariants {
  return {
    whiteFen: withTurn(fen, 'white'),
    blackFen: withTurn(fen, 'black'),
    swappedFen: swapColors(fen),
    horizontalFen: mirrorHorizontal(fen),
    verticalFen: mirrorVertical(fen),
    clearFen: clearBoard(fen),
  };
}
