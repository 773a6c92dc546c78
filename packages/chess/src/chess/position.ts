import { Chess, type Color as ChessColor, type Square } from 'chess.js';

import { buildMaterialKey } from '@tbx/core';
import type { Color, LegalMove, TerminalStatus } from '@tbx/types';

import { InvalidFenError } from '../errors.js';

/**
 * Position shown when no FEN is given: lone kings
 */
export const DEFAULT_FEN = '4k3/8/8/8/8/8/8/4K3 w - - 0 1';

const MAX_PIECES_PER_SIDE = 16;
const MAX_PAWNS_PER_SIDE = 8;

/**
 * A piece on a square
 */
export interface PlacedPiece {
  square: Square;
  type: string;
  color: ChessColor;
}

/**
 * Complete a FEN or EPD to six fields
 *
 * Underscores are accepted in place of spaces, as in position URLs.
 */
export function completeFen(input: string): string {
  const fields = input.trim().replace(/_/g, ' ').split(/\s+/);
  if (fields.length === 4) {
    fields.push('0', '1');
  } else if (fields.length === 5) {
    fields.push('1');
  }
  return fields.join(' ');
}

function colorOf(color: ChessColor): Color {
  return color === 'w' ? 'white' : 'black';
}

/**
 * A chess position wrapper around chess.js
 *
 * Instances are never mutated after construction; moves are
 * played on a private copy.
 */
export class ChessPosition {
  private chess: Chess;
  private moveCache: LegalMove[] | null = null;

  constructor(fen: string = DEFAULT_FEN) {
    try {
      this.chess = new Chess(completeFen(fen));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidFenError(`Invalid FEN: ${fen} (${reason})`, fen);
    }
  }

  /**
   * Create a position from a FEN or EPD string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): ChessPosition {
    return new ChessPosition(fen);
  }

  /**
   * Get the current position as a FEN string
   */
  fen(): string {
    return this.chess.fen();
  }

  /**
   * Get whose turn it is
   */
  turn(): Color {
    return colorOf(this.chess.turn());
  }

  /**
   * Check if the current side is in check
   */
  isCheck(): boolean {
    return this.chess.isCheck();
  }

  /**
   * Check if the current side is checkmated
   */
  isCheckmate(): boolean {
    return this.chess.isCheckmate();
  }

  /**
   * Check if the position is stalemate
   */
  isStalemate(): boolean {
    return this.chess.isStalemate();
  }

  /**
   * Check if neither side can possibly checkmate
   */
  isInsufficientMaterial(): boolean {
    return this.chess.isInsufficientMaterial();
  }

  /**
   * Game-ending condition of the position, insufficient material first
   */
  terminalStatus(): TerminalStatus {
    return ChessPosition.terminalOf(this.chess);
  }

  private static terminalOf(chess: Chess): TerminalStatus {
    if (chess.isInsufficientMaterial()) return 'insufficient-material';
    if (chess.isCheckmate()) return 'checkmate';
    if (chess.isStalemate()) return 'stalemate';
    return 'none';
  }

  /**
   * Reasons why the position cannot arise in a game (empty when legal)
   *
   * chess.js accepts some placements that no game reaches, so these
   * checks run on top of its FEN validation.
   */
  legalityProblems(): string[] {
    const problems: string[] = [];
    const pieces = this.getAllPieces();

    for (const color of ['w', 'b'] as const) {
      const own = pieces.filter((piece) => piece.color === color);
      const name = color === 'w' ? 'White' : 'Black';
      const kings = own.filter((piece) => piece.type === 'k').length;
      if (kings !== 1) {
        problems.push(`${name} has ${kings} kings`);
      }
      if (own.length > MAX_PIECES_PER_SIDE) {
        problems.push(`${name} has more than ${MAX_PIECES_PER_SIDE} pieces`);
      }
      if (own.filter((piece) => piece.type === 'p').length > MAX_PAWNS_PER_SIDE) {
        problems.push(`${name} has more than ${MAX_PAWNS_PER_SIDE} pawns`);
      }
    }

    if (pieces.some((piece) => piece.type === 'p' && /[18]$/.test(piece.square))) {
      problems.push('Pawn on the first or last rank');
    }

    const mover = this.chess.turn();
    const waiting = pieces.find((piece) => piece.type === 'k' && piece.color !== mover);
    if (waiting && this.isSquareAttacked(waiting.square, mover)) {
      problems.push('The side not to move is in check');
    }

    return problems;
  }

  /**
   * Whether the position could arise in a legal game
   */
  isLegal(): boolean {
    return this.legalityProblems().length === 0;
  }

  /**
   * Legal moves in generation order, with their successor positions
   */
  legalMoves(): LegalMove[] {
    if (this.moveCache) {
      return this.moveCache;
    }

    const scratch = new Chess(this.chess.fen());
    const moves: LegalMove[] = [];

    for (const move of scratch.moves({ verbose: true })) {
      scratch.move(move.san);
      moves.push({
        uci: move.from + move.to + (move.promotion ?? ''),
        san: move.san,
        fen: scratch.fen(),
        terminal: ChessPosition.terminalOf(scratch),
      });
      scratch.undo();
    }

    this.moveCache = moves;
    return moves;
  }

  /**
   * Raw material signature, white first (e.g. "KRNvKNN")
   */
  materialSignature(): string {
    const letters = (color: ChessColor): string =>
      this.getAllPieces()
        .filter((piece) => piece.color === color)
        .map((piece) => piece.type)
        .join('');
    return buildMaterialKey(letters('w'), letters('b'));
  }

  /**
   * Check if a square is attacked by a specific color
   * @param square - Square in algebraic notation (e.g., "e4")
   * @param byColor - Color of the attacking side
   */
  isSquareAttacked(square: Square, byColor: ChessColor): boolean {
    return this.chess.isAttacked(square, byColor);
  }

  /**
   * Get all pieces on the board, from a8 to h1
   */
  getAllPieces(): PlacedPiece[] {
    const pieces: PlacedPiece[] = [];

    for (const row of this.chess.board()) {
      for (const piece of row) {
        if (piece) {
          pieces.push({ square: piece.square, type: piece.type, color: piece.color });
        }
      }
    }

    return pieces;
  }

}
