/**
 * Rules capability on chess.js
 */

import type { Color, FenRulesCapability, LegalMove, TerminalStatus } from '@tbx/types';

import { ChessPosition, completeFen } from '../chess/position.js';
import { InvalidFenError } from '../errors.js';

/**
 * Handle passed to the core: a parsed position, or the reason it failed to parse
 */
export type RulesPosition =
  | { readonly valid: true; readonly fen: string; readonly position: ChessPosition }
  | { readonly valid: false; readonly fen: string; readonly error: string };

/**
 * Chess rules for the tablebase core
 *
 * Unparsable FENs become invalid handles, reported as illegal.
 */
export class ChessRules implements FenRulesCapability<RulesPosition> {
  parse(fen: string): RulesPosition {
    try {
      const position = ChessPosition.fromFen(fen);
      return { valid: true, fen: position.fen(), position };
    } catch (err) {
      if (err instanceof InvalidFenError) {
        return { valid: false, fen, error: err.message };
      }
      throw err;
    }
  }

  isLegal(handle: RulesPosition): boolean {
    return handle.valid && handle.position.isLegal();
  }

  legalMoves(handle: RulesPosition): readonly LegalMove[] {
    return this.isLegal(handle) && handle.valid ? handle.position.legalMoves() : [];
  }

  terminalStatus(handle: RulesPosition): TerminalStatus {
    return handle.valid ? handle.position.terminalStatus() : 'none';
  }

  isCheck(handle: RulesPosition): boolean {
    return handle.valid && handle.position.isCheck();
  }

  turn(handle: RulesPosition): Color {
    if (handle.valid) {
      return handle.position.turn();
    }
    return completeFen(handle.fen).split(' ')[1] === 'b' ? 'black' : 'white';
  }

  materialSignature(handle: RulesPosition): string {
    return handle.valid ? handle.position.materialSignature() : '';
  }
}
