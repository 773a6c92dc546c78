/**
 * @tbx/chess - Chess rules for the tablebase explorer
 *
 * This package handles:
 * - FEN and EPD parsing on chess.js
 * - Legality checks beyond FEN syntax
 * - Legal moves with successor positions and terminal flags
 * - Board transformations (swap colors, mirror, clear)
 */

export const VERSION = '0.1.0';

// Re-export chess position utilities
export { ChessPosition, DEFAULT_FEN, completeFen } from './chess/position.js';
export type { PlacedPiece } from './chess/position.js';

// Re-export board transformations
export {
  withTurn,
  swapColors,
  mirrorHorizontal,
  mirrorVertical,
  clearBoard,
  positionVariants,
  EMPTY_PLACEMENT,
} from './chess/fen-transforms.js';
export type { PositionVariants } from './chess/fen-transforms.js';

// Re-export rules capability
export { ChessRules } from './rules/chess-rules.js';
export type { RulesPosition } from './rules/chess-rules.js';

// Re-export error types
export { InvalidFenError } from './errors.js';
