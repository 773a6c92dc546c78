/**
 * Tablebase result type definitions
 *
 * Probe values are always stated from an explicit perspective. A ProbeResult
 * attached to a move is from the point of view of the side that plays the move.
 * A PositionStatus is from the point of view of the side to move.
 */

// ============================================================================
// Outcome Types
// ============================================================================

/**
 * Side of the board
 */
export type Color = 'white' | 'black';

/**
 * Five-valued win/draw/loss (WDL50) scale
 *
 * -2 = loss, -1 = loss saved by the fifty-move rule (blessed loss),
 *  0 = draw, 1 = win prevented by the fifty-move rule (cursed win), 2 = win
 */
export type Wdl = -2 | -1 | 0 | 1 | 2;

/**
 * Outcome kinds that carry a distance to zeroing
 */
export type DecisiveOutcomeKind = 'win' | 'cursed-win' | 'blessed-loss' | 'loss';

/**
 * All outcome kinds, ordered from best to worst for the side they describe
 */
export type OutcomeKind = DecisiveOutcomeKind | 'draw';

/**
 * Game-theoretic outcome reported by a tablebase probe
 *
 * A draw carries no distance to zeroing, so `{ kind: 'draw', dtz: 12 }`
 * cannot be constructed.
 */
export type ProbeOutcome =
  | {
      readonly kind: DecisiveOutcomeKind;
      /** Signed DTZ (positive when winning), or null when undetermined */
      readonly dtz: number | null;
    }
  | { readonly kind: 'draw' };

/**
 * Probe data for one legal move (mover's perspective)
 */
export interface ProbeResult {
  readonly outcome: ProbeOutcome;
  /** Signed depth to mate, when the backend has DTM tables */
  readonly dtm: number | null;
  /** Whether the move itself resets the fifty-move counter (capture or pawn move) */
  readonly zeroing: boolean;
}

/**
 * Probe data keyed by move in UCI notation
 *
 * A missing key means no tablebase data for that move.
 */
export type ProbeTable = ReadonlyMap<string, ProbeResult>;

// ============================================================================
// Classification Types
// ============================================================================

/**
 * Category assigned to each legal move
 */
export type MoveCategory = 'winning' | 'cursed' | 'drawing' | 'blessed' | 'losing' | 'unknown';

/**
 * All move categories in display order
 */
export const MOVE_CATEGORIES: readonly MoveCategory[] = [
  'winning',
  'cursed',
  'drawing',
  'blessed',
  'losing',
  'unknown',
];

/**
 * Terminal status reported by the rules collaborator
 */
export type TerminalStatus = 'none' | 'checkmate' | 'stalemate' | 'insufficient-material';

/**
 * Resolved status kinds for a whole position
 */
export type PositionStatusKind =
  | 'illegal'
  | 'insufficient-material'
  | 'checkmate'
  | 'stalemate'
  | 'win'
  | 'draw'
  | 'loss'
  | 'cursed-win'
  | 'blessed-loss'
  | 'unknown';

/**
 * Resolved status of a position (side to move's perspective)
 */
export interface PositionStatus {
  readonly kind: PositionStatusKind;
  /** True exactly for cursed wins and blessed losses */
  readonly frustrated: boolean;
  /** WDL value for the side to move, null for illegal or unknown positions */
  readonly wdl: Wdl | null;
}

/**
 * A legal move as enumerated by the rules collaborator
 */
export interface LegalMove {
  /** Move in UCI notation (e.g. "e7e8q") */
  readonly uci: string;
  /** Move in Standard Algebraic Notation */
  readonly san: string;
  /** FEN of the successor position */
  readonly fen: string;
  /** Terminal status of the successor position */
  readonly terminal: TerminalStatus;
}

/**
 * Classification output for one legal move
 */
export interface RenderMove {
  readonly uci: string;
  readonly san: string;
  /** FEN of the successor position */
  readonly fen: string;
  readonly category: MoveCategory;
  /** DTZ badge value, null when hidden */
  readonly dtz: number | null;
  /** DTM badge value, null when hidden */
  readonly dtm: number | null;
  /** Short human-readable label */
  readonly badge: string;
  readonly zeroing: boolean;
  readonly checkmate: boolean;
  readonly stalemate: boolean;
  readonly insufficientMaterial: boolean;
}

/**
 * Legal moves partitioned by category, each list in enumeration order
 */
export interface CategorizedMoves {
  readonly winningMoves: readonly RenderMove[];
  readonly cursedMoves: readonly RenderMove[];
  readonly drawingMoves: readonly RenderMove[];
  readonly blessedMoves: readonly RenderMove[];
  readonly losingMoves: readonly RenderMove[];
  readonly unknownMoves: readonly RenderMove[];
}
