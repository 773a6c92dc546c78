/**
 * Collaborator contracts consumed by the core
 *
 * Implemented by @tbx/chess (rules), @tbx/grpc-client (probe)
 * and @tbx/database (stats), or by mocks in tests.
 */

import type { RawEndgameStats } from './stats.js';
import type { Color, LegalMove, ProbeTable, TerminalStatus } from './tablebase.js';

/**
 * Chess rules for an opaque position handle
 */
export interface RulesCapability<P> {
  /** Whether the position could arise in a legal game */
  isLegal(position: P): boolean;
  /** Legal moves in enumeration order */
  legalMoves(position: P): readonly LegalMove[];
  terminalStatus(position: P): TerminalStatus;
  /** Whether the side to move is in check */
  isCheck(position: P): boolean;
  turn(position: P): Color;
  /** Raw material signature, white pieces first (e.g. "KNNvKRN") */
  materialSignature(position: P): string;
}

/**
 * Rules capability that also reads positions from FEN
 *
 * parse() never throws: unreadable input yields a handle for which
 * isLegal() is false.
 */
export interface FenRulesCapability<P> extends RulesCapability<P> {
  parse(fen: string): P;
}

/**
 * Tablebase probing backend
 */
export interface ProbeCapability {
  /**
   * Probe all legal moves of a position
   *
   * Resolves to a partial or empty table when data is missing.
   */
  probe(fen: string): Promise<ProbeTable>;
}

/**
 * Read-only handle on precomputed per-endgame statistics
 */
export interface StatsStore {
  /** Raw statistics for a normalized material key */
  get(material: string): RawEndgameStats | undefined;
  /** All normalized material keys in the store */
  materials(): string[];
}
