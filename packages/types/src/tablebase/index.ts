/**
 * Tablebase result type exports
 *
 * Re-exports probe and classification types from @tbx/core.
 * This provides a stable import path from @tbx/types/tablebase.
 */

export type {
  // Outcomes
  Color,
  Wdl,
  DecisiveOutcomeKind,
  OutcomeKind,
  ProbeOutcome,
  ProbeResult,
  ProbeTable,
  // Moves
  LegalMove,
  MoveCategory,
  RenderMove,
  CategorizedMoves,
  // Position status
  TerminalStatus,
  PositionStatusKind,
  PositionStatus,
  // Reports
  ProbeReport,
  ProbeReportJson,
  RenderMoveJson,
} from '@tbx/core';
