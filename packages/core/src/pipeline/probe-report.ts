/**
 * Probe Report
 *
 * Combines position status, move classification and material data into
 * the result handed to presentation layers. Pure: probe data is fetched
 * by the caller (see ProbePipeline).
 */

import { classifyAll } from '../classifier/move-classifier.js';
import { resolveStatus, statusText, winningSide } from '../classifier/position-status.js';
import { tableDependencies } from '../material/dependencies.js';
import { isTableMaterial, normalizeMaterial } from '../material/material-key.js';
import type { RulesCapability } from '../types/capabilities.js';
import type { PositionHistogram } from '../types/stats.js';
import type {
  CategorizedMoves,
  Color,
  PositionStatusKind,
  ProbeTable,
  RenderMove,
  Wdl,
} from '../types/tablebase.js';

/**
 * Inputs of buildProbeReport()
 */
export interface ProbeReportInput<P> {
  /** FEN as entered */
  fen: string;
  /** Parsed position handle */
  position: P;
  rules: RulesCapability<P>;
  /** Probe data keyed by UCI move, possibly partial or empty */
  probe: ProbeTable;
}

/**
 * Everything known about a probed position
 */
export interface ProbeReport extends CategorizedMoves {
  fen: string;
  turn: Color;
  /** Material signature, white first */
  material: string;
  normalizedMaterial: string;
  status: PositionStatusKind;
  frustrated: boolean;
  /** WDL for the side to move, null when illegal or unknown */
  wdl: Wdl | null;
  winningSide: Color | null;
  statusText: string;
  illegal: boolean;
  insufficientMaterial: boolean;
  /** Whether the material has its own table files */
  isTable: boolean;
  dependencies: string[];
  histogram?: PositionHistogram;
}

const NO_MOVES: CategorizedMoves = {
  winningMoves: [],
  cursedMoves: [],
  drawingMoves: [],
  blessedMoves: [],
  losingMoves: [],
  unknownMoves: [],
};

/**
 * Build the report for one position
 *
 * Illegal positions classify no moves.
 */
export function buildProbeReport<P>(input: ProbeReportInput<P>): ProbeReport {
  const { fen, position, rules, probe } = input;

  const status = resolveStatus(position, rules, probe);
  const illegal = status.kind === 'illegal';
  const turn = rules.turn(position);
  const material = rules.materialSignature(position);
  const normalizedMaterial = normalizeMaterial(material);
  const isTable = !illegal && isTableMaterial(normalizedMaterial);

  const moves = illegal ? NO_MOVES : classifyAll(rules.legalMoves(position), probe);

  return {
    fen,
    turn,
    material,
    normalizedMaterial,
    status: status.kind,
    frustrated: status.frustrated,
    wdl: status.wdl,
    winningSide: winningSide(status, turn),
    statusText: statusText(status, turn),
    illegal,
    insufficientMaterial: status.kind === 'insufficient-material',
    isTable,
    dependencies: isTable ? tableDependencies(normalizedMaterial) : [],
    winningMoves: [...moves.winningMoves],
    cursedMoves: [...moves.cursedMoves],
    drawingMoves: [...moves.drawingMoves],
    blessedMoves: [...moves.blessedMoves],
    losingMoves: [...moves.losingMoves],
    unknownMoves: [...moves.unknownMoves],
  };
}

/**
 * DTZ of the probed position in plies, derived from its best move
 *
 * A zeroing or mating move takes one ply; any other move one more than
 * the distance it leaves. Winning sides take their shortest phase, losing
 * sides their longest.
 *
 * @returns Distance, or null for drawn, unknown and terminal positions
 */
export function positionDtz(report: ProbeReport): number | null {
  const candidates: Partial<Record<PositionStatusKind, readonly RenderMove[]>> = {
    win: report.winningMoves,
    'cursed-win': report.cursedMoves,
    'blessed-loss': report.blessedMoves,
    loss: report.losingMoves,
  };
  const moves = candidates[report.status];
  if (!moves) {
    return null;
  }

  const distances = moves.flatMap((move) => {
    if (move.zeroing || move.checkmate) {
      return [1];
    }
    return move.dtz === null ? [] : [Math.abs(move.dtz) + 1];
  });
  if (distances.length === 0) {
    return null;
  }

  const winning = report.status === 'win' || report.status === 'cursed-win';
  return winning ? Math.min(...distances) : Math.max(...distances);
}

/**
 * Serialized move
 */
export interface RenderMoveJson {
  uci: string;
  san: string;
  fen: string;
  category: string;
  dtz: number | null;
  dtm: number | null;
  badge: string;
  zeroing: boolean;
  checkmate: boolean;
  stalemate: boolean;
  insufficient_material: boolean;
}

/**
 * Serialized report
 */
export interface ProbeReportJson {
  fen: string;
  turn: Color;
  material: string;
  status: PositionStatusKind;
  frustrated: boolean;
  wdl: Wdl | null;
  winningMoves: RenderMoveJson[];
  cursedMoves: RenderMoveJson[];
  drawingMoves: RenderMoveJson[];
  blessedMoves: RenderMoveJson[];
  losingMoves: RenderMoveJson[];
  unknownMoves: RenderMoveJson[];
  dependencies: string[];
  histogram?: PositionHistogram;
}

function moveToJson(move: RenderMove): RenderMoveJson {
  return {
    uci: move.uci,
    san: move.san,
    fen: move.fen,
    category: move.category,
    dtz: move.dtz,
    dtm: move.dtm,
    badge: move.badge,
    zeroing: move.zeroing,
    checkmate: move.checkmate,
    stalemate: move.stalemate,
    insufficient_material: move.insufficientMaterial,
  };
}

/**
 * Plain object for JSON output
 */
export function probeReportToJson(report: ProbeReport): ProbeReportJson {
  const json: ProbeReportJson = {
    fen: report.fen,
    turn: report.turn,
    material: report.normalizedMaterial,
    status: report.status,
    frustrated: report.frustrated,
    wdl: report.wdl,
    winningMoves: report.winningMoves.map(moveToJson),
    cursedMoves: report.cursedMoves.map(moveToJson),
    drawingMoves: report.drawingMoves.map(moveToJson),
    blessedMoves: report.blessedMoves.map(moveToJson),
    losingMoves: report.losingMoves.map(moveToJson),
    unknownMoves: report.unknownMoves.map(moveToJson),
    dependencies: report.dependencies,
  };
  if (report.histogram) {
    json.histogram = report.histogram;
  }
  return json;
}
