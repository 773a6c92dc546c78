/**
 * Tablebase service types
 * Matches definitions in services/protos/tablebase.proto
 */

import { z } from 'zod';

/**
 * Tablebase data for the position after one move, as sent on the wire
 *
 * Values are from the point of view of the side to move after the move.
 */
export const moveProbeSchema = z.object({
  uci: z.string(),
  wdl: z.number().int().min(-2).max(2),
  dtz: z.number().int(),
  hasDtz: z.boolean(),
  dtm: z.number().int(),
  hasDtm: z.boolean(),
  zeroing: z.boolean(),
});

export type MoveProbe = z.infer<typeof moveProbeSchema>;

export const probeResponseSchema = z.object({
  moves: z.array(moveProbeSchema),
});

export type ProbeResponse = z.infer<typeof probeResponseSchema>;

export const healthCheckResponseSchema = z.object({
  healthy: z.boolean(),
  version: z.string(),
  maxPieces: z.number().int(),
});

export type TablebaseHealthCheckResponse = z.infer<typeof healthCheckResponseSchema>;

/**
 * Request for probing a position
 */
export interface ProbeRequest {
  /** Position in FEN notation */
  fen: string;
}
