/**
 * Tablebase gRPC client implementation
 */

import { outcomeFromWdl } from '@tbx/core';
import type { ProbeCapability, ProbeResult, ProbeTable } from '@tbx/types';

import {
  healthCheckResponseSchema,
  probeResponseSchema,
  type MoveProbe,
  type ProbeRequest,
  type TablebaseHealthCheckResponse,
} from '../types/tablebase.js';

import { BaseGrpcClient, type ClientConfig } from './base.js';

/**
 * Default configuration for the tablebase client
 */
export const DEFAULT_TABLEBASE_CONFIG: ClientConfig = {
  host: 'localhost',
  port: 50061,
  timeoutMs: 10000,
};

function negate(value: number): number {
  return value === 0 ? 0 : -value;
}

/**
 * Convert one wire entry to the mover's point of view
 */
export function moveProbeToResult(move: MoveProbe): ProbeResult {
  return {
    outcome: outcomeFromWdl(negate(move.wdl), move.hasDtz ? negate(move.dtz) : null),
    dtm: move.hasDtm ? negate(move.dtm) : null,
    zeroing: move.zeroing,
  };
}

/**
 * Index wire entries by move; later duplicates win
 */
export function toProbeTable(moves: readonly MoveProbe[]): ProbeTable {
  return new Map(
    moves.map((move): [string, ProbeResult] => [move.uci.toLowerCase(), moveProbeToResult(move)]),
  );
}

/**
 * Client for a tablebase probing service
 *
 * @example
 * ```typescript
 * const client = new TablebaseClient({ host: 'tablebase.local' });
 * const table = await client.probe('8/8/8/8/8/2k5/8/KR6 w - - 0 1');
 * client.close();
 * ```
 */
export class TablebaseClient extends BaseGrpcClient implements ProbeCapability {
  constructor(config: Partial<ClientConfig> = {}) {
    super({
      ...DEFAULT_TABLEBASE_CONFIG,
      ...config,
    });
  }

  protected getProtoPath(): string {
    return 'tablebase.proto';
  }

  protected getServiceName(): string {
    return 'TablebaseService';
  }

  protected getPackageName(): string {
    return 'tbx.tablebase';
  }

  /**
   * Probe every legal move of a position
   *
   * Moves the service has no data for are missing from the table.
   *
   * @param fen - Position in FEN notation
   */
  async probe(fen: string): Promise<ProbeTable> {
    const response = await this.unaryCall<ProbeRequest, { moves: MoveProbe[] }>(
      'probe',
      { fen },
      probeResponseSchema,
    );
    return toProbeTable(response.moves);
  }

  /**
   * Check if the tablebase service is healthy
   */
  async healthCheck(): Promise<TablebaseHealthCheckResponse> {
    return this.unaryCall('healthCheck', {}, healthCheckResponseSchema);
  }
}
