/**
 * Mock tablebase prober for testing
 *
 * Implements the probe capability consumed by ProbePipeline
 */

import { outcomeFromWdl } from '@tbx/core';
import type { ProbeResult, ProbeTable } from '@tbx/types';
import { vi } from 'vitest';

/**
 * Compact probe entry: [wdl, dtz?, dtm?], mover's perspective
 */
export type ProbeSpec = readonly [wdl: number, dtz?: number | null, dtm?: number | null];

export interface MockProberConfig {
  /** Predefined tables for specific FEN positions */
  responses?: Map<string, ProbeTable>;
  /** Simulate latency in milliseconds */
  latencyMs?: number;
  /** Simulate backend failures for specific FENs */
  failureFens?: Set<string>;
}

/**
 * Build a probe result from raw values
 */
export function probeResult(wdl: number, dtz: number | null = null, dtm: number | null = null, zeroing = false): ProbeResult {
  return { outcome: outcomeFromWdl(wdl, dtz), dtm, zeroing };
}

/**
 * Build a probe table from compact entries
 *
 * @example
 * ```typescript
 * probeTable({ b1b8: [2, 15], a1a2: [0] });
 * ```
 */
export function probeTable(entries: Record<string, ProbeSpec>): ProbeTable {
  return new Map(
    Object.entries(entries).map(([uci, [wdl, dtz, dtm]]): [string, ProbeResult] => [
      uci,
      probeResult(wdl, dtz ?? null, dtm ?? null),
    ]),
  );
}

/**
 * Create a mock prober; unknown positions resolve to an empty table
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockProber(config: MockProberConfig = {}) {
  const { responses = new Map<string, ProbeTable>(), latencyMs = 0, failureFens = new Set<string>() } =
    config;

  const probe = vi.fn(async (fen: string): Promise<ProbeTable> => {
    if (latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, latencyMs));
    }

    if (failureFens.has(fen)) {
      throw new Error(`Tablebase probe failed for position: ${fen}`);
    }

    return responses.get(fen) ?? new Map<string, ProbeResult>();
  });

  return {
    probe,
    // For test inspection
    responses,
    setResponse: (fen: string, table: ProbeTable): void => {
      responses.set(fen, table);
    },
  };
}

export type MockProber = ReturnType<typeof createMockProber>;
