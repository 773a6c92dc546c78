/**
 * In-memory statistics store
 */

import type { RawEndgameStats, StatsStore } from '@tbx/types';

import { StatsFormatError } from '../errors.js';
import { normalizeDump } from '../schema/normalize-dump.js';
import { formatIssues, statsDumpSchema } from '../schema/stats-schema.js';

/**
 * Statistics store over an already parsed statistics dump
 *
 * Keys are normalized on construction, so a dump listing "KvKQ" is found
 * under "KQvK" with its colours swapped.
 */
export class MemoryStatsStore implements StatsStore {
  private readonly entries: Map<string, RawEndgameStats>;

  /**
   * @throws StatsFormatError if two keys name the same endgame
   */
  constructor(dump: Readonly<Record<string, RawEndgameStats>> = {}) {
    this.entries = normalizeDump(dump);
  }

  /**
   * Validate an untyped value (e.g. parsed JSON) and wrap it
   *
   * @throws StatsFormatError if the value is not a statistics dump
   */
  static fromJson(value: unknown): MemoryStatsStore {
    const parsed = statsDumpSchema.safeParse(value);
    if (!parsed.success) {
      throw new StatsFormatError('Invalid statistics dump', undefined, formatIssues(parsed.error));
    }
    return new MemoryStatsStore(parsed.data);
  }

  get(material: string): RawEndgameStats | undefined {
    return this.entries.get(material);
  }

  materials(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
