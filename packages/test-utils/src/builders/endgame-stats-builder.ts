/**
 * Fluent builder for raw endgame statistics
 */

import type {
  Color,
  RawEndgameStats,
  RawLongestEntry,
  RawSideHistogram,
  StatsStore,
  TableFileInfo,
  Wdl,
} from '@tbx/types';

function emptySide(): RawSideHistogram {
  return { win: [], loss: [], wdl: {} };
}

/**
 * Builder for one statistics dump entry
 *
 * @example
 * ```typescript
 * const stats = endgameStats()
 *   .longest('8/8/8/8/8/2k5/8/KR6 b - -', 32, -2)
 *   .wins('white', [0, 4, 8])
 *   .build();
 * ```
 */
export class EndgameStatsBuilder {
  private readonly entries: RawLongestEntry[] = [];
  private histogram: Record<Color, RawSideHistogram> | null = null;
  private readonly files: { rtbw?: TableFileInfo; rtbz?: TableFileInfo } = {};
  private totalCount: number | null = null;

  longest(epd: string, ply: number, wdl: Wdl): this {
    this.entries.push({ epd, ply, wdl });
    return this;
  }

  wins(side: Color, counts: number[]): this {
    this.side(side).win = counts;
    return this;
  }

  losses(side: Color, counts: number[]): this {
    this.side(side).loss = counts;
    return this;
  }

  /**
   * Positions per WDL value for a side to move
   */
  wdl(side: Color, counts: Partial<Record<Wdl, number>>): this {
    const target = this.side(side).wdl;
    for (const [key, count] of Object.entries(counts)) {
      if (count !== undefined) {
        target[key] = count;
      }
    }
    return this;
  }

  file(kind: 'rtbw' | 'rtbz', info: TableFileInfo): this {
    this.files[kind] = info;
    return this;
  }

  total(count: number): this {
    this.totalCount = count;
    return this;
  }

  build(): RawEndgameStats {
    const stats: RawEndgameStats = { longest: [...this.entries] };
    if (this.histogram) {
      stats.histogram = this.histogram;
    }
    if (this.files.rtbw) {
      stats.rtbw = this.files.rtbw;
    }
    if (this.files.rtbz) {
      stats.rtbz = this.files.rtbz;
    }
    if (this.totalCount !== null) {
      stats.total = this.totalCount;
    }
    return stats;
  }

  private side(color: Color): RawSideHistogram {
    if (!this.histogram) {
      this.histogram = { white: emptySide(), black: emptySide() };
    }
    return this.histogram[color];
  }
}

/**
 * Start building an endgame statistics entry
 */
export function endgameStats(): EndgameStatsBuilder {
  return new EndgameStatsBuilder();
}

/**
 * Store over a record keyed by normalized material
 */
export function statsStore(entries: Record<string, RawEndgameStats>): StatsStore {
  return {
    get: (material) => entries[material],
    materials: () => Object.keys(entries),
  };
}
