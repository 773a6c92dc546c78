import { StatsAggregator } from '@tbx/core';
import { endgameStats, loadJson, STATS_FIXTURE, statsStore } from '@tbx/test-utils';
import { describe, expect, it } from 'vitest';

import { StatsFormatError } from '../errors.js';
import { MemoryStatsStore } from '../stores/memory-store.js';

describe('MemoryStatsStore', () => {
  it('stores entries under normalized keys', () => {
    const store = new MemoryStatsStore({ KvKR: endgameStats().build() });

    expect(store.materials()).toEqual(['KRvK']);
    expect(store.get('KRvK')).toEqual({ longest: [] });
    expect(store.get('KvKR')).toBeUndefined();
    expect(store.size).toBe(1);
  });

  it('credits results to the colours of the normalized key', () => {
    const store = new MemoryStatsStore({
      KvKQ: endgameStats()
        .wdl('white', { [-2]: 5 })
        .wdl('black', { 2: 7 })
        .longest('8/8/8/8/8/2q5/8/K1k5 w - -', 20, -2)
        .build(),
    });
    const record = new StatsAggregator(store).forMaterial('KQvK');

    expect(record?.counts).toEqual({ white: 12, cursed: 0, draws: 0, blessed: 0, black: 0 });
    expect(record?.longest).toEqual([
      {
        fen: 'k1K5/8/2Q5/8/8/8/8/8 b - - 0 1',
        ply: 20,
        wdl: -2,
        turn: 'black',
        frustrated: false,
        winner: 'white',
        label: 'KQvK 1-0 in 20 plies',
      },
    ]);
  });

  it('keeps colours of keys that are already normalized', () => {
    const stats = endgameStats().wdl('white', { 2: 3 }).build();

    expect(new MemoryStatsStore({ KQvK: stats }).get('KQvK')).toBe(stats);
  });

  it('serves the mover histogram of a swapped entry', () => {
    const store = new MemoryStatsStore({
      KvKR: endgameStats().wins('black', [0, 4]).losses('white', [0, 0, 6]).build(),
    });

    const view = new StatsAggregator(store, { histogram: { logScale: false } }).forPosition(
      'KRvK',
      'white',
      true,
    );

    expect(view?.materialSide).toBe('KR');
    expect(view?.rows).toEqual([
      { kind: 'active', ply: 0, width: 0, count: 0, highlighted: false },
      { kind: 'active', ply: 1, width: 66.7, count: 4, highlighted: false },
      { kind: 'active', ply: 2, width: 100, count: 6, highlighted: false },
    ]);
  });

  it('rejects two keys naming the same endgame', () => {
    expect(
      () => new MemoryStatsStore({ KQvK: endgameStats().build(), KvKQ: endgameStats().build() }),
    ).toThrow(StatsFormatError);
  });

  it('feeds built counters to the aggregator', () => {
    const store = new MemoryStatsStore({
      KQvK: endgameStats()
        .wdl('white', { 2: 6, 0: 1 })
        .wdl('black', { [-2]: 3 })
        .build(),
    });

    const record = new StatsAggregator(store).forMaterial('KvKQ');

    expect(record?.counts).toEqual({ white: 9, cursed: 0, draws: 1, blessed: 0, black: 0 });
    expect(record?.total).toBe(10);
    expect(record?.percentages.white).toBe(90);
    expect(record?.warnings).toEqual([]);
  });

  it('reports a stated total the counters do not reach', () => {
    const store = new MemoryStatsStore({
      KQvK: endgameStats().wdl('white', { 2: 10 }).total(12).build(),
    });

    const record = new StatsAggregator(store).forMaterial('KQvK');

    expect(record?.warnings).toEqual([
      {
        code: 'inconsistent-counters',
        expectedTotal: 12,
        actualSum: 10,
        message: 'Result counters add up to 10, expected 12',
      },
    ]);
  });

  it('loads the sample dump through fromJson', async () => {
    const store = MemoryStatsStore.fromJson(await loadJson(STATS_FIXTURE));

    expect(store.materials().sort()).toEqual(['KQvK', 'KQvKR', 'KRvK', 'KRvKN']);
    expect(new StatsAggregator(store).forMaterial('KQvK')?.total).toBe(114);
  });

  it('rejects a value that is not a dump', () => {
    expect(() => MemoryStatsStore.fromJson([1, 2])).toThrow(StatsFormatError);
  });
});

describe('plain store handles', () => {
  it('compare longest phases within a piece count', () => {
    const store = statsStore({
      KRvK: endgameStats().longest('8/8/8/8/8/2k5/8/KR6 w - -', 32, 2).build(),
      KQvK: endgameStats().longest('8/8/8/8/8/2k5/8/KQ6 w - -', 19, 2).build(),
    });
    const stats = new StatsAggregator(store);

    expect(stats.isMaximal('KvKR')).toBe(true);
    expect(stats.isMaximal('KQvK')).toBe(false);
    expect(stats.longestFen('KQvK')).toBe('8/8/8/8/8/2k5/8/KQ6 w - - 0 1');
  });
});
