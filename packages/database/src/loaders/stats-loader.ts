/**
 * Statistics Database Loader
 *
 * Imports a machine readable statistics dump (stats.json, keyed by
 * material) into the SQLite database read by StatsClient.
 */

import * as fs from 'fs';

import { pieceCount } from '@tbx/core';
import type { RawEndgameStats } from '@tbx/types';
import BetterSqlite3 from 'better-sqlite3';

import { StatsFormatError } from '../errors.js';
import { normalizeDump } from '../schema/normalize-dump.js';
import { formatIssues, statsDumpSchema } from '../schema/stats-schema.js';

/**
 * Progress callback, called once per imported endgame
 */
export type LoadProgressCallback = (material: string, index: number, total: number) => void;

/**
 * Create the statistics database schema
 */
function createSchema(db: BetterSqlite3.Database): void {
  db.exec(`
    DROP TABLE IF EXISTS endgames;

    CREATE TABLE endgames (
      material TEXT PRIMARY KEY,
      piece_count INTEGER NOT NULL,
      data TEXT NOT NULL
    );

    CREATE INDEX idx_piece_count ON endgames(piece_count);
  `);
}

/**
 * Read and validate a statistics dump
 *
 * @throws StatsFormatError if the file is not JSON or not a statistics dump
 */
export function readStatsDump(jsonPath: string): Record<string, RawEndgameStats> {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(jsonPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StatsFormatError(`Cannot read statistics dump ${jsonPath}`, undefined, [reason]);
  }

  const parsed = statsDumpSchema.safeParse(json);
  if (!parsed.success) {
    throw new StatsFormatError(
      `Invalid statistics dump ${jsonPath}`,
      undefined,
      formatIssues(parsed.error),
    );
  }
  return parsed.data;
}

/**
 * Import a statistics dump into a fresh SQLite database
 *
 * Rows are stored under normalized keys, colours following the key.
 *
 * @returns Number of imported endgames
 * @throws StatsFormatError if the dump is malformed or names an endgame twice
 */
export function loadStatsDatabase(
  jsonPath: string,
  dbPath: string,
  onProgress?: LoadProgressCallback,
): number {
  const entries = [...normalizeDump(readStatsDump(jsonPath))];

  const db = new BetterSqlite3(dbPath);
  try {
    // Rollback journal, so read-only clients can open the file afterwards
    db.pragma('journal_mode = DELETE');
    createSchema(db);

    const insert = db.prepare(`
      INSERT INTO endgames (material, piece_count, data)
      VALUES (?, ?, ?)
    `);

    const insertAll = db.transaction(() => {
      entries.forEach(([material, stats], index) => {
        insert.run(material, pieceCount(material), JSON.stringify(stats));
        onProgress?.(material, index, entries.length);
      });
    });
    insertAll();

    db.exec('ANALYZE');
    return entries.length;
  } finally {
    db.close();
  }
}
