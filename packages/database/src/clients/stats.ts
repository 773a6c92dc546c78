/**
 * Endgame statistics database client
 */

import * as fs from 'fs';
import * as path from 'path';

import type { RawEndgameStats, StatsStore } from '@tbx/types';
import Database from 'better-sqlite3';

import { ConnectionError, DatabaseNotFoundError, QueryError, StatsFormatError } from '../errors.js';
import { formatIssues, rawEndgameStatsSchema } from '../schema/stats-schema.js';

/**
 * Configuration for the statistics database client
 */
export interface StatsClientConfig {
  /** Database written by loadStatsDatabase(), relative to the working directory or absolute */
  dbPath: string;
  /** Busy timeout in milliseconds */
  timeoutMs: number;
}

export const DEFAULT_STATS_CONFIG: StatsClientConfig = {
  dbPath: 'stats.db',
  timeoutMs: 5000,
};

/**
 * Raw row from the endgames table
 */
interface RawEndgameRow {
  material: string;
  piece_count: number;
  data: string;
}

function parseRow(row: RawEndgameRow): RawEndgameStats {
  let json: unknown;
  try {
    json = JSON.parse(row.data);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new StatsFormatError(`Stored statistics for ${row.material} are not JSON`, row.material, [
      reason,
    ]);
  }

  const parsed = rawEndgameStatsSchema.safeParse(json);
  if (!parsed.success) {
    throw new StatsFormatError(
      `Stored statistics for ${row.material} are malformed`,
      row.material,
      formatIssues(parsed.error),
    );
  }
  return parsed.data;
}

/**
 * Read-only client for the endgame statistics database
 *
 * The file is opened on first access. Rows are parsed once and cached for
 * the lifetime of the client.
 */
export class StatsClient implements StatsStore {
  private db: Database.Database | null = null;
  private readonly config: StatsClientConfig;
  private readonly cache = new Map<string, RawEndgameStats | undefined>();

  constructor(config: Partial<StatsClientConfig> = {}) {
    this.config = { ...DEFAULT_STATS_CONFIG, ...config };
  }

  /**
   * Statistics for a normalized material key
   *
   * @throws StatsFormatError if the stored row is malformed
   */
  get(material: string): RawEndgameStats | undefined {
    if (this.cache.has(material)) {
      return this.cache.get(material);
    }

    const row = this.query(
      'SELECT material, piece_count, data FROM endgames WHERE material = ?',
      (stmt) => stmt.get(material) as RawEndgameRow | undefined,
    );
    const stats = row ? parseRow(row) : undefined;
    this.cache.set(material, stats);
    return stats;
  }

  /**
   * All material keys, by piece count then name
   */
  materials(): string[] {
    const rows = this.query(
      'SELECT material FROM endgames ORDER BY piece_count ASC, material ASC',
      (stmt) => stmt.all() as Array<Pick<RawEndgameRow, 'material'>>,
    );
    return rows.map((row) => row.material);
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
    this.cache.clear();
  }

  get dbPath(): string {
    return this.config.dbPath;
  }

  get isConnected(): boolean {
    return this.db !== null;
  }

  private connect(): Database.Database {
    if (this.db) {
      return this.db;
    }

    const fullPath = path.resolve(this.config.dbPath);
    if (!fs.existsSync(fullPath)) {
      throw new DatabaseNotFoundError(fullPath);
    }

    try {
      this.db = new Database(fullPath, {
        readonly: true,
        timeout: this.config.timeoutMs,
        fileMustExist: true,
      });
      return this.db;
    } catch (err) {
      throw new ConnectionError(fullPath, err instanceof Error ? err : undefined);
    }
  }

  private query<T>(sql: string, run: (stmt: Database.Statement) => T): T {
    const db = this.connect();
    try {
      return run(db.prepare(sql));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new QueryError(`Statistics query failed: ${reason}`, sql);
    }
  }
}
