/**
 * Local analysis cache backed by SQLite
 *
 * Entries are keyed by (lookup key, effort, komi). The lookup key is the
 * canonical position hash, so every orientation of a position shares one
 * entry; candidates are stored in canonical orientation.
 */

import * as fs from 'fs';
import * as path from 'path';

import { isBoardSize } from '@gobook/core';
import type { AnalysisResult, CacheStats } from '@gobook/types';
import Database from 'better-sqlite3';
import { z } from 'zod';

import {
  CacheCorruptEntryError,
  CacheIOError,
  ConnectionError,
  DatabaseNotFoundError,
} from '../errors.js';
import { cacheRowSchema, countRowSchema, storedCandidatesSchema } from '../schemas.js';

import { BaseDatabaseClient, type DatabaseClientConfig } from './base.js';
import {
  decideMerge,
  mergeAnalyses,
  samePayload,
  serializeCandidates,
  type PutOutcome,
} from './merge-policy.js';

/**
 * Default configuration for the cache
 */
export const DEFAULT_CACHE_CONFIG: DatabaseClientConfig = {
  dbPath: 'gobook-cache.db',
  readonly: false,
  timeoutMs: 5000,
};

/**
 * Result of merging another cache database
 */
export interface MergeStats {
  inserted: number;
  merged: number;
  errors: number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS analysis_cache (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    lookup_key TEXT NOT NULL,
    moves_sequence TEXT NOT NULL,
    board_size INTEGER NOT NULL,
    komi REAL NOT NULL,
    effort_visits INTEGER NOT NULL,
    top_moves TEXT NOT NULL,
    model_label TEXT NOT NULL,
    created_at TEXT NOT NULL,
    compute_duration_seconds REAL,
    completeness TEXT NOT NULL DEFAULT 'complete',
    UNIQUE(lookup_key, effort_visits, komi)
  );

  CREATE INDEX IF NOT EXISTS idx_analysis_cache_lookup ON analysis_cache(lookup_key);
`;

const UPSERT = `
  INSERT INTO analysis_cache (
    lookup_key, moves_sequence, board_size, komi, effort_visits,
    top_moves, model_label, created_at, compute_duration_seconds, completeness
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  ON CONFLICT(lookup_key, effort_visits, komi) DO UPDATE SET
    moves_sequence = excluded.moves_sequence,
    board_size = excluded.board_size,
    top_moves = excluded.top_moves,
    model_label = excluded.model_label,
    created_at = excluded.created_at,
    compute_duration_seconds = excluded.compute_duration_seconds,
    completeness = excluded.completeness
`;

const rowIdSchema = z.object({ id: z.number() });
const countSchema = z.object({ count: z.number().int() });

/**
 * Transform a raw row to an AnalysisResult
 *
 * @throws CacheCorruptEntryError when the row fails validation
 */
function rowToResult(raw: unknown, lookupKey: string): AnalysisResult {
  const idResult = rowIdSchema.safeParse(raw);
  const rowId = idResult.success ? idResult.data.id : undefined;
  const corrupt = (reason: string): CacheCorruptEntryError =>
    new CacheCorruptEntryError(lookupKey, rowId, reason);

  const parsed = cacheRowSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw corrupt(issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid row');
  }
  const row = parsed.data;

  const boardSize = row.board_size;
  if (!isBoardSize(boardSize)) {
    throw corrupt(`unsupported board size ${boardSize}`);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(row.top_moves);
  } catch {
    throw corrupt('top_moves is not valid JSON');
  }
  const topMoves = storedCandidatesSchema.safeParse(decoded);
  if (!topMoves.success) {
    throw corrupt('top_moves does not hold candidate moves');
  }

  const result: AnalysisResult = {
    positionKey: row.lookup_key,
    boardSize,
    komi: row.komi,
    movesSequence: row.moves_sequence,
    topMoves: topMoves.data,
    effortVisits: row.effort_visits,
    sourceLabel: 'localCache',
    completeness: row.completeness,
    modelLabel: row.model_label,
    createdAt: row.created_at,
  };
  if (row.compute_duration_seconds !== null) {
    result.computeDurationSeconds = row.compute_duration_seconds;
  }
  return result;
}

/**
 * Column values of a result, in UPSERT order
 */
function resultToParams(result: AnalysisResult): (string | number | null)[] {
  return [
    result.positionKey,
    result.movesSequence,
    result.boardSize,
    result.komi,
    result.effortVisits,
    serializeCandidates(result.topMoves),
    result.modelLabel,
    result.createdAt ?? new Date().toISOString(),
    result.computeDurationSeconds ?? null,
    result.completeness,
  ];
}

/**
 * Persistent cache of engine analyses
 *
 * One connection per store: a single writer, with WAL allowing concurrent
 * readers from other processes.
 */
export class CacheStore extends BaseDatabaseClient {
  constructor(config: Partial<DatabaseClientConfig> = {}) {
    super({
      ...DEFAULT_CACHE_CONFIG,
      ...config,
    });
  }

  protected override onConnect(db: Database.Database): void {
    db.exec(SCHEMA);
  }

  /**
   * Open the database (creating it if needed) without running a query
   *
   * @throws CacheIOError when the file cannot be opened or initialized
   */
  open(): void {
    this.run('open', () => undefined);
  }

  /**
   * Get an entry: with requiredEffort, exactly that effort; otherwise the
   * highest effort stored for (lookupKey, komi)
   */
  get(lookupKey: string, komi: number, requiredEffort?: number): AnalysisResult | undefined {
    if (requiredEffort !== undefined) {
      return this.firstValid(
        'get',
        lookupKey,
        `SELECT * FROM analysis_cache WHERE lookup_key = ? AND komi = ? AND effort_visits = ?`,
        [lookupKey, komi, requiredEffort],
      );
    }
    return this.firstValid(
      'get',
      lookupKey,
      `SELECT * FROM analysis_cache WHERE lookup_key = ? AND komi = ? ORDER BY effort_visits DESC`,
      [lookupKey, komi],
    );
  }

  /**
   * Get the highest-effort entry with at least minEffort
   */
  getAtLeast(lookupKey: string, komi: number, minEffort: number): AnalysisResult | undefined {
    return this.firstValid(
      'get',
      lookupKey,
      `SELECT * FROM analysis_cache
       WHERE lookup_key = ? AND komi = ? AND effort_visits >= ?
       ORDER BY effort_visits DESC`,
      [lookupKey, komi, minEffort],
    );
  }

  /**
   * Store a result under (positionKey, effortVisits, komi), resolving
   * collisions with the merge policy. Runs in one transaction.
   */
  put(result: AnalysisResult): PutOutcome {
    return this.run('put', (db) =>
      db
        .transaction((): PutOutcome => {
          const raw: unknown = db
            .prepare(
              `SELECT * FROM analysis_cache WHERE lookup_key = ? AND effort_visits = ? AND komi = ?`,
            )
            .get(result.positionKey, result.effortVisits, result.komi);

          let existing: AnalysisResult | undefined;
          if (raw !== undefined) {
            try {
              existing = rowToResult(raw, result.positionKey);
            } catch (err) {
              if (!(err instanceof CacheCorruptEntryError)) throw err;
              console.warn(`[AnalysisCache] ${err.message}; overwriting`);
            }
          }

          if (existing && samePayload(existing, result)) {
            return 'unchanged';
          }
          if (existing && decideMerge(existing, result) === 'keep-existing') {
            return 'kept-existing';
          }

          db.prepare(UPSERT).run(...resultToParams(result));
          return raw === undefined ? 'inserted' : 'replaced';
        })
        .immediate(),
    );
  }

  /**
   * Delete every entry for a lookup key
   *
   * @returns Number of rows deleted
   */
  delete(lookupKey: string): number {
    return this.run(
      'delete',
      (db) => db.prepare('DELETE FROM analysis_cache WHERE lookup_key = ?').run(lookupKey).changes,
    );
  }

  /**
   * Delete every entry
   *
   * @returns Number of rows deleted
   */
  clear(): number {
    return this.run('clear', (db) => db.prepare('DELETE FROM analysis_cache').run().changes);
  }

  count(): number {
    return this.run(
      'count',
      (db) => countSchema.parse(db.prepare('SELECT COUNT(*) AS count FROM analysis_cache').get()).count,
    );
  }

  getStats(): CacheStats {
    return this.run('stats', (db) => {
      const byBoardSize: Record<number, number> = {};
      for (const row of this.countRows(
        db,
        'SELECT board_size AS label, COUNT(*) AS count FROM analysis_cache GROUP BY board_size',
      )) {
        byBoardSize[Number(row.label)] = row.count;
      }

      const byModel: Record<string, number> = {};
      for (const row of this.countRows(
        db,
        'SELECT model_label AS label, COUNT(*) AS count FROM analysis_cache GROUP BY model_label',
      )) {
        byModel[String(row.label)] = row.count;
      }

      const fullPath = this.getFullDbPath();
      return {
        totalEntries: this.count(),
        byBoardSize,
        byModel,
        dbSizeBytes: fs.existsSync(fullPath) ? fs.statSync(fullPath).size : 0,
        dbPath: fullPath,
      };
    });
  }

  /**
   * Number of entries per effort level for a board size and komi
   */
  getEffortCounts(boardSize: number, komi: number): Record<number, number> {
    return this.run('stats', (db) => {
      const counts: Record<number, number> = {};
      for (const row of this.countRows(
        db,
        `SELECT effort_visits AS label, COUNT(*) AS count FROM analysis_cache
         WHERE board_size = ? AND komi = ?
         GROUP BY effort_visits ORDER BY count DESC`,
        [boardSize, komi],
      )) {
        counts[Number(row.label)] = row.count;
      }
      return counts;
    });
  }

  /**
   * Merge another cache database into this one. Entries with the same
   * (key, effort, komi) are combined, new ones are inserted; unreadable
   * source rows are counted as errors.
   *
   * @throws DatabaseNotFoundError when the source does not exist
   */
  mergeDatabase(sourcePath: string): MergeStats {
    const fullSource = path.resolve(this.config.baseDir, sourcePath);
    if (!fs.existsSync(fullSource)) {
      throw new DatabaseNotFoundError(fullSource);
    }

    let rows: unknown[];
    let source: Database.Database | undefined;
    try {
      source = new Database(fullSource, { readonly: true, fileMustExist: true });
      rows = source.prepare('SELECT * FROM analysis_cache').all();
    } catch (err) {
      throw new ConnectionError(fullSource, err instanceof Error ? err : undefined);
    } finally {
      source?.close();
    }

    const stats: MergeStats = { inserted: 0, merged: 0, errors: 0 };
    this.run('merge', (db) =>
      db
        .transaction(() => {
          const upsert = db.prepare(UPSERT);
          for (const raw of rows) {
            let incoming: AnalysisResult;
            try {
              incoming = rowToResult(raw, fullSource);
            } catch (err) {
              stats.errors++;
              console.warn(`[AnalysisCache] Skipping source row: ${err instanceof Error ? err.message : String(err)}`);
              continue;
            }

            const existing = this.get(incoming.positionKey, incoming.komi, incoming.effortVisits);
            if (existing) {
              upsert.run(...resultToParams(mergeAnalyses(existing, incoming)));
              stats.merged++;
            } else {
              upsert.run(...resultToParams(incoming));
              stats.inserted++;
            }
          }
        })
        .immediate(),
    );
    return stats;
  }

  /**
   * Run a query, mapping storage failures to CacheIOError
   */
  private run<T>(operation: string, fn: (db: Database.Database) => T): T {
    try {
      return fn(this.ensureConnected());
    } catch (err) {
      if (err instanceof CacheIOError) {
        throw err;
      }
      throw new CacheIOError(operation, this.getFullDbPath(), err);
    }
  }

  /**
   * First row of a query that passes validation. Corrupt rows are reported
   * and skipped, not deleted.
   */
  private firstValid(
    operation: string,
    lookupKey: string,
    sql: string,
    params: (string | number)[],
  ): AnalysisResult | undefined {
    return this.run(operation, (db) => {
      for (const raw of db.prepare(sql).all(...params)) {
        try {
          return rowToResult(raw, lookupKey);
        } catch (err) {
          if (!(err instanceof CacheCorruptEntryError)) throw err;
          console.warn(`[AnalysisCache] ${err.message}`);
        }
      }
      return undefined;
    });
  }

  private countRows(
    db: Database.Database,
    sql: string,
    params: (string | number)[] = [],
  ): z.infer<typeof countRowSchema>[] {
    return z.array(countRowSchema).parse(db.prepare(sql).all(...params));
  }
}
