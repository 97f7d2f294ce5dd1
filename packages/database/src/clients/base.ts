/**
 * Base database client with connection management
 */

import * as fs from 'fs';
import * as path from 'path';

import Database from 'better-sqlite3';

import { ConnectionError, DatabaseNotFoundError } from '../errors.js';

/**
 * Configuration for database client connections
 */
export interface DatabaseClientConfig {
  /** Path to the database file (relative to baseDir or absolute) */
  dbPath: string;
  /** Whether to open in read-only mode (default: true) */
  readonly?: boolean;
  /** Timeout in milliseconds to wait on a locked database */
  timeoutMs?: number;
  /** Directory relative paths resolve against (default: working directory) */
  baseDir?: string;
}

/**
 * Base class for SQLite database clients
 */
export abstract class BaseDatabaseClient {
  protected db: Database.Database | null = null;
  protected readonly config: Required<DatabaseClientConfig>;

  constructor(config: DatabaseClientConfig) {
    this.config = {
      dbPath: config.dbPath,
      readonly: config.readonly ?? true,
      timeoutMs: config.timeoutMs ?? 5000,
      baseDir: config.baseDir ?? process.cwd(),
    };
  }

  /**
   * Prepare a freshly opened connection (schema creation etc.)
   */
  protected abstract onConnect(db: Database.Database): void;

  /**
   * Resolve the full database path
   */
  protected getFullDbPath(): string {
    return path.resolve(this.config.baseDir, this.config.dbPath);
  }

  /**
   * Ensure database connection is established (lazy initialization).
   * Writable databases are created, with their directory, when missing.
   */
  protected ensureConnected(): Database.Database {
    if (this.db) {
      return this.db;
    }

    const fullPath = this.getFullDbPath();

    if (this.config.readonly && !fs.existsSync(fullPath)) {
      throw new DatabaseNotFoundError(fullPath);
    }

    let db: Database.Database;
    try {
      if (!this.config.readonly) {
        fs.mkdirSync(path.dirname(fullPath), { recursive: true });
      }
      db = new Database(fullPath, {
        readonly: this.config.readonly,
        fileMustExist: this.config.readonly,
        timeout: this.config.timeoutMs,
      });
    } catch (err) {
      throw new ConnectionError(fullPath, err instanceof Error ? err : undefined);
    }

    try {
      if (!this.config.readonly) {
        // Readers never block the writer; a commit is on disk once it returns
        db.pragma('journal_mode = WAL');
        db.pragma('synchronous = FULL');
      }
      this.onConnect(db);
    } catch (err) {
      db.close();
      throw new ConnectionError(fullPath, err instanceof Error ? err : undefined);
    }

    this.db = db;
    return db;
  }

  /**
   * Close the database connection
   */
  public close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Get the configured database path
   */
  public get dbPath(): string {
    return this.config.dbPath;
  }

  /**
   * Get the resolved database path
   */
  public get fullPath(): string {
    return this.getFullDbPath();
  }

  /**
   * Check if the database is currently connected
   */
  public get isConnected(): boolean {
    return this.db !== null;
  }
}
