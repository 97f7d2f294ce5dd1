/**
 * Error classes for database operations
 */

/**
 * Base error class for database errors
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly dbPath?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DatabaseError);
    }
  }
}

/**
 * Error thrown when database file is not found
 */
export class DatabaseNotFoundError extends DatabaseError {
  constructor(dbPath: string) {
    super(`Database file not found: ${dbPath}`, dbPath);
    this.name = 'DatabaseNotFoundError';
  }
}

/**
 * Error thrown when database connection fails
 */
export class ConnectionError extends DatabaseError {
  constructor(dbPath: string, cause?: Error) {
    super(`Failed to connect to database at ${dbPath}${cause ? `: ${cause.message}` : ''}`, dbPath);
    this.name = 'ConnectionError';
  }
}

/**
 * Error thrown when the opening book bundle cannot be read as a whole
 */
export class BookLoadError extends DatabaseError {
  constructor(
    public readonly source: string,
    reason: string,
  ) {
    super(`Failed to load opening book from ${source}: ${reason}`);
    this.name = 'BookLoadError';
  }
}

/**
 * Error for a stored cache row that fails validation.
 * Reported and treated as a miss; the row is left in place.
 */
export class CacheCorruptEntryError extends DatabaseError {
  constructor(
    public readonly lookupKey: string,
    public readonly rowId: number | undefined,
    reason: string,
  ) {
    super(`Corrupt cache entry for ${lookupKey}${rowId === undefined ? '' : ` (row ${rowId})`}: ${reason}`);
    this.name = 'CacheCorruptEntryError';
  }
}

/**
 * Error thrown when the cache cannot be read or written
 */
export class CacheIOError extends DatabaseError {
  constructor(
    public readonly operation: string,
    dbPath: string,
    cause?: unknown,
  ) {
    super(
      `Cache ${operation} failed for ${dbPath}${cause instanceof Error ? `: ${cause.message}` : ''}`,
      dbPath,
    );
    this.name = 'CacheIOError';
  }
}
