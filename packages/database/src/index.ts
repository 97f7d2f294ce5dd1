/**
 * @gobook/database - Opening book index and analysis cache
 *
 * This package provides:
 * - An in-memory opening book loaded from a bundled JSON file
 * - A persistent SQLite cache of engine analyses
 */

export const VERSION = '0.1.0';

// Re-export clients
export {
  BaseDatabaseClient,
  CacheStore,
  DEFAULT_CACHE_CONFIG,
  decideMerge,
  mergeAnalyses,
  samePayload,
  DURATION_TOLERANCE,
  type DatabaseClientConfig,
  type MergeStats,
  type MergeDecision,
  type MergeSubject,
  type PutOutcome,
} from './clients/index.js';

// Re-export opening book
export {
  OpeningBookIndex,
  BOOK_MODEL_LABEL,
  SYNTHETIC_MODEL_LABEL,
  DEFAULT_FIRST_MOVES,
  type OpeningBookOptions,
} from './opening-book/opening-book-index.js';
export { describeBookSource, readBookSource, type BookSource } from './opening-book/book-source.js';

// Re-export errors
export {
  DatabaseError,
  DatabaseNotFoundError,
  ConnectionError,
  BookLoadError,
  CacheCorruptEntryError,
  CacheIOError,
} from './errors.js';
