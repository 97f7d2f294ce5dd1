/**
 * Database client exports
 */

export { BaseDatabaseClient, type DatabaseClientConfig } from './base.js';
export { CacheStore, DEFAULT_CACHE_CONFIG, type MergeStats } from './analysis-cache.js';
export {
  decideMerge,
  mergeAnalyses,
  samePayload,
  DURATION_TOLERANCE,
  type MergeDecision,
  type MergeSubject,
  type PutOutcome,
} from './merge-policy.js';
