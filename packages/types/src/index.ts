/**
 * @gobook/types - Shared type definitions for gobook
 *
 * Usage:
 *   import type { AnalysisResult, MoveCandidate } from '@gobook/types';
 *   import { SUPPORTED_BOARD_SIZES } from '@gobook/types';
 */

export * from './board/index.js';

export type {
  MoveCandidate,
  SourceLabel,
  Completeness,
  AnalysisResult,
  CanonicalKey,
  BookStats,
  CacheStats,
  AnalyzerStats,
} from './analysis/index.js';

export type {
  EngineProgress,
  EngineAnalysis,
  CancellationHandle,
  ProgressListener,
} from './services/index.js';
