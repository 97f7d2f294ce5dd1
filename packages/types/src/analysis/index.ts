/**
 * Analysis result types
 *
 * These are the fixed record shapes exchanged between the opening book,
 * the local cache and the live engine.
 */

import type { BoardSize, SymmetryIndex } from '../board/index.js';

/**
 * One suggested move with its statistics
 */
export interface MoveCandidate {
  /** GTP vertex (e.g. "Q16") or "pass" */
  move: string;
  /** Win probability for the player to move (0-1) */
  winProbability: number;
  /** Expected score lead in points (positive = player to move ahead) */
  scoreLead: number;
  /** Search visits spent on this move */
  visitCount: number;
}

/**
 * Where an analysis result came from
 */
export type SourceLabel = 'openingBook' | 'localCache' | 'liveEngine';

/**
 * Whether the engine reached the requested effort
 */
export type Completeness = 'complete' | 'partial';

/**
 * Ranked move suggestions for a position
 */
export interface AnalysisResult {
  /** Key the answering source used (move key, or canonical hash hex) */
  positionKey: string;
  boardSize: BoardSize;
  komi: number;
  /** Move sequence in key form, e.g. "B[E5];W[C3]" */
  movesSequence: string;
  /** Candidates sorted by descending win probability */
  topMoves: MoveCandidate[];
  /** Effort (engine visits) invested in the result */
  effortVisits: number;
  sourceLabel: SourceLabel;
  completeness: Completeness;
  computeDurationSeconds?: number;
  /** Engine model, "bundled_opening_book", "synthetic", ... */
  modelLabel: string;
  /** ISO timestamp of when the result was produced */
  createdAt?: string;
}

/**
 * Symmetry-invariant identifier of a position
 */
export interface CanonicalKey {
  /** Symmetry that maps the caller's orientation to the canonical one */
  symmetryIndex: SymmetryIndex;
  /** 64-bit Zobrist digest of the canonical orientation */
  hashDigest: bigint;
  /** hashDigest as 16 lowercase hex characters */
  hashHex: string;
  /** Move key built from the moves in canonical orientation */
  moveSequenceKey: string;
}

/**
 * Opening book statistics
 */
export interface BookStats {
  isLoaded: boolean;
  /** Entry count declared by the bundle metadata */
  totalEntries: number;
  hashIndexedEntries: number;
  moveIndexedEntries: number;
  byBoardSize: Record<number, number>;
  loadError?: string;
}

/**
 * Local cache statistics
 */
export interface CacheStats {
  totalEntries: number;
  byBoardSize: Record<number, number>;
  byModel: Record<string, number>;
  dbSizeBytes: number;
  dbPath: string;
}

/**
 * Caller-facing statistics across both lookup layers
 */
export interface AnalyzerStats {
  bookEntries: number;
  cacheEntries: number;
  byBoardSize: Record<number, { book: number; cache: number }>;
}
