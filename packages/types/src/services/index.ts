/**
 * Analysis engine contract types
 *
 * The engine is opaque: these types describe only what the lookup layers
 * exchange with it. Implemented by the GTP backend and by test mocks.
 */

import type { Completeness, MoveCandidate } from '../analysis/index.js';

/**
 * Intermediate search state reported while the engine works
 */
export interface EngineProgress {
  /** Root visits so far */
  visits: number;
  winProbability: number;
  scoreLead: number;
  /** Best move so far (GTP vertex or "pass") */
  bestMove: string;
}

/**
 * Terminal engine output for one request
 */
export interface EngineAnalysis {
  topMoves: MoveCandidate[];
  /** Root visits actually searched */
  visits: number;
  /** complete when the requested visits were reached */
  completeness: Completeness;
  durationSeconds: number;
  modelLabel: string;
}

/**
 * Opaque handle identifying one in-flight request
 */
export interface CancellationHandle {
  readonly id: number;
}

/**
 * Progress callback
 */
export type ProgressListener = (progress: EngineProgress) => void;
