/**
 * Analysis engine capability interface
 */

import type { Position } from '@gobook/core';
import type { CancellationHandle, EngineAnalysis, ProgressListener } from '@gobook/types';

/**
 * One in-flight analysis request.
 *
 * result settles exactly once: it resolves with the final analysis or
 * rejects (AnalysisCancelledError after cancel). Progress is reported
 * to the listener before it settles.
 */
export interface AnalysisTask {
  readonly handle: CancellationHandle;
  readonly result: Promise<EngineAnalysis>;
}

/**
 * Anything that can search a position and rank candidate moves
 */
export interface AnalysisEngine {
  /** Model label attached to results */
  readonly name: string;

  /**
   * Start the engine. Resolves false (and logs) when it cannot be started.
   */
  start(): Promise<boolean>;

  /**
   * Stop the engine and release its resources
   */
  stop(): Promise<void>;

  /**
   * Analyze a position until maxVisits is reached or the engine time limit runs out
   */
  requestAnalysis(
    position: Position,
    maxVisits: number,
    onProgress?: ProgressListener,
  ): AnalysisTask;

  /**
   * Cancel a request. Unknown or finished handles are ignored.
   */
  cancel(handle: CancellationHandle): void;
}
