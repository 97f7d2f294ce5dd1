/**
 * Mock analysis engine for testing
 *
 * Implements the AnalysisEngine interface with vi.fn spies
 */

import type { Position } from '@gobook/core';
import { AnalysisCancelledError, type AnalysisEngine, type AnalysisTask } from '@gobook/engine';
import type {
  CancellationHandle,
  EngineAnalysis,
  EngineProgress,
  ProgressListener,
} from '@gobook/types';
import { vi } from 'vitest';

export interface MockEngineConfig {
  /** Whether start() succeeds (default: true) */
  available?: boolean;
  /** Model label */
  name?: string;
  /** Fields of the analysis every request resolves with */
  analysis?: Partial<EngineAnalysis>;
  /** Progress events reported before the result */
  progress?: EngineProgress[];
  /** Simulate latency in milliseconds */
  latencyMs?: number;
  /** Never finish; only cancel() settles the request */
  hang?: boolean;
  /** Reject every request with this error */
  error?: Error;
}

/**
 * Default engine analysis
 */
export const DEFAULT_ENGINE_ANALYSIS: EngineAnalysis = {
  topMoves: [
    { move: 'D4', winProbability: 0.52, scoreLead: 0.8, visitCount: 300 },
    { move: 'C3', winProbability: 0.47, scoreLead: -0.4, visitCount: 200 },
  ],
  visits: 500,
  completeness: 'complete',
  durationSeconds: 1.5,
  modelLabel: 'mock-model',
};

/**
 * Create a mock engine that matches the AnalysisEngine interface
 */
// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createMockEngine(config: MockEngineConfig = {}) {
  const {
    available = true,
    name = 'mock-model',
    analysis = {},
    progress = [],
    latencyMs = 0,
    hang = false,
    error,
  } = config;

  let nextId = 1;
  const inFlight = new Map<number, (err: Error) => void>();

  const start = vi.fn(async (): Promise<boolean> => available);
  const stop = vi.fn(async (): Promise<void> => {
    for (const [id, reject] of inFlight) {
      reject(new AnalysisCancelledError(id));
    }
  });

  const requestAnalysis = vi.fn(
    (_position: Position, maxVisits: number, onProgress?: ProgressListener): AnalysisTask => {
      const handle: CancellationHandle = { id: nextId++ };

      const result = new Promise<EngineAnalysis>((resolve, reject) => {
        let timer: NodeJS.Timeout | undefined;
        inFlight.set(handle.id, (err) => {
          clearTimeout(timer);
          inFlight.delete(handle.id);
          reject(err);
        });
        if (hang) {
          return;
        }

        timer = setTimeout(() => {
          inFlight.delete(handle.id);
          for (const event of progress) {
            onProgress?.(event);
          }
          if (error) {
            reject(error);
            return;
          }
          resolve({
            ...DEFAULT_ENGINE_ANALYSIS,
            visits: maxVisits,
            modelLabel: name,
            ...analysis,
          });
        }, latencyMs);
      });

      return { handle, result };
    },
  );

  const cancel = vi.fn((handle: CancellationHandle): void => {
    inFlight.get(handle.id)?.(new AnalysisCancelledError(handle.id));
  });

  const engine = {
    name,
    start,
    stop,
    requestAnalysis,
    cancel,
  } satisfies AnalysisEngine;

  return engine;
}

export type MockEngine = ReturnType<typeof createMockEngine>;
