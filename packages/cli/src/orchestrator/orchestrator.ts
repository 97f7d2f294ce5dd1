/**
 * Fallback orchestrator
 *
 * Answers a position from the opening book, then the local cache, then the
 * live engine, in that order. Engine answers are written back to the cache
 * in canonical orientation.
 */

import {
  canonicalKey,
  createPosition,
  excludeOccupied,
  formatMoveKey,
  fromCanonicalOrientation,
  sortCandidates,
  toCanonicalOrientation,
  type Position,
  type PositionInput,
} from '@gobook/core';
import type { BookSource, CacheStore, OpeningBookIndex } from '@gobook/database';
import { AnalysisCancelledError, type AnalysisEngine, type AnalysisTask } from '@gobook/engine';
import {
  SUPPORTED_BOARD_SIZES,
  type AnalysisResult,
  type AnalyzerStats,
  type CacheStats,
  type CanonicalKey,
  type EngineAnalysis,
  type ProgressListener,
} from '@gobook/types';

import {
  EngineCancelledError,
  EngineFailedError,
  EngineTimeoutError,
  EngineUnavailableError,
  type LayerAttempt,
  type LookupLayer,
} from './errors.js';
import { LookupStateMachine, type StateListener } from './state-machine.js';

/**
 * Orchestrator settings
 */
export interface OrchestratorConfig {
  /** Candidates kept from a live analysis */
  topMovesCount: number;
  /** Wall-clock limit for one engine call (ms) */
  engineTimeoutMs: number;
  /** Whether the live engine may be used */
  engineEnabled: boolean;
  /** Whether the opening book is consulted */
  bookEnabled: boolean;
  /** Bundle loaded by init() */
  bookSource?: BookSource;
}

/**
 * Default orchestrator settings
 */
export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  topMovesCount: 10,
  engineTimeoutMs: 60000,
  engineEnabled: true,
  bookEnabled: true,
};

/**
 * Collaborators owned by one orchestrator
 */
export interface OrchestratorServices {
  book: OpeningBookIndex;
  cache: CacheStore;
  engine: AnalysisEngine | null;
}

/**
 * Per-call options
 */
export interface AnalyzeOptions {
  /** Aborting rejects the engine step with EngineCancelledError */
  signal?: AbortSignal;
  /** Engine progress events */
  onProgress?: ProgressListener;
  /** Lookup state changes */
  onStateChange?: StateListener;
  /** Skip the book and the cache and ask the engine; its answer replaces the cached one */
  forceRefresh?: boolean;
}

interface InFlightCall {
  /** Settle the call as cancelled and release any engine task */
  cancel: () => void;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function skipLayer(attempts: LayerAttempt[], layer: LookupLayer): undefined {
  attempts.push({ layer, outcome: 'skipped', reason: 'refresh requested' });
  return undefined;
}

/**
 * Book, cache and engine lookup chain
 *
 * @example
 * const orchestrator = new FallbackOrchestrator(services, { bookSource });
 * await orchestrator.init();
 * const result = await orchestrator.analyze({ boardSize: 9, moves: 'B E5' }, 100, 500);
 * await orchestrator.dispose();
 */
export class FallbackOrchestrator {
  private readonly config: OrchestratorConfig;
  private cacheUnavailable: string | undefined;
  private engineStart: Promise<boolean> | null = null;
  private readonly inFlight = new Set<InFlightCall>();

  constructor(
    private readonly services: OrchestratorServices,
    config: Partial<OrchestratorConfig> = {},
  ) {
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };
  }

  /**
   * Load the opening book and open the cache. Neither failure is fatal:
   * a failed book leaves the index empty, a failed cache disables the layer.
   */
  async init(): Promise<void> {
    const { bookSource, bookEnabled } = this.config;
    if (bookEnabled && bookSource) {
      try {
        await this.services.book.load(bookSource);
      } catch (err) {
        console.warn(`[Orchestrator] Opening book unavailable: ${errorMessage(err)}`);
      }
    }

    try {
      this.services.cache.open();
      this.cacheUnavailable = undefined;
    } catch (err) {
      this.cacheUnavailable = errorMessage(err);
      console.warn(`[Orchestrator] Cache disabled: ${this.cacheUnavailable}`);
    }
  }

  /**
   * Answer a position from the first layer that can.
   *
   * @throws UnsupportedPositionError before any lookup when the request is invalid
   * @throws AnalysisFailedError subclasses when no layer answers
   */
  async analyze(
    request: PositionInput,
    requiredLookupEffort: number,
    computeEffort: number,
    options: AnalyzeOptions = {},
  ): Promise<AnalysisResult> {
    const position = createPosition(request);
    const key = canonicalKey(position);
    const machine = new LookupStateMachine(options.onStateChange);
    const attempts: LayerAttempt[] = [];

    const refresh = options.forceRefresh === true;

    const fromBook = refresh
      ? skipLayer(attempts, 'openingBook')
      : this.queryBook(position, key, attempts);
    if (fromBook) {
      machine.transition('done');
      return fromBook;
    }

    machine.transition('querying_cache');
    const fromCache = refresh
      ? skipLayer(attempts, 'localCache')
      : this.queryCache(position, key, requiredLookupEffort, attempts);
    if (fromCache) {
      machine.transition('done');
      return fromCache;
    }

    machine.transition('invoking_engine');
    let analysis: EngineAnalysis;
    try {
      analysis = await this.invokeEngine(position, computeEffort, options, attempts);
    } catch (err) {
      machine.transition('failed');
      throw err;
    }

    const result: AnalysisResult = {
      positionKey: key.hashHex,
      boardSize: position.boardSize,
      komi: position.komi,
      movesSequence: position.sequence.map(formatMoveKey).join(';'),
      topMoves: sortCandidates(excludeOccupied(analysis.topMoves, position)).slice(
        0,
        this.config.topMovesCount,
      ),
      effortVisits: computeEffort,
      sourceLabel: 'liveEngine',
      completeness: analysis.completeness,
      computeDurationSeconds: analysis.durationSeconds,
      modelLabel: analysis.modelLabel,
      createdAt: new Date().toISOString(),
    };
    this.writeBack(result, key);
    machine.transition('done');
    return result;
  }

  /**
   * Cancel every in-flight engine call
   */
  cancel(): void {
    for (const call of [...this.inFlight]) {
      call.cancel();
    }
  }

  /**
   * Stop the engine, close the cache and drop the book
   */
  async dispose(): Promise<void> {
    this.cancel();
    const { engine, cache, book } = this.services;
    try {
      if (engine && this.engineStart) {
        await engine.stop();
      }
    } finally {
      this.engineStart = null;
      cache.close();
      book.clear();
    }
  }

  getStats(): AnalyzerStats {
    const bookStats = this.services.book.getStats();

    let cacheStats: CacheStats | undefined;
    if (this.cacheUnavailable === undefined) {
      try {
        cacheStats = this.services.cache.getStats();
      } catch (err) {
        console.warn(`[Orchestrator] Cache stats unavailable: ${errorMessage(err)}`);
      }
    }

    const byBoardSize: AnalyzerStats['byBoardSize'] = {};
    for (const size of SUPPORTED_BOARD_SIZES) {
      byBoardSize[size] = {
        book: bookStats.byBoardSize[size] ?? 0,
        cache: cacheStats?.byBoardSize[size] ?? 0,
      };
    }

    return {
      bookEntries: bookStats.totalEntries,
      cacheEntries: cacheStats?.totalEntries ?? 0,
      byBoardSize,
    };
  }

  private queryBook(
    position: Position,
    key: CanonicalKey,
    attempts: LayerAttempt[],
  ): AnalysisResult | undefined {
    const { book } = this.services;
    if (!this.config.bookEnabled) {
      attempts.push({ layer: 'openingBook', outcome: 'skipped', reason: 'disabled' });
      return undefined;
    }

    try {
      const hit = book.lookupPosition(position) ?? book.lookupByHash(key, position);
      if (hit) {
        return hit;
      }
    } catch (err) {
      console.warn(`[Orchestrator] Opening book lookup failed: ${errorMessage(err)}`);
      attempts.push({ layer: 'openingBook', outcome: 'error', reason: errorMessage(err) });
      return undefined;
    }

    attempts.push({
      layer: 'openingBook',
      outcome: 'miss',
      reason: book.isLoaded ? 'no entry' : 'not loaded',
    });
    return undefined;
  }

  private queryCache(
    position: Position,
    key: CanonicalKey,
    requiredLookupEffort: number,
    attempts: LayerAttempt[],
  ): AnalysisResult | undefined {
    if (this.cacheUnavailable !== undefined) {
      attempts.push({ layer: 'localCache', outcome: 'unavailable', reason: this.cacheUnavailable });
      return undefined;
    }

    let stored: AnalysisResult | undefined;
    try {
      stored = this.services.cache.getAtLeast(key.hashHex, position.komi, requiredLookupEffort);
    } catch (err) {
      console.warn(`[Orchestrator] Cache lookup failed: ${errorMessage(err)}`);
      attempts.push({ layer: 'localCache', outcome: 'error', reason: errorMessage(err) });
      return undefined;
    }

    if (!stored) {
      attempts.push({
        layer: 'localCache',
        outcome: 'miss',
        reason: `no entry with at least ${requiredLookupEffort} visits`,
      });
      return undefined;
    }

    const candidates = fromCanonicalOrientation(stored.topMoves, position.boardSize, key.symmetryIndex);
    return {
      ...stored,
      movesSequence: position.sequence.map(formatMoveKey).join(';'),
      topMoves: sortCandidates(excludeOccupied(candidates, position)),
      sourceLabel: 'localCache',
    };
  }

  private invokeEngine(
    position: Position,
    computeEffort: number,
    options: AnalyzeOptions,
    attempts: LayerAttempt[],
  ): Promise<EngineAnalysis> {
    const { engine } = this.services;
    if (!this.config.engineEnabled || engine === null) {
      attempts.push({ layer: 'liveEngine', outcome: 'unavailable', reason: 'engine disabled' });
      return Promise.reject(new EngineUnavailableError(attempts));
    }

    const { signal } = options;
    if (signal?.aborted) {
      attempts.push({ layer: 'liveEngine', outcome: 'cancelled', reason: 'aborted by caller' });
      return Promise.reject(new EngineCancelledError(attempts));
    }

    // The wall-clock limit and cancellation cover engine start-up as well
    const timeoutMs = this.config.engineTimeoutMs;
    return new Promise<EngineAnalysis>((resolve, reject) => {
      let settled = false;
      let task: AnalysisTask | undefined;

      const settle = (fn: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.inFlight.delete(call);
        fn();
      };

      const stopWith = (
        outcome: LayerAttempt['outcome'],
        reason: string,
        error: () => Error,
      ): void => {
        settle(() => {
          if (task) {
            engine.cancel(task.handle);
          }
          attempts.push({ layer: 'liveEngine', outcome, reason });
          reject(error());
        });
      };

      const call: InFlightCall = {
        cancel: () => stopWith('cancelled', 'cancelled', () => new EngineCancelledError(attempts)),
      };

      const timer = setTimeout(() => {
        stopWith(
          'timeout',
          `no result within ${timeoutMs}ms`,
          () => new EngineTimeoutError(attempts, timeoutMs),
        );
      }, timeoutMs);

      const onAbort = (): void => {
        stopWith('cancelled', 'aborted by caller', () => new EngineCancelledError(attempts));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.inFlight.add(call);

      const onStarted = (started: boolean): void => {
        if (settled) return;
        if (!started) {
          settle(() => {
            attempts.push({
              layer: 'liveEngine',
              outcome: 'unavailable',
              reason: 'engine failed to start',
            });
            reject(new EngineUnavailableError(attempts));
          });
          return;
        }

        try {
          task = engine.requestAnalysis(position, computeEffort, options.onProgress);
        } catch (err) {
          settle(() => {
            attempts.push({ layer: 'liveEngine', outcome: 'error', reason: errorMessage(err) });
            reject(new EngineFailedError(attempts, err));
          });
          return;
        }

        void task.result.then(
          (analysis) => settle(() => resolve(analysis)),
          (err: unknown) =>
            settle(() => {
              if (err instanceof AnalysisCancelledError) {
                attempts.push({ layer: 'liveEngine', outcome: 'cancelled', reason: 'cancelled' });
                reject(new EngineCancelledError(attempts));
                return;
              }
              attempts.push({ layer: 'liveEngine', outcome: 'error', reason: errorMessage(err) });
              reject(new EngineFailedError(attempts, err));
            }),
        );
      };

      void this.ensureEngineStarted(engine).then(onStarted);
    });
  }

  /**
   * Start the engine once; concurrent callers share the attempt. Never rejects.
   */
  private ensureEngineStarted(engine: AnalysisEngine): Promise<boolean> {
    if (!this.engineStart) {
      this.engineStart = (async (): Promise<boolean> => {
        try {
          return await engine.start();
        } catch (err) {
          console.warn(`[Orchestrator] Engine failed to start: ${errorMessage(err)}`);
          return false;
        }
      })();
    }
    return this.engineStart;
  }

  /**
   * Store an engine answer in canonical orientation. A failed write is logged.
   */
  private writeBack(result: AnalysisResult, key: CanonicalKey): void {
    if (this.cacheUnavailable !== undefined) {
      return;
    }
    try {
      this.services.cache.put({
        ...result,
        topMoves: toCanonicalOrientation(result.topMoves, result.boardSize, key.symmetryIndex),
      });
    } catch (err) {
      console.warn(`[Orchestrator] Failed to write analysis back to cache: ${errorMessage(err)}`);
    }
  }
}
