/**
 * Fallback orchestrator tests
 */

import * as path from 'node:path';

import {
  canonicalKey,
  createPosition,
  toCanonicalOrientation,
  UnsupportedPositionError,
} from '@gobook/core';
import { CacheStore, OpeningBookIndex } from '@gobook/database';
import {
  analysisResult,
  assertAnsweredBy,
  bookBundle,
  candidate,
  createMockEngine,
  createTempDir,
  removeTempDir,
  type MockEngine,
} from '@gobook/test-utils';
import type { EngineProgress } from '@gobook/types';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import {
  EngineCancelledError,
  EngineFailedError,
  EngineTimeoutError,
  EngineUnavailableError,
} from '../orchestrator/errors.js';
import { FallbackOrchestrator, type OrchestratorConfig } from '../orchestrator/orchestrator.js';
import type { LookupState } from '../orchestrator/state-machine.js';

const EMPTY_BOARD_BOOK = bookBundle()
  .withEntry({ topMoves: [candidate('E5', 0.55, { visitCount: 800 })] })
  .build();

describe('FallbackOrchestrator', () => {
  let dir: string;
  let book: OpeningBookIndex;
  let cache: CacheStore;
  let engine: MockEngine;
  let orchestrator: FallbackOrchestrator;

  function setup(
    engineConfig: Parameters<typeof createMockEngine>[0] = {},
    config: Partial<OrchestratorConfig> = {},
  ): void {
    engine = createMockEngine(engineConfig);
    orchestrator = new FallbackOrchestrator(
      { book, cache, engine },
      { bookSource: { kind: 'inline', data: EMPTY_BOARD_BOOK }, ...config },
    );
  }

  beforeEach(() => {
    dir = createTempDir('gobook-orchestrator-');
    book = new OpeningBookIndex();
    cache = new CacheStore({ dbPath: path.join(dir, 'cache.db') });
  });

  afterEach(async () => {
    await orchestrator.dispose();
    removeTempDir(dir);
    vi.restoreAllMocks();
  });

  describe('opening book layer', () => {
    it('should answer the empty board from the book', async () => {
      setup();
      await orchestrator.init();

      const result = await orchestrator.analyze({ boardSize: 9, komi: 7.5 }, 100, 500);

      assertAnsweredBy(result, 'openingBook', ['E5']);
      expect(engine.requestAnalysis).not.toHaveBeenCalled();
    });

    it('should win over the cache', async () => {
      setup();
      await orchestrator.init();
      const position = createPosition({ boardSize: 9, komi: 7.5 });
      cache.put(
        analysisResult()
          .withKey(canonicalKey(position).hashHex)
          .withTopMoves(candidate('C3', 0.9))
          .build(),
      );
      const getAtLeast = vi.spyOn(cache, 'getAtLeast');

      const result = await orchestrator.analyze({ boardSize: 9, komi: 7.5 }, 100, 500);

      assertAnsweredBy(result, 'openingBook');
      expect(getAtLeast).not.toHaveBeenCalled();
    });

    it('should be skipped when disabled', async () => {
      setup({}, { bookEnabled: false });
      await orchestrator.init();

      const result = await orchestrator.analyze({ boardSize: 9, komi: 7.5 }, 100, 500);

      assertAnsweredBy(result, 'liveEngine');
      expect(book.isLoaded).toBe(false);
    });

    it('should continue without the book when it fails to load', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      setup({}, { bookSource: { kind: 'file', path: path.join(dir, 'missing.json') } });
      await orchestrator.init();

      const result = await orchestrator.analyze({ boardSize: 9, komi: 7.5 }, 100, 500);

      assertAnsweredBy(result, 'liveEngine');
      expect(warn.mock.calls[0]?.[0]).toMatch(/^\[Orchestrator\] Opening book unavailable: /);
    });
  });

  describe('cache layer', () => {
    it('should answer from the cache without invoking the engine', async () => {
      setup();
      await orchestrator.init();
      const position = createPosition({ boardSize: 9, komi: 7.5, moves: 'B C3, W G6' });
      const key = canonicalKey(position);
      const moves = [candidate('D4', 0.6), candidate('H2', 0.3)];
      cache.put(
        analysisResult()
          .withKey(key.hashHex)
          .withMoves('B[C3];W[G6]')
          .withTopMoves(...toCanonicalOrientation(moves, 9, key.symmetryIndex))
          .withEffort(500)
          .build(),
      );

      const result = await orchestrator.analyze(
        { boardSize: 9, komi: 7.5, moves: 'B C3, W G6' },
        100,
        500,
      );

      assertAnsweredBy(result, 'localCache', ['D4', 'H2']);
      expect(result.movesSequence).toBe('B[C3];W[G6]');
      expect(result.topMoves).toEqual(moves);
      expect(result.effortVisits).toBe(500);
      expect(engine.requestAnalysis).not.toHaveBeenCalled();
    });

    it('should skip entries below the lookup effort', async () => {
      setup();
      await orchestrator.init();
      const position = createPosition({ boardSize: 9, komi: 7.5, moves: 'B C3' });
      cache.put(analysisResult().withKey(canonicalKey(position).hashHex).withEffort(50).build());

      const result = await orchestrator.analyze(
        { boardSize: 9, komi: 7.5, moves: 'B C3' },
        100,
        500,
      );

      assertAnsweredBy(result, 'liveEngine');
    });

    it('should disable the cache layer when the database cannot be opened', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      cache = new CacheStore({ dbPath: path.join(dir, 'missing.db'), readonly: true });
      setup({}, { engineEnabled: false });
      await orchestrator.init();

      const error = await orchestrator
        .analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EngineUnavailableError);
      if (error instanceof EngineUnavailableError) {
        expect(error.attempts[1]).toEqual({
          layer: 'localCache',
          outcome: 'unavailable',
          reason: expect.stringContaining('Database file not found'),
        });
      }
      expect(warn.mock.calls[0]?.[0]).toMatch(/^\[Orchestrator\] Cache disabled: /);
    });
  });

  describe('live engine layer', () => {
    it('should return filtered, sorted and limited engine moves', async () => {
      setup(
        {
          analysis: {
            topMoves: [
              candidate('E5', 0.9),
              candidate('D4', 0.4),
              candidate('C3', 0.6),
              candidate('G7', 0.3),
            ],
          },
        },
        { topMovesCount: 2 },
      );
      await orchestrator.init();
      const position = createPosition({ boardSize: 9, komi: 7.5, moves: 'B E5' });

      const result = await orchestrator.analyze(
        { boardSize: 9, komi: 7.5, moves: 'B E5' },
        100,
        500,
      );

      assertAnsweredBy(result, 'liveEngine', ['C3', 'D4']);
      expect(result.movesSequence).toBe('B[E5]');
      expect(result.positionKey).toBe(canonicalKey(position).hashHex);
      expect(result.effortVisits).toBe(500);
      expect(result.modelLabel).toBe('mock-model');
      expect(result.completeness).toBe('complete');
      expect(result.computeDurationSeconds).toBe(1.5);
      expect(engine.requestAnalysis).toHaveBeenCalledWith(expect.anything(), 500, undefined);
    });

    it('should write engine answers back to the cache', async () => {
      setup();
      await orchestrator.init();
      const request = { boardSize: 9, komi: 7.5, moves: 'B C3' };

      const first = await orchestrator.analyze(request, 100, 500);
      const second = await orchestrator.analyze(request, 100, 500);

      assertAnsweredBy(first, 'liveEngine');
      assertAnsweredBy(second, 'localCache');
      expect(second.topMoves).toEqual(first.topMoves);
      expect(engine.requestAnalysis).toHaveBeenCalledTimes(1);
    });

    it('should return the engine answer when the write-back fails', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      setup();
      await orchestrator.init();
      vi.spyOn(cache, 'put').mockImplementation(() => {
        throw new Error('disk full');
      });

      const result = await orchestrator.analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500);

      assertAnsweredBy(result, 'liveEngine');
      expect(warn).toHaveBeenCalledWith(
        '[Orchestrator] Failed to write analysis back to cache: disk full',
      );
    });

    it('should forward progress and state changes', async () => {
      const progress: EngineProgress[] = [
        { visits: 100, winProbability: 0.5, scoreLead: 0.2, bestMove: 'D4' },
      ];
      setup({ progress });
      await orchestrator.init();
      const onProgress = vi.fn();
      const states: LookupState[] = [];

      await orchestrator.analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500, {
        onProgress,
        onStateChange: (state) => states.push(state),
      });

      expect(onProgress).toHaveBeenCalledWith(progress[0]);
      expect(states).toEqual(['querying_book', 'querying_cache', 'invoking_engine', 'done']);
    });

    it('should fail with EngineUnavailableError when the engine is disabled', async () => {
      setup({}, { engineEnabled: false });
      await orchestrator.init();
      const states: LookupState[] = [];

      await expect(
        orchestrator.analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500, {
          onStateChange: (state) => states.push(state),
        }),
      ).rejects.toThrow('not in opening book or cache; live engine unavailable: engine disabled');
      expect(states[states.length - 1]).toBe('failed');
      expect(engine.start).not.toHaveBeenCalled();
    });

    it('should start the engine once even when it fails to start', async () => {
      setup({ available: false });
      await orchestrator.init();
      const request = { boardSize: 9, komi: 7.5, moves: 'B C3' };

      await expect(orchestrator.analyze(request, 100, 500)).rejects.toThrow(
        'live engine unavailable: engine failed to start',
      );
      await expect(orchestrator.analyze(request, 100, 500)).rejects.toBeInstanceOf(
        EngineUnavailableError,
      );
      expect(engine.start).toHaveBeenCalledTimes(1);
    });

    it('should time out and cancel the engine', async () => {
      setup({ hang: true }, { engineTimeoutMs: 50 });
      await orchestrator.init();

      const error = await orchestrator
        .analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EngineTimeoutError);
      if (error instanceof EngineTimeoutError) {
        expect(error.message).toBe(
          'not in opening book or cache; live engine timed out: no result within 50ms',
        );
      }
      expect(engine.cancel).toHaveBeenCalledWith({ id: 1 });
      expect(engine.requestAnalysis).toHaveBeenCalledTimes(1);
    });

    it('should cancel the engine when the caller aborts', async () => {
      setup({ hang: true });
      await orchestrator.init();
      const controller = new AbortController();

      const pending = orchestrator.analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500, {
        signal: controller.signal,
      });
      await vi.waitFor(() => expect(engine.requestAnalysis).toHaveBeenCalled());
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(EngineCancelledError);
      expect(engine.cancel).toHaveBeenCalledTimes(1);
    });

    it('should not invoke the engine when already aborted', async () => {
      setup();
      await orchestrator.init();
      const controller = new AbortController();
      controller.abort();

      await expect(
        orchestrator.analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500, {
          signal: controller.signal,
        }),
      ).rejects.toThrow('live engine cancelled: aborted by caller');
      expect(engine.requestAnalysis).not.toHaveBeenCalled();
    });

    it('should cancel in-flight calls on cancel()', async () => {
      setup({ hang: true });
      await orchestrator.init();

      const pending = orchestrator.analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500);
      await vi.waitFor(() => expect(engine.requestAnalysis).toHaveBeenCalled());
      orchestrator.cancel();

      await expect(pending).rejects.toThrow('live engine cancelled: cancelled');
    });

    it('should skip the book and cache when a refresh is forced', async () => {
      setup();
      await orchestrator.init();
      const states: LookupState[] = [];

      const result = await orchestrator.analyze({ boardSize: 9, komi: 7.5 }, 100, 500, {
        forceRefresh: true,
        onStateChange: (state) => states.push(state),
      });

      expect(result.sourceLabel).toBe('liveEngine');
      expect(result.topMoves.map((c) => c.move)).toEqual(['D4', 'C3']);
      expect(engine.requestAnalysis).toHaveBeenCalledTimes(1);
      expect(states).toEqual(['querying_book', 'querying_cache', 'invoking_engine', 'done']);
      expect(cache.count()).toBe(1);
    });

    it('should name the skipped layers when a refresh cannot run', async () => {
      setup({}, { engineEnabled: false });
      await orchestrator.init();

      await expect(
        orchestrator.analyze({ boardSize: 9, komi: 7.5 }, 100, 500, { forceRefresh: true }),
      ).rejects.toThrow(
        'opening book skipped: refresh requested; cache skipped: refresh requested; ' +
          'live engine unavailable: engine disabled',
      );
    });

    describe('while the engine is starting', () => {
      const hangStart = (): void => {
        engine.start.mockImplementation(() => new Promise<boolean>(() => {}));
      };

      it('should time out a start that never finishes', async () => {
        setup({}, { engineTimeoutMs: 50 });
        hangStart();
        await orchestrator.init();

        const error = await orchestrator
          .analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500)
          .catch((err: unknown) => err);

        expect(error).toBeInstanceOf(EngineTimeoutError);
        if (error instanceof EngineTimeoutError) {
          expect(error.message).toBe(
            'not in opening book or cache; live engine timed out: no result within 50ms',
          );
        }
        expect(engine.requestAnalysis).not.toHaveBeenCalled();
      });

      it('should honor an abort', async () => {
        setup();
        hangStart();
        await orchestrator.init();
        const controller = new AbortController();

        const pending = orchestrator.analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500, {
          signal: controller.signal,
        });
        await vi.waitFor(() => expect(engine.start).toHaveBeenCalled());
        controller.abort();

        await expect(pending).rejects.toThrow('live engine cancelled: aborted by caller');
        expect(engine.requestAnalysis).not.toHaveBeenCalled();
        expect(engine.cancel).not.toHaveBeenCalled();
      });

      it('should honor cancel()', async () => {
        setup();
        hangStart();
        await orchestrator.init();

        const pending = orchestrator.analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500);
        await vi.waitFor(() => expect(engine.start).toHaveBeenCalled());
        orchestrator.cancel();

        await expect(pending).rejects.toBeInstanceOf(EngineCancelledError);
        expect(engine.requestAnalysis).not.toHaveBeenCalled();
      });
    });

    it('should wrap engine errors', async () => {
      const crash = new Error('engine crashed');
      setup({ error: crash });
      await orchestrator.init();

      const error = await orchestrator
        .analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(EngineFailedError);
      if (error instanceof EngineFailedError) {
        expect(error.cause).toBe(crash);
        expect(error.message).toBe(
          'not in opening book or cache; live engine failed: engine crashed',
        );
      }
    });
  });

  describe('position validation', () => {
    it('should reject unsupported positions before any lookup', async () => {
      setup();
      await orchestrator.init();
      const lookup = vi.spyOn(book, 'lookupPosition');

      await expect(orchestrator.analyze({ boardSize: 7 }, 100, 500)).rejects.toBeInstanceOf(
        UnsupportedPositionError,
      );
      expect(lookup).not.toHaveBeenCalled();
    });
  });

  describe('getStats', () => {
    it('should combine book and cache counts per board size', async () => {
      setup(
        {},
        {
          bookSource: {
            kind: 'inline',
            data: bookBundle()
              .withEntry({ topMoves: [candidate('E5', 0.5)] })
              .withEntry({ moves: 'B[E5]', topMoves: [candidate('C3', 0.5)] })
              .withEntry({ boardSize: 19, topMoves: [candidate('Q16', 0.5)] })
              .build(),
          },
        },
      );
      await orchestrator.init();
      cache.put(analysisResult().withKey('00000000000000aa').build());

      expect(orchestrator.getStats()).toEqual({
        bookEntries: 3,
        cacheEntries: 1,
        byBoardSize: {
          9: { book: 2, cache: 1 },
          13: { book: 0, cache: 0 },
          19: { book: 1, cache: 0 },
        },
      });
    });
  });

  describe('dispose', () => {
    it('should stop a started engine and release the stores', async () => {
      setup();
      await orchestrator.init();
      await orchestrator.analyze({ boardSize: 9, komi: 7.5, moves: 'B C3' }, 100, 500);

      await orchestrator.dispose();

      expect(engine.stop).toHaveBeenCalledTimes(1);
      expect(cache.isConnected).toBe(false);
      expect(book.isLoaded).toBe(false);
    });

    it('should not stop an engine that never started', async () => {
      setup();
      await orchestrator.init();

      await orchestrator.dispose();

      expect(engine.stop).not.toHaveBeenCalled();
    });
  });
});
