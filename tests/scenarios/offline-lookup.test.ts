/**
 * End-to-end lookup scenarios
 * Book, cache and engine wired together the way the CLI wires them
 */

import * as path from 'node:path';

import {
  EngineCancelledError,
  EngineTimeoutError,
  EngineUnavailableError,
  FallbackOrchestrator,
} from '@gobook/cli/orchestrator';
import { canonicalKey, createPosition } from '@gobook/core';
import { CacheStore, OpeningBookIndex } from '@gobook/database';
import {
  analysisResult,
  assertAnsweredBy,
  assertNoOccupiedSuggestions,
  assertSortedByWinProbability,
  bookBundle,
  candidate,
  createMockEngine,
  createTempDir,
  removeTempDir,
  writeJsonFixture,
} from '@gobook/test-utils';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

describe('Offline lookup scenarios', () => {
  let dir: string;
  let bookPath: string;
  const disposers: Array<() => Promise<void>> = [];

  function createOrchestrator(
    engine: ReturnType<typeof createMockEngine> | null,
    engineTimeoutMs = 60000,
  ): { orchestrator: FallbackOrchestrator; cache: CacheStore } {
    const cache = new CacheStore({ dbPath: path.join(dir, 'analysis.db') });
    const orchestrator = new FallbackOrchestrator(
      { book: new OpeningBookIndex(), cache, engine },
      {
        engineEnabled: engine !== null,
        engineTimeoutMs,
        bookSource: { kind: 'file', path: bookPath },
      },
    );
    disposers.push(() => orchestrator.dispose());
    return { orchestrator, cache };
  }

  beforeEach(() => {
    dir = createTempDir('gobook-scenario-');
    bookPath = writeJsonFixture(
      dir,
      'opening_book.json.gz',
      bookBundle()
        .withEntry({
          topMoves: [
            candidate('E5', 0.56, { scoreLead: 0.9, visitCount: 2400 }),
            candidate('C3', 0.44, { scoreLead: -0.6, visitCount: 300 }),
          ],
          effortVisits: 3000,
        })
        .buildCompact(),
    );
  });

  afterEach(async () => {
    for (const dispose of disposers.splice(0)) {
      await dispose();
    }
    removeTempDir(dir);
  });

  it('answers the empty 9x9 board from the opening book', async () => {
    const engine = createMockEngine();
    const { orchestrator } = createOrchestrator(engine);
    await orchestrator.init();

    const result = await orchestrator.analyze({ boardSize: 9, komi: 7.5 }, 100, 500);

    assertAnsweredBy(result, 'openingBook');
    expect(result.topMoves.length).toBeGreaterThan(0);
    expect(result.topMoves[0]?.move).toBe('E5');
    assertSortedByWinProbability(result.topMoves);
    expect(engine.start).not.toHaveBeenCalled();
  });

  it('answers a cached position without invoking the engine', async () => {
    const seed = createOrchestrator(
      createMockEngine({ analysis: { topMoves: [candidate('D4', 0.6), candidate('H2', 0.3)] } }),
    );
    await seed.orchestrator.init();
    await seed.orchestrator.analyze({ boardSize: 9, komi: 7.5, moves: 'B C3, W G6' }, 100, 500);
    await seed.orchestrator.dispose();

    const engine = createMockEngine();
    const { orchestrator } = createOrchestrator(engine);
    await orchestrator.init();
    const result = await orchestrator.analyze(
      { boardSize: 9, komi: 7.5, moves: 'B C3, W G6' },
      100,
      500,
    );

    assertAnsweredBy(result, 'localCache', ['D4', 'H2']);
    expect(result.effortVisits).toBe(500);
    expect(engine.requestAnalysis).not.toHaveBeenCalled();
  });

  it('fails with EngineUnavailableError when nothing can answer', async () => {
    const { orchestrator } = createOrchestrator(null);
    await orchestrator.init();

    const error = await orchestrator
      .analyze({ boardSize: 9, komi: 7.5, moves: 'B C3, W G6' }, 100, 500)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(EngineUnavailableError);
    if (error instanceof EngineUnavailableError) {
      expect(error.message).toBe(
        'not in opening book or cache; live engine unavailable: engine disabled',
      );
      expect(error.attempts.map((attempt) => attempt.outcome)).toEqual([
        'miss',
        'miss',
        'unavailable',
      ]);
    }
  });

  it('answers the mirrored position from the same cache entry', async () => {
    const seed = createOrchestrator(
      createMockEngine({ analysis: { topMoves: [candidate('D4', 0.6), candidate('H2', 0.3)] } }),
    );
    await seed.orchestrator.init();
    const original = await seed.orchestrator.analyze(
      { boardSize: 9, komi: 7.5, moves: 'B C3, W G6' },
      100,
      500,
    );
    await seed.orchestrator.dispose();

    const engine = createMockEngine();
    const { orchestrator } = createOrchestrator(engine);
    await orchestrator.init();
    // Left-right mirror: column x becomes 8 - x
    const mirrored = await orchestrator.analyze(
      { boardSize: 9, komi: 7.5, moves: 'B G3, W C6' },
      100,
      500,
    );

    assertAnsweredBy(mirrored, 'localCache', ['F4', 'B2']);
    expect(mirrored.positionKey).toBe(original.positionKey);
    expect(mirrored.movesSequence).toBe('B[G3];W[C6]');
    assertNoOccupiedSuggestions(mirrored, ['G3', 'C6']);
    expect(engine.requestAnalysis).not.toHaveBeenCalled();
  });

  it('prefers the opening book over a cached entry for the same position', async () => {
    const { orchestrator, cache } = createOrchestrator(createMockEngine());
    await orchestrator.init();
    const emptyBoard = canonicalKey(createPosition({ boardSize: 9, komi: 7.5 }));
    cache.put(
      analysisResult()
        .withKey(emptyBoard.hashHex)
        .withTopMoves(candidate('G7', 0.9))
        .withEffort(5000)
        .build(),
    );

    const result = await orchestrator.analyze({ boardSize: 9, komi: 7.5 }, 100, 500);

    assertAnsweredBy(result, 'openingBook');
    expect(result.effortVisits).toBe(3000);
    expect(result.topMoves[0]?.move).toBe('E5');
  });

  it('cancels a slow engine at the wall-clock limit', async () => {
    const engine = createMockEngine({ hang: true });
    const { orchestrator } = createOrchestrator(engine, 100);
    await orchestrator.init();

    await expect(
      orchestrator.analyze({ boardSize: 19, komi: 7.5, moves: 'B Q16' }, 100, 150),
    ).rejects.toBeInstanceOf(EngineTimeoutError);
    expect(engine.cancel).toHaveBeenCalledTimes(1);
    expect(engine.requestAnalysis).toHaveBeenCalledTimes(1);
  });

  it('stops the engine call when the caller aborts', async () => {
    const engine = createMockEngine({ hang: true });
    const { orchestrator } = createOrchestrator(engine);
    await orchestrator.init();
    const controller = new AbortController();

    const pending = orchestrator.analyze({ boardSize: 13, komi: 6.5, moves: 'B D4' }, 100, 500, {
      signal: controller.signal,
    });
    await vi.waitFor(() => expect(engine.requestAnalysis).toHaveBeenCalled());
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(EngineCancelledError);
    expect(engine.cancel).toHaveBeenCalledTimes(1);
  });
});
