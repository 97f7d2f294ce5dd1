/**
 * Lookup failure error tests
 */

import { describe, it, expect } from 'vitest';

import {
  AnalysisFailedError,
  EngineFailedError,
  EngineTimeoutError,
  EngineUnavailableError,
  composeFailureMessage,
  type LayerAttempt,
} from '../orchestrator/errors.js';

const misses: LayerAttempt[] = [
  { layer: 'openingBook', outcome: 'miss', reason: 'no entry' },
  { layer: 'localCache', outcome: 'miss', reason: 'no entry with at least 100 visits' },
];

describe('composeFailureMessage', () => {
  it('should group misses and describe other outcomes', () => {
    expect(
      composeFailureMessage([
        ...misses,
        { layer: 'liveEngine', outcome: 'unavailable', reason: 'engine disabled' },
      ]),
    ).toBe('not in opening book or cache; live engine unavailable: engine disabled');
  });

  it('should describe layer errors', () => {
    expect(
      composeFailureMessage([
        { layer: 'openingBook', outcome: 'skipped', reason: 'disabled' },
        { layer: 'localCache', outcome: 'error', reason: 'disk I/O error' },
        { layer: 'liveEngine', outcome: 'timeout', reason: 'no result within 50ms' },
      ]),
    ).toBe(
      'opening book skipped: disabled; cache failed: disk I/O error; live engine timed out: no result within 50ms',
    );
  });
});

describe('AnalysisFailedError', () => {
  it('should carry a copy of the attempts', () => {
    const attempts: LayerAttempt[] = [...misses];
    const error = new EngineUnavailableError(attempts);
    attempts.pop();

    expect(error).toBeInstanceOf(AnalysisFailedError);
    expect(error.name).toBe('EngineUnavailableError');
    expect(error.attempts).toHaveLength(2);
  });

  it('should keep the timeout', () => {
    expect(new EngineTimeoutError(misses, 250).timeoutMs).toBe(250);
  });

  it('should keep the engine error as cause', () => {
    const cause = new Error('engine crashed');
    expect(new EngineFailedError(misses, cause).cause).toBe(cause);
  });
});
