/**
 * Lookup failure errors
 *
 * A failed analyze() surfaces one error describing every layer that was
 * tried and why it could not answer.
 */

/**
 * Lookup layer, named after the source label it produces
 */
export type LookupLayer = 'openingBook' | 'localCache' | 'liveEngine';

/**
 * Why a layer did not answer
 */
export type AttemptOutcome = 'miss' | 'skipped' | 'error' | 'unavailable' | 'timeout' | 'cancelled';

/**
 * One layer's failed attempt
 */
export interface LayerAttempt {
  layer: LookupLayer;
  outcome: AttemptOutcome;
  reason: string;
}

/**
 * Human-readable layer names
 */
export const LAYER_NAMES: Record<LookupLayer, string> = {
  openingBook: 'opening book',
  localCache: 'cache',
  liveEngine: 'live engine',
};

const OUTCOME_PHRASES: Record<AttemptOutcome, string> = {
  miss: 'missed',
  skipped: 'skipped',
  error: 'failed',
  unavailable: 'unavailable',
  timeout: 'timed out',
  cancelled: 'cancelled',
};

/**
 * Compose one message from the attempts, e.g.
 * "not in opening book or cache; live engine unavailable: engine disabled"
 */
export function composeFailureMessage(attempts: readonly LayerAttempt[]): string {
  const missed = attempts
    .filter((attempt) => attempt.outcome === 'miss')
    .map((attempt) => LAYER_NAMES[attempt.layer]);

  const parts: string[] = [];
  if (missed.length > 0) {
    parts.push(`not in ${missed.join(' or ')}`);
  }
  for (const attempt of attempts) {
    if (attempt.outcome !== 'miss') {
      parts.push(`${LAYER_NAMES[attempt.layer]} ${OUTCOME_PHRASES[attempt.outcome]}: ${attempt.reason}`);
    }
  }
  return parts.join('; ');
}

/**
 * Base error for an analysis no layer could answer
 */
export class AnalysisFailedError extends Error {
  public readonly attempts: readonly LayerAttempt[];

  constructor(attempts: readonly LayerAttempt[], options?: { cause?: unknown }) {
    super(composeFailureMessage(attempts), options);
    this.name = 'AnalysisFailedError';
    this.attempts = [...attempts];
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AnalysisFailedError);
    }
  }
}

/**
 * Live engine disabled, missing, or failed to start
 */
export class EngineUnavailableError extends AnalysisFailedError {
  constructor(attempts: readonly LayerAttempt[]) {
    super(attempts);
    this.name = 'EngineUnavailableError';
  }
}

/**
 * Live engine did not answer within the wall-clock limit
 */
export class EngineTimeoutError extends AnalysisFailedError {
  constructor(
    attempts: readonly LayerAttempt[],
    public readonly timeoutMs: number,
  ) {
    super(attempts);
    this.name = 'EngineTimeoutError';
  }
}

/**
 * Caller aborted or cancelled the engine call
 */
export class EngineCancelledError extends AnalysisFailedError {
  constructor(attempts: readonly LayerAttempt[]) {
    super(attempts);
    this.name = 'EngineCancelledError';
  }
}

/**
 * Live engine reported an error
 */
export class EngineFailedError extends AnalysisFailedError {
  constructor(attempts: readonly LayerAttempt[], cause: unknown) {
    super(attempts, { cause });
    this.name = 'EngineFailedError';
  }
}
