/**
 * Error classes for analysis engine operations
 */

/**
 * Base error class for engine errors
 */
export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EngineError);
    }
  }
}

/**
 * Error thrown when the engine process cannot be started
 */
export class EngineStartupError extends EngineError {
  constructor(
    public readonly command: string,
    reason: string,
  ) {
    super(`Failed to start engine '${command}': ${reason}`);
    this.name = 'EngineStartupError';
  }
}

/**
 * Error thrown when the engine process dies or its pipes fail
 */
export class EngineProcessError extends EngineError {
  constructor(message: string) {
    super(message);
    this.name = 'EngineProcessError';
  }
}

/**
 * Error thrown when the engine answers a command with a GTP failure
 */
export class EngineCommandError extends EngineError {
  constructor(
    public readonly command: string,
    public readonly response: string,
  ) {
    super(`GTP command '${command}' failed: ${response || 'unknown error'}`);
    this.name = 'EngineCommandError';
  }
}

/**
 * Error an analysis task rejects with after cancel()
 */
export class AnalysisCancelledError extends EngineError {
  constructor(public readonly handleId: number) {
    super(`Analysis ${handleId} was cancelled`);
    this.name = 'AnalysisCancelledError';
  }
}
