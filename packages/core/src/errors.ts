/**
 * Error classes for position handling
 */

/**
 * Error thrown when a position cannot be analyzed: unsupported board size,
 * malformed move text, off-board or already-occupied coordinates.
 *
 * Raised at the API boundary, before any lookup work.
 */
export class UnsupportedPositionError extends Error {
  constructor(
    message: string,
    public readonly input?: string,
  ) {
    super(message);
    this.name = 'UnsupportedPositionError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UnsupportedPositionError);
    }
  }
}
