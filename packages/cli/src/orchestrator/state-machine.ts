/**
 * Lookup state machine
 *
 * One machine per analyze() call. States only move forward; done and
 * failed are terminal.
 */

export type LookupState = 'querying_book' | 'querying_cache' | 'invoking_engine' | 'done' | 'failed';

const STATE_ORDER: Record<LookupState, number> = {
  querying_book: 0,
  querying_cache: 1,
  invoking_engine: 2,
  done: 3,
  failed: 3,
};

/**
 * Error thrown on a backward or post-terminal transition
 */
export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: LookupState,
    public readonly to: LookupState,
  ) {
    super(`Invalid lookup state transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export type StateListener = (state: LookupState) => void;

export class LookupStateMachine {
  private current: LookupState = 'querying_book';
  private readonly visited: LookupState[] = ['querying_book'];

  constructor(private readonly listener?: StateListener) {
    listener?.('querying_book');
  }

  get state(): LookupState {
    return this.current;
  }

  get isTerminal(): boolean {
    return this.current === 'done' || this.current === 'failed';
  }

  /**
   * States entered so far, in order
   */
  get history(): readonly LookupState[] {
    return this.visited;
  }

  /**
   * Move to a later state
   *
   * @throws InvalidTransitionError when the move is not forward
   */
  transition(next: LookupState): void {
    if (this.isTerminal || STATE_ORDER[next] <= STATE_ORDER[this.current]) {
      throw new InvalidTransitionError(this.current, next);
    }
    this.current = next;
    this.visited.push(next);
    this.listener?.(next);
  }
}
