/**
 * Lookup state machine tests
 */

import { describe, it, expect, vi } from 'vitest';

import {
  InvalidTransitionError,
  LookupStateMachine,
  type LookupState,
} from '../orchestrator/state-machine.js';

describe('LookupStateMachine', () => {
  it('should start in querying_book and notify the listener', () => {
    const listener = vi.fn();
    const machine = new LookupStateMachine(listener);

    expect(machine.state).toBe('querying_book');
    expect(listener).toHaveBeenCalledWith('querying_book');
  });

  it('should walk the full chain', () => {
    const seen: LookupState[] = [];
    const machine = new LookupStateMachine((state) => seen.push(state));

    machine.transition('querying_cache');
    machine.transition('invoking_engine');
    machine.transition('done');

    expect(seen).toEqual(['querying_book', 'querying_cache', 'invoking_engine', 'done']);
    expect(machine.history).toEqual(seen);
    expect(machine.isTerminal).toBe(true);
  });

  it('should allow skipping forward', () => {
    const machine = new LookupStateMachine();
    machine.transition('done');
    expect(machine.history).toEqual(['querying_book', 'done']);
  });

  it('should reject a backward transition', () => {
    const machine = new LookupStateMachine();
    machine.transition('invoking_engine');

    expect(() => machine.transition('querying_cache')).toThrow(
      'Invalid lookup state transition: invoking_engine -> querying_cache',
    );
    expect(machine.state).toBe('invoking_engine');
  });

  it('should reject repeating the current state', () => {
    const machine = new LookupStateMachine();
    expect(() => machine.transition('querying_book')).toThrow(InvalidTransitionError);
  });

  it('should reject any transition out of a terminal state', () => {
    const machine = new LookupStateMachine();
    machine.transition('failed');

    expect(() => machine.transition('done')).toThrow(
      'Invalid lookup state transition: failed -> done',
    );
  });
});
