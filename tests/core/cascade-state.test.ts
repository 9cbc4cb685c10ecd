import { describe, it, expect } from 'vitest';
import {
  INITIAL_STATE,
  CascadeTransitionError,
  isTerminal,
  transition,
  type CascadeState,
} from '../../src/core/cascade-state.js';
import type { MethodName } from '../../src/types/index.js';

const METHODS: MethodName[] = ['structured', 'heuristic_dom', 'browser_emulation'];

function start(cooldownActive = false): CascadeState {
  return transition(INITIAL_STATE, { type: 'start', cooldownActive }, METHODS);
}

describe('cascade state machine', () => {
  it('should start with the first method', () => {
    expect(start()).toEqual({ kind: 'trying', method: 'structured', index: 0, sawProtection: false });
  });

  it('should block without trying anything when the domain is cooling down', () => {
    expect(start(true)).toEqual({ kind: 'blocked', reason: 'cooldown' });
  });

  it('should fail immediately with no methods', () => {
    expect(transition(INITIAL_STATE, { type: 'start', cooldownActive: false }, [])).toEqual({ kind: 'failed' });
  });

  it('should succeed on the current method', () => {
    const next = transition(start(), { type: 'error' }, METHODS);
    expect(transition(next, { type: 'success' }, METHODS)).toEqual({ kind: 'succeeded', method: 'heuristic_dom' });
  });

  it('should stop on not_found without advancing', () => {
    expect(transition(start(), { type: 'not_found' }, METHODS)).toEqual({ kind: 'not_found', method: 'structured' });
  });

  it('should advance on protection and remember it', () => {
    const next = transition(start(), { type: 'protection', kind: 'captcha' }, METHODS);
    expect(next).toEqual({ kind: 'trying', method: 'heuristic_dom', index: 1, sawProtection: true });
  });

  it('should end blocked when any method saw protection', () => {
    let state = start();
    state = transition(state, { type: 'protection', kind: 'rate_limited' }, METHODS);
    state = transition(state, { type: 'error' }, METHODS);
    state = transition(state, { type: 'skipped' }, METHODS);
    expect(state).toEqual({ kind: 'blocked', reason: 'protection' });
  });

  it('should end failed when no method saw protection', () => {
    let state = start();
    state = transition(state, { type: 'error' }, METHODS);
    state = transition(state, { type: 'skipped' }, METHODS);
    state = transition(state, { type: 'error' }, METHODS);
    expect(state).toEqual({ kind: 'failed' });
  });

  it('should reject events that do not fit the state', () => {
    expect(() => transition(INITIAL_STATE, { type: 'success' }, METHODS)).toThrow(CascadeTransitionError);
    expect(() => transition(start(), { type: 'start', cooldownActive: false }, METHODS)).toThrow(
      'Invalid cascade transition: start in state trying'
    );
    expect(() => transition({ kind: 'failed' }, { type: 'error' }, METHODS)).toThrow(CascadeTransitionError);
  });

  it('should identify terminal states', () => {
    expect(isTerminal(INITIAL_STATE)).toBe(false);
    expect(isTerminal(start())).toBe(false);
    expect(isTerminal({ kind: 'succeeded', method: 'structured' })).toBe(true);
    expect(isTerminal({ kind: 'blocked', reason: 'cooldown' })).toBe(true);
    expect(isTerminal({ kind: 'failed' })).toBe(true);
  });
});
