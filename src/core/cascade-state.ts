/**
 * Extraction cascade state machine
 *
 * NotStarted → Trying(method[0]) → Trying(method[1]) → ... →
 * {Succeeded, NotFound, Blocked, Failed}
 *
 * The transition function is pure. The cascade feeds it one event per
 * method attempt and performs whatever the resulting state asks for.
 */

import type { MethodName, ProtectionKind } from '../types/index.js';

export type CascadeState =
  | { kind: 'not_started' }
  | { kind: 'trying'; method: MethodName; index: number; sawProtection: boolean }
  | { kind: 'succeeded'; method: MethodName }
  | { kind: 'not_found'; method: MethodName }
  | { kind: 'blocked'; reason: 'cooldown' | 'protection' }
  | { kind: 'failed' };

export type CascadeEvent =
  /** Begin; cooldown is only consulted before the first method */
  | { type: 'start'; cooldownActive: boolean }
  | { type: 'success' }
  | { type: 'not_found' }
  | { type: 'protection'; kind: ProtectionKind }
  /** Network error, timeout, unusable content, non-protection HTTP error */
  | { type: 'error' }
  /** Method skipped by its failure counter */
  | { type: 'skipped' };

export type TerminalState = Extract<CascadeState, { kind: 'succeeded' | 'not_found' | 'blocked' | 'failed' }>;

export class CascadeTransitionError extends Error {
  constructor(state: CascadeState, event: CascadeEvent) {
    super(`Invalid cascade transition: ${event.type} in state ${state.kind}`);
    this.name = 'CascadeTransitionError';
  }
}

export const INITIAL_STATE: CascadeState = { kind: 'not_started' };

export function isTerminal(state: CascadeState): state is TerminalState {
  return (
    state.kind === 'succeeded' ||
    state.kind === 'not_found' ||
    state.kind === 'blocked' ||
    state.kind === 'failed'
  );
}

function advance(
  index: number,
  sawProtection: boolean,
  methods: readonly MethodName[]
): CascadeState {
  const next = index + 1;
  if (next < methods.length) {
    return { kind: 'trying', method: methods[next], index: next, sawProtection };
  }
  return sawProtection ? { kind: 'blocked', reason: 'protection' } : { kind: 'failed' };
}

export function transition(
  state: CascadeState,
  event: CascadeEvent,
  methods: readonly MethodName[]
): CascadeState {
  if (state.kind === 'not_started') {
    if (event.type !== 'start') {
      throw new CascadeTransitionError(state, event);
    }
    if (event.cooldownActive) {
      return { kind: 'blocked', reason: 'cooldown' };
    }
    if (methods.length === 0) {
      return { kind: 'failed' };
    }
    return { kind: 'trying', method: methods[0], index: 0, sawProtection: false };
  }

  if (state.kind !== 'trying') {
    throw new CascadeTransitionError(state, event);
  }

  switch (event.type) {
    case 'success':
      return { kind: 'succeeded', method: state.method };
    case 'not_found':
      return { kind: 'not_found', method: state.method };
    case 'protection':
      return advance(state.index, true, methods);
    case 'error':
    case 'skipped':
      return advance(state.index, state.sawProtection, methods);
    case 'start':
      throw new CascadeTransitionError(state, event);
  }
}
