import { StateTransitionError } from './errors.js';

// ── States ───────────────────────────────────────────────────

export type RunState =
  | 'init'
  | 'generating'
  | 'executing'
  | 'diagnosing'
  | 'repairing'
  | 'succeeded'
  | 'stopped';

/**
 * Legal transitions. `generating → diagnosing` covers a synthesis fault,
 * which becomes an infrastructure attempt; `executing → stopped` covers
 * cancellation mid-execution.
 */
export const TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  init: ['generating'],
  generating: ['executing', 'diagnosing', 'stopped'],
  executing: ['succeeded', 'diagnosing', 'stopped'],
  diagnosing: ['repairing'],
  repairing: ['generating', 'stopped'],
  succeeded: [],
  stopped: [],
};

export function isTerminal(state: RunState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: RunState, to: RunState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: RunState, to: RunState): void {
  if (!canTransition(from, to)) {
    throw new StateTransitionError(from, to);
  }
}
