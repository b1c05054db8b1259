/**
 * Core orchestration module.
 * Attempt state machine: generate → execute → diagnose → repair → retry.
 * Talks to the outside world only through the adapter interfaces.
 */

export { Orchestrator } from './orchestrator.js';
export type { OrchestratorDeps, OrchestratorOptions, RunOptions } from './orchestrator.js';
export type { ScriptSynthesizer, ExecutionSandbox } from './adapters.js';
export { TRANSITIONS, isTerminal, canTransition, assertTransition } from './machine.js';
export type { RunState } from './machine.js';
export { parseTask, taskFromSettings } from './task.js';
export { ConfigError, StateTransitionError, AbortedError, errorMessage } from './errors.js';
