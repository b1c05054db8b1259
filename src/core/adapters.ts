import type {
  ExecutionRequest,
  ExecutionResponse,
  SynthesisRequest,
  SynthesisResponse,
} from '../schema/index.js';

/**
 * Turns a task (and, on repair, the prior script plus a repair hint) into
 * a new script. Throws on failure; the orchestrator records the fault as
 * an infrastructure attempt.
 */
export interface ScriptSynthesizer {
  synthesize(request: SynthesisRequest, signal: AbortSignal): Promise<SynthesisResponse>;
}

/**
 * Runs a script and reports what happened. Script failures are returned
 * as a `failure` response; only infrastructure faults throw.
 */
export interface ExecutionSandbox {
  execute(request: ExecutionRequest, signal: AbortSignal): Promise<ExecutionResponse>;
}
