import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import type {
  Attempt,
  Diagnosis,
  ErrorCategory,
  ExecutionResponse,
  ExecutionTrace,
  Run,
  ScriptArtifact,
  StopReason,
  SynthesisRequest,
  SynthesisResponse,
  Task,
} from '../schema/index.js';
import {
  executionResponseSchema,
  statusForStopReason,
  synthesisResponseSchema,
} from '../schema/index.js';
import type { CostLedger, RunBudget } from '../budget/index.js';
import type { Classifier } from '../diagnosis/index.js';
import { classifyTrace } from '../diagnosis/index.js';
import type { RepairPolicy } from '../repair/index.js';
import { DEFAULT_REPAIR_POLICY, planRepair } from '../repair/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import { linkSignals, raceAbort } from '../utils/abort.js';
import * as log from '../utils/logger.js';
import type { ExecutionSandbox, ScriptSynthesizer } from './adapters.js';
import { ConfigError, billedCost, errorMessage } from './errors.js';
import type { RunState } from './machine.js';
import { assertTransition, isTerminal } from './machine.js';
import { parseTask } from './task.js';

// ── Public types ─────────────────────────────────────────────

export interface OrchestratorDeps {
  synthesizer: ScriptSynthesizer;
  sandbox: ExecutionSandbox;
  ledger: CostLedger;
  classify?: Classifier | undefined;
  repairPolicy?: RepairPolicy | undefined;
}

const orchestratorOptionsSchema = z.object({
  /** Floor for the reservation taken before each attempt. */
  estimatedAttemptCost: z.number().nonnegative(),
  /** Wall-clock deadline for the whole Run. */
  runTimeoutMs: z.number().int().positive(),
  /** Per-run ceiling; defaults to the ledger's. */
  maxCostPerRun: z.number().positive().optional(),
  /** Time the sandbox gets past the task timeout. */
  sandboxGraceMs: z.number().int().nonnegative().optional(),
});

export type OrchestratorOptions = z.infer<typeof orchestratorOptionsSchema>;

export interface RunOptions {
  /** External cancellation: aborts the in-flight call, Run ends `aborted`. */
  signal?: AbortSignal | undefined;
}

// ── Orchestrator ─────────────────────────────────────────────

/**
 * Drives generate → execute → diagnose → repair for each Run. Runs may be
 * started concurrently; they share only the CostLedger.
 */
export class Orchestrator {
  private readonly options: OrchestratorOptions;

  constructor(
    private readonly deps: OrchestratorDeps,
    options: OrchestratorOptions,
  ) {
    const result = orchestratorOptionsSchema.safeParse(options);
    if (!result.success) {
      throw ConfigError.fromZod('Invalid orchestrator options', result.error);
    }
    this.options = result.data;
  }

  /**
   * Start a Run. Task validation happens before the promise is created, so
   * a ConfigError is thrown synchronously; every other failure ends up in
   * the resolved Run's status.
   */
  run(input: Task, runOptions: RunOptions = {}): Promise<Run> {
    const task = parseTask(input);
    const driver = new RunDriver(task, this.deps, this.options, runOptions.signal);
    return driver.drive();
  }
}

// ── Per-run driver ───────────────────────────────────────────

/** The attempt being built between `generating` and `diagnosing`. */
interface PendingAttempt {
  ordinal: number;
  script: ScriptArtifact | null;
  trace: ExecutionTrace | null;
  cost: number;
}

class RunDriver {
  private readonly runId = randomUUID();
  private readonly startedAt = new Date();
  private readonly budget: RunBudget;
  private readonly classify: Classifier;
  private readonly policy: RepairPolicy;
  private readonly userSignal: AbortSignal | undefined;
  private readonly deadline = new AbortController();
  private readonly runSignal: AbortSignal;
  private readonly disposeRunSignal: () => void;

  private state: RunState = 'init';
  private readonly attempts: Attempt[] = [];
  private current: PendingAttempt | null = null;
  private latestScript: ScriptArtifact | null = null;
  private nextVersion = 1;
  private repairHint: string | null = null;
  private repairDiagnosis: Diagnosis | null = null;
  private stopReason: StopReason | null = null;
  private finalized: Run | null = null;

  constructor(
    private readonly task: Task,
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
    signal: AbortSignal | undefined,
  ) {
    this.budget = deps.ledger.openRun(options.maxCostPerRun);
    this.classify = deps.classify ?? classifyTrace;
    this.policy = deps.repairPolicy ?? DEFAULT_REPAIR_POLICY;
    this.userSignal = signal;

    const linked = signal
      ? linkSignals(signal, this.deadline.signal)
      : linkSignals(this.deadline.signal);
    this.runSignal = linked.signal;
    this.disposeRunSignal = linked.dispose;
  }

  async drive(): Promise<Run> {
    const maxAttempts = this.task.config.maxRepairAttempts + 1;
    log.section(`Run ${this.runId}`);
    log.info(`Task: ${this.task.description}`);
    log.detail(`URL: ${this.task.targetUrl}`);
    log.detail(
      `Auto-heal: ${this.task.config.autoHeal ? 'enabled' : 'disabled'}, up to ${String(maxAttempts)} attempt(s)`,
    );

    const timer = setTimeout(() => this.deadline.abort(), this.options.runTimeoutMs);
    timer.unref();

    try {
      while (!isTerminal(this.state)) {
        const next = await this.step();
        this.transition(next);
      }
    } finally {
      clearTimeout(timer);
      this.disposeRunSignal();
      this.budget.release();
    }

    return this.finalize();
  }

  // ── Scheduler ──────────────────────────────────────────────

  private step(): Promise<RunState> | RunState {
    switch (this.state) {
      case 'init':
        return 'generating';
      case 'generating':
        return this.generate();
      case 'executing':
        return this.execute();
      case 'diagnosing':
        return this.diagnose();
      case 'repairing':
        return this.repair();
      case 'succeeded':
      case 'stopped':
        return this.state;
    }
  }

  private transition(next: RunState): void {
    assertTransition(this.state, next);
    log.transition(this.state, next);
    this.state = next;
  }

  private stop(reason: StopReason): RunState {
    this.stopReason = reason;
    return 'stopped';
  }

  private abortReason(): StopReason {
    return this.userSignal?.aborted ? 'aborted' : 'deadline_exceeded';
  }

  // ── generating ─────────────────────────────────────────────

  private async generate(): Promise<RunState> {
    if (this.runSignal.aborted) return this.stop(this.abortReason());

    const estimate = Math.max(
      this.options.estimatedAttemptCost,
      this.attempts.at(-1)?.cost ?? 0,
    );
    if (!this.budget.reserve(estimate)) {
      log.spend(
        `Budget denied reservation of $${estimate.toFixed(4)} (run spend $${this.budget.spend.toFixed(4)} / $${this.budget.ceiling.toFixed(2)})`,
      );
      return this.stop('budget_exhausted');
    }

    const ordinal = this.attempts.length + 1;
    const current: PendingAttempt = { ordinal, script: null, trace: null, cost: 0 };
    this.current = current;
    log.attempt(ordinal, this.task.config.maxRepairAttempts + 1, this.nextVersion);

    const startedAt = Date.now();
    let response: SynthesisResponse;
    try {
      const raw = await raceAbort(
        this.deps.synthesizer.synthesize(this.synthesisRequest(), this.runSignal),
        this.runSignal,
      );
      response = synthesisResponseSchema.parse(raw);
    } catch (err) {
      if (this.runSignal.aborted) {
        // Nothing completed: no attempt, no cost.
        this.budget.release();
        this.current = null;
        return this.stop(this.abortReason());
      }
      const billed = billedCost(err);
      if (billed > 0) {
        this.budget.record(billed);
        current.cost += billed;
        log.spend(`Failed synthesis still cost $${billed.toFixed(4)}`);
      }
      this.budget.release();
      log.error(`Script synthesis failed: ${errorMessage(err)}`);
      current.trace = infrastructureTrace('synthesis', err, Date.now() - startedAt);
      return 'diagnosing';
    }

    this.budget.record(response.estimatedCost);
    log.spend(`Generated script v${String(this.nextVersion)} with ${response.model} ($${response.estimatedCost.toFixed(4)})`);

    const script: ScriptArtifact = Object.freeze({
      version: this.nextVersion++,
      code: response.code,
      model: response.model,
      cost: response.estimatedCost,
      ...(this.repairDiagnosis ? { diagnosis: this.repairDiagnosis } : {}),
    });
    current.script = script;
    current.cost += response.estimatedCost;
    this.latestScript = script;
    return 'executing';
  }

  private synthesisRequest(): SynthesisRequest {
    const category: ErrorCategory | undefined = this.repairDiagnosis?.category;
    return {
      taskDescription: this.task.description,
      targetUrl: this.task.targetUrl,
      timeoutMs: this.task.config.timeoutMs,
      ...(this.latestScript ? { priorScript: this.latestScript.code } : {}),
      ...(this.repairHint !== null ? { repairHint: this.repairHint } : {}),
      ...(category !== undefined ? { repairCategory: category } : {}),
    };
  }

  // ── executing ──────────────────────────────────────────────

  private async execute(): Promise<RunState> {
    const current = this.requireCurrent();
    const script = current.script;
    if (script === null) {
      throw new Error(`Attempt ${String(current.ordinal)} reached execution without a script`);
    }

    const { timeoutMs } = this.task.config;
    const grace = this.options.sandboxGraceMs ?? TIMEOUTS.SANDBOX_GRACE;
    const attemptTimeout = new AbortController();
    const linked = linkSignals(this.runSignal, attemptTimeout.signal);
    const timer = setTimeout(() => attemptTimeout.abort(), timeoutMs + grace);
    timer.unref();

    const startedAt = Date.now();
    let response: ExecutionResponse;
    try {
      const raw = await raceAbort(
        this.deps.sandbox.execute(
          {
            code: script.code,
            headless: this.task.config.headless,
            browserType: this.task.config.browserType,
            timeoutMs,
            label: `${this.runId}/attempt-${String(current.ordinal)}`,
          },
          linked.signal,
        ),
        linked.signal,
      );
      response = executionResponseSchema.parse(raw);
    } catch (err) {
      this.budget.release();
      const elapsed = Date.now() - startedAt;

      if (this.runSignal.aborted) {
        // Generation completed and stays billed; execution never did.
        current.trace = {
          status: 'failure',
          origin: 'sandbox',
          logs: [],
          artifactHandles: [],
          durationMs: elapsed,
          errorSignal: { message: 'Run aborted during execution' },
        };
        this.appendAttempt(current, undefined);
        return this.stop(this.abortReason());
      }

      if (attemptTimeout.signal.aborted) {
        current.trace = {
          status: 'failure',
          origin: 'sandbox',
          logs: [],
          artifactHandles: [],
          durationMs: elapsed,
          errorSignal: { message: `Execution timed out after ${String(timeoutMs)}ms` },
        };
        return 'diagnosing';
      }

      log.error(`Execution sandbox failed: ${errorMessage(err)}`);
      current.trace = infrastructureTrace('execution', err, elapsed);
      return 'diagnosing';
    } finally {
      clearTimeout(timer);
      linked.dispose();
    }

    if (response.cost !== undefined && response.cost > 0) {
      this.budget.record(response.cost);
      current.cost += response.cost;
    }
    // The attempt is over; hand back what its reservation did not use.
    this.budget.release();

    current.trace = {
      status: response.status,
      origin: 'sandbox',
      logs: response.logs,
      artifactHandles: response.artifactHandles,
      durationMs: response.durationMs,
      ...(response.errorSignal ? { errorSignal: response.errorSignal } : {}),
    };

    if (response.status === 'success') {
      log.attemptResult(current.ordinal, true, `succeeded in ${(response.durationMs / 1000).toFixed(1)}s`);
      this.appendAttempt(current, undefined);
      return 'succeeded';
    }

    log.attemptResult(current.ordinal, false, response.errorSignal?.message ?? 'execution failed');
    return 'diagnosing';
  }

  // ── diagnosing ─────────────────────────────────────────────

  private diagnose(): RunState {
    const current = this.requireCurrent();
    const trace = current.trace;
    if (trace === null) {
      throw new Error(`Attempt ${String(current.ordinal)} reached diagnosis without a trace`);
    }

    const diagnosis =
      trace.origin === 'infrastructure'
        ? infrastructureDiagnosis(trace)
        : this.classifySafely(trace);

    log.diagnosis(diagnosis.category, diagnosis.confidence, diagnosis.summary);
    this.appendAttempt(current, diagnosis);
    return 'repairing';
  }

  private classifySafely(trace: ExecutionTrace): Diagnosis {
    try {
      return this.classify(trace, { timeoutMs: this.task.config.timeoutMs });
    } catch (err) {
      log.warn(`Classifier failed: ${errorMessage(err)}`);
      return {
        category: 'unknown',
        summary: `Classifier failed: ${errorMessage(err)}`,
        confidence: 0,
        fixHint: '',
        evidence: trace.errorSignal ? [trace.errorSignal.message] : [],
      };
    }
  }

  // ── repairing ──────────────────────────────────────────────

  private repair(): RunState {
    const latest = this.attempts.at(-1)?.diagnosis;
    if (latest === undefined) {
      throw new Error('Repair planning requires a diagnosed attempt');
    }

    const decision = planRepair(this.attempts, latest, this.task.config, this.policy);
    if (decision.kind === 'stop') {
      log.repair(`Stopping: ${decision.reason}`);
      return this.stop(decision.reason);
    }

    log.repair(`Requesting repair for ${latest.category}`);
    this.repairHint = decision.hint;
    this.repairDiagnosis = latest;
    return 'generating';
  }

  // ── Attempt history ────────────────────────────────────────

  private requireCurrent(): PendingAttempt {
    if (this.current === null) {
      throw new Error(`No attempt in progress in state ${this.state}`);
    }
    return this.current;
  }

  private appendAttempt(pending: PendingAttempt, diagnosis: Diagnosis | undefined): void {
    if (pending.trace === null) {
      throw new Error(`Attempt ${String(pending.ordinal)} has no trace`);
    }
    if (pending.ordinal !== this.attempts.length + 1) {
      throw new Error(
        `Attempt ordinal ${String(pending.ordinal)} does not follow ${String(this.attempts.length)}`,
      );
    }

    const attempt: Attempt = deepFreeze({
      ordinal: pending.ordinal,
      script: pending.script,
      trace: pending.trace,
      ...(diagnosis ? { diagnosis } : {}),
      cost: pending.cost,
    });
    this.attempts.push(attempt);
    this.current = null;
  }

  // ── Finalization ───────────────────────────────────────────

  private finalize(): Run {
    if (this.finalized !== null) {
      throw new Error(`Run ${this.runId} is already finalized`);
    }

    const finalStatus =
      this.state === 'succeeded'
        ? 'succeeded'
        : statusForStopReason(this.stopReason ?? 'aborted');
    const totalCost = this.attempts.reduce((sum, a) => sum + a.cost, 0);
    const finishedAt = new Date();

    const run: Run = deepFreeze({
      runId: this.runId,
      task: this.task,
      attempts: [...this.attempts],
      finalStatus,
      stopReason: this.state === 'succeeded' ? null : this.stopReason,
      totalCost,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
    });
    this.finalized = run;

    log.section(`Run ${finalStatus.toUpperCase()}`);
    log.detail(`Attempts: ${String(run.attempts.length)}`);
    log.spend(`Run cost: $${totalCost.toFixed(4)}`);
    return run;
  }
}

// ── Infrastructure faults ────────────────────────────────────

function infrastructureTrace(
  boundary: 'synthesis' | 'execution',
  err: unknown,
  durationMs: number,
): ExecutionTrace {
  const message = errorMessage(err);
  return {
    status: 'failure',
    origin: 'infrastructure',
    logs: [`[infrastructure] ${boundary}: ${message}`],
    artifactHandles: [],
    durationMs,
    errorSignal: {
      message: `${boundary} adapter failed: ${message}`,
      ...(err instanceof Error && err.stack ? { stack: err.stack } : {}),
    },
  };
}

function infrastructureDiagnosis(trace: ExecutionTrace): Diagnosis {
  const message = trace.errorSignal?.message ?? 'adapter failed';
  return {
    category: 'unknown',
    summary: `Infrastructure fault: ${message}`,
    confidence: 0,
    fixHint: 'Retry the same task; the failure came from a service, not the script.',
    evidence: [message],
  };
}

// ── Helpers ──────────────────────────────────────────────────

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
