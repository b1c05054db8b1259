import { z } from 'zod';

// ── Error signal ─────────────────────────────────────────────

export const errorSignalSchema = z.object({
  message: z.string(),
  stack: z.string().optional(),
  failingStepIndex: z.number().int().nonnegative().optional(),
  failingStepAction: z.string().optional(),
});

export type ErrorSignal = z.infer<typeof errorSignalSchema>;

// ── Execution trace ──────────────────────────────────────────

export const traceStatusSchema = z.enum(['success', 'failure']);

export type TraceStatus = z.infer<typeof traceStatusSchema>;

/**
 * Where a failure came from. `sandbox` failures are produced by running the
 * script; `infrastructure` failures are synthesized by the orchestrator when
 * an adapter itself faulted.
 */
export const traceOriginSchema = z.enum(['sandbox', 'infrastructure']);

export type TraceOrigin = z.infer<typeof traceOriginSchema>;

export const executionTraceSchema = z.object({
  status: traceStatusSchema,
  origin: traceOriginSchema,
  logs: z.array(z.string()),
  artifactHandles: z.array(z.string()),
  durationMs: z.number().nonnegative(),
  errorSignal: errorSignalSchema.optional(),
});

export type ExecutionTrace = z.infer<typeof executionTraceSchema>;
