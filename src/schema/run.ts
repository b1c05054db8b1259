import { z } from 'zod';

import { taskSchema } from './task.js';
import { scriptArtifactSchema } from './script.js';
import { executionTraceSchema } from './trace.js';
import { diagnosisSchema } from './diagnosis.js';

// ── Attempt ──────────────────────────────────────────────────

export const attemptSchema = z.object({
  ordinal: z.number().int().positive(),
  script: scriptArtifactSchema.nullable(),
  trace: executionTraceSchema,
  diagnosis: diagnosisSchema.optional(),
  cost: z.number().nonnegative(),
});

export type Attempt = z.infer<typeof attemptSchema>;

// ── Terminal status ──────────────────────────────────────────

export const runStatusSchema = z.enum([
  'succeeded',
  'failed',
  'budget_exhausted',
  'attempt_limit_exhausted',
  'unrecoverable',
  'aborted',
]);

export type RunStatus = z.infer<typeof runStatusSchema>;

export const stopReasonSchema = z.enum([
  'auto_heal_disabled',
  'attempt_limit_exhausted',
  'unrecoverable',
  'budget_exhausted',
  'aborted',
  'deadline_exceeded',
]);

export type StopReason = z.infer<typeof stopReasonSchema>;

/** Terminal status a stop reason finalizes the Run with. */
export function statusForStopReason(reason: StopReason): RunStatus {
  switch (reason) {
    case 'auto_heal_disabled':
      return 'failed';
    case 'attempt_limit_exhausted':
      return 'attempt_limit_exhausted';
    case 'unrecoverable':
      return 'unrecoverable';
    case 'budget_exhausted':
      return 'budget_exhausted';
    case 'aborted':
    case 'deadline_exceeded':
      return 'aborted';
  }
}

// ── Run ──────────────────────────────────────────────────────

export const runSchema = z.object({
  runId: z.string().min(1),
  task: taskSchema,
  attempts: z.array(attemptSchema),
  finalStatus: runStatusSchema,
  stopReason: stopReasonSchema.nullable(),
  totalCost: z.number().nonnegative(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
});

export type Run = z.infer<typeof runSchema>;
