import { z } from 'zod';

import { errorCategorySchema } from './diagnosis.js';
import { runStatusSchema, stopReasonSchema } from './run.js';
import { traceStatusSchema } from './trace.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Attempt output ──────────────────────────────────────────

export const jsonOutputAttemptSchema = z.object({
  ordinal: z.number().int().positive(),
  scriptVersion: z.number().int().positive().nullable(),
  status: traceStatusSchema,
  diagnosisCategory: errorCategorySchema.optional(),
  cost: z.number().nonnegative(),
});

export type JsonOutputAttempt = z.infer<typeof jsonOutputAttemptSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  task: z.string(),
  url: z.string(),
  finalStatus: runStatusSchema,
  stopReason: stopReasonSchema.nullable(),
  totalCost: z.number().nonnegative(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  attempts: z.array(jsonOutputAttemptSchema),
  artifactHandles: z.array(z.string()),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
