import { z } from 'zod';

import { errorCategorySchema } from './diagnosis.js';
import { browserTypeSchema } from './task.js';
import { errorSignalSchema, traceStatusSchema } from './trace.js';

// ── Script synthesis ─────────────────────────────────────────

export const synthesisRequestSchema = z.object({
  taskDescription: z.string().min(1),
  targetUrl: z.string().url(),
  priorScript: z.string().optional(),
  repairHint: z.string().optional(),
  repairCategory: errorCategorySchema.optional(),
  /** Time the sandbox will allow the whole script; quick fixes stay within it. */
  timeoutMs: z.number().int().positive().optional(),
});

export type SynthesisRequest = z.infer<typeof synthesisRequestSchema>;

export const synthesisResponseSchema = z.object({
  code: z.string().min(1),
  model: z.string().min(1),
  estimatedCost: z.number().finite().nonnegative(),
});

export type SynthesisResponse = z.infer<typeof synthesisResponseSchema>;

// ── Execution sandbox ────────────────────────────────────────

export const executionRequestSchema = z.object({
  code: z.string().min(1),
  headless: z.boolean(),
  browserType: browserTypeSchema,
  timeoutMs: z.number().int().positive(),
  /** Stable name for artifacts, e.g. `<runId>/attempt-2`. */
  label: z.string().min(1),
});

export type ExecutionRequest = z.infer<typeof executionRequestSchema>;

export const executionResponseSchema = z.object({
  status: traceStatusSchema,
  logs: z.array(z.string()),
  artifactHandles: z.array(z.string()),
  durationMs: z.number().nonnegative(),
  errorSignal: errorSignalSchema.optional(),
  cost: z.number().finite().nonnegative().optional(),
});

export type ExecutionResponse = z.infer<typeof executionResponseSchema>;
