import { z } from 'zod';

// ── Error category (closed set) ──────────────────────────────

export const errorCategorySchema = z.enum([
  'selector_not_found',
  'timeout',
  'navigation_failure',
  'assertion_failure',
  'script_runtime_error',
  'network_error',
  'unknown',
]);

export type ErrorCategory = z.infer<typeof errorCategorySchema>;

// ── Diagnosis ────────────────────────────────────────────────

export const diagnosisSchema = z.object({
  category: errorCategorySchema,
  summary: z.string().min(1),
  confidence: z.number().min(0).max(1),
  fixHint: z.string(),
  evidence: z.array(z.string()),
});

export type Diagnosis = z.infer<typeof diagnosisSchema>;
