import { z } from 'zod';

// ── Browser type ─────────────────────────────────────────────

export const browserTypeSchema = z.enum(['chromium', 'firefox', 'webkit']);

export type BrowserType = z.infer<typeof browserTypeSchema>;

// ── Task configuration ───────────────────────────────────────

export const taskConfigSchema = z.object({
  headless: z.boolean(),
  browserType: browserTypeSchema,
  timeoutMs: z.number().int().positive(),
  maxRepairAttempts: z.number().int().nonnegative(),
  autoHeal: z.boolean(),
});

export type TaskConfig = z.infer<typeof taskConfigSchema>;

// ── Task ─────────────────────────────────────────────────────

export const taskSchema = z.object({
  description: z.string().trim().min(1),
  targetUrl: z.string().url(),
  config: taskConfigSchema,
});

export type Task = z.infer<typeof taskSchema>;
