import { z } from 'zod';

import { browserTypeSchema } from './task.js';

// ── Provider ─────────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'openrouter', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

// ── Resolved settings ────────────────────────────────────────
// Every option after CLI flags, config file, env and defaults are merged.

export const settingsSchema = z.object({
  provider: llmProviderSchema,
  defaultModel: z.string().min(1),
  fallbackModel: z.string().min(1),
  headless: z.boolean(),
  browserType: browserTypeSchema,
  defaultTimeoutMs: z.number().int().positive(),
  maxRepairAttempts: z.number().int().nonnegative(),
  autoHeal: z.boolean(),
  maxCostPerRun: z.number().positive(),
  dailyBudget: z.number().positive(),
  estimatedAttemptCost: z.number().nonnegative(),
  runTimeoutMs: z.number().int().positive(),
  artifactsDir: z.string().min(1),
  recordVideo: z.boolean(),
});

export type Settings = z.infer<typeof settingsSchema>;

// ── Suite entry ──────────────────────────────────────────────

export const suiteTaskSchema = z.object({
  name: z.string().min(1),
  task: z.string().min(1),
  url: z.string().url().optional(),
});

export type SuiteTask = z.infer<typeof suiteTaskSchema>;

// ── Config file ──────────────────────────────────────────────

export const fileConfigSchema = settingsSchema.partial().extend({
  baseUrl: z.string().url().optional(),
  tasks: z.array(suiteTaskSchema).optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
