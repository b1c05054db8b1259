import { z } from 'zod';

import { llmProviderSchema } from '../schema/config.js';
import type { LLMProvider } from '../schema/config.js';

// ── LLMClient interface ──────────────────────────────────────

export interface LLMCompletion {
  text: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionOptions {
  /** Overrides the client's default model for this call. */
  model?: string | undefined;
  signal?: AbortSignal | undefined;
}

export interface LLMClient {
  readonly defaultModel: string;
  complete(
    systemPrompt: string,
    userPrompt: string,
    options?: CompletionOptions,
  ): Promise<LLMCompletion>;
}

// ── Config schema ────────────────────────────────────────────

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

// ── Env loader ───────────────────────────────────────────────

const API_KEY_ENV: Record<LLMProvider, string | null> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
  openrouter: 'OPENROUTER_API_KEY',
  mock: null,
};

export function loadLLMConfig(
  provider: LLMProvider,
  model: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const keyName = API_KEY_ENV[provider];
  const apiKey = keyName !== null ? env[keyName] : undefined;

  return llmConfigSchema.parse({
    provider,
    apiKey: apiKey?.trim() || undefined,
    model,
  });
}

export function apiKeyEnvName(provider: LLMProvider): string | null {
  return API_KEY_ENV[provider];
}
