import Anthropic from '@anthropic-ai/sdk';

import { LIMITS } from '../config/defaults.js';
import type { CompletionOptions, LLMClient, LLMCompletion } from './client.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-3-5-haiku-20241022';
const MAX_TOKENS = 4096;

// ── Rate-limit-aware wrapper ────────────────────────────────

function isRateLimitError(err: unknown): boolean {
  if (err instanceof Anthropic.RateLimitError) return true;
  if (err instanceof Error && err.message.includes('429')) return true;
  return false;
}

async function withRetry<T>(fn: () => Promise<T>): Promise<T> {
  for (let attempt = 0; attempt < LIMITS.MAX_LLM_RETRIES; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRateLimitError(err) || attempt === LIMITS.MAX_LLM_RETRIES - 1) throw err;

      const waitMs = (attempt + 1) * 5000;
      log.warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
    }
  }

  throw new Error('Anthropic API: max retries exceeded due to rate limiting');
}

// ── Provider factory ─────────────────────────────────────────

export function createAnthropicClient(
  apiKey: string,
  model?: string,
): LLMClient {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const client = new Anthropic({ apiKey });

  return {
    defaultModel: resolvedModel,

    async complete(
      systemPrompt: string,
      userPrompt: string,
      options: CompletionOptions = {},
    ): Promise<LLMCompletion> {
      const callModel = options.model ?? resolvedModel;
      const response = await withRetry(() =>
        client.messages.create(
          {
            model: callModel,
            max_tokens: MAX_TOKENS,
            system: systemPrompt,
            messages: [{ role: 'user', content: userPrompt }],
            temperature: 0,
          },
          options.signal ? { signal: options.signal } : {},
        ),
      );

      const firstBlock = response.content[0];
      if (!firstBlock || firstBlock.type !== 'text') {
        throw new Error('Anthropic API returned no text content');
      }

      return {
        text: firstBlock.text,
        model: response.model,
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      };
    },
  };
}
