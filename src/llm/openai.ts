import { z } from 'zod';

import { LIMITS } from '../config/defaults.js';
import type { CompletionOptions, LLMClient, LLMCompletion } from './client.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';
const OPENAI_BASE_URL = 'https://api.openai.com/v1';

const OPENROUTER_DEFAULT_MODEL = 'anthropic/claude-3.5-haiku';
const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

// ── Response validation ──────────────────────────────────────

const chatResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .nonempty(),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative(),
      completion_tokens: z.number().int().nonnegative(),
    })
    .optional(),
});

// ── Rate-limit-aware fetch ───────────────────────────────────

async function fetchWithRetry(
  url: string,
  init: RequestInit,
): Promise<Response> {
  for (let attempt = 0; attempt < LIMITS.MAX_LLM_RETRIES; attempt++) {
    const response = await fetch(url, init);

    if (response.status === 429) {
      const retryAfter = response.headers.get('retry-after');
      const waitMs = retryAfter
        ? parseFloat(retryAfter) * 1000
        : (attempt + 1) * 5000;
      log.warn(`[llm] Rate limited, waiting ${String(Math.round(waitMs / 1000))}s...`);
      await new Promise((r) => setTimeout(r, waitMs));
      continue;
    }

    if (!response.ok) {
      const body = await response.text();
      throw new Error(
        `Chat completions API error (${String(response.status)}): ${body}`,
      );
    }

    return response;
  }

  throw new Error('Chat completions API: max retries exceeded due to rate limiting');
}

// ── Shared OpenAI-compatible client ──────────────────────────

interface ChatClientOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  extraHeaders?: Record<string, string>;
}

function createChatCompletionsClient(config: ChatClientOptions): LLMClient {
  const completionsUrl = `${config.baseUrl}/chat/completions`;

  return {
    defaultModel: config.model,

    async complete(
      systemPrompt: string,
      userPrompt: string,
      options: CompletionOptions = {},
    ): Promise<LLMCompletion> {
      const callModel = options.model ?? config.model;
      const response = await fetchWithRetry(completionsUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.apiKey}`,
          ...config.extraHeaders,
        },
        body: JSON.stringify({
          model: callModel,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature: 0,
        }),
        ...(options.signal ? { signal: options.signal } : {}),
      });

      const raw = await response.text();
      const body: unknown = JSON.parse(raw);
      const parsed = chatResponseSchema.parse(body);

      return {
        text: parsed.choices[0].message.content,
        model: parsed.model ?? callModel,
        inputTokens: parsed.usage?.prompt_tokens ?? 0,
        outputTokens: parsed.usage?.completion_tokens ?? 0,
      };
    },
  };
}

// ── Provider factories ───────────────────────────────────────

export function createOpenAIClient(
  apiKey: string,
  model?: string,
): LLMClient {
  return createChatCompletionsClient({
    apiKey,
    baseUrl: OPENAI_BASE_URL,
    model: model ?? OPENAI_DEFAULT_MODEL,
  });
}

export function createOpenRouterClient(
  apiKey: string,
  model?: string,
): LLMClient {
  return createChatCompletionsClient({
    apiKey,
    baseUrl: OPENROUTER_BASE_URL,
    model: model ?? OPENROUTER_DEFAULT_MODEL,
    extraHeaders: { 'X-Title': 'healwright' },
  });
}
