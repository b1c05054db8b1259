/**
 * LLM abstraction module.
 * Provider-agnostic interface for script synthesis.
 * Only module allowed to make LLM API calls.
 */

import type { LLMClient, LLMConfig } from './client.js';
import { apiKeyEnvName } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient, createOpenRouterClient } from './openai.js';
import { createMockClient } from './mock.js';
import { ConfigError } from '../core/errors.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient, createOpenRouterClient } from './openai.js';
export { createMockClient } from './mock.js';
export type { MockCall, MockLLMClient, MockResponse } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

export function createLLMClient(config: LLMConfig): LLMClient {
  if (config.provider === 'mock') {
    return createMockClient();
  }

  if (!config.apiKey) {
    throw new ConfigError(
      `${apiKeyEnvName(config.provider) ?? 'An API key'} is required when using the ${config.provider} provider`,
    );
  }

  switch (config.provider) {
    case 'anthropic':
      return createAnthropicClient(config.apiKey, config.model);
    case 'openai':
      return createOpenAIClient(config.apiKey, config.model);
    case 'openrouter':
      return createOpenRouterClient(config.apiKey, config.model);
  }
}
