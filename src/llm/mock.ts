import type { CompletionOptions, LLMClient, LLMCompletion } from './client.js';

const DEFAULT_RESPONSE = '[{"type":"goto","description":"Open the page","value":"about:blank"}]';
const MOCK_MODEL = 'mock';

export interface MockResponse {
  text: string;
  inputTokens?: number;
  outputTokens?: number;
  /** Reject this call instead of answering. */
  error?: string;
}

export interface MockCall {
  systemPrompt: string;
  userPrompt: string;
  model: string;
}

export interface MockLLMClient extends LLMClient {
  readonly calls: readonly MockCall[];
}

/**
 * Mock LLM provider for testing.
 * Cycles through provided canned responses, falling back to a default.
 */
export function createMockClient(
  responses?: readonly (string | MockResponse)[],
): MockLLMClient {
  let callIndex = 0;
  const calls: MockCall[] = [];

  return {
    defaultModel: MOCK_MODEL,
    calls,

    async complete(
      systemPrompt: string,
      userPrompt: string,
      options: CompletionOptions = {},
    ): Promise<LLMCompletion> {
      const model = options.model ?? MOCK_MODEL;
      calls.push({ systemPrompt, userPrompt, model });

      const entry = responses?.[callIndex] ?? DEFAULT_RESPONSE;
      callIndex++;

      const response: MockResponse = typeof entry === 'string' ? { text: entry } : entry;
      if (response.error !== undefined) {
        throw new Error(response.error);
      }

      return {
        text: response.text,
        model,
        inputTokens: response.inputTokens ?? 0,
        outputTokens: response.outputTokens ?? 0,
      };
    },
  };
}
