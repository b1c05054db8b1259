import { describe, expect, it } from 'vitest';

import { createLLMClient, createMockClient, loadLLMConfig } from './index.js';
import { ConfigError } from '../core/errors.js';

describe('loadLLMConfig', () => {
  it('reads the provider key from the environment', () => {
    expect(loadLLMConfig('openrouter', 'openai/gpt-4o-mini', { OPENROUTER_API_KEY: 'test-key' })).toEqual({
      provider: 'openrouter',
      apiKey: 'test-key',
      model: 'openai/gpt-4o-mini',
    });
  });

  it('treats a blank key as missing', () => {
    expect(loadLLMConfig('openai', undefined, { OPENAI_API_KEY: '   ' }).apiKey).toBeUndefined();
  });
});

describe('createLLMClient', () => {
  it('requires an API key for real providers', () => {
    expect(() => createLLMClient({ provider: 'anthropic' })).toThrow(ConfigError);
    expect(() => createLLMClient({ provider: 'anthropic' })).toThrow('ANTHROPIC_API_KEY is required');
  });

  it('builds a client with the configured default model', () => {
    expect(createLLMClient({ provider: 'openai', apiKey: 'test-key', model: 'gpt-4o' }).defaultModel).toBe('gpt-4o');
  });

  it('needs no key for the mock provider', () => {
    expect(createLLMClient({ provider: 'mock' }).defaultModel).toBe('mock');
  });
});

describe('createMockClient', () => {
  it('cycles through canned responses and records calls', async () => {
    const client = createMockClient(['first', { text: 'second', inputTokens: 10, outputTokens: 5 }]);

    const a = await client.complete('sys', 'one');
    const b = await client.complete('sys', 'two', { model: 'other' });

    expect(a).toEqual({ text: 'first', model: 'mock', inputTokens: 0, outputTokens: 0 });
    expect(b).toEqual({ text: 'second', model: 'other', inputTokens: 10, outputTokens: 5 });
    expect(client.calls.map((c) => c.userPrompt)).toEqual(['one', 'two']);
  });

  it('rejects when a response carries an error', async () => {
    await expect(createMockClient([{ text: '', error: 'overloaded' }]).complete('sys', 'user')).rejects.toThrow(
      'overloaded',
    );
  });
});
