import { beforeAll, describe, expect, it } from 'vitest';

import { LlmScriptSynthesizer, QUICK_FIX_MODEL, SynthesisError } from './synthesizer.js';
import { serializeSteps } from './steps.js';
import { AbortedError } from '../core/errors.js';
import { createMockClient } from '../llm/index.js';
import type { SynthesisRequest } from '../schema/index.js';
import * as log from '../utils/logger.js';

const VALID = JSON.stringify([
  { type: 'goto', description: 'Open the login page', value: 'https://app.example.test/login' },
  { type: 'expect_text', description: 'Login form', value: 'Sign in' },
]);

const REQUEST: SynthesisRequest = {
  taskDescription: 'Log in with the demo account',
  targetUrl: 'https://app.example.test/login',
};

function signal(): AbortSignal {
  return new AbortController().signal;
}

beforeAll(() => {
  log.setQuiet(true);
});

describe('LlmScriptSynthesizer', () => {
  it('renders the synthesis prompt and prices the call', async () => {
    const client = createMockClient([{ text: '```json\n' + VALID + '\n```', inputTokens: 1000, outputTokens: 500 }]);
    const synthesizer = new LlmScriptSynthesizer(client, { fallbackModel: 'gpt-4o-mini' });

    const response = await synthesizer.synthesize(REQUEST, signal());

    expect(client.calls).toHaveLength(1);
    expect(client.calls[0]?.userPrompt).toContain('Task: Log in with the demo account');
    expect(client.calls[0]?.userPrompt).toContain('Start URL: https://app.example.test/login');
    expect(response.model).toBe('mock');
    // 'mock' has no price of its own, so the fallback model's is used
    expect(response.estimatedCost).toBeCloseTo(0.00045, 9);
    expect(JSON.parse(response.code)).toEqual(JSON.parse(VALID));
  });

  it('asks once for a fix when the reply does not parse', async () => {
    const client = createMockClient([
      { text: 'Sure! Here is your test.', inputTokens: 1000, outputTokens: 0 },
      { text: VALID, inputTokens: 1000, outputTokens: 0 },
    ]);
    const synthesizer = new LlmScriptSynthesizer(client, { fallbackModel: 'gpt-4o-mini' });

    const response = await synthesizer.synthesize(REQUEST, signal());

    expect(client.calls).toHaveLength(2);
    expect(client.calls[1]?.userPrompt.split('\n')[0]).toBe('Your previous reply could not be used as a step script.');
    expect(client.calls[1]?.userPrompt).toContain('Sure! Here is your test.');
    expect(response.estimatedCost).toBeCloseTo(0.0003, 9);
  });

  it('throws SynthesisError when the fix does not parse either', async () => {
    const client = createMockClient(['nope', 'still nope']);
    const synthesizer = new LlmScriptSynthesizer(client);

    await expect(synthesizer.synthesize(REQUEST, signal())).rejects.toBeInstanceOf(SynthesisError);
    expect(client.calls).toHaveLength(2);
  });

  it('retries with the fallback model when the default model fails', async () => {
    const client = createMockClient([{ text: '', error: 'overloaded' }, VALID]);
    const synthesizer = new LlmScriptSynthesizer(client, { fallbackModel: 'gpt-4o-mini' });

    const response = await synthesizer.synthesize(REQUEST, signal());

    expect(client.calls.map((c) => c.model)).toEqual(['mock', 'gpt-4o-mini']);
    expect(response.model).toBe('gpt-4o-mini');
  });

  it('propagates the provider error without a fallback model', async () => {
    const client = createMockClient([{ text: '', error: 'overloaded' }]);
    const synthesizer = new LlmScriptSynthesizer(client);

    await expect(synthesizer.synthesize(REQUEST, signal())).rejects.toThrow('overloaded');
  });

  it('reports an abort instead of falling back', async () => {
    const controller = new AbortController();
    controller.abort();
    const client = createMockClient([{ text: '', error: 'request cancelled' }]);
    const synthesizer = new LlmScriptSynthesizer(client, { fallbackModel: 'gpt-4o-mini' });

    await expect(synthesizer.synthesize(REQUEST, controller.signal)).rejects.toBeInstanceOf(AbortedError);
    expect(client.calls).toHaveLength(1);
  });

  it('applies a free quick fix for a timeout repair', async () => {
    const client = createMockClient();
    const synthesizer = new LlmScriptSynthesizer(client);

    const response = await synthesizer.synthesize(
      { ...REQUEST, priorScript: VALID, repairCategory: 'timeout', repairHint: 'Error category: timeout' },
      signal(),
    );

    expect(client.calls).toHaveLength(0);
    expect(response.model).toBe(QUICK_FIX_MODEL);
    expect(response.estimatedCost).toBe(0);
    expect(JSON.parse(response.code)).toEqual([
      { type: 'goto', description: 'Open the login page', value: 'https://app.example.test/login', timeout: 60_000 },
      { type: 'expect_text', description: 'Login form', value: 'Sign in', timeout: 60_000 },
    ]);
  });

  it('caps a quick-fix timeout at the execution timeout', async () => {
    const synthesizer = new LlmScriptSynthesizer(createMockClient());

    const response = await synthesizer.synthesize(
      { ...REQUEST, priorScript: VALID, repairCategory: 'timeout', timeoutMs: 30_000 },
      signal(),
    );

    expect(JSON.parse(response.code)).toEqual([
      { type: 'goto', description: 'Open the login page', value: 'https://app.example.test/login', timeout: 30_000 },
      { type: 'expect_text', description: 'Login form', value: 'Sign in', timeout: 30_000 },
    ]);
  });

  it('carries the spend of failed model calls on SynthesisError', async () => {
    const client = createMockClient([
      { text: 'nope', inputTokens: 1000, outputTokens: 0 },
      { text: 'still nope', inputTokens: 1000, outputTokens: 0 },
    ]);
    const synthesizer = new LlmScriptSynthesizer(client, { fallbackModel: 'gpt-4o-mini' });

    const error: unknown = await synthesizer.synthesize(REQUEST, signal()).then(
      () => null,
      (err: unknown) => err,
    );

    if (!(error instanceof SynthesisError)) throw new Error('expected a SynthesisError');
    expect(error.cost).toBeCloseTo(0.0003, 9);
  });

  it("keeps the first call's spend when the fixup call itself fails", async () => {
    const client = createMockClient([
      { text: 'nope', inputTokens: 1000, outputTokens: 0 },
      { text: '', error: 'overloaded' },
    ]);
    const synthesizer = new LlmScriptSynthesizer(client);

    const error: unknown = await synthesizer.synthesize(REQUEST, signal()).then(
      () => null,
      (err: unknown) => err,
    );

    if (!(error instanceof SynthesisError)) throw new Error('expected a SynthesisError');
    expect(error.message).toBe('Fixup call failed: overloaded');
    // 'mock' is unpriced and there is no fallback model: conservative rate
    expect(error.cost).toBeCloseTo(0.003, 9);
  });

  it('uses the repair prompt when no quick fix applies', async () => {
    const client = createMockClient([VALID]);
    const synthesizer = new LlmScriptSynthesizer(client);
    const priorScript = serializeSteps([
      { type: 'goto', description: 'Open', value: 'https://app.example.test/login' },
    ]);

    await synthesizer.synthesize(
      {
        ...REQUEST,
        priorScript,
        repairCategory: 'selector_not_found',
        repairHint: 'Error category: selector_not_found',
      },
      signal(),
    );

    const prompt = client.calls[0]?.userPrompt ?? '';
    expect(prompt.split('\n')[0]).toBe('A browser test script failed. Write a corrected version.');
    expect(prompt).toContain(priorScript);
    expect(prompt).toContain('Error category: selector_not_found');
  });
});
