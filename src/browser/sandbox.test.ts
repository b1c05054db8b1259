import { describe, expect, it } from 'vitest';

import { PlaywrightSandbox, parseScript } from './sandbox.js';
import type { ExecutionRequest } from '../schema/index.js';

function request(code: string): ExecutionRequest {
  return { code, headless: true, browserType: 'chromium', timeoutMs: 30_000, label: 'run-1/attempt-1' };
}

describe('parseScript', () => {
  it('accepts a valid step list', () => {
    const result = parseScript(
      JSON.stringify([{ type: 'goto', description: 'open', value: 'https://app.example.test' }]),
    );

    expect(result).toEqual({
      ok: true,
      steps: [{ type: 'goto', description: 'open', value: 'https://app.example.test' }],
    });
  });

  it('rejects text that is not JSON', () => {
    const result = parseScript('not json');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.startsWith('Invalid script: ')).toBe(true);
  });

  it('names the path of a schema violation', () => {
    const result = parseScript(JSON.stringify([{ type: 'fly', description: 'x' }]));

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatch(/^Invalid script: 0\.type: /);
  });

  it('rejects an empty list', () => {
    expect(parseScript('[]')).toEqual({
      ok: false,
      error: 'Invalid script: (root): Array must contain at least 1 element(s)',
    });
  });
});

describe('PlaywrightSandbox', () => {
  it('reports an unparseable script as a failure without launching a browser', async () => {
    const sandbox = new PlaywrightSandbox({ artifactsDir: '/nonexistent/healwright-artifacts' });

    const response = await sandbox.execute(request('[]'), new AbortController().signal);

    expect(response).toMatchObject({
      status: 'failure',
      logs: [],
      artifactHandles: [],
      errorSignal: { message: 'Invalid script: (root): Array must contain at least 1 element(s)' },
    });
  });
});
