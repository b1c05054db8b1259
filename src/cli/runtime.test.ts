import { describe, expect, it } from 'vitest';

import { flagsToLayer } from './runtime.js';

describe('flagsToLayer', () => {
  it('leaves unset flags undefined', () => {
    const layer = flagsToLayer({ autoHeal: true });

    expect(Object.values(layer).every((value) => value === undefined)).toBe(true);
  });

  it('converts numeric flags and the run timeout to milliseconds', () => {
    const layer = flagsToLayer({
      provider: 'openai',
      model: 'gpt-4o',
      timeout: '45000',
      maxRepairAttempts: '2',
      maxCost: '0.5',
      dailyBudget: '10',
      runTimeout: '90',
      reportPath: 'out',
      headless: true,
      video: true,
    });

    expect(layer).toMatchObject({
      provider: 'openai',
      defaultModel: 'gpt-4o',
      defaultTimeoutMs: 45_000,
      maxRepairAttempts: 2,
      maxCostPerRun: 0.5,
      dailyBudget: 10,
      runTimeoutMs: 90_000,
      artifactsDir: 'out',
      headless: true,
      recordVideo: true,
    });
  });

  it('only overrides autoHeal when --no-auto-heal is given', () => {
    expect(flagsToLayer({ autoHeal: false }).autoHeal).toBe(false);
    expect(flagsToLayer({}).autoHeal).toBeUndefined();
  });
});
