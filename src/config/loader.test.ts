import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError } from '../core/errors.js';
import {
  DEFAULT_SETTINGS,
  loadConfigFile,
  loadEnvSettings,
  loadOptionalConfigFile,
  resolveSettings,
} from './loader.js';

describe('resolveSettings', () => {
  it('returns the defaults when no layer sets anything', () => {
    expect(resolveSettings()).toEqual(DEFAULT_SETTINGS);
  });

  it('lets earlier layers win and ignores undefined values', () => {
    const settings = resolveSettings(
      { maxRepairAttempts: 1, headless: undefined },
      { maxRepairAttempts: 5, headless: true, browserType: 'firefox' },
    );

    expect(settings.maxRepairAttempts).toBe(1);
    expect(settings.headless).toBe(true);
    expect(settings.browserType).toBe('firefox');
  });

  it('reports every invalid field', () => {
    let caught: unknown;
    try {
      resolveSettings({ maxCostPerRun: -1, browserType: 'netscape' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.exitCode).toBe(4);
    expect(caught.issues.map((i) => i.split(':')[0])).toEqual(['browserType', 'maxCostPerRun']);
  });
});

describe('loadEnvSettings', () => {
  it('maps environment variables onto settings', () => {
    const layer = loadEnvSettings({
      LLM_PROVIDER: 'anthropic',
      HEADLESS: 'true',
      AUTO_HEAL: '0',
      MAX_REPAIR_ATTEMPTS: '2',
      DAILY_BUDGET: '1.5',
      HEALWRIGHT_ARTIFACTS_DIR: 'out',
    });

    const settings = resolveSettings(layer);
    expect(settings).toMatchObject({
      provider: 'anthropic',
      headless: true,
      autoHeal: false,
      maxRepairAttempts: 2,
      dailyBudget: 1.5,
      artifactsDir: 'out',
    });
  });

  it('leaves a malformed boolean for validation to reject', () => {
    expect(() => resolveSettings(loadEnvSettings({ HEADLESS: 'sometimes' }))).toThrow(ConfigError);
  });

  it('treats blank values as unset', () => {
    expect(loadEnvSettings({ DEFAULT_TIMEOUT: '  ', HEADLESS: '' })).toMatchObject({
      defaultTimeoutMs: undefined,
      headless: undefined,
    });
  });
});

describe('config files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'healwright-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses a YAML config with a task list', async () => {
    const file = path.join(dir, '.healwright.yaml');
    await writeFile(
      file,
      [
        'baseUrl: https://app.example.test',
        'maxCostPerRun: 0.2',
        'tasks:',
        '  - name: login',
        '    task: Log in with the demo account',
        '  - name: search',
        '    task: Search for "lamp"',
        '    url: https://app.example.test/search',
      ].join('\n'),
      'utf-8',
    );

    const config = await loadConfigFile(file);

    expect(config.baseUrl).toBe('https://app.example.test');
    expect(config.maxCostPerRun).toBe(0.2);
    expect(config.tasks?.map((t) => t.name)).toEqual(['login', 'search']);
    expect(config.tasks?.[1]?.url).toBe('https://app.example.test/search');
  });

  it('parses a JSON config', async () => {
    const file = path.join(dir, 'healwright.json');
    await writeFile(file, JSON.stringify({ provider: 'mock', recordVideo: true }), 'utf-8');

    await expect(loadConfigFile(file)).resolves.toEqual({ provider: 'mock', recordVideo: true });
  });

  it('rejects unknown providers with the field path', async () => {
    const file = path.join(dir, '.healwright.yaml');
    await writeFile(file, 'provider: carrier-pigeon\n', 'utf-8');

    await expect(loadConfigFile(file)).rejects.toThrow(/provider/);
  });

  it('rejects a missing required file', async () => {
    await expect(loadConfigFile(path.join(dir, 'absent.yaml'))).rejects.toBeInstanceOf(ConfigError);
  });

  it('treats a missing optional file as empty', async () => {
    await expect(loadOptionalConfigFile(path.join(dir, 'absent.yaml'))).resolves.toEqual({});
  });

  it('treats an empty file as an empty config', async () => {
    const file = path.join(dir, '.healwright.yaml');
    await writeFile(file, '', 'utf-8');

    await expect(loadConfigFile(file)).resolves.toEqual({});
  });
});
