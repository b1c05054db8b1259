import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  exitCodeFor,
  formatBudgetReport,
  generateJSON,
  generateMarkdown,
  serializeJSON,
  writeRunArtifacts,
} from './reporter.js';
import type { Attempt, Run } from '../schema/index.js';
import { makeTask } from '../testing/fakes.js';

const FAILED_ATTEMPT: Attempt = {
  ordinal: 1,
  script: { version: 1, code: '[{"type":"goto"}]', model: 'test-model', cost: 0.01 },
  trace: {
    status: 'failure',
    origin: 'sandbox',
    logs: ['[error] boom'],
    artifactHandles: ['.artifacts/run-1/attempt-1/failure-step-2.png'],
    durationMs: 900,
    errorSignal: { message: "waiting for locator('#login')", failingStepIndex: 2, failingStepAction: 'click' },
  },
  diagnosis: {
    category: 'selector_not_found',
    summary: 'Element selector could not locate the target element at step 2 (click)',
    confidence: 0.85,
    fixHint: 'Use a more robust selector',
    evidence: ["waiting for locator('#login')", '[error] boom'],
  },
  cost: 0.01,
};

const PASSED_ATTEMPT: Attempt = {
  ordinal: 2,
  script: { version: 2, code: '[{"type":"goto"},{"type":"click"}]', model: 'test-model', cost: 0.0125 },
  trace: {
    status: 'success',
    origin: 'sandbox',
    logs: [],
    artifactHandles: ['.artifacts/run-1/attempt-2/step-1.png'],
    durationMs: 1500,
  },
  cost: 0.0125,
};

function makeRun(overrides: Partial<Run> = {}): Run {
  return {
    runId: 'run-1',
    task: makeTask(),
    attempts: [FAILED_ATTEMPT, PASSED_ATTEMPT],
    finalStatus: 'succeeded',
    stopReason: null,
    totalCost: 0.0225,
    startedAt: '2026-03-01T12:00:00.000Z',
    finishedAt: '2026-03-01T12:00:04.500Z',
    ...overrides,
  };
}

describe('exitCodeFor', () => {
  it('maps each final status to an exit code', () => {
    expect(exitCodeFor('succeeded')).toBe(0);
    expect(exitCodeFor('failed')).toBe(1);
    expect(exitCodeFor('attempt_limit_exhausted')).toBe(1);
    expect(exitCodeFor('unrecoverable')).toBe(1);
    expect(exitCodeFor('budget_exhausted')).toBe(2);
    expect(exitCodeFor('aborted')).toBe(3);
  });
});

describe('generateJSON', () => {
  it('summarizes the run and its attempts', () => {
    const output = generateJSON(makeRun());

    expect(output).toEqual({
      version: '1.0',
      runId: 'run-1',
      task: 'Log in and open the dashboard',
      url: 'https://app.example.test/login',
      finalStatus: 'succeeded',
      stopReason: null,
      totalCost: 0.0225,
      durationMs: 4500,
      exitCode: 0,
      attempts: [
        { ordinal: 1, scriptVersion: 1, status: 'failure', diagnosisCategory: 'selector_not_found', cost: 0.01 },
        { ordinal: 2, scriptVersion: 2, status: 'success', cost: 0.0125 },
      ],
      artifactHandles: [
        '.artifacts/run-1/attempt-1/failure-step-2.png',
        '.artifacts/run-1/attempt-2/step-1.png',
      ],
    });
  });

  it('reports a null script version for an infrastructure attempt', () => {
    const output = generateJSON(makeRun({ attempts: [{ ...FAILED_ATTEMPT, script: null }] }), 1);

    expect(output.attempts[0]?.scriptVersion).toBeNull();
    expect(output.exitCode).toBe(1);
  });
});

describe('serializeJSON', () => {
  it('sorts keys at every level', () => {
    const text = serializeJSON(generateJSON(makeRun()));
    const topLevelKeys = text
      .split('\n')
      .filter((line) => /^ {2}"/.test(line))
      .map((line) => line.trim().split('"')[1]);

    expect(topLevelKeys).toEqual([
      'artifactHandles',
      'attempts',
      'durationMs',
      'exitCode',
      'finalStatus',
      'runId',
      'stopReason',
      'task',
      'totalCost',
      'url',
      'version',
    ]);
    expect(text).toContain('"cost": 0.01,\n      "diagnosisCategory": "selector_not_found",\n      "ordinal": 1,');
  });
});

describe('generateMarkdown', () => {
  it('renders the header, attempt table and details', () => {
    const lines = generateMarkdown(makeRun()).split('\n');

    expect(lines[0]).toBe('# healwright Report');
    expect(lines).toContain('| **Result** | **succeeded** [PASS] |');
    expect(lines).toContain('| **Duration** | 4.5s |');
    expect(lines).toContain('| **Total cost** | $0.0225 |');
    expect(lines).toContain('| 1 | v1 | failure | selector_not_found (85%) | $0.0100 |');
    expect(lines).toContain('| 2 | v2 | success | - | $0.0125 |');
    expect(lines).toContain('### Attempt 1 (script v1 via test-model)');
    expect(lines).toContain("**Error:** waiting for locator('#login')");
    expect(lines).toContain('![screenshot](.artifacts/run-1/attempt-2/step-1.png)');
    expect(lines).not.toContain('| **Stop reason** | null |');
  });

  it('shows the stop reason and an empty history', () => {
    const lines = generateMarkdown(
      makeRun({ attempts: [], finalStatus: 'budget_exhausted', stopReason: 'budget_exhausted', totalCost: 0 }),
    ).split('\n');

    expect(lines).toContain('| **Stop reason** | budget_exhausted |');
    expect(lines).toContain('| **Result** | **budget_exhausted** [FAIL] |');
    expect(lines).toContain('No attempts were made.');
  });
});

describe('writeRunArtifacts', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'healwright-report-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the report, summary and every script version', async () => {
    const paths = await writeRunArtifacts(makeRun(), dir);

    expect(paths.scriptPaths).toEqual([
      path.join(dir, 'scripts', 'script_v1.json'),
      path.join(dir, 'scripts', 'script_v2.json'),
    ]);
    expect(await readFile(path.join(dir, 'scripts', 'script_v2.json'), 'utf-8')).toBe(
      '[{"type":"goto"},{"type":"click"}]\n',
    );

    const summary: unknown = JSON.parse(await readFile(paths.summaryPath, 'utf-8'));
    expect(summary).toMatchObject({ runId: 'run-1', finalStatus: 'succeeded', exitCode: 0 });
    expect((await readFile(paths.reportPath, 'utf-8')).startsWith('# healwright Report\n')).toBe(true);
  });
});

describe('formatBudgetReport', () => {
  it('lists spend against the daily budget', () => {
    expect(
      formatBudgetReport({ day: '2026-03-01', dailySpend: 1.25, pending: 0, dailyBudget: 5, remaining: 3.75 }),
    ).toBe(
      [
        'Day:        2026-03-01 (UTC)',
        'Spent:      $1.2500',
        'Reserved:   $0.0000',
        'Budget:     $5.0000',
        'Remaining:  $3.7500',
      ].join('\n'),
    );
  });
});
