import { describe, expect, it } from 'vitest';

import { extractJSON, fixupRawSteps, tryParseSteps } from './steps.js';

const GOTO = { type: 'goto', description: 'Open the login page', value: 'https://app.example.test/login' };

describe('extractJSON', () => {
  it('unwraps a fenced block', () => {
    expect(extractJSON('Here:\n```json\n[1, 2]\n```\nDone.')).toBe('[1, 2]');
  });

  it('takes the outermost array from surrounding prose', () => {
    expect(extractJSON('The steps are [{"a": [1]}] as requested')).toBe('[{"a": [1]}]');
  });

  it('returns trimmed text when there is no array', () => {
    expect(extractJSON('  no json here  ')).toBe('no json here');
  });
});

describe('fixupRawSteps', () => {
  it('rewrites invented selector strategies', () => {
    const fixed = fixupRawSteps([
      { type: 'type', description: 'Email', value: 'a@b.test', selector: { strategy: 'placeholder', value: 'Email' } },
      { type: 'click', description: 'Submit', selector: { strategy: 'id', value: 'submit' } },
      { type: 'click', description: 'Remember', selector: { strategy: 'label', value: 'Remember me' } },
      { type: 'type', description: 'Name', value: 'x', selector: { strategy: 'name', value: 'username' } },
      { type: 'click', description: 'Menu', selector: { strategy: 'aria-label', value: 'Menu' } },
    ]);

    expect(fixed).toEqual([
      { type: 'type', description: 'Email', value: 'a@b.test', selector: { strategy: 'css', value: "input[placeholder='Email']" } },
      { type: 'click', description: 'Submit', selector: { strategy: 'css', value: '#submit' } },
      { type: 'click', description: 'Remember', selector: { strategy: 'text', value: 'Remember me' } },
      { type: 'type', description: 'Name', value: 'x', selector: { strategy: 'css', value: "[name='username']" } },
      { type: 'click', description: 'Menu', selector: { strategy: 'css', value: "[aria-label='Menu']" } },
    ]);
  });

  it('fills in a missing description and expect_text value', () => {
    const fixed = fixupRawSteps([
      { type: 'press_key', value: 'Enter' },
      { type: 'expect_text', description: 'Dashboard shows "Welcome back"' },
    ]);

    expect(fixed).toEqual([
      { type: 'press_key', value: 'Enter', description: 'press_key step' },
      { type: 'expect_text', description: 'Dashboard shows "Welcome back"', value: 'Welcome back' },
    ]);
  });

  it('leaves non-arrays alone', () => {
    expect(fixupRawSteps({ steps: [] })).toEqual({ steps: [] });
  });
});

describe('tryParseSteps', () => {
  it('accepts a valid script', () => {
    const result = tryParseSteps(JSON.stringify([GOTO, { type: 'press_key', description: 'Submit', value: 'Enter' }]));

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.steps.map((s) => s.type)).toEqual(['goto', 'press_key']);
  });

  it('reports invalid JSON', () => {
    const result = tryParseSteps('[{"type": "goto",]');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.startsWith('Invalid JSON: ')).toBe(true);
  });

  it('requires a leading goto', () => {
    const result = tryParseSteps(JSON.stringify([{ type: 'press_key', description: 'Submit', value: 'Enter' }]));

    expect(result).toEqual({ ok: false, error: 'First step must be a "goto" step' });
  });

  it('enforces the step limit', () => {
    const result = tryParseSteps(JSON.stringify([GOTO, GOTO, GOTO]), 2);

    expect(result).toEqual({ ok: false, error: 'Too many steps: 3 (max 2)' });
  });

  it('rejects an empty script', () => {
    expect(tryParseSteps('[]').ok).toBe(false);
  });
});
