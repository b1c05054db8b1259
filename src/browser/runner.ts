import type { Page } from 'playwright';

import type { Step, WaitStep } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import { describeSelector, resolveSelector } from './selectors.js';

// ── Step dispatch ────────────────────────────────────────────

/** A step's own timeout (or the default for its kind), never past `capMs`. */
export function stepTimeout(step: Step, capMs: number = Number.POSITIVE_INFINITY): number {
  const own = step.timeout ?? (step.type === 'goto' ? TIMEOUTS.NAVIGATION_TIMEOUT : TIMEOUTS.ACTION_TIMEOUT);
  return Math.max(1, Math.min(own, capMs));
}

/** Run one step; `capMs` is the time the script has left. */
export async function performAction(
  page: Page,
  step: Step,
  capMs: number = Number.POSITIVE_INFINITY,
): Promise<void> {
  const timeout = stepTimeout(step, capMs);

  switch (step.type) {
    case 'goto':
      await page.goto(step.value, {
        timeout,
        waitUntil: 'domcontentloaded',
      });
      break;

    case 'click': {
      const locator = resolveSelector(page, step.selector);
      await locator.click({ timeout });
      break;
    }

    case 'type': {
      const locator = resolveSelector(page, step.selector);
      await locator.fill(step.value, { timeout });
      break;
    }

    case 'select': {
      const locator = resolveSelector(page, step.selector);
      await locator.selectOption(step.value, { timeout });
      break;
    }

    case 'upload': {
      const locator = resolveSelector(page, step.selector);
      await locator.setInputFiles(step.value, { timeout });
      break;
    }

    case 'wait':
      await handleWait(page, step, timeout, capMs);
      break;

    case 'expect_text': {
      const locator = step.selector
        ? resolveSelector(page, step.selector)
        : page.locator('body');
      await locator.waitFor({ state: 'visible', timeout });
      const text = await locator.innerText();
      if (!text.includes(step.value)) {
        throw new Error(`Expected text "${step.value}" not found`);
      }
      break;
    }

    case 'press_key':
      await page.keyboard.press(step.value);
      break;
  }
}

// ── Wait handling ────────────────────────────────────────────

async function handleWait(
  page: Page,
  step: WaitStep,
  timeout: number,
  capMs: number,
): Promise<void> {
  if (step.selector) {
    const locator = resolveSelector(page, step.selector);
    await locator.waitFor({ state: 'visible', timeout });
  } else if (step.value) {
    const ms = Number(step.value);
    if (!Number.isNaN(ms)) {
      await page.waitForTimeout(Math.min(ms, capMs));
    }
  }
}

// ── Step description ─────────────────────────────────────────

export function describeStep(step: Step): string {
  switch (step.type) {
    case 'goto':
    case 'press_key':
      return `${step.type} ${step.value}`;
    case 'wait':
      return step.selector ? `wait ${describeSelector(step.selector)}` : `wait ${step.value ?? ''}`.trim();
    case 'expect_text':
      return `expect_text "${step.value}"`;
    default:
      return `${step.type} ${describeSelector(step.selector)}`;
  }
}
