import type { Locator, Page } from 'playwright';

import type { SelectorHint } from '../schema/step.js';

// ── Resolver ──────────────────────────────────────────────────

/**
 * Maps a SelectorHint to a Playwright Locator.
 *
 * Priority (asked for in the synthesis prompt, not enforced here):
 *   1. data-testid  → page.getByTestId(value)
 *   2. role + name  → page.getByRole(role, { name })
 *   3. text content → page.getByText(value)
 *   4. css selector → page.locator(value)
 *
 * No auto-fallback: a wrong strategy fails at action time and the
 * failure goes to diagnosis as selector_not_found.
 */
export function resolveSelector(page: Page, hint: SelectorHint): Locator {
  switch (hint.strategy) {
    case 'testid':
      return page.getByTestId(hint.value);

    case 'role':
      return resolveRole(page, hint);

    case 'text':
      return page.getByText(hint.value);

    case 'css':
      return page.locator(hint.value);
  }
}

function resolveRole(page: Page, hint: SelectorHint): Locator {
  // Models put the role in either field.
  const role = hint.role ?? hint.value;

  const options: { name?: string | RegExp } = {};
  if (hint.name) {
    options.name = hint.name;
  }

  // Playwright accepts the ARIA role as a plain string at runtime.
  // The TypeScript overload expects a union literal, so we cast once here.
  return page.getByRole(role as Parameters<Page['getByRole']>[0], options);
}

// ── Description helper ────────────────────────────────────────

/** Human-readable one-liner describing the selector for logs and reports. */
export function describeSelector(hint: SelectorHint): string {
  switch (hint.strategy) {
    case 'testid':
      return `[data-testid="${hint.value}"]`;
    case 'role': {
      const role = hint.role ?? hint.value;
      return hint.name ? `role=${role}[name="${hint.name}"]` : `role=${role}`;
    }
    case 'text':
      return `text="${hint.value}"`;
    case 'css':
      return hint.value;
  }
}
