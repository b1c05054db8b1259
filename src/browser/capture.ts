import type { Page } from 'playwright';

import { LIMITS } from '../config/defaults.js';

// ── Log line formatting ──────────────────────────────────────
// The diagnosis evidence collector keys on the `[error]` and `[pageerror]`
// prefixes.

export function consoleLine(type: string, text: string): string {
  return `[${type === 'warning' ? 'warning' : 'error'}] ${text}`;
}

export function responseLine(status: number, method: string, url: string): string {
  return `[network] ${String(status)} ${method} ${url}`;
}

export function requestFailedLine(method: string, url: string, errorText: string): string {
  return `[network] FAILED ${method} ${url} ${errorText}`;
}

export function pageErrorLine(message: string): string {
  return `[pageerror] ${message}`;
}

// ── Public interface ─────────────────────────────────────────

export interface CaptureCollector {
  /** Return accumulated log lines and reset the buffer. */
  drain(): string[];
}

// ── Factory ──────────────────────────────────────────────────

/**
 * Attach capture listeners to a Playwright page.
 * Call once at page creation; listeners persist for the session.
 * Use `drain()` at each step boundary.
 */
export function attachCapture(page: Page, maxLines: number = LIMITS.MAX_LOG_LINES): CaptureCollector {
  let lines: string[] = [];
  let total = 0;

  const push = (line: string): void => {
    total++;
    if (total <= maxLines) lines.push(line);
  };

  page.on('console', (msg) => {
    const type = msg.type();
    if (type !== 'error' && type !== 'warning') return;
    push(consoleLine(type, msg.text()));
  });

  page.on('response', (response) => {
    if (response.status() < 400) return;
    push(responseLine(response.status(), response.request().method(), response.url()));
  });

  page.on('requestfailed', (request) => {
    const failure = request.failure();
    if (failure) push(requestFailedLine(request.method(), request.url(), failure.errorText));
  });

  page.on('pageerror', (error) => {
    push(pageErrorLine(error.message));
  });

  return {
    drain(): string[] {
      const drained = lines;
      lines = [];
      return drained;
    },
  };
}
