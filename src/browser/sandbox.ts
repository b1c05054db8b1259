import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import { chromium, firefox, webkit } from 'playwright';
import type { Browser, BrowserContext, BrowserType, Page } from 'playwright';

import type { ExecutionSandbox } from '../core/adapters.js';
import { AbortedError, errorMessage } from '../core/errors.js';
import type {
  BrowserType as BrowserKind,
  ExecutionRequest,
  ExecutionResponse,
  Step,
} from '../schema/index.js';
import { stepListSchema } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { attachCapture } from './capture.js';
import { describeStep, performAction } from './runner.js';

// ── Error ────────────────────────────────────────────────────

/** The sandbox itself broke (browser would not launch, disk full). */
export class SandboxError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SandboxError';
  }
}

// ── Script parsing ───────────────────────────────────────────

export type ScriptParseResult =
  | { ok: true; steps: Step[] }
  | { ok: false; error: string };

export function parseScript(code: string): ScriptParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(code);
  } catch (e) {
    return { ok: false, error: `Invalid script: ${errorMessage(e)}` };
  }

  const result = stepListSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return { ok: false, error: `Invalid script: ${issues}` };
  }
  return { ok: true, steps: result.data };
}

// ── Sandbox ──────────────────────────────────────────────────

const BROWSERS: Record<BrowserKind, BrowserType> = {
  chromium,
  firefox,
  webkit,
};

export interface PlaywrightSandboxOptions {
  artifactsDir: string;
  recordVideo?: boolean;
}

export class PlaywrightSandbox implements ExecutionSandbox {
  private readonly artifactsDir: string;
  private readonly recordVideo: boolean;

  constructor(options: PlaywrightSandboxOptions) {
    this.artifactsDir = options.artifactsDir;
    this.recordVideo = options.recordVideo ?? false;
  }

  async execute(request: ExecutionRequest, signal: AbortSignal): Promise<ExecutionResponse> {
    const startedAt = Date.now();
    const elapsed = (): number => Date.now() - startedAt;

    const script = parseScript(request.code);
    if (!script.ok) {
      return {
        status: 'failure',
        logs: [],
        artifactHandles: [],
        durationMs: elapsed(),
        errorSignal: { message: script.error },
      };
    }

    if (signal.aborted) throw new AbortedError();

    const outputDir = path.join(this.artifactsDir, request.label);
    let browser: Browser;
    try {
      await mkdir(outputDir, { recursive: true });
      browser = await BROWSERS[request.browserType].launch({ headless: request.headless });
    } catch (err) {
      throw new SandboxError(`Could not start ${request.browserType}: ${errorMessage(err)}`, { cause: err });
    }

    // Closing the browser makes any in-flight Playwright call reject.
    const onAbort = (): void => {
      browser.close().catch((err: unknown) => {
        log.warn(`Browser close after abort failed: ${errorMessage(err)}`);
      });
    };
    signal.addEventListener('abort', onAbort, { once: true });

    try {
      return await this.runSteps(browser, script.steps, outputDir, signal, elapsed, request.timeoutMs);
    } catch (err) {
      if (signal.aborted) throw new AbortedError();
      throw new SandboxError(`Sandbox failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      signal.removeEventListener('abort', onAbort);
      if (browser.isConnected()) await browser.close();
    }
  }

  // ── Internals ──────────────────────────────────────────────

  private async runSteps(
    browser: Browser,
    steps: readonly Step[],
    outputDir: string,
    signal: AbortSignal,
    elapsed: () => number,
    timeoutMs: number,
  ): Promise<ExecutionResponse> {
    const context = await browser.newContext(
      this.recordVideo ? { recordVideo: { dir: outputDir } } : {},
    );
    const page = await context.newPage();
    const capture = attachCapture(page);
    const logs: string[] = [];
    const artifactHandles: string[] = [];

    for (let i = 0; i < steps.length; i++) {
      const step = steps[i];
      if (!step) continue;
      const stepNumber = i + 1;
      logs.push(`[step] ${String(stepNumber)}. ${describeStep(step)}`);

      // The whole script shares one time budget.
      const remaining = timeoutMs - elapsed();
      if (remaining <= 0) {
        logs.push(...capture.drain());
        await this.closeContext(context, page, artifactHandles);
        return {
          status: 'failure',
          logs,
          artifactHandles,
          durationMs: elapsed(),
          errorSignal: {
            message: `Execution timed out after ${String(timeoutMs)}ms`,
            failingStepIndex: stepNumber,
            failingStepAction: step.type,
          },
        };
      }

      try {
        await performAction(page, step, remaining);
      } catch (err) {
        if (signal.aborted) throw new AbortedError();
        logs.push(...capture.drain());
        await this.screenshot(page, outputDir, `failure-step-${String(stepNumber)}.png`, artifactHandles);
        await this.closeContext(context, page, artifactHandles);

        return {
          status: 'failure',
          logs,
          artifactHandles,
          durationMs: elapsed(),
          errorSignal: {
            message: errorMessage(err),
            ...(err instanceof Error && err.stack ? { stack: err.stack } : {}),
            failingStepIndex: stepNumber,
            failingStepAction: step.type,
          },
        };
      }

      logs.push(...capture.drain());
      await this.screenshot(page, outputDir, `step-${String(stepNumber)}.png`, artifactHandles);
    }

    await this.closeContext(context, page, artifactHandles);
    return { status: 'success', logs, artifactHandles, durationMs: elapsed() };
  }

  private async screenshot(
    page: Page,
    outputDir: string,
    fileName: string,
    handles: string[],
  ): Promise<void> {
    const screenshotPath = path.join(outputDir, fileName);
    try {
      await page.screenshot({ path: screenshotPath, fullPage: true });
      handles.push(screenshotPath);
    } catch (err) {
      log.detail(`Screenshot ${fileName} skipped: ${errorMessage(err)}`);
    }
  }

  /** Video files are only finalized once their context closes. */
  private async closeContext(
    context: BrowserContext,
    page: Page,
    handles: string[],
  ): Promise<void> {
    await context.close();
    const video = page.video();
    if (video) handles.push(await video.path());
  }
}
