import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { ScriptSynthesizer } from '../core/adapters.js';
import { AbortedError, errorMessage } from '../core/errors.js';
import type { LLMClient, LLMCompletion } from '../llm/index.js';
import type {
  Step,
  SynthesisRequest,
  SynthesisResponse,
} from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import { tokenCost } from '../config/pricing.js';
import * as log from '../utils/logger.js';
import { applyQuickFix } from './quickFix.js';
import { serializeSteps, tryParseSteps } from './steps.js';

// ── Error ────────────────────────────────────────────────────

/** Carries what the failed synthesis already spent on model calls. */
export class SynthesisError extends Error {
  readonly exitCode = 3;

  constructor(
    message: string,
    readonly cost = 0,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SynthesisError';
  }
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

const SYSTEM_PROMPT =
  'You write browser automation scripts as JSON step arrays. Reply with the JSON array only.';

export const QUICK_FIX_MODEL = 'quick-fix';

async function loadTemplate(name: string): Promise<string> {
  return readFile(path.join(PROMPTS_DIR, name), 'utf-8');
}

function render(template: string, values: Record<string, string>): string {
  let out = template;
  for (const [key, value] of Object.entries(values)) {
    out = out.replaceAll(`{{${key}}}`, value);
  }
  return out;
}

// ── Synthesizer ──────────────────────────────────────────────

export interface LlmSynthesizerOptions {
  /** Tried once when a call on the client's default model throws. */
  fallbackModel?: string | undefined;
  maxSteps?: number;
}

export class LlmScriptSynthesizer implements ScriptSynthesizer {
  private readonly fallbackModel: string | undefined;
  private readonly maxSteps: number;

  constructor(
    private readonly client: LLMClient,
    options: LlmSynthesizerOptions = {},
  ) {
    this.fallbackModel = options.fallbackModel;
    this.maxSteps = options.maxSteps ?? LIMITS.MAX_STEPS;
  }

  async synthesize(
    request: SynthesisRequest,
    signal: AbortSignal,
  ): Promise<SynthesisResponse> {
    const quick = this.quickFix(request);
    if (quick) return quick;

    const userPrompt = await this.buildPrompt(request);
    let spent = 0;

    log.llm(request.priorScript ? 'Repairing script...' : 'Generating script...');
    const first = await this.call(userPrompt, signal);
    spent += this.priceOf(first);

    const firstAttempt = tryParseSteps(first.text, this.maxSteps);
    if (firstAttempt.ok) {
      return this.respond(firstAttempt.steps, first.model, spent);
    }

    // One retry with the fixup prompt
    log.warn(`Script parse failed, asking for a fix: ${firstAttempt.error}`);
    const fixupPrompt = render(await loadTemplate('fixup.txt'), {
      error: firstAttempt.error,
      previousOutput: first.text,
    });
    let fixed: LLMCompletion;
    try {
      fixed = await this.call(fixupPrompt, signal, first.model);
    } catch (err) {
      if (err instanceof AbortedError) throw err;
      throw new SynthesisError(`Fixup call failed: ${errorMessage(err)}`, spent, { cause: err });
    }
    spent += this.priceOf(fixed);

    const secondAttempt = tryParseSteps(fixed.text, this.maxSteps);
    if (secondAttempt.ok) {
      return this.respond(secondAttempt.steps, fixed.model, spent);
    }

    throw new SynthesisError(
      `Script synthesis failed after fixup attempt: ${secondAttempt.error}`,
      spent,
    );
  }

  // ── Internals ──────────────────────────────────────────────

  private quickFix(request: SynthesisRequest): SynthesisResponse | null {
    if (!request.priorScript || !request.repairCategory) return null;

    const prior = tryParseSteps(request.priorScript, Number.MAX_SAFE_INTEGER);
    if (!prior.ok) return null;

    const patched = applyQuickFix(prior.steps, request.repairCategory, request.timeoutMs);
    if (!patched) return null;

    log.repair(`Quick fix applied for ${request.repairCategory}`);
    return { code: serializeSteps(patched), model: QUICK_FIX_MODEL, estimatedCost: 0 };
  }

  private async buildPrompt(request: SynthesisRequest): Promise<string> {
    const base = {
      task: request.taskDescription,
      url: request.targetUrl,
      maxSteps: String(this.maxSteps),
    };

    if (request.priorScript === undefined) {
      return render(await loadTemplate('synthesis.txt'), base);
    }

    return render(await loadTemplate('repair.txt'), {
      ...base,
      priorScript: request.priorScript,
      repairHint: request.repairHint ?? 'No diagnosis available.',
    });
  }

  private async call(
    userPrompt: string,
    signal: AbortSignal,
    model?: string,
  ): Promise<LLMCompletion> {
    try {
      return await this.client.complete(SYSTEM_PROMPT, userPrompt, { model, signal });
    } catch (err) {
      if (signal.aborted) throw new AbortedError();
      const fallback = this.fallbackModel;
      if (fallback === undefined || fallback === (model ?? this.client.defaultModel)) {
        throw err;
      }
      log.warn(`LLM call failed (${errorMessage(err)}), retrying with ${fallback}`);
      return this.client.complete(SYSTEM_PROMPT, userPrompt, { model: fallback, signal });
    }
  }

  private priceOf(completion: LLMCompletion): number {
    return tokenCost(
      completion.model,
      completion.inputTokens,
      completion.outputTokens,
      this.fallbackModel,
    );
  }

  private respond(steps: Step[], model: string, cost: number): SynthesisResponse {
    log.llm(`Script ready: ${String(steps.length)} steps via ${model}`);
    for (let i = 0; i < steps.length; i++) {
      const step = steps[i];
      if (step) log.detail(`${String(i + 1)}. [${step.type}] ${step.description}`);
    }
    return { code: serializeSteps(steps), model, estimatedCost: cost };
  }
}
