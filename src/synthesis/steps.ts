import type { Step } from '../schema/index.js';
import { selectorStrategySchema, stepListSchema } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';

// ── Pre-validation fixups ────────────────────────────────────
// Models sometimes invent strategies like "placeholder" or "name".
// Convert these to valid CSS selectors before Zod validation.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fixupSelector(sel: Record<string, unknown>): void {
  const strategy = sel['strategy'];
  const value = sel['value'];
  if (typeof strategy !== 'string' || typeof value !== 'string') return;
  if (selectorStrategySchema.safeParse(strategy).success) return;

  switch (strategy) {
    case 'placeholder':
      sel['strategy'] = 'css';
      sel['value'] = `input[placeholder='${value}']`;
      break;
    case 'name':
      sel['strategy'] = 'css';
      sel['value'] = `[name='${value}']`;
      break;
    case 'id':
      sel['strategy'] = 'css';
      sel['value'] = `#${value}`;
      break;
    case 'label':
      sel['strategy'] = 'text';
      break;
    default:
      sel['strategy'] = 'css';
      sel['value'] = `[${strategy}='${value}']`;
      break;
  }
}

export function fixupRawSteps(parsed: unknown): unknown {
  if (!Array.isArray(parsed)) return parsed;

  for (const s of parsed) {
    if (!isRecord(s)) continue;

    if (!s['description'] && typeof s['type'] === 'string') {
      s['description'] = `${s['type']} step`;
    }

    const selector = s['selector'];
    if (isRecord(selector)) fixupSelector(selector);

    // expect_text without a value: pull a quoted phrase from the description
    if (s['type'] === 'expect_text' && !s['value']) {
      const desc = String(s['description'] ?? '');
      const quoted = /"([^"]+)"/.exec(desc) ?? /'([^']+)'/.exec(desc);
      s['value'] = quoted?.[1] ?? (desc.slice(0, 50) || 'page content');
    }
  }

  return parsed;
}

// ── JSON extraction + validation ─────────────────────────────

export type ParseResult =
  | { ok: true; steps: Step[] }
  | { ok: false; error: string };

export function extractJSON(raw: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  // Outermost array brackets
  const start = raw.indexOf('[');
  const end = raw.lastIndexOf(']');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

export function tryParseSteps(raw: string, maxSteps: number = LIMITS.MAX_STEPS): ParseResult {
  const json = extractJSON(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }

  const result = stepListSchema.safeParse(fixupRawSteps(parsed));
  if (!result.success) {
    return { ok: false, error: result.error.message };
  }

  const steps = result.data;

  if (steps.length > maxSteps) {
    return {
      ok: false,
      error: `Too many steps: ${String(steps.length)} (max ${String(maxSteps)})`,
    };
  }

  if (steps[0]?.type !== 'goto') {
    return { ok: false, error: 'First step must be a "goto" step' };
  }

  return { ok: true, steps };
}

export function serializeSteps(steps: readonly Step[]): string {
  return JSON.stringify(steps, null, 2);
}
