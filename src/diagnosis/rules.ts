import type { ErrorCategory, ExecutionTrace } from '../schema/index.js';

// ── Rule shape ───────────────────────────────────────────────

export interface ClassifierContext {
  /** Configured per-attempt timeout the trace ran under. */
  timeoutMs: number;
}

export interface RuleMatch {
  confidence: number;
  summary: string;
}

/**
 * One entry of the ordered rule list. `match` must be pure: it sees only
 * the trace and the context, and returns null when the rule does not apply.
 */
export interface DiagnosisRule {
  readonly category: Exclude<ErrorCategory, 'unknown'>;
  readonly fixHint: string;
  match(trace: ExecutionTrace, context: ClassifierContext): RuleMatch | null;
}

// ── Helpers ──────────────────────────────────────────────────

function messageOf(trace: ExecutionTrace): string {
  return trace.errorSignal?.message ?? '';
}

function patternRule(
  category: DiagnosisRule['category'],
  patterns: readonly RegExp[],
  confidence: number,
  summary: string,
  fixHint: string,
): DiagnosisRule {
  return {
    category,
    fixHint,
    match(trace) {
      const message = messageOf(trace);
      return patterns.some((p) => p.test(message)) ? { confidence, summary } : null;
    },
  };
}

// ── Default rules (order matters: first match wins) ──────────

export const selectorNotFoundRule = patternRule(
  'selector_not_found',
  [
    /waiting for (selector|locator|getBy)/i,
    /element (is )?not found/i,
    /no element/i,
    /could not find/i,
    /resolved to 0 elements/i,
    /strict mode violation/i,
  ],
  0.85,
  'Element selector could not locate the target element',
  'Use a more robust selector (data-testid, role + accessible name, or visible text) and wait for the element to be visible before interacting.',
);

export const timeoutRule: DiagnosisRule = {
  category: 'timeout',
  fixHint:
    'Raise the step timeout, wait for a concrete element instead of a fixed delay, and prefer domcontentloaded over networkidle on heavy pages.',
  match(trace, context) {
    if (/timeout \d+ ?ms exceeded|timed out|timeout exceeded/i.test(messageOf(trace))) {
      return { confidence: 0.85, summary: 'Operation exceeded its time limit' };
    }
    if (trace.durationMs >= context.timeoutMs) {
      return {
        confidence: 0.7,
        summary: `Execution ran ${String(trace.durationMs)}ms, at or past the ${String(context.timeoutMs)}ms timeout`,
      };
    }
    return null;
  },
};

export const networkErrorRule = patternRule(
  'network_error',
  [
    /net::ERR_/,
    /ECONNREFUSED/,
    /ENOTFOUND/,
    /ECONNRESET/,
    /EAI_AGAIN/,
    /socket hang up/i,
  ],
  0.9,
  'Network connectivity or DNS resolution failure',
  'Verify the target URL is reachable and correct; navigate once more before interacting.',
);

export const navigationFailureRule: DiagnosisRule = {
  category: 'navigation_failure',
  fixHint:
    'Navigate with an absolute URL, wait for the destination page to settle, and avoid chaining navigations without waiting in between.',
  match(trace) {
    const message = messageOf(trace);
    if (
      /page\.goto/i.test(message) ||
      /navigation .*interrupted/i.test(message) ||
      /navigating to/i.test(message) ||
      /frame was detached/i.test(message)
    ) {
      return { confidence: 0.8, summary: 'Page navigation did not complete' };
    }
    if (trace.errorSignal?.failingStepAction === 'goto') {
      return { confidence: 0.75, summary: 'A navigation step failed' };
    }
    return null;
  },
};

export const assertionFailureRule = patternRule(
  'assertion_failure',
  [
    /expected text .* not found/i,
    /expect(ed)?\b.*\b(to (be|equal|have|contain|match)|but (got|received))/i,
    /assertion ?error/i,
  ],
  0.8,
  'The page did not reach the expected state',
  'Check the expected text against what the page actually shows; add a wait for the state change before asserting.',
);

export const scriptRuntimeErrorRule = patternRule(
  'script_runtime_error',
  [
    /\b(TypeError|ReferenceError|SyntaxError|RangeError)\b/,
    /is not a function/i,
    /is not defined/i,
    /cannot read propert/i,
    /invalid script/i,
  ],
  0.75,
  'The script itself is malformed or raised a runtime error',
  'Regenerate the script as a valid step list that matches the schema exactly.',
);

export const DEFAULT_RULES: readonly DiagnosisRule[] = [
  selectorNotFoundRule,
  timeoutRule,
  networkErrorRule,
  navigationFailureRule,
  assertionFailureRule,
  scriptRuntimeErrorRule,
];
