import type { Diagnosis, ExecutionTrace } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import { DEFAULT_RULES } from './rules.js';
import type { ClassifierContext, DiagnosisRule } from './rules.js';

export type Classifier = (trace: ExecutionTrace, context: ClassifierContext) => Diagnosis;

const UNKNOWN_FIX_HINT =
  'No known failure pattern matched; regenerate the script from the task description with conservative, well-waited steps.';

/**
 * Build a classifier over an ordered rule list. The first matching rule
 * wins; no match yields `unknown` with confidence 0.
 */
export function createClassifier(
  rules: readonly DiagnosisRule[] = DEFAULT_RULES,
): Classifier {
  const ordered = [...rules];

  return (trace, context) => {
    if (trace.status === 'success') {
      throw new Error('Cannot diagnose a successful execution');
    }

    const evidence = collectEvidence(trace);

    for (const rule of ordered) {
      const match = rule.match(trace, context);
      if (match) {
        return {
          category: rule.category,
          summary: withStep(match.summary, trace),
          confidence: match.confidence,
          fixHint: rule.fixHint,
          evidence,
        };
      }
    }

    const message = trace.errorSignal?.message.trim();
    return {
      category: 'unknown',
      summary: withStep(message ? `Unclassified failure: ${firstLine(message)}` : 'Unclassified failure', trace),
      confidence: 0,
      fixHint: UNKNOWN_FIX_HINT,
      evidence,
    };
  };
}

export const classifyTrace: Classifier = createClassifier();

// ── Helpers ──────────────────────────────────────────────────

function withStep(summary: string, trace: ExecutionTrace): string {
  const index = trace.errorSignal?.failingStepIndex;
  if (index === undefined) return summary;
  const action = trace.errorSignal?.failingStepAction;
  const step = action ? `step ${String(index)} (${action})` : `step ${String(index)}`;
  return `${summary} at ${step}`;
}

function firstLine(text: string): string {
  return text.split('\n', 1)[0] ?? text;
}

function collectEvidence(trace: ExecutionTrace): string[] {
  const evidence: string[] = [];
  if (trace.errorSignal?.message) {
    evidence.push(firstLine(trace.errorSignal.message));
  }
  const errorLines = trace.logs.filter((line) => /^\[(error|pageerror)\]/i.test(line));
  for (const line of errorLines.slice(0, LIMITS.MAX_EVIDENCE_LINES)) {
    evidence.push(line);
  }
  return evidence;
}
