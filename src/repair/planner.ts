import type { Attempt, Diagnosis, TaskConfig } from '../schema/index.js';

// ── Public types ─────────────────────────────────────────────

export type RepairStopReason =
  | 'auto_heal_disabled'
  | 'attempt_limit_exhausted'
  | 'unrecoverable';

export type RepairDecision =
  | { kind: 'retry_with_repair'; hint: string }
  | { kind: 'stop'; reason: RepairStopReason };

export interface RepairPolicy {
  /**
   * Consecutive `unknown` diagnoses that stop the run. 1 stops on the
   * first unclassifiable failure; the ceiling is 2.
   */
  unknownStreakLimit: 1 | 2;
  /** Earlier failing attempts referenced in the repair hint. */
  historyWindow: number;
}

export const DEFAULT_REPAIR_POLICY: RepairPolicy = {
  unknownStreakLimit: 2,
  historyWindow: 2,
};

export type RepairConfig = Pick<TaskConfig, 'autoHeal' | 'maxRepairAttempts'>;

// ── Decision ─────────────────────────────────────────────────

/**
 * Decide whether to repair after a failed attempt. `history` is the full
 * attempt sequence including the attempt `latest` diagnoses.
 */
export function planRepair(
  history: readonly Attempt[],
  latest: Diagnosis,
  config: RepairConfig,
  policy: RepairPolicy = DEFAULT_REPAIR_POLICY,
): RepairDecision {
  if (!config.autoHeal) {
    return { kind: 'stop', reason: 'auto_heal_disabled' };
  }

  if (history.length >= config.maxRepairAttempts + 1) {
    return { kind: 'stop', reason: 'attempt_limit_exhausted' };
  }

  if (unknownStreak(history, latest) >= policy.unknownStreakLimit) {
    return { kind: 'stop', reason: 'unrecoverable' };
  }

  return {
    kind: 'retry_with_repair',
    hint: buildRepairHint(history, latest, policy.historyWindow),
  };
}

/**
 * Trailing run of `unknown` diagnoses ending at the latest attempt. The
 * last history entry is the attempt `latest` diagnoses.
 */
function unknownStreak(history: readonly Attempt[], latest: Diagnosis): number {
  if (latest.category !== 'unknown') return 0;
  let streak = 1;
  for (let i = history.length - 2; i >= 0; i--) {
    if (history[i]?.diagnosis?.category !== 'unknown') break;
    streak++;
  }
  return streak;
}

// ── Hint construction ────────────────────────────────────────

export function buildRepairHint(
  history: readonly Attempt[],
  latest: Diagnosis,
  window: number = DEFAULT_REPAIR_POLICY.historyWindow,
): string {
  const lines = [
    `Error category: ${latest.category}`,
    `Root cause: ${latest.summary}`,
    `Suggested fix: ${latest.fixHint}`,
  ];

  if (latest.evidence.length > 0) {
    lines.push('Evidence:');
    for (const item of latest.evidence) {
      lines.push(`- ${item}`);
    }
  }

  const earlier = earlierFailures(history, window);
  if (earlier.length > 0) {
    lines.push('Earlier failed attempts (do not repeat these fixes):');
    for (const attempt of earlier) {
      lines.push(`- ${describeAttempt(attempt)}`);
    }
  }

  return lines.join('\n');
}

/** Most recent failing attempts before the latest, oldest first. */
function earlierFailures(history: readonly Attempt[], window: number): Attempt[] {
  const failures = history
    .slice(0, -1)
    .filter((a) => a.trace.status === 'failure' && a.diagnosis !== undefined);
  return window > 0 ? failures.slice(-window) : [];
}

function describeAttempt(attempt: Attempt): string {
  const version = attempt.script ? `v${String(attempt.script.version)}` : 'no script';
  const category = attempt.diagnosis?.category ?? 'undiagnosed';
  const summary = attempt.diagnosis?.summary ?? attempt.trace.errorSignal?.message ?? '';
  return `attempt ${String(attempt.ordinal)} (${version}): ${category}, ${summary}`;
}
