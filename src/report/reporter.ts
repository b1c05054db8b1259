import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Attempt, Run, RunStatus } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputAttempt } from '../schema/jsonOutput.js';
import type { LedgerSnapshot } from '../budget/index.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILED: 1,
  BUDGET: 2,
  ABORTED: 3,
  CONFIG: 4,
} as const;

export function exitCodeFor(status: RunStatus): number {
  switch (status) {
    case 'succeeded':
      return EXIT_CODES.SUCCESS;
    case 'failed':
    case 'attempt_limit_exhausted':
    case 'unrecoverable':
      return EXIT_CODES.FAILED;
    case 'budget_exhausted':
      return EXIT_CODES.BUDGET;
    case 'aborted':
      return EXIT_CODES.ABORTED;
  }
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: Run, exitCode: number = exitCodeFor(run.finalStatus)): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: run.runId,
    task: run.task.description,
    url: run.task.targetUrl,
    finalStatus: run.finalStatus,
    stopReason: run.stopReason,
    totalCost: roundCost(run.totalCost),
    durationMs: runDurationMs(run),
    exitCode,
    attempts: run.attempts.map(attemptToJSON),
    artifactHandles: run.attempts.flatMap((a) => a.trace.artifactHandles),
  };
}

function attemptToJSON(attempt: Attempt): JsonOutputAttempt {
  return {
    ordinal: attempt.ordinal,
    scriptVersion: attempt.script?.version ?? null,
    status: attempt.trace.status,
    ...(attempt.diagnosis ? { diagnosisCategory: attempt.diagnosis.category } : {}),
    cost: roundCost(attempt.cost),
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: Run): string {
  const lines: string[] = [];

  lines.push(`# healwright Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **URL** | ${run.task.targetUrl} |`);
  lines.push(`| **Task** | ${escapeMarkdownCell(run.task.description)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(runDurationMs(run))} |`);
  lines.push(`| **Result** | **${run.finalStatus}** ${statusIcon(run.finalStatus)} |`);
  if (run.stopReason !== null) {
    lines.push(`| **Stop reason** | ${run.stopReason} |`);
  }
  lines.push(`| **Total cost** | ${formatCost(run.totalCost)} |`);
  lines.push('');

  lines.push(`## Attempts`);
  lines.push('');

  if (run.attempts.length === 0) {
    lines.push('No attempts were made.');
    lines.push('');
    return lines.join('\n');
  }

  lines.push(`| # | Script | Result | Diagnosis | Cost |`);
  lines.push(`|---|--------|--------|-----------|------|`);

  for (const attempt of run.attempts) {
    const script = attempt.script ? `v${String(attempt.script.version)}` : '-';
    const diagnosis = attempt.diagnosis
      ? `${attempt.diagnosis.category} (${formatConfidence(attempt.diagnosis.confidence)})`
      : '-';
    lines.push(
      `| ${String(attempt.ordinal)} | ${script} | ${attempt.trace.status} | ${diagnosis} | ${formatCost(attempt.cost)} |`,
    );
  }

  lines.push('');
  lines.push(`## Attempt Details`);
  lines.push('');

  for (const attempt of run.attempts) {
    lines.push(...attemptDetails(attempt));
  }

  return lines.join('\n');
}

function attemptDetails(attempt: Attempt): string[] {
  const lines: string[] = [];
  const script = attempt.script
    ? `script v${String(attempt.script.version)} via ${attempt.script.model}`
    : 'no script';
  lines.push(`### Attempt ${String(attempt.ordinal)} (${script})`);
  lines.push('');

  const signal = attempt.trace.errorSignal;
  if (signal) {
    lines.push(`**Error:** ${escapeMarkdownCell(signal.message.split('\n', 1)[0] ?? '')}`);
    lines.push('');
  }

  if (attempt.diagnosis) {
    lines.push(`**Diagnosis:** ${attempt.diagnosis.category}: ${attempt.diagnosis.summary}`);
    lines.push('');
    lines.push(`**Suggested fix:** ${attempt.diagnosis.fixHint}`);
    lines.push('');
    if (attempt.diagnosis.evidence.length > 0) {
      lines.push(`**Evidence:**`);
      lines.push('');
      for (const e of attempt.diagnosis.evidence) {
        lines.push(`- ${e}`);
      }
      lines.push('');
    }
  }

  const screenshots = attempt.trace.artifactHandles.filter((h) => h.endsWith('.png'));
  const last = screenshots[screenshots.length - 1];
  if (last) {
    lines.push(`![screenshot](${last})`);
    lines.push('');
  }

  return lines;
}

// ── Artifact writer ──────────────────────────────────────────

export interface RunArtifactPaths {
  reportPath: string;
  summaryPath: string;
  scriptPaths: string[];
}

/** Writes report.md, summary.json and every script version under `outputDir`. */
export async function writeRunArtifacts(
  run: Run,
  outputDir: string,
  exitCode: number = exitCodeFor(run.finalStatus),
): Promise<RunArtifactPaths> {
  const scriptsDir = path.join(outputDir, 'scripts');
  await mkdir(scriptsDir, { recursive: true });

  const reportPath = path.join(outputDir, 'report.md');
  await writeFile(reportPath, generateMarkdown(run), 'utf-8');

  const summaryPath = path.join(outputDir, 'summary.json');
  await writeFile(summaryPath, serializeJSON(generateJSON(run, exitCode)) + '\n', 'utf-8');

  const scriptPaths: string[] = [];
  for (const attempt of run.attempts) {
    if (!attempt.script) continue;
    const scriptPath = path.join(scriptsDir, `script_v${String(attempt.script.version)}.json`);
    await writeFile(scriptPath, attempt.script.code + '\n', 'utf-8');
    scriptPaths.push(scriptPath);
  }

  return { reportPath, summaryPath, scriptPaths };
}

// ── Budget report ────────────────────────────────────────────

export function formatBudgetReport(snapshot: LedgerSnapshot): string {
  return [
    `Day:        ${snapshot.day} (UTC)`,
    `Spent:      ${formatCost(snapshot.dailySpend)}`,
    `Reserved:   ${formatCost(snapshot.pending)}`,
    `Budget:     ${formatCost(snapshot.dailyBudget)}`,
    `Remaining:  ${formatCost(snapshot.remaining)}`,
  ].join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function runDurationMs(run: Run): number {
  return Math.max(0, Date.parse(run.finishedAt) - Date.parse(run.startedAt));
}

function roundCost(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

function statusIcon(status: RunStatus): string {
  return status === 'succeeded' ? '[PASS]' : '[FAIL]';
}

export function formatCost(value: number): string {
  return `$${value.toFixed(4)}`;
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function formatConfidence(value: number): string {
  return `${String(Math.round(value * 100))}%`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
