import path from 'node:path';

import type { Command } from 'commander';

import { CostLedger, FileSpendStore } from '../budget/index.js';
import { PlaywrightSandbox } from '../browser/index.js';
import { PATHS } from '../config/defaults.js';
import { loadConfigFile, loadEnvSettings, loadOptionalConfigFile, resolveSettings } from '../config/loader.js';
import type { SettingsLayer } from '../config/loader.js';
import { Orchestrator } from '../core/orchestrator.js';
import { errorMessage } from '../core/errors.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { FileConfig, Run, Settings } from '../schema/index.js';
import { LlmScriptSynthesizer } from '../synthesis/index.js';
import { formatCost, EXIT_CODES } from '../report/index.js';
import * as log from '../utils/logger.js';

// ── Shared flags ─────────────────────────────────────────────

export interface SettingsFlags {
  config?: string;
  provider?: string;
  model?: string;
  fallbackModel?: string;
  headless?: true;
  browser?: string;
  timeout?: string;
  maxRepairAttempts?: string;
  autoHeal?: boolean;
  maxCost?: string;
  dailyBudget?: string;
  reportPath?: string;
  runTimeout?: string;
  video?: true;
  json?: true;
  quiet?: true;
}

export function addSettingsOptions(command: Command): Command {
  return command
    .option('--config <path>', `Path to config file (default ${PATHS.CONFIG_FILE} if present)`)
    .option('--provider <name>', 'LLM provider: anthropic, openai, openrouter or mock')
    .option('--model <id>', 'Model for script synthesis')
    .option('--fallback-model <id>', 'Model tried when the default model call fails')
    .option('--headless', 'Run browser headless')
    .option('--browser <type>', 'chromium, firefox or webkit')
    .option('--timeout <ms>', 'Per-attempt execution timeout in milliseconds')
    .option('--max-repair-attempts <n>', 'Repairs allowed after the first attempt')
    .option('--no-auto-heal', 'Stop after the first failure')
    .option('--max-cost <usd>', 'Spend ceiling for a single run')
    .option('--daily-budget <usd>', 'Spend ceiling for the UTC day')
    .option('--report-path <dir>', 'Artifact directory')
    .option('--run-timeout <seconds>', 'Wall-clock deadline for a run in seconds')
    .option('--video', 'Record a video of every attempt')
    .option('--json', 'Output JSON to stdout')
    .option('--quiet', 'Suppress progress output on stderr');
}

function numberFlag(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/** CLI layer: flags Commander left unset stay undefined and never override. */
export function flagsToLayer(flags: SettingsFlags): SettingsLayer {
  const runTimeoutSec = numberFlag(flags.runTimeout);
  return {
    provider: flags.provider,
    defaultModel: flags.model,
    fallbackModel: flags.fallbackModel,
    headless: flags.headless,
    browserType: flags.browser,
    defaultTimeoutMs: numberFlag(flags.timeout),
    maxRepairAttempts: numberFlag(flags.maxRepairAttempts),
    // Commander sets autoHeal=true by default for a --no- flag.
    autoHeal: flags.autoHeal === false ? false : undefined,
    maxCostPerRun: numberFlag(flags.maxCost),
    dailyBudget: numberFlag(flags.dailyBudget),
    artifactsDir: flags.reportPath,
    runTimeoutMs: runTimeoutSec === undefined ? undefined : runTimeoutSec * 1000,
    recordVideo: flags.video,
  };
}

export interface LoadedSettings {
  settings: Settings;
  fileConfig: FileConfig;
}

export async function loadSettings(flags: SettingsFlags): Promise<LoadedSettings> {
  const fileConfig = flags.config !== undefined
    ? await loadConfigFile(flags.config)
    : await loadOptionalConfigFile(PATHS.CONFIG_FILE);

  const { baseUrl: _baseUrl, tasks: _tasks, ...fileSettings } = fileConfig;
  const settings = resolveSettings(flagsToLayer(flags), fileSettings, loadEnvSettings());
  return { settings, fileConfig };
}

// ── Runtime wiring ───────────────────────────────────────────

export interface Runtime {
  settings: Settings;
  ledger: CostLedger;
  orchestrator: Orchestrator;
}

export async function openLedger(settings: Settings): Promise<CostLedger> {
  const store = new FileSpendStore(
    path.resolve(settings.artifactsDir, PATHS.DAILY_COSTS_FILE),
  );
  return CostLedger.open(store, {
    maxCostPerRun: settings.maxCostPerRun,
    dailyBudget: settings.dailyBudget,
  });
}

export async function createRuntime(settings: Settings): Promise<Runtime> {
  const client = createLLMClient(loadLLMConfig(settings.provider, settings.defaultModel));
  const synthesizer = new LlmScriptSynthesizer(client, {
    fallbackModel: settings.fallbackModel,
  });
  const sandbox = new PlaywrightSandbox({
    artifactsDir: path.resolve(settings.artifactsDir),
    recordVideo: settings.recordVideo,
  });
  const ledger = await openLedger(settings);

  const orchestrator = new Orchestrator(
    { synthesizer, sandbox, ledger },
    {
      estimatedAttemptCost: settings.estimatedAttemptCost,
      runTimeoutMs: settings.runTimeoutMs,
      maxCostPerRun: settings.maxCostPerRun,
    },
  );

  return { settings, ledger, orchestrator };
}

// ── Interrupt handling ───────────────────────────────────────

export interface Interrupt {
  signal: AbortSignal;
  dispose(): void;
}

/** First Ctrl-C aborts in-flight runs; they finish with status `aborted`. */
export function abortOnSigint(): Interrupt {
  const controller = new AbortController();
  const onSigint = (): void => {
    log.warn('Interrupted, aborting in-flight runs...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSigint);
    },
  };
}

// ── Output ───────────────────────────────────────────────────

export function printSummary(run: Run, reportDir: string): void {
  process.stderr.write(`\n--- healwright Result ---\n`);
  process.stderr.write(`URL:       ${run.task.targetUrl}\n`);
  process.stderr.write(`Task:      ${run.task.description}\n`);
  process.stderr.write(`Result:    ${run.finalStatus}\n`);
  if (run.stopReason !== null) {
    process.stderr.write(`Stopped:   ${run.stopReason}\n`);
  }
  process.stderr.write(`Attempts:  ${String(run.attempts.length)}\n`);
  process.stderr.write(`Cost:      ${formatCost(run.totalCost)}\n`);
  process.stderr.write(`Run ID:    ${run.runId}\n`);
  process.stderr.write(`Report:    ${reportDir}\n\n`);
}

/** Exit code for a fault that prevented a run from finishing. */
export function reportFatal(err: unknown, context?: string): number {
  const prefix = context !== undefined ? `Error [${context}]` : 'Error';
  process.stderr.write(`${prefix}: ${errorMessage(err)}\n`);
  return EXIT_CODES.CONFIG;
}

