import path from 'node:path';

import type { Command } from 'commander';

import { taskFromSettings } from '../core/task.js';
import { ConfigError } from '../core/errors.js';
import type { Run, SuiteTask } from '../schema/index.js';
import {
  exitCodeFor,
  generateJSON,
  serializeJSON,
  writeRunArtifacts,
} from '../report/index.js';
import { mapWithConcurrency } from '../utils/pool.js';
import * as log from '../utils/logger.js';
import {
  abortOnSigint,
  addSettingsOptions,
  createRuntime,
  loadSettings,
  printSummary,
  reportFatal,
} from './runtime.js';
import type { Runtime, SettingsFlags } from './runtime.js';

// ── Single run ───────────────────────────────────────────────

async function executeTask(
  runtime: Runtime,
  description: string,
  url: string,
  signal: AbortSignal,
  json: boolean,
): Promise<number> {
  const task = taskFromSettings(description, url, runtime.settings);
  const run: Run = await runtime.orchestrator.run(task, { signal });
  const exitCode = exitCodeFor(run.finalStatus);

  const outputDir = path.resolve(runtime.settings.artifactsDir, run.runId);
  await writeRunArtifacts(run, outputDir, exitCode);

  if (json) {
    process.stdout.write(serializeJSON(generateJSON(run, exitCode)) + '\n');
  }
  printSummary(run, outputDir);
  return exitCode;
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  addSettingsOptions(
    program
      .command('run')
      .description('Generate, execute and self-heal a browser test for one task')
      .argument('<url>', 'Target URL to test')
      .argument('<task>', 'Natural language task description'),
  ).action(async (url: string, description: string, opts: SettingsFlags) => {
    log.setQuiet(opts.quiet === true);
    const interrupt = abortOnSigint();
    let runtime: Runtime | undefined;
    try {
      const { settings } = await loadSettings(opts);
      runtime = await createRuntime(settings);
      process.exitCode = await executeTask(
        runtime,
        description,
        url,
        interrupt.signal,
        opts.json === true,
      );
      await runtime.ledger.flush();
    } catch (err) {
      process.exitCode = reportFatal(err);
    } finally {
      interrupt.dispose();
    }
  });
}

// ── Suite (config-driven multi-task) ─────────────────────────

interface SuiteFlags extends SettingsFlags {
  task?: string;
  concurrency: string;
}

function selectTasks(tasks: readonly SuiteTask[], name: string | undefined): SuiteTask[] {
  const selected = name !== undefined ? tasks.filter((t) => t.name === name) : [...tasks];
  if (selected.length === 0) {
    throw new ConfigError(
      name !== undefined ? `No task named "${name}" found in config` : 'No tasks defined in config',
    );
  }
  return selected;
}

export function registerSuiteCommand(program: Command): void {
  addSettingsOptions(
    program
      .command('suite')
      .description('Run every task defined in a config file')
      .option('--task <name>', 'Run a single task by name')
      .option('--concurrency <n>', 'Runs in flight at once', '1'),
  ).action(async (opts: SuiteFlags) => {
    log.setQuiet(opts.quiet === true);
    const interrupt = abortOnSigint();
    try {
      const { settings, fileConfig } = await loadSettings(opts);
      const tasks = selectTasks(fileConfig.tasks ?? [], opts.task);
      const concurrency = Number(opts.concurrency);
      if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ConfigError(`--concurrency must be a positive integer, got "${opts.concurrency}"`);
      }

      const runtime = await createRuntime(settings);

      const exitCodes = await mapWithConcurrency(tasks, concurrency, async (entry) => {
        const url = entry.url ?? fileConfig.baseUrl;
        if (url === undefined) {
          return reportFatal(new ConfigError('Task has no url and the config has no baseUrl'), entry.name);
        }
        log.info(`Running task: ${entry.name}`);
        try {
          return await executeTask(runtime, entry.task, url, interrupt.signal, opts.json === true);
        } catch (err) {
          return reportFatal(err, entry.name);
        }
      });

      await runtime.ledger.flush();
      process.exitCode = Math.max(0, ...exitCodes);
    } catch (err) {
      process.exitCode = reportFatal(err);
    } finally {
      interrupt.dispose();
    }
  });
}
