import type { Command } from 'commander';

import { formatBudgetReport } from '../report/index.js';
import { loadSettings, openLedger, reportFatal } from './runtime.js';
import type { SettingsFlags } from './runtime.js';

export function registerBudgetCommand(program: Command): void {
  program
    .command('budget')
    .description("Show today's spend against the daily budget")
    .option('--config <path>', 'Path to config file')
    .option('--report-path <dir>', 'Artifact directory holding the spend ledger')
    .option('--daily-budget <usd>', 'Spend ceiling for the UTC day')
    .option('--json', 'Output JSON to stdout')
    .action(async (opts: SettingsFlags) => {
      try {
        const { settings } = await loadSettings(opts);
        const ledger = await openLedger(settings);
        const snapshot = ledger.snapshot();

        if (opts.json) {
          process.stdout.write(JSON.stringify(snapshot, null, 2) + '\n');
        } else {
          process.stdout.write(formatBudgetReport(snapshot) + '\n');
        }
      } catch (err) {
        process.exitCode = reportFatal(err);
      }
    });
}
