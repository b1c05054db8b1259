#!/usr/bin/env node

/**
 * healwright CLI entry point.
 * Thin wrapper: all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand, registerSuiteCommand } from './run.js';
import { registerBudgetCommand } from './budget.js';

const program = new Command();

program
  .name('healwright')
  .description(
    'Self-healing browser test runner. Generates Playwright step scripts from natural language, runs them, diagnoses failures and repairs the script within a cost budget.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerSuiteCommand(program);
registerBudgetCommand(program);

await program.parseAsync();
