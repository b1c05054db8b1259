/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, registerSuiteCommand } from './run.js';
export { registerBudgetCommand } from './budget.js';
export { flagsToLayer, loadSettings } from './runtime.js';
export type { SettingsFlags } from './runtime.js';
