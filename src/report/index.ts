/**
 * Report generation module.
 * Deterministic, no LLM calls.
 * Turns a finished Run into markdown + JSON artifacts.
 */

export {
  EXIT_CODES,
  exitCodeFor,
  formatBudgetReport,
  formatCost,
  generateJSON,
  generateMarkdown,
  serializeJSON,
  writeRunArtifacts,
} from './reporter.js';
export type { RunArtifactPaths } from './reporter.js';
