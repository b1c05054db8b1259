/**
 * healwright library entry point.
 *
 * The CLI in `cli/` is one consumer; embedders wire their own
 * ScriptSynthesizer / ExecutionSandbox into an Orchestrator.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './budget/index.js';
export * from './diagnosis/index.js';
export * from './repair/index.js';
export * from './config/index.js';
export * from './llm/index.js';
export * from './synthesis/index.js';
export * from './browser/index.js';
export * from './report/index.js';
