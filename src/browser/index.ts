/**
 * Browser execution module.
 * Deterministic Playwright sandbox with no LLM calls.
 * Receives a step script, executes it, captures artifacts.
 */

export { resolveSelector, describeSelector } from './selectors.js';
export { performAction, describeStep, stepTimeout } from './runner.js';
export { attachCapture, consoleLine, pageErrorLine, requestFailedLine, responseLine } from './capture.js';
export type { CaptureCollector } from './capture.js';
export { PlaywrightSandbox, SandboxError, parseScript } from './sandbox.js';
export type { PlaywrightSandboxOptions, ScriptParseResult } from './sandbox.js';
