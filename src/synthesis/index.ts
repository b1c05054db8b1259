export { LlmScriptSynthesizer, SynthesisError, QUICK_FIX_MODEL } from './synthesizer.js';
export type { LlmSynthesizerOptions } from './synthesizer.js';
export { applyQuickFix } from './quickFix.js';
export { extractJSON, fixupRawSteps, serializeSteps, tryParseSteps } from './steps.js';
export type { ParseResult } from './steps.js';
