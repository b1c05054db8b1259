/**
 * Diagnosis module.
 * Deterministic, side-effect-free failure classification over an
 * ordered rule list. No LLM calls.
 */

export { createClassifier, classifyTrace } from './classifier.js';
export type { Classifier } from './classifier.js';
export {
  DEFAULT_RULES,
  selectorNotFoundRule,
  timeoutRule,
  networkErrorRule,
  navigationFailureRule,
  assertionFailureRule,
  scriptRuntimeErrorRule,
} from './rules.js';
export type { ClassifierContext, DiagnosisRule, RuleMatch } from './rules.js';
