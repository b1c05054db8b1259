import type { ErrorCategory, Step } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';

/**
 * Deterministic repairs that need no model call. Returns the patched steps,
 * or null when no rule applies or the patch would not change the script.
 *
 * `budgetMs` is the time the sandbox allows the whole script; no step is
 * given a timeout past it.
 */
export function applyQuickFix(
  steps: readonly Step[],
  category: ErrorCategory,
  budgetMs: number = TIMEOUTS.QUICK_FIX_TIMEOUT,
): Step[] | null {
  let changed = false;
  let patched: Step[];

  switch (category) {
    case 'timeout': {
      const target = Math.min(TIMEOUTS.QUICK_FIX_TIMEOUT, budgetMs);
      patched = steps.map((step) => {
        if ((step.timeout ?? 0) >= target) return step;
        changed = true;
        return { ...step, timeout: target };
      });
      break;
    }
    case 'navigation_failure': {
      const target = Math.min(TIMEOUTS.NAVIGATION_TIMEOUT, budgetMs);
      patched = steps.map((step) => {
        if (step.timeout !== undefined) return step;
        changed = true;
        return { ...step, timeout: target };
      });
      break;
    }
    default:
      return null;
  }

  return changed ? patched : null;
}
