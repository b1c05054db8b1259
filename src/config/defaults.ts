/**
 * Default configuration values.
 * All values are overridable via env, config file or CLI flags.
 */

export const TIMEOUTS = {
  DEFAULT_TIMEOUT: 30_000,
  NAVIGATION_TIMEOUT: 15_000,
  ACTION_TIMEOUT: 8_000,
  TOTAL_RUN_TIMEOUT: 600_000,
  // Extra time the sandbox gets past the task timeout before the
  // orchestrator gives up on it.
  SANDBOX_GRACE: 5_000,
  QUICK_FIX_TIMEOUT: 60_000,
  MAX_STEP_TIMEOUT: 120_000,
} as const;

export const LIMITS = {
  MAX_STEPS: 20,
  MAX_REPAIR_ATTEMPTS: 3,
  MAX_LLM_RETRIES: 3,
  MAX_LOG_LINES: 50,
  MAX_EVIDENCE_LINES: 5,
} as const;

export const BUDGET = {
  MAX_COST_PER_RUN: 0.5,
  DAILY_BUDGET: 5.0,
  ESTIMATED_ATTEMPT_COST: 0.02,
} as const;

export const MODELS = {
  DEFAULT: 'anthropic/claude-3.5-haiku',
  FALLBACK: 'openai/gpt-4o-mini',
} as const;

export const PATHS = {
  ARTIFACTS_DIR: '.artifacts',
  CONFIG_FILE: '.healwright.yaml',
  DAILY_COSTS_FILE: 'daily_costs.json',
} as const;
