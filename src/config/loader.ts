import { access, readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema, settingsSchema } from '../schema/config.js';
import type { FileConfig, Settings } from '../schema/config.js';
import { ConfigError } from '../core/errors.js';
import { BUDGET, LIMITS, MODELS, PATHS, TIMEOUTS } from './defaults.js';

// ── Layer shape ──────────────────────────────────────────────
// Layers are unvalidated: env strings and CLI flags are only checked once
// all layers are merged.

export type SettingsLayer = { [K in keyof Settings]?: unknown };

export const DEFAULT_SETTINGS: Settings = {
  provider: 'openrouter',
  defaultModel: MODELS.DEFAULT,
  fallbackModel: MODELS.FALLBACK,
  headless: false,
  browserType: 'chromium',
  defaultTimeoutMs: TIMEOUTS.DEFAULT_TIMEOUT,
  maxRepairAttempts: LIMITS.MAX_REPAIR_ATTEMPTS,
  autoHeal: true,
  maxCostPerRun: BUDGET.MAX_COST_PER_RUN,
  dailyBudget: BUDGET.DAILY_BUDGET,
  estimatedAttemptCost: BUDGET.ESTIMATED_ATTEMPT_COST,
  runTimeoutMs: TIMEOUTS.TOTAL_RUN_TIMEOUT,
  artifactsDir: PATHS.ARTIFACTS_DIR,
  recordVideo: false,
};

// ── Config file ──────────────────────────────────────────────

/**
 * Load and validate a `.healwright.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is unreadable or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config file ${configPath}`, [message]);
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot parse config file ${configPath}`, [message]);
  }

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw ConfigError.fromZod(`Invalid config file ${configPath}`, result.error);
  }
  return result.data;
}

/** Like `loadConfigFile`, but a missing file yields an empty config. */
export async function loadOptionalConfigFile(
  configPath: string,
): Promise<FileConfig> {
  try {
    await access(configPath);
  } catch {
    return {};
  }
  return loadConfigFile(configPath);
}

// ── Environment ──────────────────────────────────────────────

export function loadEnvSettings(
  env: NodeJS.ProcessEnv = process.env,
): SettingsLayer {
  return {
    provider: env['LLM_PROVIDER'],
    defaultModel: env['DEFAULT_MODEL'],
    fallbackModel: env['FALLBACK_MODEL'],
    headless: envBoolean(env['HEADLESS']),
    browserType: env['BROWSER_TYPE'],
    defaultTimeoutMs: envNumber(env['DEFAULT_TIMEOUT']),
    maxRepairAttempts: envNumber(env['MAX_REPAIR_ATTEMPTS']),
    autoHeal: envBoolean(env['AUTO_HEAL']),
    maxCostPerRun: envNumber(env['MAX_COST_PER_RUN']),
    dailyBudget: envNumber(env['DAILY_BUDGET']),
    artifactsDir: env['HEALWRIGHT_ARTIFACTS_DIR'],
  };
}

function envBoolean(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  // Left as a string so validation reports it.
  return value;
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

// ── Merge + validate ─────────────────────────────────────────

/**
 * Merge layers (highest precedence first) over the defaults and validate.
 * Undefined values never override a lower layer.
 */
export function resolveSettings(...layers: readonly SettingsLayer[]): Settings {
  const merged: Record<string, unknown> = { ...DEFAULT_SETTINGS };

  for (const layer of [...layers].reverse()) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  const result = settingsSchema.safeParse(merged);
  if (!result.success) {
    throw ConfigError.fromZod('Invalid configuration', result.error);
  }
  return result.data;
}
