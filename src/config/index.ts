/**
 * Configuration module.
 * Resolves runtime settings from CLI flags, config files, env and defaults.
 * Zod-validated; invalid settings surface as ConfigError.
 */

export { TIMEOUTS, LIMITS, BUDGET, MODELS, PATHS } from './defaults.js';
export {
  DEFAULT_SETTINGS,
  loadConfigFile,
  loadOptionalConfigFile,
  loadEnvSettings,
  resolveSettings,
} from './loader.js';
export type { SettingsLayer } from './loader.js';
export { MODEL_PRICING, pricingFor, tokenCost } from './pricing.js';
export type { ModelPricing } from './pricing.js';
