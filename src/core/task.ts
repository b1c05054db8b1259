import { taskSchema } from '../schema/index.js';
import type { Settings, Task } from '../schema/index.js';
import { ConfigError } from './errors.js';

/**
 * Validate a task. Throws ConfigError synchronously so configuration
 * faults reach the caller before a Run exists.
 */
export function parseTask(input: unknown): Task {
  const result = taskSchema.safeParse(input);
  if (!result.success) {
    throw ConfigError.fromZod('Invalid task', result.error);
  }
  return Object.freeze({
    ...result.data,
    config: Object.freeze({ ...result.data.config }),
  });
}

export function taskFromSettings(
  description: string,
  targetUrl: string,
  settings: Settings,
): Task {
  return parseTask({
    description,
    targetUrl,
    config: {
      headless: settings.headless,
      browserType: settings.browserType,
      timeoutMs: settings.defaultTimeoutMs,
      maxRepairAttempts: settings.maxRepairAttempts,
      autoHeal: settings.autoHeal,
    },
  });
}
