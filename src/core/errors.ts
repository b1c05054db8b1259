import type { ZodError } from 'zod';

// ── Configuration faults ─────────────────────────────────────

/**
 * Invalid task or configuration. Raised before a Run exists and before
 * any cost is incurred; never captured into attempt history.
 */
export class ConfigError extends Error {
  readonly exitCode = 4;
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }

  static fromZod(context: string, error: ZodError): ConfigError {
    const issues = error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    return new ConfigError(context, issues);
  }
}

// ── Internal invariant violations ────────────────────────────

export class StateTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal state transition: ${from} → ${to}`);
    this.name = 'StateTransitionError';
  }
}

// ── Cancellation ─────────────────────────────────────────────

export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortedError';
  }
}

/**
 * Spend an adapter had already incurred when it failed, read from a
 * numeric `cost` on the thrown error. 0 when there is none.
 */
export function billedCost(err: unknown): number {
  if (err instanceof Error && 'cost' in err && typeof err.cost === 'number') {
    return Number.isFinite(err.cost) && err.cost > 0 ? err.cost : 0;
  }
  return 0;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
