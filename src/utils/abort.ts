import { AbortedError } from '../core/errors.js';

// ── Signal plumbing ──────────────────────────────────────────

export interface LinkedSignal {
  readonly signal: AbortSignal;
  dispose(): void;
}

/** A signal that aborts as soon as any of `signals` does. */
export function linkSignals(...signals: readonly AbortSignal[]): LinkedSignal {
  const controller = new AbortController();
  const listeners: Array<[AbortSignal, () => void]> = [];

  for (const source of signals) {
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = (): void => controller.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    listeners.push([source, onAbort]);
  }

  return {
    signal: controller.signal,
    dispose(): void {
      for (const [source, onAbort] of listeners) {
        source.removeEventListener('abort', onAbort);
      }
    },
  };
}

/**
 * Settle with `promise`, or reject with AbortedError as soon as `signal`
 * aborts. The underlying work is not awaited after an abort.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new AbortedError());

    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
