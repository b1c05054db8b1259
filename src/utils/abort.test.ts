import { describe, expect, it } from 'vitest';

import { AbortedError } from '../core/errors.js';
import { linkSignals, raceAbort } from './abort.js';

describe('linkSignals', () => {
  it('aborts when any source aborts, carrying its reason', () => {
    const a = new AbortController();
    const b = new AbortController();
    const linked = linkSignals(a.signal, b.signal);

    expect(linked.signal.aborted).toBe(false);
    b.abort('deadline');

    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBe('deadline');
  });

  it('starts aborted when a source already is', () => {
    const a = new AbortController();
    a.abort('early');

    const linked = linkSignals(new AbortController().signal, a.signal);

    expect(linked.signal.aborted).toBe(true);
    expect(linked.signal.reason).toBe('early');
  });

  it('stops following the sources once disposed', () => {
    const a = new AbortController();
    const linked = linkSignals(a.signal);

    linked.dispose();
    a.abort();

    expect(linked.signal.aborted).toBe(false);
  });
});

describe('raceAbort', () => {
  it('resolves with the promise when the signal stays quiet', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve(42), controller.signal)).resolves.toBe(42);
  });

  it('passes through a rejection', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.reject(new Error('boom')), controller.signal)).rejects.toThrow('boom');
  });

  it('rejects with AbortedError when the signal aborts first', async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<number>(() => undefined), controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(AbortedError);
  });

  it('rejects immediately for an already-aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(raceAbort(new Promise<number>(() => undefined), controller.signal)).rejects.toThrow(
      'Operation aborted',
    );
  });
});
