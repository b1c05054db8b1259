import { mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import writeFileAtomic from 'write-file-atomic';
import { z } from 'zod';

// ── Public types ─────────────────────────────────────────────

/** Spend per UTC calendar day, keyed `YYYY-MM-DD`. */
export type DailySpendRecord = Record<string, number>;

export interface SpendStore {
  load(): Promise<DailySpendRecord>;
  save(record: DailySpendRecord): Promise<void>;
}

const dailySpendRecordSchema = z.record(
  z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  z.number().nonnegative(),
);

// ── File store ───────────────────────────────────────────────

export class SpendStoreError extends Error {
  constructor(filePath: string, reason: string) {
    super(`Spend ledger ${filePath} is unreadable: ${reason}`);
    this.name = 'SpendStoreError';
  }
}

/**
 * JSON file store. Writes go through write-file-atomic so a crash
 * mid-write never leaves a truncated ledger behind.
 */
export class FileSpendStore implements SpendStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<DailySpendRecord> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return {};
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SpendStoreError(this.filePath, message);
    }

    const result = dailySpendRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new SpendStoreError(this.filePath, result.error.message);
    }
    return result.data;
  }

  async save(record: DailySpendRecord): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFileAtomic(this.filePath, JSON.stringify(record, null, 2) + '\n', {
      encoding: 'utf8',
    });
  }
}

function isNotFound(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}

// ── In-memory store ──────────────────────────────────────────

export class MemorySpendStore implements SpendStore {
  private record: DailySpendRecord;
  saveCount = 0;

  constructor(initial: DailySpendRecord = {}) {
    this.record = { ...initial };
  }

  async load(): Promise<DailySpendRecord> {
    return { ...this.record };
  }

  async save(record: DailySpendRecord): Promise<void> {
    this.record = { ...record };
    this.saveCount++;
  }

  get current(): DailySpendRecord {
    return { ...this.record };
  }
}
