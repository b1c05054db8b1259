import type { DailySpendRecord, SpendStore } from './store.js';
import * as log from '../utils/logger.js';

// ── Public types ─────────────────────────────────────────────

export interface BudgetLimits {
  maxCostPerRun: number;
  dailyBudget: number;
}

export type Clock = () => Date;

export interface LedgerSnapshot {
  day: string;
  dailySpend: number;
  pending: number;
  dailyBudget: number;
  remaining: number;
}

// Absorbs float noise such as 0.1 + 0.2 > 0.3.
const EPSILON = 1e-9;

/** Daily boundary is UTC midnight. */
export function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function assertCost(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative finite number, got ${String(value)}`);
  }
}

// ── Process-wide ledger ──────────────────────────────────────

/**
 * Daily spend shared by every Run in the process.
 *
 * Reservations are checked and taken synchronously, so concurrent Runs
 * cannot interleave between the check and the increment. Every commit is
 * queued for persistence; `flush()` waits for the queue and surfaces the
 * last write failure.
 */
export class CostLedger {
  private readonly history: DailySpendRecord;
  private day: string;
  private pending = 0;
  private persistQueue: Promise<void> = Promise.resolve();
  private persistError: unknown = null;

  private constructor(
    private readonly store: SpendStore,
    readonly limits: BudgetLimits,
    private readonly clock: Clock,
    history: DailySpendRecord,
  ) {
    this.history = history;
    this.day = dayKey(clock());
  }

  static async open(
    store: SpendStore,
    limits: BudgetLimits,
    clock: Clock = () => new Date(),
  ): Promise<CostLedger> {
    assertCost(limits.maxCostPerRun, 'maxCostPerRun');
    assertCost(limits.dailyBudget, 'dailyBudget');
    const history = await store.load();
    return new CostLedger(store, limits, clock, history);
  }

  /** Start a per-run budget scoped to one Run's lifetime. */
  openRun(maxCostPerRun: number = this.limits.maxCostPerRun): RunBudget {
    assertCost(maxCostPerRun, 'maxCostPerRun');
    return new RunBudget(this, maxCostPerRun);
  }

  snapshot(): LedgerSnapshot {
    this.rollover();
    const dailySpend = this.history[this.day] ?? 0;
    return {
      day: this.day,
      dailySpend,
      pending: this.pending,
      dailyBudget: this.limits.dailyBudget,
      remaining: Math.max(0, this.limits.dailyBudget - dailySpend - this.pending),
    };
  }

  /** Wait for queued writes; rethrows the most recent write failure. */
  async flush(): Promise<void> {
    await this.persistQueue;
    if (this.persistError !== null) {
      const err = this.persistError;
      this.persistError = null;
      throw err;
    }
  }

  // ── Used by RunBudget ──────────────────────────────────────

  tryReserve(estimate: number): boolean {
    this.rollover();
    const spent = this.history[this.day] ?? 0;
    if (spent + this.pending + estimate > this.limits.dailyBudget + EPSILON) {
      return false;
    }
    this.pending += estimate;
    return true;
  }

  commit(reserved: number, actual: number): void {
    this.rollover();
    this.pending = Math.max(0, this.pending - reserved);
    this.history[this.day] = (this.history[this.day] ?? 0) + actual;
    this.persist();
  }

  release(reserved: number): void {
    this.pending = Math.max(0, this.pending - reserved);
  }

  // ── Internals ──────────────────────────────────────────────

  private rollover(): void {
    const today = dayKey(this.clock());
    if (today !== this.day) {
      log.detail(`Daily budget window rolled over: ${this.day} → ${today}`);
      this.day = today;
    }
  }

  private persist(): void {
    const record = { ...this.history };
    this.persistQueue = this.persistQueue.then(
      () => this.store.save(record),
    ).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`Could not persist daily spend: ${message}`);
      this.persistError = err;
    });
  }
}

// ── Per-run budget ───────────────────────────────────────────

/**
 * Spend of a single Run. Holds at most one outstanding reservation per
 * attempt: `record` draws real spend down from it, `release` returns the
 * unused remainder to the daily pool and closes it.
 */
export class RunBudget {
  private spent = 0;
  private reservation: number | null = null;

  constructor(
    private readonly ledger: CostLedger,
    readonly ceiling: number,
  ) {}

  get spend(): number {
    return this.spent;
  }

  get hasReservation(): boolean {
    return this.reservation !== null;
  }

  /** Unused part of the open reservation, 0 when none is open. */
  get reserved(): number {
    return this.reservation ?? 0;
  }

  reserve(estimate: number): boolean {
    assertCost(estimate, 'estimate');
    if (this.reservation !== null) {
      throw new Error('RunBudget already holds an outstanding reservation');
    }
    if (this.spent + estimate > this.ceiling + EPSILON) return false;
    if (!this.ledger.tryReserve(estimate)) return false;

    this.reservation = estimate;
    return true;
  }

  /**
   * Commit real spend. The part covered by the open reservation moves from
   * pending to spent; the reservation stays open with what is left.
   */
  record(actual: number): void {
    assertCost(actual, 'actual cost');
    const covered = Math.min(this.reservation ?? 0, actual);
    this.ledger.commit(covered, actual);
    if (this.reservation !== null) this.reservation -= covered;
    this.spent += actual;
  }

  release(): void {
    if (this.reservation === null) return;
    this.ledger.release(this.reservation);
    this.reservation = null;
  }
}
