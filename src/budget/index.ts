/**
 * Budget module.
 * Per-run and daily spend ceilings, with durable daily spend.
 */

export { CostLedger, RunBudget, dayKey } from './ledger.js';
export type { BudgetLimits, Clock, LedgerSnapshot } from './ledger.js';
export { FileSpendStore, MemorySpendStore, SpendStoreError } from './store.js';
export type { DailySpendRecord, SpendStore } from './store.js';
