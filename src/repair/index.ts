/**
 * Repair planning module.
 * Pure decision policy: retry with a repair hint, or stop with a reason.
 */

export { planRepair, buildRepairHint, DEFAULT_REPAIR_POLICY } from './planner.js';
export type {
  RepairDecision,
  RepairPolicy,
  RepairConfig,
  RepairStopReason,
} from './planner.js';
