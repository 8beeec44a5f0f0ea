/**
 * Ledger State Types
 *
 * The published view of the yield ledger and the persisted snapshot row.
 */

import type { Amount, Currency } from "./financial.js";
import type { SpendingModeName, YieldSourceView } from "./yield.js";

/**
 * Immutable view of the ledger at one instant.
 */
export interface LedgerState {
  readonly currency: Currency;
  readonly decimals: number;

  /** Protected capital (informational) */
  readonly principal: Amount;

  /** Lifetime accrued yield */
  readonly accruedYield: Amount;

  /** Lifetime amount recorded as spent */
  readonly spentFromYield: Amount;

  /** accruedYield - spentFromYield */
  readonly netYield: Amount;

  readonly mode: SpendingModeName;

  /** Retention fraction of the mode, in basis points */
  readonly retentionBps: number;

  /** netYield * retention; negative when spending outpaced accrual */
  readonly availableBudget: Amount;

  readonly totalDailyYield: Amount;

  readonly sources: readonly YieldSourceView[];

  /** ISO 8601 instant up to which accrual has been applied */
  readonly lastAccrualAt: string;
}

/**
 * One persisted snapshot row. Append-only, ordered by timestamp.
 */
export interface LedgerSnapshotRecord {
  readonly timestamp: string;
  readonly principal: Amount;
  readonly accruedYield: Amount;
  readonly spentFromYield: Amount;
  readonly mode: SpendingModeName;

  /** SHA-256 of the canonical JSON of the fields above */
  readonly stateHash: string;
}
