/**
 * @yield-guardian/ledger - Types for the yield ledger engine.
 *
 * These extend the shared @yield-guardian/types with structures used by
 * the ledger's operations.
 */

import type { Amount, SpendingModeName, YieldSource } from "@yield-guardian/types";

/** Accrual finer than this is skipped: 6 minutes. */
export const DEFAULT_ACCRUAL_THRESHOLD_MS = 6 * 60 * 1000;

/**
 * Starting state of a ledger.
 */
export interface YieldLedgerOptions {
  /** Protected capital */
  readonly principal: Amount;

  /** Accrued yield to start from. Default "0" */
  readonly accruedYield?: Amount | undefined;

  /** Spent-from-yield to start from. Default "0" */
  readonly spentFromYield?: Amount | undefined;

  /** Default "balanced" */
  readonly mode?: SpendingModeName | string | undefined;

  readonly sources?: readonly YieldSource[] | undefined;

  /** Instant accrual starts from. Default: now */
  readonly startedAt?: Date | undefined;

  /** Minimum elapsed time before accrual applies */
  readonly accrualThresholdMs?: number | undefined;
}

/**
 * Outcome of an accrue() call.
 */
export interface AccrualResult {
  /** False when the elapsed time was under the threshold */
  readonly applied: boolean;

  /** Yield added by this call ("0.000000" when skipped) */
  readonly delta: Amount;

  readonly elapsedMs: number;

  /** Lifetime accrued yield after this call */
  readonly accruedYield: Amount;
}

interface SpendDecisionBase {
  readonly amount: Amount;

  /** Available budget before the spend */
  readonly budget: Amount;

  /** Human-readable explanation */
  readonly message: string;
}

/**
 * Result of authorizeAndRecord(). The spend is recorded either way.
 */
export type SpendDecision =
  | (SpendDecisionBase & {
      readonly withinBudget: true;
      /** budget - amount */
      readonly remaining: Amount;
    })
  | (SpendDecisionBase & {
      readonly withinBudget: false;
      /** amount - budget */
      readonly overage: Amount;
    });

/**
 * Result of checkSpend(). Nothing is recorded.
 */
export type SpendCheck =
  | (SpendDecisionBase & {
      readonly withinBudget: true;
      readonly remaining: Amount;
    })
  | (SpendDecisionBase & {
      readonly withinBudget: false;
      readonly overage: Amount;
      /**
       * Days of yield needed to cover the shortfall, rounded up to a tenth.
       * Undefined when nothing is accruing.
       */
      readonly daysToAfford: number | undefined;
    });
