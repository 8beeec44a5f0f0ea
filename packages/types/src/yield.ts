/**
 * Yield Types
 *
 * Yield-bearing positions and the spending policy that decides how much
 * of the net yield is exposed as spendable.
 */

import type { Amount } from "./financial.js";

/**
 * Which refresh feed a source belongs to.
 *
 * "manual" sources come from configuration; protocol feeds use their own
 * tag (e.g. "aave_v3"). Replacement is always scoped to one origin.
 */
export type YieldOrigin = string;

/**
 * A yield-bearing position.
 */
export interface YieldSource {
  /** Human label, e.g. "Aave V3 USDC" */
  readonly name: string;

  readonly origin: YieldOrigin;

  /** Capital deployed at this source, in ledger currency */
  readonly principal: Amount;

  /** Annualized rate in percent, e.g. "4.0" */
  readonly annualRatePercent: Amount;

  /** ISO 8601 timestamp of the last principal/rate refresh */
  readonly lastUpdated: string;

  /** Protocol contract the position lives in, when known */
  readonly protocolAddress?: string | undefined;
}

/**
 * A source together with its derived per-period yield.
 */
export interface YieldSourceView extends YieldSource {
  readonly dailyYield: Amount;
  readonly hourlyYield: Amount;
}

/** Closed set of spending modes. */
export type SpendingModeName = "conservative" | "balanced" | "growth";

export const SPENDING_MODE_NAMES: readonly SpendingModeName[] = [
  "conservative",
  "balanced",
  "growth",
] as const;
