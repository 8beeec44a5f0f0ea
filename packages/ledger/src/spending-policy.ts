/**
 * Spending Policy - the closed table of spending modes.
 *
 * Each mode carries the retention fraction: the share of net yield that is
 * currently exposed as spendable. Fractions are held in basis points so the
 * budget stays in integer arithmetic.
 */

import { UnknownModeError } from "@yield-guardian/types";
import type { SpendingModeName } from "@yield-guardian/types";

export interface SpendingMode {
  readonly name: SpendingModeName;

  /** Spendable share of net yield, in basis points (0, 10000] */
  readonly retentionBps: number;

  /** Display name */
  readonly label: string;
}

const BPS_DENOMINATOR = 10_000n;

export const SPENDING_MODES: Readonly<Record<SpendingModeName, SpendingMode>> = {
  conservative: { name: "conservative", retentionBps: 5_000, label: "Conservative" },
  balanced: { name: "balanced", retentionBps: 8_000, label: "Balanced" },
  growth: { name: "growth", retentionBps: 3_000, label: "Growth" },
} as const;

export const DEFAULT_SPENDING_MODE: SpendingModeName = "balanced";

/**
 * Look up a mode by name (case-insensitive, surrounding whitespace ignored).
 *
 * @throws UnknownModeError for anything outside the closed set
 */
export function resolveSpendingMode(name: string): SpendingMode {
  const key = name.trim().toLowerCase();
  switch (key) {
    case "conservative":
    case "balanced":
    case "growth":
      return SPENDING_MODES[key];
    default:
      throw new UnknownModeError(name);
  }
}

/**
 * Project a net yield figure through the mode's retention fraction.
 * Truncates toward zero, so a negative net yields a negative budget.
 */
export function applyRetention(netYield: bigint, mode: SpendingMode): bigint {
  return (netYield * BigInt(mode.retentionBps)) / BPS_DENOMINATOR;
}

/**
 * Retention as a whole percentage, e.g. 80 for balanced.
 */
export function retentionPercent(mode: SpendingMode): number {
  return mode.retentionBps / 100;
}
