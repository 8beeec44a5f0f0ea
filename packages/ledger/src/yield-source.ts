/**
 * Per-source yield math.
 *
 * daily  = principal * (rate / 100) / 365
 * hourly = daily / 24
 *
 * Both are pure functions of the current source. Accrual over an interval
 * sums the exact products of every source and divides once, so the result
 * is truncated only at the final ledger precision.
 */

import { ValidationError } from "@yield-guardian/types";
import type { Amount, YieldSource, YieldSourceView } from "@yield-guardian/types";
import {
  LEDGER_DECIMALS,
  RATE_DECIMALS,
  formatAmount,
  parseNonNegativeAmount,
} from "./money-math.js";

const DAYS_PER_YEAR = 365n;
const HOURS_PER_DAY = 24n;
const MS_PER_YEAR = DAYS_PER_YEAR * HOURS_PER_DAY * 3_600_000n;

/** rate is percent (÷100) scaled by RATE_DECIMALS */
const RATE_DENOMINATOR = 100n * 10n ** BigInt(RATE_DECIMALS);

/**
 * principal (ledger scale) × rate (rate scale). The common numerator of
 * every yield figure for this source.
 */
export function yieldWeight(source: YieldSource): bigint {
  const principal = parseNonNegativeAmount(source.principal, LEDGER_DECIMALS, "Principal");
  const rate = parseNonNegativeAmount(source.annualRatePercent, RATE_DECIMALS, "Annual rate");
  return principal * rate;
}

export function dailyYield(source: YieldSource): bigint {
  return yieldWeight(source) / (RATE_DENOMINATOR * DAYS_PER_YEAR);
}

export function hourlyYield(source: YieldSource): bigint {
  return yieldWeight(source) / (RATE_DENOMINATOR * DAYS_PER_YEAR * HOURS_PER_DAY);
}

/**
 * Sum of daily yields across sources, computed from the exact weights.
 */
export function totalDailyYield(sources: readonly YieldSource[]): bigint {
  let weight = 0n;
  for (const source of sources) {
    weight += yieldWeight(source);
  }
  return weight / (RATE_DENOMINATOR * DAYS_PER_YEAR);
}

/**
 * Yield produced by all sources over `elapsedMs` milliseconds, at ledger
 * precision. Equals sum(hourly) × hours before truncation.
 */
export function accrualOver(sources: readonly YieldSource[], elapsedMs: number): bigint {
  if (!Number.isInteger(elapsedMs) || elapsedMs <= 0) {
    return 0n;
  }
  let weight = 0n;
  for (const source of sources) {
    weight += yieldWeight(source);
  }
  return (weight * BigInt(elapsedMs)) / (RATE_DENOMINATOR * MS_PER_YEAR);
}

/**
 * Check a source before it enters the registry.
 */
export function validateYieldSource(source: YieldSource): void {
  if (source.name.trim() === "") {
    throw new ValidationError("Yield source name must not be empty");
  }
  if (source.origin.trim() === "") {
    throw new ValidationError(`Yield source '${source.name}' has an empty origin`);
  }
  parseNonNegativeAmount(source.principal, LEDGER_DECIMALS, `Principal of '${source.name}'`);
  parseNonNegativeAmount(source.annualRatePercent, RATE_DECIMALS, `Annual rate of '${source.name}'`);
  if (Number.isNaN(Date.parse(source.lastUpdated))) {
    throw new ValidationError(
      `Yield source '${source.name}' has an invalid lastUpdated timestamp`,
    );
  }
}

export function toSourceView(source: YieldSource): YieldSourceView {
  const daily: Amount = formatAmount(dailyYield(source), LEDGER_DECIMALS);
  const hourly: Amount = formatAmount(hourlyYield(source), LEDGER_DECIMALS);
  return { ...source, dailyYield: daily, hourlyYield: hourly };
}
