/**
 * @yield-guardian/ledger - Yield-only spending ledger.
 *
 * Tracks principal, accrued yield and spending against yield, and decides
 * whether a spend fits the yield budget of the active spending mode.
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Accrued and spent totals never decrease
 * - Spends are recorded whether or not they fit the budget
 * - Invalid input throws before any state changes
 */

// Core engine
export { YieldLedger } from "./yield-ledger.js";
export { SerializedLedger, LedgerClosedError } from "./serialized-ledger.js";

// Sources
export { YieldSourceRegistry } from "./source-registry.js";
export {
  yieldWeight,
  dailyYield,
  hourlyYield,
  totalDailyYield,
  accrualOver,
  validateYieldSource,
  toSourceView,
} from "./yield-source.js";

// Spending modes
export type { SpendingMode } from "./spending-policy.js";
export {
  SPENDING_MODES,
  DEFAULT_SPENDING_MODE,
  resolveSpendingMode,
  applyRetention,
  retentionPercent,
} from "./spending-policy.js";

// Money math utilities
export {
  LEDGER_CURRENCY,
  LEDGER_DECIMALS,
  RATE_DECIMALS,
  parseAmount,
  parseNonNegativeAmount,
  formatAmount,
  rescale,
  formatUsd,
  formatUsdAmount,
} from "./money-math.js";

// Types
export type {
  YieldLedgerOptions,
  AccrualResult,
  SpendDecision,
  SpendCheck,
} from "./types.js";
export { DEFAULT_ACCRUAL_THRESHOLD_MS } from "./types.js";
