/**
 * Operator views derived from a published LedgerState.
 *
 * Amounts stay decimal strings; display lines use formatUsd.
 */

import {
  LEDGER_DECIMALS,
  SPENDING_MODES,
  formatAmount,
  formatUsd,
  parseAmount,
} from "@yield-guardian/ledger";
import type {
  Amount,
  LedgerState,
  SpendingModeName,
  YieldSourceView,
} from "@yield-guardian/types";
import { SPENDING_MODE_NAMES } from "@yield-guardian/types";

export interface StatusView {
  readonly principal: Amount;
  readonly accruedYield: Amount;
  readonly spentFromYield: Amount;
  readonly availableBudget: Amount;
  readonly mode: SpendingModeName;
  readonly retentionPercent: number;
  readonly totalDailyYield: Amount;
  readonly lastAccrualAt: string;
  /** Multi-line human summary */
  readonly summary: string;
}

export interface BudgetView {
  readonly accrued: Amount;
  readonly spent: Amount;
  readonly net: Amount;
  readonly mode: SpendingModeName;
  readonly retentionPercent: number;
  readonly available: Amount;
  /** net - available */
  readonly reserved: Amount;
  readonly projections: {
    readonly daily: Amount;
    readonly weekly: Amount;
    readonly monthly: Amount;
  };
}

export interface YieldView {
  readonly totalDailyYield: Amount;
  readonly sources: readonly YieldSourceView[];
}

export interface ModeView {
  readonly mode: SpendingModeName;
  readonly label: string;
  readonly retentionPercent: number;
  readonly availableBudget: Amount;
  readonly modes: readonly SpendingModeName[];
}

export function buildStatusView(state: LedgerState): StatusView {
  const mode = SPENDING_MODES[state.mode];
  const percent = state.retentionBps / 100;
  const summary = [
    "Yield Guardian Status",
    `Principal Protected: ${usd(state.principal)}`,
    `Yield Accrued: ${usd(state.accruedYield)}`,
    `Yield Spent: ${usd(state.spentFromYield)}`,
    `Available Budget: ${usd(state.availableBudget)}`,
    `Mode: ${mode.label} (${percent}%)`,
    `Daily Yield: ${usd(state.totalDailyYield)}/day`,
  ].join("\n");

  return {
    principal: state.principal,
    accruedYield: state.accruedYield,
    spentFromYield: state.spentFromYield,
    availableBudget: state.availableBudget,
    mode: state.mode,
    retentionPercent: percent,
    totalDailyYield: state.totalDailyYield,
    lastAccrualAt: state.lastAccrualAt,
    summary,
  };
}

export function buildBudgetView(state: LedgerState): BudgetView {
  const net = scaled(state.netYield);
  const available = scaled(state.availableBudget);
  const daily = scaled(state.totalDailyYield);

  return {
    accrued: state.accruedYield,
    spent: state.spentFromYield,
    net: state.netYield,
    mode: state.mode,
    retentionPercent: state.retentionBps / 100,
    available: state.availableBudget,
    reserved: amount(net - available),
    projections: {
      daily: amount(daily),
      weekly: amount(daily * 7n),
      monthly: amount(daily * 30n),
    },
  };
}

export function buildYieldView(state: LedgerState): YieldView {
  return {
    totalDailyYield: state.totalDailyYield,
    sources: state.sources,
  };
}

export function buildModeView(state: LedgerState): ModeView {
  const mode = SPENDING_MODES[state.mode];
  return {
    mode: mode.name,
    label: mode.label,
    retentionPercent: mode.retentionBps / 100,
    availableBudget: state.availableBudget,
    modes: SPENDING_MODE_NAMES,
  };
}

function scaled(value: Amount): bigint {
  return parseAmount(value, LEDGER_DECIMALS);
}

function amount(value: bigint): Amount {
  return formatAmount(value, LEDGER_DECIMALS);
}

function usd(value: Amount): string {
  return formatUsd(scaled(value), LEDGER_DECIMALS);
}
