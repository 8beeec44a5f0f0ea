import type { LedgerState, TransactionRecord } from "@yield-guardian/types";

export function makeState(overrides: Partial<LedgerState> = {}): LedgerState {
  return {
    currency: "USD",
    decimals: 6,
    principal: "10000.000000",
    accruedYield: "100.000000",
    spentFromYield: "50.000000",
    netYield: "50.000000",
    mode: "balanced",
    retentionBps: 8000,
    availableBudget: "40.000000",
    totalDailyYield: "1.095890",
    sources: [],
    lastAccrualAt: "2026-03-01T00:00:00.000Z",
    ...overrides,
  };
}

export function makeRecord(
  id: string,
  overrides: Partial<TransactionRecord> = {},
): TransactionRecord {
  return {
    id,
    timestamp: "2026-03-01T12:00:00.000Z",
    amount: "25.000000",
    asset: "USDC",
    direction: "out",
    counterparty: "0x000000000000000000000000000000000000dEaD",
    status: "within_budget",
    recordedAt: "2026-03-01T12:00:05.000Z",
    ...overrides,
  };
}
