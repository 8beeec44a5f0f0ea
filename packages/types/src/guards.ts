/**
 * Runtime Type Guards
 *
 * Narrowing functions for guardian domain types.
 * Used at system boundaries: records read back from disk, events handed
 * over by detectors and feeds.
 */

import type { SpendingModeName, YieldSource } from "./yield.js";
import type {
  TransferDirection,
  TransferEvent,
  TransactionRecord,
  TransactionStatus,
} from "./transfer.js";
import type { LedgerSnapshotRecord } from "./ledger.js";

// =============================================================================
// Yield guards
// =============================================================================

const MODE_NAMES = new Set<string>(["conservative", "balanced", "growth"]);

export function isSpendingModeName(value: unknown): value is SpendingModeName {
  return typeof value === "string" && MODE_NAMES.has(value);
}

export function isYieldSource(value: unknown): value is YieldSource {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.name === "string" &&
    typeof v.origin === "string" &&
    v.origin.length > 0 &&
    typeof v.principal === "string" &&
    typeof v.annualRatePercent === "string" &&
    typeof v.lastUpdated === "string" &&
    (v.protocolAddress === undefined || typeof v.protocolAddress === "string")
  );
}

// =============================================================================
// Transfer guards
// =============================================================================

const DIRECTIONS = new Set<string>(["in", "out"]);
const STATUSES = new Set<string>(["detected", "within_budget", "over_budget"]);

export function isTransferDirection(value: unknown): value is TransferDirection {
  return typeof value === "string" && DIRECTIONS.has(value);
}

export function isTransactionStatus(value: unknown): value is TransactionStatus {
  return typeof value === "string" && STATUSES.has(value);
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

export function isTransferEvent(value: unknown): value is TransferEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.timestamp === "string" &&
    typeof v.amount === "string" &&
    typeof v.asset === "string" &&
    isTransferDirection(v.direction) &&
    isOptionalString(v.counterparty) &&
    isOptionalString(v.category)
  );
}

export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (!isTransferEvent(value)) return false;
  return (
    "status" in value &&
    isTransactionStatus(value.status) &&
    "recordedAt" in value &&
    typeof value.recordedAt === "string"
  );
}

// =============================================================================
// Snapshot guards
// =============================================================================

export function isLedgerSnapshotRecord(value: unknown): value is LedgerSnapshotRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.timestamp === "string" &&
    typeof v.principal === "string" &&
    typeof v.accruedYield === "string" &&
    typeof v.spentFromYield === "string" &&
    isSpendingModeName(v.mode) &&
    typeof v.stateHash === "string"
  );
}
