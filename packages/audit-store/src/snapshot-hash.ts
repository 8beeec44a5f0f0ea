/**
 * @yield-guardian/audit-store - Snapshot hashing.
 *
 * A snapshot row carries the SHA-256 of the canonical JSON (RFC 8785) of
 * its other fields, so a tampered or half-written row is detectable.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { LedgerSnapshotRecord, LedgerState } from "@yield-guardian/types";

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a value.
 */
export function computeSnapshotHash(state: unknown): string {
  const canonical = canonicalize(state);
  return createHash("sha256").update(canonical).digest("hex");
}

type SnapshotBody = Omit<LedgerSnapshotRecord, "stateHash">;

function bodyOf(record: SnapshotBody): SnapshotBody {
  return {
    timestamp: record.timestamp,
    principal: record.principal,
    accruedYield: record.accruedYield,
    spentFromYield: record.spentFromYield,
    mode: record.mode,
  };
}

/**
 * Build the persisted snapshot row for a ledger state.
 */
export function buildSnapshotRecord(state: LedgerState, timestamp: Date): LedgerSnapshotRecord {
  const body = bodyOf({
    timestamp: timestamp.toISOString(),
    principal: state.principal,
    accruedYield: state.accruedYield,
    spentFromYield: state.spentFromYield,
    mode: state.mode,
  });
  return { ...body, stateHash: computeSnapshotHash(body) };
}

/**
 * Verify that a snapshot row's stateHash matches its fields.
 *
 * @returns true if the hash is valid, false if tampered or missing
 */
export function verifySnapshotIntegrity(record: LedgerSnapshotRecord): boolean {
  if (record.stateHash === "") {
    return false;
  }
  return record.stateHash === computeSnapshotHash(bodyOf(record));
}
