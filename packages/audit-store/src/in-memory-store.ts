/**
 * @yield-guardian/audit-store - In-memory AuditWriter.
 *
 * Same contract as JsonlAuditStore without persistence. Used in tests and
 * when no data directory is configured.
 */

import type { LedgerSnapshotRecord, LedgerState, TransactionRecord } from "@yield-guardian/types";
import { newestTransactions, normalizeLimit } from "./ordering.js";
import { buildSnapshotRecord } from "./snapshot-hash.js";
import type { AuditWriter, ListSnapshotsOptions, ListTransactionsOptions } from "./types.js";

export class InMemoryAuditStore implements AuditWriter {
  /** Insertion-ordered; an upsert keeps the original position */
  private readonly _transactions = new Map<string, TransactionRecord>();
  private readonly _snapshots: LedgerSnapshotRecord[] = [];

  upsertTransaction(record: TransactionRecord): void {
    this._transactions.set(record.id, record);
  }

  writeSnapshot(state: LedgerState, timestamp: Date): LedgerSnapshotRecord {
    const record = buildSnapshotRecord(state, timestamp);
    this._snapshots.push(record);
    return record;
  }

  listTransactions(options?: ListTransactionsOptions): readonly TransactionRecord[] {
    return newestTransactions([...this._transactions.values()], options);
  }

  getTransaction(id: string): TransactionRecord | undefined {
    return this._transactions.get(id);
  }

  transactionIds(): ReadonlySet<string> {
    return new Set(this._transactions.keys());
  }

  listSnapshots(options: ListSnapshotsOptions = {}): readonly LedgerSnapshotRecord[] {
    return [...this._snapshots].reverse().slice(0, normalizeLimit(options.limit));
  }

  latestSnapshot(): LedgerSnapshotRecord | undefined {
    return this._snapshots[this._snapshots.length - 1];
  }
}
