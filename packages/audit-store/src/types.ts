/**
 * @yield-guardian/audit-store - Core types.
 *
 * The audit trail has two logs:
 * - Transaction records, one per transfer id (upserts replace by id)
 * - Ledger snapshot rows (append-only, ordered by timestamp)
 *
 * Stores are synchronous: a write returns once it is durable or throws
 * StorageWriteError. Retrying is the caller's concern.
 */

import type {
  LedgerSnapshotRecord,
  LedgerState,
  TransactionRecord,
  TransferDirection,
} from "@yield-guardian/types";

// =============================================================================
// Query Options
// =============================================================================

/**
 * Options for listing transactions.
 */
export interface ListTransactionsOptions {
  /** Maximum number of records to return. Default: 10 */
  readonly limit?: number | undefined;

  /** Only records moving in this direction */
  readonly direction?: TransferDirection | undefined;
}

/**
 * Options for listing snapshots.
 */
export interface ListSnapshotsOptions {
  /** Maximum number of rows to return, newest first. Default: 10 */
  readonly limit?: number | undefined;
}

export const DEFAULT_LIST_LIMIT = 10;

// =============================================================================
// Audit Writer Interface
// =============================================================================

/**
 * Persistence boundary of the guardian.
 */
export interface AuditWriter {
  /**
   * Insert or replace the record with the same id.
   *
   * @throws StorageWriteError
   */
  upsertTransaction(record: TransactionRecord): void;

  /**
   * Append a snapshot row built from `state` at `timestamp`.
   *
   * @returns The row as persisted, including its stateHash
   * @throws StorageWriteError
   */
  writeSnapshot(state: LedgerState, timestamp: Date): LedgerSnapshotRecord;

  /**
   * Transactions ordered newest first (by timestamp, then insertion).
   */
  listTransactions(options?: ListTransactionsOptions): readonly TransactionRecord[];

  getTransaction(id: string): TransactionRecord | undefined;

  /** Every transaction id that has been persisted. */
  transactionIds(): ReadonlySet<string>;

  /** Snapshot rows ordered newest first. */
  listSnapshots(options?: ListSnapshotsOptions): readonly LedgerSnapshotRecord[];

  /** Most recent snapshot row, or undefined when none exists. */
  latestSnapshot(): LedgerSnapshotRecord | undefined;
}
