/**
 * @yield-guardian/audit-store - File-based JSONL AuditWriter.
 *
 * Two files in one data directory:
 * - transactions.jsonl: one TransactionRecord per line; an upsert appends
 *   a new line and the last line per id wins on load
 * - snapshots.jsonl: one LedgerSnapshotRecord per line, append-only
 *
 * Crash safety:
 * - Each write flushes to disk via fsync before returning
 * - Partial writes (torn lines) and rows that fail validation are skipped
 *   on load
 * - The files are the source of truth; in-memory state is derived
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  mkdirSync,
} from "node:fs";
import { join } from "node:path";
import {
  StorageWriteError,
  isLedgerSnapshotRecord,
  isTransactionRecord,
} from "@yield-guardian/types";
import type { LedgerSnapshotRecord, LedgerState, TransactionRecord } from "@yield-guardian/types";
import { newestTransactions, normalizeLimit } from "./ordering.js";
import { buildSnapshotRecord } from "./snapshot-hash.js";
import type { AuditWriter, ListSnapshotsOptions, ListTransactionsOptions } from "./types.js";

export const TRANSACTIONS_FILE = "transactions.jsonl";
export const SNAPSHOTS_FILE = "snapshots.jsonl";

/**
 * Options for creating a JsonlAuditStore.
 */
export interface JsonlAuditStoreOptions {
  /** Directory holding both files. Created if missing. */
  readonly dataDir: string;
}

/**
 * Lines skipped while loading, by file.
 */
export interface LoadReport {
  readonly transactionsSkipped: number;
  readonly snapshotsSkipped: number;
}

export class JsonlAuditStore implements AuditWriter {
  private readonly _transactionsPath: string;
  private readonly _snapshotsPath: string;

  /** Rebuilt from file on load; insertion order of first appearance */
  private readonly _transactions = new Map<string, TransactionRecord>();
  private readonly _snapshots: LedgerSnapshotRecord[] = [];
  private readonly _loadReport: LoadReport;

  /**
   * Create a new JsonlAuditStore.
   *
   * Existing files are loaded; missing ones are created on first write.
   */
  constructor(options: JsonlAuditStoreOptions) {
    this._transactionsPath = join(options.dataDir, TRANSACTIONS_FILE);
    this._snapshotsPath = join(options.dataDir, SNAPSHOTS_FILE);

    try {
      mkdirSync(options.dataDir, { recursive: true });
    } catch (err) {
      throw new StorageWriteError(`Cannot create data directory ${options.dataDir}`, { cause: err });
    }

    const transactionsSkipped = this._load(this._transactionsPath, (value) => {
      if (!isTransactionRecord(value)) return false;
      this._transactions.set(value.id, value);
      return true;
    });
    const snapshotsSkipped = this._load(this._snapshotsPath, (value) => {
      if (!isLedgerSnapshotRecord(value)) return false;
      this._snapshots.push(value);
      return true;
    });
    this._loadReport = { transactionsSkipped, snapshotsSkipped };
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  upsertTransaction(record: TransactionRecord): void {
    this._writeAndSync(this._transactionsPath, JSON.stringify(record) + "\n");

    // Update in-memory state only after successful write
    this._transactions.set(record.id, record);
  }

  writeSnapshot(state: LedgerState, timestamp: Date): LedgerSnapshotRecord {
    const record = buildSnapshotRecord(state, timestamp);
    this._writeAndSync(this._snapshotsPath, JSON.stringify(record) + "\n");
    this._snapshots.push(record);
    return record;
  }

  // ─── Reads ──────────────────────────────────────────────────────────

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

  // ─── Diagnostics ────────────────────────────────────────────────────

  get loadReport(): LoadReport {
    return this._loadReport;
  }

  get transactionsPath(): string {
    return this._transactionsPath;
  }

  get snapshotsPath(): string {
    return this._snapshotsPath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Feed every parseable line to `accept`.
   *
   * @returns Number of lines skipped (corrupt JSON or rejected rows)
   */
  private _load(filePath: string, accept: (value: unknown) => boolean): number {
    if (!existsSync(filePath)) {
      return 0;
    }

    let skipped = 0;
    const content = readFileSync(filePath, "utf-8");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let value: unknown;
      try {
        value = JSON.parse(trimmed);
      } catch {
        // Corrupt/partial line (unclean shutdown)
        skipped++;
        continue;
      }

      if (!accept(value)) {
        skipped++;
      }
    }

    return skipped;
  }

  private _writeAndSync(filePath: string, data: string): void {
    let fd: number;
    try {
      fd = openSync(filePath, "a");
    } catch (err) {
      throw new StorageWriteError(`Cannot open ${filePath} for append`, { cause: err });
    }
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } catch (err) {
      throw new StorageWriteError(`Failed to write ${filePath}`, { cause: err });
    } finally {
      closeSync(fd);
    }
  }
}
