/**
 * ResilientAuditWriter - retries audit writes with backoff.
 *
 * Reads go straight to the underlying store. Writes are retried while the
 * failure is transient; when attempts run out the caller gets a
 * StorageWriteError carrying the last failure. Each retry is logged at
 * warn with the attempt number and delay.
 */

import type {
  AuditWriter,
  ListSnapshotsOptions,
  ListTransactionsOptions,
} from "@yield-guardian/audit-store";
import type {
  LedgerSnapshotRecord,
  LedgerState,
  TransactionRecord,
} from "@yield-guardian/types";
import { StorageWriteError, isRetryableError } from "@yield-guardian/types";
import type { Logger } from "../logger.js";
import {
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
  sleep,
  withRetry,
  type RetryConfig,
} from "../retry.js";

export interface ResilientAuditWriterOptions {
  readonly store: AuditWriter;
  readonly retry?: RetryConfig;
  readonly sleepFn?: (ms: number) => Promise<void>;
  readonly logger?: Logger;
}

export class ResilientAuditWriter {
  private readonly store: AuditWriter;
  private readonly retry: RetryConfig;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly logger: Logger | undefined;

  constructor(options: ResilientAuditWriterOptions) {
    this.store = options.store;
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
    this.sleepFn = options.sleepFn ?? sleep;
    this.logger = options.logger;
  }

  upsertTransaction(record: TransactionRecord): Promise<void> {
    return this.write(`transaction ${record.id}`, () => this.store.upsertTransaction(record));
  }

  writeSnapshot(state: LedgerState, timestamp: Date): Promise<LedgerSnapshotRecord> {
    return this.write("snapshot", () => this.store.writeSnapshot(state, timestamp));
  }

  listTransactions(options?: ListTransactionsOptions): readonly TransactionRecord[] {
    return this.store.listTransactions(options);
  }

  getTransaction(id: string): TransactionRecord | undefined {
    return this.store.getTransaction(id);
  }

  transactionIds(): ReadonlySet<string> {
    return this.store.transactionIds();
  }

  listSnapshots(options?: ListSnapshotsOptions): readonly LedgerSnapshotRecord[] {
    return this.store.listSnapshots(options);
  }

  latestSnapshot(): LedgerSnapshotRecord | undefined {
    return this.store.latestSnapshot();
  }

  private async write<T>(what: string, fn: () => T): Promise<T> {
    try {
      return await withRetry(fn, this.retry, {
        shouldRetry: isRetryableError,
        sleepFn: this.sleepFn,
        onRetry: (err, attempt, delayMs) => {
          this.logger?.warn({ err, attempt, delayMs }, `Retrying audit write of ${what}`);
        },
      });
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new StorageWriteError(
          `Audit write of ${what} failed after ${err.attempts} attempts`,
          { cause: err.lastError },
        );
      }
      throw err;
    }
  }
}
