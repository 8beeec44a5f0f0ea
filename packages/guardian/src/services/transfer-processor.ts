/**
 * TransferProcessor - books detected transfers against the ledger.
 *
 * Each event id is handled at most once per process (and across restarts
 * when seeded from the audit store). Outgoing transfers with a positive
 * amount are booked; everything else is only recorded.
 *
 * Ids are claimed before the ledger is awaited, so a concurrent caller
 * with the same id sees the claim. A transfer paid through the guardian is
 * claimed under its transaction hash; its detected `hash:logIndex` events
 * are then skipped.
 *
 * A booking is never undone when its audit write fails: the record is
 * queued and written on a later call.
 */

import type { SpendDecision, SerializedLedger } from "@yield-guardian/ledger";
import { LEDGER_DECIMALS, formatAmount, parseNonNegativeAmount } from "@yield-guardian/ledger";
import type {
  TransactionRecord,
  TransactionStatus,
  TransferEvent,
} from "@yield-guardian/types";
import { isTransferEvent } from "@yield-guardian/types";
import type { Logger } from "../logger.js";
import type { ResilientAuditWriter } from "./resilient-audit.js";

/**
 * Outcome of one processed transfer.
 */
export interface ProcessedTransfer {
  readonly record: TransactionRecord;

  /** Present when the transfer was booked against the budget */
  readonly decision?: SpendDecision | undefined;

  /** False while the audit write is pending */
  readonly persisted: boolean;
}

export interface TransferProcessorOptions {
  readonly ledger: SerializedLedger;
  readonly audit: ResilientAuditWriter;
  readonly logger: Logger;

  /** Ids handled by a previous run */
  readonly seenIds?: Iterable<string> | undefined;

  readonly now?: (() => Date) | undefined;
}

/** Detector ids are `txHash:logIndex`. */
const TRANSFER_LOG_ID = /^(0x[^:]+):\d+$/;

export class TransferProcessor {
  private readonly ledger: SerializedLedger;
  private readonly audit: ResilientAuditWriter;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly seen: Set<string>;
  private pending: TransactionRecord[] = [];

  constructor(options: TransferProcessorOptions) {
    this.ledger = options.ledger;
    this.audit = options.audit;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.seen = new Set(options.seenIds ?? []);
  }

  /** Records waiting for a successful audit write. */
  get pendingWrites(): number {
    return this.pending.length;
  }

  /**
   * Claim an id for a booking made outside process().
   *
   * @returns false when the id is already claimed
   */
  claim(id: string): boolean {
    if (this.seen.has(id)) {
      return false;
    }
    this.seen.add(id);
    return true;
  }

  /** Drop a claim whose booking failed. */
  release(id: string): void {
    this.seen.delete(id);
  }

  async process(events: readonly TransferEvent[]): Promise<ProcessedTransfer[]> {
    await this.flushPending();

    const results: ProcessedTransfer[] = [];
    for (const event of events) {
      if (!isTransferEvent(event)) {
        this.logger.warn({ event }, "Skipping malformed transfer event");
        continue;
      }
      if (this.alreadyBooked(event)) {
        this.seen.add(event.id);
        continue;
      }

      let value: bigint;
      try {
        value = parseNonNegativeAmount(event.amount, LEDGER_DECIMALS, "Transfer amount");
      } catch (err) {
        this.seen.add(event.id);
        this.logger.warn({ id: event.id, amount: event.amount, err }, "Skipping transfer with invalid amount");
        continue;
      }

      let decision: SpendDecision | undefined;
      let status: TransactionStatus = "detected";
      const amount = formatAmount(value, LEDGER_DECIMALS);

      this.seen.add(event.id);
      if (event.direction === "out" && value > 0n) {
        try {
          decision = await this.ledger.authorizeAndRecord(amount);
        } catch (err) {
          this.release(event.id);
          throw err;
        }
        status = decision.withinBudget ? "within_budget" : "over_budget";
      }

      const record: TransactionRecord = {
        id: event.id,
        timestamp: event.timestamp,
        amount,
        asset: event.asset,
        direction: event.direction,
        counterparty: event.counterparty,
        category: event.category,
        status,
        recordedAt: this.now().toISOString(),
      };

      const persisted = await this.persist(record);
      results.push({ record, decision, persisted });

      this.logger.info(
        { id: record.id, direction: record.direction, amount, status },
        decision?.message ?? "Transfer recorded",
      );
    }

    return results;
  }

  /**
   * Write a record, queueing it for a later attempt when the write fails.
   *
   * @returns false when the record is queued
   */
  async persist(record: TransactionRecord): Promise<boolean> {
    try {
      await this.audit.upsertTransaction(record);
      return true;
    } catch (err) {
      this.pending.push(record);
      this.logger.error({ id: record.id, err }, "Audit write failed; will retry");
      return false;
    }
  }

  /** Retry every queued audit write. */
  async flushPending(): Promise<void> {
    const queued = this.pending;
    this.pending = [];
    for (const record of queued) {
      await this.persist(record);
    }
  }

  private alreadyBooked(event: TransferEvent): boolean {
    if (this.seen.has(event.id)) {
      return true;
    }
    if (event.direction !== "out") {
      return false;
    }
    const txHash = TRANSFER_LOG_ID.exec(event.id)?.[1];
    return txHash !== undefined && this.seen.has(txHash);
  }
}
