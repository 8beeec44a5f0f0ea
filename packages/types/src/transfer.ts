/**
 * Transfer Types
 *
 * Detected wallet transfers and the audit record the ledger assigns to
 * each of them.
 */

import type { Amount, Currency } from "./financial.js";

export type TransferDirection = "in" | "out";

/**
 * A transfer delivered by a transfer detector.
 *
 * `id` is globally unique; a detector never delivers the same id twice.
 */
export interface TransferEvent {
  readonly id: string;

  /** ISO 8601 time of the transfer */
  readonly timestamp: string;

  /** Amount in ledger currency */
  readonly amount: Amount;

  /** Asset that moved, e.g. "USDC" */
  readonly asset: Currency;

  readonly direction: TransferDirection;

  /** The other side of the transfer (recipient for out, sender for in) */
  readonly counterparty?: string | undefined;

  readonly category?: string | undefined;
}

/**
 * Authorization outcome of a transaction record.
 *
 * Assigned exactly once, never revised.
 */
export type TransactionStatus = "detected" | "within_budget" | "over_budget";

/**
 * Audit record of a detected or executed transfer.
 */
export interface TransactionRecord {
  readonly id: string;
  readonly timestamp: string;
  readonly amount: Amount;
  readonly asset: Currency;
  readonly direction: TransferDirection;
  readonly counterparty?: string | undefined;
  readonly category?: string | undefined;
  readonly status: TransactionStatus;

  /** When the record was created by the guardian */
  readonly recordedAt: string;
}
