/**
 * Shared read-side helpers for audit stores.
 */

import type { TransactionRecord } from "@yield-guardian/types";
import { DEFAULT_LIST_LIMIT } from "./types.js";
import type { ListTransactionsOptions } from "./types.js";

/**
 * Newest first by timestamp; ties keep reverse insertion order.
 *
 * @param records - In insertion order
 */
export function newestTransactions(
  records: readonly TransactionRecord[],
  options: ListTransactionsOptions = {},
): readonly TransactionRecord[] {
  const limit = normalizeLimit(options.limit);
  const filtered = options.direction === undefined
    ? records
    : records.filter((r) => r.direction === options.direction);

  return filtered
    .map((record, index) => ({ record, index, at: timeOf(record) }))
    .sort((a, b) => b.at - a.at || b.index - a.index)
    .slice(0, limit)
    .map((entry) => entry.record);
}

export function normalizeLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) {
    return DEFAULT_LIST_LIMIT;
  }
  return Math.max(0, Math.floor(limit));
}

function timeOf(record: TransactionRecord): number {
  const at = Date.parse(record.timestamp);
  return Number.isNaN(at) ? 0 : at;
}
