/**
 * @yield-guardian/audit-store - Durable audit trail for the guardian.
 *
 * Provides:
 * - AuditWriter interface (transaction upserts, snapshot rows)
 * - InMemoryAuditStore (tests, ephemeral runs)
 * - JsonlAuditStore (append-only files with fsync)
 * - SHA-256 snapshot hashing over canonical JSON
 */

// Types
export type {
  AuditWriter,
  ListTransactionsOptions,
  ListSnapshotsOptions,
} from "./types.js";
export { DEFAULT_LIST_LIMIT } from "./types.js";

// Implementations
export { InMemoryAuditStore } from "./in-memory-store.js";
export {
  JsonlAuditStore,
  TRANSACTIONS_FILE,
  SNAPSHOTS_FILE,
} from "./jsonl-store.js";
export type { JsonlAuditStoreOptions, LoadReport } from "./jsonl-store.js";

// Snapshot integrity
export {
  computeSnapshotHash,
  buildSnapshotRecord,
  verifySnapshotIntegrity,
} from "./snapshot-hash.js";
