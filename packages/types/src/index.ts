/**
 * @yield-guardian/types - Shared domain types for the guardian stack.
 *
 * - Financial primitives (Amount, Currency)
 * - Yield sources and spending modes
 * - Transfers and transaction records
 * - Ledger state and snapshot rows
 * - Error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types - meaning lives in consuming code
 */

// Financial types
export type { Currency, Amount } from "./financial.js";

// Yield types
export type {
  YieldOrigin,
  YieldSource,
  YieldSourceView,
  SpendingModeName,
} from "./yield.js";
export { SPENDING_MODE_NAMES } from "./yield.js";

// Transfer types
export type {
  TransferDirection,
  TransferEvent,
  TransactionStatus,
  TransactionRecord,
} from "./transfer.js";

// Ledger state
export type { LedgerState, LedgerSnapshotRecord } from "./ledger.js";

// Errors
export type { GuardianErrorCode } from "./errors.js";
export {
  GuardianError,
  ConfigurationError,
  ValidationError,
  UnknownModeError,
  BudgetExceededError,
  CollaboratorUnavailableError,
  StorageWriteError,
  LedgerInvariantError,
  isRetryableError,
} from "./errors.js";

// Runtime type guards
export {
  isSpendingModeName,
  isYieldSource,
  isTransferDirection,
  isTransactionStatus,
  isTransferEvent,
  isTransactionRecord,
  isLedgerSnapshotRecord,
} from "./guards.js";
