/**
 * Type barrel - re-exports the HTTP contract types.
 */

// DTOs
export {
  AmountSchema,
  SpendCheckSchema,
  RecordSpendSchema,
  TransferSchema,
  SetModeSchema,
  ListTransactionsQuerySchema,
} from "./dto.js";
export type {
  SpendCheckDto,
  RecordSpendDto,
  TransferDto,
  SetModeDto,
  ListTransactionsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope, isApiErrorCode, isErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
