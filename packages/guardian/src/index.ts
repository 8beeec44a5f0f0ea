/**
 * @yield-guardian/guardian - The guardian service.
 *
 * Configuration, the transfer processor, the periodic driver and the
 * operator HTTP API around a serialized yield ledger.
 */

// Configuration
export {
  ConfigSchema,
  GuardianFileSchema,
  YieldSourceConfigSchema,
  loadConfig,
  loadGuardianConfig,
  parseGuardianConfig,
  parseApiKeys,
  monitoredAddress,
} from "./config.js";
export type { AppConfig, GuardianFileConfig, YieldSourceConfig } from "./config.js";

// Logging
export { createLogger, REDACT_PATHS } from "./logger.js";
export type { Logger } from "./logger.js";

// Retry
export {
  withRetry,
  computeDelay,
  sleep,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig } from "./retry.js";

// Services
export { GuardianService } from "./services/guardian-service.js";
export type {
  GuardianServiceOptions,
  RefreshOutcome,
  RecordedSpend,
  ExecutedTransfer,
  HistoryOptions,
} from "./services/guardian-service.js";
export { GuardianDriver } from "./services/driver.js";
export type {
  GuardianDriverOptions,
  TickReport,
  TickStep,
  TransactionListener,
} from "./services/driver.js";
export { TransferProcessor } from "./services/transfer-processor.js";
export type { ProcessedTransfer, TransferProcessorOptions } from "./services/transfer-processor.js";
export { ResilientAuditWriter } from "./services/resilient-audit.js";
export type { ResilientAuditWriterOptions } from "./services/resilient-audit.js";
export type { StatusView, BudgetView, YieldView, ModeView } from "./services/views.js";

// Wiring
export { bootstrap } from "./bootstrap.js";
export type { BootstrapOverrides, GuardianRuntime } from "./bootstrap.js";

// HTTP
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
