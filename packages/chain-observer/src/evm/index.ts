/**
 * EVM Collaborators - Public API
 */
export { AaveYieldFeed, DEFAULT_AAVE_APY_PERCENT } from "./aave-feed.js";
export type { AaveYieldFeedConfig } from "./aave-feed.js";
export { EvmTransferDetector, DEFAULT_LOOKBACK_BLOCKS } from "./transfer-detector.js";
export type { EvmTransferDetectorConfig } from "./transfer-detector.js";
export {
  EvmTransferExecutor,
  MIN_GAS_BALANCE_WEI,
  RECEIPT_TIMEOUT_MS,
  parsePrivateKey,
} from "./transfer-executor.js";
export type { EvmTransferExecutorConfig } from "./transfer-executor.js";
export { createBaseClient, requireAddress, DEFAULT_RPC_TIMEOUT_MS } from "./client.js";
export type { BasePublicClient } from "./client.js";
