/**
 * @yield-guardian/chain-observer - The guardian's collaborators.
 *
 * This package provides the contracts the guardian talks to the outside
 * world through, and their implementations:
 * - Yield feeds: static (configured) and Aave V3 on Base
 * - Transfer detection: ERC-20 stablecoin logs on Base
 * - Transfer execution: USDC from the agent wallet
 *
 * Design rules:
 * - Chain access goes through viem only
 * - Amounts leave this package as ledger-precision decimal strings
 * - Errors are surfaced, never swallowed
 */

// Collaborator interfaces
export type {
  RpcConfig,
  YieldSourceFeed,
  TransferDetector,
  TransferExecutor,
  ExecutionResult,
  ExecutorStatus,
} from "./observer.js";

// Chain definitions
export {
  BASE_CHAIN,
  BASE_PUBLIC_RPC,
  BASE_STABLECOINS,
  AAVE_V3_BASE,
  AAVE_V3_ORIGIN,
  MANUAL_ORIGIN,
  explorerTxUrl,
} from "./chains.js";
export type { StablecoinRef } from "./chains.js";

// Static feed
export { StaticYieldFeed } from "./static-feed.js";
export type { StaticSourceInput } from "./static-feed.js";

// EVM implementations
export * from "./evm/index.js";
