/**
 * Collaborator Interfaces
 *
 * The guardian's view of the outside world: where yield comes from, which
 * transfers left or reached the wallet, and how a transfer is executed.
 * Every chain-specific or static implementation satisfies one of these.
 *
 * Design rules:
 * - All methods return Promises (chain queries are inherently async)
 * - Errors are thrown, not returned, except for ExecutionResult whose
 *   failure branch is an expected outcome
 * - Amounts are decimal strings in ledger currency
 */

import type { Amount, TransferEvent, YieldOrigin, YieldSource } from "@yield-guardian/types";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Connection settings shared by every RPC-backed collaborator.
 */
export interface RpcConfig {
  /** HTTP RPC endpoint URL */
  readonly rpcUrl: string;

  /** Optional request timeout in milliseconds */
  readonly timeoutMs?: number | undefined;
}

// =============================================================================
// Yield feeds
// =============================================================================

/**
 * Produces the current yield sources of one origin.
 *
 * An empty list means "nothing observed"; the caller decides whether that
 * clears the origin.
 */
export interface YieldSourceFeed {
  readonly origin: YieldOrigin;
  fetchSources(): Promise<readonly YieldSource[]>;
}

// =============================================================================
// Transfer detection
// =============================================================================

/**
 * Reports transfers not returned by a previous call.
 */
export interface TransferDetector {
  pollNewTransfers(): Promise<readonly TransferEvent[]>;
}

// =============================================================================
// Transfer execution
// =============================================================================

export type ExecutionResult =
  | {
      readonly success: true;
      /** Transaction reference, e.g. the tx hash */
      readonly reference: string;
      readonly amount: Amount;
      /** Recipient address */
      readonly destination: string;
      readonly explorerUrl?: string | undefined;
    }
  | {
      readonly success: false;
      readonly error: string;
    };

/**
 * Wallet the executor pays from.
 */
export interface ExecutorStatus {
  readonly agentAddress: string;
  readonly usdcBalance: Amount;
  readonly ethBalance: Amount;
  readonly destination: string;
}

/**
 * Sends money out of the agent wallet.
 */
export interface TransferExecutor {
  /**
   * Transfer `amount` to the configured destination.
   *
   * Never throws for on-chain or balance failures; those come back as
   * `{ success: false }`.
   */
  execute(amount: Amount): Promise<ExecutionResult>;

  status(): Promise<ExecutorStatus>;
}
