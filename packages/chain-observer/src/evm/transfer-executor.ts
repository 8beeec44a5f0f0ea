/**
 * EvmTransferExecutor - sends USDC from the agent wallet on Base.
 *
 * The agent wallet holds only what the owner allows it to spend; the
 * guardian decides whether a transfer fits the budget before calling
 * execute(). Balance shortfalls, reverts and RPC errors come back as
 * `{ success: false }`.
 */

import {
  createWalletClient,
  http,
  isHex,
  type Address,
  type Chain,
  type HttpTransport,
  type WalletClient,
} from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { ConfigurationError } from "@yield-guardian/types";
import type { Amount } from "@yield-guardian/types";
import {
  LEDGER_DECIMALS,
  formatAmount,
  formatUsd,
  parseNonNegativeAmount,
  rescale,
} from "@yield-guardian/ledger";
import { BASE_CHAIN, BASE_STABLECOINS, explorerTxUrl } from "../chains.js";
import type {
  ExecutionResult,
  ExecutorStatus,
  RpcConfig,
  TransferExecutor,
} from "../observer.js";
import {
  DEFAULT_RPC_TIMEOUT_MS,
  ERC20_BALANCE_OF,
  ERC20_TRANSFER,
  createBaseClient,
  requireAddress,
  type BasePublicClient,
} from "./client.js";

const USDC = BASE_STABLECOINS.USDC;
const ETH_DECIMALS = 18;

/** 0.0001 ETH */
export const MIN_GAS_BALANCE_WEI = 100_000_000_000_000n;

export const RECEIPT_TIMEOUT_MS = 120_000;

export interface EvmTransferExecutorConfig extends RpcConfig {
  /** Hex private key of the agent wallet, with or without 0x */
  readonly privateKey: string;

  readonly destinationAddress: string;
}

/**
 * Normalize a private key to 0x-prefixed hex.
 *
 * @throws ConfigurationError
 */
export function parsePrivateKey(raw: string): `0x${string}` {
  const trimmed = raw.trim();
  const key = trimmed.startsWith("0x") ? trimmed : `0x${trimmed}`;
  if (!isHex(key, { strict: true }) || key.length !== 66) {
    throw new ConfigurationError("Agent private key must be 32 bytes of hex", [
      "AGENT_PRIVATE_KEY: expected 64 hex characters",
    ]);
  }
  return key;
}

export class EvmTransferExecutor implements TransferExecutor {
  private readonly publicClient: BasePublicClient;
  private readonly walletClient: WalletClient<HttpTransport, Chain, PrivateKeyAccount>;
  private readonly account: PrivateKeyAccount;
  private readonly destination: Address;

  constructor(config: EvmTransferExecutorConfig) {
    this.account = privateKeyToAccount(parsePrivateKey(config.privateKey));
    this.destination = requireAddress(config.destinationAddress, "Destination address");
    this.publicClient = createBaseClient(config);
    this.walletClient = createWalletClient({
      account: this.account,
      chain: BASE_CHAIN,
      transport: http(config.rpcUrl, {
        timeout: config.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS,
      }),
    });
  }

  get agentAddress(): Address {
    return this.account.address;
  }

  async execute(amount: Amount): Promise<ExecutionResult> {
    let requested: bigint;
    try {
      requested = parseNonNegativeAmount(amount, LEDGER_DECIMALS, "Transfer amount");
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
    if (requested === 0n) {
      return { success: false, error: "Transfer amount must be greater than zero" };
    }

    try {
      const [usdcBalance, ethBalance] = await Promise.all([
        this.usdcBalance(),
        this.publicClient.getBalance({ address: this.account.address }),
      ]);

      const raw = rescale(requested, LEDGER_DECIMALS, USDC.decimals);
      if (usdcBalance < raw) {
        return {
          success: false,
          error: `Insufficient USDC. Have ${formatUsd(usdcBalance, USDC.decimals)}, need ${formatUsd(raw, USDC.decimals)}`,
        };
      }
      if (ethBalance < MIN_GAS_BALANCE_WEI) {
        return {
          success: false,
          error: `Insufficient ETH for gas. Have ${toEth(ethBalance)} ETH`,
        };
      }

      const hash = await this.walletClient.writeContract({
        address: USDC.address,
        abi: [ERC20_TRANSFER],
        functionName: "transfer",
        args: [this.destination, raw],
      });

      const receipt = await this.publicClient.waitForTransactionReceipt({
        hash,
        timeout: RECEIPT_TIMEOUT_MS,
      });

      if (receipt.status !== "success") {
        return { success: false, error: "Transaction failed on-chain" };
      }

      return {
        success: true,
        reference: hash,
        amount: formatAmount(requested, LEDGER_DECIMALS),
        destination: this.destination,
        explorerUrl: explorerTxUrl(hash),
      };
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }

  async status(): Promise<ExecutorStatus> {
    const [usdcBalance, ethBalance] = await Promise.all([
      this.usdcBalance(),
      this.publicClient.getBalance({ address: this.account.address }),
    ]);

    return {
      agentAddress: this.account.address,
      usdcBalance: formatAmount(rescale(usdcBalance, USDC.decimals, LEDGER_DECIMALS), LEDGER_DECIMALS),
      ethBalance: toEth(ethBalance),
      destination: this.destination,
    };
  }

  private usdcBalance(): Promise<bigint> {
    return this.publicClient.readContract({
      address: USDC.address,
      abi: [ERC20_BALANCE_OF],
      functionName: "balanceOf",
      args: [this.account.address],
    });
  }
}

function toEth(wei: bigint): Amount {
  return formatAmount(rescale(wei, ETH_DECIMALS, 6), 6);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
