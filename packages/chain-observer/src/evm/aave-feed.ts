/**
 * AaveYieldFeed - the wallet's Aave V3 USDC position on Base.
 *
 * Principal is the aUSDC balance (aTokens track supplied principal plus
 * interest 1:1). The rate is a configured estimate; the pool's live
 * liquidity rate is not read.
 */

import type { Address } from "viem";
import type { YieldSource } from "@yield-guardian/types";
import { LEDGER_DECIMALS, formatAmount, rescale } from "@yield-guardian/ledger";
import { AAVE_V3_BASE, AAVE_V3_ORIGIN } from "../chains.js";
import type { RpcConfig, YieldSourceFeed } from "../observer.js";
import {
  ERC20_BALANCE_OF,
  createBaseClient,
  requireAddress,
  type BasePublicClient,
} from "./client.js";

export const DEFAULT_AAVE_APY_PERCENT = "4.0";

export interface AaveYieldFeedConfig extends RpcConfig {
  readonly walletAddress: string;

  /** Annual rate applied to the position. Default "4.0" */
  readonly estimatedApyPercent?: string | undefined;

  readonly now?: (() => Date) | undefined;
}

export class AaveYieldFeed implements YieldSourceFeed {
  readonly origin = AAVE_V3_ORIGIN;
  private readonly client: BasePublicClient;
  private readonly wallet: Address;
  private readonly apy: string;
  private readonly now: () => Date;

  constructor(config: AaveYieldFeedConfig) {
    this.wallet = requireAddress(config.walletAddress, "Wallet address");
    this.apy = config.estimatedApyPercent ?? DEFAULT_AAVE_APY_PERCENT;
    this.now = config.now ?? (() => new Date());
    this.client = createBaseClient(config);
  }

  /**
   * @returns One "Aave V3 USDC" source, or none when the balance is zero
   */
  async fetchSources(): Promise<readonly YieldSource[]> {
    const balance = await this.client.readContract({
      address: AAVE_V3_BASE.aUSDC,
      abi: [ERC20_BALANCE_OF],
      functionName: "balanceOf",
      args: [this.wallet],
    });

    if (balance === 0n) {
      return [];
    }

    const principal = rescale(balance, AAVE_V3_BASE.aUSDCDecimals, LEDGER_DECIMALS);

    return [
      {
        name: "Aave V3 USDC",
        origin: this.origin,
        principal: formatAmount(principal, LEDGER_DECIMALS),
        annualRatePercent: this.apy,
        lastUpdated: this.now().toISOString(),
        protocolAddress: AAVE_V3_BASE.pool,
      },
    ];
  }
}
