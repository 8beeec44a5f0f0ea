/**
 * EvmTransferDetector - stablecoin transfers to and from one wallet.
 *
 * Scans ERC-20 Transfer logs of every configured stablecoin from the block
 * after the last scan up to the current head. The first poll looks back a
 * fixed number of blocks. Stablecoins are counted at par with USD.
 *
 * Each transfer is identified by `txHash:logIndex` and returned at most
 * once per detector instance.
 */

import type { Address, Hex } from "viem";
import type { TransferEvent } from "@yield-guardian/types";
import { LEDGER_DECIMALS, formatAmount, rescale } from "@yield-guardian/ledger";
import { BASE_STABLECOINS, type StablecoinRef } from "../chains.js";
import type { RpcConfig, TransferDetector } from "../observer.js";
import {
  ERC20_TRANSFER_EVENT,
  createBaseClient,
  requireAddress,
  type BasePublicClient,
} from "./client.js";

export const DEFAULT_LOOKBACK_BLOCKS = 1_000n;

export interface EvmTransferDetectorConfig extends RpcConfig {
  readonly walletAddress: string;

  /** Blocks scanned on the first poll. Default 1000 */
  readonly lookbackBlocks?: bigint | undefined;

  /** Tokens to watch. Default: USDC, USDbC, DAI on Base */
  readonly tokens?: readonly StablecoinRef[] | undefined;
}

/**
 * The subset of a viem Transfer log the detector reads.
 */
interface TransferLog {
  readonly transactionHash: Hex | null;
  readonly logIndex: number | null;
  readonly blockNumber: bigint | null;
  readonly args: {
    readonly from?: Address | undefined;
    readonly to?: Address | undefined;
    readonly value?: bigint | undefined;
  };
}

interface Located {
  readonly event: TransferEvent;
  readonly blockNumber: bigint;
  readonly logIndex: number;
}

export class EvmTransferDetector implements TransferDetector {
  private readonly client: BasePublicClient;
  private readonly wallet: Address;
  private readonly lookback: bigint;
  private readonly tokens: readonly StablecoinRef[];
  private readonly seen = new Set<string>();
  private lastScannedBlock: bigint | undefined;

  constructor(config: EvmTransferDetectorConfig) {
    this.wallet = requireAddress(config.walletAddress, "Wallet address");
    this.lookback = config.lookbackBlocks ?? DEFAULT_LOOKBACK_BLOCKS;
    this.tokens = config.tokens ?? Object.values(BASE_STABLECOINS);
    this.client = createBaseClient(config);
  }

  /** Last block included in a completed scan. */
  get scannedThrough(): bigint | undefined {
    return this.lastScannedBlock;
  }

  async pollNewTransfers(): Promise<readonly TransferEvent[]> {
    const head = await this.client.getBlockNumber();
    const fromBlock = this.lastScannedBlock !== undefined
      ? this.lastScannedBlock + 1n
      : head > this.lookback ? head - this.lookback : 0n;

    if (fromBlock > head) {
      return [];
    }

    const found: Located[] = [];
    const blockTimes = new Map<bigint, string>();

    for (const token of this.tokens) {
      const [incoming, outgoing] = await Promise.all([
        this.client.getLogs({
          address: token.address,
          event: ERC20_TRANSFER_EVENT,
          args: { to: this.wallet },
          fromBlock,
          toBlock: head,
        }),
        this.client.getLogs({
          address: token.address,
          event: ERC20_TRANSFER_EVENT,
          args: { from: this.wallet },
          fromBlock,
          toBlock: head,
        }),
      ]);

      for (const log of [...incoming, ...outgoing]) {
        const located = await this.toEvent(log, token, blockTimes);
        if (located !== undefined && !found.some((f) => f.event.id === located.event.id)) {
          found.push(located);
        }
      }
    }

    // Only advance once every token was scanned
    this.lastScannedBlock = head;

    found.sort((a, b) =>
      a.blockNumber === b.blockNumber
        ? a.logIndex - b.logIndex
        : a.blockNumber < b.blockNumber ? -1 : 1,
    );

    const fresh: TransferEvent[] = [];
    for (const { event } of found) {
      if (this.seen.has(event.id)) continue;
      this.seen.add(event.id);
      fresh.push(event);
    }
    return fresh;
  }

  // ===========================================================================
  // Private helpers
  // ===========================================================================

  private async toEvent(
    log: TransferLog,
    token: StablecoinRef,
    blockTimes: Map<bigint, string>,
  ): Promise<Located | undefined> {
    const { from, to, value } = log.args;
    if (
      log.transactionHash === null ||
      log.logIndex === null ||
      log.blockNumber === null ||
      from === undefined ||
      to === undefined ||
      value === undefined
    ) {
      return undefined;
    }

    const inbound = to.toLowerCase() === this.wallet.toLowerCase();
    const outbound = from.toLowerCase() === this.wallet.toLowerCase();
    // Self-transfers move nothing
    if (inbound && outbound) {
      return undefined;
    }

    return {
      event: {
        id: `${log.transactionHash}:${String(log.logIndex)}`,
        timestamp: await this.blockTime(log.blockNumber, blockTimes),
        amount: formatAmount(rescale(value, token.decimals, LEDGER_DECIMALS), LEDGER_DECIMALS),
        asset: token.symbol,
        direction: inbound ? "in" : "out",
        counterparty: inbound ? from : to,
      },
      blockNumber: log.blockNumber,
      logIndex: log.logIndex,
    };
  }

  private async blockTime(blockNumber: bigint, cache: Map<bigint, string>): Promise<string> {
    const cached = cache.get(blockNumber);
    if (cached !== undefined) return cached;

    const block = await this.client.getBlock({ blockNumber });
    const iso = new Date(Number(block.timestamp) * 1000).toISOString();
    cache.set(blockNumber, iso);
    return iso;
  }
}
