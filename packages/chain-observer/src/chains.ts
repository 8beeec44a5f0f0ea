/**
 * Chain Definitions
 *
 * Base mainnet and the contracts the guardian reads or writes there.
 */

import type { Chain } from "viem";
import { base } from "viem/chains";

// =============================================================================
// Base
// =============================================================================

export const BASE_CHAIN: Chain = base;

export const BASE_PUBLIC_RPC = "https://mainnet.base.org";

export const BASE_EXPLORER_TX_URL = "https://basescan.org/tx/";

/**
 * An ERC-20 stablecoin counted at par with USD.
 */
export interface StablecoinRef {
  readonly symbol: string;
  readonly address: `0x${string}`;
  readonly decimals: number;
}

export const BASE_STABLECOINS = {
  USDC: {
    symbol: "USDC",
    address: "0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913",
    decimals: 6,
  },
  USDbC: {
    symbol: "USDbC",
    address: "0xd9aAEc86B65D86f6A7B5B1b0c42FFA531710b6CA",
    decimals: 6,
  },
  DAI: {
    symbol: "DAI",
    address: "0x50c5725949A6F0c72E6C4a641F24049A917DB0Cb",
    decimals: 18,
  },
} as const satisfies Record<string, StablecoinRef>;

export const AAVE_V3_BASE = {
  pool: "0xA238Dd80C259a72e81d7e4664a9801593F98d1c5",
  aUSDC: "0x4e65fE4DbA92790696d040ac24Aa414708F5c0AB",
  aUSDCDecimals: 6,
} as const;

/** Origin tag of Aave-backed yield sources. */
export const AAVE_V3_ORIGIN = "aave_v3";

/** Origin tag of configured yield sources. */
export const MANUAL_ORIGIN = "manual";

export function explorerTxUrl(txHash: string): string {
  return `${BASE_EXPLORER_TX_URL}${txHash}`;
}
