/**
 * viem client construction shared by the EVM collaborators.
 */

import {
  createPublicClient,
  getAddress,
  http,
  isAddress,
  parseAbiItem,
  type Address,
  type Chain,
  type HttpTransport,
  type PublicClient,
} from "viem";
import { ValidationError } from "@yield-guardian/types";
import { BASE_CHAIN } from "../chains.js";
import type { RpcConfig } from "../observer.js";

export type BasePublicClient = PublicClient<HttpTransport, Chain>;

export const DEFAULT_RPC_TIMEOUT_MS = 30_000;

// ERC-20 ABI fragments
export const ERC20_BALANCE_OF = parseAbiItem(
  "function balanceOf(address owner) view returns (uint256)"
);
export const ERC20_TRANSFER = parseAbiItem(
  "function transfer(address to, uint256 amount) returns (bool)"
);
export const ERC20_TRANSFER_EVENT = parseAbiItem(
  "event Transfer(address indexed from, address indexed to, uint256 value)"
);

export function createBaseClient(config: RpcConfig, chain: Chain = BASE_CHAIN): BasePublicClient {
  return createPublicClient({
    chain,
    transport: http(config.rpcUrl, {
      timeout: config.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS,
    }),
  });
}

/**
 * Validate and checksum an address from configuration.
 *
 * @throws ValidationError
 */
export function requireAddress(value: string, label: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new ValidationError(`${label} is not a valid EVM address: '${value}'`);
  }
  return getAddress(value);
}
