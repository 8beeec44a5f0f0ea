import { describe, it, expect } from "vitest";
import {
  AAVE_V3_BASE,
  BASE_CHAIN,
  BASE_STABLECOINS,
  explorerTxUrl,
} from "../src/chains.js";

describe("Base definitions", () => {
  it("targets chain id 8453", () => {
    expect(BASE_CHAIN.id).toBe(8453);
  });

  it("lists the watched stablecoins with their decimals", () => {
    expect(Object.values(BASE_STABLECOINS).map((t) => [t.symbol, t.decimals])).toEqual([
      ["USDC", 6],
      ["USDbC", 6],
      ["DAI", 18],
    ]);
  });

  it("uses 6 decimals for aUSDC", () => {
    expect(AAVE_V3_BASE.aUSDCDecimals).toBe(BASE_STABLECOINS.USDC.decimals);
  });
});

describe("explorerTxUrl", () => {
  it("links to basescan", () => {
    expect(explorerTxUrl("0xabc")).toBe("https://basescan.org/tx/0xabc");
  });
});
