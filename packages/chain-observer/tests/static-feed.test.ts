import { describe, it, expect } from "vitest";
import { StaticYieldFeed } from "../src/static-feed.js";

const NOW = new Date("2026-03-01T00:00:00.000Z");

describe("StaticYieldFeed", () => {
  it("tags configured sources as manual", async () => {
    const feed = new StaticYieldFeed(
      [{ name: "Savings", principal: "1000", annualRatePercent: "5" }],
      { now: () => NOW },
    );

    expect(feed.origin).toBe("manual");
    expect(await feed.fetchSources()).toEqual([
      {
        name: "Savings",
        origin: "manual",
        principal: "1000",
        annualRatePercent: "5",
        lastUpdated: "2026-03-01T00:00:00.000Z",
        protocolAddress: undefined,
      },
    ]);
  });

  it("supports a custom origin", async () => {
    const feed = new StaticYieldFeed(
      [{ name: "Bond", principal: "10", annualRatePercent: "3" }],
      { origin: "treasury_bills" },
    );
    const [source] = await feed.fetchSources();
    expect(source?.origin).toBe("treasury_bills");
  });

  it("returns an empty list when nothing is configured", async () => {
    expect(await new StaticYieldFeed([]).fetchSources()).toEqual([]);
  });
});
