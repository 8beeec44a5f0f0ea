import { describe, it, expect } from "vitest";
import { ValidationError } from "@yield-guardian/types";
import type { YieldSource } from "@yield-guardian/types";
import {
  accrualOver,
  dailyYield,
  hourlyYield,
  toSourceView,
  totalDailyYield,
  validateYieldSource,
} from "../src/yield-source.js";

const HOUR_MS = 3_600_000;
const DAY_MS = 24 * HOUR_MS;

function source(overrides: Partial<YieldSource> = {}): YieldSource {
  return {
    name: "Savings",
    origin: "manual",
    principal: "36500",
    annualRatePercent: "10",
    lastUpdated: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

describe("per-source yield", () => {
  it("computes daily yield as principal × rate / 365", () => {
    expect(dailyYield(source())).toBe(10_000_000n);
  });

  it("computes hourly yield as daily / 24, truncated", () => {
    expect(hourlyYield(source())).toBe(416_666n);
  });

  it("is zero for a zero rate", () => {
    expect(dailyYield(source({ annualRatePercent: "0" }))).toBe(0n);
  });
});

describe("totalDailyYield", () => {
  it("sums across sources", () => {
    const total = totalDailyYield([
      source(),
      source({ name: "Other", principal: "73000", annualRatePercent: "5" }),
    ]);
    expect(total).toBe(20_000_000n);
  });

  it("is zero with no sources", () => {
    expect(totalDailyYield([])).toBe(0n);
  });
});

describe("accrualOver", () => {
  it("accrues one day of yield over 24 hours", () => {
    expect(accrualOver([source()], DAY_MS)).toBe(10_000_000n);
  });

  it("accrues one hour of yield over 60 minutes", () => {
    expect(accrualOver([source()], HOUR_MS)).toBe(416_666n);
  });

  it("returns zero for non-positive or fractional intervals", () => {
    expect(accrualOver([source()], 0)).toBe(0n);
    expect(accrualOver([source()], -HOUR_MS)).toBe(0n);
    expect(accrualOver([source()], 1.5)).toBe(0n);
  });
});

describe("validateYieldSource", () => {
  it("accepts a well-formed source", () => {
    expect(() => validateYieldSource(source())).not.toThrow();
  });

  it("rejects an empty name", () => {
    expect(() => validateYieldSource(source({ name: " " }))).toThrow(ValidationError);
  });

  it("rejects a negative principal", () => {
    expect(() => validateYieldSource(source({ principal: "-1" }))).toThrow(
      /Principal of 'Savings' must not be negative/,
    );
  });

  it("rejects a non-numeric rate", () => {
    expect(() => validateYieldSource(source({ annualRatePercent: "ten" }))).toThrow(
      ValidationError,
    );
  });

  it("rejects an invalid timestamp", () => {
    expect(() => validateYieldSource(source({ lastUpdated: "yesterday" }))).toThrow(
      /invalid lastUpdated/,
    );
  });
});

describe("toSourceView", () => {
  it("adds formatted daily and hourly yield", () => {
    const view = toSourceView(source());
    expect(view.dailyYield).toBe("10.000000");
    expect(view.hourlyYield).toBe("0.416666");
    expect(view.name).toBe("Savings");
  });
});
