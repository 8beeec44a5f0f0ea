/**
 * Tests for the deterministic money math engine.
 *
 * Covers:
 * - parseAmount / formatAmount
 * - Non-negative parsing for spend input
 * - Rescaling between token and ledger precision
 * - Dollar display rounding
 */

import { describe, it, expect } from "vitest";
import { ValidationError } from "@yield-guardian/types";
import {
  parseAmount,
  parseNonNegativeAmount,
  formatAmount,
  rescale,
  formatUsd,
  formatUsdAmount,
} from "../src/money-math.js";

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100", 6)).toBe(100_000_000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("pads fractional part when shorter than decimals", () => {
    expect(parseAmount("1.5", 6)).toBe(1_500_000n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseAmount("  7.25 ", 2)).toBe(725n);
  });

  it("rejects an empty string", () => {
    expect(() => parseAmount("", 6)).toThrow(ValidationError);
  });

  it.each(["abc", "1e5", "NaN", "Infinity", "1.", ".5", "1,000"])(
    "rejects %s",
    (input) => {
      expect(() => parseAmount(input, 6)).toThrow(ValidationError);
    },
  );

  it("rejects more decimal places than allowed", () => {
    expect(() => parseAmount("1.1234567", 6)).toThrow(/7 decimal places/);
  });
});

describe("parseNonNegativeAmount", () => {
  it("accepts zero", () => {
    expect(parseNonNegativeAmount("0", 6)).toBe(0n);
  });

  it("rejects a negative amount with the field label", () => {
    expect(() => parseNonNegativeAmount("-1", 6, "Spend amount")).toThrow(
      'Spend amount must not be negative, got "-1"',
    );
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats with full precision", () => {
    expect(formatAmount(100_000_000n, 6)).toBe("100.000000");
  });

  it("formats values below one", () => {
    expect(formatAmount(416_666n, 6)).toBe("0.416666");
  });

  it("formats negatives", () => {
    expect(formatAmount(-5025n, 2)).toBe("-50.25");
  });

  it("formats zero decimals as an integer", () => {
    expect(formatAmount(42n, 0)).toBe("42");
  });
});

// ─── Scaling ─────────────────────────────────────────────────────────────

describe("rescale", () => {
  it("truncates when reducing precision", () => {
    expect(rescale(1_500_000_000_000_000_999n, 18, 6)).toBe(1_500_000n);
  });

  it("multiplies when increasing precision", () => {
    expect(rescale(15n, 1, 6)).toBe(1_500_000n);
  });

  it("returns the value unchanged for equal precision", () => {
    expect(rescale(123n, 6, 6)).toBe(123n);
  });
});

// ─── Display ─────────────────────────────────────────────────────────────

describe("formatUsd", () => {
  it("adds thousands separators", () => {
    expect(formatUsd(1_234_500_000n, 6)).toBe("$1,234.50");
  });

  it("rounds half up to cents", () => {
    expect(formatUsd(5_000n, 6)).toBe("$0.01");
    expect(formatUsd(4_999n, 6)).toBe("$0.00");
  });

  it("renders negatives with a leading minus", () => {
    expect(formatUsd(-8_000_000n, 6)).toBe("-$8.00");
  });

  it("handles low-precision inputs", () => {
    expect(formatUsd(5n, 0)).toBe("$5.00");
  });

  it("formats ledger amount strings", () => {
    expect(formatUsdAmount("1000000.1")).toBe("$1,000,000.10");
  });
});
