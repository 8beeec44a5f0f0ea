/**
 * Property-Based Tests for @yield-guardian/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Accrued and spent totals never decrease
 * 2. Budget = (accrued - spent) × retention after every operation
 * 3. Accrual over [a, c] equals accrual over [a, b] + [b, c] within rounding
 * 4. Amount parse → format → parse is the identity
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { YieldSource } from "@yield-guardian/types";
import { YieldLedger } from "../src/yield-ledger.js";
import { applyRetention, resolveSpendingMode } from "../src/spending-policy.js";
import { accrualOver } from "../src/yield-source.js";
import { formatAmount, parseAmount } from "../src/money-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

const T0 = new Date("2026-01-01T00:00:00.000Z");

/** Non-negative amount with up to 6 decimals. */
const arbAmount = fc
  .tuple(fc.integer({ min: 0, max: 1_000_000 }), fc.integer({ min: 0, max: 999_999 }))
  .map(([int, frac]) => `${int}.${frac.toString().padStart(6, "0")}`);

const arbSource: fc.Arbitrary<YieldSource> = fc
  .tuple(
    fc.integer({ min: 0, max: 10_000_000 }),
    fc.integer({ min: 0, max: 2_500 }),
  )
  .map(([principal, rateHundredths]) => ({
    name: "Pool",
    origin: "manual",
    principal: principal.toString(),
    annualRatePercent: (rateHundredths / 100).toFixed(2),
    lastUpdated: T0.toISOString(),
  }));

const arbMode = fc.constantFrom("conservative", "balanced", "growth");

type Op =
  | { readonly kind: "accrue"; readonly advanceMs: number }
  | { readonly kind: "spend"; readonly amount: string }
  | { readonly kind: "mode"; readonly mode: string };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.integer({ min: 0, max: 3 * 86_400_000 }).map((advanceMs) => ({ kind: "accrue" as const, advanceMs })),
  arbAmount.map((amount) => ({ kind: "spend" as const, amount })),
  arbMode.map((mode) => ({ kind: "mode" as const, mode })),
);

// =============================================================================
// Properties
// =============================================================================

describe("ledger invariants", () => {
  it("totals are monotonic and the budget always matches the mode", () => {
    fc.assert(
      fc.property(arbSource, fc.array(arbOp, { maxLength: 40 }), (source, ops) => {
        const ledger = new YieldLedger({ principal: source.principal, sources: [source], startedAt: T0 });
        let clock = T0.getTime();
        let prevAccrued = 0n;
        let prevSpent = 0n;

        for (const op of ops) {
          switch (op.kind) {
            case "accrue":
              clock += op.advanceMs;
              ledger.accrue(new Date(clock));
              break;
            case "spend":
              ledger.authorizeAndRecord(op.amount);
              break;
            case "mode":
              ledger.setMode(op.mode);
              break;
          }

          const state = ledger.snapshot();
          const accrued = parseAmount(state.accruedYield, 6);
          const spent = parseAmount(state.spentFromYield, 6);

          expect(accrued >= prevAccrued).toBe(true);
          expect(spent >= prevSpent).toBe(true);
          expect(parseAmount(state.availableBudget, 6)).toBe(
            applyRetention(accrued - spent, resolveSpendingMode(state.mode)),
          );

          prevAccrued = accrued;
          prevSpent = spent;
        }
      }),
    );
  });

  it("a spend of x raises spent by exactly x", () => {
    fc.assert(
      fc.property(arbAmount, arbAmount, (accrued, amount) => {
        const ledger = new YieldLedger({ principal: "0", accruedYield: accrued, startedAt: T0 });
        const before = parseAmount(ledger.snapshot().spentFromYield, 6);
        ledger.authorizeAndRecord(amount);
        const after = parseAmount(ledger.snapshot().spentFromYield, 6);
        expect(after - before).toBe(parseAmount(amount, 6));
      }),
    );
  });

  it("the decision matches amount <= budget", () => {
    fc.assert(
      fc.property(arbAmount, arbAmount, arbMode, (accrued, amount, mode) => {
        const ledger = new YieldLedger({ principal: "0", accruedYield: accrued, mode, startedAt: T0 });
        const budget = parseAmount(ledger.availableBudget(), 6);
        const decision = ledger.authorizeAndRecord(amount);
        expect(decision.withinBudget).toBe(parseAmount(amount, 6) <= budget);
      }),
    );
  });
});

describe("accrual additivity", () => {
  it("splitting an interval loses at most one unit per split", () => {
    fc.assert(
      fc.property(
        arbSource,
        fc.integer({ min: 1, max: 30 * 86_400_000 }),
        fc.integer({ min: 1, max: 30 * 86_400_000 }),
        (source, first, second) => {
          const whole = accrualOver([source], first + second);
          const split = accrualOver([source], first) + accrualOver([source], second);
          expect(whole - split >= 0n).toBe(true);
          expect(whole - split <= 1n).toBe(true);
        },
      ),
    );
  });
});

describe("amount round-trip", () => {
  it("parse → format → parse is the identity", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: -(10n ** 24n), max: 10n ** 24n }), (value) => {
        expect(parseAmount(formatAmount(value, 6), 6)).toBe(value);
      }),
    );
  });
});
