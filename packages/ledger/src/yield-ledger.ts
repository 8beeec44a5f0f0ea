/**
 * YieldLedger - principal, accrued yield, spent yield and spending mode.
 *
 * Spend principal never, spend yield only:
 * - Yield accrues from elapsed wall-clock time, not from tick counts
 * - Every spend is recorded, whether or not it fit the budget
 * - available budget = (accrued - spent) × retention, may go negative
 *
 * Rules:
 * - accrued and spent only ever increase
 * - All arithmetic uses bigint at ledger precision
 * - Invalid input throws before any state changes
 * - Every method is synchronous; callers that share a ledger serialize
 *   access through SerializedLedger
 */

import {
  LedgerInvariantError,
  ValidationError,
} from "@yield-guardian/types";
import type {
  Amount,
  LedgerSnapshotRecord,
  LedgerState,
  YieldOrigin,
  YieldSource,
} from "@yield-guardian/types";
import {
  LEDGER_CURRENCY,
  LEDGER_DECIMALS,
  formatAmount,
  formatUsd,
  parseNonNegativeAmount,
} from "./money-math.js";
import {
  DEFAULT_SPENDING_MODE,
  applyRetention,
  resolveSpendingMode,
} from "./spending-policy.js";
import type { SpendingMode } from "./spending-policy.js";
import { YieldSourceRegistry } from "./source-registry.js";
import { DEFAULT_ACCRUAL_THRESHOLD_MS } from "./types.js";
import type {
  AccrualResult,
  SpendCheck,
  SpendDecision,
  YieldLedgerOptions,
} from "./types.js";

export class YieldLedger {
  readonly currency = LEDGER_CURRENCY;
  readonly decimals = LEDGER_DECIMALS;
  readonly accrualThresholdMs: number;

  private readonly _principal: bigint;
  private _accrued: bigint;
  private _spent: bigint;
  private _mode: SpendingMode;
  private _lastAccrualAt: number;
  private readonly _sources: YieldSourceRegistry;

  constructor(options: YieldLedgerOptions) {
    const thresholdMs = options.accrualThresholdMs ?? DEFAULT_ACCRUAL_THRESHOLD_MS;
    if (!Number.isFinite(thresholdMs) || thresholdMs < 0) {
      throw new ValidationError(
        `Accrual threshold must be a non-negative number of milliseconds, got ${String(thresholdMs)}`,
      );
    }
    const startedAt = (options.startedAt ?? new Date()).getTime();
    if (Number.isNaN(startedAt)) {
      throw new ValidationError("Ledger start time is not a valid date");
    }

    this._principal = parseNonNegativeAmount(options.principal, this.decimals, "Principal");
    this._accrued = parseNonNegativeAmount(options.accruedYield ?? "0", this.decimals, "Accrued yield");
    this._spent = parseNonNegativeAmount(options.spentFromYield ?? "0", this.decimals, "Spent from yield");
    this._mode = resolveSpendingMode(options.mode ?? DEFAULT_SPENDING_MODE);
    this._sources = new YieldSourceRegistry(options.sources ?? []);
    this._lastAccrualAt = startedAt;
    this.accrualThresholdMs = thresholdMs;
  }

  /**
   * Rebuild a ledger from a persisted snapshot row. Sources are not part
   * of the row and come from the caller.
   */
  static fromSnapshot(
    record: LedgerSnapshotRecord,
    options: Pick<YieldLedgerOptions, "sources" | "startedAt" | "accrualThresholdMs"> = {},
  ): YieldLedger {
    return new YieldLedger({
      principal: record.principal,
      accruedYield: record.accruedYield,
      spentFromYield: record.spentFromYield,
      mode: record.mode,
      sources: options.sources,
      startedAt: options.startedAt,
      accrualThresholdMs: options.accrualThresholdMs,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  get mode(): SpendingMode {
    return this._mode;
  }

  get lastAccrualAt(): Date {
    return new Date(this._lastAccrualAt);
  }

  get sources(): YieldSourceRegistry {
    return this._sources;
  }

  /**
   * (accrued - spent) × retention. No side effects; can be negative.
   */
  availableBudget(): Amount {
    return this.format(this.budget());
  }

  /**
   * Immutable view of the whole ledger.
   */
  snapshot(): LedgerState {
    return {
      currency: this.currency,
      decimals: this.decimals,
      principal: this.format(this._principal),
      accruedYield: this.format(this._accrued),
      spentFromYield: this.format(this._spent),
      netYield: this.format(this._accrued - this._spent),
      mode: this._mode.name,
      retentionBps: this._mode.retentionBps,
      availableBudget: this.format(this.budget()),
      totalDailyYield: this.format(this._sources.totalDailyYield()),
      sources: this._sources.views(),
      lastAccrualAt: new Date(this._lastAccrualAt).toISOString(),
    };
  }

  /**
   * Pre-authorization: would `amount` fit the budget right now?
   * Records nothing.
   */
  checkSpend(amount: Amount): SpendCheck {
    const value = parseNonNegativeAmount(amount, this.decimals, "Spend amount");
    const budget = this.budget();

    if (value <= budget) {
      const remaining = budget - value;
      return {
        withinBudget: true,
        amount: this.format(value),
        budget: this.format(budget),
        remaining: this.format(remaining),
        message: `${this.usd(value)} is within your yield budget (${this.usd(remaining)} remaining after spend)`,
      };
    }

    const shortfall = value - budget;
    const daily = this._sources.totalDailyYield();
    // Nearest tenth of a day, halves rounded up.
    const daysToAfford = daily > 0n
      ? Number((shortfall * 20n + daily) / (2n * daily)) / 10
      : undefined;

    return {
      withinBudget: false,
      amount: this.format(value),
      budget: this.format(budget),
      overage: this.format(shortfall),
      daysToAfford,
      message: `Exceeds yield budget by ${this.usd(shortfall)} (available now: ${this.usd(budget)})`,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Apply yield for the time elapsed since the last accrual.
   *
   * Below the threshold this is a no-op, so frequent ticks cost nothing.
   * A `now` earlier than the last accrual counts as zero elapsed time.
   */
  accrue(now: Date = new Date()): AccrualResult {
    const nowMs = now.getTime();
    if (Number.isNaN(nowMs)) {
      throw new ValidationError("Accrual time is not a valid date");
    }

    const elapsedMs = Math.max(0, nowMs - this._lastAccrualAt);
    if (elapsedMs < this.accrualThresholdMs || elapsedMs === 0) {
      return {
        applied: false,
        delta: this.format(0n),
        elapsedMs,
        accruedYield: this.format(this._accrued),
      };
    }

    const before = this.totals();
    const delta = this._sources.accrualOver(elapsedMs);

    // Advance first: the same interval must never be applied twice.
    this._lastAccrualAt = nowMs;
    this._accrued += delta;
    this.assertMonotonic(before);

    return {
      applied: true,
      delta: this.format(delta),
      elapsedMs,
      accruedYield: this.format(this._accrued),
    };
  }

  /**
   * Record an outflow against yield and report whether it fit the budget.
   *
   * The spend is recorded unconditionally: it tracks money that already
   * left, it does not gate it.
   *
   * @throws ValidationError for negative, non-numeric or over-precise input
   */
  authorizeAndRecord(amount: Amount): SpendDecision {
    const value = parseNonNegativeAmount(amount, this.decimals, "Spend amount");
    const budget = this.budget();
    const before = this.totals();

    this._spent += value;
    this.assertMonotonic(before);

    if (value <= budget) {
      const remaining = budget - value;
      return {
        withinBudget: true,
        amount: this.format(value),
        budget: this.format(budget),
        remaining: this.format(remaining),
        message: `Spent ${this.usd(value)} from yield (${this.usd(remaining)} remaining)`,
      };
    }

    const overage = value - budget;
    return {
      withinBudget: false,
      amount: this.format(value),
      budget: this.format(budget),
      overage: this.format(overage),
      message: `Over budget by ${this.usd(overage)}! This dips into principal.`,
    };
  }

  /**
   * Replace every source of one origin. All-or-nothing.
   */
  replaceSources(origin: YieldOrigin, sources: readonly YieldSource[]): void {
    this._sources.replaceOrigin(origin, sources);
  }

  /**
   * Switch the active spending mode. Monetary totals are untouched.
   *
   * @throws UnknownModeError
   */
  setMode(name: string): SpendingMode {
    this._mode = resolveSpendingMode(name);
    return this._mode;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  private budget(): bigint {
    return applyRetention(this._accrued - this._spent, this._mode);
  }

  private totals(): { accrued: bigint; spent: bigint } {
    return { accrued: this._accrued, spent: this._spent };
  }

  private assertMonotonic(before: { accrued: bigint; spent: bigint }): void {
    if (this._accrued < before.accrued) {
      throw new LedgerInvariantError(
        `Accrued yield decreased from ${this.format(before.accrued)} to ${this.format(this._accrued)}`,
      );
    }
    if (this._spent < before.spent) {
      throw new LedgerInvariantError(
        `Spent from yield decreased from ${this.format(before.spent)} to ${this.format(this._spent)}`,
      );
    }
  }

  private format(value: bigint): Amount {
    return formatAmount(value, this.decimals);
  }

  private usd(value: bigint): string {
    return formatUsd(value, this.decimals);
  }
}
