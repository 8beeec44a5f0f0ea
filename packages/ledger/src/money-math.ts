/**
 * @yield-guardian/ledger - Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations on money
 * - Amounts must be plain decimal strings ("12", "12.5", "-3.25")
 * - Division truncates toward zero
 */

import { ValidationError } from "@yield-guardian/types";
import type { Amount } from "@yield-guardian/types";

/** Currency every ledger total is denominated in. */
export const LEDGER_CURRENCY = "USD";

/** Precision of every ledger total. */
export const LEDGER_DECIMALS = 6;

/** Precision of annual rates ("4.25" percent). */
export const RATE_DECIMALS = 6;

// ─── Parsing / Formatting ────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new ValidationError(`Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  // Optional minus, digits, optional decimal point + digits. Rules out
  // NaN, Infinity and exponent notation.
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new ValidationError(`Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new ValidationError(
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but at most ${String(decimals)} are allowed`,
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Parse an amount that must be zero or positive.
 *
 * @param label - Field name used in the error message
 */
export function parseNonNegativeAmount(
  amount: string,
  decimals: number,
  label = "Amount",
): bigint {
  const value = parseAmount(amount, decimals);
  if (value < 0n) {
    throw new ValidationError(`${label} must not be negative, got "${amount.trim()}"`);
  }
  return value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): Amount {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Scaling ─────────────────────────────────────────────────────────────

/**
 * Change the precision of a scaled value, truncating toward zero.
 *
 * rescale(1_500000000000000000n, 18, 6) → 1_500000n
 */
export function rescale(scaled: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (fromDecimals === toDecimals) return scaled;
  if (toDecimals > fromDecimals) {
    return scaled * 10n ** BigInt(toDecimals - fromDecimals);
  }
  return scaled / 10n ** BigInt(fromDecimals - toDecimals);
}

// ─── Display ─────────────────────────────────────────────────────────────

/**
 * Round a scaled value to 2 decimals (half away from zero) and render it
 * as a dollar figure with thousands separators.
 *
 * 1234500000n (decimals=6) → "$1,234.50"
 * -8000000n   (decimals=6) → "-$8.00"
 */
export function formatUsd(scaled: bigint, decimals: number): string {
  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;

  let cents: bigint;
  if (decimals >= 2) {
    const divisor = 10n ** BigInt(decimals - 2);
    cents = (abs + divisor / 2n) / divisor;
  } else {
    cents = abs * 10n ** BigInt(2 - decimals);
  }

  const dollars = (cents / 100n).toString().replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  const rest = (cents % 100n).toString().padStart(2, "0");
  return `${negative ? "-" : ""}$${dollars}.${rest}`;
}

/**
 * formatUsd for an amount string at ledger precision.
 */
export function formatUsdAmount(amount: string): string {
  return formatUsd(parseAmount(amount, LEDGER_DECIMALS), LEDGER_DECIMALS);
}
