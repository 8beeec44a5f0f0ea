/**
 * Financial Types
 *
 * Monetary primitives shared by the ledger, the audit store and the
 * chain adapters.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit
 */

/**
 * Currency or asset identifier ("USD", "USDC", "DAI", ...).
 */
export type Currency = string;

/**
 * A decimal amount as a string, e.g. "100.50" or "0.000001".
 */
export type Amount = string;
