/**
 * @tally/ledger: Checked u64 arithmetic.
 *
 * Balances and amounts are bigint values confined to [0, MAX_AMOUNT].
 * bigint never wraps, so the range is enforced here instead of by the type.
 *
 * Rules:
 * - No floating-point operations
 * - A result outside the u64 range is reported, never clamped
 * - Zero runtime dependencies
 */

import { MAX_AMOUNT, isAmount } from "@tally/types";
import type { Amount } from "@tally/types";
import { LedgerError } from "./types.js";

/**
 * a + b, or undefined when the sum exceeds MAX_AMOUNT.
 */
export function checkedAdd(a: Amount, b: Amount): Amount | undefined {
  const sum = a + b;
  return sum > MAX_AMOUNT ? undefined : sum;
}

/**
 * a - b, or undefined when b > a.
 */
export function checkedSub(a: Amount, b: Amount): Amount | undefined {
  const diff = a - b;
  return diff < 0n ? undefined : diff;
}

/**
 * Throw INVALID_AMOUNT unless the value is a bigint in the u64 range.
 */
export function assertAmount(value: unknown): asserts value is Amount {
  if (!isAmount(value)) {
    const shown = typeof value === "bigint" ? value.toString() : typeof value;
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount must be an integer between 0 and ${MAX_AMOUNT.toString()}, got: ${shown}`,
    );
  }
}

/**
 * Parse a decimal string of digits into an amount.
 *
 * "100" → 100n
 * " 42 " → 42n
 * "-1", "1.5", "1e3", "" → INVALID_AMOUNT
 */
export function parseAmount(raw: string): Amount {
  if (typeof raw !== "string") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(raw)}"`);
  }

  const trimmed = raw.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${trimmed}"`);
  }

  const value = BigInt(trimmed);
  if (value > MAX_AMOUNT) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" exceeds the maximum of ${MAX_AMOUNT.toString()}`,
    );
  }

  return value;
}
