/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tally domain types.
 * Used where values arrive untyped: ledger operations called from
 * plain JavaScript, and snapshots restored from JSON.
 */

import { MAX_AMOUNT } from "./transaction.js";
import type { Amount } from "./transaction.js";
import type { AccountBalance } from "./snapshot.js";

export function isAmount(value: unknown): value is Amount {
  return typeof value === "bigint" && value >= 0n && value <= MAX_AMOUNT;
}

/**
 * Shape check only: the balance string is not parsed here.
 */
export function isAccountBalance(value: unknown): value is AccountBalance {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.account === "string" && typeof v.balance === "string";
}
