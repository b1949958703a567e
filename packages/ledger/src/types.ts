/**
 * @tally/ledger: Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - An operation that throws has mutated nothing
 */

import type { AccountId, Amount } from "@tally/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ACCOUNT_NOT_FOUND"
  | "UNDER_FUNDED"
  | "OVER_FUNDED"
  | "INVALID_AMOUNT"
  | "DUPLICATE_ACCOUNT_ID"
  | "INVALID_SNAPSHOT";

export interface LedgerErrorDetails {
  readonly account?: AccountId | undefined;
  readonly amount?: Amount | undefined;
}

/**
 * Structured error from the ledger engine.
 * Always thrown, never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly account: AccountId | undefined;
  /** The amount the failed operation attempted, not a computed balance. */
  public readonly amount: Amount | undefined;

  constructor(code: LedgerErrorCode, message: string, details: LedgerErrorDetails = {}) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.account = details.account;
    this.amount = details.amount;
  }
}

/** The account has no balance entry. */
export function accountNotFound(account: AccountId): LedgerError {
  return new LedgerError("ACCOUNT_NOT_FOUND", `Account ${account} not found`, { account });
}

/** The withdrawal exceeds the current balance. */
export function underFunded(account: AccountId, amount: Amount): LedgerError {
  return new LedgerError(
    "UNDER_FUNDED",
    `Account ${account} is underfunded; required amount is ${amount.toString()}`,
    { account, amount },
  );
}

/** The deposit would push the balance past the u64 range. */
export function overFunded(account: AccountId, amount: Amount): LedgerError {
  return new LedgerError(
    "OVER_FUNDED",
    `Account ${account} is overfunded; maximum allowed amount is ${amount.toString()}`,
    { account, amount },
  );
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export type { AccountBalance, LedgerSnapshot } from "@tally/types";
