/**
 * Transaction Records
 *
 * Immutable values describing a single committed balance change.
 *
 * Rules:
 * - Amounts are unsigned 64-bit integers held as bigint
 * - Records are frozen on creation and never mutated
 * - There is no transfer record: a send yields one withdraw then one deposit
 */

/**
 * Opaque account identifier. At most one balance entry per identifier.
 */
export type AccountId = string;

/**
 * An amount in the smallest indivisible currency unit.
 * Always within [0, MAX_AMOUNT].
 */
export type Amount = bigint;

/** Largest representable balance or amount (2^64 - 1). */
export const MAX_AMOUNT: Amount = 2n ** 64n - 1n;

/**
 * Funds credited to an account.
 */
export interface DepositTransaction {
  readonly kind: "deposit";
  readonly account: AccountId;
  readonly amount: Amount;
}

/**
 * Funds debited from an account.
 */
export interface WithdrawTransaction {
  readonly kind: "withdraw";
  readonly account: AccountId;
  readonly amount: Amount;
}

export type Transaction = DepositTransaction | WithdrawTransaction;

export type TransactionKind = Transaction["kind"];

/**
 * The two records produced by a successful send, in the order they were applied.
 */
export type Transfer = readonly [WithdrawTransaction, DepositTransaction];

export function depositTransaction(account: AccountId, amount: Amount): DepositTransaction {
  const tx: DepositTransaction = { kind: "deposit", account, amount };
  return Object.freeze(tx);
}

export function withdrawTransaction(account: AccountId, amount: Amount): WithdrawTransaction {
  const tx: WithdrawTransaction = { kind: "withdraw", account, amount };
  return Object.freeze(tx);
}
