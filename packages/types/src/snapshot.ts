/**
 * Ledger Snapshots
 *
 * Serializable view of every balance in a ledger. Balances are decimal
 * strings so a snapshot survives JSON unchanged.
 */

import type { AccountId } from "./transaction.js";

/**
 * A single account line in a snapshot.
 */
export interface AccountBalance {
  readonly account: AccountId;
  readonly balance: string;
}

/**
 * Every balance in the ledger, in insertion order.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly balances: readonly AccountBalance[];
  readonly createdAt: string;
}
