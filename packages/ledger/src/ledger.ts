/**
 * @tally/ledger: Core Ledger class.
 *
 * Holds one unsigned 64-bit balance per account and applies
 * deposit, withdraw and send. Every operation either commits fully
 * or leaves every balance exactly as it was.
 *
 * API surface:
 * - deposit(): Credit an account, creating it on first deposit
 * - withdraw(): Debit an existing account
 * - send(): Withdraw from one account and deposit into another, atomically
 * - balanceOf() / hasAccount() / balances(): Read-only inspection
 * - snapshot(): Serialize every balance
 * - fromSnapshot(): Rebuild a ledger from a snapshot
 */

import { depositTransaction, isAccountBalance, withdrawTransaction } from "@tally/types";
import type {
  AccountId,
  Amount,
  DepositTransaction,
  Transfer,
  WithdrawTransaction,
} from "@tally/types";
import { assertAmount, checkedAdd, checkedSub, parseAmount } from "./amount-math.js";
import type { LedgerSnapshot } from "@tally/types";
import { LedgerError, accountNotFound, overFunded, underFunded } from "./types.js";

/**
 * In-memory account ledger.
 *
 * The ledger is the only mutator of balances. It returns immutable
 * transaction records for committed changes and throws LedgerError
 * for rejected ones. Balances never go negative and never wrap.
 */
export class Ledger {
  private readonly _balances: Map<AccountId, Amount> = new Map();

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Deposit into an account. A missing account is created with
   * the deposited amount as its balance.
   *
   * Throws OVER_FUNDED if the new balance would exceed the u64 range.
   */
  deposit(account: AccountId, amount: Amount): DepositTransaction {
    assertAmount(amount);

    const current = this._balances.get(account);
    if (current === undefined) {
      this._balances.set(account, amount);
      return depositTransaction(account, amount);
    }

    const next = checkedAdd(current, amount);
    if (next === undefined) {
      throw overFunded(account, amount);
    }

    this._balances.set(account, next);
    return depositTransaction(account, amount);
  }

  /**
   * Withdraw from an existing account.
   *
   * Throws ACCOUNT_NOT_FOUND if the account was never deposited into,
   * UNDER_FUNDED if the amount exceeds the balance.
   */
  withdraw(account: AccountId, amount: Amount): WithdrawTransaction {
    assertAmount(amount);

    const current = this._balances.get(account);
    if (current === undefined) {
      throw accountNotFound(account);
    }

    const next = checkedSub(current, amount);
    if (next === undefined) {
      throw underFunded(account, amount);
    }

    this._balances.set(account, next);
    return withdrawTransaction(account, amount);
  }

  /**
   * Move an amount from sender to recipient.
   *
   * Runs as withdraw then deposit. If the deposit fails, the sender's
   * balance is restored to its value before the call and the deposit's
   * error is rethrown unchanged.
   */
  send(sender: AccountId, recipient: AccountId, amount: Amount): Transfer {
    assertAmount(amount);

    const before = this._balances.get(sender);
    if (before === undefined) {
      throw accountNotFound(sender);
    }

    const withdrawal = this.withdraw(sender, amount);

    try {
      const deposit = this.deposit(recipient, amount);
      return [withdrawal, deposit];
    } catch (err) {
      this._balances.set(sender, before);
      throw err;
    }
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Current balance, or undefined if the account was never deposited into.
   */
  balanceOf(account: AccountId): Amount | undefined {
    return this._balances.get(account);
  }

  hasAccount(account: AccountId): boolean {
    return this._balances.has(account);
  }

  get accountCount(): number {
    return this._balances.size;
  }

  /**
   * Copy of every balance, in the order accounts were first deposited into.
   */
  balances(): ReadonlyMap<AccountId, Amount> {
    return new Map(this._balances);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Can be restored with Ledger.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      balances: [...this._balances].map(([account, balance]) => ({
        account,
        balance: balance.toString(),
      })),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   *
   * Snapshots usually come back through JSON.parse, so the shape is
   * checked at runtime. Balances must be canonical decimal strings,
   * exactly as snapshot() writes them.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): Ledger {
    const version: unknown = snapshot.version;
    if (version !== 1) {
      throw new LedgerError("INVALID_SNAPSHOT", `Unsupported snapshot version: ${String(version)}`);
    }

    const entries: unknown = snapshot.balances;
    if (!Array.isArray(entries)) {
      throw new LedgerError("INVALID_SNAPSHOT", "Snapshot balances must be an array");
    }

    const ledger = new Ledger();
    const list: readonly unknown[] = entries;

    for (const [index, entry] of list.entries()) {
      if (!isAccountBalance(entry)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Snapshot entry ${index} must have a string account and a string balance`,
        );
      }

      const { account, balance } = entry;
      const amount = parseAmount(balance);
      if (amount.toString() !== balance) {
        throw new LedgerError(
          "INVALID_AMOUNT",
          `Snapshot balance for "${account}" is not in canonical form: "${balance}"`,
          { account },
        );
      }

      if (ledger._balances.has(account)) {
        throw new LedgerError(
          "DUPLICATE_ACCOUNT_ID",
          `Account appears more than once in snapshot: "${account}"`,
          { account },
        );
      }
      ledger._balances.set(account, amount);
    }

    return ledger;
  }
}
