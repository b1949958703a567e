/**
 * @tally/types: Shared domain types for the Tally ledger.
 *
 * - Account identifiers and u64 amounts
 * - Immutable transaction records
 * - Ledger snapshot shapes
 * - Runtime guards for untyped input
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

export type {
  AccountId,
  Amount,
  DepositTransaction,
  WithdrawTransaction,
  Transaction,
  TransactionKind,
  Transfer,
} from "./transaction.js";

export {
  MAX_AMOUNT,
  depositTransaction,
  withdrawTransaction,
} from "./transaction.js";

export type { AccountBalance, LedgerSnapshot } from "./snapshot.js";

export { isAmount, isAccountBalance } from "./guards.js";
