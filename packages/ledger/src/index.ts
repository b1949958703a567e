/**
 * @tally/ledger: In-memory account ledger engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces balance invariants:
 * - Every balance is an unsigned 64-bit integer (bigint in [0, 2^64 - 1])
 * - Balances never go negative and never wrap
 * - A failed operation changes nothing
 * - A send either fully commits or is rolled back
 *
 * Design rules:
 * - All returned records are immutable
 * - Fail-closed: invalid operations throw, never silently succeed
 * - No process-wide singleton; callers own their Ledger instance
 */

// Core engine
export { Ledger } from "./ledger.js";

// Amount arithmetic
export {
  checkedAdd,
  checkedSub,
  assertAmount,
  parseAmount,
} from "./amount-math.js";

// Types
export type {
  LedgerErrorCode,
  LedgerErrorDetails,
  AccountBalance,
  LedgerSnapshot,
} from "./types.js";

export {
  LedgerError,
  accountNotFound,
  underFunded,
  overFunded,
} from "./types.js";
