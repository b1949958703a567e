/**
 * Terminal rendering for shell output.
 *
 * Every function takes the chalk instance to draw with, so the
 * colour level is chosen once at startup (and fixed at 0 in tests).
 */

import chalk, { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import type { AccountId, Amount, Transaction } from "@tally/types";
import type { LedgerError } from "@tally/ledger";
import type { ShellConfig } from "./config.js";

export const COMMAND_PROMPT = "Please choose [deposit, withdraw, send, print, quit] and hit return:";

export function createStyle(mode: ShellConfig["SHELL_COLOR"]): ChalkInstance {
  switch (mode) {
    case "always":
      return new Chalk({ level: chalk.level === 0 ? 1 : chalk.level });
    case "never":
      return new Chalk({ level: 0 });
    case "auto":
      return chalk;
  }
}

export function formatTransaction(tx: Transaction, style: ChalkInstance): string {
  const amount = style.yellow(tx.amount.toString());
  const account = style.white.bold(tx.account);
  const text =
    tx.kind === "deposit"
      ? `deposited ${amount} into ${account}`
      : `withdrew ${amount} from ${account}`;
  return `${style.green("✓")} ${text}`;
}

/**
 * One header line, then one line per account with names padded to a column.
 */
export function formatLedger(
  balances: ReadonlyMap<AccountId, Amount>,
  style: ChalkInstance,
): readonly string[] {
  const header = style.cyan.bold("ledger:");
  if (balances.size === 0) {
    return [`${header} ${style.gray("(empty)")}`];
  }

  const width = Math.max(...[...balances.keys()].map((account) => account.length));
  const lines = [header];
  for (const [account, balance] of balances) {
    lines.push(`  ${style.white(account.padEnd(width))}  ${style.yellow(balance.toString())}`);
  }
  return lines;
}

export function formatError(err: LedgerError, style: ChalkInstance): string {
  return `${style.red("encountered error:")} ${err.message}`;
}

export function formatNotSupported(style: ChalkInstance): string {
  return style.yellow("command not supported");
}
