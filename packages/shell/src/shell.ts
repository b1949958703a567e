/**
 * @tally/shell: Interactive ledger shell.
 *
 * Prompts for one of deposit, withdraw, send, print or quit, collects
 * the arguments, calls the ledger and reports back. Committed records
 * are appended to an in-memory transaction log. A rejected operation
 * is printed and the loop carries on.
 */

import { z } from "zod";
import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";
import { Ledger, LedgerError, parseAmount } from "@tally/ledger";
import type { Transaction } from "@tally/types";
import {
  COMMAND_PROMPT,
  formatError,
  formatLedger,
  formatNotSupported,
  formatTransaction,
} from "./format.js";

// =============================================================================
// Types
// =============================================================================

export const CommandSchema = z.enum(["deposit", "withdraw", "send", "print", "quit"]);

export type Command = z.infer<typeof CommandSchema>;

/**
 * Line-oriented terminal access.
 */
export interface ShellIO {
  /** Show the label and read one line. Resolves undefined once input has ended. */
  ask(label: string): Promise<string | undefined>;
  print(line: string): void;
}

/** Outcome of a single prompt cycle. */
export type StepResult =
  | { readonly kind: "confirmed"; readonly transactions: readonly Transaction[] }
  | { readonly kind: "print" }
  | { readonly kind: "not-supported"; readonly input: string }
  | { readonly kind: "failed"; readonly error: LedgerError }
  | { readonly kind: "quit" };

export interface LedgerShellOptions {
  readonly io: ShellIO;
  readonly logger: Logger;
  /** Defaults to a fresh, empty ledger. */
  readonly ledger?: Ledger | undefined;
  readonly style?: ChalkInstance | undefined;
}

const QUIT: StepResult = { kind: "quit" };

/** Input ended in the middle of a command. */
class EndOfInput extends Error {
  constructor() {
    super("Input ended");
    this.name = "EndOfInput";
  }
}

// =============================================================================
// Shell
// =============================================================================

export class LedgerShell {
  private readonly _ledger: Ledger;
  private readonly _io: ShellIO;
  private readonly _logger: Logger;
  private readonly _style: ChalkInstance;
  private readonly _log: Transaction[] = [];

  constructor(options: LedgerShellOptions) {
    this._ledger = options.ledger ?? new Ledger();
    this._io = options.io;
    this._logger = options.logger;
    this._style = options.style ?? chalk;
  }

  get ledger(): Ledger {
    return this._ledger;
  }

  /**
   * Every committed record, oldest first.
   */
  get transactions(): readonly Transaction[] {
    return [...this._log];
  }

  /**
   * Run prompt cycles until quit or end of input.
   * Returns the transaction log.
   */
  async run(): Promise<readonly Transaction[]> {
    this._logger.info("Shell session started");

    let result = await this.step();
    while (result.kind !== "quit") {
      result = await this.step();
    }

    this._logger.info(
      { transactions: this._log.length, accounts: this._ledger.accountCount },
      "Shell session ended",
    );
    return this.transactions;
  }

  /**
   * Run one prompt cycle.
   *
   * LedgerErrors are reported and returned as "failed".
   * Any other error propagates.
   */
  async step(): Promise<StepResult> {
    try {
      const input = await this._ask(COMMAND_PROMPT);
      const parsed = CommandSchema.safeParse(input);
      if (!parsed.success) {
        this._io.print(formatNotSupported(this._style));
        return { kind: "not-supported", input };
      }
      return await this._dispatch(parsed.data);
    } catch (err) {
      if (err instanceof EndOfInput) {
        return QUIT;
      }
      if (err instanceof LedgerError) {
        return this._reject(err);
      }
      throw err;
    }
  }

  private async _dispatch(command: Command): Promise<StepResult> {
    switch (command) {
      case "deposit": {
        const account = await this._ask("Account:");
        const amount = parseAmount(await this._ask("Amount:"));
        return this._confirm([this._ledger.deposit(account, amount)]);
      }
      case "withdraw": {
        const account = await this._ask("Account:");
        const amount = parseAmount(await this._ask("Amount:"));
        return this._confirm([this._ledger.withdraw(account, amount)]);
      }
      case "send": {
        const sender = await this._ask("Sender:");
        const amount = parseAmount(await this._ask("Amount:"));
        const recipient = await this._ask("Receiver:");
        return this._confirm(this._ledger.send(sender, recipient, amount));
      }
      case "print": {
        for (const line of formatLedger(this._ledger.balances(), this._style)) {
          this._io.print(line);
        }
        return { kind: "print" };
      }
      case "quit":
        return QUIT;
    }
  }

  private async _ask(label: string): Promise<string> {
    const answer = await this._io.ask(label);
    if (answer === undefined) {
      throw new EndOfInput();
    }
    return answer.trim();
  }

  private _confirm(transactions: readonly Transaction[]): StepResult {
    for (const tx of transactions) {
      this._log.push(tx);
      this._io.print(formatTransaction(tx, this._style));
      this._logger.info(
        { kind: tx.kind, account: tx.account, amount: tx.amount.toString() },
        "Transaction committed",
      );
    }
    return { kind: "confirmed", transactions };
  }

  private _reject(err: LedgerError): StepResult {
    this._io.print(formatError(err, this._style));
    this._logger.warn(
      { code: err.code, account: err.account, amount: err.amount?.toString() },
      "Operation rejected",
    );
    return { kind: "failed", error: err };
  }
}
