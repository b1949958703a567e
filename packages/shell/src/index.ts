/**
 * @tally/shell: Interactive terminal front end for @tally/ledger.
 */

export { LedgerShell, CommandSchema } from "./shell.js";
export type { Command, ShellIO, StepResult, LedgerShellOptions } from "./shell.js";
export { createTerminalIO } from "./terminal.js";
export type { TerminalIO } from "./terminal.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { ShellConfig } from "./config.js";
export { createLogger, logFatal } from "./logger.js";
export {
  COMMAND_PROMPT,
  createStyle,
  formatTransaction,
  formatLedger,
  formatError,
  formatNotSupported,
} from "./format.js";
