#!/usr/bin/env node
/**
 * @tally/shell: Entry point.
 *
 * Loads config, builds the logger and terminal IO, and runs one
 * shell session over a fresh ledger until quit or end of input.
 */

import { loadConfig } from "./config.js";
import type { Logger } from "pino";
import { createLogger, logFatal } from "./logger.js";
import { createStyle } from "./format.js";
import { createTerminalIO } from "./terminal.js";
import { LedgerShell } from "./shell.js";

let logger: Logger | undefined;

async function main(): Promise<void> {
  const config = loadConfig();
  logger = createLogger(config);
  const io = createTerminalIO();

  const shell = new LedgerShell({
    io,
    logger,
    style: createStyle(config.SHELL_COLOR),
  });

  try {
    await shell.run();
  } finally {
    io.close();
  }
}

main().catch((err: unknown) => {
  logFatal(err, logger);
  process.exit(1);
});
