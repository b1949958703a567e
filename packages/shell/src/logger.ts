/**
 * Structured logging for the shell.
 *
 * pino writes to stderr so log lines never interleave with the
 * prompts and results written to stdout.
 */

import { destination, pino } from "pino";
import type { Logger } from "pino";
import type { ShellConfig } from "./config.js";

const STDERR = 2;

export function createLogger(
  config: Pick<ShellConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR } },
    });
  }

  return pino({ level: config.LOG_LEVEL }, destination(STDERR));
}

/**
 * Report an error that ends the process. Falls back to stderr when no
 * logger was built yet or the configured level drops fatal lines.
 */
export function logFatal(err: unknown, logger: Logger | undefined): void {
  if (logger === undefined || !logger.isLevelEnabled("fatal")) {
    // eslint-disable-next-line no-console
    console.error("Fatal error:", err);
    return;
  }

  logger.fatal({ err }, "Fatal error");
}
