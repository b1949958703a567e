/**
 * readline-backed ShellIO over stdin/stdout.
 *
 * Each label is written on its own line, then one input line is read.
 * End of input resolves undefined rather than rejecting.
 */

import { createInterface } from "node:readline";
import type { ShellIO } from "./shell.js";

export interface TerminalIO extends ShellIO {
  close(): void;
}

export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): TerminalIO {
  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
  // Created up front so lines arriving before the first ask are kept.
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(label: string): Promise<string | undefined> {
      output.write(`${label}\n`);
      const next = await lines.next();
      return next.done === true ? undefined : next.value;
    },
    print(line: string): void {
      output.write(`${line}\n`);
    },
    close(): void {
      rl.close();
    },
  };
}
