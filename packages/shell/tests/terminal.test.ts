/**
 * Tests for the readline-backed terminal IO.
 */

import { describe, it, expect } from "vitest";
import { Readable, Writable } from "node:stream";
import { createTerminalIO } from "../src/terminal.js";

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

describe("createTerminalIO", () => {
  it("writes each label on its own line and reads one line per ask", async () => {
    const out = collector();
    const io = createTerminalIO(Readable.from(["deposit\nbob\n"]), out.stream);

    expect(await io.ask("Command:")).toBe("deposit");
    expect(await io.ask("Account:")).toBe("bob");
    expect(out.text()).toBe("Command:\nAccount:\n");

    io.close();
  });

  it("resolves undefined once input has ended", async () => {
    const io = createTerminalIO(Readable.from(["only\n"]), collector().stream);

    expect(await io.ask("First:")).toBe("only");
    expect(await io.ask("Second:")).toBeUndefined();

    io.close();
  });

  it("handles CRLF line endings", async () => {
    const io = createTerminalIO(Readable.from(["print\r\nquit\r\n"]), collector().stream);

    expect(await io.ask(">")).toBe("print");
    expect(await io.ask(">")).toBe("quit");

    io.close();
  });

  it("prints lines", () => {
    const out = collector();
    const io = createTerminalIO(Readable.from([]), out.stream);

    io.print("ledger: (empty)");

    expect(out.text()).toBe("ledger: (empty)\n");
    io.close();
  });
});
