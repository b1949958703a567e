/**
 * Tests for config.ts: loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.LOG_LEVEL).toBe("warn");
    expect(config.NODE_ENV).toBe("production");
    expect(config.SHELL_COLOR).toBe("auto");
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      NODE_ENV: "development",
      SHELL_COLOR: "never",
    });
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("development");
    expect(config.SHELL_COLOR).toBe("never");
  });

  it("accepts silent logging", () => {
    expect(loadConfig({ LOG_LEVEL: "silent" }).LOG_LEVEL).toBe("silent");
  });

  it("ignores unrelated variables", () => {
    const config = loadConfig({ HOME: "/home/test", PATH: "/usr/bin" });
    expect(config).toEqual({ LOG_LEVEL: "warn", NODE_ENV: "production", SHELL_COLOR: "auto" });
  });

  it("throws on invalid LOG_LEVEL", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ZodError);
  });

  it("throws on invalid SHELL_COLOR", () => {
    expect(() => loadConfig({ SHELL_COLOR: "rainbow" })).toThrow(ZodError);
  });
});
