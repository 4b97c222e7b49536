import { describe, expect, it } from "vitest";
import { resolveLogLevels } from "./log-levels.js";

describe("resolveLogLevels", () => {
  it("defaults to log when unset", () => {
    expect(resolveLogLevels(undefined)).toEqual(["fatal", "error", "warn", "log"]);
  });

  it("maps info to log", () => {
    expect(resolveLogLevels("info")).toEqual(resolveLogLevels("log"));
  });

  it("normalizes case and whitespace", () => {
    expect(resolveLogLevels("  DEBUG ")).toEqual(["fatal", "error", "warn", "log", "debug"]);
  });

  it("falls back to log for unknown values", () => {
    expect(resolveLogLevels("trace")).toEqual(["fatal", "error", "warn", "log"]);
  });
});
