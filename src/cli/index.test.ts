import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../config";
import { applyCliOverrides, getHelpText, parseCliArgs } from "./index";

describe("parseCliArgs", () => {
  it("reads a crawl invocation", () => {
    const parsed = parseCliArgs([
      "crawl",
      "--regions",
      "赣州市，吉安市, 上饶市",
      "--year",
      "2023",
      "--workers",
      "4",
      "--strict-title",
    ]);
    expect(parsed).toEqual({
      command: "crawl",
      apply: false,
      ignoreHttpsErrors: false,
      strictTitle: true,
      retryUnresolved: false,
      regions: ["赣州市", "吉安市", "上饶市"],
      year: 2023,
      workers: 4,
      configPath: undefined,
    });
  });

  it("falls back to help", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["bogus"])).toBe("help");
    expect(parseCliArgs(["status", "-h"])).toBe("help");
  });

  it("lists every command in the help text", () => {
    const help = getHelpText();
    for (const command of ["crawl", "test", "verify-mappings", "status"]) {
      expect(help).toContain(`  ${command} `);
    }
  });
});

describe("applyCliOverrides", () => {
  it("overrides only what was given", () => {
    const parsed = parseCliArgs(["verify-mappings", "--apply", "--year", "2023"]);
    if (parsed === "help") {
      throw new Error("expected a command");
    }
    const config = applyCliOverrides(DEFAULT_CONFIG, parsed);
    expect(parsed.apply).toBe(true);
    expect(config.targetYear).toBe(2023);
    expect(config.workers).toBe(DEFAULT_CONFIG.workers);
    expect(config.requireFinanceTitle).toBe(false);
  });
});
