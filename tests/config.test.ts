import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      runTimeoutMs: 5000,
      compileTimeoutMs: 10_000,
      maxTimeoutMs: 30_000,
      outputLimitBytes: 65_536,
      batchConcurrency: 4,
      toolchain: { python: "python3", gcc: "gcc", gxx: "g++", javac: "javac", java: "java" },
    });
  });

  it("coerces numbers and overrides binaries", () => {
    const config = loadConfig({ PORT: "9001", JUDGE_BATCH_CONCURRENCY: "8", JUDGE_PYTHON_BIN: "/opt/py/bin/python3" });
    expect(config.port).toBe(9001);
    expect(config.batchConcurrency).toBe(8);
    expect(config.toolchain.python).toBe("/opt/py/bin/python3");
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ PORT: "  ", JUDGE_GCC_BIN: "" }).port).toBe(8000);
  });

  it("clamps the default run timeout to the maximum", () => {
    const config = loadConfig({ JUDGE_RUN_TIMEOUT_MS: "60000", JUDGE_MAX_TIMEOUT_MS: "20000" });
    expect(config.runTimeoutMs).toBe(20_000);
  });

  it("names every invalid key", () => {
    expect(() => loadConfig({ PORT: "abc", JUDGE_BATCH_CONCURRENCY: "0" })).toThrow(ConfigError);
    try {
      loadConfig({ PORT: "abc", JUDGE_BATCH_CONCURRENCY: "0" });
    } catch (err) {
      expect(err).toMatchObject({ name: "ConfigError" });
      expect(err instanceof ConfigError ? [...err.keys].sort() : []).toEqual(["JUDGE_BATCH_CONCURRENCY", "PORT"]);
    }
  });
});
