/**
 * Tests for config.ts and logger.ts.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, tryLoadConfig } from "../src/config.js";
import { createLogger, silentLogger } from "../src/logger.js";

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "warn",
      NODE_ENV: "production",
      CHAIN_REGISTRY_EXTRA: undefined,
    });
  });

  it("reads explicit values", () => {
    const config = loadConfig({
      LOG_LEVEL: "debug",
      NODE_ENV: "test",
      CHAIN_REGISTRY_EXTRA: "/etc/chainprobe/extra.json",
    });
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("test");
    expect(config.CHAIN_REGISTRY_EXTRA).toBe("/etc/chainprobe/extra.json");
  });

  it("accepts silent as a log level", () => {
    expect(loadConfig({ LOG_LEVEL: "silent" }).LOG_LEVEL).toBe("silent");
  });

  it("treats a blank registry path as unset", () => {
    expect(loadConfig({ CHAIN_REGISTRY_EXTRA: "  " }).CHAIN_REGISTRY_EXTRA).toBeUndefined();
  });

  it("throws on an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });

  it("throws on an unknown NODE_ENV", () => {
    expect(() => loadConfig({ NODE_ENV: "staging" })).toThrow();
  });
});

describe("tryLoadConfig", () => {
  it("returns the parsed configuration", () => {
    expect(tryLoadConfig({ LOG_LEVEL: "info" })._unsafeUnwrap().LOG_LEVEL).toBe("info");
  });

  it("returns the validation error instead of throwing", () => {
    const error = tryLoadConfig({ LOG_LEVEL: "verbose" })._unsafeUnwrapErr();
    expect(error.issues[0]?.path).toEqual(["LOG_LEVEL"]);
  });
});

// =============================================================================
// Logger
// =============================================================================

describe("createLogger", () => {
  it("uses the configured level", () => {
    expect(createLogger({ LOG_LEVEL: "error", NODE_ENV: "production" }).level).toBe("error");
  });

  it("silentLogger discards everything", () => {
    const logger = silentLogger();
    expect(logger.level).toBe("silent");
    expect(logger.isLevelEnabled("fatal")).toBe(false);
  });
});
