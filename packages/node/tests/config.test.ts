/**
 * Tests for config.ts — parseApiKeys + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { parseApiKeys, loadConfig } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    const keys = parseApiKeys("abc123:admin:alice");
    expect(keys).toEqual([
      { key: "abc123", role: "admin", accountId: "alice" },
    ]);
  });

  it("parses multiple comma-separated entries", () => {
    const keys = parseApiKeys("k1:admin:t1,k2:operator:t2,k3:viewer:t3");
    expect(keys).toHaveLength(3);
    expect(keys[0]).toEqual({ key: "k1", role: "admin", accountId: "t1" });
    expect(keys[1]).toEqual({ key: "k2", role: "operator", accountId: "t2" });
    expect(keys[2]).toEqual({ key: "k3", role: "viewer", accountId: "t3" });
  });

  it("trims whitespace around entries", () => {
    const keys = parseApiKeys("  k1:admin:t1 , k2:viewer:t2  ");
    expect(keys).toHaveLength(2);
    expect(keys.map((k) => k.key)).toEqual(["k1", "k2"]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c:d")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(":admin:t1")).toThrow("API key cannot be empty");
  });

  it("throws on invalid role", () => {
    expect(() => parseApiKeys("k1:superuser:t1")).toThrow("Invalid role");
  });

  it("throws on empty account ID", () => {
    expect(() => parseApiKeys("k1:admin:")).toThrow(
      "Account ID cannot be empty",
    );
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.ADMIN_ACCOUNT).toBe("admin");
    expect(config.CUSTODY_ACCOUNT).toBe("custody");
    expect(config.FEE_RECIPIENT).toBe("treasury");
    expect(config.CREATION_FEE).toBe(0n);
    expect(config.EXTENSION_FEE).toBe(0n);
    expect(config.FEE_EXEMPT_ACCOUNTS).toEqual([]);
    expect(config.DATA_DIR).toBeUndefined();
    expect(config.SANDBOX_ENABLED).toBe(false);
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
  });

  it("throws on invalid PORT", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
  });

  it("parses fees as bigint", () => {
    const config = loadConfig({ CREATION_FEE: "250", EXTENSION_FEE: "100000000" });
    expect(config.CREATION_FEE).toBe(250n);
    expect(config.EXTENSION_FEE).toBe(100_000_000n);
  });

  it("rejects fees above the ceiling or not integral", () => {
    expect(() => loadConfig({ CREATION_FEE: "100000001" })).toThrow();
    expect(() => loadConfig({ EXTENSION_FEE: "-1" })).toThrow();
    expect(() => loadConfig({ EXTENSION_FEE: "1.5" })).toThrow();
  });

  it("splits the fee exempt account list", () => {
    const config = loadConfig({ FEE_EXEMPT_ACCOUNTS: " carol, bob ,," });
    expect(config.FEE_EXEMPT_ACCOUNTS).toEqual(["carol", "bob"]);
  });

  it("enables the sandbox only for \"true\"", () => {
    expect(loadConfig({ SANDBOX_ENABLED: "true" }).SANDBOX_ENABLED).toBe(true);
    expect(loadConfig({ SANDBOX_ENABLED: "yes" }).SANDBOX_ENABLED).toBe(false);
  });
});
