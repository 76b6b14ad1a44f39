import { describe, it, expect } from "vitest";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import {
  resolveConfig,
  resolveDataDir,
  validateConfig,
  parseKey,
  formatKey,
  parseMaxFileSize,
  DEFAULT_MAX_FILE_SIZE,
} from "./config.js";
import { ConfigurationError } from "./errors.js";

const HEX_KEY = "00".repeat(31) + "ff";

describe("resolveDataDir()", () => {
  it("should prefer the explicit value", () => {
    expect(resolveDataDir("/tmp/explicit", { STRONGBOX_DATA_DIR: "/tmp/env" })).toBe("/tmp/explicit");
  });

  it("should fall back to STRONGBOX_DATA_DIR, then ./data", () => {
    expect(resolveDataDir(undefined, { STRONGBOX_DATA_DIR: "/tmp/env" })).toBe("/tmp/env");
    expect(resolveDataDir(undefined, {})).toBe(resolve("./data"));
  });

  it("should expand a leading tilde", () => {
    expect(resolveDataDir("~/stores", {})).toBe(join(homedir(), "stores"));
    expect(resolveDataDir("~", {})).toBe(homedir());
  });
});

describe("parseKey()", () => {
  it("should decode 64 hex characters to 32 bytes", () => {
    const key = parseKey(HEX_KEY);
    expect(key).toHaveLength(32);
    expect(key[31]).toBe(255);
    expect(formatKey(key)).toBe(HEX_KEY);
  });

  it("should accept uppercase and surrounding whitespace", () => {
    expect(parseKey(`  ${HEX_KEY.toUpperCase()}\n`)).toHaveLength(32);
  });

  it("should reject the wrong length or non-hex text", () => {
    expect(() => parseKey("abcd")).toThrow("Configuration error: encryption key must be 64 hex characters");
    expect(() => parseKey("zz".repeat(32))).toThrow(ConfigurationError);
  });
});

describe("parseMaxFileSize()", () => {
  it("should parse positive integers", () => {
    expect(parseMaxFileSize("1024")).toBe(1024);
  });

  it("should reject zero, negatives and non-numbers", () => {
    expect(() => parseMaxFileSize("0")).toThrow(ConfigurationError);
    expect(() => parseMaxFileSize("-5")).toThrow(ConfigurationError);
    expect(() => parseMaxFileSize("10MB")).toThrow('max file size must be a positive integer, got "10MB"');
  });
});

describe("validateConfig()", () => {
  it("should accept a minimal config", () => {
    expect(() => validateConfig({ dataDir: "/tmp/x" })).not.toThrow();
  });

  it("should reject an empty data directory", () => {
    expect(() => validateConfig({ dataDir: "" })).toThrow("dataDir must be a non-empty string");
  });

  it("should reject a key of the wrong length", () => {
    expect(() => validateConfig({ dataDir: "/tmp/x", encryptionKey: new Uint8Array(8) })).toThrow(
      "encryption key must be 32 bytes, got 8"
    );
  });

  it("should reject a non-positive max file size", () => {
    expect(() => validateConfig({ dataDir: "/tmp/x", maxFileSize: 0 })).toThrow(ConfigurationError);
  });
});

describe("resolveConfig()", () => {
  it("should read every variable from the environment", () => {
    const config = resolveConfig({
      STRONGBOX_DATA_DIR: "/tmp/env",
      STRONGBOX_KEY: HEX_KEY,
      STRONGBOX_MAX_FILE_SIZE: "2048",
    });

    expect(config.dataDir).toBe("/tmp/env");
    expect(config.encryptionKey && formatKey(config.encryptionKey)).toBe(HEX_KEY);
    expect(config.maxFileSize).toBe(2048);
  });

  it("should default to plaintext and a 10 MiB limit", () => {
    const config = resolveConfig({});
    expect(config.encryptionKey).toBeUndefined();
    expect(config.maxFileSize).toBe(DEFAULT_MAX_FILE_SIZE);
    expect(DEFAULT_MAX_FILE_SIZE).toBe(10 * 1024 * 1024);
  });

  it("should let overrides win over the environment", () => {
    const key = new Uint8Array(32).fill(1);
    const config = resolveConfig(
      { STRONGBOX_DATA_DIR: "/tmp/env", STRONGBOX_KEY: HEX_KEY, STRONGBOX_MAX_FILE_SIZE: "2048" },
      { dataDir: "/tmp/override", encryptionKey: key, maxFileSize: 4096 }
    );

    expect(config.dataDir).toBe("/tmp/override");
    expect(config.encryptionKey).toBe(key);
    expect(config.maxFileSize).toBe(4096);
  });

  it("should treat a blank key as unset", () => {
    expect(resolveConfig({ STRONGBOX_KEY: "   " }).encryptionKey).toBeUndefined();
  });

  it("should fail on a malformed key", () => {
    expect(() => resolveConfig({ STRONGBOX_KEY: "short" })).toThrow(ConfigurationError);
  });
});
