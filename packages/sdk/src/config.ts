/**
 * Store configuration and environment resolution
 *
 * Environment variables:
 * - STRONGBOX_DATA_DIR: data directory (default "./data", "~" expanded)
 * - STRONGBOX_KEY: 256-bit encryption key as 64 hex characters (unset = plaintext)
 * - STRONGBOX_MAX_FILE_SIZE: maximum snapshot size in bytes
 */

import { homedir } from "node:os";
import * as path from "node:path";
import { KEY_LENGTH } from "./cipher.js";
import { ConfigurationError } from "./errors.js";
import type { Clock } from "./record.js";

export const DEFAULT_DATA_DIR = "./data";

/** 10 MiB */
export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

export interface StoreConfig {
  /** Directory holding one `<table>.db` file per table */
  dataDir: string;
  /** 32-byte key; when absent, snapshots are stored unencrypted */
  encryptionKey?: Uint8Array;
  /** Largest snapshot (after encryption) a save may write, in bytes */
  maxFileSize?: number;
  /** Timestamp source for records (seconds since epoch) */
  clock?: Clock;
}

export type Environment = Record<string, string | undefined>;

const HEX_KEY_PATTERN = new RegExp(`^[0-9a-fA-F]{${KEY_LENGTH * 2}}$`);

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~[\\/](.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  return path.join(homedir(), match[1] ?? "");
}

/**
 * Resolve a data directory to an absolute path
 * Priority: explicit value > STRONGBOX_DATA_DIR > "./data"
 */
export function resolveDataDir(explicit?: string, env: Environment = process.env): string {
  const dir = explicit ?? env.STRONGBOX_DATA_DIR ?? DEFAULT_DATA_DIR;
  return path.resolve(expandTilde(dir));
}

/**
 * Parse a hex-encoded 256-bit key
 * @throws ConfigurationError if the text is not exactly 64 hex characters
 */
export function parseKey(text: string): Uint8Array {
  const trimmed = text.trim();
  if (!HEX_KEY_PATTERN.test(trimmed)) {
    throw new ConfigurationError(`encryption key must be ${KEY_LENGTH * 2} hex characters`);
  }
  return new Uint8Array(Buffer.from(trimmed, "hex"));
}

export function formatKey(key: Uint8Array): string {
  return Buffer.from(key).toString("hex");
}

/**
 * Parse a positive byte count
 * @throws ConfigurationError for anything but a positive integer
 */
export function parseMaxFileSize(text: string): number {
  const trimmed = text.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`max file size must be a positive integer, got "${text}"`);
  }
  return parsed;
}

/**
 * Check a config assembled in code
 * @throws ConfigurationError on invalid values
 */
export function validateConfig(config: StoreConfig): void {
  if (!config.dataDir) {
    throw new ConfigurationError("dataDir must be a non-empty string");
  }

  if (config.encryptionKey !== undefined && config.encryptionKey.length !== KEY_LENGTH) {
    throw new ConfigurationError(
      `encryption key must be ${KEY_LENGTH} bytes, got ${config.encryptionKey.length}`
    );
  }

  if (
    config.maxFileSize !== undefined &&
    (!Number.isSafeInteger(config.maxFileSize) || config.maxFileSize <= 0)
  ) {
    throw new ConfigurationError(`maxFileSize must be a positive integer, got ${config.maxFileSize}`);
  }
}

/**
 * Build a store config from environment variables, with explicit overrides winning
 */
export function resolveConfig(
  env: Environment = process.env,
  overrides: Partial<StoreConfig> = {}
): StoreConfig {
  const keyText = env.STRONGBOX_KEY?.trim();
  const sizeText = env.STRONGBOX_MAX_FILE_SIZE?.trim();

  const config: StoreConfig = {
    dataDir: resolveDataDir(overrides.dataDir, env),
    encryptionKey: overrides.encryptionKey ?? (keyText ? parseKey(keyText) : undefined),
    maxFileSize:
      overrides.maxFileSize ?? (sizeText ? parseMaxFileSize(sizeText) : DEFAULT_MAX_FILE_SIZE),
    clock: overrides.clock,
  };

  validateConfig(config);
  return config;
}
