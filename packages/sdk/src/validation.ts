/**
 * Validation utilities for store operations
 */

import { ConfigurationError } from "./errors.js";

/**
 * Table names become file stems, so they are restricted to a portable, traversal-free set
 */
const VALID_TABLE_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export const MAX_TABLE_NAME_LENGTH = 64;

/**
 * Windows reserved device names (case-insensitive)
 */
const WINDOWS_RESERVED_NAMES = new Set([
  "con",
  "prn",
  "aux",
  "nul",
  ...Array.from({ length: 9 }, (_, i) => `com${i + 1}`),
  ...Array.from({ length: 9 }, (_, i) => `lpt${i + 1}`),
]);

export function isValidTableName(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= MAX_TABLE_NAME_LENGTH &&
    VALID_TABLE_NAME.test(name) &&
    !WINDOWS_RESERVED_NAMES.has(name.toLowerCase())
  );
}

/**
 * Validate a table name
 * @throws ConfigurationError if invalid
 */
export function validateTableName(name: string): void {
  if (!name) {
    throw new ConfigurationError("table name must be a non-empty string");
  }

  if (name.length > MAX_TABLE_NAME_LENGTH) {
    throw new ConfigurationError(
      `table name exceeds ${MAX_TABLE_NAME_LENGTH} characters: "${name.slice(0, 16)}..."`
    );
  }

  if (!VALID_TABLE_NAME.test(name)) {
    throw new ConfigurationError(
      `table name contains invalid characters: "${name}". ` +
        `Only alphanumeric, underscore and dash are allowed, starting with a letter or digit.`
    );
  }

  if (WINDOWS_RESERVED_NAMES.has(name.toLowerCase())) {
    throw new ConfigurationError(`table name cannot be a Windows reserved name: "${name}"`);
  }
}
