/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { fieldsFromJson, parseKey, StrongboxError, type Fields } from "@strongbox/sdk";

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse `--data` into record fields (a JSON object)
 */
export function parseRecordData(value: string): Fields {
  const json = parseJson(value, "--data");
  try {
    return fieldsFromJson(json);
  } catch (err) {
    if (err instanceof StrongboxError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}

/**
 * Parse `--key` as a 64-character hex key
 */
export function parseKeyOption(value: string): Uint8Array {
  try {
    return parseKey(value);
  } catch (err) {
    if (err instanceof StrongboxError) {
      throw new InvalidArgumentError(err.message);
    }
    throw err;
  }
}
