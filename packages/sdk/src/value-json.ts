/**
 * Conversion between JSON payloads and typed Values
 *
 * Used by request dispatchers and the CLI. Mapping:
 * - safe integers → Int, other finite numbers → Float
 * - `{"$bytes": "<base64>"}` ↔ Bytes
 * - Int outside the safe-integer range → decimal string on the way out
 * - non-finite Float → null on the way out
 */

import { ValueError } from "./errors.js";
import { MAX_VALUE_DEPTH, Value, type Fields } from "./value.js";
import type { RecordView } from "./record.js";

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export interface RecordJson {
  id: string;
  created_at: number;
  updated_at: number;
  data: { [key: string]: JsonValue };
}

const BYTES_KEY = "$bytes";
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

function isPlainObject(json: unknown): json is Record<string, unknown> {
  return typeof json === "object" && json !== null && !Array.isArray(json);
}

function bytesFromJson(obj: Record<string, unknown>): Uint8Array | undefined {
  const keys = Object.keys(obj);
  if (keys.length !== 1 || keys[0] !== BYTES_KEY) return undefined;

  const encoded = obj[BYTES_KEY];
  if (typeof encoded !== "string" || encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    throw new ValueError(`"${BYTES_KEY}" must be a base64 string`);
  }
  return new Uint8Array(Buffer.from(encoded, "base64"));
}

/**
 * Convert a parsed JSON value to a Value
 * @throws ValueError for non-JSON input or nesting beyond MAX_VALUE_DEPTH
 */
export function valueFromJson(json: unknown, depth = 1): Value {
  if (depth > MAX_VALUE_DEPTH) {
    throw new ValueError(`nesting depth exceeds maximum of ${MAX_VALUE_DEPTH}`);
  }

  if (json === null) return Value.null();

  switch (typeof json) {
    case "boolean":
      return Value.bool(json);
    case "number":
      if (!Number.isFinite(json)) {
        throw new ValueError(`${json} is not representable in JSON`);
      }
      return Number.isSafeInteger(json) ? Value.int(json) : Value.float(json);
    case "string":
      return Value.string(json);
  }

  if (Array.isArray(json)) {
    return Value.array(json.map((item: unknown) => valueFromJson(item, depth + 1)));
  }

  if (isPlainObject(json)) {
    const bytes = bytesFromJson(json);
    if (bytes) return Value.bytes(bytes);

    const entries = new Map<string, Value>();
    for (const [key, item] of Object.entries(json)) {
      entries.set(key, valueFromJson(item, depth + 1));
    }
    return Value.object(entries);
  }

  throw new ValueError(`unsupported JSON type: ${typeof json}`);
}

/**
 * Convert a Value to a JSON-safe value
 */
export function valueToJson(value: Value): JsonValue {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "string":
      return value.value;
    case "int": {
      const n = value.value;
      const safe = n >= BigInt(Number.MIN_SAFE_INTEGER) && n <= BigInt(Number.MAX_SAFE_INTEGER);
      return safe ? Number(n) : n.toString();
    }
    case "float":
      return Number.isFinite(value.value) ? value.value : null;
    case "bytes":
      return { [BYTES_KEY]: Buffer.from(value.value).toString("base64") };
    case "array":
      return value.items.map(valueToJson);
    case "object":
      return fieldsToJson(value.entries);
  }
}

/**
 * Convert a JSON object payload to a record's field map
 * @throws ValueError if the payload is not a JSON object
 */
export function fieldsFromJson(json: unknown): Fields {
  if (!isPlainObject(json)) {
    throw new ValueError("record data must be a JSON object");
  }

  const out = new Map<string, Value>();
  for (const [key, item] of Object.entries(json)) {
    out.set(key, valueFromJson(item));
  }
  return out;
}

export function fieldsToJson(fields: Fields): { [key: string]: JsonValue } {
  // fromEntries defines own properties, so a "__proto__" field stays a field
  return Object.fromEntries([...fields].map(([key, value]): [string, JsonValue] => [key, valueToJson(value)]));
}

export function recordToJson(record: RecordView): RecordJson {
  return {
    id: record.id,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
    data: fieldsToJson(record.data),
  };
}
