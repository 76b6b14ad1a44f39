/**
 * Binary snapshot codec (CBOR via cborg, RFC 8949 deterministic encoding)
 *
 * Snapshot layout:
 *   [FORMAT_VERSION, { id → [createdAt, updatedAt, { field → value }] }]
 *
 * Value layout is a tagged pair `[tag, payload]`:
 *   0 null      (no payload)
 *   1 bool      boolean
 *   2 int       CBOR integer (always decoded back to bigint)
 *   3 float     8-byte big-endian IEEE 754 double (bit-exact, keeps -0 and NaN)
 *   4 string    text string
 *   5 bytes     byte string
 *   6 array     array of tagged values
 *   7 object    map of text key → tagged value
 *
 * The tag keeps Int and Float distinct across a round trip.
 */

import { decode as cborDecode, encode as cborEncode, rfc8949EncodeOptions } from "cborg";
import { SerializationError } from "./errors.js";
import { StoreRecord, type RecordView } from "./record.js";
import { MAX_VALUE_DEPTH, Value, type Fields, type ValueKind } from "./value.js";

export const SNAPSHOT_FORMAT_VERSION = 1;

const TAGS = {
  null: 0,
  bool: 1,
  int: 2,
  float: 3,
  string: 4,
  bytes: 5,
  array: 6,
  object: 7,
} as const satisfies Record<ValueKind, number>;

type EncodedValue = [number] | [number, unknown];

function floatToBytes(value: number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setFloat64(0, value);
  return out;
}

function bytesToFloat(bytes: Uint8Array): number {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getFloat64(0);
}

function toEncoded(value: Value, depth: number): EncodedValue {
  if (depth > MAX_VALUE_DEPTH) {
    throw new SerializationError(`value nesting exceeds maximum depth of ${MAX_VALUE_DEPTH}`);
  }

  switch (value.kind) {
    case "null":
      return [TAGS.null];
    case "bool":
      return [TAGS.bool, value.value];
    case "int":
      return [TAGS.int, value.value];
    case "float":
      return [TAGS.float, floatToBytes(value.value)];
    case "string":
      return [TAGS.string, value.value];
    case "bytes":
      return [TAGS.bytes, value.value];
    case "array":
      return [TAGS.array, value.items.map((item) => toEncoded(item, depth + 1))];
    case "object":
      return [TAGS.object, toEncodedFields(value.entries, depth + 1)];
  }
}

function toEncodedFields(fields: Fields, depth: number): Map<string, EncodedValue> {
  const out = new Map<string, EncodedValue>();
  for (const [key, value] of fields) {
    out.set(key, toEncoded(value, depth));
  }
  return out;
}

function expectMap(raw: unknown, context: string): Map<unknown, unknown> {
  if (!(raw instanceof Map)) {
    throw new SerializationError(`${context} must be a map`);
  }
  return raw;
}

function expectArray(raw: unknown, context: string): unknown[] {
  if (!Array.isArray(raw)) {
    throw new SerializationError(`${context} must be an array`);
  }
  return raw;
}

function expectInteger(raw: unknown, context: string): number {
  if (typeof raw !== "number" || !Number.isSafeInteger(raw)) {
    throw new SerializationError(`${context} must be a safe integer`);
  }
  return raw;
}

function fromEncoded(raw: unknown, depth: number, context: string): Value {
  if (depth > MAX_VALUE_DEPTH) {
    throw new SerializationError(`${context}: nesting exceeds maximum depth of ${MAX_VALUE_DEPTH}`);
  }

  const pair = expectArray(raw, context);
  const [tag, payload] = pair;
  const arity = tag === TAGS.null ? 1 : 2;
  if (pair.length !== arity) {
    throw new SerializationError(`${context}: tag ${String(tag)} expects ${arity} element(s)`);
  }

  switch (tag) {
    case TAGS.null:
      return Value.null();
    case TAGS.bool:
      if (typeof payload !== "boolean") break;
      return Value.bool(payload);
    case TAGS.int:
      if (typeof payload === "bigint") return Value.int(payload);
      if (typeof payload === "number" && Number.isSafeInteger(payload)) return Value.int(payload);
      break;
    case TAGS.float:
      if (!(payload instanceof Uint8Array) || payload.length !== 8) break;
      return Value.float(bytesToFloat(payload));
    case TAGS.string:
      if (typeof payload !== "string") break;
      return Value.string(payload);
    case TAGS.bytes:
      if (!(payload instanceof Uint8Array)) break;
      return Value.bytes(payload);
    case TAGS.array: {
      const items = expectArray(payload, context);
      return Value.array(items.map((item, i) => fromEncoded(item, depth + 1, `${context}[${i}]`)));
    }
    case TAGS.object:
      return Value.object(fromEncodedFields(payload, depth + 1, context));
    default:
      throw new SerializationError(`${context}: unknown value tag ${String(tag)}`);
  }

  throw new SerializationError(`${context}: malformed payload for tag ${String(tag)}`);
}

function fromEncodedFields(raw: unknown, depth: number, context: string): Map<string, Value> {
  const out = new Map<string, Value>();
  for (const [key, item] of expectMap(raw, context)) {
    if (typeof key !== "string") {
      throw new SerializationError(`${context}: field names must be strings`);
    }
    out.set(key, fromEncoded(item, depth, `${context}.${key}`));
  }
  return out;
}

function decodeCbor(bytes: Uint8Array): unknown {
  try {
    return cborDecode(bytes, { useMaps: true });
  } catch (err) {
    throw new SerializationError("invalid CBOR payload", { cause: err });
  }
}

/**
 * Encode a single value
 * @throws SerializationError if the value nests deeper than MAX_VALUE_DEPTH
 */
export function encodeValue(value: Value): Uint8Array {
  return cborEncode(toEncoded(value, 1), rfc8949EncodeOptions);
}

/**
 * Decode a single value produced by `encodeValue`
 * @throws SerializationError for any malformed input
 */
export function decodeValue(bytes: Uint8Array): Value {
  try {
    return fromEncoded(decodeCbor(bytes), 1, "value");
  } catch (err) {
    if (err instanceof SerializationError) throw err;
    throw new SerializationError("invalid value", { cause: err });
  }
}

/**
 * Encode a table's records as one snapshot
 */
export function encodeSnapshot(records: Iterable<RecordView>): Uint8Array {
  const body = new Map<string, [number, number, Map<string, EncodedValue>]>();
  for (const record of records) {
    body.set(record.id, [record.createdAt, record.updatedAt, toEncodedFields(record.data, 1)]);
  }
  return cborEncode([SNAPSHOT_FORMAT_VERSION, body], rfc8949EncodeOptions);
}

/**
 * Decode a snapshot back into an id → record index
 * @throws SerializationError for any malformed or unsupported snapshot
 */
export function decodeSnapshot(bytes: Uint8Array): Map<string, StoreRecord> {
  try {
    const root = expectArray(decodeCbor(bytes), "snapshot");
    const [version, body] = root;
    if (root.length !== 2 || version !== SNAPSHOT_FORMAT_VERSION) {
      throw new SerializationError(`unsupported snapshot format version: ${String(version)}`);
    }

    const records = new Map<string, StoreRecord>();
    for (const [id, entry] of expectMap(body, "snapshot.records")) {
      if (typeof id !== "string") {
        throw new SerializationError("record ids must be strings");
      }
      const context = `record ${id}`;
      const tuple = expectArray(entry, context);
      if (tuple.length !== 3) {
        throw new SerializationError(`${context} must have 3 elements`);
      }
      const [createdAt, updatedAt, data] = tuple;
      records.set(
        id,
        StoreRecord.restore(
          id,
          fromEncodedFields(data, 1, context),
          expectInteger(createdAt, `${context}.createdAt`),
          expectInteger(updatedAt, `${context}.updatedAt`)
        )
      );
    }
    return records;
  } catch (err) {
    if (err instanceof SerializationError) throw err;
    // ValueError from restore/constructors, RangeError from deep recursion
    throw new SerializationError("invalid snapshot", { cause: err });
  }
}
