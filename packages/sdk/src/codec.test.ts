import { describe, it, expect } from "vitest";
import { encode, rfc8949EncodeOptions } from "cborg";
import {
  encodeValue,
  decodeValue,
  encodeSnapshot,
  decodeSnapshot,
  SNAPSHOT_FORMAT_VERSION,
} from "./codec.js";
import { StoreRecord } from "./record.js";
import { Value, fields, fieldsEqual, valueEquals, MAX_VALUE_DEPTH } from "./value.js";
import { SerializationError } from "./errors.js";

describe("value codec", () => {
  it("should preserve every kind through encode and decode", () => {
    const value = Value.object({
      nothing: Value.null(),
      flag: Value.bool(true),
      count: Value.int(-12),
      big: Value.int(2n ** 63n - 1n),
      ratio: Value.float(0.25),
      name: Value.string("héllo"),
      raw: Value.bytes(new Uint8Array([0, 255])),
      list: Value.array([Value.int(1), Value.array([])]),
      inner: Value.object({}),
    });

    expect(valueEquals(decodeValue(encodeValue(value)), value)).toBe(true);
  });

  it("should keep a whole-number Float as Float", () => {
    const decoded = decodeValue(encodeValue(Value.float(3)));
    expect(decoded).toEqual(Value.float(3));
  });

  it("should keep negative zero and NaN bit-exact", () => {
    const zero = decodeValue(encodeValue(Value.float(-0)));
    expect(zero.kind === "float" && Object.is(zero.value, -0)).toBe(true);

    const nan = decodeValue(encodeValue(Value.float(NaN)));
    expect(nan.kind === "float" && Number.isNaN(nan.value)).toBe(true);
  });

  it("should always decode Int as bigint", () => {
    expect(decodeValue(encodeValue(Value.int(5)))).toEqual({ kind: "int", value: 5n });
  });

  it("should encode equal objects identically regardless of key order", () => {
    const a = Value.object({ x: Value.int(1), y: Value.int(2) });
    const b = Value.object({ y: Value.int(2), x: Value.int(1) });
    expect(Buffer.from(encodeValue(a)).equals(Buffer.from(encodeValue(b)))).toBe(true);
  });

  it("should reject unknown tags", () => {
    expect(() => decodeValue(encode([42, "x"], rfc8949EncodeOptions))).toThrow(
      "Serialization failed: value: unknown value tag 42"
    );
  });

  it("should reject a payload of the wrong type", () => {
    expect(() => decodeValue(encode([1, "yes"], rfc8949EncodeOptions))).toThrow(
      "Serialization failed: value: malformed payload for tag 1"
    );
  });

  it("should reject a float payload that is not 8 bytes", () => {
    expect(() => decodeValue(encode([3, new Uint8Array(4)], rfc8949EncodeOptions))).toThrow(
      SerializationError
    );
  });

  it("should reject garbage bytes", () => {
    expect(() => decodeValue(new Uint8Array([0xff, 0xff, 0xff]))).toThrow(SerializationError);
  });

  it("should reject encoded values nested beyond the maximum depth", () => {
    let raw: unknown = [0];
    for (let i = 0; i < MAX_VALUE_DEPTH; i++) {
      raw = [6, [raw]];
    }
    expect(() => decodeValue(encode(raw, rfc8949EncodeOptions))).toThrow(SerializationError);
  });
});

describe("snapshot codec", () => {
  it("should round-trip records with ids and timestamps", () => {
    const a = StoreRecord.restore("a", fields({ name: Value.string("a"), age: Value.int(25) }), 10, 20);
    const b = StoreRecord.restore("b", fields({}), 30, 30);

    const decoded = decodeSnapshot(encodeSnapshot([a, b]));

    expect([...decoded.keys()].sort()).toEqual(["a", "b"]);
    const first = decoded.get("a");
    expect(first?.createdAt).toBe(10);
    expect(first?.updatedAt).toBe(20);
    expect(first && fieldsEqual(first.data, a.data)).toBe(true);
    expect(decoded.get("b")?.data.size).toBe(0);
  });

  it("should decode an empty snapshot to an empty index", () => {
    expect(decodeSnapshot(encodeSnapshot([])).size).toBe(0);
  });

  it("should reject an unknown format version", () => {
    const bytes = encode([SNAPSHOT_FORMAT_VERSION + 1, new Map()], rfc8949EncodeOptions);
    expect(() => decodeSnapshot(bytes)).toThrow("unsupported snapshot format version: 2");
  });

  it("should reject a record tuple of the wrong shape", () => {
    const body = new Map([["a", [1, 2]]]);
    const bytes = encode([SNAPSHOT_FORMAT_VERSION, body], rfc8949EncodeOptions);
    expect(() => decodeSnapshot(bytes)).toThrow("record a must have 3 elements");
  });

  it("should wrap invalid timestamps as a serialization failure", () => {
    const body = new Map([["a", [20, 10, new Map()]]]);
    const bytes = encode([SNAPSHOT_FORMAT_VERSION, body], rfc8949EncodeOptions);
    expect(() => decodeSnapshot(bytes)).toThrow("Serialization failed: invalid snapshot");
  });

  it("should reject a truncated snapshot", () => {
    const bytes = encodeSnapshot([StoreRecord.restore("a", fields({ n: Value.int(1) }), 1, 1)]);
    expect(() => decodeSnapshot(bytes.subarray(0, bytes.length - 2))).toThrow(SerializationError);
  });
});
