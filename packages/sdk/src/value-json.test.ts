import { describe, it, expect } from "vitest";
import {
  valueFromJson,
  valueToJson,
  fieldsFromJson,
  fieldsToJson,
  recordToJson,
} from "./value-json.js";
import { Value, fields, valueEquals } from "./value.js";
import { StoreRecord } from "./record.js";
import { ValueError } from "./errors.js";

describe("valueFromJson()", () => {
  it("should map safe integers to Int and other numbers to Float", () => {
    expect(valueFromJson(25)).toEqual(Value.int(25));
    expect(valueFromJson(-3)).toEqual(Value.int(-3));
    expect(valueFromJson(5999.99)).toEqual(Value.float(5999.99));
    expect(valueFromJson(2 ** 60)).toEqual(Value.float(2 ** 60));
  });

  it("should map scalars and containers", () => {
    const value = valueFromJson({ tags: ["a", true, null], nested: { ok: false } });
    const expected = Value.object({
      tags: Value.array([Value.string("a"), Value.bool(true), Value.null()]),
      nested: Value.object({ ok: Value.bool(false) }),
    });
    expect(valueEquals(value, expected)).toBe(true);
  });

  it("should decode a $bytes wrapper", () => {
    expect(valueFromJson({ $bytes: "AQID" })).toEqual(Value.bytes(new Uint8Array([1, 2, 3])));
  });

  it("should treat $bytes alongside other keys as a plain object", () => {
    const value = valueFromJson({ $bytes: "AQID", other: 1 });
    expect(value.kind).toBe("object");
  });

  it("should reject a malformed $bytes payload", () => {
    expect(() => valueFromJson({ $bytes: "not base64!" })).toThrow('"$bytes" must be a base64 string');
    expect(() => valueFromJson({ $bytes: 12 })).toThrow(ValueError);
  });

  it("should reject non-finite numbers and non-JSON types", () => {
    expect(() => valueFromJson(Infinity)).toThrow(ValueError);
    expect(() => valueFromJson(undefined)).toThrow("unsupported JSON type: undefined");
  });

  it("should reject nesting beyond the maximum depth", () => {
    let json: unknown = 1;
    for (let i = 0; i < 64; i++) {
      json = [json];
    }
    expect(() => valueFromJson(json)).toThrow(ValueError);
  });
});

describe("valueToJson()", () => {
  it("should emit safe integers as numbers and large ones as strings", () => {
    expect(valueToJson(Value.int(42))).toBe(42);
    expect(valueToJson(Value.int(2n ** 62n))).toBe("4611686018427387904");
  });

  it("should emit non-finite floats as null", () => {
    expect(valueToJson(Value.float(NaN))).toBeNull();
    expect(valueToJson(Value.float(-Infinity))).toBeNull();
    expect(valueToJson(Value.float(0.5))).toBe(0.5);
  });

  it("should wrap bytes as base64", () => {
    expect(valueToJson(Value.bytes(new Uint8Array([1, 2, 3])))).toEqual({ $bytes: "AQID" });
  });

  it("should convert nested containers", () => {
    const value = Value.object({ list: Value.array([Value.int(1), Value.null()]) });
    expect(valueToJson(value)).toEqual({ list: [1, null] });
  });
});

describe("fieldsFromJson()", () => {
  it("should convert a JSON object to a field map", () => {
    const data = fieldsFromJson({ name: "a", age: 25 });
    expect(data.get("name")).toEqual(Value.string("a"));
    expect(data.get("age")).toEqual(Value.int(25));
    expect(data.size).toBe(2);
  });

  it("should reject anything but an object", () => {
    expect(() => fieldsFromJson([1, 2])).toThrow("record data must be a JSON object");
    expect(() => fieldsFromJson("text")).toThrow(ValueError);
    expect(() => fieldsFromJson(null)).toThrow(ValueError);
  });
});

describe("fieldsToJson()", () => {
  it("should keep a __proto__ field as an own property", () => {
    const json = fieldsToJson(fields(new Map([["__proto__", Value.int(1)]])));
    expect(Object.keys(json)).toEqual(["__proto__"]);
  });
});

describe("recordToJson()", () => {
  it("should expose id, timestamps and data", () => {
    const record = StoreRecord.restore("r1", fields({ name: Value.string("a") }), 100, 200);
    expect(recordToJson(record)).toEqual({
      id: "r1",
      created_at: 100,
      updated_at: 200,
      data: { name: "a" },
    });
  });
});
