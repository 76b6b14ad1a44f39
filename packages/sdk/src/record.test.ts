import { describe, it, expect } from "vitest";
import { StoreRecord, systemClock } from "./record.js";
import { Value, fields, fieldsEqual } from "./value.js";
import { ValueError } from "./errors.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("StoreRecord", () => {
  describe("create()", () => {
    it("should assign a random UUID and equal timestamps", () => {
      const record = StoreRecord.create(fields({ name: Value.string("a") }), 1000);
      expect(record.id).toMatch(UUID_PATTERN);
      expect(record.createdAt).toBe(1000);
      expect(record.updatedAt).toBe(1000);
    });

    it("should give each record a distinct id", () => {
      const ids = new Set(Array.from({ length: 100 }, () => StoreRecord.create(fields({})).id));
      expect(ids.size).toBe(100);
    });

    it("should default to the system clock in whole seconds", () => {
      const before = systemClock();
      const record = StoreRecord.create(fields({}));
      const after = systemClock();
      expect(Number.isInteger(record.createdAt)).toBe(true);
      expect(record.createdAt).toBeGreaterThanOrEqual(before);
      expect(record.createdAt).toBeLessThanOrEqual(after);
    });

    it("should not share the caller's map", () => {
      const data = new Map([["a", Value.int(1)]]);
      const record = StoreRecord.create(data, 1);
      data.set("b", Value.int(2));
      expect(record.data.size).toBe(1);
    });
  });

  describe("restore()", () => {
    it("should keep the given id and timestamps", () => {
      const record = StoreRecord.restore("abc", fields({}), 10, 20);
      expect(record.id).toBe("abc");
      expect(record.createdAt).toBe(10);
      expect(record.updatedAt).toBe(20);
    });

    it("should reject an empty id", () => {
      expect(() => StoreRecord.restore("", fields({}), 1, 1)).toThrow(ValueError);
    });

    it("should reject createdAt after updatedAt", () => {
      expect(() => StoreRecord.restore("x", fields({}), 20, 10)).toThrow(
        "Invalid value: record x has createdAt 20 after updatedAt 10"
      );
    });

    it("should reject negative or fractional timestamps", () => {
      expect(() => StoreRecord.restore("x", fields({}), -1, 1)).toThrow(ValueError);
      expect(() => StoreRecord.restore("x", fields({}), 1, 1.5)).toThrow(ValueError);
    });
  });

  describe("replace()", () => {
    it("should swap the whole field map and bump updatedAt", () => {
      const record = StoreRecord.create(fields({ a: Value.int(1), b: Value.int(2) }), 100);
      record.replace(fields({ c: Value.int(3) }), 150);

      expect(fieldsEqual(record.data, fields({ c: Value.int(3) }))).toBe(true);
      expect(record.createdAt).toBe(100);
      expect(record.updatedAt).toBe(150);
    });

    it("should never move updatedAt backwards", () => {
      const record = StoreRecord.create(fields({}), 100);
      record.replace(fields({}), 50);
      expect(record.updatedAt).toBe(100);
    });
  });
});
