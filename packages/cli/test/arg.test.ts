/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { Value } from "@strongbox/sdk";
import { TEST_KEY_HEX } from "@strongbox/testkit";
import { parseJson, parseKeyOption, parseRecordData } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"a":1}', "--data")).toEqual({ a: 1 });
      expect(parseJson("[1,2]", "--data")).toEqual([1, 2]);
    });

    it("should strip a leading BOM", () => {
      expect(parseJson("\uFEFF{\"a\":1}", "--data")).toEqual({ a: 1 });
    });

    it("should name the source in the error", () => {
      expect(() => parseJson("{oops", "--data")).toThrow(InvalidArgumentError);
      expect(() => parseJson("{oops", "--data")).toThrow(/^Invalid JSON in --data: /);
    });
  });

  describe("parseRecordData", () => {
    it("should convert a JSON object to typed fields", () => {
      const data = parseRecordData('{"name":"Alice","age":25,"score":1.5}');

      expect(data.get("name")).toEqual(Value.string("Alice"));
      expect(data.get("age")).toEqual(Value.int(25));
      expect(data.get("score")).toEqual(Value.float(1.5));
    });

    it("should reject JSON that is not an object", () => {
      expect(() => parseRecordData("[1]")).toThrow(InvalidArgumentError);
      expect(() => parseRecordData("[1]")).toThrow(
        "Invalid value: record data must be a JSON object"
      );
    });
  });

  describe("parseKeyOption", () => {
    it("should accept 64 hex characters", () => {
      const key = parseKeyOption(TEST_KEY_HEX);
      expect(key).toHaveLength(32);
      expect(key[0]).toBe(0x01);
    });

    it("should reject short keys", () => {
      expect(() => parseKeyOption("abcd")).toThrow(InvalidArgumentError);
      expect(() => parseKeyOption("abcd")).toThrow(
        "Configuration error: encryption key must be 64 hex characters"
      );
    });
  });
});
