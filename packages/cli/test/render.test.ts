/**
 * Unit tests for output rendering
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { highlightError, printJson, printLines } from "../src/lib/render.js";

describe("render", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should wrap errors in red on a terminal only", () => {
    expect(highlightError("bad", { isTTY: true })).toBe("\x1b[31mbad\x1b[0m");
    expect(highlightError("bad", { isTTY: false })).toBe("bad");
    expect(highlightError("bad", {})).toBe("bad");
  });

  it("should print indented JSON unless raw", () => {
    const out: string[] = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      out.push(String(line));
    });

    printJson({ a: 1 });
    printJson({ a: 1 }, { raw: true });
    printLines(["x", "y"]);

    expect(out).toEqual(['{\n  "a": 1\n}', '{"a":1}', "x", "y"]);
  });
});
