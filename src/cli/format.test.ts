import { describe, expect, it } from "vitest";
import { Tuple, ValueObject } from "../types.js";
import { formatRecord } from "./format.js";

describe("formatRecord", () => {
  const record = new ValueObject([
    ["a", 1],
    ["b", [1, 2]],
  ]);

  it("indents objects", () => {
    expect(formatRecord(record)).toBe(
      '{\n  "a": 1,\n  "b": [\n    1,\n    2\n  ]\n}',
    );
  });

  it("prints objects on one line when compact", () => {
    expect(formatRecord(record, true)).toBe('{"a":1,"b":[1,2]}');
  });

  it("keeps integer-like keys where they were inserted", () => {
    const ordered = new ValueObject([
      ["b", 1],
      ["10", 2],
      ["a", 3],
    ]);
    expect(formatRecord(ordered, true)).toBe('{"b":1,"10":2,"a":3}');
  });

  it("prints integers beyond 2^53 in full", () => {
    expect(formatRecord(new Tuple([12345678901234567891n, "x"]))).toBe(
      "12345678901234567891,x",
    );
    expect(
      formatRecord(new ValueObject([["id", 9007199254740993n]]), true),
    ).toBe('{"id":9007199254740993}');
  });

  it("joins tuple and list items with commas", () => {
    expect(formatRecord(new Tuple([1, "a", null, true]))).toBe("1,a,null,true");
    expect(formatRecord([1, [2, 3], new Tuple(["x"])])).toBe('1,[2,3],["x"]');
  });

  it("prints scalars plainly", () => {
    expect(formatRecord("text")).toBe("text");
    expect(formatRecord(null)).toBe("null");
    expect(formatRecord(2.5)).toBe("2.5");
    expect(formatRecord(false)).toBe("false");
  });
});
