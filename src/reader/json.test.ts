import { describe, expect, it } from "vitest";
import { entriesOf } from "../test-utils/streams.js";
import { parseJson } from "./json.js";

function valueOf(text: string) {
  const result = parseJson(text);
  if (!result.ok) throw new Error(`not JSON: ${text}`);
  return result.value;
}

describe("parseJson", () => {
  it("keeps object keys in source order", () => {
    expect(entriesOf(valueOf('{"b": 1, "10": 2, "a": 3, "2": 4}'))).toEqual([
      ["b", 1],
      ["10", 2],
      ["a", 3],
      ["2", 4],
    ]);
  });

  it("lets a repeated key keep its first position and last value", () => {
    expect(entriesOf(valueOf('{"a": 1, "b": 2, "a": 3}'))).toEqual([
      ["a", 3],
      ["b", 2],
    ]);
  });

  it("reads integers without losing digits", () => {
    expect(valueOf("9007199254740993")).toBe(9007199254740993n);
    expect(valueOf("-12345678901234567891")).toBe(-12345678901234567891n);
    expect(valueOf("42")).toBe(42);
    expect(valueOf("2.5e3")).toBe(2500);
  });

  it("reads nested documents", () => {
    const value = valueOf('{"a": [1, "x", null, true], "o": {"__proto__": {}}}');
    const [[, list], [, inner]] = entriesOf(value);
    expect(list).toEqual([1, "x", null, true]);
    expect(entriesOf(inner).map(([key]) => key)).toEqual(["__proto__"]);
  });

  it("rejects text that is not a single JSON document", () => {
    expect(parseJson("")).toEqual({ ok: false });
    expect(parseJson("1,2")).toEqual({ ok: false });
    expect(parseJson('{"a": 1,}')).toEqual({ ok: false });
    expect(parseJson('{"a": 1} // note')).toEqual({ ok: false });
    expect(parseJson("{'a': 1}")).toEqual({ ok: false });
  });
});
