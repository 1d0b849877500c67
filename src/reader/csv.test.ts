import { describe, expect, it } from "vitest";
import { convertField, parseCsvRow, toCsvRecord } from "./csv.js";

describe("parseCsvRow", () => {
  it("splits on commas", () => {
    expect(parseCsvRow("a,b,,c")).toEqual({
      ok: true,
      fields: ["a", "b", "", "c"],
    });
  });

  it("honours quoted fields", () => {
    expect(parseCsvRow('"x, y",2,"say ""hi"""')).toEqual({
      ok: true,
      fields: ["x, y", "2", 'say "hi"'],
    });
  });

  it("fails on an unbalanced quote", () => {
    expect(parseCsvRow('"open,1').ok).toBe(false);
  });
});

describe("convertField", () => {
  it("types fields that spell literals", () => {
    expect(convertField("42")).toBe(42);
    expect(convertField("2.5")).toBe(2.5);
    expect(convertField("False")).toBe(false);
    expect(convertField("[1, 2]")).toEqual([1, 2]);
  });

  it("keeps everything else as text", () => {
    expect(convertField("hello")).toBe("hello");
    expect(convertField("007")).toBe("007");
    expect(convertField("")).toBe("");
    expect(convertField("1 + 1")).toBe("1 + 1");
  });
});

describe("toCsvRecord", () => {
  it("builds a tuple of converted fields", () => {
    expect(toCsvRecord(["1", "2", "3"]).items).toEqual([1, 2, 3]);
    expect(toCsvRecord(["id", "x"]).items).toEqual(["id", "x"]);
  });
});
