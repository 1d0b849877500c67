import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { collect } from "../pipeline/pipeline.js";
import { valueKey } from "../query/value-operations.js";
import { fromValues } from "../test-utils/streams.js";
import { Tuple, ValueObject } from "../types.js";
import { distinct } from "./distinct.js";

describe("distinct", () => {
  it("keeps the first of each equal value", async () => {
    const out = await collect(distinct(fromValues([1, "1", 1, 2, "1"])));
    expect(out).toEqual([1, "1", 2]);
  });

  it("compares containers structurally", async () => {
    const out = await collect(
      distinct(
        fromValues([
          new Tuple([1, 2]),
          new Tuple([1, 2]),
          [1, 2],
          new ValueObject([
            ["a", 1],
            ["b", 2],
          ]),
          new ValueObject([
            ["b", 2],
            ["a", 1],
          ]),
        ]),
      ),
    );
    expect(out.map(valueKey)).toEqual([
      "(#1,#2)",
      "[#1,#2]",
      '{"a":#1,"b":#2}',
    ]);
  });

  it("outputs a set of the input", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.integer({ min: 0, max: 5 })), async (xs) => {
        const out = await collect(distinct(fromValues(xs)));
        expect(new Set(out)).toEqual(new Set(xs));
        expect(out).toHaveLength(new Set(xs).size);
      }),
    );
  });
});
