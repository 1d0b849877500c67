import { describe, expect, it } from "vitest";
import { ColumnIndexError } from "../errors.js";
import { collect } from "../pipeline/pipeline.js";
import { fromValues, rowsOf } from "../test-utils/streams.js";
import { Tuple } from "../types.js";
import { limit, orderBy } from "./order-by.js";

const rows = () =>
  fromValues([
    new Tuple(["b", 2]),
    new Tuple(["a", 3]),
    new Tuple(["c", 1]),
  ]);

describe("orderBy", () => {
  it("sorts by the given columns", async () => {
    expect(rowsOf(await collect(orderBy(rows(), { columns: [1] })))).toEqual([
      ["c", 1],
      ["b", 2],
      ["a", 3],
    ]);
  });

  it("sorts descending with reverse", async () => {
    const out = await collect(orderBy(rows(), { columns: [0], reverse: true }));
    expect(rowsOf(out)).toEqual([
      ["c", 1],
      ["b", 2],
      ["a", 3],
    ]);
  });

  it("keeps arrival order for equal keys, also in reverse", async () => {
    const input = () =>
      fromValues([
        new Tuple([1, "first"]),
        new Tuple([2, "x"]),
        new Tuple([1, "second"]),
      ]);
    expect(rowsOf(await collect(orderBy(input(), { columns: [0] })))).toEqual([
      [1, "first"],
      [1, "second"],
      [2, "x"],
    ]);
    expect(
      rowsOf(await collect(orderBy(input(), { columns: [0], reverse: true }))),
    ).toEqual([
      [2, "x"],
      [1, "first"],
      [1, "second"],
    ]);
  });

  it("orders mixed types null < number < string", async () => {
    const out = await collect(
      orderBy(fromValues([new Tuple(["a"]), new Tuple([2]), new Tuple([null])]), {
        columns: [0],
      }),
    );
    expect(rowsOf(out)).toEqual([[null], [2], ["a"]]);
  });

  it("rejects a column outside the row", async () => {
    await expect(collect(orderBy(rows(), { columns: [5] }))).rejects.toThrow(
      ColumnIndexError,
    );
  });
});

describe("limit", () => {
  it("passes at most n values", async () => {
    expect(await collect(limit(fromValues([1, 2, 3]), 2))).toEqual([1, 2]);
  });

  it("treats 0 and undefined as no limit", async () => {
    expect(await collect(limit(fromValues([1, 2, 3]), 0))).toEqual([1, 2, 3]);
    expect(await collect(limit(fromValues([1, 2, 3])))).toEqual([1, 2, 3]);
  });

  it("stops pulling from upstream", async () => {
    const pulled: number[] = [];
    async function* numbers(): AsyncGenerator<number> {
      try {
        for (let i = 1; ; i++) {
          pulled.push(i);
          yield i;
        }
      } finally {
        pulled.push(-1);
      }
    }
    expect(await collect(limit(numbers(), 2))).toEqual([1, 2]);
    expect(pulled).toEqual([1, 2, -1]);
  });
});
