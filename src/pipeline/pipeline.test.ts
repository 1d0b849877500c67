import { describe, expect, it, vi } from "vitest";
import { ConfigurationError, ExpressionSyntaxError } from "../errors.js";
import { rowsOf } from "../test-utils/streams.js";
import type { QueryLogger } from "../types.js";
import { fromLines } from "../utils/line-source.js";
import { collect, createPipeline, type PipelineInput } from "./pipeline.js";

const input = (lines: string | string[], name = "-"): PipelineInput => ({
  name,
  lines: fromLines(lines),
});

describe("createPipeline", () => {
  it("aggregates mapped records", async () => {
    const out = await collect(
      createPipeline({
        queries: ["(a, 1)"],
        inputs: [input(['{"a": 1, "b": "x"}', '{"a": 2, "b": "y"}'])],
        aggregate: { functions: ["sum"], keyColumns: [0], valueColumn: 1 },
      }),
    );
    expect(rowsOf(out)).toEqual([
      [1, 1],
      [2, 1],
    ]);
  });

  it("reads CSV rows as tuples of typed fields", async () => {
    const out = await collect(
      createPipeline({ queries: ["_"], inputs: [input("1,2,3")] }),
    );
    expect(rowsOf(out)).toEqual([[1, 2, 3]]);
  });

  it("joins two inputs on their first column", async () => {
    const out = await collect(
      createPipeline({
        queries: ["(id, name)", "_"],
        inputs: [
          input(['{"id": 1, "name": "ann"}', '{"id": 2, "name": "bob"}']),
          input(["2,10", "1,20", "2,30"]),
        ],
      }),
    );
    expect(rowsOf(out)).toEqual([
      [2, "bob", 10],
      [1, "ann", 20],
      [2, "bob", 30],
    ]);
  });

  it("runs distinct, order by and limit in that order", async () => {
    const out = await collect(
      createPipeline({
        queries: ["(n,)"],
        inputs: [input(["{\"n\": 3}", "{\"n\": 1}", "{\"n\": 3}", "{\"n\": 2}"])],
        distinct: true,
        orderBy: { columns: [0], reverse: true },
        limit: 2,
      }),
    );
    expect(rowsOf(out)).toEqual([[3], [2]]);
  });

  it("logs the stage wiring", async () => {
    const logger: QueryLogger = { info: vi.fn(), debug: vi.fn() };
    await collect(
      createPipeline({
        queries: ["_"],
        inputs: [input("1,2", "data.csv")],
        distinct: true,
        logger,
      }),
    );
    expect(logger.info).toHaveBeenCalledWith("pipeline", {
      inputs: ["data.csv"],
      queries: ["_"],
      stages: ["map", "distinct"],
    });
    expect(logger.debug).toHaveBeenCalledWith("reader mode", {
      source: "data.csv",
      mode: "csv",
      lineNumber: 1,
    });
  });

  describe("validation", () => {
    it("needs one query per input", () => {
      expect(() =>
        createPipeline({ queries: ["_", "_"], inputs: [input("")] }),
      ).toThrow(ConfigurationError);
    });

    it("takes at most two inputs", () => {
      expect(() =>
        createPipeline({
          queries: ["_", "_", "_"],
          inputs: [input(""), input(""), input("")],
        }),
      ).toThrow("expected 1 or 2 inputs, got 3");
    });

    it("rejects empty function and column lists", () => {
      expect(() =>
        createPipeline({
          queries: ["_"],
          inputs: [input("")],
          aggregate: { functions: [] },
        }),
      ).toThrow("no aggregate functions given");
      expect(() =>
        createPipeline({
          queries: ["_"],
          inputs: [input("")],
          orderBy: { columns: [] },
        }),
      ).toThrow("no order-by columns given");
    });

    it("rejects a negative limit", () => {
      expect(() =>
        createPipeline({ queries: ["_"], inputs: [input("")], limit: -1 }),
      ).toThrow("limit must be a non-negative integer, got -1");
    });

    it("compiles queries and reducers up front", () => {
      expect(() =>
        createPipeline({ queries: ["a +"], inputs: [input("")] }),
      ).toThrow(ExpressionSyntaxError);
      expect(() =>
        createPipeline({
          queries: ["_"],
          inputs: [input("")],
          aggregate: { functions: ["median"] },
        }),
      ).toThrow("unknown aggregate function 'median'");
    });
  });
});
