import { describe, expect, it, vi } from "vitest";
import { ParseError } from "../errors.js";
import { entriesOf } from "../test-utils/streams.js";
import { isTuple, type QueryLogger, ValueObject } from "../types.js";
import { RecordReader } from "./record-reader.js";

describe("RecordReader", () => {
  it("reads JSON objects and binds their fields", () => {
    const reader = new RecordReader();
    const { record, context } = reader.read('{"first name": "Ann", "age": 3}');
    expect(entriesOf(record)).toEqual([
      ["first name", "Ann"],
      ["age", 3],
    ]);
    expect(context.get("first_name")).toBe("Ann");
    expect(context.get("age")).toBe(3);
    expect(context.get("_")).toBe(record);
    expect(reader.mode).toBe("json");
  });

  it("binds the whole record to _ even when a field is called _", () => {
    const { record, context } = new RecordReader().read('{"_": 1}');
    expect(context.get("_")).toBe(record);
  });

  it("merges defaults under each JSON record", () => {
    const reader = new RecordReader({
      defaults: new ValueObject([
        ["a", 0],
        ["b", 0],
      ]),
    });
    expect(entriesOf(reader.read('{"a": 1}').record)).toEqual([
      ["a", 1],
      ["b", 0],
    ]);
  });

  it("keeps JSON keys in source order, integer-like keys included", () => {
    const { record } = new RecordReader().read('{"b": 1, "10": 2, "a": 3}');
    expect(entriesOf(record)).toEqual([
      ["b", 1],
      ["10", 2],
      ["a", 3],
    ]);
  });

  it("reads integers beyond 2^53 exactly", () => {
    const json = new RecordReader().read(
      '{"id": 9007199254740993, "n": 12, "x": 1.5}',
    );
    expect(json.context.get("id")).toBe(9007199254740993n);
    expect(json.context.get("n")).toBe(12);
    expect(json.context.get("x")).toBe(1.5);

    const csv = new RecordReader().read("9007199254740993,-9007199254740993,x");
    if (!isTuple(csv.record)) throw new Error("expected a tuple");
    expect(csv.record.items).toEqual([
      9007199254740993n,
      -9007199254740993n,
      "x",
    ]);
  });

  it("binds fields with letters outside ASCII under their own names", () => {
    const { context } = new RecordReader().read('{"café": 2, "à la": 3}');
    expect(context.get("café")).toBe(2);
    expect(context.get("à_la")).toBe(3);
  });

  it("switches to CSV for good after the first non-JSON line", () => {
    const reader = new RecordReader();
    reader.read('{"a": 1}');
    const row = reader.read("1,2,3");
    expect(reader.mode).toBe("csv");
    if (!isTuple(row.record)) throw new Error("expected a tuple");
    expect(row.record.items).toEqual([1, 2, 3]);
    expect([...row.context.keys()]).toEqual(["_"]);

    // A JSON-looking line is now just a CSV row
    const later = reader.read('{"b": 2}');
    expect(reader.mode).toBe("csv");
    expect(isTuple(later.record)).toBe(true);
  });

  it("treats a JSON value that is not an object as CSV", () => {
    const reader = new RecordReader();
    const { record } = reader.read("5");
    expect(reader.mode).toBe("csv");
    if (!isTuple(record)) throw new Error("expected a tuple");
    expect(record.items).toEqual([5]);
  });

  it("fails on a line that is neither JSON nor CSV", () => {
    const reader = new RecordReader();
    expect(() => reader.read('"open,1', 7)).toThrow(ParseError);
    expect(() => reader.read('"open,1', 7)).toThrow(
      'cannot parse line 7: "open,1',
    );
  });

  it("logs the mode switch once", () => {
    const logger: QueryLogger = { info: vi.fn(), debug: vi.fn() };
    const reader = new RecordReader({ logger, source: "in.csv" });
    reader.read("a,b", 1);
    reader.read("c,d", 2);
    expect(logger.debug).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith("reader mode", {
      source: "in.csv",
      mode: "csv",
      lineNumber: 1,
    });
  });
});
