import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { EvaluationError } from "../../errors.js";
import type { Value } from "../../types.js";
import { compileQuery } from "../evaluator.js";
import { createDefaultRegistry, percentile, selectKth } from "./index.js";
import { roundHalfEven } from "./math-builtins.js";

const functions = createDefaultRegistry();

function run(source: string): Value {
  return compileQuery(source, functions).evaluate(new Map());
}

describe("reduction builtins", () => {
  it("sums", () => {
    expect(run("sum([1, 2, 3])")).toBe(6);
    expect(run("sum([1, 2], 10)")).toBe(13);
    expect(run("sum([True, True])")).toBe(2);
    expect(() => run("sum(['a'])")).toThrow(
      "sum() expects a number, got string",
    );
  });

  it("counts", () => {
    expect(run("len('abc')")).toBe(3);
    expect(run("count([1, 1])")).toBe(2);
    expect(run("len({a: 1})")).toBe(1);
  });

  it("finds extremes of a sequence or of the arguments", () => {
    expect(run("max([3, 7, 5])")).toBe(7);
    expect(run("min(4, 2, 9)")).toBe(2);
    expect(run("max(['b', 'a'])")).toBe("b");
    expect(() => run("max([])")).toThrow("max() arg is an empty sequence");
  });

  it("sums and compares integers beyond 2^53 exactly", () => {
    expect(run("sum([9007199254740993, 1])")).toBe(9007199254740994n);
    expect(run("sum([9007199254740993, -2])")).toBe(9007199254740991);
    expect(run("max([9007199254740993, 9007199254740992])")).toBe(
      9007199254740993n,
    );
  });

  it("averages, with 0 for no values", () => {
    expect(run("avg([])")).toBe(0);
    expect(run("mean([1, 2, 3, 4])")).toBe(2.5);
  });

  describe("percentile", () => {
    it("takes the element at floor(p * n) of the sorted values", () => {
      expect(percentile([3, 1, 2], 0.5)).toBe(2);
      expect(percentile([10, 40, 30, 20], 0.75)).toBe(40);
      expect(percentile([5], 0)).toBe(5);
      expect(run("percentile([9, 8, 7], 0)")).toBe(7);
    });

    it("leaves its input untouched", () => {
      const values = [3, 1, 2];
      percentile(values, 0.5);
      expect(values).toEqual([3, 1, 2]);
    });

    it("rejects fractions outside [0, 1)", () => {
      expect(() => percentile([1], 1)).toThrow(EvaluationError);
      expect(() => percentile([1], -0.1)).toThrow(
        "percentile() fraction must be in [0, 1), got -0.1",
      );
    });

    it("rejects an empty sequence", () => {
      expect(() => percentile([], 0.5)).toThrow(
        "percentile() of an empty sequence",
      );
    });
  });

  it("selectKth agrees with sorting", () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: -50, max: 50 }), { minLength: 1 }),
        fc.nat(),
        (values, n) => {
          const k = n % values.length;
          const sorted = [...values].sort((a, b) => a - b);
          expect(selectKth(values, k)).toBe(sorted[k]);
        },
      ),
    );
  });
});

describe("math builtins", () => {
  it("rounds half to even", () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(run("round(1.234, 2)")).toBe(1.23);
    expect(run("round(-1.5)")).toBe(-2);
  });

  it("converts to numbers", () => {
    expect(run("abs(-3)")).toBe(3);
    expect(run("int('42')")).toBe(42);
    expect(run("int('9007199254740993')")).toBe(9007199254740993n);
    expect(run("abs(-9007199254740993)")).toBe(9007199254740993n);
    expect(run("round(9007199254740993)")).toBe(9007199254740993n);
    expect(run("int(3.9)")).toBe(3);
    expect(run("int(-3.9)")).toBe(-3);
    expect(run("float('2.5')")).toBe(2.5);
    expect(() => run("int('x')")).toThrow("invalid literal for int(): 'x'");
    expect(() => run("float('')")).toThrow(
      "could not convert string to float: ''",
    );
  });
});

describe("sequence builtins", () => {
  it("sorts stably in either direction", () => {
    expect(run("sorted([3, 1, 2])")).toEqual([1, 2, 3]);
    expect(run("sorted([3, 1, 2], True)")).toEqual([3, 2, 1]);
    expect(run("sorted('cab')")).toEqual(["a", "b", "c"]);
  });

  it("builds ranges", () => {
    expect(run("range(3)")).toEqual([0, 1, 2]);
    expect(run("range(5, 0, -2)")).toEqual([5, 3, 1]);
    expect(() => run("range(0, 3, 0)")).toThrow(
      "range() step must not be zero",
    );
  });

  it("converts between containers", () => {
    expect(run("list((1, 2))")).toEqual([1, 2]);
    expect(run("reversed([1, 2, 3])")).toEqual([3, 2, 1]);
    expect(run("str(12)")).toBe("12");
    expect(run("str([1, 'a'])")).toBe('[1,"a"]');
    expect(run("bool([])")).toBe(false);
  });
});

describe("object builtins", () => {
  it("lists keys and values in insertion order", () => {
    expect(run("keys({b: 1, a: 2})")).toEqual(["b", "a"]);
    expect(run("values({b: 1, a: 2})")).toEqual([1, 2]);
    expect(run("keys({'b': 1, '10': 2, 'a': 3})")).toEqual(["b", "10", "a"]);
    expect(
      run("[k + '=' + str(v) for k, v in items({'b': 1, '10': 2})]"),
    ).toEqual(["b=1", "10=2"]);
  });

  it("gets with a default", () => {
    expect(run("get({a: 1}, 'z', 0)")).toBe(0);
    expect(run("get({a: null}, 'a', 0)")).toBe(null);
    expect(run("get([1, 2], -1)")).toBe(2);
    expect(run("get([1, 2], 5)")).toBe(null);
  });
});

describe("string builtins", () => {
  it("changes case and trims", () => {
    expect(run("'AbC'.lower()")).toBe("abc");
    expect(run("upper('x')")).toBe("X");
    expect(run("strip('  x ')")).toBe("x");
    expect(run("strip('--x-', '-')")).toBe("x");
  });

  it("splits and joins", () => {
    expect(run("split('a,b', ',')")).toEqual(["a", "b"]);
    expect(run("split('  a  b ')")).toEqual(["a", "b"]);
    expect(run("'-'.join(['a', 'b'])")).toBe("a-b");
    expect(() => run("join('-', [1])")).toThrow(
      "join() expects strings, got number",
    );
  });

  it("tests affixes and replaces", () => {
    expect(run("'abc'.startswith('ab')")).toBe(true);
    expect(run("endswith('abc', 'b')")).toBe(false);
    expect(run("replace('a-b-c', '-', '+')")).toBe("a+b+c");
  });
});
