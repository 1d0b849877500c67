import { describe, expect, it } from "vitest";
import { ExpressionSyntaxError } from "../errors.js";
import { parse } from "./parser.js";

describe("parse", () => {
  it("gives * precedence over +", () => {
    expect(parse("1 + 2 * 3")).toEqual({
      type: "Binary",
      op: "+",
      left: { type: "Literal", value: 1 },
      right: {
        type: "Binary",
        op: "*",
        left: { type: "Literal", value: 2 },
        right: { type: "Literal", value: 3 },
      },
    });
  });

  it("folds negative number literals", () => {
    expect(parse("-2")).toEqual({ type: "Literal", value: -2 });
  });

  it("binds ** tighter than a leading minus", () => {
    expect(parse("-2 ** 2")).toEqual({
      type: "Unary",
      op: "-",
      operand: {
        type: "Binary",
        op: "**",
        left: { type: "Literal", value: 2 },
        right: { type: "Literal", value: 2 },
      },
    });
  });

  it("keeps comparison chains flat", () => {
    expect(parse("a < b <= c")).toEqual({
      type: "Compare",
      operands: [
        { type: "Name", name: "a" },
        { type: "Name", name: "b" },
        { type: "Name", name: "c" },
      ],
      ops: ["<", "<="],
    });
  });

  it("gives a guard without else an empty list alternative", () => {
    expect(parse("x if x")).toEqual({
      type: "Conditional",
      test: { type: "Name", name: "x" },
      consequent: { type: "Name", name: "x" },
      alternate: { type: "List", elements: [] },
    });
  });

  it("rewrites method calls as function calls", () => {
    expect(parse("name.upper()")).toEqual({
      type: "Call",
      name: "upper",
      args: [{ type: "Name", name: "name" }],
    });
  });

  it("parses tuples", () => {
    expect(parse("()")).toEqual({ type: "Tuple", elements: [] });
    expect(parse("(1,)")).toEqual({
      type: "Tuple",
      elements: [{ type: "Literal", value: 1 }],
    });
    expect(parse("a, b")).toEqual({
      type: "Tuple",
      elements: [
        { type: "Name", name: "a" },
        { type: "Name", name: "b" },
      ],
    });
    expect(parse("(a)")).toEqual({ type: "Name", name: "a" });
  });

  it("concatenates adjacent strings", () => {
    expect(parse("'a' \"b\"")).toEqual({ type: "Literal", value: "ab" });
  });

  it("reads bare object keys as strings", () => {
    expect(parse("{a: 1}")).toEqual({
      type: "Object",
      entries: [
        {
          key: { type: "Literal", value: "a" },
          value: { type: "Literal", value: 1 },
        },
      ],
    });
  });

  it("parses slices with open ends", () => {
    expect(parse("xs[:2]")).toEqual({
      type: "Slice",
      object: { type: "Name", name: "xs" },
      start: null,
      end: { type: "Literal", value: 2 },
    });
  });

  it("parses comprehensions", () => {
    expect(parse("[k for k, v in pairs if v]")).toEqual({
      type: "Comprehension",
      element: { type: "Name", name: "k" },
      targets: ["k", "v"],
      iterable: { type: "Name", name: "pairs" },
      condition: { type: "Name", name: "v" },
    });
  });

  describe("errors", () => {
    it("rejects empty input", () => {
      expect(() => parse("   ")).toThrow("empty expression");
    });

    it("reports a dangling operator", () => {
      expect(() => parse("1 +")).toThrow(
        "unexpected end of expression at position 3",
      );
    });

    it("reports an unclosed parenthesis", () => {
      expect(() => parse("(1, 2")).toThrow(
        "expected ')' but found end of expression at position 5",
      );
    });

    it("reports trailing tokens", () => {
      expect(() => parse("a b")).toThrow(ExpressionSyntaxError);
      expect(() => parse("a b")).toThrow("unexpected token 'b' at position 2");
    });
  });
});
