/**
 * JSON documents as values
 *
 * Parsed through a syntax tree rather than JSON.parse: object keys keep
 * their source order (integer-like keys included) and integer literals
 * are read from their source text, so no digit is lost.
 */

import {
  type Node as JsonNode,
  type ParseError as JsonSyntaxError,
  type ParseOptions,
  parseTree,
} from "jsonc-parser";
import { parseInteger } from "../query/numbers.js";
import { type Value, ValueObject } from "../types.js";

const STRICT_JSON: ParseOptions = {
  disallowComments: true,
  allowTrailingComma: false,
  allowEmptyContent: false,
};

const INTEGER = /^-?\d+$/;

export type JsonResult = { ok: true; value: Value } | { ok: false };

function toValue(node: JsonNode, text: string): Value {
  switch (node.type) {
    case "null":
      return null;
    case "boolean":
      return node.value === true;
    case "string":
      return String(node.value);
    case "number": {
      const source = text.slice(node.offset, node.offset + node.length);
      return INTEGER.test(source) ? parseInteger(source) : Number(source);
    }
    case "array":
      return (node.children ?? []).map((child) => toValue(child, text));
    case "object":
      return new ValueObject(
        (node.children ?? []).map((property): [string, Value] => [
          String(property.children?.[0]?.value),
          toValue(property, text),
        ]),
      );
    case "property": {
      const value = node.children?.[1];
      return value ? toValue(value, text) : null;
    }
  }
}

/**
 * Parse one complete JSON document. Comments, trailing commas and
 * trailing text are rejected.
 */
export function parseJson(text: string): JsonResult {
  const errors: JsonSyntaxError[] = [];
  const root = parseTree(text, errors, STRICT_JSON);
  if (root === undefined || errors.length > 0) return { ok: false };
  return { ok: true, value: toValue(root, text) };
}
