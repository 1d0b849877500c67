/**
 * String builtins
 *
 * Usually called with method syntax: `name.lower()`, `line.split(",")`,
 * `"-".join(parts)`.
 */

import { EvaluationError } from "../../errors.js";
import type { Value } from "../../types.js";
import {
  argumentError,
  type BuiltinEntry,
  expectIterable,
  expectString,
} from "./registry.js";

function split(s: string, sep: Value): string[] {
  if (sep === null) {
    // Runs of whitespace, ignoring leading and trailing whitespace
    const trimmed = s.trim();
    return trimmed === "" ? [] : trimmed.split(/\s+/);
  }
  const separator = expectString("split", sep);
  if (separator === "") {
    throw new EvaluationError("split() separator must not be empty");
  }
  return s.split(separator);
}

function join(sep: string, items: readonly Value[]): string {
  return items
    .map((item) => {
      if (typeof item !== "string") throw argumentError("join", "strings", item);
      return item;
    })
    .join(sep);
}

function strip(s: string, chars: Value): string {
  if (chars === null) return s.trim();
  const set = new Set(expectString("strip", chars));
  let start = 0;
  let end = s.length;
  while (start < end && set.has(s[start])) start++;
  while (end > start && set.has(s[end - 1])) end--;
  return s.slice(start, end);
}

export const stringBuiltins: readonly BuiltinEntry[] = [
  [
    "lower",
    {
      minArgs: 1,
      maxArgs: 1,
      call: ([s]) => expectString("lower", s).toLowerCase(),
    },
  ],
  [
    "upper",
    {
      minArgs: 1,
      maxArgs: 1,
      call: ([s]) => expectString("upper", s).toUpperCase(),
    },
  ],
  [
    "strip",
    {
      minArgs: 1,
      maxArgs: 2,
      call: (args) =>
        strip(expectString("strip", args[0]), args.length > 1 ? args[1] : null),
    },
  ],
  [
    "split",
    {
      minArgs: 1,
      maxArgs: 2,
      call: (args) =>
        split(expectString("split", args[0]), args.length > 1 ? args[1] : null),
    },
  ],
  [
    "join",
    {
      minArgs: 2,
      maxArgs: 2,
      call: ([sep, items]) =>
        join(expectString("join", sep), expectIterable("join", items)),
    },
  ],
  [
    "startswith",
    {
      minArgs: 2,
      maxArgs: 2,
      call: ([s, prefix]) =>
        expectString("startswith", s).startsWith(
          expectString("startswith", prefix),
        ),
    },
  ],
  [
    "endswith",
    {
      minArgs: 2,
      maxArgs: 2,
      call: ([s, suffix]) =>
        expectString("endswith", s).endsWith(expectString("endswith", suffix)),
    },
  ],
  [
    "replace",
    {
      minArgs: 3,
      maxArgs: 3,
      call: ([s, from, to]) =>
        expectString("replace", s).replaceAll(
          expectString("replace", from),
          expectString("replace", to),
        ),
    },
  ],
];
