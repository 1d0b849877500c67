/**
 * Lightweight argument parser for the command line.
 *
 * Handles common patterns:
 * - Boolean flags: -c, --compact
 * - Combined short flags: -cd (same as -c -d)
 * - Value options: -l VALUE, -lVALUE, --limit=VALUE, --limit VALUE
 * - Multi-valued options: -k 0 1 2 (values run up to the next option)
 * - Positional arguments
 * - Unknown option detection
 */

import type { ExecResult } from "../types.js";

export type ArgType = "boolean" | "string" | "number" | "strings" | "numbers";

export interface ArgDef {
  /** Short form without dash, e.g., "l" for -l */
  short?: string;
  /** Long form without dashes, e.g., "limit" for --limit */
  long?: string;
  /** Type of the argument */
  type: ArgType;
  /** Default value */
  default?: boolean | string | number;
}

type FlagValue = boolean | string | number | string[] | number[];

export interface ParsedArgs<T extends Record<string, ArgDef>> {
  /** Parsed flag/option values */
  flags: {
    [K in keyof T]: T[K]["type"] extends "boolean"
      ? boolean
      : T[K]["type"] extends "strings"
        ? string[] | undefined
        : T[K]["type"] extends "numbers"
          ? number[] | undefined
          : T[K]["default"] extends number | string
            ? T[K]["type"] extends "number"
              ? number
              : string
            : T[K]["type"] extends "number"
              ? number | undefined
              : string | undefined;
  };
  /** Positional arguments (non-flag arguments) */
  positional: string[];
}

export type ParseResult<T extends Record<string, ArgDef>> =
  | { ok: true; result: ParsedArgs<T> }
  | { ok: false; error: ExecResult };

const INTEGER = /^[+-]?\d+$/;

function usageError(cmdName: string, message: string): ExecResult {
  return {
    stdout: "",
    stderr: `${cmdName}: ${message}\nTry '${cmdName} --help' for more information.\n`,
    exitCode: 2,
  };
}

/**
 * Returns an error result for an unknown option
 */
export function unknownOption(cmdName: string, option: string): ExecResult {
  // For single-char options, use "invalid option -- 'x'" format
  // For long options, use "unrecognized option '--xxx'" format
  return usageError(
    cmdName,
    option.startsWith("--")
      ? `unrecognized option '${option}'`
      : `invalid option -- '${option.replace(/^-/, "")}'`,
  );
}

/**
 * Whether `arg` can be the value of an option of `type` rather than the
 * next option. "-" names stdin; negative integers are column numbers.
 */
function isValue(arg: string, type: ArgType): boolean {
  if (!arg.startsWith("-") || arg === "-") return true;
  return (type === "number" || type === "numbers") && INTEGER.test(arg);
}

/**
 * Parse command arguments according to the provided definitions.
 *
 * @example
 * const defs = {
 *   compact: { short: "c", long: "compact", type: "boolean" as const },
 *   keys: { short: "k", long: "key_columns", type: "numbers" as const },
 * };
 * const result = parseArgs("recq", args, defs);
 * if (!result.ok) return result.error;
 * const { flags, positional } = result.result;
 */
export function parseArgs<T extends Record<string, ArgDef>>(
  cmdName: string,
  args: readonly string[],
  defs: T,
): ParseResult<T> {
  // Build lookup maps: map short/long options to {name, type}
  const shortToInfo = new Map<string, { name: string; type: ArgType }>();
  const longToInfo = new Map<string, { name: string; type: ArgType }>();

  for (const [name, def] of Object.entries(defs)) {
    const info = { name, type: def.type };
    if (def.short) shortToInfo.set(def.short, info);
    if (def.long) longToInfo.set(def.long, info);
  }

  // Boolean flags default to false; the other types stay undefined
  // unless a default is given, so callers can tell whether they were set.
  // Null-prototype to prevent prototype pollution
  const flags: Record<string, FlagValue | undefined> = Object.create(null);
  for (const [name, def] of Object.entries(defs)) {
    if (def.default !== undefined) {
      flags[name] = def.default;
    } else if (def.type === "boolean") {
      flags[name] = false;
    }
  }

  const positional: string[] = [];
  let stopParsing = false;

  /**
   * Store the value(s) for option `name`. `first` is an inline value
   * (--opt=x, -ox) when present; otherwise values are taken from the
   * arguments after index `i`. Returns the index of the last argument
   * consumed, or an error.
   */
  const takeValues = (
    display: string,
    name: string,
    type: ArgType,
    first: string | undefined,
    i: number,
  ): { ok: true; next: number } | { ok: false; error: ExecResult } => {
    const values: string[] = first === undefined ? [] : [first];
    let next = i;
    const multi = type === "strings" || type === "numbers";
    while (
      (multi || values.length === 0) &&
      next + 1 < args.length &&
      args[next + 1] !== "--" &&
      isValue(args[next + 1], type)
    ) {
      values.push(args[++next]);
    }
    if (values.length === 0) {
      return {
        ok: false,
        error: usageError(cmdName, `option '${display}' requires an argument`),
      };
    }

    if (type === "string") {
      flags[name] = values[0];
    } else if (type === "strings") {
      flags[name] = values;
    } else {
      const invalid = values.find((value) => !INTEGER.test(value));
      if (invalid !== undefined) {
        return {
          ok: false,
          error: usageError(
            cmdName,
            `option '${display}' expects an integer, got '${invalid}'`,
          ),
        };
      }
      const numbers = values.map((value) => Number.parseInt(value, 10));
      flags[name] = type === "number" ? numbers[0] : numbers;
    }
    return { ok: true, next };
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (stopParsing || !arg.startsWith("-") || arg === "-") {
      positional.push(arg);
      continue;
    }

    if (arg === "--") {
      stopParsing = true;
      continue;
    }

    if (arg.startsWith("--")) {
      // Long option
      const eqIndex = arg.indexOf("=");
      let optName: string;
      let optValue: string | undefined;

      if (eqIndex !== -1) {
        optName = arg.slice(2, eqIndex);
        optValue = arg.slice(eqIndex + 1);
      } else {
        optName = arg.slice(2);
      }

      const info = longToInfo.get(optName);
      if (!info) {
        return { ok: false, error: unknownOption(cmdName, arg) };
      }

      const { name, type } = info;
      if (type === "boolean") {
        if (optValue !== undefined) {
          return {
            ok: false,
            error: usageError(
              cmdName,
              `option '--${optName}' doesn't allow an argument`,
            ),
          };
        }
        flags[name] = true;
      } else {
        const taken = takeValues(`--${optName}`, name, type, optValue, i);
        if (!taken.ok) return taken;
        i = taken.next;
      }
    } else {
      // Short option(s)
      const chars = arg.slice(1);

      for (let j = 0; j < chars.length; j++) {
        const c = chars[j];
        const info = shortToInfo.get(c);

        if (!info) {
          return { ok: false, error: unknownOption(cmdName, `-${c}`) };
        }

        const { name, type } = info;
        if (type === "boolean") {
          flags[name] = true;
        } else {
          // Value is attached (-l10) or follows
          const attached = j + 1 < chars.length ? chars.slice(j + 1) : undefined;
          const taken = takeValues(`-${c}`, name, type, attached, i);
          if (!taken.ok) return taken;
          i = taken.next;
          break; // Rest of chars consumed as value
        }
      }
    }
  }

  return {
    ok: true,
    result: {
      // Each entry was stored according to its definition's type
      flags: flags as ParsedArgs<T>["flags"],
      positional,
    },
  };
}
