/**
 * Command-line options and their resolution into pipeline settings.
 */

import { ConfigurationError } from "../errors.js";
import type { AggregateOptions, OrderByOptions } from "../pipeline/pipeline.js";
import { RECORD_ALIAS } from "../query/names.js";
import { parseJson } from "../reader/json.js";
import { isValueObject, type ValueObject } from "../types.js";
import type { ParsedArgs } from "../utils/args.js";

export const STDIN_NAME = "-";

export const RECQ_OPTIONS = {
  queries: { short: "q", long: "queries", type: "strings" as const },
  files: { short: "f", long: "files", type: "strings" as const },
  compact: { short: "c", long: "compact", type: "boolean" as const },
  skipHeader: { short: "s", long: "skip_header", type: "boolean" as const },
  defaults: { short: "i", long: "default", type: "string" as const },
  distinct: { short: "d", long: "distinct", type: "boolean" as const },
  aggFuncs: { short: "a", long: "agg_funcs", type: "strings" as const },
  keyColumns: { short: "k", long: "key_columns", type: "numbers" as const },
  valueColumn: { short: "v", long: "value_column", type: "number" as const },
  orderBy: { short: "o", long: "order_by_columns", type: "numbers" as const },
  reverse: { short: "r", long: "reverse", type: "boolean" as const },
  limit: { short: "l", long: "limit", type: "number" as const },
  verbose: { long: "verbose", type: "boolean" as const },
  help: { short: "h", long: "help", type: "boolean" as const },
  version: { long: "version", type: "boolean" as const },
};

export type RecqArgs = ParsedArgs<typeof RECQ_OPTIONS>;

export interface ResolvedOptions {
  /** File names, "-" for stdin */
  files: string[];
  queries: string[];
  compact: boolean;
  verbose: boolean;
  skipHeader: boolean;
  defaults?: ValueObject;
  aggregate?: AggregateOptions;
  distinct: boolean;
  orderBy?: OrderByOptions;
  limit?: number;
}

function parseDefaults(text: string): ValueObject {
  const parsed = parseJson(text);
  if (!parsed.ok) {
    throw new ConfigurationError(`--default is not valid JSON: ${text}`);
  }
  if (!isValueObject(parsed.value)) {
    throw new ConfigurationError(`--default must be a JSON object: ${text}`);
  }
  return parsed.value;
}

/**
 * Fill in defaults and reject combinations the pipeline cannot run.
 */
export function resolveOptions({ flags, positional }: RecqArgs): ResolvedOptions {
  if (positional.length > 0) {
    throw new ConfigurationError(
      `unexpected argument '${positional[0]}'; pass inputs with -f`,
    );
  }

  const files = flags.files ?? [STDIN_NAME];
  if (files.filter((file) => file === STDIN_NAME).length > 1) {
    throw new ConfigurationError("standard input can only be read once");
  }
  const queries = flags.queries ?? files.map(() => RECORD_ALIAS);

  if (!flags.aggFuncs) {
    if (flags.keyColumns) {
      throw new ConfigurationError("--key_columns requires --agg_funcs");
    }
    if (flags.valueColumn !== undefined) {
      throw new ConfigurationError("--value_column requires --agg_funcs");
    }
  }
  if (flags.reverse && !flags.orderBy) {
    throw new ConfigurationError("--reverse requires --order_by_columns");
  }

  return {
    files,
    queries,
    compact: flags.compact,
    verbose: flags.verbose,
    skipHeader: flags.skipHeader,
    defaults:
      flags.defaults === undefined ? undefined : parseDefaults(flags.defaults),
    aggregate: flags.aggFuncs && {
      functions: flags.aggFuncs,
      keyColumns: flags.keyColumns ?? [],
      valueColumn: flags.valueColumn ?? 0,
    },
    distinct: flags.distinct,
    orderBy: flags.orderBy && {
      columns: flags.orderBy,
      reverse: flags.reverse,
    },
    limit: flags.limit,
  };
}
