/**
 * Record reader
 *
 * Turns raw lines into records plus the evaluation context a query sees.
 * Each reader starts in "json" mode. The first line that is not a JSON
 * object moves it to "csv" mode for the rest of its stream; there is no
 * way back.
 */

import { ParseError } from "../errors.js";
import type { EvaluationContext } from "../query/evaluator.js";
import { RECORD_ALIAS, sanitizeName } from "../query/names.js";
import {
  isValueObject,
  type QueryLogger,
  type Value,
  ValueObject,
} from "../types.js";
import { parseCsvRow, toCsvRecord } from "./csv.js";
import { parseJson } from "./json.js";

export type ReaderMode = "json" | "csv";

export interface ParsedRecord {
  record: Value;
  context: EvaluationContext;
}

export interface RecordReaderOptions {
  /** Fields merged under every JSON record */
  defaults?: ValueObject;
  logger?: QueryLogger;
  /** Stream label for log messages */
  source?: string;
}

type JsonObjectResult = { ok: true; value: ValueObject } | { ok: false };

function parseJsonObject(line: string): JsonObjectResult {
  const parsed = parseJson(line);
  return parsed.ok && isValueObject(parsed.value)
    ? { ok: true, value: parsed.value }
    : { ok: false };
}

/**
 * Context for a JSON record: every top-level key under its sanitized
 * name, then the whole record under the alias.
 */
function jsonContext(record: ValueObject): EvaluationContext {
  const context = new Map<string, Value>();
  for (const [key, value] of record) {
    context.set(sanitizeName(key), value);
  }
  context.set(RECORD_ALIAS, record);
  return context;
}

export class RecordReader {
  private currentMode: ReaderMode = "json";
  private readonly defaults: ValueObject;

  constructor(private readonly options: RecordReaderOptions = {}) {
    this.defaults = options.defaults ?? new ValueObject();
  }

  get mode(): ReaderMode {
    return this.currentMode;
  }

  /**
   * Read one line. Throws ParseError when the line is neither a JSON
   * object (while still in json mode) nor a CSV row.
   */
  read(line: string, lineNumber?: number): ParsedRecord {
    if (this.currentMode === "json") {
      const parsed = parseJsonObject(line);
      if (parsed.ok) {
        const record = this.defaults.merge(parsed.value);
        return { record, context: jsonContext(record) };
      }
      this.switchToCsv(lineNumber);
    }

    const row = parseCsvRow(line);
    if (!row.ok) {
      throw new ParseError(line, lineNumber);
    }
    const record = toCsvRecord(row.fields);
    const context = new Map<string, Value>([[RECORD_ALIAS, record]]);
    return { record, context };
  }

  private switchToCsv(lineNumber?: number): void {
    this.currentMode = "csv";
    this.options.logger?.debug("reader mode", {
      source: this.options.source,
      mode: this.currentMode,
      lineNumber,
    });
  }
}
