/**
 * Map stage: raw lines in, query results out.
 */

import { EvaluationError } from "../errors.js";
import type { CompiledQuery } from "../query/evaluator.js";
import { RecordReader } from "../reader/record-reader.js";
import type { LineSource, QueryLogger, Value, ValueObject } from "../types.js";

export interface MapStageOptions {
  skipHeader?: boolean;
  defaults?: ValueObject;
  logger?: QueryLogger;
  /** Stream label for log messages */
  source?: string;
}

/**
 * Evaluate `query` against every record of `lines`. A list result is
 * spliced into the output element by element; anything else is one
 * output value.
 */
export async function* mapRecords(
  lines: LineSource,
  query: CompiledQuery,
  options: MapStageOptions = {},
): AsyncGenerator<Value> {
  const reader = new RecordReader({
    defaults: options.defaults,
    logger: options.logger,
    source: options.source,
  });

  let lineNumber = 0;
  for await (const line of lines) {
    lineNumber++;
    if (options.skipHeader && lineNumber === 1) continue;
    if (line.trim() === "") continue;

    const { context } = reader.read(line, lineNumber);
    let result: Value;
    try {
      result = query.evaluate(context);
    } catch (error) {
      if (error instanceof EvaluationError) throw error.atLine(lineNumber);
      throw error;
    }

    if (Array.isArray(result)) {
      yield* result;
    } else {
      yield result;
    }
  }
}
