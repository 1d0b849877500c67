/**
 * Pipeline orchestrator
 *
 * Validates options and compiles every query and reducer up front, then
 * wires the stages in a fixed order:
 *
 *   map (one per input) -> join (two inputs) -> aggregate -> distinct
 *     -> orderBy -> limit
 *
 * Nothing is read until the returned iterable is pulled.
 */

import { ConfigurationError } from "../errors.js";
import { aggregate, parseReducer } from "../operators/aggregate.js";
import { distinct } from "../operators/distinct.js";
import { join } from "../operators/join.js";
import { limit, orderBy } from "../operators/order-by.js";
import {
  createDefaultRegistry,
  type FunctionRegistry,
} from "../query/builtins/index.js";
import { compileQuery } from "../query/evaluator.js";
import type { LineSource, QueryLogger, Value, ValueObject } from "../types.js";
import { mapRecords } from "./map-stage.js";

export const MAX_INPUTS = 2;

export interface PipelineInput {
  /** Label used in log messages, e.g. a file name or "-" */
  name: string;
  lines: LineSource;
}

export interface AggregateOptions {
  /** Reducer specs such as "sum" or "percentile(0.9)" */
  functions: readonly string[];
  keyColumns?: readonly number[];
  valueColumn?: number;
}

export interface OrderByOptions {
  columns: readonly number[];
  reverse?: boolean;
}

export interface PipelineOptions {
  /** One query per input, in input order */
  queries: readonly string[];
  inputs: readonly PipelineInput[];
  skipHeader?: boolean;
  /** Fields merged under every JSON record */
  defaults?: ValueObject;
  aggregate?: AggregateOptions;
  distinct?: boolean;
  orderBy?: OrderByOptions;
  /** Maximum number of output values; 0 or undefined for no limit */
  limit?: number;
  /** Functions available to queries and reducers */
  functions?: FunctionRegistry;
  logger?: QueryLogger;
}

function validate(options: PipelineOptions): void {
  const { queries, inputs } = options;
  if (inputs.length === 0 || inputs.length > MAX_INPUTS) {
    throw new ConfigurationError(
      `expected 1 or ${MAX_INPUTS} inputs, got ${inputs.length}`,
    );
  }
  if (queries.length !== inputs.length) {
    throw new ConfigurationError(
      `got ${queries.length} queries for ${inputs.length} inputs; give one query per input`,
    );
  }
  if (options.aggregate && options.aggregate.functions.length === 0) {
    throw new ConfigurationError("no aggregate functions given");
  }
  if (options.orderBy && options.orderBy.columns.length === 0) {
    throw new ConfigurationError("no order-by columns given");
  }
  if (
    options.limit !== undefined &&
    (!Number.isInteger(options.limit) || options.limit < 0)
  ) {
    throw new ConfigurationError(
      `limit must be a non-negative integer, got ${options.limit}`,
    );
  }
}

/**
 * Build the pipeline. Throws ConfigurationError or ExpressionSyntaxError
 * immediately for bad options; runtime errors surface while iterating.
 */
export function createPipeline(options: PipelineOptions): AsyncIterable<Value> {
  validate(options);
  const functions = options.functions ?? createDefaultRegistry();
  const compiled = options.queries.map((query) =>
    compileQuery(query, functions),
  );
  const reducers =
    options.aggregate?.functions.map((spec) => parseReducer(spec, functions)) ??
    [];

  const stages: string[] = ["map"];
  const mapped = options.inputs.map((input, i) =>
    mapRecords(input.lines, compiled[i], {
      skipHeader: options.skipHeader,
      defaults: options.defaults,
      logger: options.logger,
      source: input.name,
    }),
  );

  let stream: AsyncIterable<Value> = mapped[0];
  if (mapped.length === 2) {
    stream = join(mapped[0], mapped[1]);
    stages.push("join");
  }
  if (options.aggregate) {
    stream = aggregate(stream, {
      reducers,
      keyColumns: options.aggregate.keyColumns ?? [],
      valueColumn: options.aggregate.valueColumn ?? 0,
    });
    stages.push("aggregate");
  }
  if (options.distinct) {
    stream = distinct(stream);
    stages.push("distinct");
  }
  if (options.orderBy) {
    stream = orderBy(stream, options.orderBy);
    stages.push("orderBy");
  }
  if (options.limit) {
    stream = limit(stream, options.limit);
    stages.push("limit");
  }

  options.logger?.info("pipeline", {
    inputs: options.inputs.map((input) => input.name),
    queries: compiled.map((query) => query.source),
    stages,
  });
  return stream;
}

/**
 * Run a pipeline to completion and collect its output.
 */
export async function collect(stream: AsyncIterable<Value>): Promise<Value[]> {
  const values: Value[] = [];
  for await (const value of stream) {
    values.push(value);
  }
  return values;
}
