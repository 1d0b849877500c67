export { runRecq } from "./cli/run.js";
export {
  ColumnIndexError,
  ConfigurationError,
  EvaluationError,
  ExpressionSyntaxError,
  getErrorMessage,
  InputFileError,
  ParseError,
  RecqError,
} from "./errors.js";
export {
  type AggregateSpec,
  aggregate,
  distinct,
  join,
  limit,
  type OrderBySpec,
  orderBy,
  parseReducer,
  type Reducer,
} from "./operators/index.js";
export { type MapStageOptions, mapRecords } from "./pipeline/map-stage.js";
export {
  type AggregateOptions,
  collect,
  createPipeline,
  type OrderByOptions,
  type PipelineInput,
  type PipelineOptions,
} from "./pipeline/pipeline.js";
export {
  type Builtin,
  type CompiledQuery,
  compileQuery,
  compareValues,
  createDefaultRegistry,
  type EvaluationContext,
  type FunctionRegistry,
  percentile,
  valueKey,
} from "./query/index.js";
export { type JsonResult, parseJson } from "./reader/json.js";
export {
  type ParsedRecord,
  RecordReader,
  type ReaderMode,
} from "./reader/record-reader.js";
export type {
  CommandIO,
  LineSource,
  QueryLogger,
  Scalar,
  Value,
} from "./types.js";
export { isTuple, isValueObject, Tuple, ValueObject } from "./types.js";
export { fromLines, openFileLines } from "./utils/line-source.js";
