/**
 * Error classes raised by the pipeline.
 *
 * Every error is fatal for the run: the CLI maps each class to an exit
 * status and a message on stderr.
 */

/**
 * Base class for all recq errors.
 */
export abstract class RecqError extends Error {
  abstract readonly exitCode: number;
}

/**
 * Invalid combination or value of options, detected before any input
 * is read.
 */
export class ConfigurationError extends RecqError {
  readonly name = "ConfigurationError";
  readonly exitCode = 2;
}

/**
 * A line that is neither a JSON object nor a CSV row.
 */
export class ParseError extends RecqError {
  readonly name = "ParseError";
  readonly exitCode = 1;

  constructor(
    public readonly line: string,
    public readonly lineNumber?: number,
  ) {
    super(
      lineNumber === undefined
        ? `cannot parse line: ${line}`
        : `cannot parse line ${lineNumber}: ${line}`,
    );
  }
}

/**
 * Malformed query or reducer spec. Raised at compile time.
 */
export class ExpressionSyntaxError extends RecqError {
  readonly name = "ExpressionSyntaxError";
  readonly exitCode = 1;

  constructor(
    message: string,
    public readonly position?: number,
  ) {
    super(message);
  }
}

/**
 * Runtime fault while evaluating a query against a record.
 */
export class EvaluationError extends RecqError {
  readonly name = "EvaluationError";
  readonly exitCode = 1;

  constructor(
    message: string,
    public readonly lineNumber?: number,
  ) {
    super(lineNumber === undefined ? message : `line ${lineNumber}: ${message}`);
  }

  /**
   * The same error, tagged with the input line it was raised for.
   */
  atLine(lineNumber: number): EvaluationError {
    if (this.lineNumber !== undefined) return this;
    return new EvaluationError(this.message, lineNumber);
  }
}

/**
 * A key, value or sort column outside the bounds of a row.
 */
export class ColumnIndexError extends RecqError {
  readonly name = "ColumnIndexError";
  readonly exitCode = 1;

  constructor(
    public readonly column: number,
    public readonly rowLength: number,
    message = `column ${column} out of range for row of length ${rowLength}`,
  ) {
    super(message);
  }
}

/**
 * An input file that cannot be opened.
 */
export class InputFileError extends RecqError {
  readonly name = "InputFileError";
  readonly exitCode = 1;

  constructor(
    public readonly path: string,
    reason: string,
  ) {
    super(`${path}: ${reason}`);
  }
}

/**
 * Extract message from an unknown error value.
 * Handles both Error instances and other thrown values.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
