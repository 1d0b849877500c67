/**
 * Value model shared by the reader, the expression language and the
 * stream operators.
 *
 * JSON arrays become lists (plain arrays), JSON objects become
 * ValueObjects. Tuples are a separate variant: a list produced by a query
 * is flattened into several output records, a tuple is one.
 *
 * Integers outside the safe range are bigints; every other number is a
 * plain number.
 */

export type Scalar = null | boolean | number | bigint | string;

export type Value = Scalar | Value[] | Tuple | ValueObject;

/**
 * Fixed-length positional record. CSV rows, join results and aggregate
 * groups are tuples.
 */
export class Tuple {
  readonly items: readonly Value[];

  constructor(items: Iterable<Value>) {
    this.items = Object.freeze([...items]);
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): Value | undefined {
    return this.items.at(index);
  }

  slice(start?: number, end?: number): Tuple {
    return new Tuple(this.items.slice(start, end));
  }

  [Symbol.iterator](): Iterator<Value> {
    return this.items[Symbol.iterator]();
  }
}

/**
 * Keyed record. Keys keep the order they were first inserted in,
 * integer-like keys included, and come from untrusted input: "__proto__"
 * and "constructor" are ordinary keys.
 */
export class ValueObject {
  private readonly fields: ReadonlyMap<string, Value>;

  /** Later entries win; a repeated key keeps its first position */
  constructor(entries: Iterable<readonly [string, Value]> = []) {
    this.fields = new Map(entries);
  }

  get size(): number {
    return this.fields.size;
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  get(key: string): Value | undefined {
    return this.fields.get(key);
  }

  keys(): IterableIterator<string> {
    return this.fields.keys();
  }

  values(): IterableIterator<Value> {
    return this.fields.values();
  }

  entries(): IterableIterator<[string, Value]> {
    return this.fields.entries();
  }

  /**
   * This object's entries, then those of `overlay`.
   */
  merge(overlay: ValueObject): ValueObject {
    return new ValueObject([...this.fields, ...overlay.fields]);
  }

  [Symbol.iterator](): IterableIterator<[string, Value]> {
    return this.fields.entries();
  }
}

export function isTuple(value: Value): value is Tuple {
  return value instanceof Tuple;
}

export function isValueObject(value: Value): value is ValueObject {
  return value instanceof ValueObject;
}

/**
 * Items of a list or tuple, or undefined for anything else.
 */
export function asSequence(value: Value): readonly Value[] | undefined {
  if (Array.isArray(value)) return value;
  if (value instanceof Tuple) return value.items;
  return undefined;
}

/**
 * Logger interface for pipeline tracing.
 * Implement this interface to receive pipeline logs.
 */
export interface QueryLogger {
  /** Log informational messages (pipeline wiring) */
  info(message: string, data?: Record<string, unknown>): void;
  /** Log debug messages (reader mode switches) */
  debug(message: string, data?: Record<string, unknown>): void;
}

/** A stream of raw input lines, without their terminators. */
export type LineSource = AsyncIterable<string>;

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * I/O collaborators handed to the CLI. The binary wires them to the
 * process; tests supply in-memory versions.
 */
export interface CommandIO {
  /** Lines of standard input */
  stdin: LineSource;
  /** Open a file as a line source; throws when it cannot be read */
  openFile(path: string): Promise<LineSource>;
  stdout(chunk: string): void;
  stderr(chunk: string): void;
}
