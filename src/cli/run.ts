/**
 * recq command
 *
 * Parses arguments, builds the pipeline and streams its results to the
 * given I/O. Every failure ends up as a message on stderr and an exit
 * status; nothing is thrown for errors the pipeline knows about.
 */

import {
  ConfigurationError,
  getErrorMessage,
  InputFileError,
  RecqError,
} from "../errors.js";
import { createPipeline, type PipelineInput } from "../pipeline/pipeline.js";
import type { CommandIO, LineSource, QueryLogger } from "../types.js";
import { parseArgs } from "../utils/args.js";
import { formatRecord } from "./format.js";
import { RECQ_HELP, showHelp, VERSION } from "./help.js";
import { RECQ_OPTIONS, resolveOptions, STDIN_NAME } from "./options.js";

const CMD = "recq";
const USAGE_HINT = `Try '${CMD} --help' for more information.\n`;

function openReason(error: unknown): string {
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return "No such file or directory";
  }
  return getErrorMessage(error);
}

/**
 * A file opened on first pull, so option errors are reported before any
 * file is touched.
 */
async function* openLazily(io: CommandIO, path: string): AsyncGenerator<string> {
  let lines: LineSource;
  try {
    lines = await io.openFile(path);
  } catch (error) {
    throw new InputFileError(path, openReason(error));
  }
  yield* lines;
}

/**
 * Logger that writes one line per entry to stderr.
 */
export function createStderrLogger(io: CommandIO): QueryLogger {
  const write = (level: string, message: string, data?: Record<string, unknown>) =>
    io.stderr(
      `${CMD}: [${level}] ${message}${data ? ` ${JSON.stringify(data)}` : ""}\n`,
    );
  return {
    info: (message, data) => write("info", message, data),
    debug: (message, data) => write("debug", message, data),
  };
}

/**
 * Run recq with `args` (without the program name). Resolves to the exit
 * status.
 */
export async function runRecq(
  args: readonly string[],
  io: CommandIO,
): Promise<number> {
  const parsed = parseArgs(CMD, args, RECQ_OPTIONS);
  if (!parsed.ok) {
    io.stderr(parsed.error.stderr);
    return parsed.error.exitCode;
  }

  const { flags } = parsed.result;
  if (flags.help) {
    io.stdout(showHelp(RECQ_HELP).stdout);
    return 0;
  }
  if (flags.version) {
    io.stdout(`${CMD} ${VERSION}\n`);
    return 0;
  }

  try {
    const options = resolveOptions(parsed.result);
    const inputs: PipelineInput[] = options.files.map((file) => ({
      name: file,
      lines: file === STDIN_NAME ? io.stdin : openLazily(io, file),
    }));
    const pipeline = createPipeline({
      queries: options.queries,
      inputs,
      skipHeader: options.skipHeader,
      defaults: options.defaults,
      aggregate: options.aggregate,
      distinct: options.distinct,
      orderBy: options.orderBy,
      limit: options.limit,
      logger: options.verbose ? createStderrLogger(io) : undefined,
    });

    for await (const value of pipeline) {
      io.stdout(`${formatRecord(value, options.compact)}\n`);
    }
    return 0;
  } catch (error) {
    if (error instanceof RecqError) {
      const hint = error instanceof ConfigurationError ? USAGE_HINT : "";
      io.stderr(`${CMD}: ${error.message}\n${hint}`);
      return error.exitCode;
    }
    throw error;
  }
}
