/**
 * Line sources for the pipeline.
 *
 * Files and stdin are read lazily through node:readline, so a pipeline
 * that stops early (limit) stops reading.
 */

import * as fs from "node:fs";
import * as readline from "node:readline";
import type { Readable } from "node:stream";
import type { LineSource } from "../types.js";

/**
 * Lines of a readable stream, "\n" and "\r\n" terminators removed.
 */
export function readLines(input: Readable): LineSource {
  return readline.createInterface({ input, crlfDelay: Infinity });
}

/**
 * Open a file as a line source. Resolves once the file is open, so a
 * missing file rejects before the pipeline starts.
 */
export function openFileLines(path: string): Promise<LineSource> {
  return new Promise((resolve, reject) => {
    const stream = fs.createReadStream(path, { encoding: "utf-8" });
    stream.once("error", reject);
    stream.once("open", () => {
      stream.off("error", reject);
      resolve(streamLines(stream));
    });
  });
}

async function* streamLines(stream: fs.ReadStream): AsyncGenerator<string> {
  try {
    yield* readLines(stream);
  } finally {
    stream.destroy();
  }
}

/**
 * Lines of an in-memory string or array, for tests and embedding.
 */
export async function* fromLines(
  input: string | readonly string[],
): AsyncGenerator<string> {
  const lines = typeof input === "string" ? splitLines(input) : input;
  for (const line of lines) {
    yield line;
  }
}

function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  // A trailing newline does not start another line
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}
