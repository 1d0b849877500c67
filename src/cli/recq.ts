#!/usr/bin/env node
/**
 * recq binary: wires runRecq to the process.
 */

import type { CommandIO } from "../types.js";
import { openFileLines, readLines } from "../utils/line-source.js";
import { runRecq } from "./run.js";

// stdin is only attached when a pipeline actually reads it
async function* stdinLines(): AsyncGenerator<string> {
  try {
    yield* readLines(process.stdin);
  } finally {
    process.stdin.destroy();
  }
}

const io: CommandIO = {
  stdin: stdinLines(),
  openFile: openFileLines,
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (chunk) => {
    process.stderr.write(chunk);
  },
};

runRecq(process.argv.slice(2), io)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((e) => {
    console.error("recq: fatal error:", e);
    process.exitCode = 1;
  });
