/**
 * In-memory CommandIO for CLI tests.
 */

import type { CommandIO } from "../types.js";
import { fromLines } from "../utils/line-source.js";

export interface MemoryIO extends CommandIO {
  readonly out: string[];
  readonly err: string[];
  /** Files handed to openFile, and whether each was read to the end */
  readonly opened: Map<string, boolean>;
}

export function createMemoryIO(
  files: Record<string, string> = {},
  stdin = "",
): MemoryIO {
  const out: string[] = [];
  const err: string[] = [];
  const opened = new Map<string, boolean>();
  return {
    out,
    err,
    opened,
    stdin: fromLines(stdin),
    async openFile(path) {
      if (!Object.hasOwn(files, path)) {
        throw Object.assign(new Error(`ENOENT: ${path}`), { code: "ENOENT" });
      }
      opened.set(path, false);
      const lines = fromLines(files[path]);
      return (async function* () {
        yield* lines;
        opened.set(path, true);
      })();
    },
    stdout: (chunk) => out.push(chunk),
    stderr: (chunk) => err.push(chunk),
  };
}
