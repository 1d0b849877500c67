import type { ExecResult } from "../types.js";

export const VERSION = "0.1.0";

export interface HelpInfo {
  name: string;
  summary: string;
  usage: string;
  description?: string[];
  options?: string[];
  examples?: string[];
  notes?: string[];
}

function section(title: string, lines: readonly string[] | undefined): string {
  if (!lines || lines.length === 0) return "";
  let output = `\n${title}:\n`;
  for (const line of lines) {
    output += line ? `  ${line}\n` : "\n";
  }
  return output;
}

export function showHelp(info: HelpInfo): ExecResult {
  let output = `${info.name} - ${info.summary}\n\n`;
  output += `Usage: ${info.usage}\n`;
  output += section("Description", info.description);
  output += section("Options", info.options);
  output += section("Examples", info.examples);
  output += section("Notes", info.notes);
  return { stdout: output, stderr: "", exitCode: 0 };
}

export const RECQ_HELP: HelpInfo = {
  name: "recq",
  summary: "query JSON lines and CSV records with expressions",
  usage: "recq [options]",
  description: [
    "Reads records line by line (JSON objects, falling back to CSV for the",
    "rest of a stream once a line is not a JSON object), evaluates a query",
    "per record and prints one result per line. A list result is printed",
    "element by element.",
  ],
  options: [
    "-q, --queries Q...            one query per input (default: _)",
    "-f, --files F...              one or two input files, - for stdin",
    "-c, --compact                 print objects on one line",
    "-s, --skip_header             skip the first line of each input",
    "-i, --default JSON            object merged under every JSON record",
    "-d, --distinct                drop duplicate results",
    "-a, --agg_funcs F...          aggregate with these reducers",
    "-k, --key_columns N...        group by these columns",
    "-v, --value_column N          column fed to the reducers (default: 0)",
    "-o, --order_by_columns N...   sort by these columns",
    "-r, --reverse                 sort descending",
    "-l, --limit N                 print at most N results (0: no limit)",
    "    --verbose                 log the pipeline to stderr",
    "-h, --help                    show this help",
    "    --version                 show the version",
  ],
  examples: [
    "recq -q 'name' -f users.jsonl",
    "recq -q '(dept, salary)' -a sum avg -k 0 -v 1 -f staff.jsonl",
    "recq -q '(id, name)' '(id, total)' -f users.jsonl orders.csv",
    "recq -q '_[0]' -d -o 0 -l 10 < rows.csv",
  ],
  notes: [
    "With two inputs the results are joined on their first column.",
    "Stages run in order: query, join, aggregate, distinct, sort, limit.",
  ],
};
