/**
 * Command-line argument parsing
 */

import { ValidationError } from "@salesiq/core";

export type CliCommand =
  | {
      command: "investigate";
      question: string;
      context: Record<string, string>;
      output?: string;
      verbose: boolean;
    }
  | { command: "test-connection"; verbose: boolean }
  | { command: "help" };

/**
 * Parse `key=value` pairs separated by commas
 */
export function parseContext(raw: string): Record<string, string> {
  const context: Record<string, string> = {};

  for (const part of raw.split(",")) {
    const pair = part.trim();
    if (pair === "") continue;

    const eq = pair.indexOf("=");
    const key = eq > 0 ? pair.slice(0, eq).trim() : "";
    if (key === "") {
      throw new ValidationError(`Invalid context entry "${pair}" (expected key=value)`, {
        field: "context",
        received: pair,
      });
    }
    context[key] = pair.slice(eq + 1).trim();
  }

  return context;
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("-")) {
    throw new ValidationError(`Option ${flag} requires a value`, { field: flag });
  }
  return value;
}

/**
 * @throws ValidationError on usage errors
 */
export function parseArgs(args: string[]): CliCommand {
  let question = "";
  let context: Record<string, string> = {};
  let output: string | undefined;
  let verbose = false;
  let testConnection = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      return { command: "help" };
    } else if (arg === "--context" || arg === "-c") {
      context = { ...context, ...parseContext(takeValue(args, ++i, arg)) };
    } else if (arg === "--output" || arg === "-o") {
      output = takeValue(args, ++i, arg);
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg === "--test-connection") {
      testConnection = true;
    } else if (arg.startsWith("-")) {
      throw new ValidationError(`Unknown option: ${arg}`, { field: "argv", received: arg });
    } else if (!question) {
      question = arg;
    } else {
      throw new ValidationError(`Unexpected argument: ${arg} (quote the question)`, {
        field: "argv",
        received: arg,
      });
    }
  }

  if (testConnection) {
    return { command: "test-connection", verbose };
  }

  if (!question.trim()) {
    throw new ValidationError("A question is required", { field: "question" });
  }

  return { command: "investigate", question: question.trim(), context, output, verbose };
}

export function helpText(): string {
  return `
SalesIQ Investigator - root-cause analysis for campaign metrics

USAGE:
  salesiq-investigate "<question>" [options]
  npm run investigate -- "<question>" [options]

OPTIONS:
  -c, --context <pairs>   Extra context as key=value pairs, comma separated
  -o, --output <path>     Write the result to a file (.json = full record, otherwise markdown)
  -v, --verbose           Enable debug logging
      --test-connection   Check the database connection and exit
  -h, --help              Show this help message

CONTEXT KEYS:
  campaign_id, metric     Override what the question names
  timeframe               last_7_days, 7d, 7 or a YYYY-MM-DD start of the current window
  lookback_days           Baseline days before the current window (default 60)
  ad_id                   Restrict to one ad

EXAMPLES:
  salesiq-investigate "Why did CTR drop for Campaign 5?"
  salesiq-investigate "Investigate Campaign 5" -c "metric=ctr,timeframe=last_10_days"
  salesiq-investigate "ROAS for campaign 3" -o reports/roas.md

EXIT CODES:
  0  report produced (including degraded reports)
  1  investigation failed or configuration is invalid
  2  usage error
`;
}
