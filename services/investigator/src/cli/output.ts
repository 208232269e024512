/**
 * Result rendering and output files
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, extname } from "node:path";
import { formatReportMarkdown } from "../systems/investigation/report.js";
import { formatSummary, summarizeEntries } from "../systems/investigation/scratchpad.js";
import type { InvestigationResult } from "../systems/investigation/types.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

/**
 * Degraded reports still count as success
 */
export function exitCodeFor(result: InvestigationResult): number {
  return result.success ? EXIT_OK : EXIT_FAILED;
}

function failureText(result: Extract<InvestigationResult, { success: false }>): string {
  const last = result.entries[result.entries.length - 1];
  const lines = [`Investigation failed (${result.error.kind}): ${result.error.message}`];
  if (last) {
    lines.push(`Last recorded step: #${last.seq} [${last.kind}]`);
  }
  return lines.join("\n");
}

/**
 * Text for stdout
 */
export function renderResult(result: InvestigationResult): string {
  const summary = formatSummary(summarizeEntries(result.entries));
  const body = result.success ? formatReportMarkdown(result.report) : failureText(result);
  return `${body}\n\n---\n${summary}`;
}

/**
 * Full record for `.json` output
 */
export function buildRecord(result: InvestigationResult): Record<string, unknown> {
  return {
    success: result.success,
    investigation: result.investigation,
    report: result.success ? result.report : null,
    error: result.success ? null : { kind: result.error.kind, ...result.error.toJSON() },
    summary: summarizeEntries(result.entries),
    entries: result.entries,
  };
}

export function formatMarkdownFile(result: InvestigationResult, generatedAt: Date): string {
  const { investigation } = result;
  const summary = summarizeEntries(result.entries);

  const header = [
    "# Investigation Report",
    "",
    `- **Question:** ${investigation.question}`,
    `- **Investigation:** ${investigation.id}`,
    `- **Status:** ${investigation.status}${result.success && result.report.degraded ? " (degraded)" : ""}`,
    `- **Generated:** ${generatedAt.toISOString()}`,
    `- **Actions:** ${formatSummary(summary)}`,
  ];

  const body = result.success ? formatReportMarkdown(result.report) : `## Failure\n\n${failureText(result)}`;

  return `${header.join("\n")}\n\n${body}\n`;
}

export async function writeOutput(path: string, result: InvestigationResult, generatedAt = new Date()): Promise<void> {
  const content =
    extname(path).toLowerCase() === ".json"
      ? `${JSON.stringify(buildRecord(result), null, 2)}\n`
      : formatMarkdownFile(result, generatedAt);

  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf8");
}
