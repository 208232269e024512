/**
 * Report
 * Five-section report parsing, degraded fallback and markdown rendering
 */

import { MalformedResponseError } from "@salesiq/core";
import { describeAnomalies, describeMetricSet } from "./metrics.js";
import type { MetricSet, Report, ReportSectionKey } from "./types.js";

export const REPORT_SECTIONS: ReadonlyArray<{ key: ReportSectionKey; title: string }> = [
  { key: "summary", title: "Summary" },
  { key: "keyMetrics", title: "Key Metrics" },
  { key: "anomalies", title: "Anomalies" },
  { key: "possibleCauses", title: "Possible Causes" },
  { key: "recommendations", title: "Recommendations" },
];

const HEADING =
  /^\s*(?:#{1,6}\s*)?(?:\d+[.)]\s*)?(?:\*\*|__)?\s*(summary|key metrics|anomalies|possible causes|recommendations)\s*:?\s*(?:\*\*|__)?\s*:?\s*$/i;

function sectionFor(title: string): ReportSectionKey | undefined {
  const lower = title.toLowerCase();
  return REPORT_SECTIONS.find((s) => s.title.toLowerCase() === lower)?.key;
}

/**
 * Split model output on section headings. Markdown headings, numbering and
 * bold are all accepted.
 *
 * @throws MalformedResponseError when any of the five sections is absent
 */
export function parseReport(text: string): Report {
  const bodies = new Map<ReportSectionKey, string[]>();
  let current: ReportSectionKey | undefined;

  for (const line of text.split(/\r?\n/)) {
    const match = HEADING.exec(line);
    const key = match ? sectionFor(match[1]) : undefined;

    if (key) {
      current = key;
      if (!bodies.has(key)) bodies.set(key, []);
      continue;
    }

    if (current) {
      bodies.get(current)?.push(line);
    }
  }

  const missing = REPORT_SECTIONS.filter((s) => !bodies.has(s.key)).map((s) => s.title);
  if (missing.length > 0) {
    throw new MalformedResponseError(missing);
  }

  const section = (key: ReportSectionKey): string => (bodies.get(key) ?? []).join("\n").trim();

  return {
    summary: section("summary"),
    keyMetrics: section("keyMetrics"),
    anomalies: section("anomalies"),
    possibleCauses: section("possibleCauses"),
    recommendations: section("recommendations"),
    degraded: false,
  };
}

const UNAVAILABLE = "Not available: narrative synthesis did not complete.";

/**
 * Report built from computed values only, used when synthesis fails
 */
export function buildDegradedReport(sets: readonly MetricSet[], reason: string): Report {
  const bullet = (line: string): string => `- ${line}`;

  const keyMetrics = sets.flatMap(describeMetricSet).map(bullet);
  const anomalies = sets.flatMap(describeAnomalies).map(bullet);
  const threshold = sets[0]?.threshold;

  return {
    summary: `Narrative synthesis unavailable (${reason}). Raw metric values follow.`,
    keyMetrics: keyMetrics.length > 0 ? keyMetrics.join("\n") : "No metrics were computed.",
    anomalies:
      anomalies.length > 0
        ? anomalies.join("\n")
        : threshold === undefined
          ? "No metrics were computed."
          : `No metric changed by ${(threshold * 100).toFixed(0)}% or more.`,
    possibleCauses: UNAVAILABLE,
    recommendations: UNAVAILABLE,
    degraded: true,
    degradedReason: reason,
  };
}

export function formatReportMarkdown(report: Report): string {
  const parts: string[] = [];

  if (report.degraded) {
    parts.push(`> Degraded report: ${report.degradedReason ?? "synthesis unavailable"}`);
  }

  for (const { key, title } of REPORT_SECTIONS) {
    parts.push(`## ${title}\n\n${report[key]}`);
  }

  return parts.join("\n\n");
}
