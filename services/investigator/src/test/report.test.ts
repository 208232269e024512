import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { MalformedResponseError } from "@salesiq/core";
import { compute, splitByPeriod } from "../systems/investigation/metrics.js";
import { buildDegradedReport, formatReportMarkdown, parseReport } from "../systems/investigation/report.js";
import { REPORT_TEXT, ctrDropRows, windowRows } from "./helpers.js";

function ctrDropSet() {
  const { current, baseline } = splitByPeriod(ctrDropRows());
  return compute(current, baseline, "ctr");
}

describe("parseReport", () => {
  test("splits markdown headings into sections", () => {
    const report = parseReport(REPORT_TEXT);

    assert.equal(report.summary, "CTR for Campaign 5 fell sharply in the last ten days.");
    assert.equal(report.anomalies, "- CTR dropped 60.0% after day 20 (2024-03-20).");
    assert.equal(report.recommendations, "- Rotate the creatives.");
    assert.equal(report.degraded, false);
  });

  test("accepts numbered and bold headings", () => {
    const report = parseReport(
      [
        "Here is the report.",
        "1. **Summary**",
        "Down.",
        "**Key Metrics:**",
        "CTR -60%",
        "__Anomalies__",
        "CTR",
        "### 4) Possible Causes",
        "Fatigue",
        "Recommendations:",
        "Refresh",
      ].join("\n")
    );

    assert.equal(report.summary, "Down.");
    assert.equal(report.keyMetrics, "CTR -60%");
    assert.equal(report.possibleCauses, "Fatigue");
    assert.equal(report.recommendations, "Refresh");
  });

  test("missing sections are malformed", () => {
    assert.throws(
      () => parseReport("## Summary\nx\n## Key Metrics\ny\n## Anomalies\nz"),
      (error: unknown) =>
        error instanceof MalformedResponseError &&
        error.message === "Response is missing report sections: Possible Causes, Recommendations"
    );
  });
});

describe("buildDegradedReport", () => {
  test("lists computed values and anomalies with the change point", () => {
    const report = buildDegradedReport([ctrDropSet()], "LLM request timed out after 1000ms");

    assert.equal(
      report.summary,
      "Narrative synthesis unavailable (LLM request timed out after 1000ms). Raw metric values follow."
    );
    assert.equal(
      report.anomalies,
      [
        "- CTR: 2.50% → 1.00% (-60.0%) after day 20 (2024-03-20)",
        "- Clicks: 25 → 10 (-60.0%) after day 20 (2024-03-20)",
      ].join("\n")
    );
    assert.equal(report.possibleCauses, "Not available: narrative synthesis did not complete.");
    assert.equal(report.degraded, true);
    assert.equal(report.degradedReason, "LLM request timed out after 1000ms");
  });

  test("says when nothing crossed the threshold", () => {
    const { current, baseline } = splitByPeriod(windowRows({ clicks: 25, impressions: 1000 }, { clicks: 24, impressions: 1000 }));
    const report = buildDegradedReport([compute(current, baseline, "ctr")], "backend down");

    assert.equal(report.anomalies, "No metric changed by 20% or more.");
  });

  test("handles an empty evidence set", () => {
    const report = buildDegradedReport([], "backend down");

    assert.equal(report.keyMetrics, "No metrics were computed.");
    assert.equal(report.anomalies, "No metrics were computed.");
  });
});

describe("formatReportMarkdown", () => {
  test("renders the five sections in order", () => {
    const text = formatReportMarkdown(parseReport(REPORT_TEXT));

    assert.ok(text.startsWith("## Summary\n\nCTR for Campaign 5 fell sharply in the last ten days.\n\n## Key Metrics"));
    assert.ok(text.endsWith("## Recommendations\n\n- Rotate the creatives."));
  });

  test("flags degraded reports", () => {
    const text = formatReportMarkdown(buildDegradedReport([], "backend down"));
    assert.ok(text.startsWith("> Degraded report: backend down\n\n## Summary"));
  });
});
