import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { InvestigationError, QueryError, ValidationError } from "@salesiq/core";
import { parseArgs, parseContext } from "../cli/args.js";
import { EXIT_FAILED, EXIT_OK, exitCodeFor, formatMarkdownFile, renderResult } from "../cli/output.js";
import { parseReport } from "../systems/investigation/report.js";
import type { Investigation, InvestigationResult, ScratchpadEntry } from "../systems/investigation/index.js";
import { NOW, REPORT_TEXT } from "./helpers.js";

function investigation(status: Investigation["status"]): Investigation {
  return {
    id: "inv-1",
    question: "Why did CTR drop for Campaign 5?",
    context: {},
    startedAt: NOW,
    completedAt: NOW,
    status,
    phase: status === "completed" ? "completed" : "failed",
    target: { campaignId: 5, metric: "ctr" },
    report: null,
  };
}

const ENTRIES: ScratchpadEntry[] = [
  { seq: 1, kind: "schema_lookup", inputs: {}, outputs: {}, timestamp: NOW },
  { seq: 2, kind: "query", inputs: {}, outputs: {}, timestamp: NOW },
];

function succeeded(): InvestigationResult {
  return { success: true, report: parseReport(REPORT_TEXT), investigation: investigation("completed"), entries: ENTRIES };
}

function failed(): InvestigationResult {
  const cause = new QueryError("Query failed after 3 attempts: timeout", {
    errorClass: "statement_timeout",
    sql: "SELECT 1",
    retryable: true,
  });
  return {
    success: false,
    error: new InvestigationError("query", "inv-1", cause),
    investigation: investigation("failed"),
    entries: ENTRIES,
  };
}

describe("parseArgs", () => {
  test("question with context and output", () => {
    assert.deepEqual(parseArgs(["  Why did CTR drop?  ", "-c", "campaign_id=5, metric=ctr", "-o", "out.md", "-v"]), {
      command: "investigate",
      question: "Why did CTR drop?",
      context: { campaign_id: "5", metric: "ctr" },
      output: "out.md",
      verbose: true,
    });
  });

  test("repeated context flags merge", () => {
    const command = parseArgs(["q", "--context", "metric=ctr", "--context", "metric=cvr,ad_id=2"]);
    assert.equal(command.command, "investigate");
    if (command.command === "investigate") {
      assert.deepEqual(command.context, { metric: "cvr", ad_id: "2" });
    }
  });

  test("help and connection checks", () => {
    assert.deepEqual(parseArgs(["q", "--help"]), { command: "help" });
    assert.deepEqual(parseArgs(["--test-connection"]), { command: "test-connection", verbose: false });
  });

  test("usage errors", () => {
    assert.throws(() => parseArgs([]), { message: "A question is required" });
    assert.throws(() => parseArgs(["q", "--nope"]), { message: "Unknown option: --nope" });
    assert.throws(() => parseArgs(["q", "-o"]), { message: "Option -o requires a value" });
    assert.throws(() => parseArgs(["q", "extra"]), ValidationError);
  });
});

describe("parseContext", () => {
  test("splits pairs and keeps '=' in values", () => {
    assert.deepEqual(parseContext("a=1,, b = x=y "), { a: "1", b: "x=y" });
  });

  test("rejects entries without a key", () => {
    assert.throws(() => parseContext("=5"), { message: 'Invalid context entry "=5" (expected key=value)' });
    assert.throws(() => parseContext("metric"), ValidationError);
  });
});

describe("output", () => {
  test("exit codes", () => {
    assert.equal(exitCodeFor(succeeded()), EXIT_OK);
    assert.equal(exitCodeFor(failed()), EXIT_FAILED);
  });

  test("failure text names the kind and the last step", () => {
    assert.equal(
      renderResult(failed()),
      [
        "Investigation failed (query): Query failed after 3 attempts: timeout",
        "Last recorded step: #2 [query]",
        "",
        "---",
        "2 actions (schema_lookup=1, query=1) in 0.0s",
      ].join("\n")
    );
  });

  test("markdown file header", () => {
    const text = formatMarkdownFile(succeeded(), new Date(NOW));

    assert.ok(
      text.startsWith(
        [
          "# Investigation Report",
          "",
          "- **Question:** Why did CTR drop for Campaign 5?",
          "- **Investigation:** inv-1",
          "- **Status:** completed",
          `- **Generated:** ${NOW}`,
          "- **Actions:** 2 actions (schema_lookup=1, query=1) in 0.0s",
          "",
          "## Summary",
        ].join("\n")
      )
    );
    assert.ok(text.endsWith("- Rotate the creatives.\n"));
  });
});
