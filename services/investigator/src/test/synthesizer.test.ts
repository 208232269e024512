import assert from "node:assert/strict";
import { after, before, describe, test } from "node:test";
import { MalformedResponseError, SynthesisError, logger } from "@salesiq/core";
import { buildSynthesisPrompt, getSynthesisSystemPrompt } from "../systems/investigation/prompt.js";
import { NarrativeSynthesizer } from "../systems/investigation/synthesizer.js";
import { FakeExecutor, REPORT_TEXT, TEST_SETTINGS } from "./helpers.js";

before(() => logger.setHandlers([]));
after(() => logger.resetHandlers());

const QUESTION = "Why did CTR drop for Campaign 5?";

describe("synthesis prompt", () => {
  test("is a pure function of question and evidence", () => {
    const a = buildSynthesisPrompt("#1 [query] ...", QUESTION);
    const b = buildSynthesisPrompt("#1 [query] ...", QUESTION);

    assert.equal(a, b);
    assert.ok(a.startsWith(`An analyst asked: "${QUESTION}"`));
    assert.ok(a.includes("<evidence>\n#1 [query] ...\n</evidence>"));
    assert.ok(a.endsWith("In Anomalies, state the size of each change and the day it started. Keep each section short and specific to the evidence."));
  });
});

describe("NarrativeSynthesizer", () => {
  test("sends one request and parses the sections", async () => {
    const executor = FakeExecutor.replying(REPORT_TEXT);
    const synthesizer = new NarrativeSynthesizer(executor, TEST_SETTINGS.profile);

    const report = await synthesizer.synthesize("evidence text", { question: QUESTION });

    assert.equal(report.recommendations, "- Rotate the creatives.");
    assert.equal(executor.requests.length, 1);
    assert.equal(executor.requests[0].systemPrompt, getSynthesisSystemPrompt());
    assert.equal(executor.requests[0].profile.model, "test-model");
    assert.ok(executor.requests[0].prompt.includes("<evidence>\nevidence text\n</evidence>"));
  });

  test("backend timeouts become retryable synthesis errors", async () => {
    const synthesizer = new NarrativeSynthesizer(
      FakeExecutor.failing("LLM_TIMEOUT", "LLM request timed out after 1000ms"),
      TEST_SETTINGS.profile
    );

    await assert.rejects(synthesizer.synthesize("evidence", { question: QUESTION }), (error: unknown) => {
      assert.ok(error instanceof SynthesisError);
      assert.equal(error.code, "LLM_TIMEOUT");
      assert.equal(error.retryable, true);
      assert.equal(error.message, "LLM request timed out after 1000ms");
      return true;
    });
  });

  test("thrown backend errors are wrapped", async () => {
    const executor = new FakeExecutor(async () => {
      throw new Error("socket hang up");
    });
    const synthesizer = new NarrativeSynthesizer(executor, TEST_SETTINGS.profile);

    await assert.rejects(synthesizer.synthesize("evidence", { question: QUESTION }), {
      name: "SynthesisError",
      message: "Backend call failed: socket hang up",
    });
  });

  test("responses without the sections are malformed", async () => {
    const synthesizer = new NarrativeSynthesizer(FakeExecutor.replying("CTR went down."), TEST_SETTINGS.profile);

    await assert.rejects(synthesizer.synthesize("evidence", { question: QUESTION }), MalformedResponseError);
  });
});
