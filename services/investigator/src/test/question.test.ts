import assert from "node:assert/strict";
import { after, before, describe, test } from "node:test";
import { AmbiguousQuestionError, logger } from "@salesiq/core";
import { findMetric, parseQuestion } from "../systems/investigation/question.js";

before(() => logger.setHandlers([]));
after(() => logger.resetHandlers());

function missingOf(question: string): unknown {
  try {
    parseQuestion(question);
  } catch (error) {
    if (error instanceof AmbiguousQuestionError) return error.missing;
    throw error;
  }
  return null;
}

describe("parseQuestion", () => {
  test("reads campaign and metric from the question", () => {
    assert.deepEqual(parseQuestion("Why did CTR drop for Campaign 5?"), { campaignId: 5, metric: "ctr" });
  });

  test("accepts campaign id spellings", () => {
    assert.equal(parseQuestion("clicks for campaign_id=12").campaignId, 12);
    assert.equal(parseQuestion("clicks for campaign #3").campaignId, 3);
    assert.equal(parseQuestion("clicks for CAMPAIGN: 40").campaignId, 40);
  });

  test("earliest metric mention wins", () => {
    const target = parseQuestion("What happened to the click-through rate of campaign 12, and its CPC?");
    assert.equal(target.metric, "ctr");
  });

  test("longer phrase wins at the same position", () => {
    assert.equal(findMetric("conversion rate fell"), "cvr");
    assert.equal(findMetric("conversions fell"), "conversions");
    assert.equal(findMetric("cost per click went up"), "cpc");
  });

  test("context overrides the question", () => {
    assert.deepEqual(parseQuestion("Investigate Campaign 5", { metric: "roas" }), { campaignId: 5, metric: "roas" });
    assert.deepEqual(parseQuestion("Why did CTR drop for Campaign 5?", { campaign_id: "9", metric: "CVR" }), {
      campaignId: 9,
      metric: "cvr",
    });
  });

  test("unrecognized overrides are ignored", () => {
    const target = parseQuestion("Why did clicks fall for campaign 2?", { metric: "happiness", campaign_id: "abc" });
    assert.deepEqual(target, { campaignId: 2, metric: "clicks" });
  });

  test("object property names are not metrics", () => {
    assert.deepEqual(parseQuestion("Investigate CTR drop for Campaign 5", { metric: "constructor" }), {
      campaignId: 5,
      metric: "ctr",
    });
    assert.equal(parseQuestion("CTR for campaign 5", { metric: "toString" }).metric, "ctr");
  });

  test("ad_id narrows the target when it is a positive integer", () => {
    assert.deepEqual(parseQuestion("CTR for campaign 5", { ad_id: "7" }), { campaignId: 5, metric: "ctr", adId: 7 });
    assert.deepEqual(parseQuestion("CTR for campaign 5", { ad_id: "seven" }), { campaignId: 5, metric: "ctr" });
  });

  test("names what could not be identified", () => {
    assert.deepEqual(missingOf("Investigate Campaign 5"), ["metric"]);
    assert.deepEqual(missingOf("Why did CTR drop?"), ["entity"]);
    assert.deepEqual(missingOf("How are things going?"), ["metric", "entity"]);
  });

  test("ambiguous questions carry the original text", () => {
    assert.throws(
      () => parseQuestion("How are things going?"),
      (error: unknown) =>
        error instanceof AmbiguousQuestionError &&
        error.message === 'Could not identify metric and entity in question: "How are things going?"'
    );
  });
});
