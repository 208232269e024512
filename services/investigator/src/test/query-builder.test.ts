import assert from "node:assert/strict";
import { after, before, describe, test } from "node:test";
import { logger } from "@salesiq/core";
import {
  buildQueryPlan,
  describeBoundary,
  parseTimeframe,
  renderQuery,
  repairPlan,
} from "../systems/investigation/query-builder.js";

before(() => logger.setHandlers([]));
after(() => logger.resetHandlers());

describe("parseTimeframe", () => {
  test("relative forms", () => {
    assert.deepEqual(parseTimeframe("last_7_days", 10), { mode: "relative", recentDays: 7 });
    assert.deepEqual(parseTimeframe("Last 14 Days", 10), { mode: "relative", recentDays: 14 });
    assert.deepEqual(parseTimeframe("7d", 10), { mode: "relative", recentDays: 7 });
    assert.deepEqual(parseTimeframe("5", 10), { mode: "relative", recentDays: 5 });
  });

  test("an ISO date starts the current window", () => {
    assert.deepEqual(parseTimeframe("2024-03-21", 10), { mode: "absolute", currentStart: "2024-03-21" });
  });

  test("falls back to the default split", () => {
    const fallback = { mode: "relative", recentDays: 10 };
    assert.deepEqual(parseTimeframe(undefined, 10), fallback);
    assert.deepEqual(parseTimeframe("", 10), fallback);
    assert.deepEqual(parseTimeframe("yesterday", 10), fallback);
    assert.deepEqual(parseTimeframe("2024-02-30", 10), fallback);
    assert.deepEqual(parseTimeframe("0", 10), fallback);
  });

  test("describes the boundary", () => {
    assert.equal(describeBoundary({ mode: "relative", recentDays: 10 }), "current = last 10 days of data");
    assert.equal(describeBoundary({ mode: "absolute", currentStart: "2024-03-21" }), "current = from 2024-03-21");
  });
});

describe("query plans", () => {
  test("renders the relative window query", () => {
    const plan = buildQueryPlan({
      table: "daily_metrics",
      campaignId: 5,
      measures: ["clicks", "impressions"],
      boundary: { mode: "relative", recentDays: 10 },
      lookbackDays: 60,
    });

    assert.equal(
      renderQuery(plan),
      `WITH bounds AS (SELECT MAX(date) AS last_day FROM daily_metrics WHERE campaign_id = 5)
SELECT
  to_char(m.date, 'YYYY-MM-DD') AS day,
  CASE WHEN m.date > b.last_day - 10 THEN 'current' ELSE 'baseline' END AS period,
  SUM(m.clicks) AS clicks,
  SUM(m.impressions) AS impressions
FROM daily_metrics m CROSS JOIN bounds b
WHERE m.campaign_id = 5
  AND m.date > b.last_day - 70
GROUP BY m.date, b.last_day
ORDER BY m.date`
    );
  });

  test("renders the absolute window query with an ad filter", () => {
    const plan = buildQueryPlan({
      table: "daily_metrics",
      campaignId: 5,
      measures: ["revenue", "spend"],
      boundary: { mode: "absolute", currentStart: "2024-03-21" },
      lookbackDays: 30,
      adId: 7,
    });

    assert.equal(
      renderQuery(plan),
      `SELECT
  to_char(m.date, 'YYYY-MM-DD') AS day,
  CASE WHEN m.date >= DATE '2024-03-21' THEN 'current' ELSE 'baseline' END AS period,
  SUM(m.roas * m.spend) AS revenue,
  SUM(m.spend) AS spend
FROM daily_metrics m
WHERE m.campaign_id = 5
  AND m.date >= DATE '2024-03-21' - 30
  AND m.ad_id = 7
GROUP BY m.date
ORDER BY m.date`
    );
  });

  test("selects each measure once", () => {
    const plan = buildQueryPlan({
      table: "daily_metrics",
      campaignId: 1,
      measures: ["spend", "clicks", "spend"],
      boundary: { mode: "relative", recentDays: 7 },
      lookbackDays: 60,
    });
    assert.deepEqual(plan.measures, ["spend", "clicks"]);
  });

  test("repair drops the newest removable filter, never the campaign", () => {
    const plan = buildQueryPlan({
      table: "daily_metrics",
      campaignId: 5,
      measures: ["clicks"],
      boundary: { mode: "relative", recentDays: 10 },
      lookbackDays: 60,
      adId: 7,
    });
    assert.deepEqual(
      plan.filters.map((f) => f.label),
      ["campaign", "lookback", "ad"]
    );

    const first = repairPlan(plan);
    assert.equal(first?.removed.label, "ad");
    assert.deepEqual(
      first?.plan.filters.map((f) => f.label),
      ["campaign", "lookback"]
    );

    const second = first ? repairPlan(first.plan) : null;
    assert.equal(second?.removed.label, "lookback");
    assert.equal(second ? repairPlan(second.plan) : "unreached", null);
  });
});
