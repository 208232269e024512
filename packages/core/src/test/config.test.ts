import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { ConfigError, loadConfig } from "../index.js";

describe("loadConfig", () => {
  test("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    assert.equal(config.database.host, "localhost");
    assert.equal(config.database.port, 5432);
    assert.equal(config.database.schema, "public");
    assert.equal(config.llm.apiKey, undefined);
    assert.equal(config.investigation.anomalyThreshold, 0.2);
    assert.equal(config.investigation.queryMaxRetries, 2);
    assert.equal(config.investigation.recentWindowDays, 10);
    assert.equal(config.investigation.metricsTable, "daily_metrics");
    assert.equal(config.supabase, undefined);
    assert.equal(config.env.logLevel, "info");
  });

  test("coerces numeric variables", () => {
    const config = loadConfig({
      DB_PORT: "6543",
      ANOMALY_THRESHOLD: "0.35",
      QUERY_MAX_RETRIES: "0",
    });

    assert.equal(config.database.port, 6543);
    assert.equal(config.investigation.anomalyThreshold, 0.35);
    assert.equal(config.investigation.queryMaxRetries, 0);
  });

  test("enables supabase only when url and key are both set", () => {
    const partial = loadConfig({ SUPABASE_URL: "https://example.supabase.co" });
    assert.equal(partial.supabase, undefined);

    const full = loadConfig({
      SUPABASE_URL: "https://example.supabase.co",
      SUPABASE_KEY: "test-secret",
    });
    assert.deepEqual(full.supabase, {
      url: "https://example.supabase.co",
      key: "test-secret",
    });
  });

  test("treats blank variables as unset", () => {
    const config = loadConfig({ SUPABASE_URL: "", DB_PORT: "" });

    assert.equal(config.supabase, undefined);
    assert.equal(config.database.port, 5432);
  });

  test("rejects identifiers that are not plain SQL names", () => {
    assert.throws(
      () => loadConfig({ METRICS_TABLE: "daily_metrics; drop table ads" }),
      (error: unknown) => error instanceof ConfigError && error.message.includes("METRICS_TABLE")
    );
  });

  test("lists every invalid variable", () => {
    assert.throws(
      () => loadConfig({ LOG_LEVEL: "loud", ANOMALY_THRESHOLD: "-1" }),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message.includes("LOG_LEVEL") &&
        error.message.includes("ANOMALY_THRESHOLD")
    );
  });
});
