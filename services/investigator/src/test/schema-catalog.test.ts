import assert from "node:assert/strict";
import { describe, test } from "node:test";
import { StoreUnavailableError } from "@salesiq/core";
import {
  SchemaCatalog,
  buildSchemaQuery,
  hasColumns,
  summarizeSchema,
} from "../systems/investigation/schema-catalog.js";
import { FakeSqlClient } from "./helpers.js";

describe("SchemaCatalog", () => {
  test("query is scoped to one schema", () => {
    assert.ok(buildSchemaQuery("public").includes("WHERE c.table_schema = 'public'"));
    assert.ok(buildSchemaQuery("o'neil").includes("WHERE c.table_schema = 'o''neil'"));
  });

  test("groups columns by table with foreign keys", async () => {
    const schema = await new SchemaCatalog(new FakeSqlClient()).fetch();

    assert.deepEqual(Object.keys(schema), ["ads", "campaigns", "daily_metrics"]);
    assert.deepEqual(
      schema.daily_metrics.map((c) => c.name),
      ["metric_id", "date", "campaign_id", "ad_id", "impressions", "clicks", "conversions", "spend", "ctr", "cpc", "cvr", "roas"]
    );
    assert.deepEqual(schema.daily_metrics[2], {
      name: "campaign_id",
      type: "integer",
      nullable: false,
      references: { table: "campaigns", column: "campaign_id" },
    });
    assert.equal(schema.daily_metrics[8].nullable, true);
  });

  test("descriptor is frozen", async () => {
    const schema = await new SchemaCatalog(new FakeSqlClient()).fetch();

    assert.equal(Object.isFrozen(schema), true);
    assert.equal(Object.isFrozen(schema.daily_metrics), true);
    assert.equal(Object.isFrozen(schema.daily_metrics[0]), true);
  });

  test("store failures become StoreUnavailableError", async () => {
    const sql = new FakeSqlClient();
    sql.schemaError = new Error("connect ECONNREFUSED 127.0.0.1:5432");

    await assert.rejects(new SchemaCatalog(sql).fetch(), (error: unknown) => {
      assert.ok(error instanceof StoreUnavailableError);
      assert.equal(error.message, "Schema lookup failed: connect ECONNREFUSED 127.0.0.1:5432");
      return true;
    });
  });

  test("rows without names are rejected", async () => {
    const sql = new FakeSqlClient();
    sql.schema = [{ table_name: "daily_metrics", column_name: null }];

    await assert.rejects(new SchemaCatalog(sql).fetch(), StoreUnavailableError);
  });

  test("column checks and summary", async () => {
    const schema = await new SchemaCatalog(new FakeSqlClient()).fetch();

    assert.equal(hasColumns(schema, "daily_metrics", ["roas", "spend"]), true);
    assert.equal(hasColumns(schema, "daily_metrics", ["revenue"]), false);
    assert.equal(hasColumns(schema, "hourly_metrics", ["clicks"]), false);
    assert.deepEqual(summarizeSchema(schema).ads, ["ad_id", "campaign_id → campaigns.campaign_id", "name"]);
  });
});
