/**
 * In-process stand-ins for the metrics store and the language-model backend
 */

import type { SqlClient, SqlResult, SqlRow } from "@salesiq/db";
import type { ExecutorErrorCode, ExecutorRequest, ExecutorResponse, IExecutor } from "../shared/executor/index.js";
import { NoOpObservability } from "../shared/observability/index.js";
import { InvestigationOrchestrator, type InvestigatorSettings } from "../systems/investigation/orchestrator.js";

export const NOW = "2024-04-01T12:00:00.000Z";

export const TEST_SETTINGS: InvestigatorSettings = {
  schema: "public",
  investigation: {
    anomalyThreshold: 0.2,
    queryMaxRetries: 2,
    queryRetryBackoffMs: 250,
    recentWindowDays: 10,
    lookbackDays: 60,
    metricsTable: "daily_metrics",
  },
  profile: { model: "test-model", maxTurns: 1, timeoutMs: 1000 },
};

export const REPORT_TEXT = `## Summary
CTR for Campaign 5 fell sharply in the last ten days.

## Key Metrics
- CTR: 2.50% → 1.00% (-60.0%)

## Anomalies
- CTR dropped 60.0% after day 20 (2024-03-20).

## Possible Causes
- Creative fatigue.

## Recommendations
- Rotate the creatives.`;

// ============================================
// STORE
// ============================================

type ColumnDef = [table: string, column: string, type: string, nullable: boolean, references?: string];

const COLUMNS: ColumnDef[] = [
  ["ads", "ad_id", "integer", false],
  ["ads", "campaign_id", "integer", false, "campaigns.campaign_id"],
  ["ads", "name", "character varying", false],
  ["campaigns", "campaign_id", "integer", false],
  ["campaigns", "name", "character varying", false],
  ["campaigns", "status", "character varying", false],
  ["daily_metrics", "metric_id", "integer", false],
  ["daily_metrics", "date", "date", false],
  ["daily_metrics", "campaign_id", "integer", false, "campaigns.campaign_id"],
  ["daily_metrics", "ad_id", "integer", false, "ads.ad_id"],
  ["daily_metrics", "impressions", "integer", false],
  ["daily_metrics", "clicks", "integer", false],
  ["daily_metrics", "conversions", "integer", false],
  ["daily_metrics", "spend", "numeric", false],
  ["daily_metrics", "ctr", "numeric", true],
  ["daily_metrics", "cpc", "numeric", true],
  ["daily_metrics", "cvr", "numeric", true],
  ["daily_metrics", "roas", "numeric", true],
];

/**
 * Rows as the information_schema query returns them
 */
export function schemaRows(omit: readonly string[] = []): SqlRow[] {
  return COLUMNS.filter(([table, column]) => !omit.includes(`${table}.${column}`)).map(
    ([table, column, type, nullable, references]) => {
      const [foreignTable, foreignColumn] = references ? references.split(".") : [null, null];
      return {
        table_name: table,
        column_name: column,
        data_type: type,
        is_nullable: nullable ? "YES" : "NO",
        foreign_table: foreignTable,
        foreign_column: foreignColumn,
      };
    }
  );
}

export function result(rows: SqlRow[]): SqlResult {
  return { rows, rowCount: rows.length, fields: Object.keys(rows[0] ?? {}) };
}

/**
 * Error shaped like the ones pg rejects with
 */
export function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

export class FakeSqlClient implements SqlClient {
  readonly queries: string[] = [];
  schema: SqlRow[] = schemaRows();
  schemaError: Error | null = null;
  onQuery: ((sql: string) => void) | null = null;
  private readonly responses: Array<SqlResult | Error> = [];

  /** Queue answers for the next data queries, in order */
  respond(...responses: Array<SqlResult | Error>): this {
    this.responses.push(...responses);
    return this;
  }

  get dataQueries(): string[] {
    return this.queries.filter((q) => !q.includes("information_schema"));
  }

  async query(text: string): Promise<SqlResult> {
    this.queries.push(text);
    this.onQuery?.(text);

    if (text.includes("information_schema")) {
      if (this.schemaError) throw this.schemaError;
      return result(this.schema);
    }

    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error(`Unexpected query: ${text.split("\n")[0]}`);
    }
    if (next instanceof Error) throw next;
    return next;
  }

  async ping(): Promise<void> {
    if (this.schemaError) throw this.schemaError;
  }

  async end(): Promise<void> {}
}

export function marchDay(day: number): string {
  return `2024-03-${String(day).padStart(2, "0")}`;
}

/**
 * Per-day rows for 2024-03-01 onwards, values rendered as strings the way
 * pg returns SUM() results. Days from `currentFrom` on are the current window.
 */
export function windowRows(
  baseline: Record<string, number>,
  current: Record<string, number>,
  options: { days?: number; currentFrom?: number } = {}
): SqlRow[] {
  const days = options.days ?? 30;
  const currentFrom = options.currentFrom ?? 21;
  const rows: SqlRow[] = [];

  for (let day = 1; day <= days; day++) {
    const period = day >= currentFrom ? "current" : "baseline";
    const values = period === "current" ? current : baseline;
    const row: SqlRow = { day: marchDay(day), period };
    for (const [key, value] of Object.entries(values)) {
      row[key] = String(value);
    }
    rows.push(row);
  }
  return rows;
}

/** CTR 2.5% for days 1-20, 1.0% for days 21-30 */
export function ctrDropRows(): SqlRow[] {
  return windowRows({ clicks: 25, impressions: 1000 }, { clicks: 10, impressions: 1000 });
}

// ============================================
// BACKEND
// ============================================

export function completion(output: string): ExecutorResponse {
  return { success: true, output, costUsd: 0, durationMs: 5, attempts: 1 };
}

export function executorFailure(code: ExecutorErrorCode, message: string): ExecutorResponse {
  return { success: false, output: "", costUsd: 0, durationMs: 5, attempts: 1, error: { code, message } };
}

export class FakeExecutor implements IExecutor {
  readonly requests: ExecutorRequest[] = [];

  constructor(private readonly answer: (request: ExecutorRequest) => Promise<ExecutorResponse>) {}

  static replying(output: string): FakeExecutor {
    return new FakeExecutor(async () => completion(output));
  }

  static failing(code: ExecutorErrorCode, message: string): FakeExecutor {
    return new FakeExecutor(async () => executorFailure(code, message));
  }

  isReady(): boolean {
    return true;
  }

  async execute(request: ExecutorRequest): Promise<ExecutorResponse> {
    this.requests.push(request);
    return this.answer(request);
  }
}

// ============================================
// ORCHESTRATOR
// ============================================

export interface Harness {
  orchestrator: InvestigationOrchestrator;
  sql: FakeSqlClient;
  executor: FakeExecutor;
  observability: NoOpObservability;
  delays: number[];
}

export function createHarness(options: { sql?: FakeSqlClient; executor?: FakeExecutor } = {}): Harness {
  const sql = options.sql ?? new FakeSqlClient();
  const executor = options.executor ?? FakeExecutor.replying(REPORT_TEXT);
  const observability = new NoOpObservability();
  const delays: number[] = [];

  const orchestrator = new InvestigationOrchestrator({
    sql,
    executor,
    settings: TEST_SETTINGS,
    observability,
    clock: () => new Date(NOW),
    sleep: async (ms) => {
      delays.push(ms);
    },
    createId: () => "inv-test",
  });

  return { orchestrator, sql, executor, observability, delays };
}

/** Phases in the order the orchestrator announced them */
export function phasesOf(observability: NoOpObservability): unknown[] {
  return observability.events
    .filter((e) => e.type === "investigation.phase_changed")
    .map((e) => e.data?.phase);
}
