/**
 * Investigation Orchestrator
 *
 * Runs one investigation as a fixed sequence of steps:
 *   parse question → schema lookup → window query (retry / repair)
 *   → metric computation → optional broadening pass → synthesis
 *
 * Every action lands in the investigation's own Scratchpad before its outcome
 * is acted on. `run` never throws; failures come back as InvestigationError.
 */

import { randomUUID } from "node:crypto";
import {
  AmbiguousQuestionError,
  InvestigationCancelledError,
  InvestigationError,
  QueryError,
  StoreUnavailableError,
  SynthesisError,
  getConfig,
  logger,
  wrapError,
  type ChildLogger,
  type Config,
  type InvestigationConfig,
  type InvestigationErrorKind,
  type SalesIQError,
} from "@salesiq/core";
import { createSqlClient, type SqlClient } from "@salesiq/db";
import { createClaudeExecutor, type ExecutorProfile, type IExecutor } from "../../shared/executor/index.js";
import {
  createConsoleObservability,
  createSupabaseObservability,
  type IObservability,
  type ObservabilityEvent,
} from "../../shared/observability/index.js";
import {
  METRIC_NAMES,
  compute,
  describeMetricSet,
  formatDelta,
  measuresFor,
  sourceColumns,
  splitByPeriod,
  targetValue,
  type MetricRow,
} from "./metrics.js";
import { PhaseMachine } from "./phase.js";
import {
  buildQueryPlan,
  describeBoundary,
  parseTimeframe,
  renderQuery,
  repairPlan,
  type QueryFilter,
  type QueryPlan,
  type QueryPlanInput,
} from "./query-builder.js";
import { QueryExecutor } from "./query-executor.js";
import { parseQuestion } from "./question.js";
import { REPORT_SECTIONS, buildDegradedReport } from "./report.js";
import { SchemaCatalog, hasColumns, summarizeSchema } from "./schema-catalog.js";
import { Scratchpad } from "./scratchpad.js";
import { NarrativeSynthesizer } from "./synthesizer.js";
import type {
  Investigation,
  InvestigationResult,
  MetricName,
  MetricSet,
  QueryFailure,
  Report,
  RunOptions,
  SchemaDescriptor,
} from "./types.js";

export const SYSTEM_NAME = "investigator";
export const SYSTEM_VERSION = "1.0.0";

export interface InvestigatorSettings {
  /** Database schema the catalog reads */
  schema: string;
  investigation: InvestigationConfig;
  profile: ExecutorProfile;
}

export interface InvestigatorDeps {
  sql: SqlClient;
  executor: IExecutor;
  settings: InvestigatorSettings;
  observability?: IObservability;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  createId?: () => string;
}

type QueryPurpose = "target" | "broadening";

type AttemptOutcome =
  | { ok: true; rows: MetricRow[] }
  | { ok: false; failure: QueryFailure; attempts: number };

interface RunState {
  investigation: Investigation;
  scratchpad: Scratchpad;
  phases: PhaseMachine;
  metricSets: MetricSet[];
  log: ChildLogger;
  signal?: AbortSignal;
}

export class InvestigationOrchestrator {
  private readonly catalog: SchemaCatalog;
  private readonly queries: QueryExecutor;
  private readonly synthesizer: NarrativeSynthesizer;
  private readonly settings: InvestigationConfig;
  private readonly profile: ExecutorProfile;
  private readonly observability: IObservability;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly createId: () => string;

  constructor(deps: InvestigatorDeps) {
    this.catalog = new SchemaCatalog(deps.sql, deps.settings.schema);
    this.queries = new QueryExecutor(deps.sql);
    this.synthesizer = new NarrativeSynthesizer(deps.executor, deps.settings.profile);
    this.settings = deps.settings.investigation;
    this.profile = deps.settings.profile;
    this.observability = deps.observability ?? createConsoleObservability();
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? ((ms) => new Promise((r) => setTimeout(r, ms)));
    this.createId = deps.createId ?? randomUUID;
  }

  async run(
    question: string,
    context: Readonly<Record<string, string>> = {},
    options: RunOptions = {}
  ): Promise<InvestigationResult> {
    const id = this.createId();
    const investigation: Investigation = {
      id,
      question,
      context: { ...context },
      startedAt: this.clock().toISOString(),
      completedAt: null,
      status: "in_progress",
      phase: "created",
      target: null,
      report: null,
    };

    const state: RunState = {
      investigation,
      metricSets: [],
      log: logger.child({ investigationId: id, component: "orchestrator" }),
      signal: options.signal,
      scratchpad: new Scratchpad({
        clock: this.clock,
        onAppend: (entry) =>
          this.record({
            type: "investigation.step_recorded",
            correlationId: id,
            stepSeq: entry.seq,
            data: { kind: entry.kind },
          }),
      }),
      phases: new PhaseMachine((next, previous) => {
        investigation.phase = next;
        this.record({
          type: "investigation.phase_changed",
          correlationId: id,
          data: { phase: next, previousPhase: previous },
        });
      }),
    };

    try {
      await this.observability.startSession({
        systemName: SYSTEM_NAME,
        systemVersion: SYSTEM_VERSION,
        correlationId: id,
        input: { question, context },
      });
      return await this.execute(state);
    } catch (error) {
      return this.fail(state, error);
    }
  }

  // ============================================
  // PLAN
  // ============================================

  private async execute(state: RunState): Promise<InvestigationResult> {
    const { investigation, log } = state;

    // 1. Question → target. Nothing is recorded or queried if this fails.
    const target = parseQuestion(investigation.question, investigation.context);
    investigation.target = target;
    log.info(`[Investigator] Campaign ${target.campaignId}, metric ${target.metric}`, {
      campaignId: target.campaignId,
      metric: target.metric,
    });

    // 2. Schema, exactly once
    this.checkCancelled(state);
    const schema = await this.fetchSchema(state);
    state.phases.transition("schema_fetched");

    // 3-5. Window query for the target metric
    const planInput: Omit<QueryPlanInput, "measures"> = {
      table: this.settings.metricsTable,
      campaignId: target.campaignId,
      boundary: parseTimeframe(investigation.context.timeframe, this.settings.recentWindowDays),
      lookbackDays: positiveInt(investigation.context.lookback_days) ?? this.settings.lookbackDays,
      adId: target.adId,
    };

    state.phases.transition("querying");
    const rows = await this.runQuery(state, buildQueryPlan({ ...planInput, measures: measuresFor(target.metric) }), "target");

    this.checkCancelled(state);
    state.phases.transition("analyzing");
    const primary = this.computeAndRecord(state, rows, target.metric, "target");

    // 6. One broadening pass when the asked-for metric did not move
    if (!targetValue(primary).isAnomalous) {
      await this.broaden(state, schema, target.metric, planInput);
    }

    // 7. Synthesis; failure degrades
    this.checkCancelled(state);
    state.phases.transition("synthesizing");
    const report = await this.synthesize(state);

    // 8. Done
    state.phases.transition("completed");
    investigation.status = "completed";
    investigation.report = report;
    investigation.completedAt = this.clock().toISOString();

    log.info(`[Investigator] Completed${report.degraded ? " with degraded report" : ""}`, {
      entries: state.scratchpad.size,
    });
    await this.endSession(state, { success: true });

    return {
      success: true,
      report,
      investigation,
      entries: state.scratchpad.all(),
    };
  }

  // ============================================
  // STEPS
  // ============================================

  private async fetchSchema(state: RunState): Promise<SchemaDescriptor> {
    const inputs = { schema: this.catalog.schema };

    try {
      const schema = await this.catalog.fetch();
      state.scratchpad.append({
        kind: "schema_lookup",
        inputs,
        outputs: { status: "ok", tables: summarizeSchema(schema) },
      });
      return schema;
    } catch (error) {
      const cause =
        error instanceof StoreUnavailableError
          ? error
          : new StoreUnavailableError(`Schema lookup failed: ${wrapError(error).message}`, error);

      state.scratchpad.append({
        kind: "schema_lookup",
        inputs,
        outputs: { status: "failed", message: cause.message },
      });
      state.scratchpad.append({
        kind: "error",
        inputs: { step: "schema_lookup" },
        outputs: { errorClass: "store_unavailable", message: cause.message, retryable: false, action: "fail" },
      });
      throw cause;
    }
  }

  /**
   * Retryable failures rerun the same SQL; a non-retryable failure gets one
   * repair (drop the newest removable filter). Throws QueryError when both run out.
   */
  private async runQuery(state: RunState, plan: QueryPlan, purpose: QueryPurpose): Promise<MetricRow[]> {
    let current = plan;
    let repaired: QueryFilter | null = null;

    for (;;) {
      const sql = renderQuery(current);
      const outcome = await this.attemptQuery(state, current, sql, purpose, repaired);
      if (outcome.ok) {
        return outcome.rows;
      }

      const { failure, attempts } = outcome;
      const repair: ReturnType<typeof repairPlan> = failure.retryable || repaired ? null : repairPlan(current);

      state.scratchpad.append({
        kind: "error",
        inputs: { step: "query", purpose, sql },
        outputs: {
          errorClass: failure.errorClass,
          message: failure.message,
          code: failure.code,
          retryable: failure.retryable,
          attempts,
          action: repair ? `repair: remove ${repair.removed.label} filter` : "fail",
        },
      });

      if (!repair) {
        const reason = failure.retryable ? `after ${attempts} attempts` : repaired ? "after repair" : "and could not be repaired";
        throw new QueryError(`Query failed ${reason}: ${failure.message}`, {
          errorClass: failure.errorClass,
          sql,
          retryable: failure.retryable,
          attempts,
        });
      }

      state.log.warn(`[Investigator] Query failed (${failure.errorClass}); removing ${repair.removed.label} filter`);
      this.record({
        type: "query.repair",
        correlationId: state.investigation.id,
        level: "warn",
        data: { removed: repair.removed.label, errorClass: failure.errorClass },
      });
      current = repair.plan;
      repaired = repair.removed;
    }
  }

  private async attemptQuery(
    state: RunState,
    plan: QueryPlan,
    sql: string,
    purpose: QueryPurpose,
    repaired: QueryFilter | null
  ): Promise<AttemptOutcome> {
    const maxAttempts = 1 + this.settings.queryMaxRetries;

    for (let attempt = 1; ; attempt++) {
      this.checkCancelled(state);

      const result = await this.queries.execute(sql);

      state.scratchpad.append({
        kind: "query",
        inputs: {
          purpose,
          sql,
          attempt,
          boundary: describeBoundary(plan.boundary),
          filters: plan.filters.map((f) => f.label),
          repair: repaired ? `removed ${repaired.label} filter` : undefined,
        },
        outputs: result.ok
          ? { status: "ok", rowCount: result.rowCount, fields: result.fields }
          : { status: "failed", ...result.error },
      });

      if (result.ok) {
        return { ok: true, rows: result.rows };
      }

      if (!result.error.retryable || attempt >= maxAttempts) {
        return { ok: false, failure: result.error, attempts: attempt };
      }

      const delay = this.settings.queryRetryBackoffMs * Math.pow(2, attempt - 1);
      state.log.warn(`[Investigator] Retryable query failure (${result.error.errorClass}), retry in ${delay}ms`);
      this.record({
        type: "query.retry",
        correlationId: state.investigation.id,
        level: "warn",
        data: { attempt, delayMs: delay, errorClass: result.error.errorClass },
      });
      await this.sleep(delay);
    }
  }

  private computeAndRecord(state: RunState, rows: MetricRow[], metric: MetricName, purpose: QueryPurpose): MetricSet {
    const { current, baseline } = splitByPeriod(rows);
    const set = compute(current, baseline, metric, { threshold: this.settings.anomalyThreshold });
    state.metricSets.push(set);

    const value = targetValue(set);
    state.scratchpad.append({
      kind: "metric_computation",
      inputs: { metric, purpose, currentDays: current.length, baselineDays: baseline.length },
      outputs: { metricSet: set, findings: describeMetricSet(set) },
    });

    state.log.info(
      `[Investigator] ${metric}: ${formatDelta(value.deltaPct)}${value.isAnomalous ? " (anomalous)" : ""}`,
      { metric }
    );
    if (value.deltaPct !== null) {
      this.observability.metric(`investigation.delta_pct.${metric}`, value.deltaPct, {
        investigationId: state.investigation.id,
      });
    }

    return set;
  }

  private async broaden(
    state: RunState,
    schema: SchemaDescriptor,
    target: MetricName,
    planInput: Omit<QueryPlanInput, "measures">
  ): Promise<void> {
    const others = METRIC_NAMES.filter(
      (m) => m !== target && hasColumns(schema, planInput.table, sourceColumns(m))
    );
    if (others.length === 0) {
      state.log.info("[Investigator] No other metrics available for broadening");
      return;
    }

    this.checkCancelled(state);
    state.phases.transition("querying");

    let rows: MetricRow[] | null = null;
    try {
      rows = await this.runQuery(
        state,
        buildQueryPlan({ ...planInput, measures: others.flatMap(measuresFor) }),
        "broadening"
      );
    } catch (error) {
      if (!(error instanceof QueryError)) throw error;
      state.log.warn(`[Investigator] Broadening query failed, continuing: ${error.message}`);
    }

    this.checkCancelled(state);
    state.phases.transition("analyzing");

    if (rows) {
      for (const metric of others) {
        this.computeAndRecord(state, rows, metric, "broadening");
      }
    }
  }

  private async synthesize(state: RunState): Promise<Report> {
    const { scratchpad } = state;
    const correlationId = state.investigation.id;
    const evidence = scratchpad.renderForPrompt();
    const inputs = {
      promptId: this.synthesizer.promptId,
      promptVersion: this.synthesizer.promptVersion,
      evidenceEntries: scratchpad.size,
    };

    this.record({
      type: "executor.request",
      correlationId,
      data: { model: this.profile.model, attempt: 1, promptId: inputs.promptId },
    });

    try {
      const report = await this.synthesizer.synthesize(evidence, {
        question: state.investigation.question,
        signal: state.signal,
        onResponse: (response) =>
          this.record(
            response.success
              ? {
                  type: "executor.response",
                  correlationId,
                  data: {
                    model: this.profile.model,
                    attempts: response.attempts,
                    durationMs: response.durationMs,
                    costUsd: response.costUsd,
                    inputTokens: response.tokens?.input,
                    outputTokens: response.tokens?.output,
                  },
                }
              : {
                  type: "executor.error",
                  correlationId,
                  level: "error",
                  data: { code: response.error?.code, message: response.error?.message },
                }
          ),
      });
      scratchpad.append({
        kind: "synthesis",
        inputs,
        outputs: { status: "ok", degraded: false, sections: REPORT_SECTIONS.map((s) => s.title) },
      });
      return report;
    } catch (error) {
      if (!(error instanceof SynthesisError)) throw error;
      if (state.signal?.aborted) throw new InvestigationCancelledError("synthesizing");

      state.log.warn(`[Investigator] Synthesis failed, building degraded report: ${error.message}`);
      scratchpad.append({
        kind: "error",
        inputs: { step: "synthesis", promptId: inputs.promptId },
        outputs: { errorClass: error.code, message: error.message, retryable: error.retryable, action: "degrade" },
      });

      const report = buildDegradedReport(state.metricSets, error.message);
      scratchpad.append({
        kind: "synthesis",
        inputs,
        outputs: { status: "degraded", degraded: true, reason: error.message },
      });
      return report;
    }
  }

  // ============================================
  // FAILURE AND TRACING
  // ============================================

  private checkCancelled(state: RunState): void {
    if (state.signal?.aborted) {
      throw new InvestigationCancelledError(state.phases.current);
    }
  }

  private async fail(state: RunState, error: unknown): Promise<InvestigationResult> {
    const { investigation, scratchpad } = state;
    const [kind, cause] = classifyFailure(error);

    // Lower-level failures already wrote their entries
    if (kind === "cancelled" || kind === "internal") {
      scratchpad.append({
        kind: "error",
        inputs: { step: state.phases.current },
        outputs: { errorClass: kind, code: cause.code, message: cause.message, retryable: false, action: "fail" },
      });
    }

    if (!state.phases.terminal) {
      state.phases.transition("failed");
    }
    investigation.status = "failed";
    investigation.completedAt = this.clock().toISOString();

    if (kind === "internal") {
      state.log.error("[Investigator] Unexpected failure", error);
    } else {
      state.log.warn(`[Investigator] Failed (${kind}): ${cause.message}`);
    }
    await this.endSession(state, { success: false, error: cause, errorCode: cause.code });

    return {
      success: false,
      error: new InvestigationError(kind, investigation.id, cause),
      investigation,
      entries: scratchpad.all(),
    };
  }

  private async endSession(
    state: RunState,
    result: { success: boolean; error?: SalesIQError; errorCode?: string }
  ): Promise<void> {
    const started = Date.parse(state.investigation.startedAt);
    try {
      await this.observability.endSession(state.investigation.id, {
        success: result.success,
        error: result.error,
        metadata: {
          durationMs: this.clock().getTime() - started,
          entries: state.scratchpad.size,
          degraded: state.investigation.report?.degraded,
          errorCode: result.errorCode,
        },
      });
    } catch (error) {
      state.log.warn(`[Investigator] Failed to close observability session: ${wrapError(error).message}`);
    }
  }

  private record(event: ObservabilityEvent): void {
    this.observability
      .recordEvent({ ...event, timestamp: this.clock().toISOString() })
      .catch((error: unknown) => {
        logger.warn(`[Investigator] Failed to record ${event.type}: ${wrapError(error).message}`);
      });
  }
}

function classifyFailure(error: unknown): [InvestigationErrorKind, SalesIQError] {
  if (error instanceof AmbiguousQuestionError) return ["ambiguous_question", error];
  if (error instanceof StoreUnavailableError) return ["store_unavailable", error];
  if (error instanceof QueryError) return ["query", error];
  if (error instanceof InvestigationCancelledError) return ["cancelled", error];
  return ["internal", wrapError(error, "Unexpected investigation failure")];
}

function positiveInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  const parsed = Number(value.trim());
  return parsed > 0 ? parsed : undefined;
}

// ============================================
// FACTORY
// ============================================

export function settingsFromConfig(config: Config): InvestigatorSettings {
  return {
    schema: config.database.schema,
    investigation: config.investigation,
    profile: {
      model: config.llm.model,
      maxTurns: 1,
      timeoutMs: config.llm.timeoutMs,
    },
  };
}

/**
 * Wire an orchestrator from environment configuration
 */
export function createInvestigator(overrides: Partial<InvestigatorDeps> = {}): InvestigationOrchestrator {
  const config = getConfig();

  return new InvestigationOrchestrator({
    ...overrides,
    sql: overrides.sql ?? createSqlClient(),
    executor:
      overrides.executor ??
      createClaudeExecutor({ retries: config.llm.retries, apiKey: config.llm.apiKey }),
    settings: overrides.settings ?? settingsFromConfig(config),
    observability:
      overrides.observability ??
      (config.supabase ? createSupabaseObservability() : createConsoleObservability()),
  });
}
