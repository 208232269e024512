/**
 * Investigation Types
 * Records, scratchpad entries, store results and report shapes
 */

import type { InvestigationError } from "@salesiq/core";

// ============================================
// METRICS
// ============================================

/** Summed per-day columns the query selects */
export type MeasureName = "impressions" | "clicks" | "conversions" | "spend" | "revenue";

export type RatioMetricName = "ctr" | "cvr" | "cpc" | "roas";

export type MetricName = MeasureName | RatioMetricName;

export interface MetricValue {
  current: number | null;
  baseline: number | null;
  deltaPct: number | null;
  isAnomalous: boolean;
}

export interface WindowSummary {
  /** First day, YYYY-MM-DD */
  start: string;
  /** Last day, YYYY-MM-DD */
  end: string;
  days: number;
}

export interface MetricSet {
  target: MetricName;
  threshold: number;
  /** Target first, then the measures it is built from */
  metrics: Partial<Record<MetricName, MetricValue>>;
  windows: {
    baseline: WindowSummary | null;
    current: WindowSummary | null;
  };
  /** Index of the last baseline day, counted from 1 at the first baseline day */
  boundaryDay: number | null;
}

// ============================================
// SCRATCHPAD
// ============================================

export type EntryKind = "schema_lookup" | "query" | "metric_computation" | "synthesis" | "error";

export type Payload = Record<string, unknown>;

export interface ScratchpadEntry {
  readonly seq: number;
  readonly kind: EntryKind;
  readonly inputs: Readonly<Payload>;
  readonly outputs: Readonly<Payload>;
  readonly timestamp: string;
}

export interface NewEntry {
  kind: EntryKind;
  inputs: Payload;
  outputs: Payload;
}

export interface ScratchpadSummary {
  entries: number;
  byKind: Record<EntryKind, number>;
  firstAt: string | null;
  lastAt: string | null;
  durationMs: number;
}

// ============================================
// STORE
// ============================================

export interface SchemaColumn {
  name: string;
  type: string;
  nullable: boolean;
  references: { table: string; column: string } | null;
}

/** Table name to ordered columns */
export type SchemaDescriptor = Readonly<Record<string, readonly SchemaColumn[]>>;

export interface QueryFailure {
  errorClass: string;
  message: string;
  code?: string;
  retryable: boolean;
}

export type QueryResult =
  | { ok: true; rows: Array<Record<string, unknown>>; rowCount: number; fields: string[] }
  | { ok: false; error: QueryFailure };

// ============================================
// REPORT
// ============================================

export interface Report {
  summary: string;
  keyMetrics: string;
  anomalies: string;
  possibleCauses: string;
  recommendations: string;
  degraded: boolean;
  degradedReason?: string;
}

export type ReportSectionKey = Exclude<keyof Report, "degraded" | "degradedReason">;

// ============================================
// INVESTIGATION
// ============================================

export type InvestigationStatus = "in_progress" | "completed" | "failed";

export type Phase =
  | "created"
  | "schema_fetched"
  | "querying"
  | "analyzing"
  | "synthesizing"
  | "completed"
  | "failed";

export interface InvestigationTarget {
  campaignId: number;
  metric: MetricName;
  adId?: number;
}

export interface Investigation {
  id: string;
  question: string;
  context: Record<string, string>;
  startedAt: string;
  completedAt: string | null;
  status: InvestigationStatus;
  phase: Phase;
  target: InvestigationTarget | null;
  report: Report | null;
}

export type InvestigationResult =
  | {
      success: true;
      report: Report;
      investigation: Investigation;
      entries: readonly ScratchpadEntry[];
    }
  | {
      success: false;
      error: InvestigationError;
      investigation: Investigation;
      entries: readonly ScratchpadEntry[];
    };

export interface RunOptions {
  signal?: AbortSignal;
}
