/**
 * Metric/Anomaly Extractor
 *
 * Turns per-day rows into current/baseline values and flags deviations.
 * Anomalies are a plain threshold on the relative change: |delta| >= threshold.
 * There is no statistical model behind it; the default (0.20) is a tunable
 * starting point, not a calibrated one.
 */

import type {
  MeasureName,
  MetricName,
  MetricSet,
  MetricValue,
  RatioMetricName,
  WindowSummary,
} from "./types.js";

export const DEFAULT_THRESHOLD = 0.2;

type ValueFormat = "percent" | "currency" | "count" | "multiple";

interface MeasureDefinition {
  kind: "measure";
  label: string;
  format: ValueFormat;
  /** Source columns that must exist in the metrics table */
  columns: readonly string[];
  /** Aggregate over the `m` alias */
  sql: string;
}

interface RatioDefinition {
  kind: "ratio";
  label: string;
  format: ValueFormat;
  numerator: MeasureName;
  denominator: MeasureName;
}

export type MetricDefinition = MeasureDefinition | RatioDefinition;

export const MEASURES: Record<MeasureName, MeasureDefinition> = {
  impressions: { kind: "measure", label: "Impressions", format: "count", columns: ["impressions"], sql: "SUM(m.impressions)" },
  clicks: { kind: "measure", label: "Clicks", format: "count", columns: ["clicks"], sql: "SUM(m.clicks)" },
  conversions: { kind: "measure", label: "Conversions", format: "count", columns: ["conversions"], sql: "SUM(m.conversions)" },
  spend: { kind: "measure", label: "Spend", format: "currency", columns: ["spend"], sql: "SUM(m.spend)" },
  // Revenue is not stored; daily_metrics keeps roas per row
  revenue: { kind: "measure", label: "Revenue", format: "currency", columns: ["roas", "spend"], sql: "SUM(m.roas * m.spend)" },
};

export const RATIOS: Record<RatioMetricName, RatioDefinition> = {
  ctr: { kind: "ratio", label: "CTR", format: "percent", numerator: "clicks", denominator: "impressions" },
  cvr: { kind: "ratio", label: "CVR", format: "percent", numerator: "conversions", denominator: "clicks" },
  cpc: { kind: "ratio", label: "CPC", format: "currency", numerator: "spend", denominator: "clicks" },
  roas: { kind: "ratio", label: "ROAS", format: "multiple", numerator: "revenue", denominator: "spend" },
};

export const METRIC_NAMES: readonly MetricName[] = [
  "ctr",
  "clicks",
  "conversions",
  "spend",
  "roas",
  "cvr",
  "impressions",
  "cpc",
  "revenue",
];

export function isMetricName(value: string): value is MetricName {
  return Object.hasOwn(MEASURES, value) || Object.hasOwn(RATIOS, value);
}

function isMeasureName(name: MetricName): name is MeasureName {
  return Object.hasOwn(MEASURES, name);
}

export function getDefinition(name: MetricName): MetricDefinition {
  return isMeasureName(name) ? MEASURES[name] : RATIOS[name];
}

/**
 * Measures the metric is computed from, in select order
 */
export function measuresFor(name: MetricName): MeasureName[] {
  if (isMeasureName(name)) return [name];
  const def = RATIOS[name];
  return [def.numerator, def.denominator];
}

export function sourceColumns(name: MetricName): string[] {
  const columns = measuresFor(name).flatMap((m) => MEASURES[m].columns);
  return [...new Set(columns)];
}

// ============================================
// ROW HANDLING
// ============================================

export type MetricRow = Record<string, unknown>;

/**
 * pg hands back SUM() over integers and numerics as strings
 */
export function toNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function sumColumn(rows: readonly MetricRow[], column: string): number | null {
  let total: number | null = null;
  for (const row of rows) {
    const value = toNumber(row[column]);
    if (value !== null) {
      total = (total ?? 0) + value;
    }
  }
  return total;
}

function ratio(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null || denominator === 0) {
    return null;
  }
  return numerator / denominator;
}

/**
 * Counting metrics are compared as daily means so windows of different length line up
 */
function dailyMean(rows: readonly MetricRow[], measure: MeasureName): number | null {
  if (rows.length === 0) return null;
  const total = sumColumn(rows, measure);
  return total === null ? null : total / rows.length;
}

function valueFor(rows: readonly MetricRow[], name: MetricName): number | null {
  if (isMeasureName(name)) {
    return dailyMean(rows, name);
  }
  const def = RATIOS[name];
  return ratio(sumColumn(rows, def.numerator), sumColumn(rows, def.denominator));
}

export function deltaPct(current: number | null, baseline: number | null): number | null {
  if (current === null || baseline === null || baseline === 0) {
    return null;
  }
  return (current - baseline) / baseline;
}

export function isAnomalous(delta: number | null, threshold: number): boolean {
  return delta !== null && Math.abs(delta) >= threshold;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function summarizeWindow(rows: readonly MetricRow[]): WindowSummary | null {
  const days = new Set<string>();
  for (const row of rows) {
    const day = row.day;
    if (typeof day !== "string") return null;
    days.add(day);
  }
  if (days.size === 0) return null;

  const sorted = [...days].sort();
  return { start: sorted[0], end: sorted[sorted.length - 1], days: sorted.length };
}

function dayIndex(start: string, day: string): number {
  return Math.round((Date.parse(`${day}T00:00:00Z`) - Date.parse(`${start}T00:00:00Z`)) / DAY_MS) + 1;
}

/**
 * Split rows on the `period` label the query assigns
 */
export function splitByPeriod(rows: readonly MetricRow[]): { current: MetricRow[]; baseline: MetricRow[] } {
  const current: MetricRow[] = [];
  const baseline: MetricRow[] = [];
  for (const row of rows) {
    if (row.period === "current") current.push(row);
    else if (row.period === "baseline") baseline.push(row);
  }
  return { current, baseline };
}

export function compute(
  rowsCurrent: readonly MetricRow[],
  rowsBaseline: readonly MetricRow[],
  metric: MetricName,
  options: { threshold?: number } = {}
): MetricSet {
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;
  const names: MetricName[] = [metric, ...measuresFor(metric).filter((m) => m !== metric)];

  const metrics: Partial<Record<MetricName, MetricValue>> = {};
  for (const name of names) {
    const current = valueFor(rowsCurrent, name);
    const baseline = valueFor(rowsBaseline, name);
    const delta = deltaPct(current, baseline);
    metrics[name] = { current, baseline, deltaPct: delta, isAnomalous: isAnomalous(delta, threshold) };
  }

  const baselineWindow = summarizeWindow(rowsBaseline);

  return {
    target: metric,
    threshold,
    metrics,
    windows: {
      baseline: baselineWindow,
      current: summarizeWindow(rowsCurrent),
    },
    boundaryDay: baselineWindow ? dayIndex(baselineWindow.start, baselineWindow.end) : null,
  };
}

const EMPTY_VALUE: MetricValue = { current: null, baseline: null, deltaPct: null, isAnomalous: false };

export function targetValue(set: MetricSet): MetricValue {
  return set.metrics[set.target] ?? EMPTY_VALUE;
}

// ============================================
// FORMATTING
// ============================================

export function formatValue(name: MetricName, value: number | null): string {
  if (value === null) return "n/a";

  switch (getDefinition(name).format) {
    case "percent":
      return `${(value * 100).toFixed(2)}%`;
    case "currency":
      return `$${value.toFixed(2)}`;
    case "multiple":
      return `${value.toFixed(2)}x`;
    case "count":
      return Number.isInteger(value) ? String(value) : value.toFixed(1);
  }
}

export function formatDelta(delta: number | null): string {
  if (delta === null) return "n/a";
  const pct = (delta * 100).toFixed(1);
  return delta > 0 ? `+${pct}%` : `${pct}%`;
}

function describeLine(set: MetricSet, name: MetricName, value: MetricValue): string {
  const line = `${getDefinition(name).label}: ${formatValue(name, value.baseline)} → ${formatValue(name, value.current)} (${formatDelta(value.deltaPct)})`;
  if (value.deltaPct === null || set.boundaryDay === null || !set.windows.baseline) {
    return line;
  }
  return `${line} after day ${set.boundaryDay} (${set.windows.baseline.end})`;
}

function entriesOf(set: MetricSet): Array<[MetricName, MetricValue]> {
  const result: Array<[MetricName, MetricValue]> = [];
  for (const name of Object.keys(set.metrics)) {
    if (!isMetricName(name)) continue;
    const value = set.metrics[name];
    if (value) result.push([name, value]);
  }
  return result;
}

/**
 * One finding line per metric, e.g.
 * `CTR: 2.50% → 1.00% (-60.0%) after day 20 (2024-03-20)`
 */
export function describeMetricSet(set: MetricSet): string[] {
  return entriesOf(set).map(([name, value]) => describeLine(set, name, value));
}

/**
 * Finding lines for anomalous metrics only
 */
export function describeAnomalies(set: MetricSet): string[] {
  return entriesOf(set)
    .filter(([, value]) => value.isAnomalous)
    .map(([name, value]) => describeLine(set, name, value));
}
