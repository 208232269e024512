/**
 * Query Builder
 * Drafts the baseline/current window query for one campaign
 *
 * Filters are kept in the order they were added. The campaign filter is the
 * fixed base; the lookback and ad filters can be dropped by a repair.
 */

import { logger } from "@salesiq/core";
import { MEASURES } from "./metrics.js";
import type { MeasureName } from "./types.js";

export type Boundary =
  | { mode: "relative"; recentDays: number }
  | { mode: "absolute"; currentStart: string };

export interface QueryFilter {
  label: "campaign" | "lookback" | "ad";
  clause: string;
  removable: boolean;
}

export interface QueryPlan {
  table: string;
  campaignId: number;
  measures: readonly MeasureName[];
  boundary: Boundary;
  filters: readonly QueryFilter[];
}

export interface QueryPlanInput {
  table: string;
  campaignId: number;
  measures: readonly MeasureName[];
  boundary: Boundary;
  lookbackDays: number;
  adId?: number;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isValidIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const time = Date.parse(`${value}T00:00:00Z`);
  return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
}

/**
 * Accepts `last_N_days`, `last N days`, `Nd`, a bare `N` (all: the last N
 * days form the current window) or an ISO date where the current window starts.
 * Anything else falls back to the default split.
 */
export function parseTimeframe(value: string | undefined, defaultDays: number): Boundary {
  const fallback: Boundary = { mode: "relative", recentDays: defaultDays };
  if (value === undefined || value.trim() === "") return fallback;

  const text = value.trim().toLowerCase();

  const days =
    /^last[_\s]+(\d+)[_\s]+days?$/.exec(text)?.[1] ??
    /^(\d+)\s*d$/.exec(text)?.[1] ??
    /^(\d+)$/.exec(text)?.[1];

  if (days !== undefined) {
    const n = Number(days);
    if (n > 0) return { mode: "relative", recentDays: n };
  } else if (isValidIsoDate(text)) {
    return { mode: "absolute", currentStart: text };
  }

  logger.warn(`Unrecognized timeframe "${value}", using the last ${defaultDays} days`, {
    component: "query-builder",
  });
  return fallback;
}

export function describeBoundary(boundary: Boundary): string {
  return boundary.mode === "relative"
    ? `current = last ${boundary.recentDays} days of data`
    : `current = from ${boundary.currentStart}`;
}

export function buildQueryPlan(input: QueryPlanInput): QueryPlan {
  const filters: QueryFilter[] = [
    { label: "campaign", clause: `m.campaign_id = ${Math.trunc(input.campaignId)}`, removable: false },
  ];

  const lookback = Math.trunc(input.lookbackDays);
  filters.push({
    label: "lookback",
    clause:
      input.boundary.mode === "relative"
        ? `m.date > b.last_day - ${Math.trunc(input.boundary.recentDays) + lookback}`
        : `m.date >= DATE '${input.boundary.currentStart}' - ${lookback}`,
    removable: true,
  });

  if (input.adId !== undefined) {
    filters.push({ label: "ad", clause: `m.ad_id = ${Math.trunc(input.adId)}`, removable: true });
  }

  return {
    table: input.table,
    campaignId: Math.trunc(input.campaignId),
    measures: [...new Set(input.measures)],
    boundary: input.boundary,
    filters,
  };
}

/**
 * Drop the most recently added removable filter
 */
export function repairPlan(plan: QueryPlan): { plan: QueryPlan; removed: QueryFilter } | null {
  for (let i = plan.filters.length - 1; i >= 0; i--) {
    const filter = plan.filters[i];
    if (filter.removable) {
      return {
        plan: { ...plan, filters: plan.filters.filter((_, j) => j !== i) },
        removed: filter,
      };
    }
  }
  return null;
}

export function renderQuery(plan: QueryPlan): string {
  const select = plan.measures.map((m) => `  ${MEASURES[m].sql} AS ${m}`);
  const where = plan.filters.map((f) => f.clause).join("\n  AND ");

  if (plan.boundary.mode === "relative") {
    return [
      `WITH bounds AS (SELECT MAX(date) AS last_day FROM ${plan.table} WHERE campaign_id = ${plan.campaignId})`,
      "SELECT",
      "  to_char(m.date, 'YYYY-MM-DD') AS day,",
      `  CASE WHEN m.date > b.last_day - ${plan.boundary.recentDays} THEN 'current' ELSE 'baseline' END AS period,`,
      select.join(",\n"),
      `FROM ${plan.table} m CROSS JOIN bounds b`,
      `WHERE ${where}`,
      "GROUP BY m.date, b.last_day",
      "ORDER BY m.date",
    ].join("\n");
  }

  return [
    "SELECT",
    "  to_char(m.date, 'YYYY-MM-DD') AS day,",
    `  CASE WHEN m.date >= DATE '${plan.boundary.currentStart}' THEN 'current' ELSE 'baseline' END AS period,`,
    select.join(",\n"),
    `FROM ${plan.table} m`,
    `WHERE ${where}`,
    "GROUP BY m.date",
    "ORDER BY m.date",
  ].join("\n");
}
