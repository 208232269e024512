/**
 * Question Parsing
 * Resolves the campaign and metric an investigation targets
 */

import { AmbiguousQuestionError, logger } from "@salesiq/core";
import { isMetricName } from "./metrics.js";
import type { InvestigationTarget, MetricName } from "./types.js";

const CAMPAIGN_PATTERN = /\bcampaign(?:[\s_-]*id)?\s*(?:#|=|:|no\.?)?\s*(\d+)\b/i;

/**
 * Phrases before abbreviations; the earliest match in the question wins,
 * and the longer phrase wins a tie at the same position.
 */
const METRIC_PATTERNS: ReadonlyArray<readonly [MetricName, RegExp]> = [
  ["ctr", /click[\s-]?through(?:[\s-]rates?)?/i],
  ["cvr", /conversion[\s-]rates?/i],
  ["cpc", /cost[\s-]per[\s-]click/i],
  ["roas", /return[\s-]on[\s-]ad[\s-]spend/i],
  ["ctr", /\bctr\b/i],
  ["cvr", /\bcvr\b/i],
  ["cpc", /\bcpc\b/i],
  ["roas", /\broas\b/i],
  ["clicks", /\bclicks?\b/i],
  ["conversions", /\bconversions?\b/i],
  ["impressions", /\bimpressions?\b/i],
  ["spend", /\bspend(?:ing)?\b/i],
  ["revenue", /\brevenue\b/i],
];

export function findCampaignId(text: string): number | null {
  const match = CAMPAIGN_PATTERN.exec(text);
  return match ? Number(match[1]) : null;
}

export function findMetric(text: string): MetricName | null {
  let best: { metric: MetricName; index: number; length: number } | null = null;

  for (const [metric, pattern] of METRIC_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const candidate = { metric, index: match.index, length: match[0].length };
    if (
      !best ||
      candidate.index < best.index ||
      (candidate.index === best.index && candidate.length > best.length)
    ) {
      best = candidate;
    }
  }

  return best?.metric ?? null;
}

function parsePositiveInt(value: string | undefined): number | null {
  if (value === undefined || !/^\s*#?\d+\s*$/.test(value)) return null;
  const parsed = Number(value.replace("#", "").trim());
  return parsed > 0 ? parsed : null;
}

function metricOverride(value: string | undefined): MetricName | null {
  if (value === undefined) return null;
  const normalized = value.trim().toLowerCase();
  return isMetricName(normalized) ? normalized : findMetric(normalized);
}

/**
 * Context keys `campaign_id`/`campaign`, `metric` and `ad_id` take precedence
 * over the question text. An override that does not parse is ignored.
 */
export function parseQuestion(question: string, context: Readonly<Record<string, string>> = {}): InvestigationTarget {
  const campaignRaw = context.campaign_id ?? context.campaign;
  let campaignId = parsePositiveInt(campaignRaw) ?? (campaignRaw ? findCampaignId(campaignRaw) : null);
  if (campaignRaw !== undefined && campaignId === null) {
    logger.warn(`Ignoring unrecognized campaign override "${campaignRaw}"`, { component: "question" });
  }
  campaignId = campaignId ?? findCampaignId(question);

  let metric = metricOverride(context.metric);
  if (context.metric !== undefined && metric === null) {
    logger.warn(`Ignoring unrecognized metric override "${context.metric}"`, { component: "question" });
  }
  metric = metric ?? findMetric(question);

  const missing: Array<"metric" | "entity"> = [];
  if (metric === null) missing.push("metric");
  if (campaignId === null) missing.push("entity");

  if (metric === null || campaignId === null) {
    throw new AmbiguousQuestionError(question, missing);
  }

  const target: InvestigationTarget = { campaignId, metric };
  const adId = parsePositiveInt(context.ad_id);
  if (adId !== null) {
    target.adId = adId;
  }
  return target;
}
