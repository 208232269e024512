/**
 * Demo Data
 * Deterministic campaign, ad and daily metric rows with one planted anomaly
 */

import { readFile } from "node:fs/promises";
import { logger } from "@salesiq/core";

export interface SeedOptions {
  seed?: number;
  /** First day of data, YYYY-MM-DD. Defaults to 30 days before today (UTC). */
  startDate?: string;
  campaigns?: number;
  adsPerCampaign?: number;
  /** Days after the start date; rows are generated for day 0..days inclusive */
  days?: number;
  anomalyCampaign?: number;
  anomalyStartDay?: number;
  ctrDropFactor?: number;
}

export interface CampaignSeed {
  campaign_id: number;
  name: string;
  description: string;
  start_date: string;
  end_date: string;
  budget: number;
  status: "active" | "paused" | "completed";
  target_audience: string;
}

export interface AdSeed {
  ad_id: number;
  campaign_id: number;
  name: string;
  creative_url: string;
  ad_type: string;
}

export interface DailyMetricSeed {
  date: string;
  campaign_id: number;
  ad_id: number;
  impressions: number;
  clicks: number;
  conversions: number;
  spend: number;
  ctr: number;
  cpc: number;
  cvr: number;
  roas: number;
}

export interface SeedData {
  campaigns: CampaignSeed[];
  ads: AdSeed[];
  metrics: DailyMetricSeed[];
  /** Where the planted CTR drop begins */
  anomaly: { campaignId: number; startDate: string };
}

/**
 * Anything that runs parameterized statements: a pg Pool or PoolClient
 */
export interface SeedConnection {
  query(text: string, values?: unknown[]): Promise<unknown>;
}

const DEFAULTS = {
  seed: 42,
  campaigns: 10,
  adsPerCampaign: 5,
  days: 30,
  anomalyCampaign: 5,
  anomalyStartDay: 20,
  ctrDropFactor: 0.5,
};

const AD_TYPES = ["banner", "video", "text", "carousel", "native"];
const STATUSES = ["active", "paused", "completed"] as const;
const AUDIENCES = ["male", "female", "young adults", "seniors", "professionals"];

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * mulberry32: small seeded PRNG returning floats in [0, 1)
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function addDays(isoDate: string, days: number): string {
  const time = Date.parse(`${isoDate}T00:00:00Z`) + days * DAY_MS;
  return new Date(time).toISOString().slice(0, 10);
}

function defaultStartDate(days: number): string {
  const today = new Date().toISOString().slice(0, 10);
  return addDays(today, -days);
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Day `anomalyStartDay` (counted from 0) is the first anomalous day. With the
 * defaults that is the 21st of 31 days, so a "last 10 days" current window
 * leaves it in the baseline; pass `timeframe=<anomaly.startDate>` to split
 * exactly at the drop.
 */
export function generateSeedData(options: SeedOptions = {}): SeedData {
  const opts = { ...DEFAULTS, ...options };
  const startDate = options.startDate ?? defaultStartDate(opts.days);
  const random = createRandom(opts.seed);

  const uniform = (min: number, max: number): number => min + random() * (max - min);
  const integer = (min: number, max: number): number => Math.floor(uniform(min, max + 1));
  const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length) % items.length];

  const campaigns: CampaignSeed[] = [];
  const ads: AdSeed[] = [];

  for (let c = 1; c <= opts.campaigns; c++) {
    campaigns.push({
      campaign_id: c,
      name: `Campaign ${c}`,
      description: `Demo campaign ${c}`,
      start_date: startDate,
      end_date: addDays(startDate, opts.days + integer(10, 30)),
      budget: round(uniform(5000, 50000), 2),
      status: pick(STATUSES),
      target_audience: pick(AUDIENCES),
    });

    for (let a = 1; a <= opts.adsPerCampaign; a++) {
      const adId = (c - 1) * opts.adsPerCampaign + a;
      ads.push({
        ad_id: adId,
        campaign_id: c,
        name: `Ad ${a} for Campaign ${c}`,
        creative_url: `https://example.com/creatives/${c}/ad${a}.jpg`,
        ad_type: pick(AD_TYPES),
      });
    }
  }

  const metrics: DailyMetricSeed[] = [];

  for (let day = 0; day <= opts.days; day++) {
    const date = addDays(startDate, day);

    for (const ad of ads) {
      const impressions = integer(500, 2000);
      let baseCtr = uniform(0.01, 0.05);
      const baseCvr = uniform(0.01, 0.1);

      if (ad.campaign_id === opts.anomalyCampaign && day >= opts.anomalyStartDay) {
        baseCtr *= opts.ctrDropFactor;
      }

      const clicks = Math.min(Math.floor(impressions * baseCtr), impressions);
      const conversions = Math.min(Math.floor(clicks * baseCvr), clicks);
      const spend = round(uniform(50, 200), 2);
      const revenue = conversions * uniform(20, 100);

      metrics.push({
        date,
        campaign_id: ad.campaign_id,
        ad_id: ad.ad_id,
        impressions,
        clicks,
        conversions,
        spend,
        ctr: round(clicks / impressions, 6),
        cpc: clicks > 0 ? round(spend / clicks, 6) : 0,
        cvr: clicks > 0 ? round(conversions / clicks, 6) : 0,
        roas: spend > 0 ? round(revenue / spend, 6) : 0,
      });
    }
  }

  return {
    campaigns,
    ads,
    metrics,
    anomaly: { campaignId: opts.anomalyCampaign, startDate: addDays(startDate, opts.anomalyStartDay) },
  };
}

export async function loadSchemaSql(): Promise<string> {
  return readFile(new URL("../sql/schema.sql", import.meta.url), "utf8");
}

/**
 * Apply the DDL and insert the generated rows in one transaction
 */
export async function seedDatabase(
  connection: SeedConnection,
  data: SeedData,
  options: { reset?: boolean } = {}
): Promise<void> {
  const log = logger.child({ component: "seed" });
  const schemaSql = await loadSchemaSql();

  await connection.query("BEGIN");
  try {
    await connection.query(schemaSql);

    if (options.reset) {
      log.info("Clearing existing data");
      await connection.query("DELETE FROM daily_metrics");
      await connection.query("DELETE FROM ads");
      await connection.query("DELETE FROM campaigns");
    }

    for (const c of data.campaigns) {
      await connection.query(
        `INSERT INTO campaigns (campaign_id, name, description, start_date, end_date, budget, status, target_audience)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        [c.campaign_id, c.name, c.description, c.start_date, c.end_date, c.budget, c.status, c.target_audience]
      );
    }
    log.info(`Inserted ${data.campaigns.length} campaigns`);

    for (const ad of data.ads) {
      await connection.query(
        `INSERT INTO ads (ad_id, campaign_id, name, creative_url, ad_type) VALUES ($1, $2, $3, $4, $5)`,
        [ad.ad_id, ad.campaign_id, ad.name, ad.creative_url, ad.ad_type]
      );
    }
    log.info(`Inserted ${data.ads.length} ads`);

    for (const m of data.metrics) {
      await connection.query(
        `INSERT INTO daily_metrics (date, campaign_id, ad_id, impressions, clicks, conversions, spend, ctr, cpc, cvr, roas)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)`,
        [m.date, m.campaign_id, m.ad_id, m.impressions, m.clicks, m.conversions, m.spend, m.ctr, m.cpc, m.cvr, m.roas]
      );
    }
    log.info(`Inserted ${data.metrics.length} daily metric rows`);

    await connection.query("COMMIT");
  } catch (error) {
    await connection.query("ROLLBACK");
    throw error;
  }
}
