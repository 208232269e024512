/**
 * Configuration Management
 * Loads and validates configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

const identifier = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain SQL identifier");

const envSchema = z.object({
  // Store
  DATABASE_URL: z.string().url().optional(),
  DB_HOST: z.string().default("localhost"),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: z.string().default("salesiq"),
  DB_USER: z.string().default("postgres"),
  DB_PASSWORD: z.string().default(""),
  DB_SCHEMA: identifier.default("public"),
  DB_POOL_MAX: z.coerce.number().int().positive().default(5),
  DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  DB_STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Language model
  ANTHROPIC_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default("claude-sonnet-4-20250514"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  LLM_RETRIES: z.coerce.number().int().min(1).default(2),

  // Investigation tuning
  ANOMALY_THRESHOLD: z.coerce.number().positive().max(10).default(0.2),
  QUERY_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  QUERY_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(250),
  RECENT_WINDOW_DAYS: z.coerce.number().int().positive().default(10),
  LOOKBACK_DAYS: z.coerce.number().int().positive().default(60),
  METRICS_TABLE: identifier.default("daily_metrics"),

  // Trace export
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().optional(),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Env = z.infer<typeof envSchema>;

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  schema: string;
  poolMax: number;
  connectTimeoutMs: number;
  statementTimeoutMs: number;
}

export interface LlmConfig {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  retries: number;
}

/**
 * Tuning for the investigation loop. The threshold and retry counts are
 * provisional defaults, not product guarantees.
 */
export interface InvestigationConfig {
  anomalyThreshold: number;
  queryMaxRetries: number;
  queryRetryBackoffMs: number;
  recentWindowDays: number;
  lookbackDays: number;
  metricsTable: string;
}

export interface Config {
  database: DatabaseConfig;
  llm: LlmConfig;
  investigation: InvestigationConfig;

  supabase?: {
    url: string;
    key: string;
  };

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    nodeEnv: "development" | "production" | "test";
  };
}

let configInstance: Config | null = null;

/**
 * Load and validate configuration
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Blank lines copied from .env.example mean "unset"
  const defined = Object.fromEntries(Object.entries(source).filter(([, value]) => value !== ""));
  const parseResult = envSchema.safeParse(defined);

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map((e) => `  - ${e.path.join(".")}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join("\n")}`, {
      issues: parseResult.error.issues.map((e) => e.path.join(".")),
    });
  }

  const env = parseResult.data;

  return {
    database: {
      connectionString: env.DATABASE_URL,
      host: env.DB_HOST,
      port: env.DB_PORT,
      database: env.DB_NAME,
      user: env.DB_USER,
      password: env.DB_PASSWORD,
      schema: env.DB_SCHEMA,
      poolMax: env.DB_POOL_MAX,
      connectTimeoutMs: env.DB_CONNECT_TIMEOUT_MS,
      statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS,
    },

    llm: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.LLM_MODEL,
      timeoutMs: env.LLM_TIMEOUT_MS,
      retries: env.LLM_RETRIES,
    },

    investigation: {
      anomalyThreshold: env.ANOMALY_THRESHOLD,
      queryMaxRetries: env.QUERY_MAX_RETRIES,
      queryRetryBackoffMs: env.QUERY_RETRY_BACKOFF_MS,
      recentWindowDays: env.RECENT_WINDOW_DAYS,
      lookbackDays: env.LOOKBACK_DAYS,
      metricsTable: env.METRICS_TABLE,
    },

    supabase:
      env.SUPABASE_URL && env.SUPABASE_KEY
        ? {
            url: env.SUPABASE_URL,
            key: env.SUPABASE_KEY,
          }
        : undefined,

    env: {
      logLevel: env.LOG_LEVEL,
      nodeEnv: env.NODE_ENV,
    },
  };
}

/**
 * Get configuration (lazy-loaded singleton)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
