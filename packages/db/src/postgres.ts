/**
 * PostgreSQL Client
 * Pooled connection to the metrics store
 */

import pg, { type Pool, type PoolConfig } from "pg";
import { getConfig, logger, type DatabaseConfig } from "@salesiq/core";
import type { SqlClient, SqlResult, SqlRow } from "./types.js";

let poolInstance: Pool | null = null;

/**
 * Build pool options. Acquisition blocks for at most connectTimeoutMs.
 */
export function buildPoolConfig(config: DatabaseConfig): PoolConfig {
  const base: PoolConfig = {
    max: config.poolMax,
    connectionTimeoutMillis: config.connectTimeoutMs,
    statement_timeout: config.statementTimeoutMs,
    application_name: "salesiq-investigator",
  };

  if (config.connectionString) {
    return { ...base, connectionString: config.connectionString };
  }

  return {
    ...base,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
  };
}

export function createPool(config: DatabaseConfig): Pool {
  const pool = new pg.Pool(buildPoolConfig(config));

  // Idle clients can error when the server drops them; log instead of crashing
  pool.on("error", (error) => {
    logger.error("[Postgres] Idle client error", error, { component: "db" });
  });

  return pool;
}

/**
 * Get the shared pool
 * Lazy-loaded singleton
 */
export function getPool(): Pool {
  if (!poolInstance) {
    poolInstance = createPool(getConfig().database);
  }
  return poolInstance;
}

/**
 * Close and forget the shared pool
 */
export async function resetPool(): Promise<void> {
  const pool = poolInstance;
  poolInstance = null;
  if (pool) {
    await pool.end();
  }
}

/**
 * SqlClient backed by a pg pool
 */
export class PgSqlClient implements SqlClient {
  constructor(private readonly pool: Pool) {}

  async query(text: string): Promise<SqlResult> {
    const result = await this.pool.query<SqlRow>(text);
    return {
      rows: result.rows,
      rowCount: result.rowCount ?? result.rows.length,
      fields: result.fields.map((field) => field.name),
    };
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}

export function createSqlClient(pool: Pool = getPool()): SqlClient {
  return new PgSqlClient(pool);
}

/**
 * Test database connection
 */
export async function testConnection(client: SqlClient = createSqlClient()): Promise<boolean> {
  try {
    await client.ping();
    return true;
  } catch (error) {
    logger.error("[Postgres] Connection test failed", error, { component: "db" });
    return false;
  }
}
