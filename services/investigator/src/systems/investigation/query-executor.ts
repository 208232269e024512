/**
 * Query Executor
 *
 * Runs literal SQL and returns a QueryResult; never throws. Read-only access
 * is the caller's discipline: statements that do not start with SELECT or
 * WITH are refused, but nothing here sandboxes the connection.
 */

import type { SqlClient } from "@salesiq/db";
import type { QueryFailure, QueryResult } from "./types.js";

const RETRYABLE_NODE_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE", "EAI_AGAIN"]);

const RETRYABLE_SQLSTATES = new Set(["57014", "57P01", "57P02", "57P03", "53300", "40001", "40P01"]);

const SQLSTATE_CLASSES: Record<string, string> = {
  "42601": "syntax_error",
  "42703": "undefined_column",
  "42P01": "undefined_table",
  "42883": "undefined_function",
  "42804": "datatype_mismatch",
  "25006": "read_only_sql_transaction",
  "57014": "statement_timeout",
  "57P01": "admin_shutdown",
  "57P02": "crash_shutdown",
  "57P03": "cannot_connect_now",
  "53300": "too_many_connections",
  "40001": "serialization_failure",
  "40P01": "deadlock_detected",
};

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isReadOnlyStatement(sql: string): boolean {
  const stripped = sql.replace(/^(\s|--[^\n]*\n)+/, "");
  return /^(select|with)\b/i.test(stripped);
}

export function classifyQueryError(error: unknown): QueryFailure {
  const message = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);
  const lower = message.toLowerCase();

  if (code && RETRYABLE_NODE_CODES.has(code)) {
    return { errorClass: "connection_error", message, code, retryable: true };
  }

  if (code && /^[0-9A-Z]{5}$/.test(code)) {
    if (code.startsWith("08")) {
      return { errorClass: "connection_exception", message, code, retryable: true };
    }
    const errorClass = SQLSTATE_CLASSES[code] ?? (code.startsWith("22") ? "data_exception" : "sql_error");
    return { errorClass, message, code, retryable: RETRYABLE_SQLSTATES.has(code) };
  }

  if (
    lower.includes("timeout") ||
    lower.includes("timed out") ||
    lower.includes("connection terminated") ||
    lower.includes("connection reset")
  ) {
    return { errorClass: "timeout", message, code, retryable: true };
  }

  return { errorClass: error instanceof Error ? error.name : "unknown_error", message, code, retryable: false };
}

export class QueryExecutor {
  constructor(private readonly client: SqlClient) {}

  async execute(sql: string): Promise<QueryResult> {
    if (!isReadOnlyStatement(sql)) {
      return {
        ok: false,
        error: {
          errorClass: "read_only_violation",
          message: "Only SELECT or WITH statements may be executed",
          retryable: false,
        },
      };
    }

    try {
      const result = await this.client.query(sql);
      return { ok: true, rows: result.rows, rowCount: result.rowCount, fields: result.fields };
    } catch (error) {
      return { ok: false, error: classifyQueryError(error) };
    }
  }
}
