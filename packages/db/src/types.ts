/**
 * Database Types
 * SQL client contract for the metrics store and trace event rows
 */

// ============================================================
// SQL CLIENT
// ============================================================

export type SqlRow = Record<string, unknown>;

export interface SqlResult {
  rows: SqlRow[];
  rowCount: number;
  fields: string[];
}

/**
 * Minimal read interface over the relational store.
 * Implementations reject with the driver's error; callers classify it.
 */
export interface SqlClient {
  query(text: string): Promise<SqlResult>;
  ping(): Promise<void>;
  end(): Promise<void>;
}

// ============================================================
// TRACE EVENTS
// ============================================================

export type EventLevel = "debug" | "info" | "warn" | "error";

export const EventTypes = {
  INVESTIGATION_STARTED: "investigation.started",
  INVESTIGATION_PHASE_CHANGED: "investigation.phase_changed",
  INVESTIGATION_COMPLETED: "investigation.completed",
  INVESTIGATION_FAILED: "investigation.failed",

  STEP_RECORDED: "step.recorded",

  LLM_REQUEST_STARTED: "llm.request_started",
  LLM_RESPONSE_COMPLETED: "llm.response_completed",
  LLM_ERROR: "llm.error",

  INFO: "system.info",
  WARN: "system.warn",
  ERROR: "system.error",
} as const;

export type EventType = (typeof EventTypes)[keyof typeof EventTypes];

/**
 * Row shape of the investigation_events table
 */
export interface EventInsert {
  trace_id: string;
  investigation_id?: string;
  step_seq?: number;
  event_type: EventType;
  event_source: string;
  level: EventLevel;
  message?: string;
  payload: Record<string, unknown>;
}

export interface TraceContext {
  traceId: string;
  investigationId?: string;
  stepSeq?: number;
}

export function getEventCategory(eventType: EventType): string {
  const parts = eventType.split(".");
  return parts[0] || "unknown";
}
