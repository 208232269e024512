/**
 * Observability Types
 * Interface for logging, tracing, and metrics
 */

import type { LogLevel } from "@salesiq/core";

export type { LogLevel };

// ============================================
// OBSERVABILITY INTERFACE
// ============================================

export interface IObservability {
  /**
   * Start tracking an investigation; returns the trace id
   */
  startSession(params: StartSessionParams): Promise<string>;

  endSession(sessionId: string, result: SessionResult): Promise<void>;

  recordEvent(event: ObservabilityEvent): Promise<void>;

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void;

  metric(name: string, value: number, tags?: Record<string, string>): void;
}

// ============================================
// SESSION TRACKING
// ============================================

export interface StartSessionParams {
  systemName: string;
  systemVersion: string;
  correlationId: string;
  input: unknown;
  metadata?: Record<string, unknown>;
}

export interface SessionResult {
  success: boolean;
  output?: unknown;
  error?: unknown;
  metadata?: SessionMetadata;
}

export interface SessionMetadata {
  durationMs?: number;
  entries?: number;
  degraded?: boolean;
  errorCode?: string;
}

// ============================================
// EVENT TAXONOMY
// ============================================

export type EventType =
  | "investigation.phase_changed"
  | "investigation.step_recorded"
  | "query.retry"
  | "query.repair"
  | "executor.request"
  | "executor.response"
  | "executor.error";

export interface ObservabilityEvent {
  type: EventType;

  timestamp?: string;

  /** Investigation id */
  correlationId?: string;

  sessionId?: string;

  /** Scratchpad sequence number the event belongs to */
  stepSeq?: number;

  level?: LogLevel;

  data?: Record<string, unknown>;
}

// ============================================
// OPTIONS
// ============================================

export interface ObservabilityOptions {
  /** Minimum log level */
  logLevel?: LogLevel;

  /** Custom event handler */
  onEvent?: (event: ObservabilityEvent) => void;
}
