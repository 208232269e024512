/**
 * Console Observability
 * Routes sessions, events and metrics through the core logger
 */

import { randomUUID } from "node:crypto";
import { logger, type ChildLogger } from "@salesiq/core";
import type {
  IObservability,
  StartSessionParams,
  SessionResult,
  ObservabilityEvent,
  ObservabilityOptions,
  LogLevel,
} from "./types.js";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class ConsoleObservability implements IObservability {
  private readonly options: ObservabilityOptions;
  private readonly minLevel: number;
  private readonly out: ChildLogger;

  constructor(options: ObservabilityOptions = {}) {
    this.options = options;
    this.minLevel = LOG_LEVELS[options.logLevel ?? "debug"];
    this.out = logger.child({ component: "observability" });
  }

  async startSession(params: StartSessionParams): Promise<string> {
    const sessionId = params.correlationId || randomUUID();

    this.log("info", `[${params.systemName}] Session started`, {
      sessionId,
      systemVersion: params.systemVersion,
    });

    return sessionId;
  }

  async endSession(sessionId: string, result: SessionResult): Promise<void> {
    if (result.success) {
      this.log("info", "Session completed", {
        sessionId,
        durationMs: result.metadata?.durationMs,
        entries: result.metadata?.entries,
        degraded: result.metadata?.degraded,
      });
    } else {
      this.log("error", "Session failed", {
        sessionId,
        error: result.error instanceof Error ? result.error.message : String(result.error),
      });
    }
  }

  async recordEvent(event: ObservabilityEvent): Promise<void> {
    const level = event.level ?? "debug";

    this.log(level, `[Event] ${event.type}`, {
      investigationId: event.correlationId,
      stepSeq: event.stepSeq,
      ...event.data,
    });

    if (this.options.onEvent) {
      this.options.onEvent(event);
    }
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[level] < this.minLevel) {
      return;
    }

    switch (level) {
      case "debug":
        this.out.debug(message, data);
        break;
      case "info":
        this.out.info(message, data);
        break;
      case "warn":
        this.out.warn(message, data);
        break;
      case "error":
        this.out.error(message, undefined, data);
        break;
    }
  }

  metric(name: string, value: number, tags?: Record<string, string>): void {
    this.out.metric(name, value, tags);
  }
}

/**
 * No-op observability for testing
 */
export class NoOpObservability implements IObservability {
  readonly events: ObservabilityEvent[] = [];

  async startSession(params: StartSessionParams): Promise<string> {
    return params.correlationId;
  }

  async endSession(_sessionId: string, _result: SessionResult): Promise<void> {
    // No-op
  }

  async recordEvent(event: ObservabilityEvent): Promise<void> {
    this.events.push(event);
  }

  log(_level: LogLevel, _message: string, _data?: Record<string, unknown>): void {
    // No-op
  }

  metric(_name: string, _value: number, _tags?: Record<string, string>): void {
    // No-op
  }
}

export function createConsoleObservability(options?: ObservabilityOptions): IObservability {
  return new ConsoleObservability(options);
}

export function createNoOpObservability(): NoOpObservability {
  return new NoOpObservability();
}
