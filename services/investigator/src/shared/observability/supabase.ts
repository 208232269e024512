/**
 * Supabase Observability
 * Console logging plus batched trace export to investigation_events
 */

import {
  isSupabaseConfigured,
  emitInvestigationStarted,
  emitInvestigationCompleted,
  emitInvestigationFailed,
  emitPhaseChanged,
  emitStepRecorded,
  emitLLMRequestStarted,
  emitLLMResponseCompleted,
  emitLLMError,
  emitInfo,
  emitWarn,
  emitError,
  flushEvents,
  type TraceContext,
} from "@salesiq/db";
import { ConsoleObservability } from "./console.js";
import type {
  IObservability,
  StartSessionParams,
  SessionResult,
  ObservabilityEvent,
  ObservabilityOptions,
  LogLevel,
} from "./types.js";

export class SupabaseObservability implements IObservability {
  private readonly console: ConsoleObservability;
  private readonly enabled: boolean;

  constructor(options: ObservabilityOptions = {}) {
    this.console = new ConsoleObservability(options);
    this.enabled = isSupabaseConfigured();

    if (!this.enabled) {
      this.log("warn", "[Observability] Supabase not configured - using console only");
    }
  }

  async startSession(params: StartSessionParams): Promise<string> {
    const sessionId = await this.console.startSession(params);

    if (this.enabled) {
      emitInvestigationStarted(this.trace(sessionId), {
        system: params.systemName,
        version: params.systemVersion,
        input: params.input,
        ...params.metadata,
      });
    }

    return sessionId;
  }

  async endSession(sessionId: string, result: SessionResult): Promise<void> {
    await this.console.endSession(sessionId, result);

    if (!this.enabled) {
      return;
    }

    if (result.success) {
      emitInvestigationCompleted(
        this.trace(sessionId),
        result.metadata?.degraded ? "Investigation completed with degraded report" : undefined
      );
    } else {
      const message = result.error instanceof Error ? result.error.message : String(result.error);
      emitInvestigationFailed(this.trace(sessionId), result.metadata?.errorCode ?? "INVESTIGATION_FAILED", message);
    }

    try {
      await flushEvents();
    } catch (error) {
      this.log("error", "[Observability] Failed to flush trace events", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async recordEvent(event: ObservabilityEvent): Promise<void> {
    await this.console.recordEvent(event);

    if (!this.enabled || !event.correlationId) {
      return;
    }

    const ctx = this.trace(event.correlationId, event.stepSeq);
    const data = event.data ?? {};

    switch (event.type) {
      case "investigation.phase_changed":
        emitPhaseChanged(ctx, String(data.phase), typeof data.previousPhase === "string" ? data.previousPhase : undefined);
        break;
      case "investigation.step_recorded":
        emitStepRecorded(ctx, String(data.kind), data);
        break;
      case "executor.request":
        emitLLMRequestStarted(ctx, String(data.model), Number(data.attempt ?? 1));
        break;
      case "executor.response":
        emitLLMResponseCompleted(ctx, {
          model: String(data.model),
          duration_ms: Number(data.durationMs ?? 0),
          input_tokens: Number(data.inputTokens ?? 0),
          output_tokens: Number(data.outputTokens ?? 0),
          cost_usd: Number(data.costUsd ?? 0),
        });
        break;
      case "executor.error":
        emitLLMError(ctx, String(data.code), String(data.message));
        break;
      default:
        if (event.level === "error") emitError(ctx, event.type, data);
        else if (event.level === "warn") emitWarn(ctx, event.type, data);
        else emitInfo(ctx, event.type, data);
    }
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    this.console.log(level, message, data);
  }

  metric(name: string, value: number, tags?: Record<string, string>): void {
    this.console.metric(name, value, tags);
  }

  private trace(investigationId: string, stepSeq?: number): TraceContext {
    return { traceId: investigationId, investigationId, stepSeq };
  }
}

export function createSupabaseObservability(options?: ObservabilityOptions): IObservability {
  return new SupabaseObservability(options);
}
