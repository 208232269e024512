/**
 * Event Store
 * Batched trace export to the investigation_events table with retry handling
 */

import { logger } from "@salesiq/core";
import { getSupabase, isSupabaseConfigured } from "./supabase.js";
import {
  EventTypes,
  type EventType,
  type EventInsert,
  type EventLevel,
  type TraceContext,
  getEventCategory,
} from "./types.js";

export { EventTypes };

// ============================================================
// Configuration
// ============================================================

const CONFIG = {
  TABLE: "investigation_events",
  BATCH_INTERVAL_MS: 100,
  MAX_BATCH_SIZE: 100,
  MAX_RETRIES: 3,
  RETRY_DELAY_MS: 100,
  RETRY_MULTIPLIER: 2,
};

// ============================================================
// Event Queue
// ============================================================

interface QueuedEvent extends EventInsert {
  timestamp: string;
}

class EventQueue {
  private events: QueuedEvent[] = [];
  private flushTimeout: ReturnType<typeof setTimeout> | null = null;
  private isFlushing = false;
  private flushPromise: Promise<void> | null = null;

  add(event: QueuedEvent): void {
    this.events.push(event);
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimeout) return;

    if (this.events.length >= CONFIG.MAX_BATCH_SIZE) {
      this.flush().catch((error: unknown) => {
        logger.error("[EventStore] Flush failed", error, { component: "event-store" });
      });
      return;
    }

    this.flushTimeout = setTimeout(() => {
      this.flushTimeout = null;
      this.flush().catch((error: unknown) => {
        logger.error("[EventStore] Flush failed", error, { component: "event-store" });
      });
    }, CONFIG.BATCH_INTERVAL_MS);
  }

  async flush(): Promise<void> {
    if (this.isFlushing && this.flushPromise) {
      await this.flushPromise;
      if (this.events.length > 0) {
        return this.flush();
      }
      return;
    }

    if (this.events.length === 0) return;
    if (!isSupabaseConfigured()) {
      this.events = [];
      return;
    }

    this.isFlushing = true;
    const batch = [...this.events];
    this.events = [];

    this.flushPromise = this.doFlush(batch);

    try {
      await this.flushPromise;
    } finally {
      this.isFlushing = false;
      this.flushPromise = null;
    }
  }

  private async doFlush(events: QueuedEvent[], attempt = 1): Promise<void> {
    const supabase = getSupabase();
    const { error } = await supabase.from(CONFIG.TABLE).insert(events);

    if (error) {
      if (attempt < CONFIG.MAX_RETRIES) {
        const delay = CONFIG.RETRY_DELAY_MS * Math.pow(CONFIG.RETRY_MULTIPLIER, attempt - 1);
        await new Promise((r) => setTimeout(r, delay));
        return this.doFlush(events, attempt + 1);
      }
      logger.warn(`[EventStore] Dropped ${events.length} events: ${error.message}`, {
        component: "event-store",
      });
    }
  }

  async shutdown(): Promise<void> {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }
    await this.flush();
  }
}

const queue = new EventQueue();

// ============================================================
// Public API
// ============================================================

export function emitEvent(
  eventType: EventType,
  context: TraceContext,
  options: {
    message?: string;
    data?: Record<string, unknown>;
    level?: EventLevel;
  } = {}
): void {
  if (!isSupabaseConfigured()) return;

  queue.add({
    trace_id: context.traceId,
    investigation_id: context.investigationId,
    step_seq: context.stepSeq,
    event_type: eventType,
    event_source: getEventCategory(eventType),
    level: options.level ?? "info",
    message: options.message,
    payload: options.data ?? {},
    timestamp: new Date().toISOString(),
  });
}

export async function flushEvents(): Promise<void> {
  await queue.flush();
}

export async function shutdown(): Promise<void> {
  await queue.shutdown();
}

// ============================================================
// Convenience Functions
// ============================================================

export function emitInvestigationStarted(ctx: TraceContext, data?: Record<string, unknown>): void {
  emitEvent(EventTypes.INVESTIGATION_STARTED, ctx, { message: "Investigation started", data });
}

export function emitPhaseChanged(ctx: TraceContext, phase: string, previousPhase?: string): void {
  emitEvent(EventTypes.INVESTIGATION_PHASE_CHANGED, ctx, {
    message: `Phase changed: ${previousPhase ?? "none"} → ${phase}`,
    data: { phase, previousPhase },
  });
}

export function emitStepRecorded(ctx: TraceContext, kind: string, data?: Record<string, unknown>): void {
  emitEvent(EventTypes.STEP_RECORDED, ctx, {
    message: `Step #${ctx.stepSeq ?? "?"} ${kind}`,
    data: { kind, ...data },
    level: "debug",
  });
}

export function emitInvestigationCompleted(ctx: TraceContext, summary?: string): void {
  emitEvent(EventTypes.INVESTIGATION_COMPLETED, ctx, {
    message: summary ?? "Investigation completed",
    data: { summary },
  });
}

export function emitInvestigationFailed(ctx: TraceContext, errorCode: string, errorMessage: string): void {
  emitEvent(EventTypes.INVESTIGATION_FAILED, ctx, {
    message: `Investigation failed: ${errorMessage}`,
    data: { error_code: errorCode, error_message: errorMessage },
    level: "error",
  });
}

// LLM events
export function emitLLMRequestStarted(ctx: TraceContext, model: string, attempt: number): void {
  emitEvent(EventTypes.LLM_REQUEST_STARTED, ctx, {
    message: `LLM request started (attempt ${attempt})`,
    data: { model, attempt },
    level: "debug",
  });
}

export function emitLLMResponseCompleted(
  ctx: TraceContext,
  result: { model: string; duration_ms: number; input_tokens: number; output_tokens: number; cost_usd: number }
): void {
  emitEvent(EventTypes.LLM_RESPONSE_COMPLETED, ctx, {
    message: `LLM response completed in ${result.duration_ms}ms`,
    data: result,
    level: "debug",
  });
}

export function emitLLMError(ctx: TraceContext, errorCode: string, errorMessage: string): void {
  emitEvent(EventTypes.LLM_ERROR, ctx, {
    message: `LLM error: ${errorMessage}`,
    data: { error_code: errorCode, error_message: errorMessage },
    level: "error",
  });
}

// System events
export function emitInfo(ctx: TraceContext, message: string, data?: Record<string, unknown>): void {
  emitEvent(EventTypes.INFO, ctx, { message, data });
}

export function emitWarn(ctx: TraceContext, message: string, data?: Record<string, unknown>): void {
  emitEvent(EventTypes.WARN, ctx, { message, data, level: "warn" });
}

export function emitError(ctx: TraceContext, message: string, data?: Record<string, unknown>): void {
  emitEvent(EventTypes.ERROR, ctx, { message, data, level: "error" });
}
