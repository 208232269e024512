/**
 * Claude Executor
 * Single-turn, tool-free completion through the Claude Agent SDK
 */

import { query, type Options } from "@anthropic-ai/claude-agent-sdk";
import { isRetryableError, logger } from "@salesiq/core";
import type {
  IExecutor,
  ExecutorRequest,
  ExecutorResponse,
  ExecutorOptions,
  ExecutorErrorCode,
} from "./types.js";

class ExecutorFailure extends Error {
  constructor(
    message: string,
    readonly code: ExecutorErrorCode
  ) {
    super(message);
    this.name = "ExecutorFailure";
  }
}

/** Every tool the SDK ships; none is offered to the model */
export const BUILT_IN_TOOLS: readonly string[] = [
  "Task",
  "Bash",
  "BashOutput",
  "KillShell",
  "Glob",
  "Grep",
  "Read",
  "Edit",
  "MultiEdit",
  "Write",
  "NotebookEdit",
  "WebFetch",
  "WebSearch",
  "TodoWrite",
  "ExitPlanMode",
  "ListMcpResources",
  "ReadMcpResource",
  "SlashCommand",
];

export function buildQueryOptions(
  request: ExecutorRequest,
  abortController: AbortController,
  cwd: string
): Options {
  return {
    model: request.profile.model,
    systemPrompt: request.systemPrompt,
    allowedTools: [],
    disallowedTools: [...BUILT_IN_TOOLS],
    maxTurns: request.profile.maxTurns,
    permissionMode: "default",
    abortController,
    cwd,
  };
}

/**
 * Claude SDK Executor
 */
export class ClaudeExecutor implements IExecutor {
  private readonly cwd: string;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly apiKey: string | undefined;

  constructor(options: ExecutorOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.retries = Math.max(1, options.retries ?? 2);
    this.backoffMs = options.backoffMs ?? 1000;
    this.apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
  }

  isReady(): boolean {
    return Boolean(this.apiKey);
  }

  async execute(request: ExecutorRequest): Promise<ExecutorResponse> {
    const startTime = Date.now();

    if (!this.isReady()) {
      return this.failure(startTime, 0, "LLM_NOT_CONFIGURED", "ANTHROPIC_API_KEY is not set");
    }

    let lastError: ExecutorFailure | undefined;
    let attempt = 0;

    while (attempt < this.retries) {
      attempt++;

      try {
        const response = await this.executeOnce(request, startTime);
        return { ...response, attempts: attempt };
      } catch (error) {
        lastError =
          error instanceof ExecutorFailure
            ? error
            : new ExecutorFailure(error instanceof Error ? error.message : String(error), "EXECUTOR_ERROR");

        logger.warn(`[Executor] Attempt ${attempt}/${this.retries} failed: ${lastError.message}`, {
          component: "executor",
        });

        if (!this.isRetryable(lastError) || request.signal?.aborted || attempt >= this.retries) {
          break;
        }

        // Exponential backoff
        const delay = this.backoffMs * Math.pow(2, attempt - 1);
        await new Promise((r) => setTimeout(r, delay));
      }
    }

    return this.failure(
      startTime,
      attempt,
      lastError?.code ?? "EXECUTOR_ERROR",
      lastError?.message ?? "Unknown error"
    );
  }

  /**
   * Execute once (no retries). Aborts when the timeout fires or the caller cancels.
   */
  private async executeOnce(request: ExecutorRequest, startTime: number): Promise<ExecutorResponse> {
    const { prompt, profile, signal } = request;

    const abortController = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      abortController.abort();
    }, profile.timeoutMs);
    const onCallerAbort = (): void => abortController.abort();
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    const options = buildQueryOptions(request, abortController, this.cwd);

    let output = "";
    let sessionId: string | undefined;
    let costUsd = 0;
    let durationMs = 0;
    let inputTokens = 0;
    let outputTokens = 0;

    try {
      for await (const message of query({ prompt, options })) {
        if (message.type === "assistant") {
          for (const block of message.message.content) {
            if (block.type === "text") {
              output += block.text;
            }
          }
        } else if (message.type === "result") {
          if (message.subtype === "success") {
            costUsd = message.total_cost_usd;
            durationMs = message.duration_ms;
            sessionId = message.session_id;
            inputTokens = message.usage.input_tokens;
            outputTokens = message.usage.output_tokens;

            if (!output && message.result) {
              output = message.result;
            }
          } else {
            throw new ExecutorFailure(`Backend stopped with ${message.subtype}`, "EXECUTOR_ERROR");
          }
        }
      }
    } catch (error) {
      if (timedOut) {
        throw new ExecutorFailure(`LLM request timed out after ${profile.timeoutMs}ms`, "LLM_TIMEOUT");
      }
      if (signal?.aborted) {
        throw new ExecutorFailure("LLM request aborted by caller", "LLM_ABORTED");
      }
      throw error;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCallerAbort);
    }

    return {
      success: true,
      output,
      sessionId,
      costUsd,
      durationMs: durationMs || Date.now() - startTime,
      tokens: {
        input: inputTokens,
        output: outputTokens,
      },
      attempts: 1,
    };
  }

  private isRetryable(error: ExecutorFailure): boolean {
    if (error.code === "LLM_TIMEOUT") return true;
    if (error.code === "LLM_ABORTED") return false;

    const message = error.message.toLowerCase();
    return (
      isRetryableError(error) ||
      message.includes("overloaded") ||
      message.includes("529") ||
      message.includes("503")
    );
  }

  private failure(
    startTime: number,
    attempts: number,
    code: ExecutorErrorCode,
    message: string
  ): ExecutorResponse {
    return {
      success: false,
      output: "",
      costUsd: 0,
      durationMs: Date.now() - startTime,
      attempts,
      error: { code, message },
    };
  }
}

/**
 * Create a Claude executor with default options
 */
export function createClaudeExecutor(options?: ExecutorOptions): IExecutor {
  return new ClaudeExecutor(options);
}
