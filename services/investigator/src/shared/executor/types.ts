/**
 * Executor Types
 * Interface for the language-model execution layer
 */

// ============================================
// EXECUTOR INTERFACE
// ============================================

/**
 * Executor interface - abstracts LLM execution
 */
export interface IExecutor {
  /**
   * Execute a prompt with given profile
   */
  execute(request: ExecutorRequest): Promise<ExecutorResponse>;

  /**
   * Check if executor is ready
   */
  isReady(): boolean;
}

// ============================================
// PROFILE
// ============================================

/**
 * Model and limits for one call. Synthesis is a single stateless turn.
 */
export interface ExecutorProfile {
  model: string;
  maxTurns: number;
  timeoutMs: number;
}

// ============================================
// REQUEST / RESPONSE
// ============================================

export interface ExecutorRequest {
  /** The prompt to send */
  prompt: string;

  systemPrompt?: string;

  profile: ExecutorProfile;

  /** Caller cancellation, combined with the request timeout */
  signal?: AbortSignal;
}

export interface ExecutorResponse {
  success: boolean;

  /** Raw output from the model */
  output: string;

  sessionId?: string;

  costUsd: number;

  durationMs: number;

  tokens?: {
    input: number;
    output: number;
  };

  /** Attempts made, including the successful one */
  attempts: number;

  error?: {
    code: ExecutorErrorCode;
    message: string;
  };
}

export type ExecutorErrorCode = "LLM_TIMEOUT" | "LLM_ABORTED" | "LLM_NOT_CONFIGURED" | "EXECUTOR_ERROR";

// ============================================
// EXECUTOR OPTIONS
// ============================================

export interface ExecutorOptions {
  /** Working directory handed to the SDK */
  cwd?: string;

  /** Total attempts per request */
  retries?: number;
  backoffMs?: number;

  apiKey?: string;
}
