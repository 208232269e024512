/**
 * Custom Error Types
 * Structured errors for investigation control flow and reporting
 */

/**
 * Base error class for all SalesIQ errors
 */
export class SalesIQError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "SalesIQError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends SalesIQError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Validation errors (CLI input, context values)
 */
export class ValidationError extends SalesIQError {
  public readonly field?: string;
  public readonly received?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      received?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
    this.received = options?.received;
  }
}

/**
 * The question names no recognizable metric or campaign
 */
export class AmbiguousQuestionError extends SalesIQError {
  public readonly missing: Array<"metric" | "entity">;

  constructor(question: string, missing: Array<"metric" | "entity">) {
    super(
      `Could not identify ${missing.join(" and ")} in question: "${question}"`,
      "AMBIGUOUS_QUESTION",
      { context: { question, missing }, retryable: false }
    );
    this.name = "AmbiguousQuestionError";
    this.missing = missing;
  }
}

/**
 * Store connection or schema fetch failed
 */
export class StoreUnavailableError extends SalesIQError {
  constructor(message: string, cause?: unknown) {
    super(message, "STORE_UNAVAILABLE", { cause, retryable: false });
    this.name = "StoreUnavailableError";
  }
}

/**
 * A generated query failed
 */
export class QueryError extends SalesIQError {
  public readonly errorClass: string;
  public readonly sql: string;

  constructor(
    message: string,
    options: {
      errorClass: string;
      sql: string;
      retryable: boolean;
      attempts?: number;
      cause?: unknown;
    }
  ) {
    super(message, options.retryable ? "QUERY_RETRYABLE" : "QUERY_NON_RETRYABLE", {
      cause: options.cause,
      retryable: options.retryable,
      context: { errorClass: options.errorClass, attempts: options.attempts },
    });
    this.name = "QueryError";
    this.errorClass = options.errorClass;
    this.sql = options.sql;
  }
}

/**
 * Language-model backend failed or produced unusable output
 */
export class SynthesisError extends SalesIQError {
  constructor(message: string, options?: { cause?: unknown; code?: string; retryable?: boolean }) {
    super(message, options?.code ?? "SYNTHESIS_ERROR", {
      cause: options?.cause,
      retryable: options?.retryable ?? false,
    });
    this.name = "SynthesisError";
  }
}

/**
 * Backend answered, but without the required report sections
 */
export class MalformedResponseError extends SynthesisError {
  public readonly missingSections: string[];

  constructor(missingSections: string[]) {
    super(`Response is missing report sections: ${missingSections.join(", ")}`, {
      code: "MALFORMED_RESPONSE",
    });
    this.name = "MalformedResponseError";
    this.missingSections = missingSections;
  }
}

/**
 * Caller cancelled the investigation between steps
 */
export class InvestigationCancelledError extends SalesIQError {
  constructor(phase: string) {
    super(`Investigation cancelled during ${phase}`, "CANCELLED", {
      context: { phase },
      retryable: false,
    });
    this.name = "InvestigationCancelledError";
  }
}

export type InvestigationErrorKind =
  | "ambiguous_question"
  | "store_unavailable"
  | "query"
  | "cancelled"
  | "internal";

/**
 * Umbrella error returned to callers of an investigation
 */
export class InvestigationError extends SalesIQError {
  public readonly kind: InvestigationErrorKind;
  public readonly investigationId: string;

  constructor(kind: InvestigationErrorKind, investigationId: string, cause: SalesIQError) {
    super(cause.message, "INVESTIGATION_FAILED", {
      cause,
      context: { kind, investigationId, causeCode: cause.code },
      retryable: false,
    });
    this.name = "InvestigationError";
    this.kind = kind;
    this.investigationId = investigationId;
  }
}

/**
 * Type guard to check if error is a SalesIQ error
 */
export function isSalesIQError(error: unknown): error is SalesIQError {
  return error instanceof SalesIQError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  if (isSalesIQError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("timed out") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("connection terminated") ||
      message.includes("rate limit")
    );
  }

  return false;
}

/**
 * Wrap an unknown error into a SalesIQ error
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): SalesIQError {
  if (isSalesIQError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new SalesIQError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new SalesIQError(
    typeof error === "string" ? error : defaultMessage,
    "UNKNOWN_ERROR"
  );
}
