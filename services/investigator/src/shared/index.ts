/**
 * Shared Infrastructure Exports
 */

// Executor (LLM execution)
export * from "./executor/index.js";

// Observability (logging, tracing)
export * from "./observability/index.js";

// Prompt (versioned prompts)
export * from "./prompt/index.js";
