/**
 * @salesiq/core
 * Configuration, logging and the error taxonomy shared by every workspace
 */

// Config
export {
  loadConfig,
  getConfig,
  resetConfig,
  type Config,
  type Env,
  type DatabaseConfig,
  type LlmConfig,
  type InvestigationConfig,
} from "./config.js";

// Logger
export {
  logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  SalesIQError,
  ConfigError,
  ValidationError,
  AmbiguousQuestionError,
  StoreUnavailableError,
  QueryError,
  SynthesisError,
  MalformedResponseError,
  InvestigationCancelledError,
  InvestigationError,
  isSalesIQError,
  isRetryableError,
  wrapError,
  type InvestigationErrorKind,
} from "./errors.js";
