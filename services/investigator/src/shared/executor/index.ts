export type {
  IExecutor,
  ExecutorProfile,
  ExecutorRequest,
  ExecutorResponse,
  ExecutorOptions,
  ExecutorErrorCode,
} from "./types.js";
export { BUILT_IN_TOOLS, ClaudeExecutor, buildQueryOptions, createClaudeExecutor } from "./claude.js";
