export type {
  IObservability,
  StartSessionParams,
  SessionResult,
  SessionMetadata,
  ObservabilityEvent,
  ObservabilityOptions,
  EventType,
} from "./types.js";
export {
  ConsoleObservability,
  NoOpObservability,
  createConsoleObservability,
  createNoOpObservability,
} from "./console.js";
export { SupabaseObservability, createSupabaseObservability } from "./supabase.js";
