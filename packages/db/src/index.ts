/**
 * @salesiq/db
 * PostgreSQL access for the metrics store, trace export and demo data
 */

// PostgreSQL
export {
  buildPoolConfig,
  createPool,
  getPool,
  resetPool,
  createSqlClient,
  testConnection,
  PgSqlClient,
} from "./postgres.js";

// Supabase client
export { getSupabase, isSupabaseConfigured, resetSupabase } from "./supabase.js";

// Types
export * from "./types.js";

// Event store
export {
  EventTypes,
  emitEvent,
  flushEvents,
  shutdown as shutdownEventStore,
  emitInvestigationStarted,
  emitPhaseChanged,
  emitStepRecorded,
  emitInvestigationCompleted,
  emitInvestigationFailed,
  emitLLMRequestStarted,
  emitLLMResponseCompleted,
  emitLLMError,
  emitInfo,
  emitWarn,
  emitError,
} from "./event-store.js";

// Demo data
export {
  createRandom,
  generateSeedData,
  loadSchemaSql,
  seedDatabase,
  type SeedOptions,
  type SeedData,
  type SeedConnection,
  type CampaignSeed,
  type AdSeed,
  type DailyMetricSeed,
} from "./seed.js";
