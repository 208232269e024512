/**
 * Investigation System
 */

export {
  InvestigationOrchestrator,
  createInvestigator,
  settingsFromConfig,
  SYSTEM_NAME,
  SYSTEM_VERSION,
  type InvestigatorDeps,
  type InvestigatorSettings,
} from "./orchestrator.js";
export {
  Scratchpad,
  canonicalize,
  stableStringify,
  summarizeEntries,
  formatSummary,
  type ScratchpadOptions,
} from "./scratchpad.js";
export {
  compute,
  deltaPct,
  isAnomalous,
  toNumber,
  splitByPeriod,
  describeMetricSet,
  describeAnomalies,
  formatValue,
  formatDelta,
  targetValue,
  isMetricName,
  measuresFor,
  sourceColumns,
  METRIC_NAMES,
  DEFAULT_THRESHOLD,
  type MetricRow,
} from "./metrics.js";
export { parseQuestion, findCampaignId, findMetric } from "./question.js";
export {
  buildQueryPlan,
  renderQuery,
  repairPlan,
  parseTimeframe,
  describeBoundary,
  type Boundary,
  type QueryPlan,
  type QueryFilter,
} from "./query-builder.js";
export { QueryExecutor, classifyQueryError, isReadOnlyStatement } from "./query-executor.js";
export { SchemaCatalog, buildSchemaQuery, hasColumns, summarizeSchema } from "./schema-catalog.js";
export { NarrativeSynthesizer } from "./synthesizer.js";
export { buildSynthesisPrompt, SYNTHESIS_PROMPT_ID } from "./prompt.js";
export { parseReport, buildDegradedReport, formatReportMarkdown, REPORT_SECTIONS } from "./report.js";
export { PhaseMachine, canTransition } from "./phase.js";
export type * from "./types.js";
