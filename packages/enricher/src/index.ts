export { EnrichmentOrchestrator, type OrchestratorConfig } from "./orchestrator/enrichment-orchestrator.js";
export {
  enrichColumn,
  extractField,
  type ColumnEnricherContext
} from "./pipeline/column-enricher.js";
export { ProgressTracker, type ProgressSnapshot } from "./pipeline/progress-tracker.js";
export { AxiosWebEngine, type AxiosWebEngineConfig } from "./web-engine/axios-engine.js";
export {
  WebEngine,
  type FetchError,
  type FetchResponse,
  type FetchSuccess,
  type Metadata,
  type ResolvedUrl,
  type UnresolvableUrl,
  type UrlResolution
} from "./web-engine/types.js";
export { RetryStrategy } from "./retry/retry-strategy.js";
export type { ErrorClass, RetryDecision, RetryStrategyConfig } from "./retry/types.js";
export {
  extractContent,
  extractDate,
  extractJournalistName,
  extractTitle,
  fieldExtractors
} from "./extractors/field-extractors.js";
export {
  FIELD_NAMES,
  type EnrichmentResult,
  type FieldExtractor,
  type FieldName
} from "./extractors/types.js";
export { extractMediaName } from "./utils/url.js";
export {
  concatTables,
  formatCsvTable,
  parseCsvTable,
  readInputTables,
  writeEnrichedTable
} from "./table/csv-table.js";
export { appendColumns, assertUrlColumn } from "./table/table.js";
export type { Cell, Row, Table } from "./table/types.js";
export {
  enrichmentConfigSchema,
  resolveEnrichmentConfig,
  type EnrichmentConfig,
  type EnrichmentConfigInput
} from "./config/enrichment-config.js";
export {
  EnrichmentMetrics,
  type DurationStats,
  type FieldOutcome,
  type MetricSnapshot
} from "./observability/metrics.js";
export { TableStructureError } from "./errors.js";
