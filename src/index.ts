/**
 * GuardDuty Findings Export
 *
 * Collects GuardDuty findings across regions and detectors and writes them,
 * flattened, into a single CSV export.
 */

export {
  EXPORT_COLUMNS,
  type Detector,
  type ExportColumn,
  type ExportProgressEvent,
  type ExportProgressListener,
  type ExportResult,
  type ExportRow,
  type FindingCriteria,
  type FindingPage,
  type FindingRecord,
  type LogFields,
  type Logger,
  type RegionFailure,
  type RegionOutcome,
  type RemoteOperation,
} from "./types.js";

// Errors
export {
  RemoteServiceError,
  IncompleteRecordError,
  InvalidSelectionError,
  SinkWriteError,
  ExportCancelledError,
  ExportFailedError,
  InvalidConfigError,
  formatErrorMessage,
  extractErrorCode,
} from "./errors.js";

// Configuration
export {
  ExportConfigSchema,
  FindingCriteriaSchema,
  loadExportConfig,
  configFromEnv,
  type ExportConfig,
  type ExportConfigInput,
  type FailurePolicy,
} from "./config/schema.js";

// Clients
export {
  createRegionalClients,
  resolveCredentials,
  type RegionalClients,
  type CredentialSource,
} from "./clients/factory.js";
export { callRemote, type RemoteCallContext } from "./clients/remote.js";

// Pipeline components
export { createRegionResolver, type RegionResolver } from "./regions/resolver.js";
export { createDetectorEnumerator, type DetectorEnumerator } from "./detectors/enumerator.js";
export { createFindingPageCursor, buildFindingCriteria, type FindingPageCursor } from "./findings/cursor.js";
export { createFindingBatchResolver, toFindingRecord, type FindingBatchResolver } from "./findings/resolver.js";

// Export
export {
  createExportAggregator,
  type ExportAggregator,
  type ExportAggregatorOptions,
  type ExportRunOptions,
} from "./export/aggregator.js";
export { createCsvFileSink, createMemoryCsvSink, type RowSink, type MemoryCsvSink } from "./export/sink.js";
export { encodeCsvRecord, exportFileName } from "./export/csv.js";
export { formatSeverity, toExportRow } from "./export/rows.js";

// Service, logging, progress
export {
  createFindingsExportService,
  type FindingsExportService,
  type FindingsExportServiceOptions,
  type ExportFindingsOptions,
} from "./service.js";
export { createLogger, noopLogger, type LogLevel } from "./logging/logger.js";
export { createProgressLogger, combineProgressListeners } from "./progress.js";
