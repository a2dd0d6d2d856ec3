/**
 * GuardDuty Findings Export Types
 */

// =============================================================================
// Collection Model
// =============================================================================

/**
 * Remote operations issued by the collection pipeline
 */
export type RemoteOperation = "DescribeRegions" | "ListDetectors" | "ListFindings" | "GetFindings";

/**
 * A GuardDuty detector. Detector ids are only meaningful inside their region.
 */
export type Detector = {
  region: string;
  detectorId: string;
};

/**
 * One page of finding identifiers. A page without `nextToken` is the last one;
 * a page may be empty and still carry a token.
 */
export type FindingPage = {
  findingIds: string[];
  nextToken?: string;
  /** 1-based position of the page within its detector */
  pageNumber: number;
};

/**
 * The fields of a GuardDuty finding that the export needs, all required
 */
export type FindingRecord = {
  id: string;
  title: string;
  description: string;
  severity: number;
  createdAt: string;
  updatedAt: string;
};

/**
 * Optional filter applied to ListFindings
 */
export type FindingCriteria = {
  /** Only list findings with severity greater than or equal to this value */
  minSeverity?: number;
  /** Archived findings are listed too when true */
  includeArchived?: boolean;
};

// =============================================================================
// Export Model
// =============================================================================

export const EXPORT_COLUMNS = [
  "Region",
  "FindingId",
  "Title",
  "Description",
  "Severity",
  "CreatedAt",
  "UpdatedAt",
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

/**
 * A finding flattened for the sink, one per resolved finding
 */
export type ExportRow = {
  region: string;
  findingId: string;
  title: string;
  description: string;
  /** Fixed-point, exactly one fractional digit */
  severity: string;
  createdAt: string;
  updatedAt: string;
};

export type RegionOutcome =
  | { status: "succeeded"; region: string; rowCount: number }
  | { status: "failed"; region: string; rowCount: number; error: RegionFailure };

export type RegionFailure = {
  region: string;
  errorName: string;
  message: string;
};

export type ExportResult = {
  sinkName: string;
  totalRows: number;
  regions: RegionOutcome[];
  /** Regions that failed under the isolate-regions policy */
  errors: RegionFailure[];
  startedAt: Date;
  completedAt: Date;
};

// =============================================================================
// Progress
// =============================================================================

export type ExportProgressEvent =
  | { type: "export.started"; sinkName: string; regions: string[]; totalRows: number }
  | { type: "region.started"; region: string; regionIndex: number; regionCount: number; totalRows: number }
  | { type: "region.detectors"; region: string; detectorCount: number; totalRows: number }
  | { type: "page.fetched"; region: string; detectorId: string; pageNumber: number; findingCount: number; totalRows: number }
  | { type: "page.resolved"; region: string; detectorId: string; pageNumber: number; rowCount: number; totalRows: number }
  | { type: "detector.completed"; region: string; detectorId: string; pageCount: number; rowCount: number; totalRows: number }
  | { type: "region.completed"; region: string; rowCount: number; totalRows: number }
  | { type: "region.failed"; region: string; rowCount: number; error: string; totalRows: number }
  | { type: "export.completed"; sinkName: string; totalRows: number }
  | { type: "export.failed"; sinkName: string; error: string; totalRows: number };

export type ExportProgressListener = (event: ExportProgressEvent) => void;

// =============================================================================
// Logging
// =============================================================================

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}
