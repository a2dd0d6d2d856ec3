/**
 * Export Errors
 *
 * Error taxonomy for the findings export pipeline. Every failure a component
 * can raise is one of these classes; the aggregator wraps the first fatal one
 * in an ExportFailedError that carries the partial row count.
 */

import type { RegionOutcome, RemoteOperation } from "./types.js";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Extract an error code from an unknown thrown value
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

/**
 * Format an error message from any thrown value
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

/**
 * HTTP status reported by an AWS SDK v3 service exception
 */
export function extractHttpStatusCode(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (!metadata || typeof metadata !== "object" || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

// =============================================================================
// Error Classes
// =============================================================================

export class RemoteServiceError extends Error {
  readonly operation: RemoteOperation;
  readonly region: string;
  readonly code?: string;
  readonly httpStatusCode?: number;

  constructor(
    message: string,
    details: { operation: RemoteOperation; region: string; code?: string; httpStatusCode?: number },
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RemoteServiceError";
    this.operation = details.operation;
    this.region = details.region;
    this.code = details.code;
    this.httpStatusCode = details.httpStatusCode;
  }
}

export class IncompleteRecordError extends Error {
  constructor(
    public findingId: string,
    public missingFields: string[],
    public region: string,
  ) {
    super(`Finding ${findingId} in ${region} is missing required field(s): ${missingFields.join(", ")}`);
    this.name = "IncompleteRecordError";
  }
}

export class InvalidSelectionError extends Error {
  constructor(message: string, public unknownRegions: string[] = []) {
    super(message);
    this.name = "InvalidSelectionError";
  }
}

export class SinkWriteError extends Error {
  constructor(message: string, public sinkName: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SinkWriteError";
  }
}

export class ExportCancelledError extends Error {
  constructor(message = "Export cancelled") {
    super(message);
    this.name = "ExportCancelledError";
  }
}

export class InvalidConfigError extends Error {
  constructor(message: string, public errors: string[]) {
    super(message);
    this.name = "InvalidConfigError";
  }
}

/**
 * Raised by the aggregator when a run stops early. `totalRows` is the number of
 * rows already committed to the sink named by `sinkName`.
 */
export class ExportFailedError extends Error {
  readonly totalRows: number;
  readonly sinkName: string;
  readonly regions: RegionOutcome[];

  constructor(
    cause: Error,
    details: { totalRows: number; sinkName: string; regions: RegionOutcome[] },
  ) {
    super(
      `Export to ${details.sinkName} stopped after ${details.totalRows} row(s): ${cause.message}`,
      { cause },
    );
    this.name = "ExportFailedError";
    this.totalRows = details.totalRows;
    this.sinkName = details.sinkName;
    this.regions = details.regions;
  }
}

/**
 * Errors a region may absorb under the isolate-regions failure policy
 */
export function isRegionScopedError(err: unknown): err is RemoteServiceError | IncompleteRecordError {
  return err instanceof RemoteServiceError || err instanceof IncompleteRecordError;
}
