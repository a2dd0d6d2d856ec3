/**
 * Export Aggregator
 *
 * Drives the collection pipeline for one export:
 *
 *   selection -> regions -> detectors -> pages -> batch resolve -> rows -> sink
 *
 * Each non-empty page is resolved and written before the next page is
 * requested. Under the default `abort` policy the first fatal error stops the
 * run and no further remote call is issued; under `isolate-regions` a region
 * that fails with a remote or record error is reported and the run moves on.
 */

import type { ExportConfig } from "../config/schema.js";
import type { DetectorEnumerator } from "../detectors/enumerator.js";
import {
  ExportCancelledError,
  ExportFailedError,
  InvalidSelectionError,
  formatErrorMessage,
  isRegionScopedError,
} from "../errors.js";
import type { FindingPageCursor } from "../findings/cursor.js";
import type { FindingBatchResolver } from "../findings/resolver.js";
import { noopLogger } from "../logging/logger.js";
import type { RegionResolver } from "../regions/resolver.js";
import type {
  ExportProgressEvent,
  ExportProgressListener,
  ExportResult,
  ExportRow,
  Logger,
  RegionFailure,
  RegionOutcome,
} from "../types.js";
import { createSerialQueue, runPool } from "./pool.js";
import { toExportRow } from "./rows.js";
import type { RowSink } from "./sink.js";

export type ExportAggregatorOptions = {
  config: Pick<ExportConfig, "regionConcurrency" | "failurePolicy" | "validateSelection" | "regionPrefix">;
  regions: RegionResolver;
  detectors: DetectorEnumerator;
  cursor: FindingPageCursor;
  resolver: FindingBatchResolver;
  logger?: Logger;
  now?: () => Date;
};

export type ExportRunOptions = {
  /** Cancels the run; in-flight calls are abandoned */
  signal?: AbortSignal;
  onProgress?: ExportProgressListener;
};

export interface ExportAggregator {
  run(selection: readonly string[], sink: RowSink, options?: ExportRunOptions): Promise<ExportResult>;
}

const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(formatErrorMessage(err)));

export function createExportAggregator(options: ExportAggregatorOptions): ExportAggregator {
  const { config, regions, detectors, cursor, resolver } = options;
  const logger = options.logger ?? noopLogger;
  const now = options.now ?? (() => new Date());

  async function assertSelectable(selection: readonly string[], signal?: AbortSignal): Promise<void> {
    const available = new Set(await regions.listRegions(config.regionPrefix, signal));
    const unknown = [...new Set(selection.filter((region) => !available.has(region)))];
    if (unknown.length > 0) {
      throw new InvalidSelectionError(`Unknown or unavailable region(s): ${unknown.join(", ")}`, unknown);
    }
  }

  return {
    async run(selection, sink, runOptions = {}) {
      if (selection.length === 0) {
        throw new InvalidSelectionError("At least one region must be selected");
      }

      const { signal, onProgress } = runOptions;
      const startedAt = now();
      const outcomes: Array<RegionOutcome | undefined> = [];
      let totalRows = 0;
      let fatal: Error | undefined;

      const emit = (event: ExportProgressEvent) => {
        if (!onProgress) return;
        try {
          onProgress(event);
        } catch (err) {
          logger.warn("Progress listener failed", { error: formatErrorMessage(err) });
        }
      };

      const fail = (err: unknown): ExportFailedError => {
        const cause = toError(err);
        emit({ type: "export.failed", sinkName: sink.name, error: cause.message, totalRows });
        return new ExportFailedError(cause, {
          totalRows,
          sinkName: sink.name,
          regions: outcomes.filter((o): o is RegionOutcome => o !== undefined),
        });
      };

      // Pre-flight: nothing is created before the selection is accepted
      try {
        if (signal?.aborted) throw new ExportCancelledError();
        if (config.validateSelection) await assertSelectable(selection, signal);
      } catch (err) {
        if (err instanceof InvalidSelectionError) throw err;
        throw fail(err);
      }

      try {
        await sink.open();
      } catch (err) {
        await sink.close().catch((closeErr: unknown) => {
          logger.error(`Failed to close ${sink.name} after it could not be opened`, {
            error: formatErrorMessage(closeErr),
          });
        });
        throw fail(err);
      }

      const controller = new AbortController();
      const stop = () => controller.abort();
      signal?.addEventListener("abort", stop, { once: true });
      const runSignal = controller.signal;
      const enqueueWrite = createSerialQueue();

      emit({ type: "export.started", sinkName: sink.name, regions: [...selection], totalRows });

      async function exportRegion(region: string, index: number): Promise<void> {
        let rowCount = 0;

        const writeRows = (rows: ExportRow[]) =>
          enqueueWrite(async () => {
            if (runSignal.aborted) throw new ExportCancelledError();
            for (const row of rows) {
              await sink.append(row);
              rowCount += 1;
              totalRows += 1;
            }
            return rows.length;
          });

        try {
          emit({ type: "region.started", region, regionIndex: index, regionCount: selection.length, totalRows });
          const regionDetectors = await detectors.listDetectors(region, runSignal);
          emit({ type: "region.detectors", region, detectorCount: regionDetectors.length, totalRows });

          for (const detector of regionDetectors) {
            let pageCount = 0;
            let detectorRows = 0;

            for await (const page of cursor.pages(detector, runSignal)) {
              pageCount = page.pageNumber;
              emit({
                type: "page.fetched",
                region,
                detectorId: detector.detectorId,
                pageNumber: page.pageNumber,
                findingCount: page.findingIds.length,
                totalRows,
              });
              if (page.findingIds.length === 0) continue;

              const findings = await resolver.resolve(detector, page.findingIds, runSignal);
              const written = await writeRows(findings.map((finding) => toExportRow(region, finding)));
              detectorRows += written;
              emit({
                type: "page.resolved",
                region,
                detectorId: detector.detectorId,
                pageNumber: page.pageNumber,
                rowCount: written,
                totalRows,
              });
            }

            emit({
              type: "detector.completed",
              region,
              detectorId: detector.detectorId,
              pageCount,
              rowCount: detectorRows,
              totalRows,
            });
          }

          outcomes[index] = { status: "succeeded", region, rowCount };
          emit({ type: "region.completed", region, rowCount, totalRows });
        } catch (err) {
          const error = toError(err);
          const failure: RegionFailure = { region, errorName: error.name, message: error.message };
          outcomes[index] = { status: "failed", region, rowCount, error: failure };

          if (config.failurePolicy === "isolate-regions" && isRegionScopedError(error) && !runSignal.aborted) {
            logger.warn(`Region ${region} failed, continuing with the remaining regions`, { error: error.message });
            emit({ type: "region.failed", region, rowCount, error: error.message, totalRows });
            return;
          }

          fatal ??= error;
          controller.abort();
        }
      }

      try {
        await runPool(selection, config.regionConcurrency, exportRegion, runSignal);
        if (signal?.aborted) fatal ??= new ExportCancelledError();
      } finally {
        signal?.removeEventListener("abort", stop);
      }

      try {
        await sink.close();
      } catch (err) {
        if (fatal) {
          logger.error(`Failed to close ${sink.name} after the export stopped`, { error: formatErrorMessage(err) });
        } else {
          fatal = toError(err);
        }
      }

      if (fatal) throw fail(fatal);

      const regionOutcomes = outcomes.filter((o): o is RegionOutcome => o !== undefined);
      emit({ type: "export.completed", sinkName: sink.name, totalRows });
      return {
        sinkName: sink.name,
        totalRows,
        regions: regionOutcomes,
        errors: regionOutcomes.flatMap((o) => (o.status === "failed" ? [o.error] : [])),
        startedAt,
        completedAt: now(),
      };
    },
  };
}
