/**
 * Export Progress Utilities
 *
 * Listeners that turn export progress events into log lines, plus a fan-out
 * helper for callers that want several listeners on one run.
 */

import type { ExportProgressEvent, ExportProgressListener, Logger } from "./types.js";

/**
 * Progress listener that reports every export event through a logger
 */
export function createProgressLogger(logger: Logger): ExportProgressListener {
  return (event: ExportProgressEvent) => {
    switch (event.type) {
      case "export.started":
        logger.info(`Export started: ${event.regions.length} region(s) -> ${event.sinkName}`, {
          regions: event.regions,
        });
        break;
      case "region.started":
        logger.info(`Starting export for region ${event.region} (${event.regionIndex + 1}/${event.regionCount})`);
        break;
      case "region.detectors":
        logger.info(`Found ${event.detectorCount} detector(s) in region ${event.region}`);
        break;
      case "page.fetched":
        if (event.findingCount > 0) {
          logger.debug(
            `Found ${event.findingCount} finding(s) on page ${event.pageNumber} for detector ${event.detectorId}`,
          );
        } else {
          logger.debug(`No findings on page ${event.pageNumber} for detector ${event.detectorId}`);
        }
        break;
      case "page.resolved":
        logger.debug(`Wrote ${event.rowCount} row(s) from page ${event.pageNumber}`, {
          region: event.region,
          detectorId: event.detectorId,
          totalRows: event.totalRows,
        });
        break;
      case "detector.completed":
        logger.info(
          `Finished detector ${event.detectorId} in ${event.region}: ${event.pageCount} page(s), ${event.rowCount} finding(s)`,
        );
        break;
      case "region.completed":
        logger.info(`Completed region ${event.region}. Total findings so far: ${event.totalRows}`);
        break;
      case "region.failed":
        logger.warn(`Region ${event.region} failed after ${event.rowCount} row(s): ${event.error}`);
        break;
      case "export.completed":
        logger.info(`Export completed. Total findings: ${event.totalRows}. File: ${event.sinkName}`);
        break;
      case "export.failed":
        logger.error(`Export failed after ${event.totalRows} row(s): ${event.error}`, {
          sinkName: event.sinkName,
        });
        break;
    }
  };
}

export function combineProgressListeners(
  ...listeners: Array<ExportProgressListener | undefined>
): ExportProgressListener {
  const active = listeners.filter((l): l is ExportProgressListener => l !== undefined);
  return (event) => {
    for (const listener of active) listener(event);
  };
}
