/**
 * Findings Export Service
 *
 * Wires one immutable configuration into the regional clients and the
 * pipeline components, and exposes the two operations a front end needs:
 * listing selectable regions and running an export into a CSV file.
 */

import { createRegionalClients, type CredentialSource, type RegionalClients } from "./clients/factory.js";
import type { ExportConfig } from "./config/schema.js";
import { createDetectorEnumerator } from "./detectors/enumerator.js";
import { createExportAggregator, type ExportRunOptions } from "./export/aggregator.js";
import { createCsvFileSink, type RowSink } from "./export/sink.js";
import { createFindingPageCursor } from "./findings/cursor.js";
import { createFindingBatchResolver } from "./findings/resolver.js";
import { noopLogger } from "./logging/logger.js";
import { createRegionResolver } from "./regions/resolver.js";
import type { ExportResult, Logger } from "./types.js";

export type FindingsExportServiceOptions = {
  credentials?: CredentialSource;
  logger?: Logger;
  /** Supplied clients are used as-is and not destroyed by the service */
  clients?: RegionalClients;
  now?: () => Date;
};

export type ExportFindingsOptions = ExportRunOptions & {
  /** Write into this sink instead of a new CSV file under `config.outputDir` */
  sink?: RowSink;
};

export interface FindingsExportService {
  readonly config: ExportConfig;
  listRegions(prefix?: string, signal?: AbortSignal): Promise<string[]>;
  exportFindings(selection: readonly string[], options?: ExportFindingsOptions): Promise<ExportResult>;
  destroy(): void;
}

export function createFindingsExportService(
  config: ExportConfig,
  options: FindingsExportServiceOptions = {},
): FindingsExportService {
  const logger = options.logger ?? noopLogger;
  const now = options.now ?? (() => new Date());
  const ownsClients = options.clients === undefined;
  const clients = options.clients ?? createRegionalClients(config, options.credentials);

  const regions = createRegionResolver({ clients, config, logger });
  const aggregator = createExportAggregator({
    config,
    regions,
    detectors: createDetectorEnumerator({ clients, config }),
    cursor: createFindingPageCursor({ clients, config }),
    resolver: createFindingBatchResolver({ clients, config }),
    logger,
    now,
  });

  return {
    config,

    listRegions: (prefix, signal) => regions.listRegions(prefix, signal),

    exportFindings(selection, exportOptions = {}) {
      const { sink, ...runOptions } = exportOptions;
      const target = sink ?? createCsvFileSink({ directory: config.outputDir, startedAt: now() });
      return aggregator.run(selection, target, runOptions);
    },

    destroy() {
      if (ownsClients) clients.destroy();
    },
  };
}
