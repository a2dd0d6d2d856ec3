/**
 * GuardDuty export CLI commands
 */

import { InvalidArgumentError, type Command } from "commander";
import type { ExportConfigInput } from "../config/schema.js";
import { createProgressLogger } from "../progress.js";
import type { FindingsExportService } from "../service.js";
import type { ExportResult, Logger } from "../types.js";

export type CliRuntime = {
  service: FindingsExportService;
  logger: Logger;
};

export type CancelHandle = {
  signal: AbortSignal;
  /** Detach whatever feeds the signal once the export has settled */
  dispose: () => void;
};

export type CliDeps = {
  /** Build the service for one command from the flags that override configuration */
  createRuntime: (overrides: ExportConfigInput) => CliRuntime;
  /** Cancellation for a running export; defaults to SIGINT */
  cancelSignal?: () => CancelHandle;
};

type RegionsOptions = { prefix?: string; json?: boolean };

type ExportOptions = {
  all?: boolean;
  prefix?: string;
  outputDir?: string;
  concurrency?: number;
  timeoutMs?: number;
  isolateFailures?: boolean;
  json?: boolean;
};

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function sigintSignal(): CancelHandle {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);
  return {
    signal: controller.signal,
    dispose: () => {
      process.removeListener("SIGINT", onSigint);
    },
  };
}

function printResult(result: ExportResult): void {
  console.log(`Exported ${result.totalRows} finding(s) to ${result.sinkName}`);
  for (const outcome of result.regions) {
    const detail = outcome.status === "succeeded" ? "" : ` (failed: ${outcome.error.message})`;
    console.log(`  ${outcome.region}: ${outcome.rowCount}${detail}`);
  }
}

export function createFindingsExportCli(deps: CliDeps) {
  const cancelSignal = deps.cancelSignal ?? sigintSignal;

  return (program: Command) => {
    // ── regions ──────────────────────────────────────────────────
    program
      .command("regions")
      .description("List the regions findings can be exported from")
      .option("--prefix <prefix>", "Region name prefix (default from configuration)")
      .option("--json", "Output as JSON")
      .action(async (opts: RegionsOptions) => {
        const { service } = deps.createRuntime({ regionPrefix: opts.prefix });
        try {
          const regions = await service.listRegions(opts.prefix);
          if (opts.json) {
            console.log(JSON.stringify(regions, null, 2));
            return;
          }
          if (regions.length === 0) {
            console.log(`No regions match "${service.config.regionPrefix}".`);
            return;
          }
          for (const region of regions) console.log(region);
        } finally {
          service.destroy();
        }
      });

    // ── export ───────────────────────────────────────────────────
    program
      .command("export")
      .description("Export GuardDuty findings from the given regions into a CSV file")
      .argument("[regions...]", "Regions to export, in order")
      .option("--all", "Export every region returned by `regions`")
      .option("--prefix <prefix>", "Region name prefix used by --all and selection checks")
      .option("--output-dir <dir>", "Directory for the CSV file")
      .option("--concurrency <n>", "Regions exported in parallel", parsePositiveInteger)
      .option("--timeout-ms <ms>", "Deadline for each AWS call", parsePositiveInteger)
      .option("--isolate-failures", "Record failing regions and continue with the rest")
      .option("--json", "Output the result as JSON")
      .action(async (regions: string[], opts: ExportOptions) => {
        const { service, logger } = deps.createRuntime({
          regionPrefix: opts.prefix,
          outputDir: opts.outputDir,
          regionConcurrency: opts.concurrency,
          requestTimeoutMs: opts.timeoutMs,
          failurePolicy: opts.isolateFailures ? "isolate-regions" : undefined,
          // --all selects from the same region list the check would fetch
          validateSelection: opts.all ? false : undefined,
        });
        const { signal, dispose } = cancelSignal();

        try {
          const selection = opts.all ? await service.listRegions(undefined, signal) : regions;
          logger.info(`Selected regions: ${selection.join(", ") || "(none)"}`);

          const result = await service.exportFindings(selection, {
            signal,
            onProgress: createProgressLogger(logger),
          });

          if (opts.json) {
            console.log(JSON.stringify(result, null, 2));
          } else {
            printResult(result);
          }
        } finally {
          dispose();
          service.destroy();
        }
      });
  };
}
