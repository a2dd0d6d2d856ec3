#!/usr/bin/env node
import { Command } from "commander";
import { createFindingsExportCli } from "./cli/index.js";
import { loadExportConfig } from "./config/schema.js";
import { ExportFailedError, formatErrorMessage } from "./errors.js";
import { createLogger } from "./logging/logger.js";
import { createFindingsExportService } from "./service.js";
import { VERSION } from "./version.js";

const program = new Command()
  .name("guardduty-export")
  .description("Export GuardDuty findings from multiple regions into one CSV file")
  .version(VERSION);

createFindingsExportCli({
  createRuntime: (overrides) => {
    const config = loadExportConfig(overrides);
    const logger = createLogger("guardduty-export", config.logLevel);
    return { service: createFindingsExportService(config, { logger }), logger };
  },
})(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(formatErrorMessage(err));
  if (err instanceof ExportFailedError && err.totalRows > 0) {
    console.error(`Partial export kept at ${err.sinkName} (${err.totalRows} row(s)).`);
  }
  process.exitCode = 1;
});
