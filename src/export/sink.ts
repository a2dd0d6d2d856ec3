/**
 * Row sinks
 *
 * The aggregator is the only writer of a sink. `open` writes the header,
 * `append` one row, `close` flushes and releases the destination. Any failure
 * surfaces as SinkWriteError.
 */

import { open, type FileHandle } from "node:fs/promises";
import { join } from "node:path";
import { SinkWriteError, formatErrorMessage } from "../errors.js";
import { EXPORT_COLUMNS, type ExportRow } from "../types.js";
import { encodeCsvRecord, exportFileName } from "./csv.js";
import { exportRowCells } from "./rows.js";

export interface RowSink {
  readonly name: string;
  open(): Promise<void>;
  append(row: ExportRow): Promise<void>;
  close(): Promise<void>;
}

export type CsvFileSinkOptions = {
  directory: string;
  /** Defaults to a name derived from `startedAt` */
  fileName?: string;
  startedAt?: Date;
};

/**
 * CSV file sink. The file is created exclusively; an existing file with the
 * same name is never appended to.
 */
export function createCsvFileSink(options: CsvFileSinkOptions): RowSink {
  const fileName = options.fileName ?? exportFileName(options.startedAt ?? new Date());
  const path = join(options.directory, fileName);
  let handle: FileHandle | undefined;

  async function write(chunk: string, action: string): Promise<void> {
    if (!handle) throw new SinkWriteError(`Cannot ${action}: ${path} is not open`, path);
    try {
      await handle.write(chunk);
    } catch (err) {
      throw new SinkWriteError(`Failed to ${action} ${path}: ${formatErrorMessage(err)}`, path, { cause: err });
    }
  }

  return {
    name: path,

    async open() {
      try {
        handle = await open(path, "wx");
      } catch (err) {
        throw new SinkWriteError(`Failed to create ${path}: ${formatErrorMessage(err)}`, path, { cause: err });
      }
      try {
        await write(encodeCsvRecord(EXPORT_COLUMNS), "write header to");
      } catch (err) {
        const current = handle;
        handle = undefined;
        try {
          await current?.close();
        } catch (closeErr) {
          throw new SinkWriteError(
            `${formatErrorMessage(err)}; closing ${path} also failed: ${formatErrorMessage(closeErr)}`,
            path,
            { cause: err },
          );
        }
        throw err;
      }
    },

    async append(row: ExportRow) {
      await write(encodeCsvRecord(exportRowCells(row)), "append to");
    },

    async close() {
      if (!handle) return;
      const current = handle;
      handle = undefined;
      try {
        await current.close();
      } catch (err) {
        throw new SinkWriteError(`Failed to close ${path}: ${formatErrorMessage(err)}`, path, { cause: err });
      }
    },
  };
}

export interface MemoryCsvSink extends RowSink {
  readonly rows: readonly ExportRow[];
  /** CSV text written so far, header included */
  text(): string;
}

/**
 * In-memory CSV sink for programmatic use and tests
 */
export function createMemoryCsvSink(name = "memory"): MemoryCsvSink {
  const rows: ExportRow[] = [];
  const chunks: string[] = [];
  let state: "new" | "open" | "closed" = "new";

  return {
    name,
    rows,

    async open() {
      if (state !== "new") throw new SinkWriteError(`Sink ${name} was already opened`, name);
      state = "open";
      chunks.push(encodeCsvRecord(EXPORT_COLUMNS));
    },

    async append(row: ExportRow) {
      if (state !== "open") throw new SinkWriteError(`Sink ${name} is not open`, name);
      rows.push(row);
      chunks.push(encodeCsvRecord(exportRowCells(row)));
    },

    async close() {
      state = "closed";
    },

    text: () => chunks.join(""),
  };
}
