import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, open, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createCsvFileSink, createMemoryCsvSink } from "./sink.js";
import { SinkWriteError } from "../errors.js";
import type { ExportRow } from "../types.js";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, open: vi.fn(actual.open) };
});

const HEADER = "Region,FindingId,Title,Description,Severity,CreatedAt,UpdatedAt\n";

const row: ExportRow = {
  region: "us-east-1",
  findingId: "f-1",
  title: "Port probe",
  description: "Probe on port 22, from a known scanner",
  severity: "2.0",
  createdAt: "2024-03-01T10:00:00.000Z",
  updatedAt: "2024-03-02T11:30:00.000Z",
};

const ROW_LINE =
  'us-east-1,f-1,Port probe,"Probe on port 22, from a known scanner",2.0,2024-03-01T10:00:00.000Z,2024-03-02T11:30:00.000Z\n';

describe("createMemoryCsvSink", () => {
  it("writes the header on open and one line per row", async () => {
    const sink = createMemoryCsvSink();

    await sink.open();
    await sink.append(row);
    await sink.close();

    expect(sink.text()).toBe(HEADER + ROW_LINE);
    expect(sink.rows).toEqual([row]);
  });

  it("rejects appends before open", async () => {
    const sink = createMemoryCsvSink("buffer");

    await expect(sink.append(row)).rejects.toThrow(SinkWriteError);
  });

  it("rejects a second open", async () => {
    const sink = createMemoryCsvSink();
    await sink.open();

    await expect(sink.open()).rejects.toThrow("Sink memory was already opened");
  });

  it("rejects appends after close", async () => {
    const sink = createMemoryCsvSink();
    await sink.open();
    await sink.close();

    await expect(sink.append(row)).rejects.toThrow("Sink memory is not open");
  });
});

describe("createCsvFileSink", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "guardduty-export-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("names the file after the start time", () => {
    const sink = createCsvFileSink({ directory, startedAt: new Date(2024, 1, 3, 4, 5, 6) });

    expect(sink.name).toBe(join(directory, "guardduty_findings_20240203_040506.csv"));
  });

  it("writes header and rows to the file", async () => {
    const sink = createCsvFileSink({ directory, fileName: "out.csv" });

    await sink.open();
    await sink.append(row);
    await sink.append({ ...row, findingId: "f-2", title: 'Quoted "title"' });
    await sink.close();

    const text = await readFile(join(directory, "out.csv"), "utf8");
    expect(text).toBe(
      HEADER +
        ROW_LINE +
        'us-east-1,f-2,"Quoted ""title""","Probe on port 22, from a known scanner",2.0,2024-03-01T10:00:00.000Z,2024-03-02T11:30:00.000Z\n',
    );
  });

  it("leaves a header-only file when nothing is appended", async () => {
    const sink = createCsvFileSink({ directory, fileName: "empty.csv" });

    await sink.open();
    await sink.close();

    await expect(readFile(join(directory, "empty.csv"), "utf8")).resolves.toBe(HEADER);
  });

  it("refuses to overwrite an existing file", async () => {
    await writeFile(join(directory, "taken.csv"), "previous\n");
    const sink = createCsvFileSink({ directory, fileName: "taken.csv" });

    const error = await sink.open().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SinkWriteError);
    expect(error).toMatchObject({ sinkName: join(directory, "taken.csv") });
    await expect(readFile(join(directory, "taken.csv"), "utf8")).resolves.toBe("previous\n");
  });

  it("fails when the directory does not exist", async () => {
    const sink = createCsvFileSink({ directory: join(directory, "missing"), fileName: "out.csv" });

    await expect(sink.open()).rejects.toThrow(SinkWriteError);
  });

  it("closes the file when the header cannot be written", async () => {
    const actual = await vi.importActual<typeof import("node:fs/promises")>("node:fs/promises");
    const noSpace = Object.assign(new Error("ENOSPC: no space left on device, write"), { code: "ENOSPC" });
    let closeCalls = 0;
    vi.mocked(open).mockImplementationOnce(async (path, flags) => {
      const handle = await actual.open(path, flags);
      const closeHandle = handle.close.bind(handle);
      vi.spyOn(handle, "write").mockRejectedValue(noSpace);
      vi.spyOn(handle, "close").mockImplementation(async () => {
        closeCalls += 1;
        await closeHandle();
      });
      return handle;
    });
    const path = join(directory, "full.csv");
    const sink = createCsvFileSink({ directory, fileName: "full.csv" });

    const error = await sink.open().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SinkWriteError);
    expect(error).toMatchObject({
      message: `Failed to write header to ${path}: ENOSPC: no space left on device, write`,
      sinkName: path,
    });
    expect(closeCalls).toBe(1);
    await expect(sink.append(row)).rejects.toThrow(`Cannot append to: ${path} is not open`);
    await sink.close();
    expect(closeCalls).toBe(1);
  });

  it("rejects appends before open", async () => {
    const sink = createCsvFileSink({ directory, fileName: "out.csv" });

    await expect(sink.append(row)).rejects.toThrow(`Cannot append to: ${join(directory, "out.csv")} is not open`);
  });

  it("allows close without open", async () => {
    const sink = createCsvFileSink({ directory, fileName: "out.csv" });

    await expect(sink.close()).resolves.toBeUndefined();
  });
});
