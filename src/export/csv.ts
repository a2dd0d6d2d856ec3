/**
 * CSV encoding and export file naming
 */

const NEEDS_QUOTING = /[",\r\n]|^\s|\s$/;

export function encodeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * One CSV record terminated by `\n`
 */
export function encodeCsvRecord(cells: readonly string[]): string {
  return `${cells.map(encodeCsvField).join(",")}\n`;
}

export const EXPORT_FILE_PREFIX = "guardduty_findings";

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * File name derived from the export start time (local time), e.g.
 * `guardduty_findings_20240131_154502.csv`
 */
export function exportFileName(startedAt: Date, prefix = EXPORT_FILE_PREFIX): string {
  const date = `${startedAt.getFullYear()}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}`;
  const time = `${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`;
  return `${prefix}_${date}_${time}.csv`;
}
