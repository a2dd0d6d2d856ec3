/**
 * Row flattening
 */

import type { ExportRow, FindingRecord } from "../types.js";

/**
 * Render a severity with exactly one fractional digit, rounding half up.
 *
 * The scaled value is normalised to 12 significant digits first, so that
 * binary noise (2.45 * 10 === 24.500000000000004) does not decide a tie.
 */
export function formatSeverity(severity: number): string {
  const scaled = Number((severity * 10).toPrecision(12));
  const rounded = Math.sign(scaled) * Math.floor(Math.abs(scaled) + 0.5);
  return (rounded / 10).toFixed(1);
}

export function toExportRow(region: string, finding: FindingRecord): ExportRow {
  return {
    region,
    findingId: finding.id,
    title: finding.title,
    description: finding.description,
    severity: formatSeverity(finding.severity),
    createdAt: finding.createdAt,
    updatedAt: finding.updatedAt,
  };
}

/**
 * Cells of a row in `EXPORT_COLUMNS` order
 */
export function exportRowCells(row: ExportRow): string[] {
  return [row.region, row.findingId, row.title, row.description, row.severity, row.createdAt, row.updatedAt];
}
