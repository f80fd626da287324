import type { ExportFormat, ExportRow, ProjectOverviewEntry } from "./types.js";

const CSV_COLUMNS = ["project", "name", "translated_percent"] as const;

export function toExportRows(entries: readonly ProjectOverviewEntry[]): ExportRow[] {
  return entries.map((entry) => ({
    project: entry.slug,
    name: entry.name,
    translated_percent: entry.translatedPct,
  }));
}

/**
 * Quote a field when it holds a separator, a quote or a line break.
 */
function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * CSV with a header row and `\n` line endings.
 */
export function toCsv(rows: readonly ExportRow[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(CSV_COLUMNS.map((column) => csvField(row[column])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export function toJson(rows: readonly ExportRow[]): string {
  return `${JSON.stringify(rows, null, 2)}\n`;
}

export function formatExport(rows: readonly ExportRow[], format: ExportFormat): string {
  return format === "csv" ? toCsv(rows) : toJson(rows);
}
