import type { CanonicalTable } from "../domain/types";

/**
 * Renders a canonical table as CSV text, columns in canonical order
 * @param table - Output of one of the normalization pipelines
 */
export function exportTableToCsv<Row extends object>(table: CanonicalTable<Row>): string {
  const csvRows: string[] = [];

  // Add header row
  csvRows.push(table.columns.map((c) => escapeCSVField(String(c))).join(","));

  // Add data rows
  for (const row of table.rows) {
    const values = table.columns.map((c) => formatCSVValue(row[c]));
    csvRows.push(values.map(escapeCSVField).join(","));
  }

  return csvRows.join("\n");
}

/**
 * Formats a value for CSV export
 */
function formatCSVValue(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }

  if (typeof value === "number") {
    return value.toString();
  }

  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  return String(value);
}

/**
 * Escapes a field value for CSV format
 */
function escapeCSVField(value: string): string {
  if (!value) return "";

  // If the value contains comma, quote, or newline, wrap in quotes and escape quotes
  if (value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r")) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}
