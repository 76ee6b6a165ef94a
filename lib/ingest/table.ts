import type { CanonicalTable, RawCell, RawTable } from "../domain/types";

export type CellGetter = (row: RawCell[]) => RawCell;

const NULL_CELL: CellGetter = () => null;

export function cleanHeaders(table: RawTable): RawTable {
  return {
    headers: table.headers.map((h) => String(h).trim()),
    rows: table.rows.map((r) => [...r]),
  };
}

export function lowerHeaders(table: RawTable): RawTable {
  const cleaned = cleanHeaders(table);
  return { headers: cleaned.headers.map((h) => h.toLowerCase()), rows: cleaned.rows };
}

export function isEmptyInput(table: RawTable): boolean {
  return table.rows.length === 0;
}

export function hasColumn(table: RawTable, name: string): boolean {
  return table.headers.includes(name);
}

// Appends a null-filled column for every name not already present.
export function ensureColumns(table: RawTable, names: readonly string[]): RawTable {
  const missing = names.filter((n) => !hasColumn(table, n));
  if (missing.length === 0) return table;
  const width = table.headers.length;
  return {
    headers: [...table.headers, ...missing],
    rows: table.rows.map((r) => {
      const padded: RawCell[] = r.slice(0, width);
      while (padded.length < width) padded.push(null);
      return padded.concat(missing.map(() => null));
    }),
  };
}

/**
 * Reads one column by name. With duplicate headers the last one wins, which is
 * also how several aliases resolving to the same field are settled.
 */
export function columnGetter(table: RawTable, name: string): CellGetter | null {
  const idx = table.headers.lastIndexOf(name);
  if (idx < 0) return null;
  return (row) => row[idx] ?? null;
}

export function cellGetter(table: RawTable, name: string): CellGetter {
  return columnGetter(table, name) ?? NULL_CELL;
}

export function rawTableFromRecords(records: Record<string, RawCell>[]): RawTable {
  const headers: string[] = [];
  const seen = new Set<string>();
  for (const rec of records) {
    for (const key of Object.keys(rec)) {
      if (seen.has(key)) continue;
      seen.add(key);
      headers.push(key);
    }
  }
  return {
    headers,
    rows: records.map((rec) => headers.map((h) => (Object.hasOwn(rec, h) ? rec[h] : null))),
  };
}

export function emptyTable<Row>(columns: readonly (keyof Row)[]): CanonicalTable<Row> {
  return { columns, rows: [] };
}
