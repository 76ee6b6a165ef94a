import type { RawTable, TableKind } from "../domain/types";

export type ColumnRule = {
  name: string;
  required: boolean;
};

/**
 * One advisory message per required rule whose column is absent.
 *
 * The pipelines call this after required columns were added as null columns,
 * so there it only fires for a field missing from both the input and that
 * step. Callers decide whether any message is fatal.
 */
export function requireColumns(
  table: Pick<RawTable, "headers">,
  rules: readonly ColumnRule[],
  tableName: TableKind
): string[] {
  const cols = new Set(table.headers);
  const errs: string[] = [];
  for (const r of rules) {
    if (r.required && !cols.has(r.name)) {
      errs.push(`[${tableName}] Missing required column: ${r.name}`);
    }
  }
  return errs;
}

export function emptyInputMessage(tableName: TableKind): string {
  return `[${tableName}] Input ${tableName} dataframe is empty.`;
}
