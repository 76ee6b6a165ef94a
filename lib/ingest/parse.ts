import Papa from "papaparse";
import * as XLSX from "xlsx";
import type { RawCell, RawTable } from "../domain/types";

export type LoadReport = {
  table: RawTable;
  errors: { row: number; message: string }[];
  rowCount: number;
};

export type FileContent = string | ArrayBuffer | Uint8Array;

// Fits every data row to the header width: short rows padded with null,
// extra cells dropped.
function toRawTable(grid: RawCell[][]): RawTable {
  const [head, ...body] = grid;
  const headers = (head ?? []).map((h) => (h === null || h === undefined ? "" : String(h)));
  const rows = body.map((r) => headers.map((_, i) => r[i] ?? null));
  return { headers, rows };
}

function toRawCell(v: unknown): RawCell {
  if (v === null || v === undefined) return null;
  if (typeof v === "string" || typeof v === "number" || typeof v === "boolean" || v instanceof Date) return v;
  return String(v);
}

/**
 * CSV text to a RawTable. Runs without header mode so duplicate headers
 * survive; every value stays a string.
 */
export function parseCsvTable(input: string): LoadReport {
  const res = Papa.parse<string[]>(input.replace(/^\uFEFF/, ""), {
    header: false,
    dynamicTyping: false,
    skipEmptyLines: true,
  });
  const table = toRawTable(res.data);
  return {
    table,
    errors: res.errors.map((e) => ({ row: e.row ?? -1, message: `${e.code}: ${e.message}` })),
    rowCount: table.rows.length,
  };
}

// Days from the 1900 and 1904 serial epochs (1899-12-30, 1904-01-01) to 1970-01-01.
const EPOCH_1900 = 25569;
const EPOCH_1904 = 24107;
const DAY_MS = 86_400_000;

const isDateFormat: (fmt: string) => boolean = XLSX.SSF.is_date;

function serialToUtc(serial: number, date1904: boolean): Date {
  return new Date(Math.round((serial - (date1904 ? EPOCH_1904 : EPOCH_1900)) * DAY_MS));
}

// Date-formatted serials carry no zone; they become UTC instants here rather
// than host-local Dates.
function utcDateCells(ws: XLSX.WorkSheet, date1904: boolean): void {
  const ref = ws["!ref"];
  if (!ref) return;
  const range = XLSX.utils.decode_range(ref);
  for (let r = range.s.r; r <= range.e.r; r++) {
    for (let c = range.s.c; c <= range.e.c; c++) {
      const addr = XLSX.utils.encode_cell({ r, c });
      const cell: XLSX.CellObject | undefined = ws[addr];
      if (!cell || cell.t !== "n" || typeof cell.v !== "number" || typeof cell.z !== "string") continue;
      if (isDateFormat(cell.z)) ws[addr] = { t: "d", v: serialToUtc(cell.v, date1904) };
    }
  }
}

/** First (or named) worksheet of an XLSX/XLS workbook to a RawTable. */
export function parseXlsxTable(content: ArrayBuffer | Uint8Array, sheet?: string): LoadReport {
  const wb = XLSX.read(content instanceof Uint8Array ? content : new Uint8Array(content), {
    type: "array",
    cellDates: false,
    cellNF: true,
  });
  const sheetName = sheet ?? wb.SheetNames[0];
  const ws = sheetName === undefined ? undefined : wb.Sheets[sheetName];
  if (!ws) {
    throw new Error(`Worksheet not found: ${sheet ?? "(workbook has no sheets)"}`);
  }
  utcDateCells(ws, wb.Workbook?.WBProps?.date1904 === true);
  const grid = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, defval: null, raw: true, blankrows: false });
  const table = toRawTable(grid.map((r) => r.map(toRawCell)));
  return { table, errors: [], rowCount: table.rows.length };
}

export function isSpreadsheetName(name: string): boolean {
  return /\.(xlsx|xlsm|xls)$/i.test(name.trim());
}

/** Picks the reader by file extension; anything not a workbook is read as CSV. */
export function loadTableFile(name: string, content: FileContent): LoadReport {
  if (isSpreadsheetName(name)) {
    if (typeof content === "string") {
      throw new Error(`Expected binary content for workbook ${name}`);
    }
    return parseXlsxTable(content);
  }
  const text = typeof content === "string" ? content : new TextDecoder("utf-8").decode(content);
  return parseCsvTable(text);
}
