import type {
  CanonicalOrderLine,
  CanonicalShipmentLine,
  CanonicalTrackingEvent,
  IngestSummary,
  NormalizationResult,
  OrderOptions,
  RawTable,
  TableKind,
  TableSummary,
} from "../domain/types";
import { ORDER_ALIASES, SHIPMENT_ALIASES, TRACKING_ALIASES } from "./aliases";
import { normalizeOrders } from "./orders";
import { ORDER_COLUMNS, SHIPMENT_COLUMNS, TRACKING_COLUMNS } from "./schemas";
import { normalizeShipments } from "./shipments";
import { lowerHeaders } from "./table";
import { normalizeTracking } from "./tracking";

export type RawInputs = Partial<Record<TableKind, RawTable | null>>;

export type NormalizeAllResult = {
  orders: NormalizationResult<CanonicalOrderLine>;
  shipments: NormalizationResult<CanonicalShipmentLine>;
  tracking: NormalizationResult<CanonicalTrackingEvent>;
  errors: string[];
  summary: IngestSummary;
};

const KNOWN: Record<TableKind, { aliases: Readonly<Record<string, string>>; columns: readonly string[] }> = {
  orders: { aliases: ORDER_ALIASES, columns: ORDER_COLUMNS },
  shipments: { aliases: SHIPMENT_ALIASES, columns: SHIPMENT_COLUMNS },
  tracking: { aliases: TRACKING_ALIASES, columns: TRACKING_COLUMNS },
};

/** Lowercased headers that neither alias to nor already name a canonical field. */
export function unknownColumns(table: RawTable | null | undefined, kind: TableKind): string[] {
  if (!table) return [];
  const { aliases, columns } = KNOWN[kind];
  const out: string[] = [];
  for (const h of lowerHeaders({ headers: table.headers, rows: [] }).headers) {
    if (Object.hasOwn(aliases, h) || columns.includes(h) || out.includes(h)) continue;
    out.push(h);
  }
  return out;
}

function summarize(raw: RawTable | null | undefined, kind: TableKind, rowsOut: number): TableSummary {
  const rowsIn = raw?.rows.length ?? 0;
  return {
    rows_in: rowsIn,
    rows_out: rowsOut,
    dropped: rowsIn - rowsOut,
    unknown_columns: unknownColumns(raw, kind),
  };
}

/**
 * Runs the three pipelines with one option set. A missing input counts as
 * empty, so orders and shipments report it and tracking stays silent. Errors
 * are concatenated in orders, shipments, tracking order.
 */
export function normalizeAll(inputs: RawInputs, options: OrderOptions): NormalizeAllResult {
  const orders = normalizeOrders(inputs.orders, options);
  const shipments = normalizeShipments(inputs.shipments, options);
  const tracking = normalizeTracking(inputs.tracking, options);
  return {
    orders,
    shipments,
    tracking,
    errors: [...orders.errors, ...shipments.errors, ...tracking.errors],
    summary: {
      orders: summarize(inputs.orders, "orders", orders.data.rows.length),
      shipments: summarize(inputs.shipments, "shipments", shipments.data.rows.length),
      tracking: summarize(inputs.tracking, "tracking", tracking.data.rows.length),
    },
  };
}
