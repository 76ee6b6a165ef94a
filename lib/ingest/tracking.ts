import type {
  CanonicalTrackingEvent,
  NormalizationResult,
  RawCell,
  RawTable,
  TenantOptions,
} from "../domain/types";
import { TRACKING_ALIASES, resolveAliases } from "./aliases";
import { toSafeString, toUtcTimestamp } from "./coerce";
import { TRACKING_COLUMNS, TRACKING_RULES } from "./schemas";
import { type CellGetter, cellGetter, columnGetter, emptyTable, ensureColumns, isEmptyInput, lowerHeaders } from "./table";
import { requireColumns } from "./validate";

function text(get: CellGetter | null, row: RawCell[]): string | null {
  return get ? toSafeString(get(row)).trim() : null;
}

function timestamp(get: CellGetter | null, row: RawCell[]): string | null {
  return get ? toUtcTimestamp(get(row)) : null;
}

// Carrier tracking export. An empty input yields no report entry, unlike
// orders and shipments. Rows without a tracking number are dropped.
export function normalizeTracking(
  raw: RawTable | null | undefined,
  tenant: TenantOptions
): NormalizationResult<CanonicalTrackingEvent> {
  if (!raw || isEmptyInput(raw)) {
    return { data: emptyTable<CanonicalTrackingEvent>(TRACKING_COLUMNS), errors: [] };
  }

  const table = ensureColumns(
    resolveAliases(lowerHeaders(raw), TRACKING_ALIASES),
    TRACKING_RULES.map((r) => r.name)
  );

  const trackingNumber = cellGetter(table, "tracking_number");
  const carrier = columnGetter(table, "carrier");
  const orderId = columnGetter(table, "order_id");
  const supplierOrderId = columnGetter(table, "supplier_order_id");
  const statusRaw = columnGetter(table, "tracking_status_raw");
  const statusNormalized = columnGetter(table, "tracking_status_normalized");
  const lastUpdate = columnGetter(table, "last_update_utc");
  const deliveredAt = columnGetter(table, "delivery_date_utc");
  const exception = columnGetter(table, "delivery_exception");

  const events: CanonicalTrackingEvent[] = table.rows.map((r) => ({
    account_id: tenant.accountId,
    store_id: tenant.storeId,
    carrier: text(carrier, r),
    tracking_number: toSafeString(trackingNumber(r)).trim(),
    order_id: text(orderId, r),
    supplier_order_id: text(supplierOrderId, r),
    tracking_status_raw: text(statusRaw, r),
    tracking_status_normalized: text(statusNormalized, r),
    last_update_utc: timestamp(lastUpdate, r),
    delivery_date_utc: timestamp(deliveredAt, r),
    delivery_exception: text(exception, r),
  }));

  const errors = requireColumns(table, TRACKING_RULES, "tracking");
  const rows = events.filter((e) => e.tracking_number.length > 0);

  return { data: { columns: TRACKING_COLUMNS, rows }, errors };
}
