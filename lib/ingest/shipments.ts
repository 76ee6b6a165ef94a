import type {
  CanonicalShipmentLine,
  NormalizationResult,
  RawCell,
  RawTable,
  TenantOptions,
} from "../domain/types";
import { SHIPMENT_ALIASES, resolveAliases } from "./aliases";
import { toInteger, toSafeString, toUtcTimestamp } from "./coerce";
import { UNKNOWN_SUPPLIER } from "./config";
import { SHIPMENT_COLUMNS, SHIPMENT_RULES } from "./schemas";
import {
  type CellGetter,
  cellGetter,
  columnGetter,
  emptyTable,
  ensureColumns,
  isEmptyInput,
  lowerHeaders,
} from "./table";
import { emptyInputMessage, requireColumns } from "./validate";

// Optional text column: null when the input never had it.
function optText(get: CellGetter | null, row: RawCell[]): string | null {
  return get ? toSafeString(get(row)).trim() : null;
}

function countryCode(get: CellGetter | null, row: RawCell[]): string | null {
  const v = optText(get, row);
  return v === null ? null : v.toUpperCase().slice(0, 2);
}

/**
 * Normalizes a supplier shipment sheet (one row per sku shipped). Aliases are
 * always applied since supplier uploads follow no platform. Rows without a
 * supplier order id or sku are dropped.
 */
export function normalizeShipments(
  raw: RawTable | null | undefined,
  tenant: TenantOptions
): NormalizationResult<CanonicalShipmentLine> {
  if (!raw || isEmptyInput(raw)) {
    return { data: emptyTable<CanonicalShipmentLine>(SHIPMENT_COLUMNS), errors: [emptyInputMessage("shipments")] };
  }

  const table = ensureColumns(
    resolveAliases(lowerHeaders(raw), SHIPMENT_ALIASES),
    SHIPMENT_RULES.map((r) => r.name)
  );

  const supplier = cellGetter(table, "supplier_name");
  const supplierOrderId = cellGetter(table, "supplier_order_id");
  const sku = cellGetter(table, "sku");
  const quantity = cellGetter(table, "quantity_shipped");
  const shippedAt = cellGetter(table, "ship_datetime_utc");
  const orderId = columnGetter(table, "order_id");
  const carrier = columnGetter(table, "carrier");
  const tracking = columnGetter(table, "tracking_number");
  const fromCountry = columnGetter(table, "ship_from_country");
  const toCountry = columnGetter(table, "ship_to_country");

  const lines: CanonicalShipmentLine[] = table.rows.map((r) => {
    const supplierName = toSafeString(supplier(r)).trim();
    return {
      account_id: tenant.accountId,
      store_id: tenant.storeId,
      supplier_name: supplierName === "" ? UNKNOWN_SUPPLIER : supplierName,
      supplier_order_id: toSafeString(supplierOrderId(r)).trim(),
      order_id: optText(orderId, r),
      sku: toSafeString(sku(r)).trim().toUpperCase(),
      quantity_shipped: Math.max(0, toInteger(quantity(r), 0)),
      ship_datetime_utc: toUtcTimestamp(shippedAt(r)),
      carrier: optText(carrier, r),
      tracking_number: optText(tracking, r),
      // "United States" becomes "UN"; no ISO lookup here
      ship_from_country: countryCode(fromCountry, r),
      ship_to_country: countryCode(toCountry, r),
    };
  });

  const errors = requireColumns(table, SHIPMENT_RULES, "shipments");
  const rows = lines.filter((l) => l.supplier_order_id.length > 0 && l.sku.length > 0);

  return { data: { columns: SHIPMENT_COLUMNS, rows }, errors };
}
