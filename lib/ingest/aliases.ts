// Header alias tables for the three input kinds, keyed by trimmed lowercase header

import type {
  CanonicalOrderLine,
  CanonicalShipmentLine,
  CanonicalTrackingEvent,
  RawTable,
} from "../domain/types";

export type AliasMap<Row> = Readonly<Record<string, keyof Row & string>>;

export const SHOPIFY_SIGNALS: readonly string[] = Object.freeze([
  "name",
  "created at",
  "lineitem sku",
  "lineitem quantity",
  "variant sku",
  "shipping country",
  "shipping province",
  "financial status",
  "fulfillment status",
]);

// Only applied when the export is detected (or hinted) as Shopify.
export const ORDER_ALIASES: AliasMap<CanonicalOrderLine> = Object.freeze({
  // ids
  name: "order_id",
  "order id": "order_id",
  // time
  "created at": "order_datetime_utc",
  // sku options
  "lineitem sku": "sku",
  "variant sku": "sku",
  "lineitem name": "sku", // fallback if no SKU
  // quantity
  "lineitem quantity": "quantity_ordered",
  quantity: "quantity_ordered",
  // geo
  "shipping country": "customer_country",
  "shipping province": "customer_state",
  // financials
  total: "order_revenue",
  subtotal: "order_revenue",
  currency: "currency",
  // shipping
  "shipping method": "shipping_method",
  "shipping line title": "shipping_method",
});

export const SHIPMENT_ALIASES: AliasMap<CanonicalShipmentLine> = Object.freeze({
  supplier: "supplier_name",
  "supplier name": "supplier_name",
  vendor: "supplier_name",

  "supplier order id": "supplier_order_id",
  supplier_order_id: "supplier_order_id",
  po: "supplier_order_id",
  "purchase order": "supplier_order_id",

  "order id": "order_id",
  order_id: "order_id",
  "shopify order id": "order_id",
  name: "order_id", // pasted Shopify order name

  sku: "sku",
  "item sku": "sku",
  "lineitem sku": "sku",

  quantity: "quantity_shipped",
  qty: "quantity_shipped",
  "quantity shipped": "quantity_shipped",

  "ship date": "ship_datetime_utc",
  "shipped at": "ship_datetime_utc",
  ship_datetime_utc: "ship_datetime_utc",
  "shipment date": "ship_datetime_utc",

  carrier: "carrier",
  tracking: "tracking_number",
  "tracking number": "tracking_number",
  tracking_number: "tracking_number",

  "from country": "ship_from_country",
  "ship from country": "ship_from_country",
  "to country": "ship_to_country",
  "ship to country": "ship_to_country",
});

export const TRACKING_ALIASES: AliasMap<CanonicalTrackingEvent> = Object.freeze({
  carrier: "carrier",
  "tracking number": "tracking_number",
  tracking: "tracking_number",
  tracking_number: "tracking_number",

  "order id": "order_id",
  "supplier order id": "supplier_order_id",

  status: "tracking_status_raw",
  "tracking status": "tracking_status_raw",
  tracking_status_raw: "tracking_status_raw",

  "last update": "last_update_utc",
  "last updated": "last_update_utc",
  last_update_utc: "last_update_utc",

  "delivered at": "delivery_date_utc",
  delivered: "delivery_date_utc",
  "delivery date": "delivery_date_utc",
  delivery_date_utc: "delivery_date_utc",

  exception: "delivery_exception",
  "delivery exception": "delivery_exception",
});

export function aliasFor<Row>(aliases: AliasMap<Row>, header: string): (keyof Row & string) | undefined {
  return Object.hasOwn(aliases, header) ? aliases[header] : undefined;
}

/**
 * Renames every header with an alias entry. Headers that end up sharing a
 * canonical name are left side by side; readers take the last one.
 */
export function resolveAliases<Row>(table: RawTable, aliases: AliasMap<Row>): RawTable {
  return {
    headers: table.headers.map((h) => aliasFor(aliases, h) ?? h),
    rows: table.rows,
  };
}
