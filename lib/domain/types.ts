// Domain models for raw input tables and canonical ingest output

export type RawCell = string | number | boolean | Date | null | undefined;

// Positional so that duplicate or oddly cased headers survive until the
// pipelines decide which one wins.
export type RawTable = {
  headers: string[];
  rows: RawCell[][];
};

export type TableKind = "orders" | "shipments" | "tracking";

export type CanonicalTable<Row> = {
  columns: readonly (keyof Row)[];
  rows: Row[];
};

export type NormalizationResult<Row> = {
  data: CanonicalTable<Row>;
  errors: string[]; // advisory, each prefixed with "[<table>]"
};

export type CanonicalOrderLine = {
  account_id: string;
  store_id: string;
  platform: string;
  order_id: string;
  order_datetime_utc: string | null; // ISO, UTC
  sku: string;
  quantity_ordered: number; // >= 1
  customer_country: string; // <= 2 chars
  customer_state: string | null;
  order_revenue: number | null;
  currency: string;
  shipping_method: string;
  promised_ship_days: number;
};

export type CanonicalShipmentLine = {
  account_id: string;
  store_id: string;
  supplier_name: string;
  supplier_order_id: string;
  order_id: string | null;
  sku: string;
  quantity_shipped: number; // >= 0
  ship_datetime_utc: string | null;
  carrier: string | null;
  tracking_number: string | null;
  ship_from_country: string | null;
  ship_to_country: string | null;
};

export type CanonicalTrackingEvent = {
  account_id: string;
  store_id: string;
  carrier: string | null;
  tracking_number: string;
  order_id: string | null;
  supplier_order_id: string | null;
  tracking_status_raw: string | null;
  tracking_status_normalized: string | null;
  last_update_utc: string | null;
  delivery_date_utc: string | null;
  delivery_exception: string | null;
};

export type TenantOptions = {
  accountId: string;
  storeId: string;
};

export type OrderOptions = TenantOptions & {
  platformHint?: string | null;
  defaultCurrency?: string;
  defaultPromisedShipDays?: number;
};

export type TableSummary = {
  rows_in: number;
  rows_out: number;
  dropped: number;
  unknown_columns: string[];
};

export type IngestSummary = Record<TableKind, TableSummary>;
