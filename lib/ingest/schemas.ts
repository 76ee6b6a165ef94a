import { z } from "zod";
import type {
  CanonicalOrderLine,
  CanonicalShipmentLine,
  CanonicalTrackingEvent,
} from "../domain/types";
import type { ColumnRule } from "./validate";

// Canonical column lists, in output order
export const ORDER_COLUMNS = [
  "account_id",
  "store_id",
  "platform",
  "order_id",
  "order_datetime_utc",
  "sku",
  "quantity_ordered",
  "customer_country",
  "customer_state",
  "order_revenue",
  "currency",
  "shipping_method",
  "promised_ship_days",
] as const satisfies readonly (keyof CanonicalOrderLine)[];

export const SHIPMENT_COLUMNS = [
  "account_id",
  "store_id",
  "supplier_name",
  "supplier_order_id",
  "order_id",
  "sku",
  "quantity_shipped",
  "ship_datetime_utc",
  "carrier",
  "tracking_number",
  "ship_from_country",
  "ship_to_country",
] as const satisfies readonly (keyof CanonicalShipmentLine)[];

export const TRACKING_COLUMNS = [
  "account_id",
  "store_id",
  "carrier",
  "tracking_number",
  "order_id",
  "supplier_order_id",
  "tracking_status_raw",
  "tracking_status_normalized",
  "last_update_utc",
  "delivery_date_utc",
  "delivery_exception",
] as const satisfies readonly (keyof CanonicalTrackingEvent)[];

export const ORDER_RULES: readonly ColumnRule[] = [
  { name: "order_id", required: true },
  { name: "order_datetime_utc", required: true },
  { name: "sku", required: true },
  { name: "quantity_ordered", required: true },
  { name: "customer_country", required: true },
];

export const SHIPMENT_RULES: readonly ColumnRule[] = [
  { name: "supplier_name", required: true },
  { name: "supplier_order_id", required: true },
  { name: "sku", required: true },
  { name: "quantity_shipped", required: true },
  { name: "ship_datetime_utc", required: true },
];

export const TRACKING_RULES: readonly ColumnRule[] = [{ name: "tracking_number", required: true }];

// Row schemas for canonical output
const key = z.string().min(1);
const optStr = z.string().nullable();
const utc = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/)
  .nullable();

export const CanonicalOrderLineSchema = z.object({
  account_id: z.string(),
  store_id: z.string(),
  platform: z.string(),
  order_id: key,
  order_datetime_utc: utc,
  sku: key,
  quantity_ordered: z.number().int().min(1),
  customer_country: z.string().max(2),
  customer_state: optStr,
  order_revenue: z.number().finite().nullable(),
  currency: z.string(),
  shipping_method: z.string(),
  promised_ship_days: z.number().int(),
}) satisfies z.ZodType<CanonicalOrderLine>;

export const CanonicalShipmentLineSchema = z.object({
  account_id: z.string(),
  store_id: z.string(),
  supplier_name: key,
  supplier_order_id: key,
  order_id: optStr,
  sku: key,
  quantity_shipped: z.number().int().min(0),
  ship_datetime_utc: utc,
  carrier: optStr,
  tracking_number: optStr,
  ship_from_country: z.string().max(2).nullable(),
  ship_to_country: z.string().max(2).nullable(),
}) satisfies z.ZodType<CanonicalShipmentLine>;

export const CanonicalTrackingEventSchema = z.object({
  account_id: z.string(),
  store_id: z.string(),
  carrier: optStr,
  tracking_number: key,
  order_id: optStr,
  supplier_order_id: optStr,
  tracking_status_raw: optStr,
  tracking_status_normalized: optStr,
  last_update_utc: utc,
  delivery_date_utc: utc,
  delivery_exception: optStr,
}) satisfies z.ZodType<CanonicalTrackingEvent>;
