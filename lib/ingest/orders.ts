import type {
  CanonicalOrderLine,
  NormalizationResult,
  OrderOptions,
  RawTable,
} from "../domain/types";
import { ORDER_ALIASES, resolveAliases } from "./aliases";
import { toFloat, toInteger, toSafeString, toUtcTimestamp } from "./coerce";
import { resolveOrderOptions } from "./config";
import { detectShopifyOrders } from "./detect";
import { ORDER_COLUMNS, ORDER_RULES } from "./schemas";
import { cellGetter, columnGetter, emptyTable, ensureColumns, isEmptyInput, lowerHeaders } from "./table";
import { emptyInputMessage, requireColumns } from "./validate";

/**
 * Normalizes an order export (one row per order line / sku) into
 * {@link CanonicalOrderLine}s.
 *
 * Shopify headers are aliased only when the export looks like Shopify or the
 * hint says so; any other export must already use canonical names. Rows without
 * an order id or sku are dropped. Never throws.
 */
export function normalizeOrders(
  raw: RawTable | null | undefined,
  options: OrderOptions
): NormalizationResult<CanonicalOrderLine> {
  if (!raw || isEmptyInput(raw)) {
    return { data: emptyTable<CanonicalOrderLine>(ORDER_COLUMNS), errors: [emptyInputMessage("orders")] };
  }
  const opts = resolveOrderOptions(options);

  let table = lowerHeaders(raw);
  const isShopify = detectShopifyOrders(table, opts.platformHint);
  if (isShopify) table = resolveAliases(table, ORDER_ALIASES);
  table = ensureColumns(
    table,
    ORDER_RULES.map((r) => r.name)
  );

  const platform = isShopify ? "shopify" : opts.platformHint || "other";

  const orderId = cellGetter(table, "order_id");
  const orderedAt = cellGetter(table, "order_datetime_utc");
  const sku = cellGetter(table, "sku");
  const quantity = cellGetter(table, "quantity_ordered");
  const country = cellGetter(table, "customer_country");
  const state = columnGetter(table, "customer_state");
  const revenue = columnGetter(table, "order_revenue");
  const currency = columnGetter(table, "currency");
  const shippingMethod = columnGetter(table, "shipping_method");

  const lines: CanonicalOrderLine[] = table.rows.map((r) => {
    const qty = toInteger(quantity(r), 1);
    const cc = toSafeString(country(r)).trim().toUpperCase();
    return {
      account_id: opts.accountId,
      store_id: opts.storeId,
      platform,
      order_id: toSafeString(orderId(r)).trim(),
      order_datetime_utc: toUtcTimestamp(orderedAt(r)),
      sku: toSafeString(sku(r)).trim().toUpperCase(),
      quantity_ordered: qty <= 0 ? 1 : qty,
      // full country names are cut, not mapped to ISO codes
      customer_country: cc.length >= 2 ? cc.slice(0, 2) : cc,
      customer_state: state ? toSafeString(state(r)).trim() : null,
      order_revenue: revenue ? toFloat(revenue(r)) : null,
      currency: currency ? toSafeString(currency(r)).trim().toUpperCase() : opts.defaultCurrency,
      shipping_method: shippingMethod ? toSafeString(shippingMethod(r)).trim() : "",
      promised_ship_days: opts.defaultPromisedShipDays,
    };
  });

  const errors = requireColumns(table, ORDER_RULES, "orders");
  const rows = lines.filter((l) => l.order_id.length > 0 && l.sku.length > 0);

  return { data: { columns: ORDER_COLUMNS, rows }, errors };
}
