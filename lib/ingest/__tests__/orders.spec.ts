import { describe, it, expect } from "vitest";
import type { CanonicalOrderLine, CanonicalTable, RawTable } from "@/lib/domain/types";
import { normalizeOrders } from "@/lib/ingest/orders";
import { CanonicalOrderLineSchema, ORDER_COLUMNS } from "@/lib/ingest/schemas";

const tenant = { accountId: "acct-1", storeId: "store-1" };

const shopifyExport: RawTable = {
  headers: [
    "Name",
    "Created at",
    "Lineitem SKU",
    "Lineitem Quantity",
    "Shipping Country",
    "Shipping Province",
    "Financial Status",
    "Total",
    "Currency",
    "Shipping Method",
  ],
  rows: [
    ["#1001", "2024-01-15 10:30:00 -0500", " ab-1 ", "2", "us", "CA", "paid", "59.90", "usd", "Standard"],
    ["#1002", "not a date", "cd-2", "0", "United States", "NY", "paid", "abc", "", "  "],
    ["#1003", "2024-01-16", "", "1", "CA", "ON", "paid", "10", "CAD", "Express"],
    ["", "2024-01-16", "ef-3", "1", "CA", "ON", "paid", "10", "CAD", "Express"],
    ["#1004", "2024-01-17", "gh-4", "-3", "C", "", "pending", "", "CAD", ""],
  ],
};

function toRaw(t: CanonicalTable<CanonicalOrderLine>): RawTable {
  return {
    headers: t.columns.map(String),
    rows: t.rows.map((r) => t.columns.map((c) => r[c])),
  };
}

describe("normalizeOrders", () => {
  it("maps a Shopify export onto canonical order lines", () => {
    const { data, errors } = normalizeOrders(shopifyExport, tenant);
    expect(errors).toEqual([]);
    expect(data.columns).toEqual(ORDER_COLUMNS);
    expect(data.rows).toEqual([
      {
        account_id: "acct-1",
        store_id: "store-1",
        platform: "shopify",
        order_id: "#1001",
        order_datetime_utc: "2024-01-15T15:30:00.000Z",
        sku: "AB-1",
        quantity_ordered: 2,
        customer_country: "US",
        customer_state: "CA",
        order_revenue: 59.9,
        currency: "USD",
        shipping_method: "Standard",
        promised_ship_days: 3,
      },
      {
        account_id: "acct-1",
        store_id: "store-1",
        platform: "shopify",
        order_id: "#1002",
        order_datetime_utc: null,
        sku: "CD-2",
        quantity_ordered: 1,
        customer_country: "UN",
        customer_state: "NY",
        order_revenue: null,
        currency: "",
        shipping_method: "",
        promised_ship_days: 3,
      },
      {
        account_id: "acct-1",
        store_id: "store-1",
        platform: "shopify",
        order_id: "#1004",
        order_datetime_utc: "2024-01-17T00:00:00.000Z",
        sku: "GH-4",
        quantity_ordered: 1,
        customer_country: "C",
        customer_state: "",
        order_revenue: null,
        currency: "CAD",
        shipping_method: "",
        promised_ship_days: 3,
      },
    ]);
  });

  it("emits rows in canonical column order that satisfy the row schema", () => {
    const { data } = normalizeOrders(shopifyExport, { ...tenant, defaultPromisedShipDays: 5.8 });
    for (const row of data.rows) {
      expect(Object.keys(row)).toEqual([...ORDER_COLUMNS]);
      expect(CanonicalOrderLineSchema.safeParse(row).success).toBe(true);
      expect(row.promised_ship_days).toBe(5);
      expect(row.quantity_ordered).toBeGreaterThanOrEqual(1);
    }
  });

  it("fills defaults for a canonical-named export that is not Shopify", () => {
    const raw: RawTable = {
      headers: ["order_id", "SKU", "quantity_ordered", "order_datetime_utc"],
      rows: [["A-1", "x1", "3", "2024-02-01T12:00:00Z"]],
    };
    const { data, errors } = normalizeOrders(raw, { ...tenant, platformHint: "other", defaultCurrency: "EUR" });
    expect(errors).toEqual([]);
    expect(data.rows).toEqual([
      {
        account_id: "acct-1",
        store_id: "store-1",
        platform: "other",
        order_id: "A-1",
        order_datetime_utc: "2024-02-01T12:00:00.000Z",
        sku: "X1",
        quantity_ordered: 3,
        customer_country: "",
        customer_state: null,
        order_revenue: null,
        currency: "EUR",
        shipping_method: "",
        promised_ship_days: 3,
      },
    ]);
  });

  it("keeps the platform hint when Shopify is not detected", () => {
    const raw: RawTable = { headers: ["order_id", "sku"], rows: [["A-1", "x"]] };
    expect(normalizeOrders(raw, { ...tenant, platformHint: "woocommerce" }).data.rows[0].platform).toBe("woocommerce");
    expect(normalizeOrders(raw, { ...tenant, platformHint: "" }).data.rows[0].platform).toBe("other");
  });

  it("does not alias Shopify headers below the signal threshold", () => {
    const raw: RawTable = { headers: ["Name", "Order Date", "SKU"], rows: [["#1", "2024-01-01", "a"]] };
    const { data, errors } = normalizeOrders(raw, { ...tenant, platformHint: "other" });
    // "name" never becomes order_id, so every row lacks its key
    expect(data.rows).toEqual([]);
    expect(errors).toEqual([]);
  });

  it("applies the Shopify aliases by default", () => {
    const raw: RawTable = { headers: ["Order ID", "SKU", "Quantity"], rows: [["A-1", "x", "2"]] };
    const { data, errors } = normalizeOrders(raw, tenant);
    expect(errors).toEqual([]);
    expect(data.rows.map((r) => [r.platform, r.order_id, r.sku, r.quantity_ordered])).toEqual([
      ["shopify", "A-1", "X", 2],
    ]);
  });

  it("aliases Shopify headers when hinted, whatever the score", () => {
    const raw: RawTable = { headers: ["Name", "Order Date", "SKU"], rows: [["#1", "2024-01-01", "a"]] };
    const { data } = normalizeOrders(raw, { ...tenant, platformHint: "Shopify" });
    expect(data.rows).toHaveLength(1);
    expect(data.rows[0].order_id).toBe("#1");
    expect(data.rows[0].platform).toBe("shopify");
    expect(data.rows[0].order_datetime_utc).toBe(null);
  });

  it("takes the last of several headers aliasing to sku", () => {
    const raw: RawTable = {
      headers: ["Name", "Created at", "Lineitem SKU", "Variant SKU"],
      rows: [["#1", "2024-01-01", "line-sku", "variant-sku"]],
    };
    expect(normalizeOrders(raw, tenant).data.rows[0].sku).toBe("VARIANT-SKU");
  });

  it("reports empty input and still exposes the canonical columns", () => {
    for (const raw of [null, undefined, { headers: ["Name"], rows: [] }]) {
      const { data, errors } = normalizeOrders(raw, tenant);
      expect(data.columns).toEqual(ORDER_COLUMNS);
      expect(data.rows).toEqual([]);
      expect(errors).toEqual(["[orders] Input orders dataframe is empty."]);
    }
  });

  it("never mutates the raw table", () => {
    const before = JSON.stringify(shopifyExport);
    normalizeOrders(shopifyExport, tenant);
    expect(JSON.stringify(shopifyExport)).toBe(before);
  });

  it("is idempotent when re-fed its own output", () => {
    const opts = { ...tenant, platformHint: "shopify" };
    const first = normalizeOrders(shopifyExport, opts);
    const second = normalizeOrders(toRaw(first.data), opts);
    expect(second.errors).toEqual([]);
    expect(second.data.rows).toEqual(first.data.rows);
  });

  it("is idempotent under default options", () => {
    const first = normalizeOrders(shopifyExport, tenant);
    const second = normalizeOrders(toRaw(first.data), tenant);
    expect(second.errors).toEqual([]);
    expect(second.data.rows).toEqual(first.data.rows);
    expect(second.data.rows.every((r) => r.platform === "shopify")).toBe(true);
  });

  it("keeps a non-Shopify platform when re-fed with the same hint", () => {
    const opts = { ...tenant, platformHint: "other" };
    const raw: RawTable = { headers: ["order_id", "sku", "quantity_ordered"], rows: [["A-1", "x", "2"]] };
    const first = normalizeOrders(raw, opts);
    const second = normalizeOrders(toRaw(first.data), opts);
    expect(second.data.rows).toEqual(first.data.rows);
    expect(second.data.rows[0].platform).toBe("other");
  });
});
