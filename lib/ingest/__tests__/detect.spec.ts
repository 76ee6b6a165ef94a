import { describe, it, expect } from "vitest";
import { SHOPIFY_SIGNALS } from "@/lib/ingest/aliases";
import { detectShopifyOrders, shopifySignalScore } from "@/lib/ingest/detect";

const shopifyHeaders = [
  "Name",
  "Created at",
  "Lineitem SKU",
  "Lineitem Quantity",
  "Shipping Country",
  "Shipping Province",
  "Financial Status",
];

describe("shopify detection", () => {
  it("scores headers case- and whitespace-insensitively", () => {
    expect(shopifySignalScore(shopifyHeaders)).toBe(7);
    expect(shopifySignalScore(["  NAME ", "Variant SKU", "fulfillment status", "Total"])).toBe(3);
  });

  it("detects a Shopify export from seven signals", () => {
    expect(detectShopifyOrders({ headers: shopifyHeaders })).toBe(true);
  });

  it("needs at least three signals", () => {
    expect(detectShopifyOrders({ headers: ["Name", "Order Date"] })).toBe(false);
    expect(detectShopifyOrders({ headers: ["Name", "Created at", "SKU"] })).toBe(false);
    expect(detectShopifyOrders({ headers: ["Name", "Created at", "Variant SKU"] })).toBe(true);
  });

  it("lets a shopify hint force detection regardless of score", () => {
    expect(detectShopifyOrders({ headers: ["Name", "Order Date"] }, "shopify")).toBe(true);
    expect(detectShopifyOrders({ headers: [] }, "Shopify")).toBe(true);
    expect(detectShopifyOrders({ headers: ["Name", "Order Date"] }, "woocommerce")).toBe(false);
    expect(detectShopifyOrders({ headers: ["Name", "Order Date"] }, null)).toBe(false);
  });
});

describe("SHOPIFY_SIGNALS", () => {
  it("is frozen", () => {
    expect(SHOPIFY_SIGNALS).toHaveLength(9);
    expect(Object.isFrozen(SHOPIFY_SIGNALS)).toBe(true);
  });
});
