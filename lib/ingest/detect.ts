import type { RawTable } from "../domain/types";
import { SHOPIFY_SIGNALS } from "./aliases";

// Three matching headers tolerate renamed or dropped columns while one
// coincidental name ("name", say) is not enough.
export const SHOPIFY_MIN_SIGNALS = 3;

export function shopifySignalScore(headers: readonly string[]): number {
  const present = new Set(headers.map((h) => String(h).trim().toLowerCase()));
  let score = 0;
  for (const signal of SHOPIFY_SIGNALS) {
    if (present.has(signal)) score += 1;
  }
  return score;
}

export function isShopifyHint(platformHint: string | null | undefined): boolean {
  return (platformHint ?? "").trim().toLowerCase() === "shopify";
}

export function detectShopifyOrders(table: Pick<RawTable, "headers">, platformHint?: string | null): boolean {
  return shopifySignalScore(table.headers) >= SHOPIFY_MIN_SIGNALS || isShopifyHint(platformHint);
}
