import { z } from "zod";
import type { OrderOptions } from "../domain/types";

export const DEFAULT_CURRENCY = "USD";
export const DEFAULT_PROMISED_SHIP_DAYS = 3;
export const DEFAULT_PLATFORM_HINT = "shopify";
export const UNKNOWN_SUPPLIER = "Unknown Supplier";

export const IngestConfigSchema = z.object({
  accountId: z.string().trim().min(1),
  storeId: z.string().trim().min(1),
  platformHint: z.string().trim().default(DEFAULT_PLATFORM_HINT),
  defaultCurrency: z.string().trim().toUpperCase().default(DEFAULT_CURRENCY),
  defaultPromisedShipDays: z.coerce.number().int().min(0).default(DEFAULT_PROMISED_SHIP_DAYS),
});

export type IngestConfig = z.infer<typeof IngestConfigSchema>;

const ENV_KEYS = {
  accountId: "INGEST_ACCOUNT_ID",
  storeId: "INGEST_STORE_ID",
  platformHint: "INGEST_PLATFORM_HINT",
  defaultCurrency: "INGEST_DEFAULT_CURRENCY",
  defaultPromisedShipDays: "INGEST_PROMISED_SHIP_DAYS",
} as const satisfies Record<keyof IngestConfig, string>;

/**
 * Reads tenant and run defaults from the environment. Unlike the pipelines,
 * a bad configuration throws.
 */
export function loadIngestConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): IngestConfig {
  const input: Record<string, string | undefined> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const v = env[envKey]?.trim();
    input[field] = v === "" ? undefined : v;
  }
  const parsed = IngestConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(
      "Invalid ingest configuration: " +
        parsed.error.issues.map((i) => `${envKeyFor(i.path[0])}:${i.message}`).join("; ")
    );
  }
  return parsed.data;
}

function envKeyFor(field: string | number | undefined): string {
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    if (key === field) return envKey;
  }
  return String(field);
}

export type ResolvedOrderOptions = {
  accountId: string;
  storeId: string;
  platformHint: string;
  defaultCurrency: string;
  defaultPromisedShipDays: number;
};

export function resolveOrderOptions(options: OrderOptions): ResolvedOrderOptions {
  const days = options.defaultPromisedShipDays;
  return {
    accountId: options.accountId,
    storeId: options.storeId,
    platformHint: options.platformHint ?? DEFAULT_PLATFORM_HINT,
    defaultCurrency: options.defaultCurrency ?? DEFAULT_CURRENCY,
    defaultPromisedShipDays:
      days !== undefined && Number.isFinite(days) ? Math.trunc(days) : DEFAULT_PROMISED_SHIP_DAYS,
  };
}
