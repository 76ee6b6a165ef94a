export * from "./domain/types";
export { normalizeOrders } from "./ingest/orders";
export { normalizeShipments } from "./ingest/shipments";
export { normalizeTracking } from "./ingest/tracking";
export { normalizeAll, unknownColumns, type NormalizeAllResult, type RawInputs } from "./ingest/normalize";
export { detectShopifyOrders, shopifySignalScore, SHOPIFY_MIN_SIGNALS } from "./ingest/detect";
export {
  ORDER_ALIASES,
  SHIPMENT_ALIASES,
  TRACKING_ALIASES,
  SHOPIFY_SIGNALS,
  resolveAliases,
  type AliasMap,
} from "./ingest/aliases";
export { toFloat, toInteger, toSafeString, toUtcTimestamp } from "./ingest/coerce";
export { requireColumns, type ColumnRule } from "./ingest/validate";
export { cleanHeaders, lowerHeaders, rawTableFromRecords } from "./ingest/table";
export {
  ORDER_COLUMNS,
  SHIPMENT_COLUMNS,
  TRACKING_COLUMNS,
  CanonicalOrderLineSchema,
  CanonicalShipmentLineSchema,
  CanonicalTrackingEventSchema,
} from "./ingest/schemas";
export {
  DEFAULT_CURRENCY,
  DEFAULT_PLATFORM_HINT,
  DEFAULT_PROMISED_SHIP_DAYS,
  UNKNOWN_SUPPLIER,
  IngestConfigSchema,
  loadIngestConfigFromEnv,
  type IngestConfig,
} from "./ingest/config";
export { parseCsvTable, parseXlsxTable, loadTableFile, type LoadReport, type FileContent } from "./ingest/parse";
export { exportTableToCsv } from "./csv/exportTables";
export { createIngestStore, guessKind, type IngestState, type IngestStore, type LoadError } from "./state/ingest-store";
