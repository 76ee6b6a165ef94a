import { createStore } from "zustand/vanilla";
import type {
  CanonicalOrderLine,
  CanonicalShipmentLine,
  CanonicalTrackingEvent,
  IngestSummary,
  NormalizationResult,
  OrderOptions,
  RawTable,
  TableKind,
} from "../domain/types";
import { type FileContent, loadTableFile } from "../ingest/parse";
import { normalizeAll, type RawInputs } from "../ingest/normalize";

type Status = "idle" | "parsing" | "ready" | "error";

export type LoadError = { file: string; row: number; message: string };

export type IngestState = {
  status: Status;
  options: OrderOptions;
  raw: RawInputs;
  orders: NormalizationResult<CanonicalOrderLine> | null;
  shipments: NormalizationResult<CanonicalShipmentLine> | null;
  tracking: NormalizationResult<CanonicalTrackingEvent> | null;
  errors: string[]; // validation report across the three tables
  loadErrors: LoadError[];
  summary: IngestSummary | null;
  ingestFile: (name: string, content: FileContent, kind?: TableKind) => void;
  setOptions: (patch: Partial<OrderOptions>) => void;
  reset: () => void;
};

export function guessKind(name: string): TableKind | null {
  const n = name.toLowerCase();
  if (n.includes("track")) return "tracking";
  if (n.includes("ship") || n.includes("supplier")) return "shipments";
  if (n.includes("order")) return "orders";
  return null;
}

type IngestData = Omit<IngestState, "options" | "ingestFile" | "setOptions" | "reset">;

function initialData(): IngestData {
  return {
    status: "idle",
    raw: {},
    orders: null,
    shipments: null,
    tracking: null,
    errors: [],
    loadErrors: [],
    summary: null,
  };
}

function run(raw: RawInputs, options: OrderOptions): Pick<IngestData, "orders" | "shipments" | "tracking" | "errors" | "summary"> {
  const res = normalizeAll(raw, options);
  return {
    orders: res.orders,
    shipments: res.shipments,
    tracking: res.tracking,
    errors: res.errors,
    summary: res.summary,
  };
}

/**
 * Holds the latest canonical tables for one tenant. Raw tables are kept in
 * memory so that option changes re-run the pipelines; nothing is persisted.
 */
export function createIngestStore(options: OrderOptions) {
  return createStore<IngestState>()((set, get) => ({
    ...initialData(),
    options,
    reset: () => set({ ...initialData() }),
    setOptions: (patch) => {
      const next = { ...get().options, ...patch };
      const raw = get().raw;
      if (Object.keys(raw).length === 0) {
        set({ options: next });
        return;
      }
      set({ options: next, ...run(raw, next) });
    },
    ingestFile: (name, content, kind) => {
      const target = kind ?? guessKind(name);
      if (!target) {
        set((s) => ({
          status: "error",
          loadErrors: s.loadErrors.concat({ file: name, row: -1, message: "Cannot tell which table this file holds" }),
        }));
        return;
      }
      set({ status: "parsing" });
      let table: RawTable;
      let rowErrors: LoadError[];
      try {
        const rep = loadTableFile(name, content);
        table = rep.table;
        rowErrors = rep.errors.map((e) => ({ file: name, ...e }));
      } catch (e: unknown) {
        const message = e instanceof Error ? e.message : String(e);
        console.warn(`[ingest] failed to load ${name}:`, message);
        set((s) => ({ status: "error", loadErrors: s.loadErrors.concat({ file: name, row: -1, message }) }));
        return;
      }
      const raw: RawInputs = { ...get().raw };
      raw[target] = table;
      set((s) => ({
        raw,
        loadErrors: s.loadErrors.concat(rowErrors),
        status: "ready",
        ...run(raw, s.options),
      }));
    },
  }));
}

export type IngestStore = ReturnType<typeof createIngestStore>;
