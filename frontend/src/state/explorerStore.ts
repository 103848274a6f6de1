// frontend/src/state/explorerStore.ts
import { create } from "zustand";
import {
  fetchAggregate,
  fetchDistribution,
  fetchKpis,
  fetchRecords,
  type FilterParams,
} from "../lib/api";
import type {
  AggFunc,
  AggregateResponse,
  Distribution,
  GroupField,
  KpiComparison,
  MetricField,
  Period,
  RecordsPage,
} from "../lib/schema";

export const RECORDS_PAGE_SIZE = 25;

export type ExplorerFilters = {
  period: Period;
  groupBy: GroupField[];
  metric: MetricField;
  agg: AggFunc;
  rider: string;
  team: string;
  /** YYYY-MM-DD, tom = hele datasettet */
  from: string;
  to: string;
  bins: number;
};

export const DEFAULT_FILTERS: ExplorerFilters = {
  period: "week",
  groupBy: [],
  metric: "distance_km",
  agg: "sum",
  rider: "",
  team: "",
  from: "",
  to: "",
  bins: 20,
};

interface ExplorerState {
  filters: ExplorerFilters;
  aggregate: AggregateResponse | null;
  kpis: KpiComparison | null;
  distribution: Distribution | null;
  records: RecordsPage | null;
  loading: boolean;
  error: string | null;

  setFilters: (patch: Partial<ExplorerFilters>) => void;
  resetFilters: () => void;
  run: () => Promise<void>;
  /** Blar i rådata med de sist brukte filtrene */
  pageRecords: (offset: number) => Promise<void>;
}

export function filterParams(f: ExplorerFilters): FilterParams {
  const out: FilterParams = {};
  if (f.rider.trim()) out.rider = f.rider.trim();
  if (f.team.trim()) out.team = f.team.trim();
  if (f.from) out.from = f.from;
  if (f.to) out.to = f.to;
  return out;
}

export const useExplorerStore = create<ExplorerState>((set, get) => ({
  filters: DEFAULT_FILTERS,
  aggregate: null,
  kpis: null,
  distribution: null,
  records: null,
  loading: false,
  error: null,

  setFilters: (patch: Partial<ExplorerFilters>): void => {
    set({ filters: { ...get().filters, ...patch } });
  },

  resetFilters: (): void => {
    set({ filters: DEFAULT_FILTERS });
  },

  run: async (): Promise<void> => {
    const f = get().filters;
    const filter = filterParams(f);
    console.log("[explorerStore.run]", f);
    set({ loading: true, error: null });

    const [aggregate, kpis, distribution, records] = await Promise.all([
      fetchAggregate({ ...filter, period: f.period, groupBy: f.groupBy, metric: f.metric, agg: f.agg }),
      fetchKpis(filter),
      fetchDistribution({ ...filter, metric: f.metric, bins: f.bins }),
      fetchRecords({ ...filter, limit: RECORDS_PAGE_SIZE, offset: 0 }),
    ]);

    const failed = [aggregate, kpis, distribution, records].find((r) => !r.ok);
    const error = failed && !failed.ok ? failed.error : null;
    if (error) console.warn("[explorerStore.run] feil:", error);

    set({
      loading: false,
      error,
      aggregate: aggregate.ok ? aggregate.data : null,
      kpis: kpis.ok ? kpis.data : null,
      distribution: distribution.ok ? distribution.data : null,
      records: records.ok ? records.data : null,
    });
  },

  pageRecords: async (offset: number): Promise<void> => {
    const filter = filterParams(get().filters);
    const result = await fetchRecords({ ...filter, limit: RECORDS_PAGE_SIZE, offset: Math.max(0, offset) });
    if (!result.ok) {
      console.warn("[explorerStore.pageRecords] feil:", result.error);
      set({ error: result.error });
      return;
    }
    set({ records: result.data, error: null });
  },
}));
