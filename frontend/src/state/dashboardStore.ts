// frontend/src/state/dashboardStore.ts
import { create } from "zustand";
import {
  fetchDataset,
  fetchLeaderboard,
  fetchNews,
  fetchRiders,
  fetchStats,
  fetchTeamComparison,
  fetchTimeSeries,
  resetDataset as apiResetDataset,
  uploadRideLog,
  type ApiResult,
} from "../lib/api";
import type {
  ColumnMapping,
  DatasetDescription,
  Leaderboard,
  LeaderboardWindow,
  NewsItem,
  Period,
  RiderSummary,
  SummaryStats,
  TeamComparison,
  TimeSeries,
} from "../lib/schema";

interface DashboardState {
  period: Period;
  window: LeaderboardWindow;

  stats: SummaryStats | null;
  riders: RiderSummary[] | null;
  teams: TeamComparison | null;
  series: TimeSeries | null;
  leaderboard: Leaderboard | null;
  news: NewsItem[] | null;
  dataset: DatasetDescription | null;

  loading: boolean;
  error: string | null;

  uploading: boolean;
  uploadMessage: string | null;
  uploadError: string | null;

  load: () => Promise<void>;
  setPeriod: (period: Period) => Promise<void>;
  setWindow: (window: LeaderboardWindow) => Promise<void>;
  upload: (file: File, mapping?: ColumnMapping) => Promise<void>;
  resetDataset: () => Promise<void>;
}

function dataOf<T>(r: ApiResult<T>): T | null {
  return r.ok ? r.data : null;
}

function firstError(results: readonly ApiResult<unknown>[]): string | null {
  for (const r of results) {
    if (!r.ok) return r.error;
  }
  return null;
}

export const useDashboardStore = create<DashboardState>((set, get) => {
  /** Tidsserie + leaderboard avhenger av periode/vindu */
  const loadPeriodViews = async (): Promise<void> => {
    const { period, window } = get();
    set({ loading: true, error: null });

    const [series, leaderboard] = await Promise.all([
      fetchTimeSeries(period),
      fetchLeaderboard(period, window),
    ]);

    set({
      loading: false,
      series: dataOf(series) ?? get().series,
      leaderboard: dataOf(leaderboard) ?? get().leaderboard,
      error: firstError([series, leaderboard]),
    });
  };

  return {
    period: "month",
    window: "latest",

    stats: null,
    riders: null,
    teams: null,
    series: null,
    leaderboard: null,
    news: null,
    dataset: null,

    loading: false,
    error: null,

    uploading: false,
    uploadMessage: null,
    uploadError: null,

    load: async (): Promise<void> => {
      const { period, window } = get();
      console.log("[dashboardStore.load] periode:", period, "vindu:", window);
      set({ loading: true, error: null });

      const [stats, riders, teams, series, leaderboard, news, dataset] = await Promise.all([
        fetchStats(),
        fetchRiders(),
        fetchTeamComparison(),
        fetchTimeSeries(period),
        fetchLeaderboard(period, window),
        fetchNews(),
        fetchDataset(),
      ]);

      const error = firstError([stats, riders, teams, series, leaderboard, news, dataset]);
      if (error) console.warn("[dashboardStore.load] feil:", error);

      set({
        loading: false,
        error,
        stats: dataOf(stats),
        riders: dataOf(riders),
        teams: dataOf(teams),
        series: dataOf(series),
        leaderboard: dataOf(leaderboard),
        news: dataOf(news),
        dataset: dataOf(dataset),
      });
    },

    setPeriod: async (period: Period): Promise<void> => {
      set({ period });
      await loadPeriodViews();
    },

    setWindow: async (window: LeaderboardWindow): Promise<void> => {
      set({ window });
      await loadPeriodViews();
    },

    upload: async (file: File, mapping: ColumnMapping = {}): Promise<void> => {
      console.log("[dashboardStore.upload]", file.name, file.size, "bytes");
      set({ uploading: true, uploadMessage: null, uploadError: null });

      const result = await uploadRideLog(file, mapping);
      if (!result.ok) {
        set({ uploading: false, uploadError: result.error });
        return;
      }

      set({
        uploading: false,
        uploadMessage: result.data.message,
        stats: result.data.stats,
        riders: result.data.riders,
        dataset: result.data.dataset,
      });
      await get().load();
    },

    resetDataset: async (): Promise<void> => {
      set({ uploadMessage: null, uploadError: null });
      const result = await apiResetDataset();
      if (!result.ok) {
        set({ uploadError: result.error });
        return;
      }
      set({ dataset: result.data });
      await get().load();
    },
  };
});
