import type { CrawlRunResult, RunStatus } from "../models/scrapinghistory.js";

export interface ShopCounter {
  countBySource(sourceId: string, activeOnly?: boolean): Promise<number>;
}

export interface RunHistoryReader {
  getLatestBySource(sourceId: string): Promise<CrawlRunResult | null>;
  countByStatus(sourceId?: string): Promise<Record<RunStatus, number>>;
}

export interface SourceStats {
  sourceId: string;
  activeShops: number;
  inactiveShops: number;
  runsByStatus: Record<RunStatus, number>;
  latestRun: {
    runId: string;
    status: RunStatus;
    startedAt: string;
    totalShops: number;
    lastPage: number | null;
  } | null;
}

// Shop counts and run history of one source, as printed by the `stats` command.
export async function sourceStats(
  sourceId: string,
  shops: ShopCounter,
  history: RunHistoryReader,
): Promise<SourceStats> {
  const [active, all, latest, runsByStatus] = await Promise.all([
    shops.countBySource(sourceId, true),
    shops.countBySource(sourceId, false),
    history.getLatestBySource(sourceId),
    history.countByStatus(sourceId),
  ]);

  return {
    sourceId,
    activeShops: active,
    inactiveShops: all - active,
    runsByStatus,
    latestRun: latest && {
      runId: latest.runId,
      status: latest.status,
      startedAt: latest.startedAt.toISOString(),
      totalShops: latest.totalShops,
      lastPage: latest.lastPage,
    },
  };
}
