import { logger } from "../../util/logger.js";
import { PersistenceFailure, errorMessage } from "../../util/errors.js";
import {
  type CrawlRunResult,
  type RunStatus,
  ScrapingHistoryModel,
  type ScrapingHistoryDoc,
  fromHistoryDoc,
  toHistoryDoc,
} from "../../models/scrapinghistory.js";
import type { HistoryStore } from "../ingestion-job.js";

export function emptyStatusCounts(): Record<RunStatus, number> {
  return { pending: 0, running: 0, success: 0, partial: 0, failed: 0 };
}

export class HistoryRepository implements HistoryStore {
  // one document per run id; a later save of the same run replaces it
  async save(result: CrawlRunResult): Promise<void> {
    try {
      await ScrapingHistoryModel.updateOne(
        { runId: result.runId },
        { $set: toHistoryDoc(result) },
        { upsert: true },
      );
    } catch (e) {
      throw new PersistenceFailure(
        `Failed to save run history ${result.runId}: ${errorMessage(e)}`,
        { cause: e },
      );
    }
    logger.info(
      "Run history saved",
      { runId: result.runId, status: result.status },
      "history",
    );
  }

  async getByRunId(runId: string): Promise<CrawlRunResult | null> {
    const doc = await this.query(() =>
      ScrapingHistoryModel.findOne({ runId }).lean<ScrapingHistoryDoc | null>().exec(),
    );
    return doc ? fromHistoryDoc(doc) : null;
  }

  async getLatestBySource(sourceId: string): Promise<CrawlRunResult | null> {
    const doc = await this.query(() =>
      ScrapingHistoryModel.findOne({ sourceId })
        .sort({ startedAt: -1 })
        .lean<ScrapingHistoryDoc | null>().exec(),
    );
    return doc ? fromHistoryDoc(doc) : null;
  }

  async getHistoryBySource(sourceId: string, limit = 100): Promise<CrawlRunResult[]> {
    const docs = await this.query(() =>
      ScrapingHistoryModel.find({ sourceId })
        .sort({ startedAt: -1 })
        .limit(limit)
        .lean<ScrapingHistoryDoc[]>()
        .exec(),
    );
    return docs.map(fromHistoryDoc);
  }

  async countByStatus(sourceId?: string): Promise<Record<RunStatus, number>> {
    const rows = await this.query(() =>
      ScrapingHistoryModel.aggregate<{ _id: RunStatus; count: number }>([
        { $match: sourceId ? { sourceId } : {} },
        { $group: { _id: "$status", count: { $sum: 1 } } },
      ]).exec(),
    );

    const counts = emptyStatusCounts();
    for (const row of rows) {
      counts[row._id] = row.count;
    }
    return counts;
  }

  private async query<T>(run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (e) {
      throw new PersistenceFailure(`History query failed: ${errorMessage(e)}`, { cause: e });
    }
  }
}
