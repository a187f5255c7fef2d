import { randomBytes } from "node:crypto";

import { formatErr, logger } from "../util/logger.js";
import {
  EnrichmentFailure,
  PersistenceFailure,
  SessionFailure,
  errorMessage,
  isHarvestError,
} from "../util/errors.js";
import { secondsElapsed, timedRun } from "../util/timing.js";
import type { CrawlRunResult, RunStatus } from "../models/scrapinghistory.js";
import { CrawlController, type CrawlConfig, type Extractor } from "./crawler/index.js";
import { type CheckpointStore, resumePage } from "./crawler/checkpoint-store.js";
import type { RateLimiter } from "./crawler/rate-limiter.js";
import type { ShopRecord } from "./crawler/records.js";
import type { GeocodingService } from "./geocoding/geocoding-service.js";
import type { Notifier, SourceRef } from "./notifier/slack-notifier.js";

export interface UpsertResult {
  created: number;
  updated: number;
}

export interface ShopStore {
  upsertBatch(records: ShopRecord[]): Promise<UpsertResult>;
}

export interface HistoryStore {
  save(result: CrawlRunResult): Promise<void>;
}

// Running counters of one run. `processed` starts at the checkpoint's saved
// total when resuming.
export interface IngestionTotals {
  found: number;
  processed: number;
  created: number;
  updated: number;
  geocoded: number;
  geocodingErrors: number;
}

export interface IngestionJobOptions {
  source: SourceRef;
  extractor: Extractor<ShopRecord>;
  crawlConfig: CrawlConfig;
  shopStore: ShopStore;
  historyStore: HistoryStore;
  checkpointStore: CheckpointStore;
  notifier: Notifier;
  geocoding?: GeocodingService | null;
  rateLimiter?: RateLimiter;
  signal?: AbortSignal;
  runId?: string;
  now?: () => Date;
  notifyTimeoutSecs?: number;
}

export function generateRunId(sourceId: string) {
  return `${sourceId}_${randomBytes(4).toString("hex")}`;
}

export function checkpointLastId(sourceId: string, processed: number) {
  return `${sourceId}_${String(processed).padStart(5, "0")}`;
}

// failures recorded while the crawl keeps going
interface RunIssues {
  persistence: string[];
  enrichment: string[];
  checkpoint: string[];
}

// What the checkpoint may claim. A completed page only becomes durable once
// none of its records is buffered and none was in a dropped batch.
interface CheckpointProgress {
  completedPages: number[];
  // totalSaved of the checkpoint this run resumed from
  baseSaved: number;
  savedByPage: Map<number, number>;
  // lowest page with a record in a dropped batch
  failedFromPage: number | null;
  // length of the page list last written to the store
  savedPages: number;
}

/**
 * Runs one source end to end: start notification, resume from checkpoint,
 * crawl with per-batch geocoding and upsert, then history and completion
 * notification. `execute()` resolves with the run result for every failure
 * of the harvest taxonomy instead of throwing.
 */
export class IngestionJob {
  readonly runId: string;

  private readonly options: IngestionJobOptions;
  private readonly now: () => Date;

  constructor(options: IngestionJobOptions) {
    this.options = options;
    this.runId = options.runId ?? generateRunId(options.source.id);
    this.now = options.now ?? (() => new Date());
  }

  get sourceId() {
    return this.options.source.id;
  }

  async execute(): Promise<CrawlRunResult> {
    const { source, checkpointStore } = this.options;
    const startedAt = this.now();

    const result: CrawlRunResult = {
      runId: this.runId,
      sourceId: source.id,
      sourceName: source.name,
      startedAt,
      completedAt: null,
      status: "pending",
      totalShops: 0,
      newShops: 0,
      updatedShops: 0,
      geocodedShops: 0,
      geocodingErrors: 0,
      errors: [],
      durationSeconds: null,
      resumedFromPage: null,
      lastPage: null,
      stopReason: null,
    };

    result.status = "running";
    logger.info("Starting ingestion job", { runId: this.runId, sourceId: source.id }, "job");

    await this.notify("start", () => this.options.notifier.notifyStart(source));

    const totals: IngestionTotals = {
      found: 0,
      processed: 0,
      created: 0,
      updated: 0,
      geocoded: 0,
      geocodingErrors: 0,
    };
    const issues: RunIssues = { persistence: [], enrichment: [], checkpoint: [] };
    let progress: CheckpointProgress | null = null;
    let controller: CrawlController<ShopRecord> | null = null;

    try {
      const checkpoint = await checkpointStore.get(source.id);
      const startPage = resumePage(checkpoint);
      const run: CheckpointProgress = {
        completedPages: checkpoint ? [...checkpoint.completedPages] : [],
        baseSaved: checkpoint?.totalSaved ?? 0,
        savedByPage: new Map(),
        failedFromPage: null,
        savedPages: checkpoint?.completedPages.length ?? 0,
      };
      progress = run;
      totals.processed = run.baseSaved;

      if (startPage !== null) {
        result.resumedFromPage = startPage;
        logger.info(
          `Resuming from page ${startPage}`,
          {
            sourceId: source.id,
            completedPages: run.completedPages.length,
            totalSaved: run.baseSaved,
          },
          "job",
        );
      }

      const crawl = new CrawlController(this.options.extractor, this.options.crawlConfig, {
        rateLimiter: this.options.rateLimiter,
      });
      controller = crawl;

      const outcome = await crawl.run({
        startPage: startPage ?? undefined,
        signal: this.options.signal,
        onBatch: (batch, pages) => this.processBatch(batch, pages, run, totals, issues),
        onBatchError: (e, batch, pages) => {
          const message = `${errorName(e)}: ${errorMessage(e)} (${batch.length} records)`;
          issues.persistence.push(message);
          run.failedFromPage = Math.min(run.failedFromPage ?? Infinity, ...pages);
        },
        onPageComplete: (page, flushedThrough) =>
          this.completePage(page, flushedThrough, run, issues),
      });

      result.lastPage = outcome.lastPage;
      result.stopReason = outcome.stopReason;
    } catch (e) {
      if (controller?.outcome) {
        result.lastPage = controller.outcome.lastPage;
        result.stopReason = controller.outcome.stopReason;
      }
      if (progress) {
        await this.settleCheckpoint(progress, issues);
      }
      this.applyTotals(result, totals);
      result.errors.push(...issues.persistence, ...issues.enrichment, ...issues.checkpoint);
      return await this.fail(result, e);
    } finally {
      await this.closeExtractor();
    }

    this.applyTotals(result, totals);
    return await this.finish(result, issues, progress);
  }

  private async processBatch(
    batch: ShopRecord[],
    pages: number[],
    progress: CheckpointProgress,
    totals: IngestionTotals,
    issues: RunIssues,
  ) {
    const { geocoding, shopStore, source } = this.options;
    totals.found += batch.length;

    logger.info(`Processing batch of ${batch.length} shops`, { sourceId: source.id }, "batch");

    let geocoded = 0;
    if (geocoding) {
      try {
        const stats = await geocoding.geocodeBatch(batch);
        geocoded = stats.success;
        totals.geocodingErrors += stats.errors.length;
        for (const failure of stats.errors) {
          issues.enrichment.push(`${failure.name}: ${failure.message}`);
        }
      } catch (e) {
        totals.geocodingErrors++;
        const failure =
          e instanceof EnrichmentFailure
            ? e
            : new EnrichmentFailure(`Batch geocoding failed: ${errorMessage(e)}`, { cause: e });
        issues.enrichment.push(`${failure.name}: ${failure.message}`);
        logger.error("Batch geocoding failed", { sourceId: source.id, ...formatErr(e) }, "geocoding");
      }
    }

    let saved: UpsertResult;
    try {
      saved = await shopStore.upsertBatch(batch);
    } catch (e) {
      throw e instanceof PersistenceFailure
        ? e
        : new PersistenceFailure(`Failed to save batch: ${errorMessage(e)}`, {
            cause: e,
            details: { sourceId: source.id, size: batch.length },
          });
    }

    totals.geocoded += geocoded;
    totals.created += saved.created;
    totals.updated += saved.updated;
    totals.processed += batch.length;
    for (const page of pages) {
      progress.savedByPage.set(page, (progress.savedByPage.get(page) ?? 0) + 1);
    }

    logger.info(
      "Batch processed",
      {
        sourceId: source.id,
        size: batch.length,
        created: saved.created,
        updated: saved.updated,
        geocoded,
        totalProcessed: totals.processed,
      },
      "batch",
    );
  }

  private async completePage(
    page: number,
    flushedThrough: number,
    progress: CheckpointProgress,
    issues: RunIssues,
  ) {
    progress.completedPages.push(page);

    const saved = await this.saveCheckpoint(progress, flushedThrough, issues);
    if (saved) {
      logger.info(
        `Page ${page} completed and checkpoint saved`,
        { sourceId: this.sourceId },
        "checkpoint",
      );
    } else if (progress.failedFromPage !== null) {
      logger.warn(
        `Checkpoint held before page ${progress.failedFromPage} after a failed batch`,
        { sourceId: this.sourceId, page },
        "checkpoint",
      );
    }
  }

  private durablePages(progress: CheckpointProgress, flushedThrough: number) {
    const { failedFromPage } = progress;
    return progress.completedPages.filter(
      (page) => page <= flushedThrough && (failedFromPage === null || page < failedFromPage),
    );
  }

  // Writes the durable pages when they grew since the last write. Returns
  // whether a checkpoint was written; rethrows store failures.
  private async saveCheckpoint(
    progress: CheckpointProgress,
    flushedThrough: number,
    issues: RunIssues,
  ) {
    const sourceId = this.sourceId;
    const pages = this.durablePages(progress, flushedThrough);
    if (pages.length <= progress.savedPages) {
      return false;
    }

    let totalSaved = progress.baseSaved;
    for (const page of pages) {
      totalSaved += progress.savedByPage.get(page) ?? 0;
    }

    try {
      await this.options.checkpointStore.save(
        sourceId,
        pages,
        totalSaved,
        checkpointLastId(sourceId, totalSaved),
      );
    } catch (e) {
      issues.checkpoint.push(`${errorName(e)}: ${errorMessage(e)}`);
      throw e;
    }
    progress.savedPages = pages.length;
    return true;
  }

  // After the crawl stopped every buffered record has been flushed, so every
  // completed page before the first dropped batch is durable.
  private async settleCheckpoint(progress: CheckpointProgress, issues: RunIssues) {
    try {
      await this.saveCheckpoint(progress, Infinity, issues);
    } catch (e) {
      logger.error(
        "Failed to save final checkpoint",
        { sourceId: this.sourceId, ...formatErr(e) },
        "checkpoint",
      );
    }
  }

  private applyTotals(result: CrawlRunResult, totals: IngestionTotals) {
    result.totalShops = totals.found;
    result.newShops = totals.created;
    result.updatedShops = totals.updated;
    result.geocodedShops = totals.geocoded;
    result.geocodingErrors = totals.geocodingErrors;
  }

  private async finish(
    result: CrawlRunResult,
    issues: RunIssues,
    progress: CheckpointProgress | null,
  ): Promise<CrawlRunResult> {
    const { source, checkpointStore } = this.options;
    const cancelled = result.stopReason === "cancelled";

    if (progress && (issues.persistence.length || cancelled)) {
      await this.settleCheckpoint(progress, issues);
    }

    result.errors.push(...issues.persistence, ...issues.enrichment, ...issues.checkpoint);

    let status: RunStatus;
    if (issues.persistence.length) {
      status = "failed";
    } else if (cancelled) {
      status = "partial";
      result.errors.push(`Cancelled after page ${result.lastPage ?? "none"}`);
    } else if (issues.enrichment.length) {
      status = "partial";
    } else {
      status = "success";
    }

    this.stamp(result, status);

    if (!result.totalShops) {
      logger.warn("No shops found", { sourceId: source.id }, "job");
    }

    logger.info(
      "Ingestion job finished",
      {
        runId: result.runId,
        status,
        totalShops: result.totalShops,
        newShops: result.newShops,
        updatedShops: result.updatedShops,
        geocodedShops: result.geocodedShops,
      },
      "job",
    );

    await this.saveHistory(result);

    // failed and cancelled runs keep their checkpoint for the next resume
    if (status !== "failed" && !cancelled) {
      await checkpointStore.clear(source.id);
    }

    if (status === "failed") {
      const message = issues.persistence.join("\n");
      await this.notify("error", () => this.options.notifier.notifyError(source, message));
    } else {
      await this.notify("complete", () => this.options.notifier.notifyComplete(result));
    }

    return result;
  }

  private async fail(result: CrawlRunResult, e: unknown): Promise<CrawlRunResult> {
    const { source } = this.options;
    const message = errorMessage(e);

    if (e instanceof SessionFailure) {
      logger.error("Session failure, run aborted", { sourceId: source.id, ...formatErr(e) }, "session");
    } else if (isHarvestError(e)) {
      logger.error(`${e.name}, run aborted`, { sourceId: source.id, ...formatErr(e) }, "job");
    } else {
      logger.error("Unexpected error, run aborted", { sourceId: source.id, ...formatErr(e) }, "job");
    }

    result.errors.push(`${errorName(e)}: ${message}`);
    this.stamp(result, "failed");

    await this.saveHistory(result);
    await this.notify("error", () => this.options.notifier.notifyError(source, message));

    return result;
  }

  private stamp(result: CrawlRunResult, status: RunStatus) {
    result.status = status;
    result.completedAt = this.now();
    result.durationSeconds = secondsElapsed(result.startedAt.getTime(), result.completedAt);
  }

  private async saveHistory(result: CrawlRunResult) {
    try {
      await this.options.historyStore.save(result);
    } catch (e) {
      logger.error(
        "Failed to save run history",
        { runId: result.runId, ...formatErr(e) },
        "history",
      );
    }
  }

  private async notify(kind: string, send: () => Promise<void>) {
    const timeout = this.options.notifyTimeoutSecs ?? 15;
    try {
      await timedRun(send(), timeout, `Notification (${kind}) timed out`, {
        sourceId: this.sourceId,
      });
    } catch (e) {
      logger.warn(
        `Notification (${kind}) failed`,
        { sourceId: this.sourceId, ...formatErr(e) },
        "notification",
      );
    }
  }

  private async closeExtractor() {
    const { extractor } = this.options;
    if (!extractor.close) {
      return;
    }
    try {
      await extractor.close();
    } catch (e) {
      logger.warn("Failed to close extractor", { sourceId: this.sourceId, ...formatErr(e) }, "extractor");
    }
  }
}

function errorName(e: unknown) {
  return e instanceof Error ? e.name : "Error";
}
