import { formatErr, type LogDetails, logger } from "../../util/logger.js";
import { SessionFailure } from "../../util/errors.js";
import { BatchAccumulator } from "./batch-accumulator.js";
import { LinkDeduplicator } from "./link-deduplicator.js";
import { RateLimiter } from "./rate-limiter.js";
import type {
  CrawlConfig,
  CrawlOutcome,
  CrawlRecord,
  CrawlRunOptions,
  CrawlState,
  Extractor,
  PageCompleteCallback,
  StopReason,
} from "./interfaces.js";

export * from "./interfaces.js";

function sameLinks(a: Set<string>, b: Set<string>) {
  if (a.size !== b.size) {
    return false;
  }
  for (const link of a) {
    if (!b.has(link)) {
      return false;
    }
  }
  return true;
}

// a buffered record tagged with the listing page it came from
interface PagedRecord<T> {
  record: T;
  page: number;
}

interface PageStats {
  recordsFound: number;
  duplicateLinks: number;
  failedRecords: number;
}

/**
 * Walks the listing pages of one source in increasing order.
 *
 * With a known end page the loop stops once `page > endPage`. Without one
 * (auto-detect) it stops after `maxEmptyPages` consecutive empty pages, or
 * after `maxDuplicatePages` consecutive pages whose link set equals the
 * previous non-empty page's. Page N+1 is never requested before every link
 * of page N went through dedup, fetch and the batch accumulator, and the
 * page-complete callback only fires after that.
 */
export class CrawlController<T extends CrawlRecord> {
  state: CrawlState = "idle";
  // progress of the current or last run, kept when the run aborts
  outcome: CrawlOutcome | null = null;

  readonly extractor: Extractor<T>;
  readonly config: CrawlConfig;
  readonly rateLimiter: RateLimiter;
  readonly deduplicator: LinkDeduplicator;

  constructor(
    extractor: Extractor<T>,
    config: CrawlConfig,
    deps: { rateLimiter?: RateLimiter; deduplicator?: LinkDeduplicator } = {},
  ) {
    this.extractor = extractor;
    this.config = config;
    this.rateLimiter = deps.rateLimiter ?? new RateLimiter(config.rateLimit);
    this.deduplicator = deps.deduplicator ?? new LinkDeduplicator();
  }

  get autoDetect() {
    return this.config.pagination.endPage === null;
  }

  async run(options: CrawlRunOptions<T>): Promise<CrawlOutcome> {
    if (this.state !== "idle") {
      throw new Error(`CrawlController already ${this.state}`);
    }
    this.state = "running";

    const { pagination } = this.config;
    const sourceId = this.extractor.sourceId;
    const startPage = options.startPage ?? pagination.startPage;

    const { onBatch, onBatchError } = options;
    const accumulator = new BatchAccumulator<PagedRecord<T>>({
      batchSize: this.config.batchSize,
      onFlush: (entries) =>
        onBatch(
          entries.map((entry) => entry.record),
          entries.map((entry) => entry.page),
        ),
      onFlushError: onBatchError
        ? (e, entries) =>
            onBatchError(
              e,
              entries.map((entry) => entry.record),
              entries.map((entry) => entry.page),
            )
        : undefined,
    });

    const outcome: CrawlOutcome = {
      state: "running",
      stopReason: "end-page",
      startPage,
      lastPage: null,
      pagesVisited: 0,
      completedPages: [],
      recordsFound: 0,
      linksSeen: 0,
      duplicateLinks: 0,
      failedRecords: 0,
    };
    this.outcome = outcome;

    logger.info(
      "Starting crawl",
      {
        sourceId,
        startPage,
        endPage: pagination.endPage,
        autoDetect: this.autoDetect,
        batchSize: this.config.batchSize,
        maxEmptyPages: pagination.maxEmptyPages,
        maxDuplicatePages: pagination.maxDuplicatePages,
      },
      "crawl",
    );

    try {
      if (this.extractor.init) {
        await this.extractor.init();
      }

      outcome.stopReason = await this.walkPages(startPage, accumulator, outcome, options);
    } catch (e) {
      await accumulator.drain();
      this.state = "aborted";
      outcome.state = "aborted";
      outcome.stopReason = "aborted";
      logger.error(
        "Crawl aborted",
        { sourceId, lastPage: outcome.lastPage, ...formatErr(e) },
        "crawl",
      );
      throw e;
    }

    await accumulator.drain();

    this.state = "completed";
    outcome.state = "completed";
    outcome.linksSeen = this.deduplicator.size;

    logger.success(
      "Crawl completed",
      {
        sourceId,
        stopReason: outcome.stopReason,
        pagesVisited: outcome.pagesVisited,
        recordsFound: outcome.recordsFound,
        batches: accumulator.flushedBatches,
        failedBatches: accumulator.failedBatches,
      },
      "crawl",
    );

    return outcome;
  }

  private async walkPages(
    startPage: number,
    accumulator: BatchAccumulator<PagedRecord<T>>,
    outcome: CrawlOutcome,
    { onPageComplete, signal }: CrawlRunOptions<T>,
  ): Promise<StopReason> {
    const { endPage, maxEmptyPages, maxDuplicatePages, maxPages } =
      this.config.pagination;
    const logDetails: LogDetails = { sourceId: this.extractor.sourceId };

    let emptyStreak = 0;
    let duplicateStreak = 0;
    let previousLinks: Set<string> | null = null;

    if (signal?.aborted) {
      return "cancelled";
    }

    for (let page = startPage; ; page++) {
      if (endPage !== null && page > endPage) {
        return "end-page";
      }

      if (maxPages && outcome.pagesVisited >= maxPages) {
        logger.warn("Page limit reached", { ...logDetails, maxPages }, "pagination");
        return "page-limit";
      }

      await this.rateLimiter.wait();
      const links = await this.listLinks(page);
      outcome.pagesVisited++;

      if (endPage === null) {
        if (!links.length) {
          emptyStreak++;
          logger.info(
            `No links found on page ${page}`,
            { ...logDetails, emptyStreak, maxEmptyPages },
            "pagination",
          );
          if (emptyStreak >= maxEmptyPages) {
            logger.info("Reached max consecutive empty pages", logDetails, "pagination");
            return "empty-pages";
          }
        } else {
          emptyStreak = 0;

          const currentLinks = new Set(links);
          if (previousLinks && sameLinks(previousLinks, currentLinks)) {
            duplicateStreak++;
            logger.info(
              `Duplicate page ${page} detected`,
              { ...logDetails, duplicateStreak, maxDuplicatePages },
              "pagination",
            );
            if (duplicateStreak >= maxDuplicatePages) {
              logger.info(
                "Reached max consecutive duplicate pages",
                logDetails,
                "pagination",
              );
              return "duplicate-pages";
            }
          } else {
            duplicateStreak = 0;
          }
          previousLinks = currentLinks;
        }
      }

      const stats = await this.processLinks(page, links, accumulator);
      outcome.recordsFound += stats.recordsFound;
      outcome.duplicateLinks += stats.duplicateLinks;
      outcome.failedRecords += stats.failedRecords;

      const flushedThrough = accumulator.head ? accumulator.head.page - 1 : page;
      await this.completePage(page, flushedThrough, onPageComplete);
      outcome.lastPage = page;
      outcome.completedPages.push(page);

      if (signal?.aborted) {
        logger.warn(
          `Crawl cancelled after page ${page}`,
          logDetails,
          "crawl",
        );
        return "cancelled";
      }
    }
  }

  private async listLinks(page: number): Promise<string[]> {
    try {
      const links = await this.extractor.listPage(page);
      logger.debug(
        `Found ${links.length} links on page ${page}`,
        { sourceId: this.extractor.sourceId },
        "links",
      );
      return links;
    } catch (e) {
      if (e instanceof SessionFailure) {
        throw e;
      }
      logger.error(
        `Failed to list page ${page}, treating it as empty`,
        { sourceId: this.extractor.sourceId, ...formatErr(e) },
        "links",
      );
      return [];
    }
  }

  private async processLinks(
    page: number,
    links: string[],
    accumulator: BatchAccumulator<PagedRecord<T>>,
  ): Promise<PageStats> {
    const stats: PageStats = { recordsFound: 0, duplicateLinks: 0, failedRecords: 0 };

    for (const link of links) {
      if (!this.deduplicator.markIfNew(link)) {
        stats.duplicateLinks++;
        continue;
      }

      await this.rateLimiter.wait();

      let record: T | null;
      try {
        record = await this.extractor.fetchRecord(link);
      } catch (e) {
        if (e instanceof SessionFailure) {
          throw e;
        }
        stats.failedRecords++;
        logger.warn(
          "Failed to fetch record, skipping",
          { sourceId: this.extractor.sourceId, page, link, ...formatErr(e) },
          "extractor",
        );
        continue;
      }

      if (!record) {
        stats.failedRecords++;
        logger.warn(
          "No record parsed, skipping",
          { sourceId: this.extractor.sourceId, page, link },
          "extractor",
        );
        continue;
      }

      stats.recordsFound++;
      await accumulator.add({ record, page });
    }

    return stats;
  }

  private async completePage(
    page: number,
    flushedThrough: number,
    onPageComplete?: PageCompleteCallback,
  ) {
    if (!onPageComplete) {
      return;
    }
    try {
      await onPageComplete(page, flushedThrough);
    } catch (e) {
      logger.error(
        `Page complete callback failed for page ${page}`,
        { sourceId: this.extractor.sourceId, ...formatErr(e) },
        "checkpoint",
      );
    }
  }
}
