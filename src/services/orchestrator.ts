import { formatErr, logger } from "../util/logger.js";
import { ConfigurationFailure, errorMessage } from "../util/errors.js";
import type { SourceDefinition } from "../util/sources.js";
import type { CrawlRunResult } from "../models/scrapinghistory.js";
import type { AppSettings } from "./config-manager.js";
import type { CrawlConfig, Extractor } from "./crawler/interfaces.js";
import type { CheckpointStore } from "./crawler/checkpoint-store.js";
import { politeSleep } from "./crawler/rate-limiter.js";
import type { ShopRecord } from "./crawler/records.js";
import { HttpClient } from "./extractors/http-client.js";
import { HtmlExtractor } from "./extractors/html-extractor.js";
import type { GeocodingService } from "./geocoding/geocoding-service.js";
import { type HistoryStore, IngestionJob, type ShopStore } from "./ingestion-job.js";
import type { Notifier } from "./notifier/slack-notifier.js";

export type ExtractorFactory = (source: SourceDefinition) => Extractor<ShopRecord>;

export interface OrchestratorDeps {
  sources: SourceDefinition[];
  crawlConfigFor: (source: SourceDefinition) => CrawlConfig;
  shopStore: ShopStore;
  historyStore: HistoryStore;
  checkpointStore: CheckpointStore;
  notifier: Notifier;
  geocoding: GeocodingService | null;
  extractorFactory: ExtractorFactory;
  // pause between two sources, one to two seconds by default
  pauseBetweenSources?: () => Promise<void>;
}

export function htmlExtractorFactory(scraping: AppSettings["scraping"]): ExtractorFactory {
  return (source) =>
    new HtmlExtractor(
      source,
      new HttpClient({
        timeoutSecs: scraping.timeoutSecs,
        retries: scraping.retries,
        userAgent: scraping.userAgent,
        encoding: source.encoding,
      }),
    );
}

// Wires the stores, geocoding and notifier into one ingestion job per source.
export class BatchOrchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly sources: Map<string, SourceDefinition>;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.sources = new Map(deps.sources.map((source) => [source.id, source]));
    logger.info(
      "BatchOrchestrator initialized",
      { sources: [...this.sources.keys()], geocoding: deps.geocoding !== null },
      "job",
    );
  }

  get sourceIds() {
    return [...this.sources.keys()];
  }

  async runSource(sourceId: string, signal?: AbortSignal): Promise<CrawlRunResult> {
    const source = this.sources.get(sourceId);
    if (!source) {
      throw new ConfigurationFailure(`Unknown source: ${sourceId}`, {
        details: { available: this.sourceIds },
      });
    }

    const job = new IngestionJob({
      source,
      extractor: this.deps.extractorFactory(source),
      crawlConfig: this.deps.crawlConfigFor(source),
      shopStore: this.deps.shopStore,
      historyStore: this.deps.historyStore,
      checkpointStore: this.deps.checkpointStore,
      notifier: this.deps.notifier,
      geocoding: this.deps.geocoding,
      signal,
    });

    const result = await job.execute();
    logger.info(
      `Scraping job for ${source.name} finished: ${result.status}`,
      { runId: result.runId },
      "job",
    );
    return result;
  }

  // Sources run one after another; a failure in one does not stop the rest.
  async runAll(sourceIds: string[] = this.sourceIds, signal?: AbortSignal) {
    const results: CrawlRunResult[] = [];
    const errors: { sourceId: string; message: string }[] = [];

    const pause = this.deps.pauseBetweenSources ?? (() => politeSleep(1, 2));

    for (const [i, sourceId] of sourceIds.entries()) {
      if (i > 0 && !signal?.aborted) {
        await pause();
      }
      if (signal?.aborted) {
        logger.warn("Interrupted, remaining sources skipped", { sourceId }, "job");
        break;
      }

      try {
        results.push(await this.runSource(sourceId, signal));
      } catch (e) {
        logger.error(`Source ${sourceId} failed`, formatErr(e), "job");
        errors.push({ sourceId, message: errorMessage(e) });
      }
    }

    return { results, errors };
  }
}

export const EXIT_INTERRUPTED = 130;

export function exitCodeFor(
  results: CrawlRunResult[],
  failedSources: number,
  interrupted: boolean,
): number {
  if (interrupted) {
    return EXIT_INTERRUPTED;
  }
  if (failedSources || results.some((result) => result.status === "failed")) {
    return 1;
  }
  return 0;
}
