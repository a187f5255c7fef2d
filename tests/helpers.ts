import type { CrawlRunResult } from "../src/models/scrapinghistory.js";
import type { Extractor } from "../src/services/crawler/interfaces.js";
import { RateLimiter } from "../src/services/crawler/rate-limiter.js";
import { createShopRecord, type ShopRecord } from "../src/services/crawler/records.js";
import type { HistoryStore, ShopStore, UpsertResult } from "../src/services/ingestion-job.js";
import type { Notifier, SourceRef } from "../src/services/notifier/slack-notifier.js";

export const TEST_SOURCE: SourceRef = { id: "test-source", name: "Test City" };

export function noWaitRateLimiter() {
  return new RateLimiter({ minWait: 0, maxWait: 0 });
}

export function linksFor(page: number, count: number) {
  return Array.from({ length: count }, (_, i) => `https://shops.test/p${page}/shop-${i + 1}`);
}

export function shopFor(link: string, address: string | null = null): ShopRecord {
  const name = link.split("/").pop() ?? link;
  return createShopRecord(
    TEST_SOURCE,
    link,
    { name, address },
    {},
    new Date("2024-01-01T00:00:00Z"),
  );
}

type PageSource = Record<number, string[]> | ((page: number) => string[]);

// Serves listing pages from a table or function; unknown pages are empty.
export class FakeExtractor implements Extractor<ShopRecord> {
  readonly sourceId = TEST_SOURCE.id;
  readonly listCalls: number[] = [];
  readonly fetchCalls: string[] = [];
  initCalls = 0;
  closed = false;

  failingLinks = new Set<string>();
  failingPages = new Set<number>();
  initError: Error | null = null;
  recordFactory: (link: string) => ShopRecord | null = (link) => shopFor(link);

  private readonly pages: PageSource;

  constructor(pages: PageSource) {
    this.pages = pages;
  }

  async init() {
    this.initCalls++;
    if (this.initError) {
      throw this.initError;
    }
  }

  async listPage(page: number): Promise<string[]> {
    this.listCalls.push(page);
    if (this.failingPages.has(page)) {
      throw new Error(`page ${page} unavailable`);
    }
    return typeof this.pages === "function" ? this.pages(page) : (this.pages[page] ?? []);
  }

  async fetchRecord(link: string): Promise<ShopRecord | null> {
    this.fetchCalls.push(link);
    if (this.failingLinks.has(link)) {
      throw new Error(`cannot parse ${link}`);
    }
    return this.recordFactory(link);
  }

  async close() {
    this.closed = true;
  }
}

// Keyed in-memory store: a second upsert of the same key counts as an update.
export class MemoryShopStore implements ShopStore {
  readonly shops = new Map<string, ShopRecord>();
  readonly batches: number[] = [];
  failOnBatch: number | null = null;

  async upsertBatch(records: ShopRecord[]): Promise<UpsertResult> {
    const batchNumber = this.batches.length + 1;
    this.batches.push(records.length);
    if (this.failOnBatch === batchNumber) {
      throw new Error("write rejected");
    }

    let created = 0;
    let updated = 0;
    for (const record of records) {
      if (this.shops.has(record.key)) {
        updated++;
      } else {
        created++;
      }
      this.shops.set(record.key, record);
    }
    return { created, updated };
  }
}

export class MemoryHistoryStore implements HistoryStore {
  readonly runs = new Map<string, CrawlRunResult>();
  saves = 0;

  async save(result: CrawlRunResult) {
    this.saves++;
    this.runs.set(result.runId, { ...result, errors: [...result.errors] });
  }
}

export class RecordingNotifier implements Notifier {
  readonly events: string[] = [];
  failing = false;

  async notifyStart(source: SourceRef) {
    this.record(`start:${source.id}`);
  }

  async notifyComplete(summary: CrawlRunResult) {
    this.record(`complete:${summary.status}`);
  }

  async notifyError(source: SourceRef, message: string) {
    this.record(`error:${source.id}:${message}`);
  }

  private record(event: string) {
    this.events.push(event);
    if (this.failing) {
      throw new Error("webhook unreachable");
    }
  }
}
