import { describe, expect, it } from "vitest";

import {
  type CrawlConfig,
  CrawlController,
  type PaginationConfig,
} from "../src/services/crawler/index.js";
import type { ShopRecord } from "../src/services/crawler/records.js";
import { SessionFailure } from "../src/util/errors.js";
import { FakeExtractor, linksFor, noWaitRateLimiter } from "./helpers.js";

function crawlConfig(pagination: Partial<PaginationConfig> = {}, batchSize = 10): CrawlConfig {
  return {
    batchSize,
    pagination: {
      startPage: 1,
      endPage: null,
      maxEmptyPages: 3,
      maxDuplicatePages: 3,
      ...pagination,
    },
    rateLimit: { minWait: 0, maxWait: 0 },
  };
}

function controllerFor(extractor: FakeExtractor, config: CrawlConfig) {
  return new CrawlController(extractor, config, { rateLimiter: noWaitRateLimiter() });
}

function collect() {
  const batches: ShopRecord[][] = [];
  const pages: number[] = [];
  return {
    batches,
    pages,
    onBatch: (batch: ShopRecord[]) => {
      batches.push(batch);
    },
    onPageComplete: (page: number) => {
      pages.push(page);
    },
  };
}

describe("CrawlController", () => {
  it("walks a fixed page range", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 2));
    const sink = collect();

    const outcome = await controllerFor(extractor, crawlConfig({ endPage: 3 })).run(sink);

    expect(extractor.listCalls).toEqual([1, 2, 3]);
    expect(extractor.fetchCalls).toHaveLength(6);
    expect(sink.pages).toEqual([1, 2, 3]);
    expect(sink.batches.map((b) => b.length)).toEqual([6]);
    expect(outcome.stopReason).toBe("end-page");
    expect(outcome.state).toBe("completed");
    expect(outcome.lastPage).toBe(3);
    expect(outcome.recordsFound).toBe(6);
    expect(outcome.linksSeen).toBe(6);
  });

  it("stops after consecutive empty pages", async () => {
    const extractor = new FakeExtractor({ 1: linksFor(1, 2), 2: linksFor(2, 2) });
    const sink = collect();

    const outcome = await controllerFor(extractor, crawlConfig({ maxEmptyPages: 3 })).run(sink);

    expect(extractor.listCalls).toEqual([1, 2, 3, 4, 5]);
    expect(sink.pages).toEqual([1, 2, 3, 4]);
    expect(outcome.stopReason).toBe("empty-pages");
    expect(outcome.recordsFound).toBe(4);
  });

  it("resets the empty streak when a page has links", async () => {
    const extractor = new FakeExtractor({ 1: linksFor(1, 1), 3: linksFor(3, 1) });

    const outcome = await controllerFor(extractor, crawlConfig({ maxEmptyPages: 2 })).run(
      collect(),
    );

    expect(extractor.listCalls).toEqual([1, 2, 3, 4, 5]);
    expect(outcome.recordsFound).toBe(2);
  });

  it("stops when the site keeps serving the same page", async () => {
    const links = linksFor(1, 5);
    const extractor = new FakeExtractor(() => links);
    const sink = collect();

    const outcome = await controllerFor(extractor, crawlConfig({ maxDuplicatePages: 2 })).run(
      sink,
    );

    expect(extractor.listCalls).toEqual([1, 2, 3]);
    expect(extractor.fetchCalls).toEqual(links);
    expect(sink.pages).toEqual([1, 2]);
    expect(outcome.stopReason).toBe("duplicate-pages");
    expect(outcome.duplicateLinks).toBe(5);
    expect(outcome.recordsFound).toBe(5);
  });

  it("fetches a link listed on two pages once", async () => {
    const shared = "https://shops.test/shared";
    const extractor = new FakeExtractor({
      1: [shared, ...linksFor(1, 1)],
      2: [shared, ...linksFor(2, 1)],
    });

    const outcome = await controllerFor(extractor, crawlConfig({ endPage: 2 })).run(collect());

    expect(extractor.fetchCalls.filter((link) => link === shared)).toHaveLength(1);
    expect(extractor.fetchCalls).toHaveLength(3);
    expect(outcome.duplicateLinks).toBe(1);
  });

  it("treats a failing listing page as empty", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 1));
    extractor.failingPages.add(2);
    const sink = collect();

    const outcome = await controllerFor(extractor, crawlConfig({ endPage: 3 })).run(sink);

    expect(extractor.listCalls).toEqual([1, 2, 3]);
    expect(sink.pages).toEqual([1, 2, 3]);
    expect(outcome.recordsFound).toBe(2);
  });

  it("skips records that fail to fetch or parse", async () => {
    const links = linksFor(1, 3);
    const extractor = new FakeExtractor({ 1: links });
    extractor.failingLinks.add(links[0]);
    extractor.recordFactory = () => null;

    const outcome = await controllerFor(extractor, crawlConfig({ endPage: 1 })).run(collect());

    expect(outcome.failedRecords).toBe(3);
    expect(outcome.recordsFound).toBe(0);
  });

  it("starts from the requested page", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 1));
    const sink = collect();

    const outcome = await controllerFor(extractor, crawlConfig({ endPage: 5 })).run({
      ...sink,
      startPage: 4,
    });

    expect(extractor.listCalls).toEqual([4, 5]);
    expect(outcome.startPage).toBe(4);
    expect(outcome.completedPages).toEqual([4, 5]);
  });

  it("honours the page limit", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 1));

    const outcome = await controllerFor(extractor, crawlConfig({ maxPages: 2 })).run(collect());

    expect(extractor.listCalls).toEqual([1, 2]);
    expect(outcome.stopReason).toBe("page-limit");
  });

  it("flushes batches of the configured size", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 3));
    const sink = collect();

    await controllerFor(extractor, crawlConfig({ endPage: 3 }, 4)).run(sink);

    expect(sink.batches.map((b) => b.length)).toEqual([4, 4, 1]);
  });

  it("reports the page of every batched record", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 3));
    const batchPages: number[][] = [];
    const progress: number[][] = [];

    await controllerFor(extractor, crawlConfig({ endPage: 3 }, 4)).run({
      onBatch: (_batch, pages) => {
        batchPages.push(pages);
      },
      onPageComplete: (page, flushedThrough) => {
        progress.push([page, flushedThrough]);
      },
    });

    expect(batchPages).toEqual([[1, 1, 1, 2], [2, 2, 3, 3], [3]]);
    expect(progress).toEqual([
      [1, 0],
      [2, 1],
      [3, 2],
    ]);
  });

  it("passes the pages of a dropped batch to the error callback", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 1));
    const dropped: number[][] = [];

    const outcome = await controllerFor(extractor, crawlConfig({ endPage: 3 }, 2)).run({
      onBatch: () => {
        throw new Error("store offline");
      },
      onBatchError: (_e, batch, pages) => {
        expect(batch).toHaveLength(pages.length);
        dropped.push(pages);
      },
    });

    expect(dropped).toEqual([[1, 2], [3]]);
    expect(outcome.completedPages).toEqual([1, 2, 3]);
  });

  it("stops after the current page once cancelled", async () => {
    const abort = new AbortController();
    const extractor = new FakeExtractor((page) => linksFor(page, 2));
    const sink = collect();

    const outcome = await controllerFor(extractor, crawlConfig()).run({
      ...sink,
      signal: abort.signal,
      onPageComplete: (page) => {
        sink.pages.push(page);
        abort.abort();
      },
    });

    expect(extractor.listCalls).toEqual([1]);
    expect(sink.pages).toEqual([1]);
    expect(sink.batches.map((b) => b.length)).toEqual([2]);
    expect(outcome.stopReason).toBe("cancelled");
  });

  it("aborts on a session failure and delivers what it has", async () => {
    const extractor = new FakeExtractor((page) => {
      if (page === 2) {
        throw new SessionFailure("session token expired");
      }
      return linksFor(page, 2);
    });
    const sink = collect();
    const controller = controllerFor(extractor, crawlConfig());

    await expect(controller.run(sink)).rejects.toBeInstanceOf(SessionFailure);

    expect(controller.state).toBe("aborted");
    expect(controller.outcome?.lastPage).toBe(1);
    expect(controller.outcome?.stopReason).toBe("aborted");
    expect(sink.pages).toEqual([1]);
    expect(sink.batches.map((b) => b.length)).toEqual([2]);
  });

  it("keeps crawling when the page-complete callback fails", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 1));

    const outcome = await controllerFor(extractor, crawlConfig({ endPage: 2 })).run({
      onBatch: () => {},
      onPageComplete: () => {
        throw new Error("checkpoint unavailable");
      },
    });

    expect(outcome.completedPages).toEqual([1, 2]);
  });

  it("runs only once", async () => {
    const controller = controllerFor(new FakeExtractor({}), crawlConfig({ endPage: 1 }));
    await controller.run(collect());

    await expect(controller.run(collect())).rejects.toThrow("already completed");
  });
});
