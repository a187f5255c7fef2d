import { describe, expect, it } from "vitest";

import type { CrawlConfig, PaginationConfig } from "../src/services/crawler/interfaces.js";
import { MemoryCheckpointStore } from "../src/services/crawler/checkpoint-store.js";
import type { GeoLocation } from "../src/services/geocoding/cache-geocoder.js";
import { GeocodingService } from "../src/services/geocoding/geocoding-service.js";
import {
  IngestionJob,
  type IngestionJobOptions,
  checkpointLastId,
  generateRunId,
} from "../src/services/ingestion-job.js";
import { PersistenceFailure, SessionFailure } from "../src/util/errors.js";
import {
  FakeExtractor,
  MemoryHistoryStore,
  MemoryShopStore,
  RecordingNotifier,
  TEST_SOURCE,
  linksFor,
  noWaitRateLimiter,
  shopFor,
} from "./helpers.js";

class UnreachableCheckpointStore extends MemoryCheckpointStore {
  async get(): Promise<null> {
    throw new PersistenceFailure("checkpoint store unreachable");
  }
}

class RecordingCheckpointStore extends MemoryCheckpointStore {
  readonly saves: { pages: number[]; totalSaved: number; lastId: string }[] = [];
  clears = 0;

  async save(sourceId: string, completedPages: number[], totalSaved: number, lastId: string) {
    this.saves.push({ pages: [...completedPages], totalSaved, lastId });
    await super.save(sourceId, completedPages, totalSaved, lastId);
  }

  async clear(sourceId: string) {
    this.clears++;
    await super.clear(sourceId);
  }
}

function crawlConfig(pagination: Partial<PaginationConfig> = {}, batchSize = 4): CrawlConfig {
  return {
    batchSize,
    pagination: {
      startPage: 1,
      endPage: null,
      maxEmptyPages: 2,
      maxDuplicatePages: 3,
      ...pagination,
    },
    rateLimit: { minWait: 0, maxWait: 0 },
  };
}

const STARTED = new Date("2024-03-01T09:00:00Z");

function setup(extractor: FakeExtractor, overrides: Partial<IngestionJobOptions> = {}) {
  const shopStore = new MemoryShopStore();
  const historyStore = new MemoryHistoryStore();
  const checkpointStore = new RecordingCheckpointStore();
  const notifier = new RecordingNotifier();

  const options: IngestionJobOptions = {
    source: TEST_SOURCE,
    extractor,
    crawlConfig: crawlConfig({ endPage: 3 }),
    shopStore,
    historyStore,
    checkpointStore,
    notifier,
    rateLimiter: noWaitRateLimiter(),
    runId: "test-source_run1",
    now: () => STARTED,
    ...overrides,
  };

  return {
    shopStore,
    historyStore,
    checkpointStore,
    notifier,
    options,
    job: () => new IngestionJob(options),
  };
}

describe("IngestionJob", () => {
  it("crawls, saves and checkpoints a source", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 2));
    const ctx = setup(extractor);

    const result = await ctx.job().execute();

    expect(result).toMatchObject({
      runId: "test-source_run1",
      sourceId: "test-source",
      sourceName: "Test City",
      status: "success",
      totalShops: 6,
      newShops: 6,
      updatedShops: 0,
      errors: [],
      lastPage: 3,
      stopReason: "end-page",
      resumedFromPage: null,
      durationSeconds: 0,
    });
    expect(ctx.shopStore.batches).toEqual([4, 2]);
    expect(ctx.shopStore.shops.size).toBe(6);
    // page 1 is only checkpointed once its records left the buffer
    expect(ctx.checkpointStore.saves).toEqual([
      { pages: [1, 2], totalSaved: 4, lastId: "test-source_00004" },
    ]);
    expect(await ctx.checkpointStore.get("test-source")).toBeNull();
    expect(ctx.historyStore.runs.get("test-source_run1")?.status).toBe("success");
    expect(ctx.notifier.events).toEqual(["start:test-source", "complete:success"]);
    expect(extractor.closed).toBe(true);
  });

  it("resumes after the last completed page", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 1));
    const ctx = setup(extractor, { crawlConfig: crawlConfig({ endPage: 5 }, 1) });
    await ctx.checkpointStore.save("test-source", [1, 2, 3], 6, "test-source_00006");

    const result = await ctx.job().execute();

    expect(extractor.listCalls).toEqual([4, 5]);
    expect(result.resumedFromPage).toBe(4);
    expect(result.totalShops).toBe(2);
    expect(ctx.checkpointStore.saves.at(-1)).toEqual({
      pages: [1, 2, 3, 4, 5],
      totalSaved: 8,
      lastId: "test-source_00008",
    });
    expect(await ctx.checkpointStore.get("test-source")).toBeNull();
  });

  it("updates instead of duplicating on a second run", async () => {
    const ctx = setup(new FakeExtractor((page) => linksFor(page, 2)));

    const first = await ctx.job().execute();
    const second = await new IngestionJob({
      ...ctx.options,
      extractor: new FakeExtractor((page) => linksFor(page, 2)),
      runId: "test-source_run2",
    }).execute();

    expect(first.newShops).toBe(6);
    expect(second.newShops).toBe(0);
    expect(second.updatedShops).toBe(6);
    expect(ctx.shopStore.shops.size).toBe(6);
  });

  it("fails the run and keeps the checkpoint when a batch cannot be saved", async () => {
    const ctx = setup(new FakeExtractor((page) => linksFor(page, 2)), {
      crawlConfig: crawlConfig({ endPage: 3 }, 2),
    });
    ctx.shopStore.failOnBatch = 2;

    const result = await ctx.job().execute();

    const message = "PersistenceFailure: Failed to save batch: write rejected (2 records)";
    expect(result.status).toBe("failed");
    expect(result.errors).toEqual([message]);
    expect(result.totalShops).toBe(6);
    expect(result.newShops).toBe(4);
    expect(ctx.checkpointStore.saves.map((save) => save.pages)).toEqual([[1]]);
    expect((await ctx.checkpointStore.get("test-source"))?.completedPages).toEqual([1]);
    expect(ctx.checkpointStore.clears).toBe(0);
    expect(ctx.notifier.events).toEqual(["start:test-source", `error:test-source:${message}`]);
    expect(ctx.historyStore.runs.get("test-source_run1")?.status).toBe("failed");
  });

  it("never checkpoints a page whose records were in a dropped batch", async () => {
    const ctx = setup(new FakeExtractor((page) => linksFor(page, 3)));
    ctx.shopStore.failOnBatch = 1;

    const first = await ctx.job().execute();

    expect(first.status).toBe("failed");
    expect(ctx.shopStore.batches).toEqual([4, 4, 1]);
    expect(ctx.shopStore.shops.size).toBe(5);
    expect(ctx.checkpointStore.saves).toEqual([]);
    expect(await ctx.checkpointStore.get("test-source")).toBeNull();

    ctx.shopStore.failOnBatch = null;
    const extractor = new FakeExtractor((page) => linksFor(page, 3));
    const second = await new IngestionJob({
      ...ctx.options,
      extractor,
      runId: "test-source_run2",
    }).execute();

    expect(second.status).toBe("success");
    expect(second.resumedFromPage).toBeNull();
    expect(extractor.listCalls).toEqual([1, 2, 3]);
    expect(ctx.shopStore.shops.size).toBe(9);
  });

  it("checkpoints the pages before the first dropped batch", async () => {
    const ctx = setup(new FakeExtractor((page) => linksFor(page, 2)), {
      crawlConfig: crawlConfig({ endPage: 4 }, 2),
    });
    ctx.shopStore.failOnBatch = 3;

    const first = await ctx.job().execute();

    expect(first.status).toBe("failed");
    expect(ctx.checkpointStore.saves).toEqual([
      { pages: [1], totalSaved: 2, lastId: "test-source_00002" },
      { pages: [1, 2], totalSaved: 4, lastId: "test-source_00004" },
    ]);

    ctx.shopStore.failOnBatch = null;
    const extractor = new FakeExtractor((page) => linksFor(page, 2));
    const second = await new IngestionJob({
      ...ctx.options,
      extractor,
      runId: "test-source_run2",
    }).execute();

    expect(second.status).toBe("success");
    expect(extractor.listCalls).toEqual([3, 4]);
    expect(ctx.shopStore.shops.size).toBe(8);
  });

  it("geocodes records before saving them", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 2));
    extractor.recordFactory = (link) => shopFor(link, "Chuo 1-2-3");
    const geocoding = new GeocodingService(
      {
        geocode: async (): Promise<GeoLocation> => ({ latitude: 35.68, longitude: 139.76 }),
      },
      { rateLimiter: noWaitRateLimiter(), now: () => STARTED },
    );
    const ctx = setup(extractor, { crawlConfig: crawlConfig({ endPage: 1 }), geocoding });

    const result = await ctx.job().execute();

    expect(result.status).toBe("success");
    expect(result.geocodedShops).toBe(2);
    for (const shop of ctx.shopStore.shops.values()) {
      expect(shop.latitude).toBe(35.68);
      expect(shop.geocodedAt).toEqual(STARTED);
    }
  });

  it("reports geocoding errors as a partial run", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 2));
    extractor.recordFactory = (link) => shopFor(link, `Chuo ${link}`);
    const geocoding = new GeocodingService(
      {
        geocode: async () => {
          throw new Error("quota exceeded");
        },
      },
      { rateLimiter: noWaitRateLimiter() },
    );
    const ctx = setup(extractor, { crawlConfig: crawlConfig({ endPage: 1 }), geocoding });

    const result = await ctx.job().execute();

    expect(result.status).toBe("partial");
    expect(result.geocodingErrors).toBe(2);
    expect(result.errors).toEqual([
      "EnrichmentFailure: Unexpected geocoding error: quota exceeded",
      "EnrichmentFailure: Unexpected geocoding error: quota exceeded",
    ]);
    expect(ctx.shopStore.shops.size).toBe(2);
    expect(await ctx.checkpointStore.get("test-source")).toBeNull();
    expect(ctx.notifier.events).toEqual(["start:test-source", "complete:partial"]);
  });

  it("fails the run on a session failure", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 2));
    extractor.initError = new SessionFailure("login token missing");
    const ctx = setup(extractor);

    const result = await ctx.job().execute();

    expect(result.status).toBe("failed");
    expect(result.errors).toEqual(["SessionFailure: login token missing"]);
    expect(extractor.listCalls).toEqual([]);
    expect(extractor.closed).toBe(true);
    expect(ctx.notifier.events).toEqual([
      "start:test-source",
      "error:test-source:login token missing",
    ]);
    expect(ctx.historyStore.saves).toBe(1);
  });

  it("records how far a run got before a session failure", async () => {
    const extractor = new FakeExtractor((page) => {
      if (page === 3) {
        throw new SessionFailure("session expired");
      }
      return linksFor(page, 3);
    });
    const ctx = setup(extractor, { crawlConfig: crawlConfig() });

    const result = await ctx.job().execute();

    expect(result).toMatchObject({
      status: "failed",
      lastPage: 2,
      stopReason: "aborted",
      totalShops: 6,
      errors: ["SessionFailure: session expired"],
    });
    expect(ctx.checkpointStore.saves).toEqual([
      { pages: [1], totalSaved: 3, lastId: "test-source_00003" },
      { pages: [1, 2], totalSaved: 6, lastId: "test-source_00006" },
    ]);
    expect(ctx.historyStore.runs.get("test-source_run1")?.lastPage).toBe(2);
  });

  it("fails the run when the checkpoint cannot be read", async () => {
    const extractor = new FakeExtractor((page) => linksFor(page, 1));
    const ctx = setup(extractor, { checkpointStore: new UnreachableCheckpointStore() });

    const result = await ctx.job().execute();

    expect(result.status).toBe("failed");
    expect(result.errors).toEqual(["PersistenceFailure: checkpoint store unreachable"]);
    expect(result.stopReason).toBeNull();
    expect(extractor.listCalls).toEqual([]);
    expect(extractor.closed).toBe(true);
    expect(ctx.historyStore.saves).toBe(1);
    expect(ctx.notifier.events).toEqual([
      "start:test-source",
      "error:test-source:checkpoint store unreachable",
    ]);
  });

  it("fails the run on an invalid rate limit", async () => {
    const ctx = setup(new FakeExtractor((page) => linksFor(page, 1)), {
      crawlConfig: { ...crawlConfig({ endPage: 1 }), rateLimit: { minWait: 2, maxWait: 1 } },
      rateLimiter: undefined,
    });

    const result = await ctx.job().execute();

    expect(result.status).toBe("failed");
    expect(result.errors).toEqual(["ConfigurationFailure: Invalid wait range [2, 1]"]);
    expect(ctx.historyStore.runs.get("test-source_run1")?.status).toBe("failed");
    expect(ctx.notifier.events).toEqual([
      "start:test-source",
      "error:test-source:Invalid wait range [2, 1]",
    ]);
  });

  it("succeeds with zero records and clears the checkpoint", async () => {
    const ctx = setup(new FakeExtractor({}), { crawlConfig: crawlConfig() });

    const result = await ctx.job().execute();

    expect(result.status).toBe("success");
    expect(result.totalShops).toBe(0);
    expect(result.stopReason).toBe("empty-pages");
    expect(ctx.checkpointStore.clears).toBe(1);
  });

  it("keeps the checkpoint of a cancelled run", async () => {
    const abort = new AbortController();
    const extractor = new FakeExtractor((page) => {
      if (page === 2) {
        abort.abort();
      }
      return linksFor(page, 1);
    });
    const ctx = setup(extractor, { crawlConfig: crawlConfig(), signal: abort.signal });

    const result = await ctx.job().execute();

    expect(result.status).toBe("partial");
    expect(result.stopReason).toBe("cancelled");
    expect(result.errors).toEqual(["Cancelled after page 2"]);
    expect((await ctx.checkpointStore.get("test-source"))?.completedPages).toEqual([1, 2]);
  });

  it("is not affected by notification failures", async () => {
    const ctx = setup(new FakeExtractor((page) => linksFor(page, 1)));
    ctx.notifier.failing = true;

    const result = await ctx.job().execute();

    expect(result.status).toBe("success");
    expect(ctx.notifier.events).toEqual(["start:test-source", "complete:success"]);
  });
});

describe("run identifiers", () => {
  it("generates a source-prefixed run id", () => {
    expect(generateRunId("city")).toMatch(/^city_[0-9a-f]{8}$/);
    expect(generateRunId("city")).not.toBe(generateRunId("city"));
  });

  it("pads the checkpoint last id", () => {
    expect(checkpointLastId("city", 42)).toBe("city_00042");
  });
});
