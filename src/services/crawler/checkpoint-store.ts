import { formatErr, logger } from "../../util/logger.js";
import { PersistenceFailure } from "../../util/errors.js";

export interface CrawlCheckpoint {
  sourceId: string;
  completedPages: number[];
  totalSaved: number;
  lastId: string;
  updatedAt: Date;
}

export interface CheckpointStore {
  get(sourceId: string): Promise<CrawlCheckpoint | null>;
  save(
    sourceId: string,
    completedPages: number[],
    totalSaved: number,
    lastId: string,
  ): Promise<void>;
  clear(sourceId: string): Promise<void>;
}

// subset of ioredis commands the checkpoint store relies on
export interface CheckpointRedis {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: "EX", seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
}

export function uniqueSortedPages(pages: Iterable<number>): number[] {
  return [...new Set(pages)].sort((a, b) => a - b);
}

export function resumePage(checkpoint: CrawlCheckpoint | null): number | null {
  if (!checkpoint || !checkpoint.completedPages.length) {
    return null;
  }
  return Math.max(...checkpoint.completedPages) + 1;
}

function isPageList(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.every((page) => typeof page === "number" && Number.isInteger(page))
  );
}

export function parseCheckpoint(
  sourceId: string,
  raw: string,
): CrawlCheckpoint | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    logger.warn("Unreadable checkpoint ignored", { sourceId, ...formatErr(e) }, "checkpoint");
    return null;
  }

  if (
    !data ||
    typeof data !== "object" ||
    !("completedPages" in data) ||
    !isPageList(data.completedPages)
  ) {
    logger.warn("Malformed checkpoint ignored", { sourceId }, "checkpoint");
    return null;
  }

  const totalSaved =
    "totalSaved" in data && typeof data.totalSaved === "number"
      ? data.totalSaved
      : 0;
  const lastId =
    "lastId" in data && typeof data.lastId === "string" ? data.lastId : "";
  const updatedAt =
    "updatedAt" in data && typeof data.updatedAt === "string"
      ? new Date(data.updatedAt)
      : new Date(0);

  return {
    sourceId,
    completedPages: uniqueSortedPages(data.completedPages),
    totalSaved,
    lastId,
    updatedAt,
  };
}

export const CHECKPOINT_KEY_PREFIX = "harvest:checkpoint:";

/**
 * Keeps one JSON checkpoint document per source in Redis.
 *
 * Reads never fail the run: an unreachable or unreadable checkpoint is treated
 * as absent and the crawl starts from the configured first page.
 */
export class RedisCheckpointStore implements CheckpointStore {
  private readonly redis: CheckpointRedis;
  private readonly ttlSeconds: number;
  private readonly now: () => Date;

  constructor(redis: CheckpointRedis, ttlDays = 30, now: () => Date = () => new Date()) {
    this.redis = redis;
    this.ttlSeconds = Math.round(ttlDays * 24 * 60 * 60);
    this.now = now;
  }

  key(sourceId: string) {
    return `${CHECKPOINT_KEY_PREFIX}${sourceId}`;
  }

  async get(sourceId: string): Promise<CrawlCheckpoint | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(this.key(sourceId));
    } catch (e) {
      logger.error("Failed to read checkpoint", { sourceId, ...formatErr(e) }, "checkpoint");
      return null;
    }

    if (!raw) {
      logger.info("No checkpoint found", { sourceId }, "checkpoint");
      return null;
    }

    const checkpoint = parseCheckpoint(sourceId, raw);
    if (checkpoint) {
      logger.info(
        "Checkpoint loaded",
        { sourceId, pages: checkpoint.completedPages.length, totalSaved: checkpoint.totalSaved },
        "checkpoint",
      );
    }
    return checkpoint;
  }

  async save(
    sourceId: string,
    completedPages: number[],
    totalSaved: number,
    lastId: string,
  ): Promise<void> {
    const document = {
      sourceId,
      completedPages: uniqueSortedPages(completedPages),
      totalSaved,
      lastId,
      updatedAt: this.now().toISOString(),
    };

    try {
      await this.redis.set(
        this.key(sourceId),
        JSON.stringify(document),
        "EX",
        this.ttlSeconds,
      );
    } catch (e) {
      throw new PersistenceFailure(`Failed to save checkpoint for ${sourceId}`, {
        cause: e,
        details: { sourceId },
      });
    }

    logger.debug(
      "Checkpoint saved",
      { sourceId, pages: document.completedPages.length, totalSaved },
      "checkpoint",
    );
  }

  async clear(sourceId: string): Promise<void> {
    try {
      await this.redis.del(this.key(sourceId));
      logger.info("Checkpoint cleared", { sourceId }, "checkpoint");
    } catch (e) {
      logger.error("Failed to clear checkpoint", { sourceId, ...formatErr(e) }, "checkpoint");
    }
  }
}

export class MemoryCheckpointStore implements CheckpointStore {
  private readonly checkpoints = new Map<string, CrawlCheckpoint>();

  async get(sourceId: string): Promise<CrawlCheckpoint | null> {
    const checkpoint = this.checkpoints.get(sourceId);
    return checkpoint
      ? { ...checkpoint, completedPages: [...checkpoint.completedPages] }
      : null;
  }

  async save(
    sourceId: string,
    completedPages: number[],
    totalSaved: number,
    lastId: string,
  ): Promise<void> {
    this.checkpoints.set(sourceId, {
      sourceId,
      completedPages: uniqueSortedPages(completedPages),
      totalSaved,
      lastId,
      updatedAt: new Date(),
    });
  }

  async clear(sourceId: string): Promise<void> {
    this.checkpoints.delete(sourceId);
  }
}
