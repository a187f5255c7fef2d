import type { RateLimitOptions } from "./rate-limiter.js";

// A provisional parsed record. `key` is the natural key used for upserts and
// must be recomputable from the same source content.
export interface CrawlRecord {
  key: string;
}

export interface Extractor<T extends CrawlRecord> {
  readonly sourceId: string;
  // optional source-wide setup (session tokens); throws SessionFailure
  init?(): Promise<void>;
  listPage(pageNumber: number): Promise<string[]>;
  fetchRecord(link: string): Promise<T | null>;
  close?(): Promise<void>;
}

// `pages[i]` is the listing page that `batch[i]` was found on
export type BatchCallback<T> = (batch: T[], pages: number[]) => Promise<void> | void;
export type BatchErrorCallback<T> = (error: unknown, batch: T[], pages: number[]) => void;
// `flushedThrough` is the highest page with no record left in the batch buffer
export type PageCompleteCallback = (
  pageNumber: number,
  flushedThrough: number,
) => Promise<void> | void;

export interface PaginationConfig {
  startPage: number;
  // null switches to auto-detect mode (empty/duplicate page streaks)
  endPage: number | null;
  maxEmptyPages: number;
  maxDuplicatePages: number;
  maxPages?: number;
}

export interface CrawlConfig {
  batchSize: number;
  pagination: PaginationConfig;
  rateLimit: RateLimitOptions;
}

export type CrawlState = "idle" | "running" | "completed" | "aborted";

export type StopReason =
  | "end-page"
  | "empty-pages"
  | "duplicate-pages"
  | "page-limit"
  | "cancelled"
  | "aborted";

export interface CrawlOutcome {
  state: CrawlState;
  stopReason: StopReason;
  startPage: number;
  // last page that went through the page-complete callback, null if none did
  lastPage: number | null;
  pagesVisited: number;
  completedPages: number[];
  recordsFound: number;
  linksSeen: number;
  duplicateLinks: number;
  failedRecords: number;
}

export interface CrawlRunOptions<T> {
  startPage?: number;
  onBatch: BatchCallback<T>;
  onPageComplete?: PageCompleteCallback;
  onBatchError?: BatchErrorCallback<T>;
  signal?: AbortSignal;
}
