import { formatErr, logger } from "../../util/logger.js";
import { ConfigurationFailure } from "../../util/errors.js";

export type FlushCallback<T> = (batch: T[]) => Promise<void> | void;

export interface BatchAccumulatorOptions<T> {
  batchSize: number;
  onFlush: FlushCallback<T>;
  onFlushError?: (error: unknown, batch: T[]) => void;
}

/**
 * Buffers records and hands them to `onFlush` in groups of `batchSize`.
 *
 * Delivery is at-most-once per batch: a failing flush is logged and reported
 * to `onFlushError`, and the batch is dropped rather than re-queued.
 */
export class BatchAccumulator<T> {
  readonly batchSize: number;

  flushedBatches = 0;
  flushedRecords = 0;
  failedBatches = 0;

  private current: T[] = [];
  private readonly onFlush: FlushCallback<T>;
  private readonly onFlushError?: (error: unknown, batch: T[]) => void;

  constructor({ batchSize, onFlush, onFlushError }: BatchAccumulatorOptions<T>) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ConfigurationFailure(
        `batchSize must be a positive integer, got ${batchSize}`,
      );
    }
    this.batchSize = batchSize;
    this.onFlush = onFlush;
    this.onFlushError = onFlushError;
  }

  get pending() {
    return this.current.length;
  }

  // oldest buffered record, undefined when empty
  get head(): T | undefined {
    return this.current[0];
  }

  async add(record: T) {
    this.current.push(record);
    if (this.current.length >= this.batchSize) {
      await this.flush();
    }
  }

  async drain() {
    if (this.current.length) {
      await this.flush();
    }
  }

  private async flush() {
    const batch = this.current;
    this.current = [];

    try {
      await this.onFlush(batch);
      this.flushedBatches++;
      this.flushedRecords += batch.length;
    } catch (e) {
      this.failedBatches++;
      logger.error(
        "Batch flush failed, batch dropped",
        { size: batch.length, ...formatErr(e) },
        "batch",
      );
      if (this.onFlushError) {
        this.onFlushError(e, batch);
      }
    }
  }
}
