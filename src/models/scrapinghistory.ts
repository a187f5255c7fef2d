import mongoose, { Schema } from "mongoose";

import type { StopReason } from "../services/crawler/interfaces.js";

export const RUN_STATUSES = [
  "pending",
  "running",
  "success",
  "partial",
  "failed",
] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

// Summary of one ingestion run, saved to history once it reaches a terminal status
export interface CrawlRunResult {
  runId: string;
  sourceId: string;
  sourceName: string;
  startedAt: Date;
  completedAt: Date | null;
  status: RunStatus;
  totalShops: number;
  newShops: number;
  updatedShops: number;
  geocodedShops: number;
  geocodingErrors: number;
  errors: string[];
  durationSeconds: number | null;
  resumedFromPage: number | null;
  lastPage: number | null;
  stopReason: StopReason | null;
}

// `errors` is a reserved path on mongoose documents
export interface ScrapingHistoryDoc extends Omit<CrawlRunResult, "errors"> {
  errorMessages: string[];
  createdAt: Date;
}

const ScrapingHistorySchema = new Schema<ScrapingHistoryDoc>(
  {
    runId: { type: String, required: true, unique: true },
    sourceId: { type: String, required: true, index: true },
    sourceName: { type: String, required: true },
    startedAt: { type: Date, required: true },
    completedAt: { type: Date, default: null },
    status: { type: String, enum: RUN_STATUSES, required: true },
    totalShops: { type: Number, default: 0 },
    newShops: { type: Number, default: 0 },
    updatedShops: { type: Number, default: 0 },
    geocodedShops: { type: Number, default: 0 },
    geocodingErrors: { type: Number, default: 0 },
    errorMessages: { type: [String], default: [] },
    durationSeconds: { type: Number, default: null },
    resumedFromPage: { type: Number, default: null },
    lastPage: { type: Number, default: null },
    stopReason: { type: String, default: null },
    createdAt: { type: Date, default: Date.now },
  },
  { collection: "scraping_history" },
);

ScrapingHistorySchema.index({ sourceId: 1, startedAt: -1 });

export const ScrapingHistoryModel = mongoose.model<ScrapingHistoryDoc>(
  "ScrapingHistory",
  ScrapingHistorySchema,
);

export function toHistoryDoc(result: CrawlRunResult): Omit<ScrapingHistoryDoc, "createdAt"> {
  const { errors, ...rest } = result;
  return { ...rest, errorMessages: errors };
}

export function fromHistoryDoc(doc: ScrapingHistoryDoc): CrawlRunResult {
  return {
    runId: doc.runId,
    sourceId: doc.sourceId,
    sourceName: doc.sourceName,
    startedAt: doc.startedAt,
    completedAt: doc.completedAt ?? null,
    status: doc.status,
    totalShops: doc.totalShops,
    newShops: doc.newShops,
    updatedShops: doc.updatedShops,
    geocodedShops: doc.geocodedShops,
    geocodingErrors: doc.geocodingErrors,
    errors: doc.errorMessages ?? [],
    durationSeconds: doc.durationSeconds ?? null,
    resumedFromPage: doc.resumedFromPage ?? null,
    lastPage: doc.lastPage ?? null,
    stopReason: doc.stopReason ?? null,
  };
}
