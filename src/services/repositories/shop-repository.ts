import { logger } from "../../util/logger.js";
import { PersistenceFailure, errorMessage } from "../../util/errors.js";
import { ShopModel, type ShopDoc, toShopUpdate } from "../../models/shop.js";
import { type ShopRecord, validateShopRecord } from "../crawler/records.js";
import type { ShopStore, UpsertResult } from "../ingestion-job.js";

export interface UpsertPlan extends UpsertResult {
  valid: ShopRecord[];
  skipped: number;
}

// Splits a batch into records to write and counts which of them already exist.
// A key repeated within the batch is written once.
export function planUpserts(records: ShopRecord[], existingIds: Set<string>): UpsertPlan {
  const plan: UpsertPlan = { valid: [], skipped: 0, created: 0, updated: 0 };
  const inBatch = new Set<string>();

  for (const record of records) {
    const invalid = validateShopRecord(record);
    if (invalid) {
      logger.warn(`Skipping invalid shop ${record.key}`, { reason: invalid }, "mongo");
      plan.skipped++;
      continue;
    }

    if (inBatch.has(record.key)) {
      plan.skipped++;
      continue;
    }
    inBatch.add(record.key);

    if (existingIds.has(record.key)) {
      plan.updated++;
    } else {
      plan.created++;
    }
    plan.valid.push(record);
  }

  return plan;
}

export class ShopRepository implements ShopStore {
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async upsertBatch(records: ShopRecord[]): Promise<UpsertResult> {
    if (!records.length) {
      logger.info("No shops to save", {}, "mongo");
      return { created: 0, updated: 0 };
    }

    try {
      const existing = await ShopModel.find(
        { shopId: { $in: records.map((record) => record.key) } },
        { shopId: 1 },
      ).lean();
      const existingIds = new Set(existing.map((doc) => doc.shopId));

      const plan = planUpserts(records, existingIds);
      if (!plan.valid.length) {
        return { created: 0, updated: 0 };
      }

      const now = this.now();
      await ShopModel.bulkWrite(
        plan.valid.map((record) => ({
          updateOne: {
            filter: { shopId: record.key },
            update: {
              $set: toShopUpdate(record, now),
              $setOnInsert: { scrapedAt: record.scrapedAt },
            },
            upsert: true,
          },
        })),
        { ordered: false },
      );

      logger.info(
        "Batch save completed",
        { created: plan.created, updated: plan.updated, skipped: plan.skipped },
        "mongo",
      );

      return { created: plan.created, updated: plan.updated };
    } catch (e) {
      throw new PersistenceFailure(`Failed to batch save shops: ${errorMessage(e)}`, {
        cause: e,
        details: { size: records.length },
      });
    }
  }

  async getById(shopId: string): Promise<ShopDoc | null> {
    try {
      return await ShopModel.findOne({ shopId }).lean<ShopDoc | null>();
    } catch (e) {
      throw new PersistenceFailure(`Failed to get shop ${shopId}: ${errorMessage(e)}`, {
        cause: e,
      });
    }
  }

  async countBySource(sourceId: string, activeOnly = true): Promise<number> {
    const filter = activeOnly ? { sourceId, isActive: true } : { sourceId };
    try {
      const count = await ShopModel.countDocuments(filter);
      logger.info(`Source ${sourceId} has ${count} shops`, {}, "mongo");
      return count;
    } catch (e) {
      throw new PersistenceFailure(
        `Failed to count shops for ${sourceId}: ${errorMessage(e)}`,
        { cause: e },
      );
    }
  }

  async deactivate(shopId: string): Promise<boolean> {
    try {
      const res = await ShopModel.updateOne(
        { shopId },
        { $set: { isActive: false, updatedAt: this.now() } },
      );
      logger.info(`Shop deactivated: ${shopId}`, { matched: res.matchedCount }, "mongo");
      return res.matchedCount > 0;
    } catch (e) {
      throw new PersistenceFailure(`Failed to deactivate shop ${shopId}: ${errorMessage(e)}`, {
        cause: e,
      });
    }
  }
}
