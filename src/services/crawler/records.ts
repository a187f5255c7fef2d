import { createHash } from "node:crypto";

import type { CrawlRecord } from "./interfaces.js";

export interface ShopFields {
  name: string;
  address?: string | null;
  phone?: string | null;
  businessHours?: string | null;
  closedDays?: string | null;
  website?: string | null;
  benefits?: string | null;
  description?: string | null;
  parking?: string | null;
  postalCode?: string | null;
  category?: string | null;
  genre?: string | null;
}

export interface ShopRecord extends CrawlRecord, ShopFields {
  sourceId: string;
  sourceName: string;
  detailUrl: string;
  latitude: number | null;
  longitude: number | null;
  geocodedAt: Date | null;
  scrapedAt: Date;
  searchTerms: string[];
  extraFields: Record<string, string>;
}

// `<sourceId>_<first 8 hex chars of sha256(detailUrl)>`; stable across runs so
// repeated crawls upsert instead of duplicating
export function generateShopId(sourceId: string, detailUrl: string): string {
  const hash = createHash("sha256").update(detailUrl, "utf8").digest("hex");
  return `${sourceId}_${hash.slice(0, 8)}`;
}

const ADDRESS_UNITS = ["市", "区", "町", "村"];

export function buildSearchTerms(fields: ShopFields): string[] {
  const terms: string[] = [];

  if (fields.name) {
    terms.push(fields.name);
  }

  if (fields.address) {
    for (const unit of ADDRESS_UNITS) {
      const idx = fields.address.indexOf(unit);
      if (idx >= 0) {
        terms.push(fields.address.slice(0, idx + 1));
      }
    }
  }

  if (fields.category) {
    terms.push(fields.category);
  }

  if (fields.genre) {
    terms.push(fields.genre);
  }

  return [...new Set(terms)];
}

export function createShopRecord(
  source: { id: string; name: string },
  detailUrl: string,
  fields: ShopFields,
  extraFields: Record<string, string> = {},
  scrapedAt = new Date(),
): ShopRecord {
  return {
    ...fields,
    key: generateShopId(source.id, detailUrl),
    sourceId: source.id,
    sourceName: source.name,
    detailUrl,
    latitude: null,
    longitude: null,
    geocodedAt: null,
    scrapedAt,
    searchTerms: buildSearchTerms(fields),
    extraFields,
  };
}

export function validateShopRecord(record: ShopRecord): string | null {
  if (!record.key) {
    return "key is required";
  }
  if (!record.sourceId) {
    return "sourceId is required";
  }
  if (!record.name) {
    return "name is required";
  }
  if (!record.key.includes("_")) {
    return `Invalid key format: ${record.key} (expected <sourceId>_<hash>)`;
  }
  return null;
}

export function hasCoordinates(record: ShopRecord) {
  return record.latitude !== null && record.longitude !== null;
}
