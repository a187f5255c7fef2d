import mongoose, { Schema } from "mongoose";

import type { ShopRecord } from "../services/crawler/records.js";

export interface ShopDoc {
  shopId: string;
  sourceId: string;
  sourceName: string;
  detailUrl: string;
  name: string;
  address: string | null;
  phone: string | null;
  businessHours: string | null;
  closedDays: string | null;
  website: string | null;
  benefits: string | null;
  description: string | null;
  parking: string | null;
  postalCode: string | null;
  category: string | null;
  genre: string | null;
  latitude: number | null;
  longitude: number | null;
  geocodedAt: Date | null;
  searchTerms: string[];
  extraFields: Record<string, string>;
  isActive: boolean;
  scrapedAt: Date;
  updatedAt: Date;
}

const nullableString = { type: String, default: null };

const ShopSchema = new Schema<ShopDoc>(
  {
    shopId: { type: String, required: true, unique: true },
    sourceId: { type: String, required: true, index: true },
    sourceName: { type: String, required: true },
    detailUrl: { type: String, required: true },
    name: { type: String, required: true },
    address: nullableString,
    phone: nullableString,
    businessHours: nullableString,
    closedDays: nullableString,
    website: nullableString,
    benefits: nullableString,
    description: nullableString,
    parking: nullableString,
    postalCode: nullableString,
    category: nullableString,
    genre: nullableString,
    latitude: { type: Number, default: null },
    longitude: { type: Number, default: null },
    geocodedAt: { type: Date, default: null },
    searchTerms: { type: [String], default: [], index: true },
    extraFields: { type: Schema.Types.Mixed, default: {} },
    isActive: { type: Boolean, default: true },
    scrapedAt: { type: Date, required: true },
    updatedAt: { type: Date, default: Date.now },
  },
  { collection: "shops", minimize: false },
);

export const ShopModel = mongoose.model<ShopDoc>("Shop", ShopSchema);

// fields overwritten on every upsert; scrapedAt is only set on insert
export function toShopUpdate(record: ShopRecord, now: Date): Omit<ShopDoc, "scrapedAt"> {
  return {
    shopId: record.key,
    sourceId: record.sourceId,
    sourceName: record.sourceName,
    detailUrl: record.detailUrl,
    name: record.name,
    address: record.address ?? null,
    phone: record.phone ?? null,
    businessHours: record.businessHours ?? null,
    closedDays: record.closedDays ?? null,
    website: record.website ?? null,
    benefits: record.benefits ?? null,
    description: record.description ?? null,
    parking: record.parking ?? null,
    postalCode: record.postalCode ?? null,
    category: record.category ?? null,
    genre: record.genre ?? null,
    latitude: record.latitude,
    longitude: record.longitude,
    geocodedAt: record.geocodedAt,
    searchTerms: record.searchTerms,
    extraFields: record.extraFields,
    isActive: true,
    updatedAt: now,
  };
}
