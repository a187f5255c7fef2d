import { logger } from "../../util/logger.js";
import { normalizeAddress } from "../../util/text.js";

export interface GeoLocation {
  latitude: number;
  longitude: number;
  formattedAddress?: string | null;
  placeId?: string | null;
}

export interface Geocoder {
  geocode(address: string): Promise<GeoLocation | null>;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  totalRequests: number;
  hitRatePercent: number;
}

/**
 * Memoizes address lookups, including "not found" results, so repeated
 * misses for an unresolvable address do not hit the underlying geocoder again.
 */
export class GeocodingCache implements Geocoder {
  hits = 0;
  misses = 0;

  private readonly cache = new Map<string, GeoLocation | null>();
  private readonly geocoder: Geocoder;

  constructor(geocoder: Geocoder) {
    this.geocoder = geocoder;
  }

  get size() {
    return this.cache.size;
  }

  get hitRate() {
    const total = this.hits + this.misses;
    return total > 0 ? this.hits / total : 0;
  }

  async geocode(address: string): Promise<GeoLocation | null> {
    if (!address) {
      return null;
    }

    const cacheKey = normalizeAddress(address);

    if (this.cache.has(cacheKey)) {
      this.hits++;
      logger.debug("Cache hit", { address }, "geocoding");
      return this.cache.get(cacheKey) ?? null;
    }

    this.misses++;
    logger.debug("Cache miss", { address }, "geocoding");

    const location = await this.geocoder.geocode(address);
    this.cache.set(cacheKey, location);

    return location;
  }

  async prefetch(addresses: string[]) {
    const unique = [...new Set(addresses)].filter(
      (address) => address && !this.cache.has(normalizeAddress(address)),
    );

    logger.info(`Prefetching ${unique.length} unique addresses`, {}, "geocoding");

    for (const address of unique) {
      await this.geocode(address);
    }
  }

  stats(): CacheStats {
    const totalRequests = this.hits + this.misses;
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      totalRequests,
      hitRatePercent: Math.round(this.hitRate * 10000) / 100,
    };
  }

  clear() {
    const size = this.cache.size;
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
    logger.info(`Cache cleared: ${size} entries removed`, {}, "geocoding");
  }
}
