import { formatErr, logger } from "../../util/logger.js";
import { EnrichmentFailure, errorMessage } from "../../util/errors.js";
import { RateLimiter, type RateLimitOptions } from "../crawler/rate-limiter.js";
import { hasCoordinates, type ShopRecord } from "../crawler/records.js";
import { type GeoLocation, GeocodingCache, type Geocoder } from "./cache-geocoder.js";

export interface GeocodingStats {
  success: number;
  failure: number;
  skipped: number;
  total: number;
  // lookups the geocoding service itself rejected or failed on
  errors: EnrichmentFailure[];
}

export interface GeocodingServiceOptions {
  useCache?: boolean;
  rateLimit?: RateLimitOptions;
  rateLimiter?: RateLimiter;
  now?: () => Date;
}

// Waits on the limiter before each lookup that reaches the wrapped geocoder.
// Sits under the cache, so cache hits are not paced.
export class PacedGeocoder implements Geocoder {
  readonly geocoder: Geocoder;
  readonly rateLimiter: RateLimiter;

  constructor(geocoder: Geocoder, rateLimiter: RateLimiter) {
    this.geocoder = geocoder;
    this.rateLimiter = rateLimiter;
  }

  async geocode(address: string): Promise<GeoLocation | null> {
    await this.rateLimiter.wait();
    return this.geocoder.geocode(address);
  }
}

export class GeocodingService {
  readonly geocoder: Geocoder;
  readonly cache: GeocodingCache | null;

  private readonly now: () => Date;

  constructor(geocoder: Geocoder, options: GeocodingServiceOptions = {}) {
    const useCache = options.useCache ?? true;
    const rateLimiter =
      options.rateLimiter ??
      new RateLimiter(options.rateLimit ?? { requestsPerSecond: 50 });
    const paced = new PacedGeocoder(geocoder, rateLimiter);
    this.cache = useCache ? new GeocodingCache(paced) : null;
    this.geocoder = this.cache ?? paced;
    this.now = options.now ?? (() => new Date());

    logger.info(
      "GeocodingService initialized",
      { cache: useCache, minWait: rateLimiter.minWait },
      "geocoding",
    );
  }

  // source name prefixed to the street address improves match precision
  fullAddress(record: ShopRecord) {
    return `${record.sourceName}${record.address ?? ""}`;
  }

  /**
   * Resolves coordinates for one record in place. Returns false when the
   * record has no address or the address could not be resolved.
   */
  async geocodeRecord(record: ShopRecord): Promise<boolean> {
    if (!record.address) {
      logger.debug("Record has no address, skipping", { key: record.key }, "geocoding");
      return false;
    }

    const address = this.fullAddress(record);
    const location = await this.geocoder.geocode(address);

    if (!location) {
      logger.warn("Failed to geocode record", { key: record.key, address }, "geocoding");
      return false;
    }

    record.latitude = location.latitude;
    record.longitude = location.longitude;
    record.geocodedAt = this.now();
    return true;
  }

  async geocodeBatch(records: ShopRecord[]): Promise<GeocodingStats> {
    const stats: GeocodingStats = {
      success: 0,
      failure: 0,
      skipped: 0,
      total: records.length,
      errors: [],
    };

    for (const record of records) {
      if (hasCoordinates(record)) {
        stats.skipped++;
        continue;
      }

      try {
        if (await this.geocodeRecord(record)) {
          stats.success++;
        } else {
          stats.failure++;
        }
      } catch (e) {
        stats.failure++;
        const failure =
          e instanceof EnrichmentFailure
            ? e
            : new EnrichmentFailure(`Unexpected geocoding error: ${errorMessage(e)}`, {
                cause: e,
                details: { key: record.key },
              });
        stats.errors.push(failure);
        logger.error(
          "Geocoding error",
          { key: record.key, ...formatErr(failure) },
          "geocoding",
        );
      }
    }

    logger.info(
      "Batch geocoding completed",
      {
        success: stats.success,
        failure: stats.failure,
        skipped: stats.skipped,
        errors: stats.errors.length,
      },
      "geocoding",
    );

    return stats;
  }
}
