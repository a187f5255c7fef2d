import axios, { type AxiosInstance } from "axios";

import { logger } from "../../util/logger.js";
import { EnrichmentFailure, errorMessage } from "../../util/errors.js";
import type { GeoLocation, Geocoder } from "./cache-geocoder.js";

const GEOCODE_URL = "https://maps.googleapis.com/maps/api/geocode/json";

interface GeocodeResult {
  formatted_address?: string;
  place_id?: string;
  geometry?: { location?: { lat?: number; lng?: number } };
}

interface GeocodeResponse {
  status: string;
  error_message?: string;
  results?: GeocodeResult[];
}

export interface GoogleMapsGeocoderOptions {
  region?: string;
  language?: string;
  timeoutMs?: number;
  client?: AxiosInstance;
}

export function toGeoLocation(result: GeocodeResult): GeoLocation | null {
  const lat = result.geometry?.location?.lat;
  const lng = result.geometry?.location?.lng;

  if (typeof lat !== "number" || typeof lng !== "number") {
    return null;
  }

  return {
    latitude: lat,
    longitude: lng,
    formattedAddress: result.formatted_address ?? null,
    placeId: result.place_id ?? null,
  };
}

export class GoogleMapsGeocoder implements Geocoder {
  private readonly apiKey: string;
  private readonly region: string;
  private readonly language: string;
  private readonly client: AxiosInstance;

  constructor(apiKey: string, options: GoogleMapsGeocoderOptions = {}) {
    this.apiKey = apiKey;
    this.region = options.region ?? "jp";
    this.language = options.language ?? "ja";
    this.client =
      options.client ?? axios.create({ timeout: options.timeoutMs ?? 10_000 });
  }

  async geocode(address: string): Promise<GeoLocation | null> {
    if (!address) {
      logger.warn("Empty address provided for geocoding", {}, "geocoding");
      return null;
    }

    let data: GeocodeResponse;
    try {
      const response = await this.client.get<GeocodeResponse>(GEOCODE_URL, {
        params: {
          address,
          key: this.apiKey,
          region: this.region,
          language: this.language,
        },
      });
      data = response.data;
    } catch (e) {
      throw new EnrichmentFailure(`Geocoding request failed: ${errorMessage(e)}`, {
        cause: e,
        details: { address },
      });
    }

    switch (data.status) {
      case "OK":
        break;
      case "ZERO_RESULTS":
        logger.warn("No geocoding results", { address }, "geocoding");
        return null;
      default:
        throw new EnrichmentFailure(
          `Geocoding API error: ${data.status}${data.error_message ? ` (${data.error_message})` : ""}`,
          { details: { address, status: data.status } },
        );
    }

    const first = data.results?.[0];
    const location = first ? toGeoLocation(first) : null;

    if (!location) {
      logger.warn("Invalid geocoding result (missing lat/lng)", { address }, "geocoding");
      return null;
    }

    logger.debug(
      "Geocoded",
      { address, latitude: location.latitude, longitude: location.longitude },
      "geocoding",
    );
    return location;
  }
}
