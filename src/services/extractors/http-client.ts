import axios, { type AxiosInstance, isAxiosError } from "axios";

import { logger } from "../../util/logger.js";
import { TransportFailure, errorMessage } from "../../util/errors.js";
import { sleep } from "../../util/timing.js";

export const RETRY_STATUSES = [500, 502, 503, 504];

export interface PageFetcher {
  fetchText(url: string): Promise<string>;
}

export interface HttpClientOptions {
  timeoutSecs?: number;
  retries?: number;
  userAgent?: string;
  // label passed to TextDecoder, e.g. "shift_jis"
  encoding?: string;
  backoffFactor?: number;
  client?: AxiosInstance;
  sleep?: (seconds: number) => Promise<void>;
}

export function backoffDelay(attempt: number, factor = 0.5) {
  return factor * 2 ** attempt;
}

function isRetryable(e: unknown) {
  if (!isAxiosError(e)) {
    return false;
  }
  // no response: connection reset, timeout, DNS
  if (!e.response) {
    return true;
  }
  return RETRY_STATUSES.includes(e.response.status);
}

export class HttpClient implements PageFetcher {
  private readonly client: AxiosInstance;
  private readonly retries: number;
  private readonly decoder: TextDecoder;
  private readonly backoffFactor: number;
  private readonly sleeper: (seconds: number) => Promise<void>;

  constructor(options: HttpClientOptions = {}) {
    this.retries = options.retries ?? 3;
    this.backoffFactor = options.backoffFactor ?? 0.5;
    this.sleeper = options.sleep ?? sleep;
    this.decoder = new TextDecoder(options.encoding ?? "utf-8");
    this.client =
      options.client ??
      axios.create({
        timeout: (options.timeoutSecs ?? 20) * 1000,
        responseType: "arraybuffer",
        headers: {
          "User-Agent": options.userAgent ?? "Mozilla/5.0 (compatible; shop-harvester/1.0)",
          "Accept-Language": "ja,en;q=0.8",
        },
      });
  }

  async fetchBytes(url: string): Promise<ArrayBuffer> {
    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.client.get<ArrayBuffer>(url, {
          responseType: "arraybuffer",
        });
        return response.data;
      } catch (e) {
        const status = isAxiosError(e) ? e.response?.status : undefined;

        if (attempt < this.retries && isRetryable(e)) {
          const delay = backoffDelay(attempt, this.backoffFactor);
          logger.warn(
            `Request failed, retrying in ${delay}s`,
            { url, status, attempt: attempt + 1, error: errorMessage(e) },
            "extractor",
          );
          await this.sleeper(delay);
          continue;
        }

        throw new TransportFailure(`Failed to fetch ${url}: ${errorMessage(e)}`, status, {
          cause: e,
          details: { url, attempts: attempt + 1 },
        });
      }
    }
  }

  async fetchText(url: string): Promise<string> {
    const bytes = await this.fetchBytes(url);
    return this.decoder.decode(bytes);
  }
}
