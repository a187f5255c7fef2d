import { logger } from "../../util/logger.js";
import { ConfigurationFailure } from "../../util/errors.js";
import { sleep } from "../../util/timing.js";

export type RateLimitOptions =
  | { minWait: number; maxWait: number }
  | { requestsPerSecond: number };

export interface RateLimiterDeps {
  now?: () => number;
  sleep?: (seconds: number) => Promise<void>;
  random?: () => number;
}

export function resolveWaitRange(options: RateLimitOptions): {
  minWait: number;
  maxWait: number;
} {
  if ("requestsPerSecond" in options) {
    const rps = options.requestsPerSecond;
    if (!(rps > 0)) {
      throw new ConfigurationFailure(
        `requestsPerSecond must be positive, got ${rps}`,
      );
    }
    const waitTime = 1 / rps;
    return { minWait: waitTime * 0.8, maxWait: waitTime * 1.2 };
  }

  const { minWait, maxWait } = options;
  if (minWait < 0 || maxWait < 0 || minWait > maxWait) {
    throw new ConfigurationFailure(
      `Invalid wait range [${minWait}, ${maxWait}]`,
    );
  }
  return { minWait, maxWait };
}

/**
 * Paces successive outbound requests with a jittered delay.
 *
 * Each `wait()` resolves once a random interval in `[minWait, maxWait]`
 * seconds has passed since the previous call completed. The first call
 * never blocks. There is no retry or backoff here.
 */
export class RateLimiter {
  readonly minWait: number;
  readonly maxWait: number;

  private lastRequestTime: number | null = null;
  private readonly now: () => number;
  private readonly sleeper: (seconds: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: RateLimitOptions, deps: RateLimiterDeps = {}) {
    const { minWait, maxWait } = resolveWaitRange(options);
    this.minWait = minWait;
    this.maxWait = maxWait;
    this.now = deps.now ?? Date.now;
    this.sleeper = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;

    logger.debug(
      "RateLimiter initialized",
      { minWait: this.minWait, maxWait: this.maxWait },
      "rateLimit",
    );
  }

  nextInterval(): number {
    return this.minWait + this.random() * (this.maxWait - this.minWait);
  }

  async wait(): Promise<void> {
    if (this.lastRequestTime !== null) {
      const elapsed = (this.now() - this.lastRequestTime) / 1000;
      const waitTime = this.nextInterval();

      if (elapsed < waitTime) {
        const duration = waitTime - elapsed;
        logger.debug(
          `Rate limiting: sleeping for ${duration.toFixed(2)}s`,
          {},
          "rateLimit",
        );
        await this.sleeper(duration);
      }
    }

    this.lastRequestTime = this.now();
  }

  reset() {
    this.lastRequestTime = null;
    logger.debug("RateLimiter reset", {}, "rateLimit");
  }
}

// one-off jittered pause outside a limiter, e.g. between sources
export async function politeSleep(
  minSeconds = 1.0,
  maxSeconds = 2.0,
  random: () => number = Math.random,
) {
  const duration = minSeconds + random() * (maxSeconds - minSeconds);
  logger.debug(`Polite sleep: ${duration.toFixed(2)}s`, {}, "rateLimit");
  await sleep(duration);
}
