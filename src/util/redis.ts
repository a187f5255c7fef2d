import { Redis } from "ioredis";

import { formatErr, logger } from "./logger.js";
import { ConfigurationFailure } from "./errors.js";

const error = console.error;

let lastLogTime = 0;

// log only once every 10 seconds
const REDIS_ERROR_LOG_INTERVAL_MS = 10000;

console.error = function (...args) {
  if (
    typeof args[0] === "string" &&
    args[0].indexOf("[ioredis] Unhandled error event") === 0
  ) {
    const now = Date.now();

    if (now - lastLogTime > REDIS_ERROR_LOG_INTERVAL_MS) {
      logger.warn("ioredis error", { error: args[0] }, "redis");
      lastLogTime = now;
    }
    return;
  }
  error.call(console, ...args);
};

export function checkRedisUrl(url: string) {
  if (!url.startsWith("redis://") && !url.startsWith("rediss://")) {
    throw new ConfigurationFailure(
      "REDIS_URL must start with redis:// or rediss://",
    );
  }
}

export async function initRedis(url: string, maxAttempts = 3) {
  checkRedisUrl(url);

  const redis = new Redis(url, {
    lazyConnect: true,
    connectTimeout: 5000,
    retryStrategy(times) {
      if (times > maxAttempts) {
        logger.error(`Redis connection failed after ${maxAttempts} attempts`, {}, "redis");
        return null;
      }
      return Math.min(times * 1000, 3000);
    },
  });

  redis.on("error", (err) => {
    logger.error("Redis error", { error: err.message }, "redis");
  });

  try {
    await redis.connect();

    const ping = await redis.ping();
    if (ping !== "PONG") {
      throw new Error("Redis did not answer PONG");
    }
  } catch (e) {
    logger.error("Unable to connect to Redis", formatErr(e), "redis");
    redis.disconnect();
    throw e;
  }

  logger.debug("Redis connected", {}, "redis");
  return redis;
}
