import { z } from "zod";

import { LOG_LEVELS, type LogLevel, logger } from "../util/logger.js";
import { ConfigurationFailure } from "../util/errors.js";
import { readSecret } from "../util/secrets.js";
import { formatIssues } from "../util/sources.js";
import type { CrawlConfig } from "./crawler/interfaces.js";
import type { SourceDefinition } from "../util/sources.js";

type Env = Record<string, string | undefined>;

const envBoolean = (defaultValue: boolean) =>
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .optional()
    .transform((value) =>
      value === undefined ? defaultValue : ["true", "1", "yes"].includes(value),
    );

const csvList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? "")
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean),
  );

const EnvSchema = z
  .object({
    MONGO_URL: z.string().min(1).default("mongodb://localhost:27017/shops"),
    REDIS_URL: z
      .string()
      .default("redis://localhost:6379/0")
      .refine((url) => url.startsWith("redis://") || url.startsWith("rediss://"), {
        message: "must start with redis:// or rediss://",
      }),
    SOURCES_FILE: z.string().min(1).default("config/sources.yaml"),
    TARGET_SOURCES: csvList,
    BATCH_SIZE: z.coerce.number().int().min(1).default(50),
    SCRAPING_TIMEOUT_SECS: z.coerce.number().positive().default(20),
    SCRAPING_RETRY: z.coerce.number().int().min(0).default(3),
    SCRAPING_USER_AGENT: z
      .string()
      .default("Mozilla/5.0 (compatible; shop-harvester/1.0)"),
    SCRAPING_MIN_WAIT: z.coerce.number().min(0).default(1.0),
    SCRAPING_MAX_WAIT: z.coerce.number().min(0).default(1.8),
    GEOCODING_ENABLED: envBoolean(true),
    GEOCODING_CACHE_ENABLED: envBoolean(true),
    GEOCODING_RATE_LIMIT: z.coerce.number().positive().default(50),
    SLACK_ENABLED: envBoolean(true),
    SLACK_CHANNEL: z.string().optional(),
    LOG_LEVEL: csvList.pipe(z.array(z.enum(LOG_LEVELS))),
    DEBUG_LOGGING: envBoolean(false),
    CHECKPOINT_TTL_DAYS: z.coerce.number().positive().default(30),
  })
  .refine((env) => env.SCRAPING_MIN_WAIT <= env.SCRAPING_MAX_WAIT, {
    message: "SCRAPING_MIN_WAIT must not exceed SCRAPING_MAX_WAIT",
    path: ["SCRAPING_MIN_WAIT"],
  });

export interface AppSettings {
  mongoUrl: string;
  redisUrl: string;
  sourcesFile: string;
  targetSources: string[];
  batchSize: number;
  scraping: {
    timeoutSecs: number;
    retries: number;
    userAgent: string;
    minWait: number;
    maxWait: number;
  };
  geocoding: {
    enabled: boolean;
    useCache: boolean;
    requestsPerSecond: number;
    apiKey: string | null;
  };
  slack: {
    enabled: boolean;
    webhookUrl: string | null;
    channel?: string;
  };
  // levels to print; empty prints all
  logLevels: LogLevel[];
  debugLogging: boolean;
  checkpointTtlDays: number;
}

export class ConfigManager {
  readonly settings: AppSettings;

  constructor(env: Env = process.env) {
    this.settings = ConfigManager.parse(env);
  }

  static parse(env: Env): AppSettings {
    // an empty variable counts as unset
    const present = Object.fromEntries(
      Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
    );
    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
      throw new ConfigurationFailure(`Invalid settings: ${formatIssues(parsed.error)}`);
    }
    const values = parsed.data;

    const apiKey = readSecret("GOOGLE_MAPS_API_KEY", env);

    const webhookUrl = readSecret("SLACK_WEBHOOK_URL", env);
    const slackEnabled = values.SLACK_ENABLED && webhookUrl !== null;
    if (values.SLACK_ENABLED && !webhookUrl) {
      logger.warn("SLACK_WEBHOOK_URL not set, Slack notifications disabled", {}, "config");
    }

    return {
      mongoUrl: values.MONGO_URL,
      redisUrl: values.REDIS_URL,
      sourcesFile: values.SOURCES_FILE,
      targetSources: values.TARGET_SOURCES,
      batchSize: values.BATCH_SIZE,
      scraping: {
        timeoutSecs: values.SCRAPING_TIMEOUT_SECS,
        retries: values.SCRAPING_RETRY,
        userAgent: values.SCRAPING_USER_AGENT,
        minWait: values.SCRAPING_MIN_WAIT,
        maxWait: values.SCRAPING_MAX_WAIT,
      },
      geocoding: {
        enabled: values.GEOCODING_ENABLED,
        useCache: values.GEOCODING_CACHE_ENABLED,
        requestsPerSecond: values.GEOCODING_RATE_LIMIT,
        apiKey,
      },
      slack: {
        enabled: slackEnabled,
        webhookUrl,
        channel: values.SLACK_CHANNEL,
      },
      logLevels: values.LOG_LEVEL,
      debugLogging: values.DEBUG_LOGGING,
      checkpointTtlDays: values.CHECKPOINT_TTL_DAYS,
    };
  }

  // Maps API key for a run that geocodes, null when geocoding is disabled.
  // Only commands that geocode ask for it.
  geocodingApiKey(): string | null {
    const { enabled, apiKey } = this.settings.geocoding;
    if (!enabled) {
      return null;
    }
    if (!apiKey) {
      throw new ConfigurationFailure(
        "GOOGLE_MAPS_API_KEY (or GOOGLE_MAPS_API_KEY_FILE) is required when geocoding is enabled",
      );
    }
    return apiKey;
  }

  // source settings win over the global scraping defaults
  crawlConfigFor(source: SourceDefinition): CrawlConfig {
    const { scraping, batchSize } = this.settings;
    return {
      batchSize,
      pagination: {
        startPage: source.pagination.startPage,
        endPage: source.pagination.endPage,
        maxEmptyPages: source.pagination.maxEmptyPages,
        maxDuplicatePages: source.pagination.maxDuplicatePages,
        maxPages: source.pagination.maxPages,
      },
      rateLimit: source.rateLimit ?? {
        minWait: scraping.minWait,
        maxWait: scraping.maxWait,
      },
    };
  }

  selectSources(sources: SourceDefinition[], requested: string[] = []): SourceDefinition[] {
    const wanted = requested.length ? requested : this.settings.targetSources;
    if (!wanted.length) {
      return sources;
    }

    const byId = new Map(sources.map((source) => [source.id, source]));
    const unknown = wanted.filter((id) => !byId.has(id));
    if (unknown.length) {
      throw new ConfigurationFailure(`Unknown source(s): ${unknown.join(", ")}`, {
        details: { available: [...byId.keys()] },
      });
    }
    return sources.filter((source) => wanted.includes(source.id));
  }
}
