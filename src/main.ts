#!/usr/bin/env node

import dotenv from "dotenv";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";

import {
  DEFAULT_EXCLUDE_LOG_CONTEXTS,
  LOG_LEVELS,
  type LogLevel,
  formatErr,
  logger,
} from "./util/logger.js";
import { isHarvestError } from "./util/errors.js";
import { initRedis } from "./util/redis.js";
import { loadSources } from "./util/sources.js";
import connectDB, { disconnectDB } from "./db.js";
import { ConfigManager } from "./services/config-manager.js";
import { RedisCheckpointStore } from "./services/crawler/checkpoint-store.js";
import { GeocodingService } from "./services/geocoding/geocoding-service.js";
import { GoogleMapsGeocoder } from "./services/geocoding/google-maps-geocoder.js";
import { NoopNotifier, SlackNotifier } from "./services/notifier/slack-notifier.js";
import {
  BatchOrchestrator,
  EXIT_INTERRUPTED,
  exitCodeFor,
  htmlExtractorFactory,
} from "./services/orchestrator.js";
import { sourceStats } from "./services/reports.js";
import { HistoryRepository } from "./services/repositories/history-repository.js";
import { ShopRepository } from "./services/repositories/shop-repository.js";

const abort = new AbortController();

function handleTerminate(signame: string) {
  if (abort.signal.aborted) {
    logger.fatal(`${signame} received again, exiting immediately`, {}, "general", EXIT_INTERRUPTED);
  }
  logger.info(
    `${signame} received, stopping after the current page (repeat to force exit)`,
    {},
    "general",
  );
  abort.abort();
}

process.on("SIGINT", () => handleTerminate("SIGINT"));
process.on("SIGTERM", () => handleTerminate("SIGTERM"));

interface GlobalArgs {
  envFile?: string;
  logLevel?: (string | number)[];
  debug?: boolean;
}

function toLogLevels(values: (string | number)[] = []): LogLevel[] {
  return values.flatMap((value) => LOG_LEVELS.filter((level) => level === value));
}

function setup(args: GlobalArgs) {
  dotenv.config(args.envFile ? { path: args.envFile } : undefined);

  const config = new ConfigManager();
  const { settings } = config;

  const debug = Boolean(args.debug) || settings.debugLogging;
  logger.setDebugLogging(debug);
  logger.setExcludeContext(debug ? [] : DEFAULT_EXCLUDE_LOG_CONTEXTS);
  const levels = toLogLevels(args.logLevel);
  logger.setLogLevel(levels.length ? levels : settings.logLevels);

  return config;
}

async function withCheckpoints<T>(
  config: ConfigManager,
  run: (store: RedisCheckpointStore) => Promise<T>,
): Promise<T> {
  const redis = await initRedis(config.settings.redisUrl);
  try {
    return await run(new RedisCheckpointStore(redis, config.settings.checkpointTtlDays));
  } finally {
    redis.disconnect();
  }
}

async function withDB<T>(config: ConfigManager, run: () => Promise<T>): Promise<T> {
  await connectDB(config.settings.mongoUrl);
  try {
    return await run();
  } finally {
    await disconnectDB();
  }
}

async function runCommand(config: ConfigManager, requested: string[], all: boolean) {
  const { settings } = config;
  const sources = loadSources(settings.sourcesFile);
  const selected = all ? sources : config.selectSources(sources, requested);
  const apiKey = config.geocodingApiKey();

  return await withDB(config, () =>
    withCheckpoints(config, async (checkpointStore) => {
      const geocoding = apiKey
        ? new GeocodingService(new GoogleMapsGeocoder(apiKey), {
            useCache: settings.geocoding.useCache,
            rateLimit: { requestsPerSecond: settings.geocoding.requestsPerSecond },
          })
        : null;

      const { webhookUrl } = settings.slack;
      const notifier =
        settings.slack.enabled && webhookUrl
          ? new SlackNotifier(webhookUrl, { channel: settings.slack.channel })
          : new NoopNotifier();

      const orchestrator = new BatchOrchestrator({
        sources,
        crawlConfigFor: (source) => config.crawlConfigFor(source),
        shopStore: new ShopRepository(),
        historyStore: new HistoryRepository(),
        checkpointStore,
        notifier,
        geocoding,
        extractorFactory: htmlExtractorFactory(settings.scraping),
      });

      const { results, errors } = await orchestrator.runAll(
        selected.map((source) => source.id),
        abort.signal,
      );

      for (const result of results) {
        logger.info(
          `${result.sourceId}: ${result.status}`,
          {
            runId: result.runId,
            totalShops: result.totalShops,
            newShops: result.newShops,
            updatedShops: result.updatedShops,
            geocodedShops: result.geocodedShops,
            durationSeconds: result.durationSeconds,
          },
          "job",
        );
      }

      if (geocoding?.cache) {
        logger.info("Geocoding cache", { ...geocoding.cache.stats() }, "geocoding");
      }

      return exitCodeFor(results, errors.length, abort.signal.aborted);
    }),
  );
}

async function main() {
  let exitCode = 0;

  await yargs(hideBin(process.argv))
    .scriptName("shop-harvester")
    .usage("$0 <command> [options]")
    .option("env-file", { type: "string", describe: "Load environment from this file" })
    .option("log-level", {
      type: "array",
      string: true,
      choices: LOG_LEVELS,
      describe: "Only print these log levels",
    })
    .option("debug", { type: "boolean", describe: "Enable debug logging" })
    .command(
      "run",
      "Scrape the selected sources",
      (cmd) =>
        cmd
          .option("source", {
            type: "array",
            string: true,
            default: [],
            describe: "Source id to run (repeatable)",
          })
          .option("all", { type: "boolean", default: false, describe: "Run every source" }),
      async (argv) => {
        const config = setup(argv);
        exitCode = await runCommand(config, argv.source, argv.all);
      },
    )
    .command(
      "progress <source>",
      "Show the saved checkpoint of a source",
      (cmd) => cmd.positional("source", { type: "string", demandOption: true }),
      async (argv) => {
        const config = setup(argv);
        const checkpoint = await withCheckpoints(config, (store) => store.get(argv.source));
        if (checkpoint) {
          logger.info(`Checkpoint for ${argv.source}`, { ...checkpoint }, "checkpoint");
        } else {
          logger.info(`No checkpoint for ${argv.source}`, {}, "checkpoint");
        }
      },
    )
    .command(
      "clear-progress <source>",
      "Delete the saved checkpoint of a source",
      (cmd) => cmd.positional("source", { type: "string", demandOption: true }),
      async (argv) => {
        const config = setup(argv);
        await withCheckpoints(config, (store) => store.clear(argv.source));
      },
    )
    .command(
      "history <source>",
      "List recent runs of a source",
      (cmd) =>
        cmd
          .positional("source", { type: "string", demandOption: true })
          .option("limit", { type: "number", default: 10 }),
      async (argv) => {
        const config = setup(argv);
        await withDB(config, async () => {
          const history = new HistoryRepository();
          const runs = await history.getHistoryBySource(argv.source, argv.limit);
          for (const run of runs) {
            logger.info(`${run.runId}: ${run.status}`, { ...run }, "history");
          }
          logger.info(
            `Status counts for ${argv.source}`,
            await history.countByStatus(argv.source),
            "history",
          );
        });
      },
    )
    .command(
      "stats <source>",
      "Show shop counts and the latest run of a source",
      (cmd) => cmd.positional("source", { type: "string", demandOption: true }),
      async (argv) => {
        const config = setup(argv);
        const stats = await withDB(config, () =>
          sourceStats(argv.source, new ShopRepository(), new HistoryRepository()),
        );
        logger.info(`Stats for ${argv.source}`, { ...stats }, "history");
      },
    )
    .command(
      "shop <shopId>",
      "Show a stored shop, optionally marking it inactive",
      (cmd) =>
        cmd
          .positional("shopId", { type: "string", demandOption: true })
          .option("deactivate", {
            type: "boolean",
            default: false,
            describe: "Mark the shop as no longer listed",
          }),
      async (argv) => {
        const config = setup(argv);
        await withDB(config, async () => {
          const shops = new ShopRepository();
          const shop = await shops.getById(argv.shopId);
          if (!shop) {
            logger.warn(`No shop ${argv.shopId}`, {}, "mongo");
            exitCode = 1;
            return;
          }
          logger.info(`Shop ${argv.shopId}`, { ...shop }, "mongo");
          if (argv.deactivate) {
            await shops.deactivate(argv.shopId);
          }
        });
      },
    )
    .demandCommand(1)
    .strict()
    .parseAsync();

  return exitCode;
}

try {
  process.exitCode = await main();
} catch (e) {
  logger.error(isHarvestError(e) ? e.message : "Unexpected error", formatErr(e), "general");
  process.exitCode = 1;
}
