#!/usr/bin/env node
import { resolve } from "node:path";
import { USAGE, parseCliArgs } from "./cli";
import type { CliOptions } from "./cli";
import { buildSourceRegistry, loadConfig } from "./config";
import { aggregationOptionsFromConfig, runAggregation } from "./coordinator";
import { createDatabase } from "./db";
import { registerShutdownHandlers } from "./lifecycle";
import { createLogger } from "./logger";
import { createJsonRenderer } from "./output";
import { createCacheStore } from "./pipeline";
import { createAggregationScheduler } from "./scheduler";

async function main(): Promise<void> {
  let args: CliOptions;
  try {
    args = parseCliArgs(process.argv.slice(2), process.env);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${message}\n\n${USAGE}`);
    process.exit(1);
  }

  const logger = createLogger({ verbose: args.verbose });

  logger.info({ configPath: args.configPath }, "feedmill starting");

  let config;
  let sources;
  try {
    config = loadConfig(resolve(args.configPath));
    sources = buildSourceRegistry(config.feeds, logger);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info(
    { planet: config.planet.name, feedCount: sources.length },
    "config loaded",
  );

  const dbPath = resolve(args.databasePath ?? config.cache.path);
  let database;
  try {
    database = createDatabase(dbPath);
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "cache database unavailable",
    );
    process.exit(1);
  }
  logger.info({ dbPath }, "cache database opened");

  const deps = {
    store: createCacheStore(database.db),
    render: createJsonRenderer(resolve(config.output.path), logger),
    logger,
  };
  const options = aggregationOptionsFromConfig(config, args.offline);
  const registry = sources;

  if (!config.schedule) {
    try {
      await runAggregation(deps, registry, options);
    } catch (err) {
      logger.fatal(
        { error: err instanceof Error ? err.message : String(err) },
        "aggregation run failed",
      );
      database.close();
      process.exit(1);
    }
    database.close();
    return;
  }

  let current: Promise<void> = Promise.resolve();
  const runOnce = (): Promise<void> => {
    current = runAggregation(deps, registry, options).then(() => undefined);
    return current;
  };

  const scheduler = createAggregationScheduler(config.schedule, runOnce, logger);
  logger.info({ schedule: config.schedule }, "aggregation scheduler started");

  registerShutdownHandlers({
    schedulers: [scheduler],
    idle: () => current,
    closeDb: database.close,
    logger,
  });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
