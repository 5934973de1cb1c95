#!/usr/bin/env node
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { CACHE_USAGE, UsageError, executeCacheCommand } from "./cache-commands";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { createCacheStore } from "./pipeline";

/**
 * The cache path comes from DATABASE_URL, else from the configuration's
 * `cache.path`, else the default location.
 */
function resolveDatabasePath(configPath: string): string {
  const fromEnv = process.env["DATABASE_URL"];
  if (fromEnv) return fromEnv;
  if (existsSync(configPath)) {
    return loadConfig(configPath).cache.path;
  }
  return "./data/feedmill.db";
}

function main(): number {
  let positionals: Array<string>;
  let configPath: string;
  try {
    const parsed = parseArgs({
      args: process.argv.slice(2),
      options: { config: { type: "string", short: "c" } },
      allowPositionals: true,
      strict: true,
    });
    positionals = parsed.positionals;
    configPath = resolve(
      parsed.values.config ?? process.env["CONFIG_PATH"] ?? "./feedmill.yaml",
    );
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${message}\n\n${CACHE_USAGE}`);
    return 2;
  }

  const [command, ...args] = positionals;

  try {
    const { db, close } = createDatabase(resolve(resolveDatabasePath(configPath)));
    try {
      for (const line of executeCacheCommand(createCacheStore(db), command, args)) {
        console.log(line);
      }
    } finally {
      close();
    }
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(err instanceof UsageError ? `${message}\n\n${CACHE_USAGE}` : message);
    return err instanceof UsageError ? 2 : 1;
  }
}

process.exitCode = main();
