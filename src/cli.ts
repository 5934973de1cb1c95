import { parseArgs } from "node:util";

export type CliOptions = {
  readonly configPath: string;
  readonly databasePath: string | null;
  readonly offline: boolean;
  readonly verbose: boolean;
};

const DEFAULT_CONFIG_PATH = "./feedmill.yaml";

export const USAGE = `usage: feedmill [config] [--offline] [--verbose]

  config       path to the YAML configuration (default: $CONFIG_PATH or ${DEFAULT_CONFIG_PATH})
  --offline    skip fetching and rebuild the output from the cache
  --verbose    log at debug level

environment: CONFIG_PATH, DATABASE_URL (overrides cache.path), LOG_LEVEL`;

/**
 * Reads the command line of the `feedmill` binary. Unknown flags and more
 * than one positional argument throw.
 */
export function parseCliArgs(
  argv: ReadonlyArray<string>,
  env: Readonly<Record<string, string | undefined>>,
): CliOptions {
  const { values, positionals } = parseArgs({
    args: [...argv],
    options: {
      offline: { type: "boolean", short: "o", default: false },
      verbose: { type: "boolean", short: "v", default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  if (positionals.length > 1) {
    throw new Error(`expected at most one config path, got ${positionals.length}`);
  }

  return {
    configPath: positionals[0] ?? env["CONFIG_PATH"] ?? DEFAULT_CONFIG_PATH,
    databasePath: env["DATABASE_URL"] ?? null,
    offline: values.offline ?? false,
    verbose: values.verbose ?? false,
  };
}
