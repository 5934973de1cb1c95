import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { Logger } from "pino";
import { RegistryError } from "../errors";
import type { Source } from "../pipeline/types";
import { appConfigSchema, feedEntrySchema } from "./schema";
import type { AppConfig } from "./schema";

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RegistryError(
      `failed to read config file at ${configPath}: ${message}`,
    );
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RegistryError(`failed to parse YAML in ${configPath}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new RegistryError(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

function isFeedUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Turns the configured feed mapping into the ordered source registry.
 *
 * Entries keep the order they have in the file. A malformed entry (bad URL,
 * missing name, unknown key, invalid pattern) is logged and skipped; only a
 * registry with no usable feed at all is an error.
 *
 * A plain string value is shorthand for `{ name: <value> }`.
 */
export function buildSourceRegistry(
  feeds: Readonly<Record<string, unknown>>,
  logger: Logger,
): ReadonlyArray<Source> {
  const sources: Array<Source> = [];

  for (const [url, value] of Object.entries(feeds)) {
    if (!isFeedUrl(url)) {
      logger.warn({ feedUrl: url }, "skipping feed with invalid URL");
      continue;
    }

    const candidate = typeof value === "string" ? { name: value } : value;
    const result = feedEntrySchema.safeParse(candidate);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join(".") || "(entry)"}: ${i.message}`)
        .join("; ");
      logger.warn({ feedUrl: url, issues }, "skipping malformed feed entry");
      continue;
    }

    sources.push({
      url,
      name: result.data.name,
      category: result.data.category ?? null,
      filter: result.data.filter ?? null,
      exclude: result.data.exclude ?? null,
    });
  }

  if (sources.length === 0) {
    throw new RegistryError("no usable feeds in configuration");
  }

  return sources;
}

export function resolveUserAgent(config: AppConfig): string {
  if (config.fetch.userAgent) {
    return config.fetch.userAgent;
  }
  const planet = config.planet.link
    ? `${config.planet.name} +${config.planet.link}`
    : config.planet.name;
  return `${planet} feedmill/0.1`;
}

export type { AppConfig };
