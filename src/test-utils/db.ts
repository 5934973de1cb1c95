import { createDatabase } from "../db";
import type { AppDatabase } from "../db";
import { appConfigSchema } from "../config/schema";
import type { AppConfig } from "../config";
import { emptyRecord } from "../pipeline/window";
import type { CacheRecord, Entry, Source } from "../pipeline/types";

/**
 * Creates an in-memory SQLite cache database with the schema applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  return db;
}

/**
 * A fully defaulted AppConfig with one feed; `overrides` is parsed through the
 * real schema, so section defaults still apply.
 */
export function createTestConfig(overrides: Record<string, unknown> = {}): AppConfig {
  return appConfigSchema.parse({
    planet: { name: "Test Planet", link: "https://planet.example.com/" },
    feeds: { "https://example.com/rss": { name: "Example Feed" } },
    ...overrides,
  });
}

export function makeSource(overrides: Partial<Source> = {}): Source {
  return {
    url: "https://example.com/rss",
    name: "Example Feed",
    category: null,
    filter: null,
    exclude: null,
    ...overrides,
  };
}

export function makeEntry(overrides: Partial<Entry> = {}): Entry {
  const publishedAt = overrides.publishedAt ?? new Date("2024-01-01T00:00:00.000Z");
  return {
    id: "https://example.com/posts/1",
    sourceUrl: "https://example.com/rss",
    title: "Test Entry",
    link: "https://example.com/posts/1",
    publishedAt,
    dateSource: "feed",
    firstSeenAt: publishedAt,
    author: null,
    summary: null,
    content: null,
    categories: [],
    hidden: false,
    ...overrides,
  };
}

export function makeRecord(
  sourceUrl: string,
  overrides: Partial<Omit<CacheRecord, "sourceUrl">> = {},
): CacheRecord {
  return { ...emptyRecord(sourceUrl), ...overrides };
}
