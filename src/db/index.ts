// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { CacheIoError } from "../errors";
import * as schema from "./schema";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sources (
  url TEXT PRIMARY KEY NOT NULL,
  etag TEXT,
  last_modified TEXT,
  last_fetched_at INTEGER,
  moved_to TEXT,
  last_checked_at INTEGER,
  consecutive_failures INTEGER NOT NULL DEFAULT 0,
  last_failure TEXT,
  last_failure_at INTEGER,
  gone INTEGER NOT NULL DEFAULT 0,
  feed_title TEXT,
  feed_link TEXT
);

CREATE TABLE IF NOT EXISTS entries (
  source_url TEXT NOT NULL REFERENCES sources(url) ON DELETE CASCADE,
  entry_id TEXT NOT NULL,
  position INTEGER NOT NULL,
  title TEXT,
  link TEXT,
  published_at INTEGER NOT NULL,
  date_source TEXT NOT NULL,
  first_seen_at INTEGER NOT NULL,
  author TEXT,
  summary TEXT,
  content TEXT,
  categories TEXT NOT NULL,
  hidden INTEGER NOT NULL DEFAULT 0,
  PRIMARY KEY (source_url, entry_id)
);

CREATE INDEX IF NOT EXISTS entries_source_position_idx ON entries (source_url, position);

CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY NOT NULL,
  value TEXT NOT NULL
);
`;

/**
 * Opens (creating if needed) the cache database and makes sure its tables
 * exist. Any failure here means the store is unusable and is raised as a
 * CacheIoError.
 */
export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  let sqlite: Database.Database;
  try {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    sqlite = new Database(dbPath);
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("foreign_keys = ON");
    sqlite.exec(SCHEMA_SQL);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CacheIoError(`failed to open cache database at ${dbPath}: ${message}`);
  }

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export type AppDatabase = BetterSQLite3Database<typeof schema>;
