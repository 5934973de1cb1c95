import { index, integer, primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";

// ---------- Tables ----------

export const sources = sqliteTable("sources", {
  url: text("url").primaryKey(),
  etag: text("etag"),
  lastModified: text("last_modified"),
  lastFetchedAt: integer("last_fetched_at", { mode: "timestamp_ms" }),
  movedTo: text("moved_to"),
  lastCheckedAt: integer("last_checked_at", { mode: "timestamp_ms" }),
  consecutiveFailures: integer("consecutive_failures").notNull().default(0),
  lastFailure: text("last_failure"),
  lastFailureAt: integer("last_failure_at", { mode: "timestamp_ms" }),
  gone: integer("gone", { mode: "boolean" }).notNull().default(false),
  feedTitle: text("feed_title"),
  feedLink: text("feed_link"),
});

export const entries = sqliteTable(
  "entries",
  {
    sourceUrl: text("source_url")
      .notNull()
      .references(() => sources.url, { onDelete: "cascade" }),
    entryId: text("entry_id").notNull(),
    position: integer("position").notNull(),
    title: text("title"),
    link: text("link"),
    publishedAt: integer("published_at", { mode: "timestamp_ms" }).notNull(),
    dateSource: text("date_source", {
      enum: ["feed", "first-seen", "clamped"],
    }).notNull(),
    firstSeenAt: integer("first_seen_at", { mode: "timestamp_ms" }).notNull(),
    author: text("author"),
    summary: text("summary"),
    content: text("content"),
    categories: text("categories", { mode: "json" }).$type<Array<string>>().notNull(),
    hidden: integer("hidden", { mode: "boolean" }).notNull().default(false),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.sourceUrl, table.entryId] }),
    positionIdx: index("entries_source_position_idx").on(table.sourceUrl, table.position),
  }),
);

export const meta = sqliteTable("meta", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
});
