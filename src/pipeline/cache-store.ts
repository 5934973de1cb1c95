// pattern: Imperative Shell
import { and, asc, count, eq, inArray, sql } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { entries, meta, sources } from "../db/schema";
import { CacheIoError } from "../errors";
import type { CacheRecord, Entry } from "./types";

const INSERT_CHUNK = 200;
const RUN_STARTED_KEY = "last_run_started_at";

type SourceRow = typeof sources.$inferSelect;
type EntryRow = typeof entries.$inferSelect;

export type SourceSummary = {
  readonly url: string;
  readonly feedTitle: string | null;
  readonly lastFetchedAt: Date | null;
  readonly lastCheckedAt: Date | null;
  readonly consecutiveFailures: number;
  readonly lastFailure: string | null;
  readonly gone: boolean;
  readonly entryCount: number;
  readonly hiddenCount: number;
};

export type CacheStore = {
  readonly load: (sourceUrl: string) => CacheRecord | null;
  readonly save: (record: CacheRecord) => void;
  readonly loadAll: (sourceUrls: ReadonlyArray<string>) => Map<string, CacheRecord>;
  readonly listSources: () => Array<SourceSummary>;
  readonly setHidden: (sourceUrl: string, entryId: string, hidden: boolean) => boolean;
  readonly remove: (sourceUrl: string) => boolean;
  readonly markRunStarted: (at: Date) => void;
};

function toEntry(row: EntryRow): Entry {
  return {
    id: row.entryId,
    sourceUrl: row.sourceUrl,
    title: row.title,
    link: row.link,
    publishedAt: row.publishedAt,
    dateSource: row.dateSource,
    firstSeenAt: row.firstSeenAt,
    author: row.author,
    summary: row.summary,
    content: row.content,
    categories: row.categories,
    hidden: row.hidden,
  };
}

function toRecord(row: SourceRow, entryRows: ReadonlyArray<EntryRow>): CacheRecord {
  return {
    sourceUrl: row.url,
    metadata: {
      etag: row.etag,
      lastModified: row.lastModified,
      lastFetchedAt: row.lastFetchedAt,
      movedTo: row.movedTo,
    },
    health: {
      lastCheckedAt: row.lastCheckedAt,
      consecutiveFailures: row.consecutiveFailures,
      lastFailure: row.lastFailure,
      lastFailureAt: row.lastFailureAt,
      gone: row.gone,
    },
    feedTitle: row.feedTitle,
    feedLink: row.feedLink,
    entries: entryRows.map(toEntry),
  };
}

function sourceColumns(record: CacheRecord): Omit<SourceRow, "url"> {
  return {
    etag: record.metadata.etag,
    lastModified: record.metadata.lastModified,
    lastFetchedAt: record.metadata.lastFetchedAt,
    movedTo: record.metadata.movedTo,
    lastCheckedAt: record.health.lastCheckedAt,
    consecutiveFailures: record.health.consecutiveFailures,
    lastFailure: record.health.lastFailure,
    lastFailureAt: record.health.lastFailureAt,
    gone: record.health.gone,
    feedTitle: record.feedTitle,
    feedLink: record.feedLink,
  };
}

function toEntryRow(entry: Entry, sourceUrl: string, position: number): EntryRow {
  return {
    sourceUrl,
    entryId: entry.id,
    position,
    title: entry.title,
    link: entry.link,
    publishedAt: entry.publishedAt,
    dateSource: entry.dateSource,
    firstSeenAt: entry.firstSeenAt,
    author: entry.author,
    summary: entry.summary,
    content: entry.content,
    categories: [...entry.categories],
    hidden: entry.hidden,
  };
}

function wrapIo<T>(action: string, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof CacheIoError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new CacheIoError(`${action}: ${message}`);
  }
}

/**
 * SQLite-backed store of per-source cache records.
 *
 * A record is written as one transaction: the source row is upserted and its
 * entry rows are replaced. If anything in the transaction fails, the previous
 * record stays as it was. Every failure surfaces as a CacheIoError.
 */
export function createCacheStore(db: AppDatabase): CacheStore {
  function load(sourceUrl: string): CacheRecord | null {
    return wrapIo(`failed to load cache record for ${sourceUrl}`, () => {
      const row = db.select().from(sources).where(eq(sources.url, sourceUrl)).get();
      if (!row) return null;

      const entryRows = db
        .select()
        .from(entries)
        .where(eq(entries.sourceUrl, sourceUrl))
        .orderBy(asc(entries.position))
        .all();
      return toRecord(row, entryRows);
    });
  }

  function save(record: CacheRecord): void {
    wrapIo(`failed to save cache record for ${record.sourceUrl}`, () => {
      const columns = sourceColumns(record);
      const entryRows = record.entries.map((entry, position) =>
        toEntryRow(entry, record.sourceUrl, position),
      );

      db.transaction((tx) => {
        tx.insert(sources)
          .values({ url: record.sourceUrl, ...columns })
          .onConflictDoUpdate({ target: sources.url, set: columns })
          .run();

        tx.delete(entries).where(eq(entries.sourceUrl, record.sourceUrl)).run();

        for (let i = 0; i < entryRows.length; i += INSERT_CHUNK) {
          tx.insert(entries)
            .values(entryRows.slice(i, i + INSERT_CHUNK))
            .run();
        }
      });
    });
  }

  function loadAll(sourceUrls: ReadonlyArray<string>): Map<string, CacheRecord> {
    return wrapIo("failed to read cache snapshot", () => {
      const records = new Map<string, CacheRecord>();
      if (sourceUrls.length === 0) return records;

      const urls = [...sourceUrls];
      const sourceRows = db.select().from(sources).where(inArray(sources.url, urls)).all();
      const entryRows = db
        .select()
        .from(entries)
        .where(inArray(entries.sourceUrl, urls))
        .orderBy(asc(entries.sourceUrl), asc(entries.position))
        .all();

      const bySource = new Map<string, Array<EntryRow>>();
      for (const row of entryRows) {
        const list = bySource.get(row.sourceUrl) ?? [];
        list.push(row);
        bySource.set(row.sourceUrl, list);
      }

      for (const row of sourceRows) {
        records.set(row.url, toRecord(row, bySource.get(row.url) ?? []));
      }
      return records;
    });
  }

  function listSources(): Array<SourceSummary> {
    return wrapIo("failed to list cached sources", () => {
      const counts = db
        .select({
          sourceUrl: entries.sourceUrl,
          total: count(),
          hidden: sql<number>`coalesce(sum(${entries.hidden}), 0)`,
        })
        .from(entries)
        .groupBy(entries.sourceUrl)
        .all();
      const countsBySource = new Map(counts.map((c) => [c.sourceUrl, c]));

      return db
        .select()
        .from(sources)
        .orderBy(asc(sources.url))
        .all()
        .map((row) => {
          const c = countsBySource.get(row.url);
          return {
            url: row.url,
            feedTitle: row.feedTitle,
            lastFetchedAt: row.lastFetchedAt,
            lastCheckedAt: row.lastCheckedAt,
            consecutiveFailures: row.consecutiveFailures,
            lastFailure: row.lastFailure,
            gone: row.gone,
            entryCount: c?.total ?? 0,
            hiddenCount: c?.hidden ?? 0,
          };
        });
    });
  }

  function setHidden(sourceUrl: string, entryId: string, hidden: boolean): boolean {
    return wrapIo(`failed to update entry ${entryId}`, () => {
      const result = db
        .update(entries)
        .set({ hidden })
        .where(and(eq(entries.sourceUrl, sourceUrl), eq(entries.entryId, entryId)))
        .run();
      return result.changes > 0;
    });
  }

  function remove(sourceUrl: string): boolean {
    return wrapIo(`failed to remove cache record for ${sourceUrl}`, () =>
      db.transaction((tx) => {
        tx.delete(entries).where(eq(entries.sourceUrl, sourceUrl)).run();
        const result = tx.delete(sources).where(eq(sources.url, sourceUrl)).run();
        return result.changes > 0;
      }),
    );
  }

  function markRunStarted(at: Date): void {
    wrapIo("cache store is not writable", () => {
      const value = at.toISOString();
      db.insert(meta)
        .values({ key: RUN_STARTED_KEY, value })
        .onConflictDoUpdate({ target: meta.key, set: { value } })
        .run();
    });
  }

  return { load, save, loadAll, listSources, setHidden, remove, markRunStarted };
}
