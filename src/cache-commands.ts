// pattern: Imperative Shell
import type { CacheStore } from "./pipeline/cache-store";
import type { CacheRecord } from "./pipeline/types";

export const CACHE_USAGE = `usage: feedmill-cache [--config <path>] <command> [arguments]

commands:
  list                         cached sources with health and entry counts
  show <feed-url>              conditional metadata and health of one source
  entries <feed-url>           the source's cached window, newest first
  hide <feed-url> <entry-id>   leave an entry out of the merged output
  unhide <feed-url> <entry-id> put a hidden entry back
  reset <feed-url>             drop the source's record (clears backoff and "gone")`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function iso(date: Date | null): string {
  return date ? date.toISOString() : "never";
}

function requireArg(args: ReadonlyArray<string>, index: number, name: string): string {
  const value = args[index];
  if (!value) {
    throw new UsageError(`missing <${name}>`);
  }
  return value;
}

function requireRecord(store: CacheStore, url: string): CacheRecord {
  const record = store.load(url);
  if (!record) {
    throw new UsageError(`no cache record for ${url}`);
  }
  return record;
}

function listCommand(store: CacheStore): Array<string> {
  const summaries = store.listSources();
  if (summaries.length === 0) {
    return ["cache is empty"];
  }
  return summaries.map((s) => {
    const state = s.gone
      ? "gone"
      : s.consecutiveFailures > 0
        ? `failing x${s.consecutiveFailures}`
        : "ok";
    return `${s.url}\t${state}\t${s.entryCount} entries (${s.hiddenCount} hidden)\tchecked ${iso(s.lastCheckedAt)}`;
  });
}

function showCommand(store: CacheStore, url: string): Array<string> {
  const record = requireRecord(store, url);
  return [
    `url:                  ${record.sourceUrl}`,
    `title:                ${record.feedTitle ?? "-"}`,
    `link:                 ${record.feedLink ?? "-"}`,
    `etag:                 ${record.metadata.etag ?? "-"}`,
    `last-modified:        ${record.metadata.lastModified ?? "-"}`,
    `last fetched:         ${iso(record.metadata.lastFetchedAt)}`,
    `moved to:             ${record.metadata.movedTo ?? "-"}`,
    `last checked:         ${iso(record.health.lastCheckedAt)}`,
    `consecutive failures: ${record.health.consecutiveFailures}`,
    `last failure:         ${record.health.lastFailure ?? "-"} (${iso(record.health.lastFailureAt)})`,
    `gone:                 ${record.health.gone ? "yes" : "no"}`,
    `entries:              ${record.entries.length}`,
  ];
}

function entriesCommand(store: CacheStore, url: string): Array<string> {
  const record = requireRecord(store, url);
  return record.entries.map(
    (e) =>
      `${e.publishedAt.toISOString()}${e.hidden ? " [hidden]" : ""}\t${e.id}\t${e.title ?? "(untitled)"}`,
  );
}

function hiddenCommand(
  store: CacheStore,
  url: string,
  entryId: string,
  hidden: boolean,
): Array<string> {
  if (!store.setHidden(url, entryId, hidden)) {
    throw new UsageError(`no entry ${entryId} cached for ${url}`);
  }
  return [`${hidden ? "hidden" : "unhidden"}: ${entryId}`];
}

function resetCommand(store: CacheStore, url: string): Array<string> {
  if (!store.remove(url)) {
    throw new UsageError(`no cache record for ${url}`);
  }
  return [`removed cache record for ${url}`];
}

/**
 * Runs one cache inspection command and returns the lines to print.
 * Bad arguments and unknown sources or entries throw a UsageError.
 */
export function executeCacheCommand(
  store: CacheStore,
  command: string | undefined,
  args: ReadonlyArray<string>,
): Array<string> {
  switch (command) {
    case "list":
      return listCommand(store);
    case "show":
      return showCommand(store, requireArg(args, 0, "feed-url"));
    case "entries":
      return entriesCommand(store, requireArg(args, 0, "feed-url"));
    case "hide":
    case "unhide":
      return hiddenCommand(
        store,
        requireArg(args, 0, "feed-url"),
        requireArg(args, 1, "entry-id"),
        command === "hide",
      );
    case "reset":
      return resetCommand(store, requireArg(args, 0, "feed-url"));
    case undefined:
      throw new UsageError("missing command");
    default:
      throw new UsageError(`unknown command "${command}"`);
  }
}
