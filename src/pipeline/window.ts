// pattern: functional-core
import { describeFetchFailure } from "./fetcher";
import type {
  CacheRecord,
  ConditionalMetadata,
  DateSource,
  Entry,
  FeedInfo,
  FetchFailure,
  ParsedEntry,
  SourceHealth,
} from "./types";

export type WindowOptions = {
  readonly windowSize: number;
  /** Entries visible after a source's first fetch; 0 shows all of them. */
  readonly newFeedItems: number;
};

export type BackoffPolicy = {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly maxRetries: number;
};

export type FetchDecision =
  | { readonly attempt: true }
  | { readonly attempt: false; readonly reason: string };

const EMPTY_METADATA: ConditionalMetadata = {
  etag: null,
  lastModified: null,
  lastFetchedAt: null,
  movedTo: null,
};

const HEALTHY: Omit<SourceHealth, "lastCheckedAt"> = {
  consecutiveFailures: 0,
  lastFailure: null,
  lastFailureAt: null,
  gone: false,
};

export function emptyRecord(sourceUrl: string): CacheRecord {
  return {
    sourceUrl,
    metadata: EMPTY_METADATA,
    health: { ...HEALTHY, lastCheckedAt: null },
    feedTitle: null,
    feedLink: null,
    entries: [],
  };
}

/**
 * Newest first; ties keep the given order (fresh entries are listed before
 * retained ones), then fall back to identity.
 */
function compareWindow(
  a: { entry: Entry; rank: number },
  b: { entry: Entry; rank: number },
): number {
  const byDate = b.entry.publishedAt.getTime() - a.entry.publishedAt.getTime();
  if (byDate !== 0) return byDate;
  if (a.rank !== b.rank) return a.rank - b.rank;
  return a.entry.id < b.entry.id ? -1 : a.entry.id > b.entry.id ? 1 : 0;
}

/**
 * Gives a parsed entry its effective timestamp.
 *
 * The first-seen time is taken from the cached copy when there is one, so it
 * is fixed at first observation. An entry without a feed timestamp sorts at
 * its first-seen time. A feed timestamp up to the fetch time is taken as is,
 * so an edited entry moves up; one later than the fetch time is clamped to
 * the first-seen time.
 */
export function resolveEntry(
  parsed: ParsedEntry,
  known: Entry | undefined,
  sourceUrl: string,
  fetchedAt: Date,
): Entry {
  const firstSeenAt = known?.firstSeenAt ?? fetchedAt;
  let publishedAt = firstSeenAt;
  let dateSource: DateSource = "first-seen";
  if (parsed.publishedAt) {
    if (parsed.publishedAt.getTime() > fetchedAt.getTime()) {
      dateSource = "clamped";
    } else {
      publishedAt = parsed.publishedAt;
      dateSource = "feed";
    }
  }

  return {
    id: parsed.id,
    sourceUrl,
    title: parsed.title,
    link: parsed.link,
    publishedAt,
    dateSource,
    firstSeenAt,
    author: parsed.author,
    summary: parsed.summary,
    content: parsed.content,
    categories: parsed.categories,
    hidden: known?.hidden ?? false,
  };
}

/**
 * Builds the new window after a successful fetch: the freshly parsed entries
 * united with retained entries the feed no longer lists, newest first, cut to
 * the window size.
 */
export function mergeWindow(
  prior: ReadonlyArray<Entry>,
  parsed: ReadonlyArray<ParsedEntry>,
  sourceUrl: string,
  fetchedAt: Date,
  windowSize: number,
): Array<Entry> {
  const known = new Map(prior.map((entry) => [entry.id, entry]));

  const fresh = parsed.map((p) => resolveEntry(p, known.get(p.id), sourceUrl, fetchedAt));
  const freshIds = new Set(fresh.map((entry) => entry.id));
  const retained = prior.filter((entry) => !freshIds.has(entry.id));

  const ranked = [...fresh, ...retained].map((entry, rank) => ({ entry, rank }));
  ranked.sort(compareWindow);
  return ranked.slice(0, windowSize).map((r) => r.entry);
}

export type FetchedFeed = {
  readonly feed: FeedInfo;
  readonly entries: ReadonlyArray<ParsedEntry>;
  readonly metadata: ConditionalMetadata;
  readonly fetchedAt: Date;
};

/**
 * Replaces the record's metadata and window after a successful fetch and
 * parse. On a source's first fetch only the newest `newFeedItems` entries
 * are left visible.
 */
export function applyFetched(
  prior: CacheRecord,
  fetched: FetchedFeed,
  options: WindowOptions,
): CacheRecord {
  const firstFetch = prior.metadata.lastFetchedAt === null && prior.entries.length === 0;
  let entries = mergeWindow(
    prior.entries,
    fetched.entries,
    prior.sourceUrl,
    fetched.fetchedAt,
    options.windowSize,
  );
  if (firstFetch && options.newFeedItems > 0) {
    entries = entries.map((entry, index) =>
      index < options.newFeedItems ? entry : { ...entry, hidden: true },
    );
  }

  return {
    sourceUrl: prior.sourceUrl,
    metadata: fetched.metadata,
    health: { ...HEALTHY, lastCheckedAt: fetched.fetchedAt },
    feedTitle: fetched.feed.title ?? prior.feedTitle,
    feedLink: fetched.feed.link ?? prior.feedLink,
    entries,
  };
}

export function applyUnchanged(prior: CacheRecord, checkedAt: Date): CacheRecord {
  return {
    ...prior,
    health: { ...HEALTHY, lastCheckedAt: checkedAt },
  };
}

/**
 * Records a failed fetch or an unusable document. Entries and conditional
 * metadata are kept as they were.
 */
export function applyFailed(
  prior: CacheRecord,
  failure: FetchFailure | string,
  at: Date,
): CacheRecord {
  const gone = typeof failure !== "string" && failure.kind === "http-error" && failure.statusCode === 410;
  return {
    ...prior,
    health: {
      lastCheckedAt: prior.health.lastCheckedAt,
      consecutiveFailures: prior.health.consecutiveFailures + 1,
      lastFailure: typeof failure === "string" ? failure : describeFetchFailure(failure),
      lastFailureAt: at,
      gone: prior.health.gone || gone,
    },
  };
}

export function backoffDelayMs(failures: number, policy: BackoffPolicy): number {
  if (failures <= 0) return 0;
  const exponent = Math.min(failures, policy.maxRetries) - 1;
  return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
}

/**
 * Decides whether a source is due for a fetch. Failing sources wait an
 * exponentially growing, capped delay after their last failure; sources that
 * answered 410 Gone are not fetched again.
 */
export function shouldAttemptFetch(
  health: SourceHealth,
  now: Date,
  policy: BackoffPolicy,
): FetchDecision {
  if (health.gone) {
    return { attempt: false, reason: "feed is gone (HTTP 410)" };
  }
  if (health.consecutiveFailures === 0 || !health.lastFailureAt) {
    return { attempt: true };
  }
  const retryAt = health.lastFailureAt.getTime() + backoffDelayMs(health.consecutiveFailures, policy);
  if (now.getTime() < retryAt) {
    return {
      attempt: false,
      reason: `backing off after ${health.consecutiveFailures} failures until ${new Date(retryAt).toISOString()}`,
    };
  }
  return { attempt: true };
}
