export { fetchFeed, describeFetchFailure } from "./fetcher";
export type { FetchFeedOptions } from "./fetcher";
export { parseFeed, sniffVariant } from "./parser";
export type { ParseFeedOptions } from "./parser";
export { resolveIdentity } from "./identity";
export {
  applyFailed,
  applyFetched,
  applyUnchanged,
  emptyRecord,
  shouldAttemptFetch,
} from "./window";
export type { BackoffPolicy, WindowOptions, FetchedFeed } from "./window";
export { createCacheStore } from "./cache-store";
export type { CacheStore, SourceSummary } from "./cache-store";
export { mergeEntries } from "./merger";
export type { MergeOptions } from "./merger";
export type {
  CacheRecord,
  Entry,
  FetchResult,
  MergedEntry,
  ParseOutcome,
  ParsedEntry,
  RunPhase,
  Source,
  SourceOutcome,
  SourceReport,
} from "./types";
