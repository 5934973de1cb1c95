export type Source = {
  readonly url: string;
  readonly name: string;
  readonly category: string | null;
  readonly filter: string | null;
  readonly exclude: string | null;
};

export type ConditionalMetadata = {
  readonly etag: string | null;
  readonly lastModified: string | null;
  readonly lastFetchedAt: Date | null;
  readonly movedTo: string | null;
};

export type FetchFailure =
  | { readonly kind: "timeout" }
  | { readonly kind: "connection-error"; readonly message: string }
  | { readonly kind: "http-error"; readonly statusCode: number }
  | { readonly kind: "too-large"; readonly maxBytes: number };

export type FetchResult =
  | { readonly status: "unchanged"; readonly checkedAt: Date }
  | {
      readonly status: "fetched";
      readonly body: Buffer;
      readonly contentType: string | null;
      readonly finalUrl: string;
      readonly metadata: ConditionalMetadata;
    }
  | { readonly status: "failed"; readonly reason: FetchFailure };

export type FeedVariant = "rss1" | "rss2" | "atom" | "unknown";

export type IdentitySource = "guid" | "link-title" | "title-date" | "title-summary";

/**
 * An item as read from the feed document, before timestamps are resolved
 * against the cached window.
 */
export type ParsedEntry = {
  readonly id: string;
  readonly identitySource: IdentitySource;
  readonly title: string | null;
  readonly link: string | null;
  readonly publishedAt: Date | null;
  readonly author: string | null;
  readonly summary: string | null;
  readonly content: string | null;
  readonly categories: ReadonlyArray<string>;
};

export type FeedInfo = {
  readonly variant: FeedVariant;
  readonly title: string | null;
  readonly link: string | null;
};

export type ParseWarningCode =
  | "encoding-fallback"
  | "encoding-replaced"
  | "malformed-xml"
  | "missing-date"
  | "invalid-date"
  | "missing-link"
  | "missing-identity"
  | "sanitized-html";

export type ParseWarning = {
  readonly code: ParseWarningCode;
  readonly message: string;
};

export type ParseOutcome =
  | {
      readonly status: "ok";
      readonly feed: FeedInfo;
      readonly entries: ReadonlyArray<ParsedEntry>;
    }
  | {
      readonly status: "partial";
      readonly feed: FeedInfo;
      readonly entries: ReadonlyArray<ParsedEntry>;
      readonly warnings: ReadonlyArray<ParseWarning>;
    }
  | { readonly status: "failed"; readonly reason: string };

export type DateSource = "feed" | "first-seen" | "clamped";

export type Entry = {
  readonly id: string;
  readonly sourceUrl: string;
  readonly title: string | null;
  readonly link: string | null;
  readonly publishedAt: Date;
  readonly dateSource: DateSource;
  readonly firstSeenAt: Date;
  readonly author: string | null;
  readonly summary: string | null;
  readonly content: string | null;
  readonly categories: ReadonlyArray<string>;
  readonly hidden: boolean;
};

export type SourceHealth = {
  readonly lastCheckedAt: Date | null;
  readonly consecutiveFailures: number;
  readonly lastFailure: string | null;
  readonly lastFailureAt: Date | null;
  readonly gone: boolean;
};

export type CacheRecord = {
  readonly sourceUrl: string;
  readonly metadata: ConditionalMetadata;
  readonly health: SourceHealth;
  readonly feedTitle: string | null;
  readonly feedLink: string | null;
  readonly entries: ReadonlyArray<Entry>;
};

export type MergedEntry = Entry & {
  readonly source: Pick<Source, "url" | "name" | "category">;
};

export type SourceOutcome =
  | { readonly status: "fetched"; readonly entryCount: number; readonly warningCount: number }
  | { readonly status: "unchanged" }
  | { readonly status: "failed"; readonly error: string }
  | { readonly status: "deferred"; readonly reason: string }
  | { readonly status: "skipped-offline" };

export type SourceReport = {
  readonly source: Source;
  readonly outcome: SourceOutcome;
};

export type RunPhase =
  | "idle"
  | "fetching"
  | "parsing"
  | "caching"
  | "merging"
  | "done";
