// pattern: Imperative Shell
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { AppConfig } from "./config";
import { resolveUserAgent } from "./config";
import { CacheIoError } from "./errors";
import type { PlanetInfo, Renderer, SourceStatus } from "./output";
import {
  applyFailed,
  applyFetched,
  applyUnchanged,
  describeFetchFailure,
  emptyRecord,
  fetchFeed,
  mergeEntries,
  parseFeed,
  shouldAttemptFetch,
} from "./pipeline";
import type {
  BackoffPolicy,
  CacheRecord,
  CacheStore,
  MergedEntry,
  MergeOptions,
  RunPhase,
  Source,
  SourceOutcome,
  SourceReport,
  WindowOptions,
} from "./pipeline";

export type AggregationDeps = {
  readonly store: CacheStore;
  readonly render: Renderer;
  readonly logger: Logger;
  readonly now?: () => Date;
};

export type AggregationOptions = {
  readonly planet: PlanetInfo;
  readonly fetch: {
    readonly timeoutMs: number;
    readonly runTimeoutMs: number;
    readonly maxBytes: number;
    readonly maxRedirects: number;
    readonly concurrency: number;
    readonly userAgent: string;
  };
  readonly backoff: BackoffPolicy;
  readonly window: WindowOptions;
  readonly merge: MergeOptions;
  readonly offline: boolean;
};

export type RunReport = {
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly sources: ReadonlyArray<SourceReport>;
  readonly warningCount: number;
  readonly entries: ReadonlyArray<MergedEntry>;
};

const PHASE_ORDER: ReadonlyArray<RunPhase> = [
  "idle",
  "fetching",
  "parsing",
  "caching",
  "merging",
  "done",
];

const MINUTE_MS = 60 * 1000;

export function aggregationOptionsFromConfig(
  config: AppConfig,
  offline: boolean,
): AggregationOptions {
  return {
    planet: config.planet,
    fetch: {
      timeoutMs: config.fetch.timeoutMs,
      runTimeoutMs: config.fetch.runTimeoutMs,
      maxBytes: config.fetch.maxBytes,
      maxRedirects: config.fetch.maxRedirects,
      concurrency: config.fetch.concurrency,
      userAgent: resolveUserAgent(config),
    },
    backoff: {
      baseDelayMs: config.fetch.backoff.baseDelayMinutes * MINUTE_MS,
      maxDelayMs: config.fetch.backoff.maxDelayMinutes * MINUTE_MS,
      maxRetries: config.fetch.backoff.maxRetries,
    },
    window: {
      windowSize: config.cache.windowSize,
      newFeedItems: config.merge.newFeedItems,
    },
    merge: {
      maxEntries: config.merge.maxEntries,
      maxDays: config.merge.maxDays,
      filter: config.merge.filter,
      exclude: config.merge.exclude,
    },
    offline,
  };
}

/**
 * Tracks the run phase. Sources move through their stages independently, so
 * the run phase is the furthest stage any source has reached and never moves
 * backwards.
 */
function createPhaseTracker(logger: Logger): (phase: RunPhase) => void {
  let current: RunPhase = "idle";
  return (phase) => {
    if (PHASE_ORDER.indexOf(phase) <= PHASE_ORDER.indexOf(current)) return;
    logger.info({ from: current, to: phase }, "run phase changed");
    current = phase;
  };
}

type SourceTaskContext = {
  readonly deps: AggregationDeps;
  readonly options: AggregationOptions;
  readonly signal: AbortSignal;
  readonly now: () => Date;
  readonly advance: (phase: RunPhase) => void;
  readonly saves: { attempted: number; failed: number };
};

type SourceTaskResult = {
  readonly outcome: SourceOutcome;
  readonly warningCount: number;
};

function failed(error: string): SourceTaskResult {
  return { outcome: { status: "failed", error }, warningCount: 0 };
}

async function processSource(
  source: Source,
  ctx: SourceTaskContext,
): Promise<SourceTaskResult> {
  const { store, logger } = ctx.deps;
  const log = { feedName: source.name, feedUrl: source.url };

  if (ctx.signal.aborted) {
    logger.warn(log, "run timed out before feed was fetched");
    return failed("timeout");
  }

  let prior: CacheRecord;
  try {
    prior = store.load(source.url) ?? emptyRecord(source.url);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ ...log, error: message }, "failed to load cache record, skipping feed");
    return failed(message);
  }

  const decision = shouldAttemptFetch(prior.health, ctx.now(), ctx.options.backoff);
  if (!decision.attempt) {
    logger.info({ ...log, reason: decision.reason }, "feed fetch deferred");
    return { outcome: { status: "deferred", reason: decision.reason }, warningCount: 0 };
  }

  const result = await fetchFeed(
    source.url,
    prior.metadata,
    {
      timeoutMs: ctx.options.fetch.timeoutMs,
      maxBytes: ctx.options.fetch.maxBytes,
      maxRedirects: ctx.options.fetch.maxRedirects,
      userAgent: ctx.options.fetch.userAgent,
      signal: ctx.signal,
      now: ctx.now,
    },
    logger,
  );

  let record: CacheRecord;
  let taskResult: SourceTaskResult;

  switch (result.status) {
    case "unchanged": {
      logger.debug(log, "feed not modified");
      record = applyUnchanged(prior, result.checkedAt);
      taskResult = { outcome: { status: "unchanged" }, warningCount: 0 };
      break;
    }
    case "failed": {
      const error = describeFetchFailure(result.reason);
      logger.warn({ ...log, error }, "feed fetch failed");
      record = applyFailed(prior, result.reason, ctx.now());
      taskResult = failed(error);
      break;
    }
    case "fetched": {
      ctx.advance("parsing");
      const parsed = parseFeed(result.body, {
        contentType: result.contentType,
        sourceUrl: source.url,
        baseUrl: result.finalUrl,
      });

      if (parsed.status === "failed") {
        const error = `parse error: ${parsed.reason}`;
        logger.warn({ ...log, error }, "feed document unusable");
        record = applyFailed(prior, error, ctx.now());
        taskResult = failed(error);
        break;
      }

      const warnings = parsed.status === "partial" ? parsed.warnings : [];
      if (warnings.length > 0) {
        logger.warn(
          { ...log, warnings: warnings.map((w) => w.message) },
          "feed parsed with warnings",
        );
      }

      record = applyFetched(
        prior,
        {
          feed: parsed.feed,
          entries: parsed.entries,
          metadata: result.metadata,
          fetchedAt: result.metadata.lastFetchedAt ?? ctx.now(),
        },
        ctx.options.window,
      );
      logger.info(
        { ...log, itemCount: parsed.entries.length, windowSize: record.entries.length },
        "feed fetched",
      );
      taskResult = {
        outcome: {
          status: "fetched",
          entryCount: parsed.entries.length,
          warningCount: warnings.length,
        },
        warningCount: warnings.length,
      };
      break;
    }
  }

  ctx.advance("caching");
  ctx.saves.attempted++;
  try {
    store.save(record);
  } catch (err) {
    ctx.saves.failed++;
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ ...log, error: message }, "failed to save cache record");
    return failed(message);
  }

  return taskResult;
}

function toSourceStatus(
  report: SourceReport,
  record: CacheRecord | undefined,
): SourceStatus {
  return {
    url: report.source.url,
    name: report.source.name,
    category: report.source.category,
    feedTitle: record?.feedTitle ?? null,
    feedLink: record?.feedLink ?? null,
    status: report.outcome.status,
    lastFetchedAt: record?.metadata.lastFetchedAt ?? null,
    lastFailure: record?.health.lastFailure ?? null,
  };
}

/**
 * Runs one aggregation end to end: every source is fetched, parsed and
 * cached under a bounded worker pool, then the merged sequence is built from
 * a snapshot of the store and handed to the renderer.
 *
 * Per-source problems end up in the report; only an unusable store or a
 * renderer failure throws.
 */
export async function runAggregation(
  deps: AggregationDeps,
  sources: ReadonlyArray<Source>,
  options: AggregationOptions,
): Promise<RunReport> {
  const { store, render, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const advance = createPhaseTracker(logger);
  const startedAt = now();

  logger.info(
    { sourceCount: sources.length, offline: options.offline },
    "aggregation run starting",
  );

  let results: ReadonlyArray<SourceTaskResult>;
  if (options.offline) {
    results = sources.map((): SourceTaskResult => ({
      outcome: { status: "skipped-offline" },
      warningCount: 0,
    }));
  } else {
    store.markRunStarted(startedAt);
    advance("fetching");

    const controller = new AbortController();
    const timer = setTimeout(() => {
      logger.warn({ runTimeoutMs: options.fetch.runTimeoutMs }, "run timeout reached, aborting fetches");
      controller.abort();
    }, options.fetch.runTimeoutMs);

    const ctx: SourceTaskContext = {
      deps,
      options,
      signal: controller.signal,
      now,
      advance,
      saves: { attempted: 0, failed: 0 },
    };
    const limit = pLimit(options.fetch.concurrency);

    try {
      results = await Promise.all(
        sources.map((source) =>
          limit(async (): Promise<SourceTaskResult> => {
            try {
              return await processSource(source, ctx);
            } catch (err) {
              const message = err instanceof Error ? err.message : String(err);
              logger.error(
                { feedName: source.name, feedUrl: source.url, error: message },
                "unexpected error during feed processing",
              );
              return failed(message);
            }
          }),
        ),
      );
    } finally {
      clearTimeout(timer);
    }

    if (ctx.saves.attempted > 0 && ctx.saves.failed === ctx.saves.attempted) {
      throw new CacheIoError(
        `cache store is not writable: all ${ctx.saves.attempted} saves failed`,
      );
    }
  }

  advance("merging");
  const records = store.loadAll(sources.map((s) => s.url));
  const entries = mergeEntries(sources, records, options.merge);

  const reports: Array<SourceReport> = sources.map((source, i) => ({
    source,
    outcome: results[i]?.outcome ?? { status: "failed", error: "no result" },
  }));

  await render({
    planet: options.planet,
    generatedAt: now(),
    entries,
    sources: reports.map((report) => toSourceStatus(report, records.get(report.source.url))),
  });

  advance("done");

  const warningCount = results.reduce((sum, r) => sum + r.warningCount, 0);
  const tally = new Map<SourceOutcome["status"], number>();
  for (const report of reports) {
    tally.set(report.outcome.status, (tally.get(report.outcome.status) ?? 0) + 1);
  }
  logger.info(
    { outcomes: Object.fromEntries(tally), warningCount, entryCount: entries.length },
    "aggregation run complete",
  );

  return { startedAt, finishedAt: now(), sources: reports, warningCount, entries };
}
