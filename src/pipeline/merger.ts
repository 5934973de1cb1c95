// pattern: functional-core
import type { CacheRecord, Entry, MergedEntry, Source } from "./types";

export type MergeOptions = {
  readonly maxEntries: number;
  /** Drop entries older than the newest one by more than this many days; 0 disables. */
  readonly maxDays: number;
  readonly filter?: string;
  readonly exclude?: string;
};

const DAY_MS = 24 * 60 * 60 * 1000;

type Candidate = {
  readonly entry: Entry;
  readonly sourceIndex: number;
};

function compileList(patterns: ReadonlyArray<string | null | undefined>): Array<RegExp> {
  return patterns
    .filter((p): p is string => typeof p === "string" && p.length > 0)
    .map((p) => new RegExp(p, "i"));
}

function matchesAll(patterns: ReadonlyArray<RegExp>, text: string): boolean {
  return patterns.every((re) => re.test(text));
}

function matchesAny(patterns: ReadonlyArray<RegExp>, text: string): boolean {
  return patterns.some((re) => re.test(text));
}

/**
 * Strict total order: newest first, then registry position, then identity.
 * Identities are unique after deduplication, so no two candidates tie.
 */
function compareMerged(a: Candidate, b: Candidate): number {
  const byDate = b.entry.publishedAt.getTime() - a.entry.publishedAt.getTime();
  if (byDate !== 0) return byDate;
  if (a.sourceIndex !== b.sourceIndex) return a.sourceIndex - b.sourceIndex;
  return a.entry.id < b.entry.id ? -1 : a.entry.id > b.entry.id ? 1 : 0;
}

/**
 * Combines every source's cached window into the output sequence.
 *
 * Sources are visited in registry order, so when two sources carry the same
 * identity the earlier source's copy wins, even when that copy is then left
 * out. Hidden entries and entries rejected by the planet-wide or per-source
 * filter/exclude patterns are left out. The result depends only on its inputs.
 */
export function mergeEntries(
  sources: ReadonlyArray<Source>,
  records: ReadonlyMap<string, CacheRecord>,
  options: MergeOptions,
): Array<MergedEntry> {
  const seen = new Set<string>();
  const candidates: Array<Candidate> = [];

  sources.forEach((source, sourceIndex) => {
    const record = records.get(source.url);
    if (!record) return;

    const filters = compileList([options.filter, source.filter]);
    const excludes = compileList([options.exclude, source.exclude]);

    for (const entry of record.entries) {
      if (seen.has(entry.id)) continue;
      seen.add(entry.id);
      if (entry.hidden) continue;

      if (filters.length > 0 || excludes.length > 0) {
        const text = `${entry.title ?? ""}\n${entry.content ?? entry.summary ?? ""}`;
        if (!matchesAll(filters, text) || matchesAny(excludes, text)) continue;
      }

      candidates.push({ entry, sourceIndex });
    }
  });

  candidates.sort(compareMerged);

  let selected = candidates;
  const newest = candidates[0];
  if (options.maxDays > 0 && newest) {
    const cutoff = newest.entry.publishedAt.getTime() - options.maxDays * DAY_MS;
    selected = candidates.filter((c) => c.entry.publishedAt.getTime() >= cutoff);
  }

  return selected.slice(0, options.maxEntries).map(({ entry, sourceIndex }) => {
    const source = sources[sourceIndex];
    return {
      ...entry,
      source: {
        url: entry.sourceUrl,
        name: source?.name ?? entry.sourceUrl,
        category: source?.category ?? null,
      },
    };
  });
}
