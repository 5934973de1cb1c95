// pattern: functional-core
import type { AppConfig } from "../config";
import type { MergedEntry, SourceOutcome } from "../pipeline/types";

export type PlanetInfo = AppConfig["planet"];

/**
 * What a source looked like at the end of a run, as shown beside the merged
 * entries (a planet's subscription list).
 */
export type SourceStatus = {
  readonly url: string;
  readonly name: string;
  readonly category: string | null;
  readonly feedTitle: string | null;
  readonly feedLink: string | null;
  readonly status: SourceOutcome["status"];
  readonly lastFetchedAt: Date | null;
  readonly lastFailure: string | null;
};

export type RenderInput = {
  readonly planet: PlanetInfo;
  readonly generatedAt: Date;
  readonly entries: ReadonlyArray<MergedEntry>;
  readonly sources: ReadonlyArray<SourceStatus>;
};

export type Renderer = (input: RenderInput) => Promise<void>;

export type PlanetDocument = {
  readonly planet: {
    readonly name: string;
    readonly link: string | null;
    readonly owner: { readonly name: string; readonly email: string | null };
  };
  readonly generatedAt: string;
  readonly entries: ReadonlyArray<{
    readonly id: string;
    readonly title: string | null;
    readonly link: string | null;
    readonly published: string;
    readonly dateSource: MergedEntry["dateSource"];
    readonly author: string | null;
    readonly summary: string | null;
    readonly content: string | null;
    readonly categories: ReadonlyArray<string>;
    readonly source: {
      readonly url: string;
      readonly name: string;
      readonly category: string | null;
    };
  }>;
  readonly sources: ReadonlyArray<{
    readonly url: string;
    readonly name: string;
    readonly category: string | null;
    readonly title: string | null;
    readonly link: string | null;
    readonly status: SourceOutcome["status"];
    readonly lastFetched: string | null;
    readonly lastFailure: string | null;
  }>;
};

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function buildPlanetDocument(input: RenderInput): PlanetDocument {
  return {
    planet: {
      name: input.planet.name,
      link: input.planet.link ?? null,
      owner: {
        name: input.planet.ownerName,
        email: input.planet.ownerEmail ?? null,
      },
    },
    generatedAt: input.generatedAt.toISOString(),
    entries: input.entries.map((entry) => ({
      id: entry.id,
      title: entry.title,
      link: entry.link,
      published: entry.publishedAt.toISOString(),
      dateSource: entry.dateSource,
      author: entry.author,
      summary: entry.summary,
      content: entry.content,
      categories: entry.categories,
      source: entry.source,
    })),
    sources: input.sources.map((source) => ({
      url: source.url,
      name: source.name,
      category: source.category,
      title: source.feedTitle,
      link: source.feedLink,
      status: source.status,
      lastFetched: iso(source.lastFetchedAt),
      lastFailure: source.lastFailure,
    })),
  };
}
