import { describe, it, expect } from "vitest";
import { mergeEntries } from "./merger";
import type { MergeOptions } from "./merger";
import { resolveIdentity } from "./identity";
import { makeEntry, makeRecord, makeSource } from "../test-utils/db";
import type { CacheRecord, Entry } from "./types";

const A = makeSource({ url: "https://a.example.com/feed", name: "Alpha", category: "blogs" });
const B = makeSource({ url: "https://b.example.com/feed", name: "Beta" });

const OPTIONS: MergeOptions = { maxEntries: 50, maxDays: 0 };

function entry(sourceUrl: string, id: string, published: string, overrides: Partial<Entry> = {}): Entry {
  return makeEntry({
    id,
    sourceUrl,
    title: id,
    link: id,
    publishedAt: new Date(published),
    ...overrides,
  });
}

function snapshot(...records: Array<CacheRecord>): Map<string, CacheRecord> {
  return new Map(records.map((r) => [r.sourceUrl, r]));
}

describe("mergeEntries", () => {
  it("orders entries newest first across sources", () => {
    const records = snapshot(
      makeRecord(A.url, {
        entries: [
          entry(A.url, "a2", "2024-01-03T00:00:00Z"),
          entry(A.url, "a1", "2024-01-01T00:00:00Z"),
        ],
      }),
      makeRecord(B.url, { entries: [entry(B.url, "b1", "2024-01-02T00:00:00Z")] }),
    );

    const merged = mergeEntries([A, B], records, OPTIONS);

    expect(merged.map((e) => e.id)).toEqual(["a2", "b1", "a1"]);
    expect(merged[0]?.source).toEqual({ url: A.url, name: "Alpha", category: "blogs" });
    expect(merged[1]?.source).toEqual({ url: B.url, name: "Beta", category: null });
  });

  it("breaks timestamp ties by registry order, then identity", () => {
    const same = "2024-01-01T00:00:00Z";
    const records = snapshot(
      makeRecord(A.url, { entries: [entry(A.url, "z", same), entry(A.url, "m", same)] }),
      makeRecord(B.url, { entries: [entry(B.url, "a", same)] }),
    );

    const forward = mergeEntries([A, B], records, OPTIONS).map((e) => e.id);
    const again = mergeEntries([A, B], records, OPTIONS).map((e) => e.id);

    expect(forward).toEqual(["m", "z", "a"]);
    expect(again).toEqual(forward);
    expect(mergeEntries([B, A], records, OPTIONS).map((e) => e.id)).toEqual(["a", "m", "z"]);
  });

  it("keeps one copy of an item two sources share, from the earlier source", () => {
    const fingerprint = resolveIdentity(
      {
        guid: null,
        link: "https://news.example.com/story",
        title: "Shared story",
        publishedAt: null,
        summary: null,
      },
      A.url,
    );
    expect(fingerprint?.source).toBe("link-title");
    const id = fingerprint?.id ?? "";
    const records = snapshot(
      makeRecord(A.url, { entries: [entry(A.url, id, "2024-01-01T00:00:00Z")] }),
      makeRecord(B.url, { entries: [entry(B.url, id, "2024-01-05T00:00:00Z")] }),
    );

    const merged = mergeEntries([A, B], records, OPTIONS);

    expect(merged).toHaveLength(1);
    expect(merged[0]?.source.name).toBe("Alpha");
    expect(merged[0]?.publishedAt).toEqual(new Date("2024-01-01T00:00:00Z"));
  });

  it("truncates to the output cap", () => {
    const entries = [1, 2, 3, 4].map((day) => entry(A.url, `a${day}`, `2024-01-0${day}T00:00:00Z`));
    const records = snapshot(makeRecord(A.url, { entries }));

    const merged = mergeEntries([A], records, { ...OPTIONS, maxEntries: 2 });

    expect(merged.map((e) => e.id)).toEqual(["a4", "a3"]);
  });

  it("leaves out hidden entries", () => {
    const records = snapshot(
      makeRecord(A.url, {
        entries: [
          entry(A.url, "shown", "2024-01-01T00:00:00Z"),
          entry(A.url, "hidden", "2024-01-02T00:00:00Z", { hidden: true }),
        ],
      }),
    );

    expect(mergeEntries([A], records, OPTIONS).map((e) => e.id)).toEqual(["shown"]);
  });

  it("does not let a later source resurface an item hidden or filtered in an earlier one", () => {
    const excluding = { ...A, exclude: "sponsored" };
    const records = snapshot(
      makeRecord(A.url, {
        entries: [
          entry(A.url, "shared-hidden", "2024-01-03T00:00:00Z", { hidden: true }),
          entry(A.url, "shared-ad", "2024-01-02T00:00:00Z", { title: "sponsored post" }),
        ],
      }),
      makeRecord(B.url, {
        entries: [
          entry(B.url, "shared-hidden", "2024-01-03T00:00:00Z"),
          entry(B.url, "shared-ad", "2024-01-02T00:00:00Z", { title: "sponsored post" }),
          entry(B.url, "b1", "2024-01-01T00:00:00Z"),
        ],
      }),
    );

    expect(mergeEntries([excluding, B], records, OPTIONS).map((e) => e.id)).toEqual(["b1"]);
  });

  it("skips sources with nothing cached", () => {
    const records = snapshot(makeRecord(B.url, { entries: [entry(B.url, "b1", "2024-01-01T00:00:00Z")] }));

    expect(mergeEntries([A, B], records, OPTIONS).map((e) => e.id)).toEqual(["b1"]);
  });

  it("applies planet-wide and per-source filter and exclude patterns", () => {
    const filtered = { ...A, exclude: "sponsored" };
    const records = snapshot(
      makeRecord(A.url, {
        entries: [
          entry(A.url, "a1", "2024-01-03T00:00:00Z", { title: "TypeScript tips" }),
          entry(A.url, "a2", "2024-01-02T00:00:00Z", {
            title: "TypeScript deals",
            summary: "<p>Sponsored post</p>",
          }),
          entry(A.url, "a3", "2024-01-01T00:00:00Z", { title: "Gardening" }),
        ],
      }),
    );

    const merged = mergeEntries([filtered], records, { ...OPTIONS, filter: "typescript" });

    expect(merged.map((e) => e.id)).toEqual(["a1"]);
  });

  it("drops entries older than the newest by more than maxDays", () => {
    const records = snapshot(
      makeRecord(A.url, {
        entries: [
          entry(A.url, "new", "2024-01-10T00:00:00Z"),
          entry(A.url, "edge", "2024-01-08T00:00:00Z"),
          entry(A.url, "old", "2024-01-07T23:59:59Z"),
        ],
      }),
    );

    const merged = mergeEntries([A], records, { ...OPTIONS, maxDays: 2 });

    expect(merged.map((e) => e.id)).toEqual(["new", "edge"]);
  });

  it("returns nothing for an empty snapshot", () => {
    expect(mergeEntries([A, B], new Map(), OPTIONS)).toEqual([]);
  });
});
