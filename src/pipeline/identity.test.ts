import { describe, it, expect } from "vitest";
import { normalizeLink, normalizeTitle, resolveIdentity } from "./identity";
import type { IdentityInput } from "./identity";

const SOURCE = "https://example.com/rss";
const FINGERPRINT = /^urn:sha256:[0-9a-f]{64}$/;

function input(overrides: Partial<IdentityInput>): IdentityInput {
  return {
    guid: null,
    link: null,
    title: null,
    publishedAt: null,
    summary: null,
    ...overrides,
  };
}

describe("normalizeLink", () => {
  it("lowercases scheme and host and drops the fragment and default port", () => {
    expect(normalizeLink(" HTTPS://Example.COM:443/a?b=1#frag ")).toBe(
      "https://example.com/a?b=1",
    );
  });

  it("trims strings that are not absolute URLs", () => {
    expect(normalizeLink(" /relative/path ")).toBe("/relative/path");
  });
});

describe("normalizeTitle", () => {
  it("strips markup, collapses whitespace and lowercases", () => {
    expect(normalizeTitle("  Hello \n <b>World</b> ")).toBe("hello world");
  });
});

describe("resolveIdentity", () => {
  it("uses a feed id that is already a URI", () => {
    expect(resolveIdentity(input({ guid: " tag:example.com,2024:1 " }), SOURCE)).toEqual({
      id: "tag:example.com,2024:1",
      source: "guid",
    });
  });

  it("qualifies a bare feed id with the source URL", () => {
    expect(resolveIdentity(input({ guid: "42" }), SOURCE)).toEqual({
      id: "https://example.com/rss#42",
      source: "guid",
    });
  });

  it("fingerprints link and title when there is no feed id", () => {
    const identity = resolveIdentity(
      input({ link: "https://example.com/post", title: "Hello" }),
      SOURCE,
    );

    expect(identity?.source).toBe("link-title");
    expect(identity?.id).toMatch(FINGERPRINT);
  });

  it("ignores incidental whitespace, markup and link case in the fingerprint", () => {
    const a = resolveIdentity(
      input({ link: "https://Example.com/post#comments", title: "Hello  <b>World</b>" }),
      SOURCE,
    );
    const b = resolveIdentity(
      input({ link: "https://example.com/post", title: "hello world" }),
      SOURCE,
    );

    expect(a?.id).toBe(b?.id);
  });

  it("does not scope fingerprints by source", () => {
    const item = input({ link: "https://example.com/post", title: "Hello" });

    expect(resolveIdentity(item, "https://a.example.org/feed")?.id).toBe(
      resolveIdentity(item, "https://b.example.org/feed")?.id,
    );
  });

  it("tells different links apart", () => {
    const a = resolveIdentity(input({ link: "https://example.com/1", title: "Same" }), SOURCE);
    const b = resolveIdentity(input({ link: "https://example.com/2", title: "Same" }), SOURCE);

    expect(a?.id).not.toBe(b?.id);
  });

  it("falls back to title and timestamp without a link", () => {
    const identity = resolveIdentity(
      input({ title: "Release notes", publishedAt: new Date("2024-01-01T00:00:00.000Z") }),
      SOURCE,
    );

    expect(identity?.source).toBe("title-date");
    expect(identity?.id).toMatch(FINGERPRINT);
  });

  it("falls back to title and summary without link or timestamp", () => {
    const identity = resolveIdentity(input({ title: "Note", summary: "<p>body</p>" }), SOURCE);

    expect(identity?.source).toBe("title-summary");
  });

  it("returns null when nothing identifies the item", () => {
    expect(resolveIdentity(input({ guid: "   " }), SOURCE)).toBeNull();
  });
});
