import { describe, it, expect } from "vitest";
import { buildPlanetDocument } from "./document";
import type { RenderInput } from "./document";
import { makeEntry } from "../test-utils/db";

const input: RenderInput = {
  planet: {
    name: "Test Planet",
    link: "https://planet.example.com/",
    ownerName: "Test Owner",
  },
  generatedAt: new Date("2024-03-01T12:00:00.000Z"),
  entries: [
    {
      ...makeEntry({ author: "Alice", categories: ["news"], summary: "<p>hi</p>" }),
      source: { url: "https://example.com/rss", name: "Example Feed", category: "blogs" },
    },
  ],
  sources: [
    {
      url: "https://example.com/rss",
      name: "Example Feed",
      category: "blogs",
      feedTitle: "Example",
      feedLink: "https://example.com/",
      status: "fetched",
      lastFetchedAt: new Date("2024-03-01T11:59:00.000Z"),
      lastFailure: null,
    },
    {
      url: "https://down.example.com/rss",
      name: "Down Feed",
      category: null,
      feedTitle: null,
      feedLink: null,
      status: "failed",
      lastFetchedAt: null,
      lastFailure: "HTTP 503",
    },
  ],
};

describe("buildPlanetDocument", () => {
  it("serializes dates as ISO strings and fills absent fields with null", () => {
    expect(buildPlanetDocument(input)).toEqual({
      planet: {
        name: "Test Planet",
        link: "https://planet.example.com/",
        owner: { name: "Test Owner", email: null },
      },
      generatedAt: "2024-03-01T12:00:00.000Z",
      entries: [
        {
          id: "https://example.com/posts/1",
          title: "Test Entry",
          link: "https://example.com/posts/1",
          published: "2024-01-01T00:00:00.000Z",
          dateSource: "feed",
          author: "Alice",
          summary: "<p>hi</p>",
          content: null,
          categories: ["news"],
          source: { url: "https://example.com/rss", name: "Example Feed", category: "blogs" },
        },
      ],
      sources: [
        {
          url: "https://example.com/rss",
          name: "Example Feed",
          category: "blogs",
          title: "Example",
          link: "https://example.com/",
          status: "fetched",
          lastFetched: "2024-03-01T11:59:00.000Z",
          lastFailure: null,
        },
        {
          url: "https://down.example.com/rss",
          name: "Down Feed",
          category: null,
          title: null,
          link: null,
          status: "failed",
          lastFetched: null,
          lastFailure: "HTTP 503",
        },
      ],
    });
  });

  it("leaves out the internal first-seen and hidden fields", () => {
    const entry = buildPlanetDocument(input).entries[0];

    expect(entry).not.toHaveProperty("firstSeenAt");
    expect(entry).not.toHaveProperty("hidden");
  });
});
