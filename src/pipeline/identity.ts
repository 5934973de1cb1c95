import { createHash } from "node:crypto";
import { htmlToText } from "./sanitize";
import type { IdentitySource } from "./types";

export type IdentityInput = {
  readonly guid: string | null;
  readonly link: string | null;
  readonly title: string | null;
  readonly publishedAt: Date | null;
  readonly summary: string | null;
};

export type Identity = {
  readonly id: string;
  readonly source: IdentitySource;
};

const URI_SCHEME = /^[a-z][a-z0-9+.-]*:/i;

/**
 * Lowercases scheme and host, drops the fragment and any default port.
 * Strings that are not absolute URLs are only trimmed.
 */
export function normalizeLink(link: string): string {
  const trimmed = link.trim();
  try {
    const url = new URL(trimmed);
    url.hash = "";
    return url.toString();
  } catch {
    return trimmed;
  }
}

export function normalizeTitle(title: string): string {
  return htmlToText(title).normalize("NFC").toLowerCase();
}

function fingerprint(kind: string, parts: ReadonlyArray<string>): string {
  const hash = createHash("sha256");
  hash.update([kind, ...parts].join("\n"));
  return `urn:sha256:${hash.digest("hex")}`;
}

/**
 * Picks a stable identity for an item.
 *
 * Priority: the feed's own id, then link + title, then title + timestamp,
 * then title + summary. Feed ids that are not URIs (bare counters such as
 * "42") are qualified with the source URL so they cannot collide with
 * another feed's. Fingerprints are not source-scoped: the same link and title
 * published by two feeds is the same item.
 *
 * Returns null when the item carries nothing to identify it by.
 */
export function resolveIdentity(
  input: IdentityInput,
  sourceUrl: string,
): Identity | null {
  const guid = input.guid?.trim();
  if (guid) {
    const id = URI_SCHEME.test(guid) ? guid : `${sourceUrl}#${guid}`;
    return { id, source: "guid" };
  }

  const title = input.title ? normalizeTitle(input.title) : "";

  if (input.link) {
    return {
      id: fingerprint("link-title", [normalizeLink(input.link), title]),
      source: "link-title",
    };
  }

  if (title && input.publishedAt) {
    return {
      id: fingerprint("title-date", [title, input.publishedAt.toISOString()]),
      source: "title-date",
    };
  }

  const summary = input.summary ? normalizeTitle(input.summary) : "";
  if (title || summary) {
    return {
      id: fingerprint("title-summary", [title, summary]),
      source: "title-summary",
    };
  }

  return null;
}
