// pattern: functional-core
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { decodeFeedBytes } from "./encoding";
import { resolveIdentity } from "./identity";
import { decodeEntities, escapeHtml, htmlToText, sanitizeHtml, unwrapXhtmlDiv } from "./sanitize";
import type {
  FeedInfo,
  FeedVariant,
  ParsedEntry,
  ParseOutcome,
  ParseWarning,
  ParseWarningCode,
} from "./types";

const xmlOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  // Prefixes vary between publishers (dc:, DC:, rdf:, atom:); match on local names.
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  processEntities: true,
  htmlEntities: true,
  // Kept as raw source so inline markup keeps its order; see rawBody().
  stopNodes: ["*.title", "*.description", "*.encoded", "*.summary", "*.content"],
};

type XmlNode = Record<string, unknown>;

/**
 * Item fields as read from any of the feed variants, before cleaning.
 * Every variant maps its own element names onto this shape.
 */
type RawItem = {
  readonly guid: string | null;
  readonly title: string | null;
  readonly titleIsHtml: boolean;
  readonly link: string | null;
  readonly dates: ReadonlyArray<string>;
  readonly author: string | null;
  readonly summary: string | null;
  readonly content: string | null;
  readonly categories: ReadonlyArray<string>;
};

type RawFeed = {
  readonly title: string | null;
  readonly link: string | null;
  readonly items: ReadonlyArray<RawItem>;
};

export type ParseFeedOptions = {
  readonly contentType: string | null;
  readonly sourceUrl: string;
  /** Base for relative links; the URL the document was finally served from. */
  readonly baseUrl?: string;
};

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): ReadonlyArray<unknown> {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function first(value: unknown): unknown {
  return asArray(value)[0];
}

function child(node: unknown, name: string): unknown {
  return isNode(node) ? node[name] : undefined;
}

function attr(node: unknown, name: string): string | null {
  const value = child(node, `@_${name}`);
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function textOf(value: unknown): string | null {
  if (typeof value === "string") {
    return value.trim() || null;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return textOf(value[0]);
  }
  if (isNode(value)) {
    return textOf(value["#text"]);
  }
  return null;
}

const CDATA_SECTION = /(<!\[CDATA\[[\s\S]*?\]\]>)/;

/**
 * Decodes the raw source of a body element. CDATA sections are taken as is,
 * escaped text is unescaped, and markup a producer forgot to escape is kept.
 */
function decodeBody(raw: string): string {
  return raw
    .split(CDATA_SECTION)
    .map((part) => {
      if (part.startsWith("<![CDATA[")) {
        return part.slice("<![CDATA[".length, -"]]>".length);
      }
      return /<[A-Za-z/!]/.test(part) ? part : decodeEntities(part);
    })
    .join("")
    .trim();
}

function rawBody(value: unknown): string | null {
  const node = first(value);
  const raw = isNode(node) ? node["#text"] : node;
  return typeof raw === "string" ? raw : null;
}

function bodyOf(value: unknown): string | null {
  const raw = rawBody(value);
  return raw === null ? null : decodeBody(raw) || null;
}

function resolveUrl(href: string | null, base: string): string | null {
  if (!href) return null;
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}

function textList(value: unknown): Array<string> {
  return asArray(value)
    .map((v) => textOf(v))
    .filter((v): v is string => v !== null);
}

/**
 * Identifies the document's root element, skipping the prolog (XML
 * declaration, comments, processing instructions and doctype).
 * Returns null when the text does not start like an XML document.
 */
export function sniffVariant(text: string): FeedVariant | null {
  let rest = text.replace(/^\uFEFF/, "").trimStart();
  const prolog = /^(<\?[\s\S]*?\?>|<!--[\s\S]*?-->|<!DOCTYPE[^[>]*(\[[\s\S]*?\])?\s*>)\s*/i;
  for (let match = prolog.exec(rest); match; match = prolog.exec(rest)) {
    rest = rest.slice(match[0].length);
  }

  const root = /^<([A-Za-z_][\w.:-]*)/.exec(rest);
  if (!root?.[1]) {
    return null;
  }
  const localName = root[1].slice(root[1].indexOf(":") + 1).toLowerCase();
  switch (localName) {
    case "rss":
      return "rss2";
    case "rdf":
      return "rss1";
    case "feed":
      return "atom";
    default:
      return "unknown";
  }
}

function rssItem(item: unknown, base: string): RawItem {
  const guidNode = first(child(item, "guid"));
  const guid = textOf(guidNode);
  let link = textList(child(item, "link"))[0] ?? null;
  // A guid is the item's permalink unless the feed says otherwise.
  if (!link && guid && /^https?:\/\//i.test(guid) && attr(guidNode, "isPermaLink") !== "false") {
    link = guid;
  }

  return {
    guid: guid ?? attr(item, "about"),
    title: bodyOf(child(item, "title")),
    titleIsHtml: true,
    link: resolveUrl(link, base),
    dates: [...textList(child(item, "pubDate")), ...textList(child(item, "date"))],
    author: textOf(child(item, "creator")) ?? textOf(child(item, "author")),
    summary: bodyOf(child(item, "description")),
    content: bodyOf(child(item, "encoded")),
    categories: [...textList(child(item, "category")), ...textList(child(item, "subject"))],
  };
}

function extractRss2(doc: XmlNode, base: string): RawFeed | string {
  const channel = first(child(doc["rss"], "channel"));
  if (!isNode(channel)) {
    return "RSS document has no <channel>";
  }
  return {
    title: bodyOf(child(channel, "title")),
    link: textList(child(channel, "link"))[0] ?? null,
    items: asArray(channel["item"]).map((item) => rssItem(item, base)),
  };
}

function extractRss1(doc: XmlNode, base: string): RawFeed | string {
  const root = doc["RDF"];
  const channel = first(child(root, "channel"));
  if (!isNode(channel)) {
    return "RDF document has no <channel>";
  }
  // RSS 1.0 places items beside the channel; a few producers nest them inside.
  const items = asArray(child(root, "item")).length > 0
    ? asArray(child(root, "item"))
    : asArray(channel["item"]);
  return {
    title: bodyOf(child(channel, "title")),
    link: textList(child(channel, "link"))[0] ?? null,
    items: items.map((item) => rssItem(item, base)),
  };
}

function atomText(value: unknown): { text: string | null; isHtml: boolean } {
  const node = first(value);
  const type = attr(node, "type");
  const raw = rawBody(node);
  if (raw === null) {
    return { text: null, isHtml: false };
  }
  if (type === "xhtml") {
    return { text: unwrapXhtmlDiv(raw) || null, isHtml: true };
  }
  return {
    text: decodeBody(raw) || null,
    isHtml: type === "html" || type === "text/html",
  };
}

function atomBody(value: unknown): string | null {
  const node = first(value);
  if (attr(node, "src")) return null;
  const { text, isHtml } = atomText(node);
  if (text === null) return null;
  return isHtml ? text : escapeHtml(text);
}

function atomLink(links: unknown, base: string): string | null {
  const candidates = asArray(links);
  const alternate =
    candidates.find((l) => {
      const rel = attr(l, "rel");
      return rel === null || rel === "alternate";
    }) ?? candidates[0];
  return resolveUrl(attr(alternate, "href") ?? textOf(alternate), base);
}

function atomAuthor(node: unknown): string | null {
  return textOf(child(first(child(node, "author")), "name"));
}

function extractAtom(doc: XmlNode, base: string): RawFeed {
  const feed = doc["feed"];
  const feedAuthor = atomAuthor(feed);
  const feedBase = attr(feed, "base") ?? base;

  const items = asArray(child(feed, "entry")).map((entry): RawItem => {
    const title = atomText(child(entry, "title"));
    return {
      guid: textOf(child(entry, "id")),
      title: title.text,
      titleIsHtml: title.isHtml,
      link: atomLink(child(entry, "link"), feedBase),
      dates: [
        ...textList(child(entry, "updated")),
        ...textList(child(entry, "published")),
        ...textList(child(entry, "modified")),
        ...textList(child(entry, "issued")),
      ],
      author: atomAuthor(entry) ?? feedAuthor,
      summary: atomBody(child(entry, "summary")),
      content: atomBody(child(entry, "content")),
      categories: asArray(child(entry, "category"))
        .map((c) => attr(c, "term") ?? attr(c, "label"))
        .filter((c): c is string => c !== null),
    };
  });

  return {
    title: atomText(child(feed, "title")).text,
    link: atomLink(child(feed, "link"), base),
    items,
  };
}

function extractVariant(
  variant: Exclude<FeedVariant, "unknown">,
  doc: XmlNode,
  base: string,
): RawFeed | string {
  switch (variant) {
    case "rss2":
      return extractRss2(doc, base);
    case "rss1":
      return extractRss1(doc, base);
    case "atom":
      return isNode(doc["feed"])
        ? extractAtom(doc, base)
        : "Atom document has no <feed> element";
  }
}

class WarningTally {
  private readonly counts = new Map<ParseWarningCode, number>();

  add(code: ParseWarningCode): void {
    this.counts.set(code, (this.counts.get(code) ?? 0) + 1);
  }

  toWarnings(): Array<ParseWarning> {
    const labels: Record<ParseWarningCode, string> = {
      "encoding-fallback": "encoding fell back to default",
      "encoding-replaced": "undecodable bytes replaced",
      "malformed-xml": "document is not well-formed",
      "missing-date": "entries without a timestamp",
      "invalid-date": "entries with an unparseable timestamp",
      "missing-link": "entries without a link",
      "missing-identity": "entries dropped for lack of any identifying field",
      "sanitized-html": "entries with unsafe markup removed",
    };
    return [...this.counts.entries()].map(([code, count]) => ({
      code,
      message: `${labels[code]} (${count})`,
    }));
  }
}

function parseDate(values: ReadonlyArray<string>, tally: WarningTally): Date | null {
  if (values.length === 0) {
    tally.add("missing-date");
    return null;
  }
  for (const value of values) {
    const date = new Date(value);
    if (!isNaN(date.getTime())) {
      return date;
    }
  }
  tally.add("invalid-date");
  return null;
}

function cleanBody(markup: string | null): { html: string | null; stripped: boolean } {
  if (!markup) return { html: null, stripped: false };
  const { html, stripped } = sanitizeHtml(markup);
  return { html: html || null, stripped };
}

function toParsedEntry(
  raw: RawItem,
  sourceUrl: string,
  tally: WarningTally,
): ParsedEntry | null {
  const title = raw.title
    ? (raw.titleIsHtml ? htmlToText(raw.title) : raw.title.replace(/\s+/g, " ").trim()) || null
    : null;
  const publishedAt = parseDate(raw.dates, tally);
  const summary = cleanBody(raw.summary);
  const content = cleanBody(raw.content);
  if (summary.stripped || content.stripped) {
    tally.add("sanitized-html");
  }

  const identity = resolveIdentity(
    {
      guid: raw.guid,
      link: raw.link,
      title,
      publishedAt,
      summary: summary.html ?? content.html,
    },
    sourceUrl,
  );
  if (!identity) {
    tally.add("missing-identity");
    return null;
  }
  if (!raw.link) {
    tally.add("missing-link");
  }

  return {
    id: identity.id,
    identitySource: identity.source,
    title,
    link: raw.link,
    publishedAt,
    author: raw.author,
    summary: summary.html,
    content: content.html,
    categories: raw.categories,
  };
}

/**
 * Turns raw feed bytes into canonical entries.
 *
 * - `ok`: a well-formed document with nothing to report
 * - `partial`: entries were produced but something was coerced or dropped
 *   (encoding, broken XML, missing dates or links, unsafe markup)
 * - `failed`: not XML at all, or no RSS/Atom root element
 *
 * Timestamps are reported as found; defaulting missing ones is left to the
 * cache window, which knows when an item was first seen.
 */
export function parseFeed(bytes: Uint8Array, options: ParseFeedOptions): ParseOutcome {
  const decoded = decodeFeedBytes(bytes, options.contentType);
  const variant = sniffVariant(decoded.text);
  if (variant === null) {
    return { status: "failed", reason: "document is not XML" };
  }
  if (variant === "unknown") {
    return { status: "failed", reason: "no RSS or Atom root element" };
  }

  const tally = new WarningTally();
  if (XMLValidator.validate(decoded.text) !== true) {
    tally.add("malformed-xml");
  }

  let doc: unknown;
  try {
    doc = new XMLParser(xmlOptions).parse(decoded.text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { status: "failed", reason: `unparseable XML: ${message}` };
  }
  if (!isNode(doc)) {
    return { status: "failed", reason: "no RSS or Atom root element" };
  }

  const raw = extractVariant(variant, doc, options.baseUrl ?? options.sourceUrl);
  if (typeof raw === "string") {
    return { status: "failed", reason: raw };
  }

  const seen = new Set<string>();
  const entries: Array<ParsedEntry> = [];
  for (const item of raw.items) {
    const entry = toParsedEntry(item, options.sourceUrl, tally);
    if (entry && !seen.has(entry.id)) {
      seen.add(entry.id);
      entries.push(entry);
    }
  }

  const feed: FeedInfo = {
    variant,
    title: raw.title ? htmlToText(raw.title) || null : null,
    link: raw.link,
  };
  const warnings = [...decoded.warnings, ...tally.toWarnings()];
  if (warnings.length > 0) {
    return { status: "partial", feed, entries, warnings };
  }
  return { status: "ok", feed, entries };
}
