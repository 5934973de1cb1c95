// pattern: functional-core
import * as cheerio from "cheerio";
import sanitize from "sanitize-html";

const ALLOWED: sanitize.IOptions = {
  allowedTags: sanitize.defaults.allowedTags.concat([
    "img",
    "picture",
    "source",
    "del",
    "ins",
    "details",
    "summary",
  ]),
  allowedAttributes: {
    "*": ["class", "title", "lang", "dir"],
    a: ["href", "name", "target", "rel"],
    img: ["src", "srcset", "alt", "width", "height", "loading"],
    source: ["srcset", "type", "media"],
    td: ["colspan", "rowspan"],
    th: ["colspan", "rowspan", "scope"],
    time: ["datetime"],
  },
  allowedSchemes: ["http", "https", "mailto"],
  nonTextTags: ["script", "style", "textarea", "option", "noscript"],
};

// Same serializer with nothing filtered, for telling whether ALLOWED removed anything.
const UNFILTERED: sanitize.IOptions = {
  allowedTags: false,
  allowedAttributes: false,
  allowedSchemesAppliedToAttributes: [],
};

export type SanitizedHtml = {
  readonly html: string;
  readonly stripped: boolean;
};

/**
 * Cleans an HTML fragment taken from a feed body against an allowlist of
 * tags, attributes and URL schemes. Unclosed or misnested markup comes back
 * well-formed.
 */
export function sanitizeHtml(fragment: string): SanitizedHtml {
  const html = sanitize(fragment, ALLOWED);
  return { html: html.trim(), stripped: html !== sanitize(fragment, UNFILTERED) };
}

export function htmlToText(fragment: string): string {
  const $ = cheerio.load(fragment, null, false);
  return $.root().text().replace(/\s+/g, " ").trim();
}

/** Replaces character and entity references (`&amp;`, `&#233;`, `&nbsp;`). */
export function decodeEntities(text: string): string {
  if (!text.includes("&")) return text;
  return cheerio.load(text, null, false).root().text();
}

/**
 * Atom XHTML bodies are wrapped in one `<div>` that is not part of the
 * content; returns what is inside it, or the markup unchanged when there is
 * no single wrapper.
 */
export function unwrapXhtmlDiv(markup: string): string {
  const $ = cheerio.load(markup, null, false);
  const top = $.root().children();
  if (top.length === 1 && top.is("div") && $.root().text().trim() === top.text().trim()) {
    return (top.html() ?? "").trim();
  }
  return markup.trim();
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}
