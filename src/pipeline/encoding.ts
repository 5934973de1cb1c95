import { TextDecoder } from "node:util";
import type { ParseWarning } from "./types";

export type DecodedDocument = {
  readonly text: string;
  readonly encoding: string;
  readonly warnings: ReadonlyArray<ParseWarning>;
};

const DEFAULT_ENCODING = "utf-8";

function sniffBom(bytes: Uint8Array): string | null {
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return "utf-8";
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return "utf-16be";
  }
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return "utf-16le";
  }
  return null;
}

export function charsetFromContentType(contentType: string | null): string | null {
  if (!contentType) return null;
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType);
  return match?.[1]?.toLowerCase() ?? null;
}

export function encodingFromDeclaration(bytes: Uint8Array): string | null {
  // The declaration is ASCII in every encoding we can decode with it.
  const head = Buffer.from(bytes.subarray(0, 512)).toString("latin1");
  const match = /^\s*<\?xml[^>]*?encoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/.exec(head);
  return match?.[1]?.toLowerCase() ?? null;
}

function createDecoder(label: string, fatal: boolean): TextDecoder | null {
  try {
    return new TextDecoder(label, { fatal });
  } catch {
    return null;
  }
}

/**
 * Decodes raw feed bytes to text.
 *
 * Encoding precedence: byte order mark, then the Content-Type charset, then
 * the XML declaration, then UTF-8. Unknown labels fall back to UTF-8 and
 * undecodable byte sequences are replaced; both are reported as warnings.
 */
export function decodeFeedBytes(
  bytes: Uint8Array,
  contentType: string | null,
): DecodedDocument {
  const warnings: Array<ParseWarning> = [];
  let label =
    sniffBom(bytes) ??
    charsetFromContentType(contentType) ??
    encodingFromDeclaration(bytes) ??
    DEFAULT_ENCODING;

  let strict = createDecoder(label, true);
  if (!strict) {
    warnings.push({
      code: "encoding-fallback",
      message: `unsupported encoding "${label}", decoded as ${DEFAULT_ENCODING}`,
    });
    label = DEFAULT_ENCODING;
    strict = new TextDecoder(label, { fatal: true });
  }

  try {
    return { text: strict.decode(bytes), encoding: label, warnings };
  } catch {
    warnings.push({
      code: "encoding-replaced",
      message: `invalid ${label} byte sequences were replaced`,
    });
    const lenient = new TextDecoder(label);
    return { text: lenient.decode(bytes), encoding: label, warnings };
  }
}
