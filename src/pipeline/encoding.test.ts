import { describe, it, expect } from "vitest";
import { charsetFromContentType, decodeFeedBytes, encodingFromDeclaration } from "./encoding";

describe("charsetFromContentType", () => {
  it("reads quoted and unquoted charsets", () => {
    expect(charsetFromContentType('application/rss+xml; charset="UTF-8"')).toBe("utf-8");
    expect(charsetFromContentType("text/xml;charset=ISO-8859-1")).toBe("iso-8859-1");
  });

  it("returns null without a charset", () => {
    expect(charsetFromContentType("text/xml")).toBeNull();
    expect(charsetFromContentType(null)).toBeNull();
  });
});

describe("encodingFromDeclaration", () => {
  it("reads the encoding pseudo-attribute", () => {
    const bytes = Buffer.from("<?xml version='1.0' encoding='Windows-1252'?><rss/>");
    expect(encodingFromDeclaration(bytes)).toBe("windows-1252");
  });

  it("returns null without a declaration", () => {
    expect(encodingFromDeclaration(Buffer.from("<rss/>"))).toBeNull();
  });
});

describe("decodeFeedBytes", () => {
  it("defaults to UTF-8", () => {
    expect(decodeFeedBytes(Buffer.from("<rss>é</rss>"), null)).toEqual({
      text: "<rss>é</rss>",
      encoding: "utf-8",
      warnings: [],
    });
  });

  it("uses the Content-Type charset", () => {
    const bytes = Buffer.from("<rss>caf\xe9</rss>", "latin1");

    const decoded = decodeFeedBytes(bytes, "text/xml; charset=ISO-8859-1");

    expect(decoded.text).toBe("<rss>café</rss>");
    expect(decoded.encoding).toBe("iso-8859-1");
  });

  it("uses the XML declaration when the header has no charset", () => {
    const bytes = Buffer.from(
      '<?xml version="1.0" encoding="windows-1252"?><rss>caf\xe9</rss>',
      "latin1",
    );

    const decoded = decodeFeedBytes(bytes, "application/xml");

    expect(decoded.text).toBe('<?xml version="1.0" encoding="windows-1252"?><rss>café</rss>');
    expect(decoded.encoding).toBe("windows-1252");
  });

  it("lets a byte order mark win over the header", () => {
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("<rss>é</rss>")]);

    const decoded = decodeFeedBytes(bytes, "text/xml; charset=iso-8859-1");

    expect(decoded.encoding).toBe("utf-8");
    expect(decoded.text).toBe("<rss>é</rss>");
  });

  it("falls back to UTF-8 for an unknown encoding", () => {
    const decoded = decodeFeedBytes(Buffer.from("<rss/>"), "text/xml; charset=x-made-up");

    expect(decoded.text).toBe("<rss/>");
    expect(decoded.encoding).toBe("utf-8");
    expect(decoded.warnings).toEqual([
      {
        code: "encoding-fallback",
        message: 'unsupported encoding "x-made-up", decoded as utf-8',
      },
    ]);
  });

  it("replaces invalid byte sequences", () => {
    const bytes = Buffer.from([0x3c, 0x61, 0x3e, 0xff, 0x3c, 0x2f, 0x61, 0x3e]);

    const decoded = decodeFeedBytes(bytes, null);

    expect(decoded.text).toBe("<a>\uFFFD</a>");
    expect(decoded.warnings).toEqual([
      {
        code: "encoding-replaced",
        message: "invalid utf-8 byte sequences were replaced",
      },
    ]);
  });
});
