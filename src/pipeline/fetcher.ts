import type { Logger } from "pino";
import { ContentTooLargeError } from "../errors";
import type { ConditionalMetadata, FetchFailure, FetchResult } from "./types";

export type FetchFeedOptions = {
  readonly timeoutMs: number;
  readonly maxBytes: number;
  readonly maxRedirects: number;
  readonly userAgent: string;
  /** Run-level cancellation; aborting it ends the fetch as a timeout. */
  readonly signal?: AbortSignal;
  readonly now: () => Date;
};

const FEED_ACCEPT =
  "application/atom+xml, application/rss+xml, application/rdf+xml;q=0.9, application/xml;q=0.8, text/xml;q=0.8, */*;q=0.5";

function isRedirect(statusCode: number): boolean {
  return statusCode >= 300 && statusCode < 400 && statusCode !== 304;
}

function isPermanentRedirect(statusCode: number): boolean {
  return statusCode === 301 || statusCode === 308;
}

async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

/**
 * Reads a response body into a Buffer, giving up as soon as it grows past
 * `maxBytes`. A declared Content-Length above the cap is rejected before
 * any bytes are read.
 */
export async function readBodyWithLimit(
  response: Response,
  maxBytes: number,
  url: string,
): Promise<Buffer> {
  const contentLength = response.headers.get("content-length");
  if (contentLength) {
    const declared = parseInt(contentLength, 10);
    if (!isNaN(declared) && declared > maxBytes) {
      await discardBody(response);
      throw new ContentTooLargeError(url, maxBytes, declared);
    }
  }

  if (!response.body) {
    return Buffer.alloc(0);
  }

  const reader = response.body.getReader();
  const chunks: Array<Uint8Array> = [];
  let received = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    received += value.byteLength;
    if (received > maxBytes) {
      await reader.cancel();
      throw new ContentTooLargeError(url, maxBytes, received);
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks, received);
}

function transportFailure(err: unknown, signal: AbortSignal): FetchFailure {
  if (signal.aborted) {
    return { kind: "timeout" };
  }
  if (err instanceof ContentTooLargeError) {
    return { kind: "too-large", maxBytes: err.maxBytes };
  }
  const message = err instanceof Error ? err.message : String(err);
  const cause =
    err instanceof Error && err.cause instanceof Error ? `: ${err.cause.message}` : "";
  return { kind: "connection-error", message: `${message}${cause}` };
}

export function describeFetchFailure(failure: FetchFailure): string {
  switch (failure.kind) {
    case "timeout":
      return "timeout";
    case "connection-error":
      return `connection error: ${failure.message}`;
    case "http-error":
      return `HTTP ${failure.statusCode}`;
    case "too-large":
      return `response larger than ${failure.maxBytes} bytes`;
  }
}

/**
 * Retrieves one feed with conditional GET semantics.
 *
 * The request goes to the URL the feed last moved to, if any, with
 * `If-None-Match` / `If-Modified-Since` taken from the prior metadata.
 * Redirects are followed by hand so a chain made only of permanent
 * redirects can be remembered as the feed's new location.
 *
 * Never throws: every failure is returned as a classified `failed` result.
 */
export async function fetchFeed(
  url: string,
  prior: ConditionalMetadata | null,
  options: FetchFeedOptions,
  logger: Logger,
): Promise<FetchResult> {
  const headers: Record<string, string> = {
    "User-Agent": options.userAgent,
    Accept: FEED_ACCEPT,
  };
  if (prior?.etag) {
    headers["If-None-Match"] = prior.etag;
  }
  if (prior?.lastModified) {
    headers["If-Modified-Since"] = prior.lastModified;
  }

  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = options.signal
    ? AbortSignal.any([options.signal, timeout])
    : timeout;

  const requestUrl = prior?.movedTo ?? url;
  let currentUrl = requestUrl;
  let redirected = false;
  let permanentOnly = true;

  for (let redirectCount = 0; ; redirectCount++) {
    let response: Response;
    try {
      response = await fetch(currentUrl, {
        method: "GET",
        headers,
        signal,
        redirect: "manual",
      });
    } catch (err) {
      return { status: "failed", reason: transportFailure(err, signal) };
    }

    if (isRedirect(response.status)) {
      const location = response.headers.get("location");
      await discardBody(response);
      if (!location || redirectCount >= options.maxRedirects) {
        logger.debug(
          { feedUrl: url, statusCode: response.status, location },
          "redirect not followed",
        );
        return {
          status: "failed",
          reason: { kind: "http-error", statusCode: response.status },
        };
      }
      if (!isPermanentRedirect(response.status)) {
        permanentOnly = false;
      }
      redirected = true;
      currentUrl = new URL(location, currentUrl).toString();
      continue;
    }

    if (response.status === 304) {
      await discardBody(response);
      return { status: "unchanged", checkedAt: options.now() };
    }

    if (!response.ok) {
      await discardBody(response);
      return {
        status: "failed",
        reason: { kind: "http-error", statusCode: response.status },
      };
    }

    let body: Buffer;
    try {
      body = await readBodyWithLimit(response, options.maxBytes, currentUrl);
    } catch (err) {
      return { status: "failed", reason: transportFailure(err, signal) };
    }

    let movedTo: string | null = requestUrl !== url ? requestUrl : null;
    if (redirected && permanentOnly) {
      movedTo = currentUrl;
      logger.warn({ feedUrl: url, movedTo }, "feed has moved permanently");
    }

    return {
      status: "fetched",
      body,
      contentType: response.headers.get("content-type"),
      finalUrl: currentUrl,
      metadata: {
        etag: response.headers.get("etag"),
        lastModified: response.headers.get("last-modified"),
        lastFetchedAt: options.now(),
        movedTo,
      },
    };
  }
}
