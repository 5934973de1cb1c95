/**
 * Raised when the feed list cannot be loaded. Without sources there is
 * nothing to aggregate, so this always ends the run.
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/**
 * Raised when the cache store as a whole cannot be opened or written.
 * A failed save for a single source is reported per source instead.
 */
export class CacheIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CacheIoError";
  }
}

/**
 * Raised while streaming a response body that grows past the configured cap.
 */
export class ContentTooLargeError extends Error {
  constructor(
    public readonly url: string,
    public readonly maxBytes: number,
    public readonly receivedBytes: number,
  ) {
    super(`response body exceeds maximum size of ${maxBytes} bytes`);
    this.name = "ContentTooLargeError";
  }
}

