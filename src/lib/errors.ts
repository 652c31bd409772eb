/**
 * Error types shared by the source clients, storage and configuration
 */

/**
 * Non-2xx response from an upstream API
 */
export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string, body?: string) {
    super(`HTTP ${status} ${statusText} from ${url}${body ? ` - ${body}` : ""}`);
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }

  /** Rate limiting and server-side failures are worth another attempt */
  get transient(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

/**
 * Upstream body that could not be parsed or did not match the expected shape
 */
export class FeedParseError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = "FeedParseError";
    this.source = source;
  }
}

/**
 * Snapshot or index file that cannot be read or written
 */
export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StorageError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// fetch() rejects with a TypeError on network failure and a
// TimeoutError/AbortError DOMException when AbortSignal.timeout fires
const TRANSIENT_ERROR_NAMES = new Set(["TypeError", "TimeoutError", "AbortError"]);

/**
 * Whether a failed request should be retried
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.transient;
  }
  if (error instanceof FeedParseError || error instanceof StorageError || error instanceof ConfigError) {
    return false;
  }
  if (typeof error === "object" && error !== null && "name" in error && typeof error.name === "string") {
    return TRANSIENT_ERROR_NAMES.has(error.name);
  }
  return false;
}
