/**
 * Tests for retry and backoff behaviour
 */

import { describe, it, expect, vi } from "vitest";
import { calculateDelay, retryWithBackoff } from "../../src/lib/backoff";
import { FeedParseError, HttpError, isTransientError } from "../../src/lib/errors";

describe("calculateDelay", () => {
  it("doubles per attempt up to the cap", () => {
    expect(calculateDelay(0, 1000)).toBe(1000);
    expect(calculateDelay(2, 1000)).toBe(4000);
    expect(calculateDelay(10, 1000)).toBe(60000);
  });
});

describe("isTransientError", () => {
  it("retries rate limits, server errors and network failures", () => {
    expect(isTransientError(new HttpError(429, "Too Many Requests", "https://example.test"))).toBe(true);
    expect(isTransientError(new HttpError(503, "Service Unavailable", "https://example.test"))).toBe(true);
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
    expect(isTransientError(Object.assign(new Error("timed out"), { name: "TimeoutError" }))).toBe(true);
  });

  it("does not retry client errors or parse errors", () => {
    expect(isTransientError(new HttpError(404, "Not Found", "https://example.test"))).toBe(false);
    expect(isTransientError(new FeedParseError("arxiv", "bad feed"))).toBe(false);
    expect(isTransientError(new Error("boom"))).toBe(false);
    expect(isTransientError("boom")).toBe(false);
  });
});

describe("retryWithBackoff", () => {
  const options = { retries: 2, baseDelayMs: 0, label: "test call" };

  it("returns the first successful result", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce("ok");

    await expect(retryWithBackoff(fn, options)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenLastCalledWith(1);
  });

  it("rethrows the last error once retries run out", async () => {
    const failure = new HttpError(502, "Bad Gateway", "https://example.test");
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(failure);

    await expect(retryWithBackoff(fn, options)).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("does not retry errors the predicate rejects", async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new TypeError("fetch failed"));

    await expect(retryWithBackoff(fn, { ...options, isRetryable: () => false })).rejects.toThrow("fetch failed");
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
