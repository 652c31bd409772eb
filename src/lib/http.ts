/**
 * GET helper for the upstream APIs: timeout, User-Agent and retries
 */

import type { PipelineConfig } from "../config/pipeline";
import { retryWithBackoff } from "./backoff";
import { HttpError } from "./errors";
import { logger } from "./logger";

export interface RequestOptions {
  label: string;
  accept: string;
  timeoutMs: number;
  userAgent: string;
  retries: number;
  retryBaseDelayMs: number;
}

/**
 * Request options derived from the pipeline configuration
 */
export function requestOptions(
  config: PipelineConfig,
  label: string,
  accept: string = "application/json",
): RequestOptions {
  return {
    label,
    accept,
    timeoutMs: config.requestTimeoutMs,
    userAgent: config.userAgent,
    retries: config.retryCount,
    retryBaseDelayMs: config.retryBaseDelayMs,
  };
}

/**
 * Fetch a URL and return its body as text.
 * Throws HttpError for non-2xx responses once retries are exhausted.
 */
export async function fetchText(url: string, options: RequestOptions): Promise<string> {
  return retryWithBackoff(
    async (attempt) => {
      logger.debug(`${options.label} request`, { url, attempt: attempt + 1 });

      const res = await fetch(url, {
        method: "GET",
        headers: {
          "User-Agent": options.userAgent,
          "Accept": options.accept,
        },
        signal: AbortSignal.timeout(options.timeoutMs),
      });

      if (!res.ok) {
        const body = await res.text();
        throw new HttpError(res.status, res.statusText, url, body.slice(0, 200));
      }

      return res.text();
    },
    {
      label: options.label,
      retries: options.retries,
      baseDelayMs: options.retryBaseDelayMs,
    },
  );
}
