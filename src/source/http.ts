import { logger } from "../logger";
import type { RateLimiter } from "../resilience/rate-limiter";

export interface FetchWithRetryOptions<T> {
  url: string;
  timeoutMs: number;
  maxRetries: number;
  backoffStartMs: number;
  /** Narrows the decoded JSON body; returning null marks the response malformed. */
  parse: (body: unknown) => T | null;
  headers?: Record<string, string>;
  /** Consulted before every attempt; its RateLimitExceededError propagates. */
  limiter?: RateLimiter;
  sleep?: (ms: number) => Promise<void>;
}

export interface FetchResult<T> {
  data: T | null;
  success: boolean;
  error?: string;
  rateLimited: boolean;
  responseTimeMs: number;
  statusCode?: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function fetchWithRetry<T>(
  options: FetchWithRetryOptions<T>,
): Promise<FetchResult<T>> {
  const { url, timeoutMs, maxRetries, backoffStartMs, parse, limiter } = options;
  const wait = options.sleep ?? sleep;
  let lastError = "";
  let rateLimited = false;
  const startTime = Date.now();

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (limiter) await limiter.tryConsume();

    let timeout: ReturnType<typeof setTimeout> | undefined;
    try {
      const controller = new AbortController();
      timeout = setTimeout(() => controller.abort(), timeoutMs);

      const response = await fetch(url, {
        signal: controller.signal,
        headers: {
          Accept: "application/json",
          "User-Agent": "PostingEnrichmentPipeline/1.0",
          ...options.headers,
        },
      });

      if (response.status === 429) {
        rateLimited = true;
        const retryAfter = Number.parseInt(
          response.headers.get("Retry-After") ?? "",
          10,
        );
        const waitMs = Number.isNaN(retryAfter)
          ? backoffStartMs * Math.pow(2, attempt)
          : retryAfter * 1000;

        logger.warn(
          `Rate limited (429) on ${url} — waiting ${waitMs}ms (attempt ${attempt + 1}/${maxRetries + 1})`,
        );

        if (attempt < maxRetries) {
          await wait(waitMs);
          continue;
        }

        return {
          data: null,
          success: false,
          error: `Rate limited after ${maxRetries + 1} attempts`,
          rateLimited: true,
          responseTimeMs: Date.now() - startTime,
          statusCode: 429,
        };
      }

      if (response.status >= 500) {
        lastError = `Server error: ${response.status} ${response.statusText}`;
        logger.warn(
          `${lastError} on ${url} (attempt ${attempt + 1}/${maxRetries + 1})`,
        );

        if (attempt < maxRetries) {
          await wait(backoffStartMs * Math.pow(2, attempt));
          continue;
        }

        return {
          data: null,
          success: false,
          error: lastError,
          rateLimited: false,
          responseTimeMs: Date.now() - startTime,
          statusCode: response.status,
        };
      }

      if (!response.ok) {
        return {
          data: null,
          success: false,
          error: `HTTP ${response.status}: ${response.statusText}`,
          rateLimited: false,
          responseTimeMs: Date.now() - startTime,
          statusCode: response.status,
        };
      }

      // Timeout stays armed until the body is read.
      const body: unknown = await response.json();
      const data = parse(body);
      if (data === null) {
        return {
          data: null,
          success: false,
          error: `Unexpected response shape from ${url}`,
          rateLimited: false,
          responseTimeMs: Date.now() - startTime,
          statusCode: response.status,
        };
      }

      return {
        data,
        success: true,
        rateLimited: false,
        responseTimeMs: Date.now() - startTime,
        statusCode: response.status,
      };
    } catch (error) {
      const isAbort = error instanceof Error && error.name === "AbortError";
      lastError = isAbort ? `Timeout after ${timeoutMs}ms` : String(error);

      logger.warn(
        `Fetch error on ${url}: ${lastError} (attempt ${attempt + 1}/${maxRetries + 1})`,
      );

      if (attempt < maxRetries) {
        await wait(backoffStartMs * Math.pow(2, attempt));
        continue;
      }
    } finally {
      clearTimeout(timeout);
    }
  }

  return {
    data: null,
    success: false,
    error: lastError,
    rateLimited,
    responseTimeMs: Date.now() - startTime,
  };
}
