/**
 * Client for the job-board source API (hh.ru-compatible).
 * Every request draws a token from the shared RateLimiter first.
 */

import { logger } from "../logger";
import { RateLimitExceededError, TransportError } from "../errors";
import { fetchWithRetry } from "./http";
import type { FetchResult } from "./http";
import type { ExistenceChecker } from "../ports";
import type { RateLimiter } from "../resilience/rate-limiter";
import type { SourcePosting, WorkItem } from "../types";

export interface SourceClientOptions {
  baseUrl: string;
  token?: string;
  limiter: RateLimiter;
  timeoutMs: number;
  maxRetries: number;
  backoffStartMs: number;
  perPage: number;
  sleep?: (ms: number) => Promise<void>;
}

interface PostingDetail extends SourcePosting {
  archived: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function parsePosting(body: unknown): PostingDetail | null {
  if (!isRecord(body)) return null;
  const { id, name, employer, alternate_url, description, published_at, archived } =
    body;

  if (typeof id !== "string" && typeof id !== "number") return null;
  if (typeof name !== "string" || typeof published_at !== "string") return null;

  const employerName =
    isRecord(employer) && typeof employer.name === "string" ? employer.name : "";

  return {
    id: String(id),
    name,
    employer: { name: employerName },
    alternate_url: typeof alternate_url === "string" ? alternate_url : "",
    description: typeof description === "string" ? description : undefined,
    published_at,
    archived: archived === true,
  };
}

function parseSearchPage(
  body: unknown,
): { items: SourcePosting[]; pages: number } | null {
  if (!isRecord(body) || !Array.isArray(body.items)) return null;
  const items: SourcePosting[] = [];
  for (const raw of body.items) {
    const posting = parsePosting(raw);
    if (posting) items.push(posting);
  }
  const pages = typeof body.pages === "number" ? body.pages : 1;
  return { items, pages };
}

export class SourceClient implements ExistenceChecker {
  constructor(private readonly options: SourceClientOptions) {}

  /** False when the posting is gone (404) or archived upstream. */
  async exists(item: WorkItem): Promise<boolean> {
    const result = await this.get(
      `/vacancies/${encodeURIComponent(item.id)}`,
      parsePosting,
    );

    if (result.success && result.data) {
      return !result.data.archived;
    }
    if (result.statusCode === 404) {
      return false;
    }
    throw this.toError(result);
  }

  async getPosting(id: string): Promise<SourcePosting | null> {
    const result = await this.get(
      `/vacancies/${encodeURIComponent(id)}`,
      parsePosting,
    );
    if (result.success && result.data) return result.data;
    if (result.statusCode === 404) return null;
    throw this.toError(result);
  }

  /** First page of postings for a query, newest first. */
  async searchPostings(query: string): Promise<SourcePosting[]> {
    const params = new URLSearchParams({
      text: query,
      per_page: String(this.options.perPage),
      order_by: "publication_time",
    });
    const result = await this.get(`/vacancies?${params.toString()}`, parseSearchPage);

    if (!result.success || !result.data) {
      throw this.toError(result);
    }
    logger.info(
      `[Source] "${query}": ${result.data.items.length} postings in ${result.responseTimeMs}ms`,
    );
    return result.data.items;
  }

  private get<T>(
    path: string,
    parse: (body: unknown) => T | null,
  ): Promise<FetchResult<T>> {
    const headers: Record<string, string> = {};
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    return fetchWithRetry({
      url: `${this.options.baseUrl.replace(/\/+$/, "")}${path}`,
      timeoutMs: this.options.timeoutMs,
      maxRetries: this.options.maxRetries,
      backoffStartMs: this.options.backoffStartMs,
      parse,
      headers,
      limiter: this.options.limiter,
      sleep: this.options.sleep,
    });
  }

  private toError<T>(result: FetchResult<T>): Error {
    if (result.rateLimited) {
      return new RateLimitExceededError(result.error ?? "Source API rate limit");
    }
    return new TransportError(result.error ?? "Source API request failed", {
      statusCode: result.statusCode,
    });
  }
}
