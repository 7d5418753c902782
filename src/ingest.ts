import { logger } from "./logger";
import { errorMessage } from "./errors";
import { DuplicateIndex } from "./dedup";
import type { StatusStore } from "./ports";
import type { SourceClient } from "./source";
import type { SourcePosting, WorkItem } from "./types";

export interface IngestOptions {
  store: StatusStore;
  queue: { enqueueBatch(ids: string[]): Promise<number> };
  dedupWindowDays: number;
  similarityThreshold: number;
  now?: Date;
}

export interface IngestResult {
  found: number;
  new: number;
  duplicate: number;
  queued: number;
}

function toPriorityKey(publishedAt: string, fallback: Date): string {
  const time = Date.parse(publishedAt);
  return new Date(Number.isNaN(time) ? fallback.getTime() : time).toISOString();
}

/** Persists unseen postings as QUEUED and hands them to the queue. */
export async function ingestPostings(
  postings: SourcePosting[],
  options: IngestOptions,
): Promise<IngestResult> {
  const now = options.now ?? new Date();
  const nowIso = now.toISOString();
  const since = new Date(
    now.getTime() - options.dedupWindowDays * 24 * 60 * 60 * 1000,
  ).toISOString();

  const recent = await options.store.findCreatedSince(since);
  const index = new DuplicateIndex(recent, options.similarityThreshold);

  const newIds: string[] = [];
  let duplicate = 0;

  for (const posting of postings) {
    if (newIds.includes(posting.id) || (await options.store.load(posting.id))) {
      duplicate++;
      continue;
    }

    const match = index.check(posting.employer.name, posting.name);
    if (match.isDuplicate) {
      logger.debug(
        `[Ingest] ${posting.id} looks like ${match.existingId ?? "?"} (similarity ${match.similarity?.toFixed(2)})`,
      );
      duplicate++;
      continue;
    }

    const item: WorkItem = {
      id: posting.id,
      title: posting.name,
      company: posting.employer.name,
      url: posting.alternate_url,
      description: posting.description ?? "",
      priorityKey: toPriorityKey(posting.published_at, now),
      status: "QUEUED",
      createdAt: nowIso,
      lastTransitionAt: nowIso,
      deliveredAt: null,
    };
    await options.store.save(item);
    index.add({ id: item.id, company: item.company, title: item.title });
    newIds.push(item.id);
  }

  const queued = await options.queue.enqueueBatch(newIds);
  const result: IngestResult = {
    found: postings.length,
    new: newIds.length,
    duplicate,
    queued,
  };
  logger.info(
    `[Ingest] ${result.found} found, ${result.new} new, ${result.duplicate} duplicate, ${result.queued} queued`,
  );
  return result;
}

/**
 * Runs every query and fetches full descriptions for postings the store
 * has not seen. Failed queries are reported, not thrown.
 */
export async function fetchPostings(
  client: SourceClient,
  queries: string[],
  store: StatusStore,
): Promise<{ postings: SourcePosting[]; errors: string[] }> {
  const byId = new Map<string, SourcePosting>();
  const errors: string[] = [];

  for (const query of queries) {
    try {
      for (const posting of await client.searchPostings(query)) {
        byId.set(posting.id, posting);
      }
    } catch (error) {
      const message = `query "${query}": ${errorMessage(error)}`;
      logger.error(`[Ingest] Search failed for ${message}`);
      errors.push(message);
    }
  }

  const postings: SourcePosting[] = [];
  for (const posting of byId.values()) {
    if (await store.load(posting.id)) {
      postings.push(posting);
      continue;
    }
    try {
      postings.push((await client.getPosting(posting.id)) ?? posting);
    } catch (error) {
      logger.warn(
        `[Ingest] Could not fetch details for ${posting.id}, using search data: ${errorMessage(error)}`,
      );
      postings.push(posting);
    }
  }

  return { postings, errors };
}
