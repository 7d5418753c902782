import { describe, it, expect, vi, afterEach } from "vitest";
import { fetchPostings, ingestPostings } from "../src/ingest";
import type { SourcePosting } from "../src/types";
import { MemoryStatusStore } from "./helpers/memory-store";
import { T0, makeItem } from "./helpers/fixtures";
import { json, makeSourceClient, posting, routeFetch } from "./helpers/source";

/** Creates a SourcePosting as the source client returns it. */
function makePosting(
  id: string,
  name: string,
  company: string,
  publishedAt = "2026-03-01T10:00:00+03:00",
): SourcePosting {
  return {
    id,
    name,
    employer: { name: company },
    alternate_url: `https://jobs.example.test/vacancy/${id}`,
    description: "<p>Node.js</p>",
    published_at: publishedAt,
  };
}

describe("ingestPostings", () => {
  it("stores new postings as QUEUED and skips duplicates", async () => {
    const store = new MemoryStatusStore();
    await store.save(
      makeItem({ id: "old", createdAt: "2026-03-01T12:00:00.000Z" }),
    );
    const queue = { enqueueBatch: vi.fn(async (ids: string[]) => ids.length) };

    const result = await ingestPostings(
      [
        makePosting("a", "Frontend Engineer", "Globex"),
        makePosting("old", "Backend Developer", "Acme Logistics"),
        makePosting("a", "Frontend Engineer", "Globex"),
        makePosting("d", "Backend Developer", "Acme Logistics"),
        makePosting("e", "Site Reliability Lead", "Initech", "not a date"),
      ],
      { store, queue, dedupWindowDays: 7, similarityThreshold: 0.85, now: T0 },
    );

    expect(result).toEqual({ found: 5, new: 2, duplicate: 3, queued: 2 });
    expect(queue.enqueueBatch).toHaveBeenCalledWith(["a", "e"]);
    expect(await store.load("a")).toEqual({
      id: "a",
      title: "Frontend Engineer",
      company: "Globex",
      url: "https://jobs.example.test/vacancy/a",
      description: "<p>Node.js</p>",
      priorityKey: "2026-03-01T07:00:00.000Z",
      status: "QUEUED",
      createdAt: T0.toISOString(),
      lastTransitionAt: T0.toISOString(),
      deliveredAt: null,
    });
    expect((await store.load("e"))?.priorityKey).toBe(T0.toISOString());
    expect(await store.load("d")).toBeNull();
  });

  it("ignores near-duplicates older than the window", async () => {
    const store = new MemoryStatusStore();
    await store.save(makeItem({ id: "old", createdAt: "2026-01-01T00:00:00.000Z" }));
    const queue = { enqueueBatch: vi.fn(async (ids: string[]) => ids.length) };

    const result = await ingestPostings(
      [makePosting("d", "Backend Developer", "Acme Logistics")],
      { store, queue, dedupWindowDays: 7, similarityThreshold: 0.85, now: T0 },
    );

    expect(result.new).toBe(1);
  });
});

describe("fetchPostings", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("merges queries, loads details for unseen postings and reports failed queries", async () => {
    routeFetch({
      "/vacancies?text=node&per_page=20&order_by=publication_time": () =>
        json({ items: [posting("1", "Node Developer", "Acme"), posting("2", "QA", "Acme")] }),
      "/vacancies?text=broken&per_page=20&order_by=publication_time": () =>
        new Response("down", { status: 500, statusText: "Internal Server Error" }),
      "/vacancies/1": () =>
        json(posting("1", "Node Developer", "Acme", { description: "<p>Full text</p>" })),
    });
    const store = new MemoryStatusStore();
    await store.save(makeItem({ id: "2" }));

    const { postings, errors } = await fetchPostings(
      makeSourceClient(),
      ["node", "broken"],
      store,
    );

    expect(postings.map((p) => [p.id, p.description])).toEqual([
      ["1", "<p>Full text</p>"],
      ["2", undefined],
    ]);
    expect(errors).toEqual(['query "broken": Server error: 500 Internal Server Error']);
  });

  it("falls back to search data when the detail request fails", async () => {
    routeFetch({
      "/vacancies?text=node&per_page=20&order_by=publication_time": () =>
        json({ items: [posting("1", "Node Developer", "Acme")] }),
      "/vacancies/1": () => new Response("", { status: 429 }),
    });

    const { postings, errors } = await fetchPostings(
      makeSourceClient(),
      ["node"],
      new MemoryStatusStore(),
    );

    expect(postings.map((p) => p.name)).toEqual(["Node Developer"]);
    expect(errors).toEqual([]);
  });
});
