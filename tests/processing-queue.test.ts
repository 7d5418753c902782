import { describe, it, expect, vi } from "vitest";
import { PriorityProcessingQueue } from "../src/queue/processing-queue";
import type { OutcomeEvent } from "../src/queue/processing-queue";
import { CircuitBreaker } from "../src/resilience/circuit-breaker";
import { ConcurrencyGate } from "../src/resilience/concurrency-gate";
import {
  ClassifierParseError,
  ClassifierTimeoutError,
  NotFoundError,
  RateLimitExceededError,
  TransportError,
} from "../src/errors";
import type { Classifier, ContentValidator, ExistenceChecker } from "../src/ports";
import type { ClassificationOutcome, WorkItem } from "../src/types";
import { MemoryStatusStore } from "./helpers/memory-store";
import { T0, deferred, flush, makeItem } from "./helpers/fixtures";

const ACCEPT: ClassificationOutcome = {
  accepted: true,
  score: 0.85,
  rationale: "Strong Node.js match",
  tags: ["node.js"],
  modelUsed: "test-model",
};

const REJECT: ClassificationOutcome = {
  accepted: false,
  score: 0.2,
  rationale: "PHP role",
  tags: [],
  modelUsed: "test-model",
};

function makeBreaker(): CircuitBreaker {
  return new CircuitBreaker({
    name: "test",
    windowSize: 10,
    minimumCalls: 5,
    failureRateThreshold: 0.5,
    cooldownMs: 60_000,
  });
}

/** Creates a queue over an in-memory store seeded with `items`. */
async function makeQueue(options: {
  items?: WorkItem[];
  classify?: Classifier["classify"];
  exists?: ExistenceChecker["exists"];
  validate?: ContentValidator["validate"];
  breaker?: CircuitBreaker;
  gateSize?: number;
  classifyTimeoutMs?: number;
  classifyAttempts?: number;
}) {
  const store = new MemoryStatusStore();
  for (const item of options.items ?? []) await store.save(item);

  const classify = vi.fn<Classifier["classify"]>(options.classify ?? (async () => ACCEPT));
  const exists = vi.fn<ExistenceChecker["exists"]>(options.exists ?? (async () => true));
  const validate = vi.fn<ContentValidator["validate"]>(
    options.validate ?? (async () => ({ valid: true })),
  );
  const breaker = options.breaker ?? makeBreaker();

  const queue = new PriorityProcessingQueue({
    store,
    existenceChecker: { exists },
    validator: { validate },
    classifier: { classify },
    breaker,
    gate: new ConcurrencyGate("classify", options.gateSize ?? 3),
    classifyTimeoutMs: options.classifyTimeoutMs ?? 1_000,
    classifyAttempts: options.classifyAttempts ?? 1,
    classifyRetryDelayMs: 0,
    shutdownGraceMs: 200,
    now: () => T0,
  });

  const events: OutcomeEvent[] = [];
  queue.onOutcome((event) => events.push(event));

  return { store, queue, classify, exists, validate, breaker, events };
}

async function runOne(
  harness: Awaited<ReturnType<typeof makeQueue>>,
  item: WorkItem,
): Promise<void> {
  harness.queue.enqueue(item.id, item.priorityKey);
  await harness.queue.onIdle();
}

describe("PriorityProcessingQueue", () => {
  describe("per-item outcomes", () => {
    it("accepts a relevant item and persists its classification", async () => {
      const item = makeItem();
      const h = await makeQueue({ items: [item] });

      await runOne(h, item);

      expect(h.store.history.get(item.id)).toEqual(["QUEUED", "ACCEPTED"]);
      expect(await h.store.loadClassification(item.id)).toEqual({
        itemId: item.id,
        accepted: true,
        score: 0.85,
        rationale: "Strong Node.js match",
        tags: ["node.js"],
        modelUsed: "test-model",
        classifiedAt: T0.toISOString(),
        enrichment: { status: "NOT_ATTEMPTED", attempts: 0, lastAttemptAt: null },
        artifact: null,
      });
      expect(h.events.map((e) => e.outcome)).toEqual(["accepted"]);
      expect(h.queue.getStats().accepted).toBe(1);
    });

    it("rejects an irrelevant item", async () => {
      const item = makeItem();
      const h = await makeQueue({ items: [item], classify: async () => REJECT });

      await runOne(h, item);

      expect((await h.store.load(item.id))?.status).toBe("REJECTED");
      expect((await h.store.loadClassification(item.id))?.accepted).toBe(false);
      expect(h.events[0].outcome).toBe("rejected");
    });

    it("clamps the classifier score into [0, 1]", async () => {
      const item = makeItem();
      const h = await makeQueue({
        items: [item],
        classify: async () => ({ ...ACCEPT, score: 1.7 }),
      });

      await runOne(h, item);

      expect((await h.store.loadClassification(item.id))?.score).toBe(1);
    });

    it("archives an item the source no longer has", async () => {
      const item = makeItem();
      const h = await makeQueue({ items: [item], exists: async () => false });

      await runOne(h, item);

      expect((await h.store.load(item.id))?.status).toBe("IN_ARCHIVE");
      expect(h.classify).not.toHaveBeenCalled();
      expect(h.events[0].outcome).toBe("archived");
    });

    it("treats NotFoundError from the existence check as gone", async () => {
      const item = makeItem();
      const h = await makeQueue({
        items: [item],
        exists: async () => {
          throw new NotFoundError("404");
        },
      });

      await runOne(h, item);

      expect((await h.store.load(item.id))?.status).toBe("IN_ARCHIVE");
    });

    it("skips an item when the source rate limit is exhausted", async () => {
      const item = makeItem();
      const h = await makeQueue({
        items: [item],
        exists: async () => {
          throw new RateLimitExceededError();
        },
      });

      await runOne(h, item);

      expect((await h.store.load(item.id))?.status).toBe("SKIPPED");
      expect(h.events[0]).toEqual({
        itemId: item.id,
        outcome: "skipped",
        reason: "source rate limit exceeded",
      });
      expect(h.classify).not.toHaveBeenCalled();
    });

    it("continues when the existence check fails for another reason", async () => {
      const item = makeItem();
      const h = await makeQueue({
        items: [item],
        exists: async () => {
          throw new TransportError("connection reset");
        },
      });

      await runOne(h, item);

      expect((await h.store.load(item.id))?.status).toBe("ACCEPTED");
    });

    it("deletes an item that fails validation", async () => {
      const item = makeItem();
      const h = await makeQueue({
        items: [item],
        validate: async () => ({ valid: false, reason: "excluded keyword" }),
      });

      await runOne(h, item);

      expect(await h.store.load(item.id)).toBeNull();
      expect(h.events[0]).toEqual({
        itemId: item.id,
        outcome: "deleted",
        reason: "excluded keyword",
      });
      expect(h.classify).not.toHaveBeenCalled();
    });

    it("skips an item when the validator throws", async () => {
      const item = makeItem();
      const h = await makeQueue({
        items: [item],
        validate: async () => {
          throw new Error("rules unavailable");
        },
      });

      await runOne(h, item);

      expect((await h.store.load(item.id))?.status).toBe("SKIPPED");
    });

    it("drops an id whose stored status is no longer QUEUED", async () => {
      const item = makeItem({ status: "REJECTED" });
      const h = await makeQueue({ items: [item] });

      await runOne(h, item);

      expect(h.events[0]).toEqual({
        itemId: item.id,
        outcome: "dropped",
        reason: "already REJECTED",
      });
      expect(h.exists).not.toHaveBeenCalled();
    });
  });

  describe("classifier failures", () => {
    it("skips after every transport attempt fails", async () => {
      const item = makeItem();
      const h = await makeQueue({
        items: [item],
        classifyAttempts: 2,
        classify: async () => {
          throw new TransportError("502 from model host");
        },
      });

      await runOne(h, item);

      expect(h.classify).toHaveBeenCalledTimes(2);
      expect((await h.store.load(item.id))?.status).toBe("SKIPPED");
      expect(await h.store.loadClassification(item.id)).toBeNull();
    });

    it("recovers on a retried transport failure", async () => {
      const item = makeItem();
      const h = await makeQueue({
        items: [item],
        classifyAttempts: 2,
        classify: vi
          .fn<Classifier["classify"]>()
          .mockRejectedValueOnce(new TransportError("reset"))
          .mockResolvedValueOnce(ACCEPT),
      });

      await runOne(h, item);

      expect((await h.store.load(item.id))?.status).toBe("ACCEPTED");
      expect(h.breaker.getMetrics()).toMatchObject({ calls: 2, failures: 1 });
    });

    it("does not retry a parse failure", async () => {
      const item = makeItem();
      const h = await makeQueue({
        items: [item],
        classifyAttempts: 3,
        classify: async () => {
          throw new ClassifierParseError("not JSON", "sure!");
        },
      });

      await runOne(h, item);

      expect(h.classify).toHaveBeenCalledTimes(1);
      expect((await h.store.load(item.id))?.status).toBe("SKIPPED");
    });

    it("times out a slow classifier and aborts its signal", async () => {
      const item = makeItem();
      const signals: AbortSignal[] = [];
      const h = await makeQueue({
        items: [item],
        classifyTimeoutMs: 20,
        classify: (_item, context) => {
          signals.push(context.signal);
          return new Promise<ClassificationOutcome>(() => undefined);
        },
      });

      await runOne(h, item);

      expect((await h.store.load(item.id))?.status).toBe("SKIPPED");
      expect(signals[0].aborted).toBe(true);
      expect(signals[0].reason).toBeInstanceOf(ClassifierTimeoutError);
      expect(h.events[0].reason).toBe("Classifier call timed out after 20ms");
    });

    it("fails fast while the circuit is open", async () => {
      const breaker = makeBreaker();
      for (let i = 0; i < 5; i++) {
        await expect(
          breaker.execute(() => Promise.reject(new TransportError("down"))),
        ).rejects.toThrow("down");
      }
      const item = makeItem();
      const h = await makeQueue({ items: [item], breaker });

      await runOne(h, item);

      expect(h.exists).not.toHaveBeenCalled();
      expect(h.classify).not.toHaveBeenCalled();
      expect(h.events[0]).toEqual({
        itemId: item.id,
        outcome: "skipped",
        reason: "circuit open",
      });
    });
  });

  describe("scheduling", () => {
    it("never schedules the same id twice", async () => {
      const hold = deferred<ClassificationOutcome>();
      const started = deferred<void>();
      const a = makeItem({ id: "a" });
      const b = makeItem({ id: "b" });
      const h = await makeQueue({
        items: [a, b],
        gateSize: 1,
        classify: async (item) => {
          if (item.id === "a") {
            started.resolve();
            return hold.promise;
          }
          return ACCEPT;
        },
      });

      expect(h.queue.enqueue("a", a.priorityKey)).toBe(true);
      expect(h.queue.enqueue("b", b.priorityKey)).toBe(true);
      await started.promise;

      expect(h.queue.isProcessing("a")).toBe(true);
      expect(h.queue.isQueued("b")).toBe(true);
      expect(h.queue.enqueue("a", a.priorityKey)).toBe(false);
      expect(h.queue.enqueue("b", b.priorityKey)).toBe(false);
      expect(h.queue.getQueueSize()).toBe(2);

      hold.resolve(ACCEPT);
      await h.queue.onIdle();

      expect(h.classify.mock.calls.map(([item]) => item.id)).toEqual(["a", "b"]);
    });

    it("dequeues the earliest priority key first, ties in insertion order", async () => {
      const hold = deferred<ClassificationOutcome>();
      const started = deferred<void>();
      const items = [
        makeItem({ id: "x", priorityKey: "2026-03-01T10:00:00.000Z" }),
        makeItem({ id: "late", priorityKey: "2026-03-01T12:00:00.000Z" }),
        makeItem({ id: "undated", priorityKey: "not-a-date" }),
        makeItem({ id: "early", priorityKey: "2026-03-01T08:00:00.000Z" }),
        makeItem({ id: "early-2", priorityKey: "2026-03-01T08:00:00.000Z" }),
        makeItem({ id: "mid", priorityKey: "2026-03-01T09:00:00.000Z" }),
      ];
      const h = await makeQueue({
        items,
        gateSize: 1,
        classify: async (item) => {
          if (item.id === "x") {
            started.resolve();
            return hold.promise;
          }
          return ACCEPT;
        },
      });

      h.queue.enqueue("x", items[0].priorityKey);
      await started.promise;
      for (const item of items.slice(1)) h.queue.enqueue(item.id, item.priorityKey);
      hold.resolve(ACCEPT);
      await h.queue.onIdle();

      expect(h.classify.mock.calls.map(([item]) => item.id)).toEqual([
        "x",
        "early",
        "early-2",
        "mid",
        "late",
        "undated",
      ]);
    });

    it("runs at most gate-size items at once", async () => {
      let active = 0;
      let maxActive = 0;
      const items = ["1", "2", "3", "4", "5"].map((id) => makeItem({ id }));
      const h = await makeQueue({
        items,
        gateSize: 2,
        classify: async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active--;
          return ACCEPT;
        },
      });

      for (const item of items) h.queue.enqueue(item.id, item.priorityKey);
      await h.queue.onIdle();

      expect(maxActive).toBe(2);
      expect(h.classify).toHaveBeenCalledTimes(5);
    });

    it("lists processing entries first, then queued ones in dequeue order", async () => {
      const hold = deferred<ClassificationOutcome>();
      const started = deferred<void>();
      const a = makeItem({ id: "a", priorityKey: "2026-03-01T10:00:00.000Z" });
      const b = makeItem({ id: "b", priorityKey: "2026-03-01T08:00:00.000Z" });
      const c = makeItem({ id: "c", priorityKey: "2026-03-01T12:00:00.000Z" });
      const h = await makeQueue({
        items: [a, b, c],
        gateSize: 1,
        classify: async (item) => {
          if (item.id === "a") {
            started.resolve();
            return hold.promise;
          }
          return ACCEPT;
        },
      });

      h.queue.enqueue("a", a.priorityKey);
      await started.promise;
      h.queue.enqueue("c", c.priorityKey);
      h.queue.enqueue("b", b.priorityKey);

      expect(await h.queue.getQueueItems()).toEqual([
        { id: "a", priorityKey: a.priorityKey, status: "QUEUED", phase: "processing" },
        { id: "b", priorityKey: b.priorityKey, status: "QUEUED", phase: "queued" },
        { id: "c", priorityKey: c.priorityKey, status: "QUEUED", phase: "queued" },
      ]);

      hold.resolve(ACCEPT);
      await h.queue.onIdle();
      expect(await h.queue.getQueueItems()).toEqual([]);
    });
  });

  describe("batch enqueue and restore", () => {
    it("enqueues only stored QUEUED items", async () => {
      const h = await makeQueue({
        items: [
          makeItem({ id: "a" }),
          makeItem({ id: "b", status: "ACCEPTED" }),
          makeItem({ id: "c" }),
        ],
      });

      const added = await h.queue.enqueueBatch(["a", "b", "c", "a", "missing"]);
      await h.queue.onIdle();

      expect(added).toBe(2);
      expect(h.classify).toHaveBeenCalledTimes(2);
    });

    it("restores every persisted QUEUED item", async () => {
      const h = await makeQueue({
        items: [
          makeItem({ id: "a" }),
          makeItem({ id: "b" }),
          makeItem({ id: "c", status: "SKIPPED" }),
        ],
      });

      expect(await h.queue.restore()).toBe(2);
      await h.queue.onIdle();
      expect((await h.store.load("c"))?.status).toBe("SKIPPED");
    });
  });

  describe("shutdown", () => {
    it("force-skips in-flight items and leaves pending ones QUEUED", async () => {
      const hold = deferred<ClassificationOutcome>();
      const started = deferred<void>();
      const items = ["a", "b", "c"].map((id, i) =>
        makeItem({ id, priorityKey: `2026-03-01T0${i}:00:00.000Z` }),
      );
      const h = await makeQueue({
        items,
        gateSize: 1,
        classify: async () => {
          started.resolve();
          return hold.promise;
        },
      });

      for (const item of items) h.queue.enqueue(item.id, item.priorityKey);
      await started.promise;
      await h.queue.shutdown();

      expect((await h.store.load("a"))?.status).toBe("SKIPPED");
      expect((await h.store.load("b"))?.status).toBe("QUEUED");
      expect((await h.store.load("c"))?.status).toBe("QUEUED");
      expect(h.queue.getQueueSize()).toBe(0);

      // A late answer changes nothing
      hold.resolve(ACCEPT);
      await flush();
      expect((await h.store.load("a"))?.status).toBe("SKIPPED");
      expect(h.store.history.get("a")).toEqual(["QUEUED", "SKIPPED"]);
      expect(h.queue.enqueue("b", items[1].priorityKey)).toBe(false);
    });
  });
});
