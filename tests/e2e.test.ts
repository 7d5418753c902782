import { describe, it, expect, vi, afterEach } from "vitest";
import type { Pipeline } from "../src/pipeline";
import type { ClassificationOutcome } from "../src/types";
import { TransportError } from "../src/errors";
import { MemoryStatusStore } from "./helpers/memory-store";
import { makeItem } from "./helpers/fixtures";
import { ACCEPT, REJECT, makePipeline } from "./helpers/pipeline";

/** Waits for both queues to drain. */
async function settle(pipeline: Pipeline): Promise<void> {
  await pipeline.queue.onIdle();
  await pipeline.enrichment.onIdle();
}

describe("pipeline end to end", () => {
  let close: (() => Promise<void>) | null = null;

  afterEach(async () => {
    await close?.();
    close = null;
  });

  it("classifies, enriches and delivers a relevant item", async () => {
    const store = new MemoryStatusStore();
    const h = makePipeline({ classify: async () => ACCEPT, store });
    close = h.close;
    await store.save(makeItem());

    h.pipeline.queue.enqueue("1001", "2026-03-01T09:00:00.000Z");
    await settle(h.pipeline);
    await vi.waitFor(async () => {
      expect((await store.load("1001"))?.status).toBe("DELIVERED");
    });

    expect(store.history.get("1001")).toEqual(["QUEUED", "ACCEPTED", "DELIVERED"]);
    const classification = await store.loadClassification("1001");
    expect(classification?.score).toBe(0.85);
    expect(classification?.enrichment.status).toBe("SUCCESS");
    expect(h.ready).toEqual([{ itemId: "1001", artifact: "Dear hiring team" }]);
    expect(h.notifier.notify).toHaveBeenCalledTimes(1);
    expect(h.notifier.notify.mock.calls[0]?.[2]).toBe("Dear hiring team");
  });

  it("skips an item after two classifier timeouts and recovers it later", async () => {
    let calls = 0;
    const store = new MemoryStatusStore();
    const h = makePipeline({
      store,
      classify: (_item, { signal }) => {
        calls++;
        if (calls <= 2) {
          return new Promise<ClassificationOutcome>((_, reject) => {
            signal.addEventListener("abort", () => reject(signal.reason), { once: true });
          });
        }
        return Promise.resolve(ACCEPT);
      },
      queue: { classifyTimeoutMs: 20, classifyAttempts: 2, classifyRetryDelayMs: 0 },
    });
    close = h.close;
    await store.save(makeItem());

    h.pipeline.queue.enqueue("1001", "2026-03-01T09:00:00.000Z");
    await h.pipeline.queue.onIdle();

    expect(h.classifier.classify).toHaveBeenCalledTimes(2);
    expect((await store.load("1001"))?.status).toBe("SKIPPED");
    expect(h.pipeline.breaker.getState()).toBe("CLOSED");
    expect(h.pipeline.queue.getStats().skipped).toBe(1);

    const report = await h.pipeline.runRecovery();
    expect(report).toEqual({
      recovered: 1,
      deleted: 0,
      skippedIntentionally: 0,
      failed: 0,
      completed: true,
    });

    await settle(h.pipeline);
    await vi.waitFor(async () => {
      expect((await store.load("1001"))?.status).toBe("DELIVERED");
    });

    expect(h.classifier.classify).toHaveBeenCalledTimes(3);
    expect(store.history.get("1001")).toEqual([
      "QUEUED",
      "SKIPPED",
      "QUEUED",
      "ACCEPTED",
      "DELIVERED",
    ]);
    expect(h.ready).toHaveLength(1);
  });

  it("does not re-queue an item the classifier rejected", async () => {
    const store = new MemoryStatusStore();
    const h = makePipeline({ classify: async () => REJECT, store });
    close = h.close;
    await store.save(makeItem());

    h.pipeline.queue.enqueue("1001", "2026-03-01T09:00:00.000Z");
    await settle(h.pipeline);
    const report = await h.pipeline.runRecovery();

    expect((await store.load("1001"))?.status).toBe("REJECTED");
    expect(report.recovered).toBe(0);
    expect(h.generator.generate).not.toHaveBeenCalled();
    expect(h.notifier.notify).not.toHaveBeenCalled();
  });

  it("deletes an item that fails the exclusion policy", async () => {
    const store = new MemoryStatusStore();
    const h = makePipeline({ classify: async () => ACCEPT, store });
    close = h.close;
    await store.save(makeItem({ title: "PHP Developer" }));

    h.pipeline.queue.enqueue("1001", "2026-03-01T09:00:00.000Z");
    await settle(h.pipeline);

    expect(await store.load("1001")).toBeNull();
    expect(h.classifier.classify).not.toHaveBeenCalled();
    expect(h.pipeline.queue.getStats().deleted).toBe(1);
  });

  it("restores stored work on start", async () => {
    const store = new MemoryStatusStore();
    const h = makePipeline({ classify: async () => ACCEPT, store });
    close = h.close;
    await store.save(makeItem({ id: "a" }));
    await store.save(makeItem({ id: "b", status: "SKIPPED" }));

    await h.pipeline.start();
    await settle(h.pipeline);
    await vi.waitFor(async () => {
      expect((await store.load("a"))?.status).toBe("DELIVERED");
      expect((await store.load("b"))?.status).toBe("DELIVERED");
    });

    expect(h.classifier.classify).toHaveBeenCalledTimes(2);
  });

  it("persists through the SQLite store", async () => {
    const h = makePipeline({ classify: async () => ACCEPT });
    close = h.close;
    await h.pipeline.store.save(makeItem());

    h.pipeline.queue.enqueue("1001", "2026-03-01T09:00:00.000Z");
    await settle(h.pipeline);
    await vi.waitFor(async () => {
      expect((await h.pipeline.store.load("1001"))?.status).toBe("DELIVERED");
    });

    const classification = await h.pipeline.store.loadClassification("1001");
    expect(classification?.artifact).toBe("Dear hiring team");
    expect(classification?.enrichment.status).toBe("SUCCESS");
  });

  it("leaves SKIPPED items alone while the classifier circuit is open", async () => {
    const store = new MemoryStatusStore();
    const h = makePipeline({ classify: async () => ACCEPT, store });
    close = h.close;
    // 47 hours before T0, inside the 48 hour window.
    const skippedAt = "2026-02-28T13:00:00.000Z";
    await store.save(makeItem({ status: "SKIPPED", lastTransitionAt: skippedAt }));
    for (let i = 0; i < 5; i++) {
      await expect(
        h.pipeline.breaker.execute(() => Promise.reject(new TransportError("backend down"))),
      ).rejects.toBeInstanceOf(TransportError);
    }
    expect(h.pipeline.breaker.getState()).toBe("OPEN");

    const report = await h.pipeline.runRecovery();

    expect(report).toEqual({
      recovered: 0,
      deleted: 0,
      skippedIntentionally: 0,
      failed: 0,
      completed: true,
    });
    expect(store.history.get("1001")).toEqual(["SKIPPED"]);
    expect((await store.load("1001"))?.lastTransitionAt).toBe(skippedAt);
    expect(h.classifier.classify).not.toHaveBeenCalled();

    h.pipeline.breaker.reset();
    expect((await h.pipeline.runRecovery()).recovered).toBe(1);
    await settle(h.pipeline);
    expect((await store.load("1001"))?.status).not.toBe("SKIPPED");
  });
});
