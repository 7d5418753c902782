/**
 * Primary work queue.
 *
 * Items are ordered by publication time (earliest first) and processed under
 * one ConcurrencyGate permit each: existence check, content validation,
 * classification through the circuit breaker, then a single status
 * transition. Membership lives in two disjoint maps, `queued` and
 * `processing`; both are only mutated synchronously on the event loop, so an
 * id can never be scheduled twice.
 */

import { logger } from "../logger";
import {
  ClassifierTimeoutError,
  NotFoundError,
  RateLimitExceededError,
  TransportError,
  errorMessage,
} from "../errors";
import { transition } from "../status";
import { PriorityHeap } from "./priority-heap";
import type { CircuitBreaker } from "../resilience/circuit-breaker";
import type { ConcurrencyGate, Permit } from "../resilience/concurrency-gate";
import type {
  Classifier,
  ContentValidator,
  ExistenceChecker,
  StatusStore,
} from "../ports";
import type {
  ClassificationOutcome,
  ClassificationResult,
  ProcessingOutcome,
  Status,
  ValidationResult,
  WorkItem,
} from "../types";

export interface ProcessingQueueOptions {
  store: StatusStore;
  existenceChecker: ExistenceChecker;
  validator: ContentValidator;
  classifier: Classifier;
  breaker: CircuitBreaker;
  gate: ConcurrencyGate;
  classifyTimeoutMs: number;
  /** Classifier calls per item; transport failures are retried up to this. */
  classifyAttempts?: number;
  classifyRetryDelayMs?: number;
  /** How long shutdown() waits for in-flight tasks to settle. */
  shutdownGraceMs?: number;
  now?: () => Date;
}

export interface QueueItemView {
  id: string;
  priorityKey: string;
  status: Status | null;
  phase: "queued" | "processing";
}

export interface OutcomeEvent {
  itemId: string;
  outcome: ProcessingOutcome;
  reason?: string;
  classification?: ClassificationResult;
}

export type OutcomeListener = (event: OutcomeEvent) => void;

export type QueueStats = Record<ProcessingOutcome | "errors", number>;

interface QueueEntry {
  id: string;
  priorityKey: string;
  sequence: number;
}

function priorityTime(key: string): number {
  const time = Date.parse(key);
  return Number.isNaN(time) ? Number.POSITIVE_INFINITY : time;
}

function compareEntries(a: QueueEntry, b: QueueEntry): number {
  const byTime = priorityTime(a.priorityKey) - priorityTime(b.priorityKey);
  if (byTime !== 0 && !Number.isNaN(byTime)) return byTime;
  return a.sequence - b.sequence;
}

function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.max(0, Math.min(1, score));
}

export class PriorityProcessingQueue {
  private readonly heap = new PriorityHeap<QueueEntry>(compareEntries);
  private readonly queued = new Map<string, QueueEntry>();
  private readonly processing = new Map<string, QueueEntry>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly tasks = new Set<Promise<void>>();
  private readonly listeners: OutcomeListener[] = [];
  private idleResolvers: Array<() => void> = [];
  private sequence = 0;
  private stopped = false;
  private readonly stats: QueueStats = {
    accepted: 0,
    rejected: 0,
    archived: 0,
    deleted: 0,
    skipped: 0,
    dropped: 0,
    errors: 0,
  };

  private readonly store: StatusStore;
  private readonly existenceChecker: ExistenceChecker;
  private readonly validator: ContentValidator;
  private readonly classifier: Classifier;
  private readonly breaker: CircuitBreaker;
  private readonly gate: ConcurrencyGate;
  private readonly classifyTimeoutMs: number;
  private readonly classifyAttempts: number;
  private readonly classifyRetryDelayMs: number;
  private readonly shutdownGraceMs: number;
  private readonly now: () => Date;

  constructor(options: ProcessingQueueOptions) {
    this.store = options.store;
    this.existenceChecker = options.existenceChecker;
    this.validator = options.validator;
    this.classifier = options.classifier;
    this.breaker = options.breaker;
    this.gate = options.gate;
    this.classifyTimeoutMs = options.classifyTimeoutMs;
    this.classifyAttempts = Math.max(1, options.classifyAttempts ?? 1);
    this.classifyRetryDelayMs = Math.max(0, options.classifyRetryDelayMs ?? 0);
    this.shutdownGraceMs = options.shutdownGraceMs ?? 5000;
    this.now = options.now ?? (() => new Date());
  }

  // Public surface

  /** Adds the id unless it is already queued or processing. */
  enqueue(id: string, priorityKey: string): boolean {
    if (this.stopped) {
      logger.warn(`[Queue] Rejecting ${id}: queue is shut down`);
      return false;
    }
    if (this.queued.has(id) || this.processing.has(id)) {
      logger.debug(`[Queue] ${id} already scheduled, ignoring`);
      return false;
    }

    const entry: QueueEntry = { id, priorityKey, sequence: this.sequence++ };
    this.queued.set(id, entry);
    this.heap.push(entry);
    logger.debug(`[Queue] Enqueued ${id} (priority ${priorityKey})`);

    this.pump();
    return true;
  }

  /** Enqueues every stored QUEUED item among `ids`; returns how many were added. */
  async enqueueBatch(ids: string[]): Promise<number> {
    const unique = [...new Set(ids)];
    if (unique.length === 0) return 0;

    const items = await this.store.loadMany(unique);
    const found = new Set(items.map((item) => item.id));
    const missing = unique.filter((id) => !found.has(id));
    if (missing.length > 0) {
      logger.warn(
        `[Queue] ${missing.length} id(s) not found in store: ${missing.join(", ")}`,
      );
    }

    let added = 0;
    for (const item of items) {
      if (item.status !== "QUEUED") {
        logger.debug(`[Queue] ${item.id} is ${item.status}, not enqueuing`);
        continue;
      }
      if (this.enqueue(item.id, item.priorityKey)) added++;
    }

    logger.info(`[Queue] Batch enqueue: ${added}/${unique.length} added`);
    return added;
  }

  /** Re-enqueues every persisted QUEUED item, e.g. after a restart. */
  async restore(): Promise<number> {
    const items = await this.store.findByStatus("QUEUED");
    let added = 0;
    for (const item of items) {
      if (this.enqueue(item.id, item.priorityKey)) added++;
    }
    if (added > 0) {
      logger.info(`[Queue] Restored ${added} queued item(s) from store`);
    }
    return added;
  }

  getQueueSize(): number {
    return this.queued.size + this.processing.size;
  }

  has(id: string): boolean {
    return this.queued.has(id) || this.processing.has(id);
  }

  isQueued(id: string): boolean {
    return this.queued.has(id);
  }

  isProcessing(id: string): boolean {
    return this.processing.has(id);
  }

  /** Processing entries first, then queued entries in dequeue order. */
  async getQueueItems(): Promise<QueueItemView[]> {
    const entries: Array<{ entry: QueueEntry; phase: QueueItemView["phase"] }> =
      [
        ...[...this.processing.values()].map((entry) => ({
          entry,
          phase: "processing" as const,
        })),
        ...this.heap.toSortedArray().map((entry) => ({
          entry,
          phase: "queued" as const,
        })),
      ];
    if (entries.length === 0) return [];

    const items = await this.store.loadMany(entries.map((e) => e.entry.id));
    const statusById = new Map(items.map((item) => [item.id, item.status]));

    return entries.map(({ entry, phase }) => ({
      id: entry.id,
      priorityKey: entry.priorityKey,
      status: statusById.get(entry.id) ?? null,
      phase,
    }));
  }

  getStats(): QueueStats {
    return { ...this.stats };
  }

  onOutcome(listener: OutcomeListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index > -1) this.listeners.splice(index, 1);
    };
  }

  /** Resolves once nothing is queued or processing. */
  onIdle(): Promise<void> {
    if (this.getQueueSize() === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleResolvers.push(resolve);
    });
  }

  /**
   * Stops accepting work, forces every in-flight item that is still QUEUED
   * to SKIPPED and discards late classifier results. Items that never left
   * the heap stay QUEUED in the store and are picked up by restore().
   */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    const pending = this.queued.size;
    this.heap.clear();
    this.queued.clear();

    const inFlight = [...this.processing.keys()];
    logger.info(
      `[Queue] Shutting down: ${inFlight.length} in flight, ${pending} pending left QUEUED`,
    );

    for (const controller of this.controllers.values()) {
      controller.abort(new Error("Queue shut down"));
    }

    for (const id of inFlight) {
      try {
        const item = await this.store.load(id);
        if (item && item.status === "QUEUED") {
          await transition(this.store, item, "SKIPPED", { now: this.now() });
          logger.info(`[Queue] ${id} force-skipped on shutdown`);
        }
      } catch (error) {
        logger.error(`[Queue] Failed to force-skip ${id} on shutdown:`, error);
      }
    }

    await this.waitForTasks();
    this.resolveIdle();
  }

  // Scheduling

  /** Starts as many entries as there are free permits. Never awaits. */
  private pump(): void {
    while (!this.stopped && this.heap.size > 0) {
      const permit = this.gate.tryAcquire();
      if (!permit) return;

      const entry = this.heap.pop();
      if (!entry) {
        permit.release();
        return;
      }

      this.queued.delete(entry.id);
      this.processing.set(entry.id, entry);

      const task = this.run(entry, permit);
      this.tasks.add(task);
      void task.finally(() => this.tasks.delete(task));
    }
  }

  private async run(entry: QueueEntry, permit: Permit): Promise<void> {
    const controller = new AbortController();
    this.controllers.set(entry.id, controller);

    try {
      const event = await this.processItem(entry.id, controller.signal);
      this.stats[event.outcome]++;
      this.emit(event);
    } catch (error) {
      this.stats.errors++;
      logger.error(`[Queue] Unexpected failure processing ${entry.id}:`, error);
    } finally {
      this.controllers.delete(entry.id);
      this.processing.delete(entry.id);
      permit.release();
      this.pump();
      if (this.getQueueSize() === 0) this.resolveIdle();
    }
  }

  // Per-item algorithm

  private async processItem(
    id: string,
    signal: AbortSignal,
  ): Promise<OutcomeEvent> {
    const item = await this.store.load(id);
    if (!item) {
      return { itemId: id, outcome: "dropped", reason: "not in store" };
    }
    if (item.status !== "QUEUED") {
      return {
        itemId: id,
        outcome: "dropped",
        reason: `already ${item.status}`,
      };
    }
    if (this.stopped) return this.discarded(id);

    if (this.breaker.isOpen()) {
      return this.skip(item, "circuit open");
    }

    // Existence
    let gone = false;
    try {
      gone = !(await this.existenceChecker.exists(item));
    } catch (error) {
      if (error instanceof NotFoundError) {
        gone = true;
      } else if (error instanceof RateLimitExceededError) {
        if (this.stopped) return this.discarded(id);
        return this.skip(item, "source rate limit exceeded");
      } else {
        logger.warn(
          `[Queue] Existence check failed for ${id}, assuming it exists: ${errorMessage(error)}`,
        );
      }
    }
    if (this.stopped) return this.discarded(id);
    if (gone) {
      await transition(this.store, item, "IN_ARCHIVE", { now: this.now() });
      logger.info(`[Queue] ${id} no longer exists upstream -> IN_ARCHIVE`);
      return { itemId: id, outcome: "archived" };
    }

    // Validation
    let validation: ValidationResult;
    try {
      validation = await this.validator.validate(item);
    } catch (error) {
      if (this.stopped) return this.discarded(id);
      return this.skip(item, `validator failed: ${errorMessage(error)}`);
    }
    if (this.stopped) return this.discarded(id);
    if (!validation.valid) {
      await this.store.delete(id);
      logger.info(
        `[Queue] ${id} failed validation, deleted: ${validation.reason ?? "no reason given"}`,
      );
      return { itemId: id, outcome: "deleted", reason: validation.reason };
    }

    // Classification
    let outcome: ClassificationOutcome;
    try {
      outcome = await this.classifyWithRetry(item, signal);
    } catch (error) {
      if (this.stopped) return this.discarded(id);
      return this.skip(item, errorMessage(error));
    }
    if (this.stopped) return this.discarded(id);

    const classification: ClassificationResult = {
      itemId: id,
      accepted: outcome.accepted,
      score: clampScore(outcome.score),
      rationale: outcome.rationale,
      tags: outcome.tags,
      modelUsed: outcome.modelUsed,
      classifiedAt: this.now().toISOString(),
      enrichment: { status: "NOT_ATTEMPTED", attempts: 0, lastAttemptAt: null },
      artifact: null,
    };

    const to = classification.accepted ? "ACCEPTED" : "REJECTED";
    await transition(this.store, item, to, {
      classification,
      now: this.now(),
    });
    logger.info(
      `[Queue] ${id} classified -> ${to} (score ${classification.score.toFixed(2)})`,
    );

    return {
      itemId: id,
      outcome: classification.accepted ? "accepted" : "rejected",
      classification,
    };
  }

  private async classifyWithRetry(
    item: WorkItem,
    signal: AbortSignal,
  ): Promise<ClassificationOutcome> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.breaker.execute(() =>
          this.classifyWithTimeout(item, signal),
        );
      } catch (error) {
        const retryable = error instanceof TransportError && !signal.aborted;
        if (!retryable || attempt >= this.classifyAttempts) throw error;

        logger.warn(
          `[Queue] Classifier attempt ${attempt}/${this.classifyAttempts} for ${item.id} failed, retrying: ${errorMessage(error)}`,
        );
        await new Promise((resolve) => setTimeout(resolve, this.classifyRetryDelayMs));
        if (signal.aborted) throw signal.reason;
      }
    }
  }

  private async classifyWithTimeout(
    item: WorkItem,
    parent: AbortSignal,
  ): Promise<ClassificationOutcome> {
    const controller = new AbortController();
    const timeoutMs = this.classifyTimeoutMs;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    let onParentAbort: (() => void) | undefined;

    const cancelled = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        const error = new ClassifierTimeoutError(timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);

      onParentAbort = () => {
        controller.abort(parent.reason);
        reject(parent.reason);
      };
      if (parent.aborted) {
        onParentAbort();
      } else {
        parent.addEventListener("abort", onParentAbort, { once: true });
      }
    });

    try {
      return await Promise.race([
        this.classifier.classify(item, { signal: controller.signal }),
        cancelled,
      ]);
    } finally {
      clearTimeout(timeoutId);
      if (onParentAbort) parent.removeEventListener("abort", onParentAbort);
    }
  }

  private async skip(item: WorkItem, reason: string): Promise<OutcomeEvent> {
    await transition(this.store, item, "SKIPPED", { now: this.now() });
    logger.warn(`[Queue] ${item.id} -> SKIPPED: ${reason}`);
    return { itemId: item.id, outcome: "skipped", reason };
  }

  private discarded(id: string): OutcomeEvent {
    return { itemId: id, outcome: "dropped", reason: "queue shut down" };
  }

  // Notifications

  private emit(event: OutcomeEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        logger.error(`[Queue] Outcome listener threw for ${event.itemId}:`, error);
      }
    }
  }

  private resolveIdle(): void {
    const resolvers = this.idleResolvers;
    this.idleResolvers = [];
    for (const resolve of resolvers) resolve();
  }

  private async waitForTasks(): Promise<void> {
    if (this.tasks.size === 0) return;

    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<"timeout">((resolve) => {
      timeoutId = setTimeout(() => resolve("timeout"), this.shutdownGraceMs);
    });

    const result = await Promise.race([
      Promise.allSettled([...this.tasks]).then(() => "done" as const),
      grace,
    ]);
    clearTimeout(timeoutId);

    if (result === "timeout") {
      logger.warn(
        `[Queue] ${this.tasks.size} task(s) still running after ${this.shutdownGraceMs}ms grace`,
      );
    }
  }
}
