/**
 * Secondary, best-effort enrichment (generated cover note) for ACCEPTED
 * items. Runs on its own permit pool, retries with linear backoff and
 * always ends in exactly one "ready for delivery" event per submission,
 * with or without the artifact. It never touches the item's status.
 */

import { logger } from "../logger";
import { errorMessage } from "../errors";
import type { ConcurrencyGate, Permit } from "../resilience/concurrency-gate";
import type { SecondaryEnrichmentGenerator, StatusStore } from "../ports";
import type {
  ClassificationResult,
  ReadyForDeliveryEvent,
  SecondaryEnrichmentState,
} from "../types";

export interface EnrichmentQueueOptions {
  store: StatusStore;
  generator: SecondaryEnrichmentGenerator;
  gate: ConcurrencyGate;
  /** Total attempts before the enrichment is marked FAILED. */
  maxRetries: number;
  /** Delay before attempt n+1 is backoffMs * n. */
  backoffMs: number;
  /** When false, items are released for delivery without an attempt. */
  enabled?: boolean;
  now?: () => Date;
}

export type ReadyListener = (
  event: ReadyForDeliveryEvent,
) => void | Promise<void>;

interface EnrichmentJob {
  itemId: string;
  attempt: number;
}

export class EnrichmentRetryQueue {
  private readonly pending: EnrichmentJob[] = [];
  /** Every id with a pending job, a running attempt or a backoff timer. */
  private readonly scheduled = new Set<string>();
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly tasks = new Set<Promise<void>>();
  private readonly listeners: ReadyListener[] = [];
  private idleResolvers: Array<() => void> = [];
  private stopped = false;

  private readonly store: StatusStore;
  private readonly generator: SecondaryEnrichmentGenerator;
  private readonly gate: ConcurrencyGate;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly enabled: boolean;
  private readonly now: () => Date;

  constructor(options: EnrichmentQueueOptions) {
    this.store = options.store;
    this.generator = options.generator;
    this.gate = options.gate;
    this.maxRetries = Math.max(1, options.maxRetries);
    this.backoffMs = Math.max(0, options.backoffMs);
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => new Date());
  }

  enqueue(itemId: string, attempt = 1): boolean {
    if (this.stopped || this.scheduled.has(itemId)) return false;

    this.scheduled.add(itemId);
    this.pending.push({ itemId, attempt });
    logger.debug(`[Enrichment] Enqueued ${itemId} (attempt ${attempt})`);
    this.pump();
    return true;
  }

  onReadyForDelivery(listener: ReadyListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index > -1) this.listeners.splice(index, 1);
    };
  }

  /**
   * Reloads ACCEPTED items whose enrichment never finished. Items that
   * already used every attempt are marked FAILED and released.
   */
  async restore(): Promise<number> {
    const accepted = await this.store.findByStatus("ACCEPTED");
    let restored = 0;

    for (const item of accepted) {
      const classification = await this.store.loadClassification(item.id);
      if (!classification) {
        logger.warn(`[Enrichment] ${item.id} is ACCEPTED without a classification`);
        continue;
      }

      const { status, attempts } = classification.enrichment;
      if (status !== "NOT_ATTEMPTED" && status !== "RETRY_QUEUED") continue;

      if (attempts >= this.maxRetries) {
        await this.fail(classification, attempts);
        continue;
      }
      if (this.enqueue(item.id, attempts + 1)) restored++;
    }

    if (restored > 0) {
      logger.info(`[Enrichment] Restored ${restored} item(s) from store`);
    }
    return restored;
  }

  size(): number {
    return this.scheduled.size;
  }

  onIdle(): Promise<void> {
    if (this.scheduled.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleResolvers.push(resolve);
    });
  }

  /** Drops pending work; persisted state lets restore() resume it. */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    this.pending.length = 0;

    logger.info(`[Enrichment] Shutting down, ${this.tasks.size} attempt(s) in flight`);
    await Promise.allSettled([...this.tasks]);
    this.scheduled.clear();
    this.resolveIdle();
  }

  private pump(): void {
    while (!this.stopped && this.pending.length > 0) {
      const permit = this.gate.tryAcquire();
      if (!permit) return;

      const job = this.pending.shift();
      if (!job) {
        permit.release();
        return;
      }

      const task = this.run(job, permit);
      this.tasks.add(task);
      void task.finally(() => this.tasks.delete(task));
    }
  }

  private async run(job: EnrichmentJob, permit: Permit): Promise<void> {
    try {
      await this.attempt(job);
    } catch (error) {
      // Store failure: release the id so a later restore() can retry it.
      logger.error(`[Enrichment] Attempt for ${job.itemId} failed unexpectedly:`, error);
      this.scheduled.delete(job.itemId);
    } finally {
      permit.release();
      this.pump();
      if (this.scheduled.size === 0) this.resolveIdle();
    }
  }

  private async attempt(job: EnrichmentJob): Promise<void> {
    const { itemId, attempt } = job;
    const item = await this.store.load(itemId);
    const classification = item ? await this.store.loadClassification(itemId) : null;

    if (!item || !classification) {
      logger.warn(`[Enrichment] ${itemId} vanished before enrichment, dropping`);
      this.scheduled.delete(itemId);
      return;
    }
    if (item.status !== "ACCEPTED") {
      logger.debug(`[Enrichment] ${itemId} is ${item.status}, dropping`);
      this.scheduled.delete(itemId);
      return;
    }

    if (!this.enabled) {
      this.scheduled.delete(itemId);
      this.emitReady({ itemId, artifact: null });
      return;
    }

    let artifact: string;
    try {
      artifact = await this.generator.generate(item, classification);
    } catch (error) {
      if (this.stopped) return;
      await this.handleFailure(classification, attempt, error);
      return;
    }
    if (this.stopped) return;

    await this.saveState(
      classification,
      { status: "SUCCESS", attempts: attempt, lastAttemptAt: this.now().toISOString() },
      artifact,
    );
    this.scheduled.delete(itemId);
    logger.info(`[Enrichment] ${itemId} enriched on attempt ${attempt}`);
    this.emitReady({ itemId, artifact });
  }

  private async handleFailure(
    classification: ClassificationResult,
    attempt: number,
    error: unknown,
  ): Promise<void> {
    const itemId = classification.itemId;

    if (attempt >= this.maxRetries) {
      logger.warn(
        `[Enrichment] ${itemId} failed attempt ${attempt}/${this.maxRetries}, giving up: ${errorMessage(error)}`,
      );
      await this.fail(classification, attempt);
      return;
    }

    await this.saveState(
      classification,
      {
        status: "RETRY_QUEUED",
        attempts: attempt,
        lastAttemptAt: this.now().toISOString(),
      },
      null,
    );

    const delayMs = this.backoffMs * attempt;
    logger.warn(
      `[Enrichment] ${itemId} failed attempt ${attempt}/${this.maxRetries}, retrying in ${delayMs}ms: ${errorMessage(error)}`,
    );

    const timer = setTimeout(() => {
      this.timers.delete(itemId);
      if (this.stopped) return;
      this.pending.push({ itemId, attempt: attempt + 1 });
      this.pump();
    }, delayMs);
    this.timers.set(itemId, timer);
  }

  private async fail(
    classification: ClassificationResult,
    attempts: number,
  ): Promise<void> {
    await this.saveState(
      classification,
      { status: "FAILED", attempts, lastAttemptAt: this.now().toISOString() },
      null,
    );
    this.scheduled.delete(classification.itemId);
    this.emitReady({ itemId: classification.itemId, artifact: null });
  }

  private async saveState(
    classification: ClassificationResult,
    enrichment: SecondaryEnrichmentState,
    artifact: string | null,
  ): Promise<void> {
    await this.store.saveClassification({
      ...classification,
      enrichment,
      artifact,
    });
  }

  private emitReady(event: ReadyForDeliveryEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        void Promise.resolve(listener(event)).catch((error: unknown) => {
          logger.error(`[Enrichment] Ready listener failed for ${event.itemId}:`, error);
        });
      } catch (error) {
        logger.error(`[Enrichment] Ready listener threw for ${event.itemId}:`, error);
      }
    }
  }

  private resolveIdle(): void {
    const resolvers = this.idleResolvers;
    this.idleResolvers = [];
    for (const resolve of resolvers) resolve();
  }
}
