/**
 * Periodic sweep that puts transiently failed (SKIPPED) items back on the
 * primary queue. Items older than the recovery window stay SKIPPED for good,
 * and items the classifier already judged irrelevant are never re-queued.
 */

import { logger } from "../logger";
import { errorMessage } from "../errors";
import { transition } from "../status";
import type { ContentValidator, StatusStore } from "../ports";
import type { RecoveryReport, WorkItem } from "../types";

export interface RecoveryTarget {
  enqueue(id: string, priorityKey: string): boolean;
}

export interface RecoveryScannerOptions {
  store: StatusStore;
  validator: ContentValidator;
  queue: RecoveryTarget;
  windowHours: number;
  batchSize: number;
  /** Checked before each pass; while false, the pass leaves every item as it is. */
  isBackendAvailable?: () => boolean;
  now?: () => Date;
}

type ItemResult = "recovered" | "deleted" | "skippedIntentionally" | "failed";

export class RecoveryScanner {
  private running: Promise<RecoveryReport> | null = null;
  private lastReport: RecoveryReport | null = null;

  private readonly store: StatusStore;
  private readonly validator: ContentValidator;
  private readonly queue: RecoveryTarget;
  private readonly windowMs: number;
  private readonly batchSize: number;
  private readonly isBackendAvailable: () => boolean;
  private readonly now: () => Date;

  constructor(options: RecoveryScannerOptions) {
    this.store = options.store;
    this.validator = options.validator;
    this.queue = options.queue;
    this.windowMs = options.windowHours * 60 * 60 * 1000;
    this.batchSize = options.batchSize;
    this.isBackendAvailable = options.isBackendAvailable ?? (() => true);
    this.now = options.now ?? (() => new Date());
  }

  /** Overlapping calls share the pass that is already running. */
  runRecoveryPass(): Promise<RecoveryReport> {
    if (this.running) {
      logger.debug("[Recovery] Pass already running, joining it");
      return this.running;
    }

    this.running = this.scan().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  getLastReport(): RecoveryReport | null {
    return this.lastReport;
  }

  private async scan(): Promise<RecoveryReport> {
    const report: RecoveryReport = {
      recovered: 0,
      deleted: 0,
      skippedIntentionally: 0,
      failed: 0,
      completed: false,
    };

    if (!this.isBackendAvailable()) {
      logger.info("[Recovery] Classifier unavailable, pass skipped");
      report.completed = true;
      this.lastReport = report;
      return report;
    }

    const cutoff = new Date(this.now().getTime() - this.windowMs).toISOString();

    let candidates: WorkItem[];
    try {
      candidates = await this.store.findByStatus("SKIPPED", {
        transitionedAfter: cutoff,
        limit: this.batchSize,
      });
    } catch (error) {
      logger.error(
        `[Recovery] Could not load SKIPPED items, will retry next tick: ${errorMessage(error)}`,
      );
      this.lastReport = report;
      return report;
    }

    if (candidates.length === 0) {
      logger.debug("[Recovery] No SKIPPED items inside the window");
      report.completed = true;
      this.lastReport = report;
      return report;
    }

    logger.info(
      `[Recovery] Found ${candidates.length} SKIPPED item(s) since ${cutoff}`,
    );

    for (const item of candidates) {
      const result = await this.recoverItem(item);
      report[result]++;
    }

    report.completed = true;
    this.lastReport = report;
    logger.info(
      `[Recovery] Pass done: ${report.recovered} recovered, ${report.deleted} deleted, ` +
        `${report.skippedIntentionally} left as irrelevant, ${report.failed} failed`,
    );
    return report;
  }

  private async recoverItem(item: WorkItem): Promise<ItemResult> {
    try {
      const classification = await this.store.loadClassification(item.id);
      if (classification && !classification.accepted) {
        logger.debug(`[Recovery] ${item.id} already judged irrelevant, leaving it`);
        return "skippedIntentionally";
      }

      const validation = await this.validator.validate(item);
      if (!validation.valid) {
        await this.store.delete(item.id);
        logger.info(
          `[Recovery] ${item.id} no longer passes validation, deleted: ${validation.reason ?? "no reason given"}`,
        );
        return "deleted";
      }

      const requeued = await transition(this.store, item, "QUEUED", {
        now: this.now(),
      });
      this.queue.enqueue(requeued.id, requeued.priorityKey);
      return "recovered";
    } catch (error) {
      logger.error(`[Recovery] Failed to recover ${item.id}: ${errorMessage(error)}`);
      return "failed";
    }
  }
}
