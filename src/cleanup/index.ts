/**
 * Nightly sweep that re-checks stored postings against the source and deletes
 * the ones that are gone. Only statuses no in-process stage is working on are
 * checked, so a delete never races a queued transition.
 */

import { logger } from "../logger";
import { NotFoundError, RateLimitExceededError, errorMessage } from "../errors";
import type { ExistenceChecker, StatusStore } from "../ports";
import type { Status, WorkItem } from "../types";

export interface CleanupReport {
  checked: number;
  deleted: number;
  errors: number;
  /** False when the store could not be read or the source rate limit stopped the pass. */
  completed: boolean;
}

export const CLEANUP_STATUSES: readonly Status[] = ["SKIPPED", "DELIVERED"];

export interface CleanupServiceOptions {
  store: StatusStore;
  existenceChecker: ExistenceChecker;
  batchSize: number;
  /** Pause between full batches. */
  batchDelayMs: number;
  statuses?: readonly Status[];
  sleep?: (ms: number) => Promise<void>;
}

type ItemResult = "kept" | "deleted" | "error" | "rateLimited";

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CleanupService {
  private running: Promise<CleanupReport> | null = null;
  private lastReport: CleanupReport | null = null;

  private readonly store: StatusStore;
  private readonly existenceChecker: ExistenceChecker;
  private readonly batchSize: number;
  private readonly batchDelayMs: number;
  private readonly statuses: readonly Status[];
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: CleanupServiceOptions) {
    this.store = options.store;
    this.existenceChecker = options.existenceChecker;
    this.batchSize = options.batchSize;
    this.batchDelayMs = options.batchDelayMs;
    this.statuses = options.statuses ?? CLEANUP_STATUSES;
    this.sleep = options.sleep ?? defaultSleep;
  }

  runCleanupPass(): Promise<CleanupReport> {
    if (this.running) {
      logger.debug("[Cleanup] Pass already running, joining it");
      return this.running;
    }

    this.running = this.sweep().finally(() => {
      this.running = null;
    });
    return this.running;
  }

  getLastReport(): CleanupReport | null {
    return this.lastReport;
  }

  private async sweep(): Promise<CleanupReport> {
    const report: CleanupReport = { checked: 0, deleted: 0, errors: 0, completed: false };

    let candidates: WorkItem[] = [];
    try {
      for (const status of this.statuses) {
        candidates = candidates.concat(await this.store.findByStatus(status));
      }
    } catch (error) {
      logger.error(`[Cleanup] Could not load stored items: ${errorMessage(error)}`);
      this.lastReport = report;
      return report;
    }

    logger.info(`[Cleanup] Checking ${candidates.length} item(s) for existence...`);

    for (let start = 0; start < candidates.length; start += this.batchSize) {
      if (start > 0 && this.batchDelayMs > 0) {
        await this.sleep(this.batchDelayMs);
      }

      for (const item of candidates.slice(start, start + this.batchSize)) {
        const result = await this.checkItem(item);
        if (result === "rateLimited") {
          report.errors++;
          logger.warn(
            `[Cleanup] Source rate limit hit after ${report.checked} checks, stopping until next run`,
          );
          this.lastReport = report;
          return report;
        }

        report.checked++;
        if (result === "deleted") report.deleted++;
        if (result === "error") report.errors++;
      }
    }

    report.completed = true;
    this.lastReport = report;
    logger.info(
      `[Cleanup] Done: checked ${report.checked}, deleted ${report.deleted}, errors ${report.errors}`,
    );
    return report;
  }

  private async checkItem(item: WorkItem): Promise<ItemResult> {
    let gone: boolean;
    try {
      gone = !(await this.existenceChecker.exists(item));
    } catch (error) {
      if (error instanceof NotFoundError) {
        gone = true;
      } else if (error instanceof RateLimitExceededError) {
        return "rateLimited";
      } else {
        logger.warn(`[Cleanup] Error checking ${item.id}: ${errorMessage(error)}`);
        return "error";
      }
    }
    if (!gone) return "kept";

    try {
      const current = await this.store.load(item.id);
      if (current?.status !== item.status) {
        logger.debug(`[Cleanup] ${item.id} changed while being checked, leaving it`);
        return "kept";
      }
      await this.store.delete(item.id);
      logger.info(`[Cleanup] ${item.id} ('${item.title}') no longer exists upstream, deleted`);
      return "deleted";
    } catch (error) {
      logger.error(`[Cleanup] Failed to delete ${item.id}: ${errorMessage(error)}`);
      return "error";
    }
  }
}
