import { logger } from "../logger";
import { errorMessage } from "../errors";
import { transition } from "../status";
import type { DeliveryNotifier, StatusStore } from "../ports";
import type { ReadyForDeliveryEvent, UserDecision, WorkItem } from "../types";

export interface DeliveryServiceOptions {
  store: StatusStore;
  notifier: DeliveryNotifier;
  now?: () => Date;
}

export type DeliveryResult = "delivered" | "failed" | "ignored";

/**
 * Hands ACCEPTED items to the notifier and records ACCEPTED -> DELIVERED.
 * A failed send leaves the item ACCEPTED for redeliverPending().
 */
export class DeliveryService {
  private readonly inFlight = new Set<string>();

  private readonly store: StatusStore;
  private readonly notifier: DeliveryNotifier;
  private readonly now: () => Date;

  constructor(options: DeliveryServiceOptions) {
    this.store = options.store;
    this.notifier = options.notifier;
    this.now = options.now ?? (() => new Date());
  }

  handleReady = async (event: ReadyForDeliveryEvent): Promise<void> => {
    await this.deliver(event.itemId, event.artifact);
  };

  async deliver(itemId: string, artifact: string | null): Promise<DeliveryResult> {
    if (this.inFlight.has(itemId)) return "ignored";
    this.inFlight.add(itemId);

    try {
      const item = await this.store.load(itemId);
      if (!item || item.status !== "ACCEPTED") {
        logger.debug(
          `[Delivery] ${itemId} is ${item?.status ?? "missing"}, not delivering`,
        );
        return "ignored";
      }

      const classification = await this.store.loadClassification(itemId);
      if (!classification) {
        logger.warn(`[Delivery] ${itemId} has no classification, not delivering`);
        return "ignored";
      }

      let sent = false;
      try {
        sent = await this.notifier.notify(item, classification, artifact);
      } catch (error) {
        logger.error(`[Delivery] Notifier threw for ${itemId}: ${errorMessage(error)}`);
      }

      if (!sent) {
        logger.warn(`[Delivery] ${itemId} not delivered, will retry later`);
        return "failed";
      }

      await transition(this.store, item, "DELIVERED", { now: this.now() });
      logger.info(
        `[Delivery] ${itemId} delivered${artifact ? " with cover note" : ""}`,
      );
      return "delivered";
    } finally {
      this.inFlight.delete(itemId);
    }
  }

  /** Resends ACCEPTED items whose enrichment has finished. */
  async redeliverPending(): Promise<{ delivered: number; failed: number }> {
    const accepted = await this.store.findByStatus("ACCEPTED");
    let delivered = 0;
    let failed = 0;

    for (const item of accepted) {
      const classification = await this.store.loadClassification(item.id);
      const state = classification?.enrichment.status;
      if (state !== "SUCCESS" && state !== "FAILED") continue;

      const result = await this.deliver(item.id, classification?.artifact ?? null);
      if (result === "delivered") delivered++;
      if (result === "failed") failed++;
    }

    if (delivered + failed > 0) {
      logger.info(`[Delivery] Redelivery: ${delivered} delivered, ${failed} failed`);
    }
    return { delivered, failed };
  }

  /** Records the user's reaction to a delivered item. */
  async recordUserDecision(
    itemId: string,
    decision: UserDecision,
  ): Promise<WorkItem | null> {
    const item = await this.store.load(itemId);
    if (!item) return null;

    const to = decision === "accepted" ? "USER_ACCEPTED" : "USER_REJECTED";
    const next = await transition(this.store, item, to, { now: this.now() });
    logger.info(`[Delivery] ${itemId} -> ${to}`);
    return next;
  }
}
