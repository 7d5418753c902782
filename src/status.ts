import { IllegalTransitionError } from "./errors";
import type { StatusStore } from "./ports";
import type { ClassificationResult, Status, WorkItem } from "./types";

const LEGAL_TRANSITIONS: Record<Status, readonly Status[]> = {
  QUEUED: ["IN_ARCHIVE", "ACCEPTED", "REJECTED", "SKIPPED"],
  ACCEPTED: ["DELIVERED"],
  DELIVERED: ["USER_ACCEPTED", "USER_REJECTED"],
  SKIPPED: ["QUEUED"],
  IN_ARCHIVE: [],
  REJECTED: [],
  USER_ACCEPTED: [],
  USER_REJECTED: [],
};

export function canTransition(from: Status, to: Status): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

export function assertTransition(item: WorkItem, to: Status): void {
  if (!canTransition(item.status, to)) {
    throw new IllegalTransitionError(item.id, item.status, to);
  }
}

export interface TransitionOptions {
  classification?: ClassificationResult;
  now?: Date;
}

/**
 * The only way a WorkItem changes status. Checks legality, stamps the
 * transition time and persists the item (with its classification, if given)
 * in one store write.
 */
export async function transition(
  store: StatusStore,
  item: WorkItem,
  to: Status,
  options: TransitionOptions = {},
): Promise<WorkItem> {
  assertTransition(item, to);

  const at = (options.now ?? new Date()).toISOString();
  const next: WorkItem = {
    ...item,
    status: to,
    lastTransitionAt: at,
    deliveredAt: to === "DELIVERED" ? at : item.deliveredAt,
  };

  await store.save(next, options.classification);
  return next;
}
