import type { FindByStatusOptions, StatusStore } from "../../src/ports";
import type { ClassificationResult, Status, WorkItem } from "../../src/types";

/** In-process StatusStore with the same ordering rules as the SQLite one. */
export class MemoryStatusStore implements StatusStore {
  readonly items = new Map<string, WorkItem>();
  readonly classifications = new Map<string, ClassificationResult>();
  /** Every status written through save(), per item, in order. */
  readonly history = new Map<string, Status[]>();
  failFindByStatus = false;

  async load(id: string): Promise<WorkItem | null> {
    const item = this.items.get(id);
    return item ? { ...item } : null;
  }

  async loadMany(ids: string[]): Promise<WorkItem[]> {
    const found: WorkItem[] = [];
    for (const id of ids) {
      const item = this.items.get(id);
      if (item) found.push({ ...item });
    }
    return found;
  }

  async save(item: WorkItem, classification?: ClassificationResult): Promise<void> {
    const previous = this.items.get(item.id);
    this.items.set(item.id, { ...item });
    if (previous?.status !== item.status) {
      const history = this.history.get(item.id) ?? [];
      history.push(item.status);
      this.history.set(item.id, history);
    }
    if (classification) {
      this.classifications.set(item.id, { ...classification });
    }
  }

  async findByStatus(
    status: Status,
    options: FindByStatusOptions = {},
  ): Promise<WorkItem[]> {
    if (this.failFindByStatus) {
      throw new Error("store unavailable");
    }
    const matches = [...this.items.values()]
      .filter((item) => item.status === status)
      .filter(
        (item) =>
          options.transitionedAfter === undefined ||
          item.lastTransitionAt >= options.transitionedAfter,
      )
      .sort((a, b) => a.priorityKey.localeCompare(b.priorityKey))
      .map((item) => ({ ...item }));
    return options.limit === undefined ? matches : matches.slice(0, options.limit);
  }

  async findCreatedSince(since: string): Promise<WorkItem[]> {
    return [...this.items.values()]
      .filter((item) => item.createdAt >= since)
      .map((item) => ({ ...item }));
  }

  async delete(id: string): Promise<void> {
    this.items.delete(id);
    this.classifications.delete(id);
  }

  async loadClassification(id: string): Promise<ClassificationResult | null> {
    const result = this.classifications.get(id);
    return result ? { ...result } : null;
  }

  async saveClassification(result: ClassificationResult): Promise<void> {
    this.classifications.set(result.itemId, { ...result });
  }
}
