import type {
  ClassificationOutcome,
  ClassificationResult,
  Status,
  ValidationResult,
  WorkItem,
} from "./types";

/**
 * Remote existence check for a posting.
 * Resolves false (or throws NotFoundError) when the posting is gone.
 * May throw TransportError or RateLimitExceededError.
 */
export interface ExistenceChecker {
  exists(item: WorkItem): Promise<boolean>;
}

export interface ContentValidator {
  validate(item: WorkItem): Promise<ValidationResult>;
}

export interface ClassifierContext {
  /** Aborted when the per-call timeout elapses or the pipeline shuts down. */
  signal: AbortSignal;
}

/** May throw TransportError, RateLimitExceededError or ClassifierParseError. */
export interface Classifier {
  classify(
    item: WorkItem,
    context: ClassifierContext,
  ): Promise<ClassificationOutcome>;
}

/** May throw GenerationError. */
export interface SecondaryEnrichmentGenerator {
  generate(item: WorkItem, classification: ClassificationResult): Promise<string>;
}

export interface DeliveryNotifier {
  notify(
    item: WorkItem,
    classification: ClassificationResult,
    artifact: string | null,
  ): Promise<boolean>;
}

export interface FindByStatusOptions {
  /** Inclusive lower bound on lastTransitionAt, ISO 8601. */
  transitionedAfter?: string;
  limit?: number;
}

export interface StatusStore {
  load(id: string): Promise<WorkItem | null>;
  loadMany(ids: string[]): Promise<WorkItem[]>;
  /** Inserts or updates the item; with a classification both are written atomically. */
  save(item: WorkItem, classification?: ClassificationResult): Promise<void>;
  findByStatus(status: Status, options?: FindByStatusOptions): Promise<WorkItem[]>;
  findCreatedSince(since: string): Promise<WorkItem[]>;
  /** Removes the item and every side record that references it. */
  delete(id: string): Promise<void>;
  loadClassification(id: string): Promise<ClassificationResult | null>;
  saveClassification(result: ClassificationResult): Promise<void>;
}
