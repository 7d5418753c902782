// Status

export const STATUSES = [
  "QUEUED",
  "IN_ARCHIVE",
  "ACCEPTED",
  "REJECTED",
  "SKIPPED",
  "DELIVERED",
  "USER_ACCEPTED",
  "USER_REJECTED",
] as const;

export type Status = (typeof STATUSES)[number];

export const TERMINAL_STATUSES: ReadonlySet<Status> = new Set<Status>([
  "IN_ARCHIVE",
  "REJECTED",
  "USER_ACCEPTED",
  "USER_REJECTED",
]);

export function isStatus(value: string): value is Status {
  return (STATUSES as readonly string[]).includes(value);
}

// Work items

export interface WorkItem {
  id: string;
  title: string;
  company: string;
  url: string;
  description: string;
  /** Publication time, ISO 8601. Earlier sorts first. */
  priorityKey: string;
  status: Status;
  createdAt: string;
  lastTransitionAt: string;
  deliveredAt: string | null;
}

export interface NewWorkItem {
  id: string;
  title: string;
  company: string;
  url: string;
  description: string;
  priorityKey: string;
}

// Classification

export const ENRICHMENT_STATUSES = [
  "NOT_ATTEMPTED",
  "RETRY_QUEUED",
  "SUCCESS",
  "FAILED",
] as const;

export type EnrichmentStatus = (typeof ENRICHMENT_STATUSES)[number];

export function isEnrichmentStatus(value: string): value is EnrichmentStatus {
  return (ENRICHMENT_STATUSES as readonly string[]).includes(value);
}

export interface SecondaryEnrichmentState {
  status: EnrichmentStatus;
  attempts: number;
  lastAttemptAt: string | null;
}

/** What a classifier returns for one item. */
export interface ClassificationOutcome {
  accepted: boolean;
  score: number;
  rationale: string;
  tags: string[];
  modelUsed: string;
}

export interface ClassificationResult extends ClassificationOutcome {
  itemId: string;
  classifiedAt: string;
  enrichment: SecondaryEnrichmentState;
  artifact: string | null;
}

// Pipeline outcomes

export type ProcessingOutcome =
  | "accepted"
  | "rejected"
  | "archived"
  | "deleted"
  | "skipped"
  | "dropped";

export interface ValidationResult {
  valid: boolean;
  reason?: string;
}

export interface ReadyForDeliveryEvent {
  itemId: string;
  artifact: string | null;
}

export interface RecoveryReport {
  recovered: number;
  deleted: number;
  skippedIntentionally: number;
  failed: number;
  completed: boolean;
}

export type UserDecision = "accepted" | "rejected";

// Source postings

export interface SourcePosting {
  id: string;
  name: string;
  employer: { name: string };
  alternate_url: string;
  description?: string;
  published_at: string;
}

export interface RunLogEntry {
  id: number;
  runType: string;
  startedAt: string;
  finishedAt: string | null;
  status: string;
  itemsFound: number;
  itemsNew: number;
  itemsDuplicate: number;
  errors: string | null;
}
