import { logger } from "../logger";
import { isEnrichmentStatus, isStatus } from "../types";
import type { Db } from "./index";
import type { FindByStatusOptions, StatusStore } from "../ports";
import type {
  ClassificationResult,
  RunLogEntry,
  Status,
  WorkItem,
} from "../types";

// Row shapes

interface WorkItemRow {
  id: string;
  title: string;
  company: string;
  url: string;
  description: string;
  priority_key: string;
  status: string;
  created_at: string;
  last_transition_at: string;
  delivered_at: string | null;
}

interface ClassificationRow {
  item_id: string;
  accepted: number;
  score: number;
  rationale: string;
  tags: string;
  model_used: string;
  classified_at: string;
  enrichment_status: string;
  enrichment_attempts: number;
  enrichment_last_attempt_at: string | null;
  artifact: string | null;
}

const WORK_ITEM_COLUMNS = `id, title, company, url, description, priority_key, status,
  created_at, last_transition_at, delivered_at`;

function toWorkItem(row: WorkItemRow): WorkItem {
  if (!isStatus(row.status)) {
    throw new Error(`Unknown status "${row.status}" stored for item ${row.id}`);
  }
  return {
    id: row.id,
    title: row.title,
    company: row.company,
    url: row.url,
    description: row.description,
    priorityKey: row.priority_key,
    status: row.status,
    createdAt: row.created_at,
    lastTransitionAt: row.last_transition_at,
    deliveredAt: row.delivered_at,
  };
}

function parseTags(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed)
      ? parsed.filter((t): t is string => typeof t === "string")
      : [];
  } catch (error) {
    logger.warn(`Unreadable tags column, treating as empty: ${raw}`, error);
    return [];
  }
}

function toClassification(row: ClassificationRow): ClassificationResult {
  const status = row.enrichment_status;
  return {
    itemId: row.item_id,
    accepted: row.accepted === 1,
    score: row.score,
    rationale: row.rationale,
    tags: parseTags(row.tags),
    modelUsed: row.model_used,
    classifiedAt: row.classified_at,
    enrichment: {
      status: isEnrichmentStatus(status) ? status : "NOT_ATTEMPTED",
      attempts: row.enrichment_attempts,
      lastAttemptAt: row.enrichment_last_attempt_at,
    },
    artifact: row.artifact,
  };
}

// Status store

export class SqliteStatusStore implements StatusStore {
  constructor(private readonly db: Db) {}

  async load(id: string): Promise<WorkItem | null> {
    const row = this.db
      .prepare<[string], WorkItemRow>(
        `SELECT ${WORK_ITEM_COLUMNS} FROM work_items WHERE id = ?`,
      )
      .get(id);
    return row ? toWorkItem(row) : null;
  }

  async loadMany(ids: string[]): Promise<WorkItem[]> {
    if (ids.length === 0) return [];
    return this.db
      .prepare<[string], WorkItemRow>(
        `SELECT ${WORK_ITEM_COLUMNS} FROM work_items
         WHERE id IN (SELECT value FROM json_each(?))`,
      )
      .all(JSON.stringify(ids))
      .map(toWorkItem);
  }

  async save(item: WorkItem, classification?: ClassificationResult): Promise<void> {
    const write = this.db.transaction(() => {
      this.upsertItem(item);
      if (classification) this.upsertClassification(classification);
    });
    write();
  }

  async findByStatus(
    status: Status,
    options: FindByStatusOptions = {},
  ): Promise<WorkItem[]> {
    return this.db
      .prepare<
        { status: string; after: string | null; limit: number },
        WorkItemRow
      >(
        `SELECT ${WORK_ITEM_COLUMNS} FROM work_items
         WHERE status = @status
           AND (@after IS NULL OR last_transition_at >= @after)
         ORDER BY priority_key ASC
         LIMIT @limit`,
      )
      .all({
        status,
        after: options.transitionedAfter ?? null,
        limit: options.limit ?? -1,
      })
      .map(toWorkItem);
  }

  async findCreatedSince(since: string): Promise<WorkItem[]> {
    return this.db
      .prepare<[string], WorkItemRow>(
        `SELECT ${WORK_ITEM_COLUMNS} FROM work_items
         WHERE created_at >= ?
         ORDER BY created_at DESC`,
      )
      .all(since)
      .map(toWorkItem);
  }

  async delete(id: string): Promise<void> {
    // classification_results and notifications cascade.
    this.db.prepare<[string]>(`DELETE FROM work_items WHERE id = ?`).run(id);
  }

  async loadClassification(id: string): Promise<ClassificationResult | null> {
    const row = this.db
      .prepare<[string], ClassificationRow>(
        `SELECT * FROM classification_results WHERE item_id = ?`,
      )
      .get(id);
    return row ? toClassification(row) : null;
  }

  async saveClassification(result: ClassificationResult): Promise<void> {
    this.upsertClassification(result);
  }

  private upsertItem(item: WorkItem): void {
    this.db
      .prepare<
        {
          id: string;
          title: string;
          company: string;
          url: string;
          description: string;
          priorityKey: string;
          status: string;
          createdAt: string;
          lastTransitionAt: string;
          deliveredAt: string | null;
        }
      >(
        `INSERT INTO work_items (${WORK_ITEM_COLUMNS})
         VALUES (@id, @title, @company, @url, @description, @priorityKey, @status,
                 @createdAt, @lastTransitionAt, @deliveredAt)
         ON CONFLICT(id) DO UPDATE SET
           title = excluded.title,
           company = excluded.company,
           url = excluded.url,
           description = excluded.description,
           priority_key = excluded.priority_key,
           status = excluded.status,
           last_transition_at = excluded.last_transition_at,
           delivered_at = excluded.delivered_at`,
      )
      .run({
        id: item.id,
        title: item.title,
        company: item.company,
        url: item.url,
        description: item.description,
        priorityKey: item.priorityKey,
        status: item.status,
        createdAt: item.createdAt,
        lastTransitionAt: item.lastTransitionAt,
        deliveredAt: item.deliveredAt,
      });
  }

  private upsertClassification(result: ClassificationResult): void {
    this.db
      .prepare<
        {
          itemId: string;
          accepted: number;
          score: number;
          rationale: string;
          tags: string;
          modelUsed: string;
          classifiedAt: string;
          enrichmentStatus: string;
          enrichmentAttempts: number;
          enrichmentLastAttemptAt: string | null;
          artifact: string | null;
        }
      >(
        `INSERT INTO classification_results (
           item_id, accepted, score, rationale, tags, model_used, classified_at,
           enrichment_status, enrichment_attempts, enrichment_last_attempt_at, artifact
         ) VALUES (
           @itemId, @accepted, @score, @rationale, @tags, @modelUsed, @classifiedAt,
           @enrichmentStatus, @enrichmentAttempts, @enrichmentLastAttemptAt, @artifact
         )
         ON CONFLICT(item_id) DO UPDATE SET
           accepted = excluded.accepted,
           score = excluded.score,
           rationale = excluded.rationale,
           tags = excluded.tags,
           model_used = excluded.model_used,
           classified_at = excluded.classified_at,
           enrichment_status = excluded.enrichment_status,
           enrichment_attempts = excluded.enrichment_attempts,
           enrichment_last_attempt_at = excluded.enrichment_last_attempt_at,
           artifact = excluded.artifact`,
      )
      .run({
        itemId: result.itemId,
        accepted: result.accepted ? 1 : 0,
        score: result.score,
        rationale: result.rationale,
        tags: JSON.stringify(result.tags),
        modelUsed: result.modelUsed,
        classifiedAt: result.classifiedAt,
        enrichmentStatus: result.enrichment.status,
        enrichmentAttempts: result.enrichment.attempts,
        enrichmentLastAttemptAt: result.enrichment.lastAttemptAt,
        artifact: result.artifact,
      });
  }
}

// Status counts

export function countByStatus(db: Db): Record<Status, number> {
  const counts: Record<Status, number> = {
    QUEUED: 0,
    IN_ARCHIVE: 0,
    ACCEPTED: 0,
    REJECTED: 0,
    SKIPPED: 0,
    DELIVERED: 0,
    USER_ACCEPTED: 0,
    USER_REJECTED: 0,
  };
  const rows = db
    .prepare<[], { status: string; count: number }>(
      `SELECT status, COUNT(*) as count FROM work_items GROUP BY status`,
    )
    .all();
  for (const row of rows) {
    if (isStatus(row.status)) counts[row.status] = row.count;
  }
  return counts;
}

// Run Log

export function createRun(db: Db, runType: string, dryRun: boolean): number {
  const result = db
    .prepare<[string, string, number]>(
      `INSERT INTO run_log (run_type, started_at, dry_run) VALUES (?, ?, ?)`,
    )
    .run(runType, new Date().toISOString(), dryRun ? 1 : 0);
  return Number(result.lastInsertRowid);
}

export function finishRun(
  db: Db,
  runId: number,
  status: string,
  stats: {
    itemsFound: number;
    itemsNew: number;
    itemsDuplicate: number;
    errors: string[];
  },
): void {
  db.prepare<[string, string, number, number, number, string | null, number]>(
    `UPDATE run_log SET
      finished_at = ?,
      status = ?,
      items_found = ?,
      items_new = ?,
      items_duplicate = ?,
      errors = ?
    WHERE id = ?`,
  ).run(
    new Date().toISOString(),
    status,
    stats.itemsFound,
    stats.itemsNew,
    stats.itemsDuplicate,
    stats.errors.length > 0 ? JSON.stringify(stats.errors) : null,
    runId,
  );
}

export function getLastRun(db: Db): RunLogEntry | null {
  const row = db
    .prepare<
      [],
      {
        id: number;
        run_type: string;
        started_at: string;
        finished_at: string | null;
        status: string;
        items_found: number;
        items_new: number;
        items_duplicate: number;
        errors: string | null;
      }
    >(
      `SELECT id, run_type, started_at, finished_at, status, items_found, items_new,
              items_duplicate, errors
       FROM run_log ORDER BY id DESC LIMIT 1`,
    )
    .get();
  if (!row) return null;
  return {
    id: row.id,
    runType: row.run_type,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    status: row.status,
    itemsFound: row.items_found,
    itemsNew: row.items_new,
    itemsDuplicate: row.items_duplicate,
    errors: row.errors,
  };
}

// Notifications

export interface NotificationRecord {
  botType: string;
  messageType: string;
  itemId: string | null;
  messageText: string;
  telegramMessageId: string | null;
  success: boolean;
  errorMessage: string | null;
}

export function logNotification(db: Db, record: NotificationRecord): void {
  try {
    db.prepare<
      [string, string, string | null, string, string | null, string, number, string | null]
    >(
      `INSERT INTO notifications (bot_type, message_type, item_id, message_text,
         telegram_message_id, sent_at, success, error_message)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    ).run(
      record.botType,
      record.messageType,
      record.itemId,
      record.messageText,
      record.telegramMessageId,
      new Date().toISOString(),
      record.success ? 1 : 0,
      record.errorMessage,
    );
  } catch (error) {
    // Item may have been deleted meanwhile; the send itself already happened.
    logger.warn(`Failed to log notification for ${record.itemId ?? "system"}:`, error);
  }
}
