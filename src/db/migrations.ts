import type { Database } from "better-sqlite3";
import { CREATE_TABLES_SQL } from "./schema";
import { logger } from "../logger";

interface Migration {
  id: string;
  description: string;
  sql: string;
}

const MIGRATIONS: Migration[] = [
  {
    id: "0001_init_schema",
    description: "Work items, classifications, notifications and run log",
    sql: CREATE_TABLES_SQL,
  },
  {
    id: "0002_enrichment_status_index",
    description: "Index enrichment state for restore and redelivery scans",
    sql: `
      CREATE INDEX IF NOT EXISTS idx_classification_enrichment_status
        ON classification_results(enrichment_status);
    `,
  },
];

function ensureMigrationTable(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function isApplied(db: Database, id: string): boolean {
  const row = db
    .prepare<[string], { id: string }>(
      "SELECT id FROM _migrations WHERE id = ? LIMIT 1",
    )
    .get(id);
  return row !== undefined;
}

export function runMigrations(db: Database): number {
  ensureMigrationTable(db);
  let applied = 0;

  for (const migration of MIGRATIONS) {
    if (isApplied(db, migration.id)) {
      continue;
    }

    logger.info(`Applying migration ${migration.id}: ${migration.description}`);
    const apply = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare<[string, string]>(
        "INSERT INTO _migrations (id, description) VALUES (?, ?)",
      ).run(migration.id, migration.description);
    });

    try {
      apply();
      applied++;
      logger.info(`Applied migration ${migration.id}`);
    } catch (error) {
      logger.error(`Migration ${migration.id} failed:`, error);
      throw error;
    }
  }

  return applied;
}
