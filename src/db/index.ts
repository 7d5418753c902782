import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { SCHEMA_VERSION } from "./schema";
import { runMigrations } from "./migrations";
import { logger } from "../logger";

export type Db = Database.Database;

const DATA_DIR = fileURLToPath(new URL("../../data", import.meta.url));
export const DEFAULT_DB_PATH = join(DATA_DIR, "pipeline.db");

const EXPECTED_TABLES = [
  "work_items",
  "classification_results",
  "notifications",
  "run_log",
  "_migrations",
];

/** Opens (and creates) the database. Pass ":memory:" for a throwaway one. */
export function openDatabase(path: string = DEFAULT_DB_PATH): Db {
  if (path !== ":memory:") {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
      logger.info(`Created data directory: ${dir}`);
    }
  }

  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");
  return db;
}

export function initializeDatabase(db: Db): void {
  logger.info("Initializing database...");

  try {
    runMigrations(db);

    const tableNames = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name",
      )
      .all()
      .map((t) => t.name)
      .filter((n) => n !== "sqlite_sequence");
    logger.info(
      `Database initialized with ${tableNames.length} tables: ${tableNames.join(", ")}`,
    );

    const missing = EXPECTED_TABLES.filter((t) => !tableNames.includes(t));
    if (missing.length > 0) {
      logger.warn(`Missing tables after migration: ${missing.join(", ")}`);
    }
  } catch (error) {
    logger.error("Failed to initialize database:", error);
    throw error;
  }
}

export function checkDatabaseIntegrity(db: Db): { ok: boolean; result: string } {
  try {
    const result = db
      .prepare<[], { integrity_check: string }>("PRAGMA integrity_check")
      .get();
    const isOk = result?.integrity_check === "ok";

    if (!isOk) {
      logger.error(
        `Database integrity check FAILED: ${result?.integrity_check}`,
      );
    } else {
      logger.info("Database integrity check passed");
    }

    return { ok: isOk, result: result?.integrity_check ?? "unknown" };
  } catch (error) {
    logger.error("Database integrity check threw error:", error);
    return { ok: false, result: String(error) };
  }
}

export function getDatabaseStats(db: Db): Record<string, number> {
  const stats: Record<string, number> = {};

  for (const table of EXPECTED_TABLES) {
    try {
      const result = db
        .prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`)
        .get();
      stats[table] = result?.count ?? 0;
    } catch (error) {
      logger.debug(`Stats unavailable for ${table}:`, error);
      stats[table] = -1;
    }
  }

  return stats;
}

export function quickHealthCheck(db: Db): boolean {
  try {
    const result = db.prepare<[], { ok: number }>("SELECT 1 as ok").get();
    return result?.ok === 1;
  } catch (error) {
    logger.error("Database health check failed:", error);
    return false;
  }
}

export { SCHEMA_VERSION };
