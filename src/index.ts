import { serve } from "@hono/node-server";
import { logger } from "./logger";
import {
  openDatabase,
  initializeDatabase,
  checkDatabaseIntegrity,
} from "./db";
import type { Db } from "./db";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { Pipeline } from "./pipeline";
import { createApp } from "./app";
import { startScheduler, stopScheduler } from "./scheduler";
import { errorMessage } from "./errors";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Posting Enrichment Pipeline");
logger.info("═══════════════════════════════════════════════════");

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error("Failed to load configuration:", error);
  process.exit(1);
}

let db: Db;
try {
  db = openDatabase(config.env.dbPath);
  initializeDatabase(db);
} catch (error) {
  logger.error("Failed to initialize database:", error);
  process.exit(1);
}

const integrity = checkDatabaseIntegrity(db);
if (!integrity.ok) {
  logger.error(`Database integrity check failed: ${integrity.result}`);
  logger.error(
    "Please restore from backup or delete data/pipeline.db to recreate.",
  );
  process.exit(1);
}

let pipeline: Pipeline;
try {
  pipeline = new Pipeline(config, { db });
} catch (error) {
  logger.error("Failed to build pipeline:", error);
  process.exit(1);
}

const app = createApp(pipeline);
const port = config.env.port;

logger.info(`Starting server on port ${port}...`);

const server = serve({ fetch: app.fetch, port }, (info) => {
  logger.info(`✅ Pipeline started on http://localhost:${info.port}`);
  logger.info(`   Health: http://localhost:${info.port}/health`);
  logger.info(`   Status: http://localhost:${info.port}/status`);
  logger.info(`   Queue:  http://localhost:${info.port}/api/queue`);
  logger.info("═══════════════════════════════════════════════════");
});

const tasks = startScheduler(pipeline);

pipeline.start().catch((error: unknown) => {
  logger.error(`[STARTUP] Pipeline start failed: ${errorMessage(error)}`);
  pipeline.alert(`🚨 Pipeline start failed: ${errorMessage(error)}`);
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`${signal} received, shutting down...`);

  stopScheduler(tasks);
  server.close();
  try {
    await pipeline.shutdown();
  } catch (error) {
    logger.error(`Shutdown failed: ${errorMessage(error)}`);
  }
  db.close();
  process.exit(0);
}

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});
process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});
