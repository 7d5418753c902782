/**
 * One-off recovery pass: re-queues recent SKIPPED items and waits until the
 * queue and the enrichment stage have drained.
 */

import { logger } from "../logger";
import { openDatabase, initializeDatabase } from "../db";
import { loadConfig } from "../config";
import { Pipeline } from "../pipeline";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Manual Recovery");
logger.info("═══════════════════════════════════════════════════");

const config = loadConfig();
const db = openDatabase(config.env.dbPath);
initializeDatabase(db);

const pipeline = new Pipeline(config, { db });
const report = await pipeline.runRecovery();

await pipeline.queue.onIdle();
await pipeline.enrichment.onIdle();
await pipeline.shutdown();

logger.info("═══════════════════════════════════════════════════");
logger.info("  Recovery Complete");
logger.info("═══════════════════════════════════════════════════");
logger.info(`  Recovered:      ${report.recovered}`);
logger.info(`  Deleted:        ${report.deleted}`);
logger.info(`  Kept (rejected): ${report.skippedIntentionally}`);
logger.info(`  Failed:         ${report.failed}`);

const stats = pipeline.queue.getStats();
logger.info(
  `  Outcomes: ${stats.accepted} accepted, ${stats.rejected} rejected, ${stats.skipped} skipped again`,
);

db.close();
process.exit(report.completed ? 0 : 1);
