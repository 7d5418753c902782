import { logger } from "../logger";
import { openDatabase, initializeDatabase } from "../db";
import { loadConfig } from "../config";
import { Pipeline } from "../pipeline";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Manual Ingest");
logger.info("═══════════════════════════════════════════════════");

const config = loadConfig();
const db = openDatabase(config.env.dbPath);
initializeDatabase(db);

const pipeline = new Pipeline(config, { db });
await pipeline.start();
const result = await pipeline.runIngest("manual");

// Let everything that was queued finish classification and delivery
await pipeline.queue.onIdle();
await pipeline.enrichment.onIdle();
await pipeline.shutdown();

logger.info("═══════════════════════════════════════════════════");
logger.info("  Ingest Complete");
logger.info("═══════════════════════════════════════════════════");
logger.info(`  Run ID:       ${result.runId}`);
logger.info(`  Items found:  ${result.itemsFound}`);
logger.info(`  Items new:    ${result.itemsNew}`);
logger.info(`  Items dupe:   ${result.itemsDuplicate}`);
logger.info(`  Queued:       ${result.itemsQueued}`);
logger.info(`  Errors:       ${result.errors.length}`);
logger.info(`  Duration:     ${(result.durationMs / 1000).toFixed(1)}s`);

if (result.errors.length > 0) {
  logger.warn("Errors encountered:");
  result.errors.forEach((e) => logger.warn(`  • ${e}`));
}

db.close();
process.exit(result.itemsFound === 0 && result.errors.length > 0 ? 1 : 0);
