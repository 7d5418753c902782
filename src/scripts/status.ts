/**
 * Print item counts per status, last run and the latest recovery candidates.
 */

import { logger } from "../logger";
import { openDatabase, initializeDatabase, getDatabaseStats } from "../db";
import { getConfig } from "../config";
import {
  SqliteStatusStore,
  countByStatus,
  getLastRun,
} from "../db/operations";

const config = getConfig();
const db = openDatabase(config.env.dbPath);
initializeDatabase(db);

logger.info("═══════════════════════════════════════════════════");
logger.info("  System Status");
logger.info("═══════════════════════════════════════════════════");

const stats = getDatabaseStats(db);
logger.info(`📊 Total items: ${stats.work_items ?? 0}`);
logger.info(`🧠 Classifications: ${stats.classification_results ?? 0}`);
logger.info(`📝 Notifications sent: ${stats.notifications ?? 0}`);

logger.info("\n📋 Items by status:");
for (const [status, count] of Object.entries(countByStatus(db))) {
  logger.info(`   ${status.padEnd(14)} ${count}`);
}

const lastRun = getLastRun(db);
if (lastRun) {
  logger.info(`\n🕐 Last run:`);
  logger.info(`   Type: ${lastRun.runType}`);
  logger.info(`   Started: ${lastRun.startedAt}`);
  logger.info(`   Finished: ${lastRun.finishedAt ?? "still running"}`);
  logger.info(`   Status: ${lastRun.status}`);
  logger.info(
    `   Items found: ${lastRun.itemsFound}, New: ${lastRun.itemsNew}, Dupe: ${lastRun.itemsDuplicate}`,
  );
} else {
  logger.info("\n🕐 No runs recorded yet");
}

const windowStart = new Date(
  Date.now() - config.pipeline.recovery.windowHours * 60 * 60 * 1000,
).toISOString();
const recoverable = await new SqliteStatusStore(db).findByStatus("SKIPPED", {
  transitionedAfter: windowStart,
});
logger.info(
  `\n♻️  SKIPPED within the ${config.pipeline.recovery.windowHours}h recovery window: ${recoverable.length}`,
);

logger.info(`\n⚙️  Environment: ${config.env.nodeEnv}`);
logger.info(`🧪 Dry run: ${config.env.dryRun}`);
logger.info(
  `📡 Source queries: ${config.pipeline.source.queries.length > 0 ? config.pipeline.source.queries.join(", ") : "none"}`,
);

logger.info("═══════════════════════════════════════════════════");
db.close();
