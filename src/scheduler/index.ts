import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { logger } from "../logger";
import { errorMessage } from "../errors";
import type { IngestRunResult, Pipeline } from "../pipeline";

let ingestRunning = false;

async function runIngestGuarded(
  pipeline: Pipeline,
  runType: string,
): Promise<IngestRunResult | null> {
  if (ingestRunning) {
    logger.warn(`[LOCK] Ingest already running — skipping ${runType} run`);
    return null;
  }
  ingestRunning = true;
  try {
    return await pipeline.runIngest(runType);
  } finally {
    ingestRunning = false;
  }
}

export function startScheduler(pipeline: Pipeline): ScheduledTask[] {
  const { env, pipeline: settings } = pipeline.config;
  const timezone = env.timezone || "UTC";
  const tasks: ScheduledTask[] = [];

  logger.info("Starting scheduler...");

  if (settings.source.queries.length > 0) {
    tasks.push(
      cron.schedule(
        settings.source.schedule,
        async () => {
          logger.info("[CRON] Starting source fetch...");
          try {
            const result = await runIngestGuarded(pipeline, "scheduled");
            if (!result) return;
            logger.info(
              `[CRON] Fetch complete: ${result.itemsNew} new, ${result.itemsDuplicate} dupe, ${result.errors.length} errors`,
            );
          } catch (error) {
            logger.error(`[CRON] Source fetch failed: ${errorMessage(error)}`);
            pipeline.alert(`🚨 Scheduled fetch failed: ${errorMessage(error)}`);
          }
        },
        { timezone },
      ),
    );
    logger.info(`  ✓ Source fetch: ${settings.source.schedule}`);
  }

  tasks.push(
    cron.schedule(
      settings.recovery.schedule,
      async () => {
        logger.info("[CRON] Running recovery pass...");
        try {
          const report = await pipeline.runRecovery();
          logger.info(
            `[CRON] Recovery complete: ${report.recovered} recovered, ${report.deleted} deleted, ${report.failed} failed`,
          );
        } catch (error) {
          logger.error(`[CRON] Recovery failed: ${errorMessage(error)}`);
          pipeline.alert(`🚨 Recovery failed: ${errorMessage(error)}`);
        }
      },
      { timezone },
    ),
  );
  logger.info(`  ✓ Recovery: ${settings.recovery.schedule}`);

  if (settings.cleanup.enabled) {
    tasks.push(
      cron.schedule(
        settings.cleanup.schedule,
        async () => {
          logger.info("[CRON] Running cleanup of gone postings...");
          try {
            const report = await pipeline.runCleanup();
            logger.info(
              `[CRON] Cleanup complete: ${report.checked} checked, ${report.deleted} deleted, ${report.errors} errors`,
            );
          } catch (error) {
            logger.error(`[CRON] Cleanup failed: ${errorMessage(error)}`);
            pipeline.alert(`🚨 Cleanup failed: ${errorMessage(error)}`);
          }
        },
        { timezone },
      ),
    );
    logger.info(`  ✓ Cleanup: ${settings.cleanup.schedule}`);
  }

  tasks.push(
    cron.schedule(
      settings.delivery.redeliverySchedule,
      async () => {
        try {
          await pipeline.delivery.redeliverPending();
        } catch (error) {
          logger.error(`[CRON] Redelivery failed: ${errorMessage(error)}`);
          pipeline.alert(`🚨 Redelivery failed: ${errorMessage(error)}`);
        }
      },
      { timezone },
    ),
  );
  logger.info(`  ✓ Redelivery: ${settings.delivery.redeliverySchedule}`);

  logger.info(`Scheduler started with ${tasks.length} jobs.`);
  return tasks;
}

export function stopScheduler(tasks: ScheduledTask[]): void {
  for (const task of tasks) task.stop();
}
