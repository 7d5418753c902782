import { Hono } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { logger } from "./logger";
import { AppError, NotFoundError, errorMessage } from "./errors";
import type { ErrorCode } from "./errors";
import { getDatabaseStats, quickHealthCheck } from "./db";
import { countByStatus, getLastRun } from "./db/operations";
import { handleCallbackQuery } from "./alerts/callback";
import type { Pipeline } from "./pipeline";

const STATUS_BY_CODE: Record<ErrorCode, ContentfulStatusCode> = {
  NOT_FOUND: 404,
  TRANSPORT: 502,
  CLASSIFIER_TIMEOUT: 504,
  RATE_LIMIT_EXCEEDED: 429,
  CLASSIFIER_PARSE: 502,
  GENERATION: 502,
  CIRCUIT_OPEN: 503,
  ILLEGAL_TRANSITION: 409,
  CONFIG: 500,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

async function readJson(req: { json(): Promise<unknown> }): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    return null;
  }
}

export function createApp(pipeline: Pipeline): Hono {
  const app = new Hono();
  const { db, store, queue } = pipeline;

  app.onError((error, c) => {
    if (error instanceof AppError) {
      return c.json({ error: error.message, code: error.code }, STATUS_BY_CODE[error.code]);
    }
    logger.error(`[HTTP] ${c.req.method} ${c.req.path} failed: ${errorMessage(error)}`);
    return c.json({ error: "Internal error" }, 500);
  });

  app.get("/health", (c) => {
    const dbOk = quickHealthCheck(db);

    return c.json({
      status: dbOk && !pipeline.breaker.isOpen() ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      version: "1.0.0",
      dryRun: pipeline.config.env.dryRun,
      database: {
        ok: dbOk,
        stats: getDatabaseStats(db),
      },
      circuitBreaker: pipeline.breaker.getMetrics(),
    });
  });

  app.get("/status", (c) => {
    return c.json({
      timestamp: new Date().toISOString(),
      dryRun: pipeline.config.env.dryRun,
      environment: pipeline.config.env.nodeEnv,
      items: countByStatus(db),
      queue: {
        size: queue.getQueueSize(),
        stats: queue.getStats(),
        permitsInUse: pipeline.classifyGate.inUse(),
      },
      enrichment: {
        pending: pipeline.enrichment.size(),
        permitsInUse: pipeline.enrichmentGate.inUse(),
      },
      circuitBreaker: pipeline.breaker.getMetrics(),
      sourceTokens: pipeline.sourceLimiter.availableTokens(),
      sourceWaiters: pipeline.sourceLimiter.pending(),
      lastRecovery: pipeline.recovery.getLastReport(),
      lastCleanup: pipeline.cleanup.getLastReport(),
      lastRun: getLastRun(db),
    });
  });

  app.get("/api/queue", async (c) => {
    const items = await queue.getQueueItems();
    return c.json({ size: queue.getQueueSize(), items });
  });

  app.post("/api/queue", async (c) => {
    const body = await readJson(c.req);
    if (
      !isRecord(body) ||
      typeof body.id !== "string" ||
      typeof body.priorityKey !== "string"
    ) {
      return c.json({ error: "Expected { id: string, priorityKey: string }" }, 400);
    }

    const item = await store.load(body.id);
    if (!item) {
      throw new NotFoundError(`Item ${body.id} not found`);
    }
    if (item.status !== "QUEUED") {
      return c.json(
        { error: `Item ${body.id} is ${item.status}, not QUEUED`, added: false },
        409,
      );
    }

    // The stored publication time decides heap order, not the caller.
    return c.json({ added: queue.enqueue(item.id, item.priorityKey) });
  });

  app.post("/api/queue/batch", async (c) => {
    const body = await readJson(c.req);
    if (
      !isRecord(body) ||
      !Array.isArray(body.ids) ||
      !body.ids.every((id) => typeof id === "string")
    ) {
      return c.json({ error: "Expected { ids: string[] }" }, 400);
    }
    const ids = body.ids.filter((id): id is string => typeof id === "string");

    return c.json({ added: await queue.enqueueBatch(ids) });
  });

  app.post("/api/recovery", async (c) => {
    const report = await pipeline.runRecovery();
    return c.json(report, report.completed ? 200 : 503);
  });

  app.post("/api/cleanup", async (c) => {
    const report = await pipeline.runCleanup();
    return c.json(report, report.completed ? 200 : 503);
  });

  app.get("/api/items/:id", async (c) => {
    const id = c.req.param("id");
    const item = await store.load(id);
    if (!item) {
      return c.json({ error: "Item not found" }, 404);
    }

    return c.json({
      ...item,
      classification: await store.loadClassification(id),
      inQueue: queue.has(id),
    });
  });

  app.post("/api/telegram/callback", async (c) => {
    const update = await readJson(c.req);
    const result = await handleCallbackQuery(update, {
      client: pipeline.telegram,
      delivery: pipeline.delivery,
    });
    return c.json(result);
  });

  return app;
}
