import { logger } from "./logger";
import { ClassifierParseError, errorMessage } from "./errors";
import { CircuitBreaker } from "./resilience/circuit-breaker";
import { ConcurrencyGate } from "./resilience/concurrency-gate";
import { RateLimiter } from "./resilience/rate-limiter";
import { PriorityProcessingQueue } from "./queue/processing-queue";
import { EnrichmentRetryQueue } from "./queue/enrichment-queue";
import { RecoveryScanner } from "./recovery";
import { CleanupService } from "./cleanup";
import type { CleanupReport } from "./cleanup";
import { DeliveryService } from "./delivery";
import { ExclusionContentValidator } from "./validation";
import { SourceClient } from "./source";
import { CoverNoteGenerator, LlmClassifier, loadProfile } from "./ai";
import { TelegramClient, TelegramNotifier, sendSystemAlert } from "./alerts";
import { fetchPostings, ingestPostings } from "./ingest";
import {
  SqliteStatusStore,
  createRun,
  finishRun,
  logNotification,
} from "./db/operations";
import type { Db } from "./db";
import type { AppConfig } from "./config";
import type { NotificationRecord } from "./db/operations";
import type {
  Classifier,
  ContentValidator,
  DeliveryNotifier,
  ExistenceChecker,
  SecondaryEnrichmentGenerator,
  StatusStore,
} from "./ports";
import type { RecoveryReport } from "./types";

/** Adapter overrides; anything left out is built from the config. */
export interface PipelineDeps {
  db: Db;
  store?: StatusStore;
  source?: SourceClient;
  existenceChecker?: ExistenceChecker;
  validator?: ContentValidator;
  classifier?: Classifier;
  generator?: SecondaryEnrichmentGenerator;
  notifier?: DeliveryNotifier;
  telegram?: TelegramClient;
  profile?: string;
  now?: () => Date;
}

export interface IngestRunResult {
  runId: number;
  itemsFound: number;
  itemsNew: number;
  itemsDuplicate: number;
  itemsQueued: number;
  errors: string[];
  durationMs: number;
}

/**
 * Wires the stages together:
 * ingest -> processing queue -> (ACCEPTED) enrichment -> delivery,
 * with the recovery scanner feeding SKIPPED items back into the queue.
 */
export class Pipeline {
  readonly db: Db;
  readonly store: StatusStore;
  readonly breaker: CircuitBreaker;
  readonly classifyGate: ConcurrencyGate;
  readonly enrichmentGate: ConcurrencyGate;
  readonly sourceLimiter: RateLimiter;
  readonly source: SourceClient;
  readonly telegram: TelegramClient;
  readonly queue: PriorityProcessingQueue;
  readonly enrichment: EnrichmentRetryQueue;
  readonly recovery: RecoveryScanner;
  readonly cleanup: CleanupService;
  readonly delivery: DeliveryService;

  private readonly unsubscribers: Array<() => void> = [];
  private started = false;

  constructor(
    readonly config: AppConfig,
    deps: PipelineDeps,
  ) {
    const { env, pipeline } = config;
    const now = deps.now;

    this.db = deps.db;
    this.store = deps.store ?? new SqliteStatusStore(deps.db);

    this.breaker = new CircuitBreaker({
      name: "classifier",
      ...pipeline.circuitBreaker,
      // A malformed answer says nothing about the classifier's health.
      isFailure: (error) => !(error instanceof ClassifierParseError),
      onStateChange: (from, to) => {
        if (to === "OPEN") {
          this.alert(`⚡ Classifier circuit opened (${from} -> ${to})`);
        }
      },
    });
    this.classifyGate = new ConcurrencyGate("classify", pipeline.queue.maxConcurrent);
    this.enrichmentGate = new ConcurrencyGate(
      "enrichment",
      pipeline.enrichment.maxConcurrent,
    );

    const sourceRate = pipeline.source.rateLimiting;
    this.sourceLimiter = new RateLimiter({
      name: "source",
      ratePerSecond: sourceRate.ratePerSecond,
      capacity: sourceRate.burstCapacity,
      waitTimeoutMs: sourceRate.waitTimeoutMs,
    });
    this.source =
      deps.source ??
      new SourceClient({
        baseUrl: env.sourceApiBaseUrl,
        token: env.sourceApiToken || undefined,
        limiter: this.sourceLimiter,
        timeoutMs: pipeline.source.timeoutMs,
        maxRetries: pipeline.source.maxRetries,
        backoffStartMs: pipeline.source.backoffStartMs,
        perPage: pipeline.source.perPage,
      });

    const deliveryRate = pipeline.delivery.rateLimiting;
    this.telegram =
      deps.telegram ??
      new TelegramClient({
        botTokens: { job: env.telegramBotToken, log: env.telegramLogBotToken },
        chatIds: { job: env.telegramChatId, log: env.telegramLogChatId },
        dryRun: env.dryRun,
        limiter: new RateLimiter({
          name: "telegram",
          ratePerSecond: deliveryRate.ratePerSecond,
          capacity: deliveryRate.burstCapacity,
          waitTimeoutMs: deliveryRate.waitTimeoutMs,
        }),
      });

    const validator = deps.validator ?? new ExclusionContentValidator(config.exclusions);
    const needsProfile = !deps.classifier || !deps.generator;
    const profile = deps.profile ?? (needsProfile ? loadProfile() : "");

    const classifier =
      deps.classifier ??
      new LlmClassifier({
        provider: {
          name: "classifier",
          endpoint: env.llmEndpoint,
          apiKey: env.llmApiKey,
          model: env.llmModel,
        },
        profile,
        minRelevanceScore: pipeline.queue.minRelevanceScore,
      });
    const generator =
      deps.generator ??
      new CoverNoteGenerator({
        provider: {
          name: "cover-note",
          endpoint: env.llmEndpoint,
          apiKey: env.llmApiKey,
          model: env.coverNoteModel,
        },
        profile,
        timeoutMs: pipeline.queue.classifyTimeoutMs,
      });
    const notifier =
      deps.notifier ?? new TelegramNotifier(this.telegram, this.recordNotification);

    const existenceChecker = deps.existenceChecker ?? this.source;

    this.queue = new PriorityProcessingQueue({
      store: this.store,
      existenceChecker,
      validator,
      classifier,
      breaker: this.breaker,
      gate: this.classifyGate,
      classifyTimeoutMs: pipeline.queue.classifyTimeoutMs,
      classifyAttempts: pipeline.queue.classifyAttempts,
      classifyRetryDelayMs: pipeline.queue.classifyRetryDelayMs,
      shutdownGraceMs: pipeline.queue.shutdownGraceMs,
      now,
    });
    this.enrichment = new EnrichmentRetryQueue({
      store: this.store,
      generator,
      gate: this.enrichmentGate,
      maxRetries: pipeline.enrichment.maxRetries,
      backoffMs: pipeline.enrichment.backoffMs,
      enabled: pipeline.enrichment.enabled,
      now,
    });
    this.recovery = new RecoveryScanner({
      store: this.store,
      validator,
      queue: this.queue,
      windowHours: pipeline.recovery.windowHours,
      batchSize: pipeline.recovery.batchSize,
      isBackendAvailable: () => !this.breaker.isOpen(),
      now,
    });
    this.cleanup = new CleanupService({
      store: this.store,
      existenceChecker,
      batchSize: pipeline.cleanup.batchSize,
      batchDelayMs: pipeline.cleanup.batchDelayMs,
    });
    this.delivery = new DeliveryService({ store: this.store, notifier, now });

    this.unsubscribers.push(
      this.queue.onOutcome((event) => {
        if (event.outcome === "accepted") {
          this.enrichment.enqueue(event.itemId);
        }
      }),
      this.enrichment.onReadyForDelivery(this.delivery.handleReady),
    );
  }

  /** Picks up work left over from a previous process. */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    const queued = await this.queue.restore();
    const enriching = await this.enrichment.restore();
    logger.info(
      `[Pipeline] Restored ${queued} queued and ${enriching} enrichment items`,
    );

    await this.runRecovery();
    await this.delivery.redeliverPending();
  }

  async runRecovery(): Promise<RecoveryReport> {
    const report = await this.recovery.runRecoveryPass();
    if (!report.completed) {
      this.alert("🚨 Recovery pass could not read the store");
    }
    return report;
  }

  async runCleanup(): Promise<CleanupReport> {
    const report = await this.cleanup.runCleanupPass();
    if (!report.completed) {
      this.alert(
        `⚠️ Cleanup stopped early: checked ${report.checked}, deleted ${report.deleted}, errors ${report.errors}`,
      );
    }
    return report;
  }

  /** Fetches every configured query and ingests what is new. */
  async runIngest(runType = "manual"): Promise<IngestRunResult> {
    const startTime = Date.now();
    const runId = createRun(this.db, runType, this.config.env.dryRun);
    const errors: string[] = [];
    let itemsFound = 0;
    let itemsNew = 0;
    let itemsDuplicate = 0;
    let itemsQueued = 0;

    logger.info(`[Pipeline] Ingest run #${runId} (${runType})`);

    try {
      const fetched = await fetchPostings(
        this.source,
        this.config.pipeline.source.queries,
        this.store,
      );
      errors.push(...fetched.errors);

      const result = await ingestPostings(fetched.postings, {
        store: this.store,
        queue: this.queue,
        dedupWindowDays: this.config.pipeline.dedup.windowDays,
        similarityThreshold: this.config.pipeline.dedup.similarityThreshold,
      });
      itemsFound = result.found;
      itemsNew = result.new;
      itemsDuplicate = result.duplicate;
      itemsQueued = result.queued;

      finishRun(this.db, runId, "completed", {
        itemsFound,
        itemsNew,
        itemsDuplicate,
        errors,
      });
    } catch (error) {
      const errMsg = `Ingest run failed: ${errorMessage(error)}`;
      logger.error(`[Pipeline] ${errMsg}`);
      errors.push(errMsg);
      finishRun(this.db, runId, "failed", {
        itemsFound,
        itemsNew,
        itemsDuplicate,
        errors,
      });
      await sendSystemAlert(this.telegram, `🚨 INGEST FAILURE\n${errMsg}`, this.recordNotification);
    }

    return {
      runId,
      itemsFound,
      itemsNew,
      itemsDuplicate,
      itemsQueued,
      errors,
      durationMs: Date.now() - startTime,
    };
  }

  async shutdown(): Promise<void> {
    logger.info("[Pipeline] Shutting down...");
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    await this.queue.shutdown();
    await this.enrichment.shutdown();
    logger.info("[Pipeline] Stopped");
  }

  /** Fire-and-forget system alert. */
  alert(message: string): void {
    sendSystemAlert(this.telegram, message, this.recordNotification).catch(
      (error: unknown) => {
        logger.error(`[Pipeline] System alert failed: ${errorMessage(error)}`);
      },
    );
  }

  private readonly recordNotification = (record: NotificationRecord): void => {
    logNotification(this.db, record);
  };
}
