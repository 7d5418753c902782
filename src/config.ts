import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { logger } from "./logger";
import { ConfigError } from "./errors";

export interface QueueConfig {
  maxConcurrent: number;
  classifyTimeoutMs: number;
  classifyAttempts: number;
  classifyRetryDelayMs: number;
  shutdownGraceMs: number;
  minRelevanceScore: number;
}

export interface CircuitBreakerConfig {
  windowSize: number;
  minimumCalls: number;
  failureRateThreshold: number;
  cooldownMs: number;
}

export interface RecoveryConfig {
  windowHours: number;
  batchSize: number;
  schedule: string;
}

export interface CleanupConfig {
  enabled: boolean;
  batchSize: number;
  batchDelayMs: number;
  schedule: string;
}

export interface EnrichmentConfig {
  enabled: boolean;
  maxRetries: number;
  maxConcurrent: number;
  backoffMs: number;
}

export interface RateLimiting {
  ratePerSecond: number;
  burstCapacity: number;
  waitTimeoutMs: number;
}

export interface SourceConfig {
  rateLimiting: RateLimiting;
  timeoutMs: number;
  maxRetries: number;
  backoffStartMs: number;
  queries: string[];
  perPage: number;
  schedule: string;
}

export interface DeliveryConfig {
  redeliverySchedule: string;
  rateLimiting: RateLimiting;
}

export interface DedupConfig {
  windowDays: number;
  similarityThreshold: number;
}

export interface PipelineConfig {
  queue: QueueConfig;
  circuitBreaker: CircuitBreakerConfig;
  recovery: RecoveryConfig;
  cleanup: CleanupConfig;
  enrichment: EnrichmentConfig;
  source: SourceConfig;
  delivery: DeliveryConfig;
  dedup: DedupConfig;
}

export interface ExclusionConfig {
  keywords: string[];
  phrases: string[];
}

export interface EnvConfig {
  telegramBotToken: string;
  telegramChatId: string;
  telegramLogBotToken: string;
  telegramLogChatId: string;
  sourceApiBaseUrl: string;
  sourceApiToken: string;
  llmEndpoint: string;
  llmApiKey: string;
  llmModel: string;
  coverNoteModel: string;
  dbPath?: string;
  dryRun: boolean;
  timezone: string;
  nodeEnv: string;
  port: number;
}

export interface AppConfig {
  env: EnvConfig;
  pipeline: PipelineConfig;
  exclusions: ExclusionConfig;
}

export const CONFIG_DIR = fileURLToPath(new URL("../config", import.meta.url));

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  queue: {
    maxConcurrent: 3,
    classifyTimeoutMs: 120_000,
    classifyAttempts: 2,
    classifyRetryDelayMs: 1_000,
    shutdownGraceMs: 5_000,
    minRelevanceScore: 0.6,
  },
  circuitBreaker: {
    windowSize: 10,
    minimumCalls: 5,
    failureRateThreshold: 0.5,
    cooldownMs: 60_000,
  },
  recovery: {
    windowHours: 48,
    batchSize: 100,
    schedule: "*/15 * * * *",
  },
  cleanup: {
    enabled: true,
    batchSize: 50,
    batchDelayMs: 1_000,
    schedule: "0 2 * * *",
  },
  enrichment: {
    enabled: true,
    maxRetries: 3,
    maxConcurrent: 2,
    backoffMs: 5_000,
  },
  source: {
    rateLimiting: { ratePerSecond: 2, burstCapacity: 5, waitTimeoutMs: 2_000 },
    timeoutMs: 15_000,
    maxRetries: 2,
    backoffStartMs: 1_000,
    queries: [],
    perPage: 50,
    schedule: "0 */3 * * *",
  },
  delivery: {
    redeliverySchedule: "*/30 * * * *",
    rateLimiting: { ratePerSecond: 1, burstCapacity: 3, waitTimeoutMs: 3_000 },
  },
  dedup: {
    windowDays: 7,
    similarityThreshold: 0.85,
  },
};

// Env parsing

export function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

// JSON parsing

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function child(obj: JsonObject, key: string): JsonObject {
  const value = obj[key];
  return isObject(value) ? value : {};
}

function num(
  obj: JsonObject,
  key: string,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`"${key}" must be a number, got ${JSON.stringify(value)}`);
  }
  if (typeof min === "number" && value < min) {
    throw new ConfigError(`"${key}" must be >= ${min}, got ${value}`);
  }
  if (typeof max === "number" && value > max) {
    throw new ConfigError(`"${key}" must be <= ${max}, got ${value}`);
  }
  return value;
}

function str(obj: JsonObject, key: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string") {
    throw new ConfigError(`"${key}" must be a string`);
  }
  return value;
}

function bool(obj: JsonObject, key: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value !== "boolean") {
    throw new ConfigError(`"${key}" must be true or false`);
  }
  return value;
}

function strList(obj: JsonObject, key: string, fallback: string[]): string[] {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (!Array.isArray(value) || !value.every((v) => typeof v === "string")) {
    throw new ConfigError(`"${key}" must be a list of strings`);
  }
  return value.filter((v): v is string => typeof v === "string");
}

function parseRateLimiting(obj: JsonObject, fallback: RateLimiting): RateLimiting {
  const rateLimiting: RateLimiting = {
    ratePerSecond: num(obj, "ratePerSecond", fallback.ratePerSecond, 0.001),
    burstCapacity: num(obj, "burstCapacity", fallback.burstCapacity, 1),
    waitTimeoutMs: num(obj, "waitTimeoutMs", fallback.waitTimeoutMs, 0),
  };
  if (rateLimiting.burstCapacity < rateLimiting.ratePerSecond) {
    throw new ConfigError(
      `"burstCapacity" (${rateLimiting.burstCapacity}) must be >= "ratePerSecond" (${rateLimiting.ratePerSecond})`,
    );
  }
  return rateLimiting;
}

export function parsePipelineConfig(raw: unknown): PipelineConfig {
  if (!isObject(raw)) {
    throw new ConfigError("pipeline config must be a JSON object");
  }
  const d = DEFAULT_PIPELINE_CONFIG;

  const queue = child(raw, "queue");
  const breaker = child(raw, "circuitBreaker");
  const recovery = child(raw, "recovery");
  const cleanup = child(raw, "cleanup");
  const enrichment = child(raw, "enrichment");
  const source = child(raw, "source");
  const delivery = child(raw, "delivery");
  const dedup = child(raw, "dedup");

  return {
    queue: {
      maxConcurrent: num(queue, "maxConcurrent", d.queue.maxConcurrent, 1),
      classifyTimeoutMs: num(queue, "classifyTimeoutMs", d.queue.classifyTimeoutMs, 1),
      classifyAttempts: num(queue, "classifyAttempts", d.queue.classifyAttempts, 1, 10),
      classifyRetryDelayMs: num(
        queue,
        "classifyRetryDelayMs",
        d.queue.classifyRetryDelayMs,
        0,
      ),
      shutdownGraceMs: num(queue, "shutdownGraceMs", d.queue.shutdownGraceMs, 0),
      minRelevanceScore: num(queue, "minRelevanceScore", d.queue.minRelevanceScore, 0, 1),
    },
    circuitBreaker: {
      windowSize: num(breaker, "windowSize", d.circuitBreaker.windowSize, 1),
      minimumCalls: num(breaker, "minimumCalls", d.circuitBreaker.minimumCalls, 1),
      failureRateThreshold: num(
        breaker,
        "failureRateThreshold",
        d.circuitBreaker.failureRateThreshold,
        0,
        1,
      ),
      cooldownMs: num(breaker, "cooldownMs", d.circuitBreaker.cooldownMs, 0),
    },
    recovery: {
      windowHours: num(recovery, "windowHours", d.recovery.windowHours, 1),
      batchSize: num(recovery, "batchSize", d.recovery.batchSize, 1),
      schedule: str(recovery, "schedule", d.recovery.schedule),
    },
    cleanup: {
      enabled: bool(cleanup, "enabled", d.cleanup.enabled),
      batchSize: num(cleanup, "batchSize", d.cleanup.batchSize, 1),
      batchDelayMs: num(cleanup, "batchDelayMs", d.cleanup.batchDelayMs, 0),
      schedule: str(cleanup, "schedule", d.cleanup.schedule),
    },
    enrichment: {
      enabled: bool(enrichment, "enabled", d.enrichment.enabled),
      maxRetries: num(enrichment, "maxRetries", d.enrichment.maxRetries, 1),
      maxConcurrent: num(enrichment, "maxConcurrent", d.enrichment.maxConcurrent, 1),
      backoffMs: num(enrichment, "backoffMs", d.enrichment.backoffMs, 0),
    },
    source: {
      rateLimiting: parseRateLimiting(
        child(source, "rateLimiting"),
        d.source.rateLimiting,
      ),
      timeoutMs: num(source, "timeoutMs", d.source.timeoutMs, 1),
      maxRetries: num(source, "maxRetries", d.source.maxRetries, 0),
      backoffStartMs: num(source, "backoffStartMs", d.source.backoffStartMs, 0),
      queries: strList(source, "queries", d.source.queries),
      perPage: num(source, "perPage", d.source.perPage, 1, 100),
      schedule: str(source, "schedule", d.source.schedule),
    },
    delivery: {
      redeliverySchedule: str(
        delivery,
        "redeliverySchedule",
        d.delivery.redeliverySchedule,
      ),
      rateLimiting: parseRateLimiting(
        child(delivery, "rateLimiting"),
        d.delivery.rateLimiting,
      ),
    },
    dedup: {
      windowDays: num(dedup, "windowDays", d.dedup.windowDays, 1),
      similarityThreshold: num(
        dedup,
        "similarityThreshold",
        d.dedup.similarityThreshold,
        0,
        1,
      ),
    },
  };
}

export function parseExclusionConfig(raw: unknown): ExclusionConfig {
  if (!isObject(raw)) {
    throw new ConfigError("exclusion config must be a JSON object");
  }
  return {
    keywords: strList(raw, "keywords", []),
    phrases: strList(raw, "phrases", []),
  };
}

/** Removes // and block comments while leaving string contents (URLs) alone. */
export function stripJsonComments(raw: string): string {
  return raw.replace(
    /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
    (match: string, comment: string | undefined) => (comment ? "" : match),
  );
}

function loadJsonConfig(filename: string, dir: string = CONFIG_DIR): unknown {
  const filepath = join(dir, filename);

  if (!existsSync(filepath)) {
    throw new ConfigError(`Config file not found: ${filepath}`);
  }

  const raw = readFileSync(filepath, "utf-8");
  try {
    return JSON.parse(stripJsonComments(raw));
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${filename}: ${error}`);
  }
}

function loadEnvConfig(): EnvConfig {
  return {
    telegramBotToken: process.env.TELEGRAM_BOT_TOKEN ?? "",
    telegramChatId: process.env.TELEGRAM_CHAT_ID ?? "",
    telegramLogBotToken: process.env.TELEGRAM_LOG_BOT_TOKEN ?? "",
    telegramLogChatId: process.env.TELEGRAM_LOG_CHAT_ID ?? "",
    sourceApiBaseUrl: process.env.SOURCE_API_BASE_URL ?? "https://api.hh.ru",
    sourceApiToken: process.env.SOURCE_API_TOKEN ?? "",
    llmEndpoint:
      process.env.LLM_ENDPOINT ?? "http://localhost:11434/v1/chat/completions",
    llmApiKey: process.env.LLM_API_KEY ?? "",
    llmModel: process.env.LLM_MODEL ?? "qwen2.5:7b",
    coverNoteModel:
      process.env.COVER_NOTE_MODEL ?? process.env.LLM_MODEL ?? "qwen2.5:7b",
    dbPath: process.env.DB_PATH || undefined,
    dryRun: process.env.DRY_RUN === "true",
    timezone: process.env.TZ ?? "UTC",
    nodeEnv: process.env.NODE_ENV ?? "development",
    port: parseEnvInt(process.env.PORT, 3000, 1, 65535),
  };
}

export function loadConfig(dir: string = CONFIG_DIR): AppConfig {
  logger.info("Loading configuration...");

  const env = loadEnvConfig();
  const pipeline = parsePipelineConfig(loadJsonConfig("pipeline.json", dir));
  const exclusions = parseExclusionConfig(loadJsonConfig("exclusions.json", dir));

  if (!env.telegramBotToken) {
    logger.warn("TELEGRAM_BOT_TOKEN not set, accepted items will not be delivered");
  }
  if (!env.telegramLogBotToken) {
    logger.warn(
      "TELEGRAM_LOG_BOT_TOKEN not set, system alerts will only be logged",
    );
  }
  if (pipeline.source.queries.length === 0) {
    logger.warn("No source queries configured, scheduled fetch is disabled");
  }
  if (env.dryRun) {
    logger.info("🧪 DRY RUN MODE — nothing is sent to Telegram");
  }

  logger.info(`Config loaded successfully:`);
  logger.info(
    `  - queue: ${pipeline.queue.maxConcurrent} concurrent, ${pipeline.queue.classifyTimeoutMs}ms classify timeout`,
  );
  logger.info(
    `  - recovery: ${pipeline.recovery.windowHours}h window, batch ${pipeline.recovery.batchSize}`,
  );
  logger.info(
    `  - cleanup: ${pipeline.cleanup.enabled ? `batch ${pipeline.cleanup.batchSize}` : "disabled"}`,
  );
  logger.info(
    `  - enrichment: ${pipeline.enrichment.enabled ? "enabled" : "disabled"}, ${pipeline.enrichment.maxRetries} attempts`,
  );
  logger.info(`  - ${pipeline.source.queries.length} source queries`);
  logger.info(
    `  - ${exclusions.keywords.length} exclusion keywords, ${exclusions.phrases.length} phrases`,
  );
  logger.info(`  - Environment: ${env.nodeEnv}`);
  logger.info(`  - Timezone: ${env.timezone}`);

  return { env, pipeline, exclusions };
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
