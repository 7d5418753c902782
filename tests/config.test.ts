import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
  DEFAULT_PIPELINE_CONFIG,
  loadConfig,
  parseEnvInt,
  parseExclusionConfig,
  parsePipelineConfig,
  stripJsonComments,
} from "../src/config";
import { ConfigError } from "../src/errors";

describe("parsePipelineConfig", () => {
  it("falls back to defaults for missing sections", () => {
    expect(parsePipelineConfig({})).toEqual(DEFAULT_PIPELINE_CONFIG);
  });

  it("overrides individual values", () => {
    const config = parsePipelineConfig({
      queue: { maxConcurrent: 5, classifyAttempts: 1 },
      recovery: { windowHours: 24 },
      cleanup: { enabled: false, batchSize: 10 },
      source: { queries: ["node.js"] },
    });

    expect(config.queue.maxConcurrent).toBe(5);
    expect(config.queue.classifyAttempts).toBe(1);
    expect(config.queue.classifyTimeoutMs).toBe(120_000);
    expect(config.recovery.windowHours).toBe(24);
    expect(config.cleanup).toEqual({
      enabled: false,
      batchSize: 10,
      batchDelayMs: 1000,
      schedule: "0 2 * * *",
    });
    expect(config.source.queries).toEqual(["node.js"]);
  });

  it("rejects values of the wrong type", () => {
    expect(() => parsePipelineConfig({ queue: { maxConcurrent: "3" } })).toThrow(
      '"maxConcurrent" must be a number, got "3"',
    );
    expect(() => parsePipelineConfig({ enrichment: { enabled: "yes" } })).toThrow(
      ConfigError,
    );
    expect(() => parsePipelineConfig({ source: { queries: [1] } })).toThrow(
      '"queries" must be a list of strings',
    );
  });

  it("rejects values out of range", () => {
    expect(() => parsePipelineConfig({ queue: { maxConcurrent: 0 } })).toThrow(
      '"maxConcurrent" must be >= 1, got 0',
    );
    expect(() =>
      parsePipelineConfig({ circuitBreaker: { failureRateThreshold: 1.5 } }),
    ).toThrow('"failureRateThreshold" must be <= 1, got 1.5');
  });

  it("requires burst capacity to cover the refill rate", () => {
    expect(() =>
      parsePipelineConfig({
        source: { rateLimiting: { ratePerSecond: 10, burstCapacity: 2 } },
      }),
    ).toThrow('"burstCapacity" (2) must be >= "ratePerSecond" (10)');
  });

  it("rejects a non-object", () => {
    expect(() => parsePipelineConfig([])).toThrow("pipeline config must be a JSON object");
  });
});

describe("parseExclusionConfig", () => {
  it("reads keyword and phrase lists", () => {
    expect(
      parseExclusionConfig({ description: "ignored", keywords: ["php"], phrases: [] }),
    ).toEqual({ keywords: ["php"], phrases: [] });
  });
});

describe("stripJsonComments", () => {
  it("removes comments but keeps URLs inside strings", () => {
    const raw = `{
      // line comment
      "url": "https://example.test/path", /* block */
      "n": 1
    }`;

    expect(JSON.parse(stripJsonComments(raw))).toEqual({
      url: "https://example.test/path",
      n: 1,
    });
  });
});

describe("parseEnvInt", () => {
  it("parses and clamps", () => {
    expect(parseEnvInt("8080", 3000)).toBe(8080);
    expect(parseEnvInt(undefined, 3000)).toBe(3000);
    expect(parseEnvInt("abc", 3000)).toBe(3000);
    expect(parseEnvInt("0", 3000, 1, 65535)).toBe(1);
    expect(parseEnvInt("70000", 3000, 1, 65535)).toBe(65535);
  });
});

describe("loadConfig", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  it("loads the bundled configuration", () => {
    const config = loadConfig();

    expect(config.pipeline.queue.classifyAttempts).toBe(2);
    expect(config.pipeline.source.queries.length).toBeGreaterThan(0);
    expect(config.exclusions.keywords).toContain("php");
  });

  it("fails when a file is missing", () => {
    dir = mkdtempSync(join(tmpdir(), "pipeline-config-"));

    expect(() => loadConfig(dir ?? "")).toThrow(ConfigError);
  });

  it("fails on malformed JSON", () => {
    dir = mkdtempSync(join(tmpdir(), "pipeline-config-"));
    writeFileSync(join(dir, "pipeline.json"), "{ queue: }");
    writeFileSync(join(dir, "exclusions.json"), "{}");

    expect(() => loadConfig(dir ?? "")).toThrow("Failed to parse config file pipeline.json");
  });
});
