import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { logger } from "../logger";
import {
  ClassifierParseError,
  ConfigError,
  GenerationError,
  RateLimitExceededError,
  TransportError,
  errorMessage,
} from "../errors";
import { CONFIG_DIR } from "../config";
import {
  CLASSIFIER_SYSTEM_PROMPT,
  COVER_NOTE_SYSTEM_PROMPT,
  buildClassificationPrompt,
  buildCoverNotePrompt,
  cleanCoverNote,
  parseRelevanceVerdict,
} from "./prompt";
import type {
  Classifier,
  ClassifierContext,
  SecondaryEnrichmentGenerator,
} from "../ports";
import type {
  ClassificationOutcome,
  ClassificationResult,
  WorkItem,
} from "../types";
import type { ChatCompletion, ChatOptions, LlmProviderConfig } from "./types";

export function loadProfile(path: string = join(CONFIG_DIR, "profile.md")): string {
  if (!existsSync(path)) {
    throw new ConfigError(`Candidate profile not found at ${path}`);
  }
  const profile = readFileSync(path, "utf-8").trim();
  if (!profile) {
    throw new ConfigError(`Candidate profile at ${path} is empty`);
  }
  logger.info(`AI: profile loaded (${profile.length} chars)`);
  return profile;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readCompletion(body: unknown): ChatCompletion | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) return null;
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;
  const content = first.message.content;
  if (typeof content !== "string") return null;

  const usage = isRecord(body.usage) ? body.usage : {};
  return {
    content,
    promptTokens: typeof usage.prompt_tokens === "number" ? usage.prompt_tokens : 0,
    completionTokens:
      typeof usage.completion_tokens === "number" ? usage.completion_tokens : 0,
  };
}

/**
 * One chat-completion call. 429 raises RateLimitExceededError; network
 * errors, aborts and non-2xx answers raise TransportError.
 */
export async function callChatCompletion(
  provider: LlmProviderConfig,
  systemPrompt: string,
  userPrompt: string,
  options: ChatOptions = {},
): Promise<ChatCompletion> {
  const startTime = Date.now();
  logger.debug(`AI: calling ${provider.name} (${provider.model})...`);

  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (provider.apiKey) {
    headers.Authorization = `Bearer ${provider.apiKey}`;
  }

  let response: Response;
  try {
    response = await fetch(provider.endpoint, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model: provider.model,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt },
        ],
        max_tokens: options.maxTokens ?? 1024,
        temperature: options.temperature ?? 0.3,
        stream: false,
      }),
      signal: options.signal,
    });
  } catch (error) {
    throw new TransportError(
      `${provider.name} request failed: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (response.status === 429) {
    throw new RateLimitExceededError(`${provider.name} returned 429`);
  }
  if (!response.ok) {
    const errorText = await response.text().catch(() => "");
    throw new TransportError(
      `${provider.name} returned ${response.status}: ${errorText.substring(0, 200)}`,
      { statusCode: response.status },
    );
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new TransportError(
      `${provider.name} returned a non-JSON body: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const completion = readCompletion(body);
  if (!completion) {
    throw new TransportError(`${provider.name} returned no message content`);
  }

  logger.info(
    `AI: ${provider.name} responded in ${Date.now() - startTime}ms ` +
      `(${completion.promptTokens} prompt + ${completion.completionTokens} completion tokens)`,
  );
  return completion;
}

// Classifier

export interface LlmClassifierOptions {
  provider: LlmProviderConfig;
  profile: string;
  /** Relevance below this score is a rejection even if the model says relevant. */
  minRelevanceScore: number;
}

export class LlmClassifier implements Classifier {
  constructor(private readonly options: LlmClassifierOptions) {}

  async classify(
    item: WorkItem,
    context: ClassifierContext,
  ): Promise<ClassificationOutcome> {
    const { provider, profile, minRelevanceScore } = this.options;
    const completion = await callChatCompletion(
      provider,
      CLASSIFIER_SYSTEM_PROMPT,
      buildClassificationPrompt(profile, item),
      { signal: context.signal, maxTokens: 512, temperature: 0.1 },
    );

    const verdict = parseRelevanceVerdict(completion.content);
    if (!verdict) {
      logger.debug(`AI: raw response: ${completion.content.substring(0, 500)}`);
      throw new ClassifierParseError(
        `Could not parse classifier answer for ${item.id}`,
        completion.content,
      );
    }

    const accepted =
      verdict.isRelevant && verdict.relevanceScore >= minRelevanceScore;
    logger.info(
      `AI: ${item.title} @ ${item.company}: ${verdict.relevanceScore.toFixed(2)} (${accepted ? "relevant" : "not relevant"})`,
    );

    return {
      accepted,
      score: verdict.relevanceScore,
      rationale: verdict.reasoning,
      tags: verdict.matchedSkills,
      modelUsed: provider.model,
    };
  }
}

// Cover notes

export interface CoverNoteGeneratorOptions {
  provider: LlmProviderConfig;
  profile: string;
  timeoutMs: number;
}

export class CoverNoteGenerator implements SecondaryEnrichmentGenerator {
  constructor(private readonly options: CoverNoteGeneratorOptions) {}

  async generate(
    item: WorkItem,
    classification: ClassificationResult,
  ): Promise<string> {
    const { provider, profile, timeoutMs } = this.options;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const completion = await callChatCompletion(
        provider,
        COVER_NOTE_SYSTEM_PROMPT,
        buildCoverNotePrompt(profile, item, classification),
        { signal: controller.signal, maxTokens: 600, temperature: 0.6 },
      );
      const note = cleanCoverNote(completion.content);
      if (!note) {
        throw new GenerationError(`Empty cover note for ${item.id}`);
      }
      return note;
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      throw new GenerationError(
        `Cover note generation failed for ${item.id}: ${errorMessage(error)}`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

export type { LlmProviderConfig } from "./types";
