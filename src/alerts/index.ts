/**
 * Telegram Bot integration, two bots:
 * "job" delivers accepted postings with decision buttons,
 * "log" carries system alerts.
 */

import { logger } from "../logger";
import { RateLimitExceededError, errorMessage } from "../errors";
import type { RateLimiter } from "../resilience/rate-limiter";
import type { NotificationRecord } from "../db/operations";
import type { DeliveryNotifier } from "../ports";
import type { ClassificationResult, WorkItem } from "../types";

export type BotType = "job" | "log";

export interface TelegramInlineButton {
  text: string;
  callback_data: string;
}

export interface SendResult {
  success: boolean;
  messageId?: number;
  error?: string;
}

export interface TelegramClientOptions {
  botTokens: Record<BotType, string>;
  chatIds: Record<BotType, string>;
  dryRun: boolean;
  limiter?: RateLimiter;
  apiBaseUrl?: string;
}

const MAX_MESSAGE_LENGTH = 4000;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function safeHref(url: string): string {
  return escapeHtml(url.trim());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export class TelegramClient {
  private readonly apiBaseUrl: string;

  constructor(private readonly options: TelegramClientOptions) {
    this.apiBaseUrl = options.apiBaseUrl ?? "https://api.telegram.org";
  }

  isConfigured(botType: BotType): boolean {
    return Boolean(this.options.botTokens[botType] && this.options.chatIds[botType]);
  }

  botToken(botType: BotType): string {
    return this.options.botTokens[botType];
  }

  async sendMessage(
    botType: BotType,
    text: string,
    inlineKeyboard?: TelegramInlineButton[][],
  ): Promise<SendResult> {
    const chatId = this.options.chatIds[botType];

    if (!this.isConfigured(botType)) {
      const msg = `Telegram ${botType} bot not configured — skipping`;
      logger.warn(msg);
      return { success: false, error: msg };
    }

    if (this.options.dryRun) {
      logger.info(`[DRY RUN] Would send to ${botType} bot:`);
      logger.info(text.substring(0, 200) + (text.length > 200 ? "..." : ""));
      return { success: true, messageId: 0 };
    }

    const body: Record<string, unknown> = {
      chat_id: chatId,
      text,
      parse_mode: "HTML",
      disable_web_page_preview: true,
    };
    if (inlineKeyboard) {
      body.reply_markup = { inline_keyboard: inlineKeyboard };
    }

    try {
      const result = await this.call(botType, "sendMessage", body);
      const messageId =
        isRecord(result) && typeof result.message_id === "number"
          ? result.message_id
          : undefined;
      return { success: true, messageId };
    } catch (error) {
      const errorMsg = errorMessage(error);
      logger.error(`Telegram ${botType} send failed: ${errorMsg}`);
      return { success: false, error: errorMsg };
    }
  }

  async answerCallback(callbackQueryId: string, text: string): Promise<void> {
    try {
      await this.call("job", "answerCallbackQuery", {
        callback_query_id: callbackQueryId,
        text,
        show_alert: false,
      });
    } catch (error) {
      logger.error(`answerCallbackQuery failed: ${errorMessage(error)}`);
    }
  }

  async editMessage(chatId: number, messageId: number, newText: string): Promise<void> {
    try {
      await this.call("job", "editMessageText", {
        chat_id: chatId,
        message_id: messageId,
        text: newText,
        parse_mode: "HTML",
      });
    } catch (error) {
      logger.error(`editMessageText failed: ${errorMessage(error)}`);
    }
  }

  private async call(
    botType: BotType,
    method: string,
    body: Record<string, unknown>,
  ): Promise<unknown> {
    if (this.options.limiter) {
      await this.options.limiter.tryConsume();
    }

    const response = await fetch(
      `${this.apiBaseUrl}/bot${this.options.botTokens[botType]}/${method}`,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      },
    );

    if (response.status === 429) {
      throw new RateLimitExceededError(`Telegram ${method} returned 429`);
    }

    const payload: unknown = await response.json();
    if (!isRecord(payload) || payload.ok !== true) {
      const description =
        isRecord(payload) && typeof payload.description === "string"
          ? payload.description
          : `Telegram API error (${response.status})`;
      throw new Error(description);
    }
    return payload.result;
  }
}

// Message formatting

export function splitMessage(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) return [text];

  const chunks: string[] = [];
  const lines = text.split("\n");
  let current = "";

  for (const line of lines) {
    // Hard-split any single line that exceeds maxLength
    if (line.length > maxLength) {
      if (current) {
        chunks.push(current.trim());
        current = "";
      }
      let remaining = line;
      while (remaining.length > maxLength) {
        chunks.push(remaining.substring(0, maxLength));
        remaining = remaining.substring(maxLength);
      }
      if (remaining) current = remaining;
      continue;
    }

    if (current.length + line.length + 1 > maxLength) {
      if (current) chunks.push(current.trim());
      current = line;
    } else {
      current += (current ? "\n" : "") + line;
    }
  }
  if (current) chunks.push(current.trim());

  return chunks;
}

export function formatItemMessage(
  item: WorkItem,
  classification: ClassificationResult,
  artifact: string | null,
): string {
  const score = Math.round(classification.score * 100);
  const lines = [
    `🟢 <b>${escapeHtml(item.title)}</b> @ ${escapeHtml(item.company)}`,
    `🧠 Relevance: ${score}/100`,
  ];

  if (classification.rationale) {
    lines.push(`📊 ${escapeHtml(classification.rationale)}`);
  }
  if (classification.tags.length > 0) {
    lines.push(`✅ Match: ${escapeHtml(classification.tags.slice(0, 6).join(", "))}`);
  }
  if (item.url) {
    lines.push(`🔗 <a href="${safeHref(item.url)}">Open posting</a>`);
  }
  if (artifact) {
    lines.push("", "📝 <b>Cover note:</b>", escapeHtml(artifact));
  }

  return lines.join("\n");
}

export function decisionKeyboard(itemId: string): TelegramInlineButton[][] {
  return [
    [
      { text: "✅ Interested", callback_data: `accept_${itemId}` },
      { text: "❌ Not for me", callback_data: `reject_${itemId}` },
    ],
  ];
}

// Delivery

export class TelegramNotifier implements DeliveryNotifier {
  constructor(
    private readonly client: TelegramClient,
    private readonly record?: (record: NotificationRecord) => void,
  ) {}

  async notify(
    item: WorkItem,
    classification: ClassificationResult,
    artifact: string | null,
  ): Promise<boolean> {
    const message = formatItemMessage(item, classification, artifact);
    const chunks = splitMessage(message, MAX_MESSAGE_LENGTH);

    let lastResult: SendResult = { success: false, error: "nothing sent" };
    for (let i = 0; i < chunks.length; i++) {
      const isLast = i === chunks.length - 1;
      lastResult = await this.client.sendMessage(
        "job",
        chunks[i],
        isLast ? decisionKeyboard(item.id) : undefined,
      );
      if (!lastResult.success) break;
    }

    this.record?.({
      botType: "job",
      messageType: "item_delivery",
      itemId: item.id,
      messageText: message,
      telegramMessageId: lastResult.messageId?.toString() ?? null,
      success: lastResult.success,
      errorMessage: lastResult.error ?? null,
    });

    return lastResult.success;
  }
}

// System alerts

export async function sendSystemAlert(
  client: TelegramClient,
  message: string,
  record?: (record: NotificationRecord) => void,
): Promise<void> {
  const result = await client.sendMessage("log", message);
  record?.({
    botType: "log",
    messageType: "system_alert",
    itemId: null,
    messageText: message,
    telegramMessageId: result.messageId?.toString() ?? null,
    success: result.success,
    errorMessage: result.error ?? null,
  });
}
