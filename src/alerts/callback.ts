import { logger } from "../logger";
import { IllegalTransitionError, errorMessage } from "../errors";
import { escapeHtml } from "./index";
import type { TelegramClient } from "./index";
import type { DeliveryService } from "../delivery";
import type { UserDecision } from "../types";

export interface CallbackQuery {
  id: string;
  fromName: string;
  data: string;
  message?: { messageId: number; chatId: number };
}

export interface CallbackResult {
  success: boolean;
  action?: UserDecision;
  itemId?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Extracts the callback query from a raw Telegram update, if any. */
export function parseCallbackUpdate(update: unknown): CallbackQuery | null {
  if (!isRecord(update) || !isRecord(update.callback_query)) return null;
  const query = update.callback_query;
  if (typeof query.id !== "string" || typeof query.data !== "string") return null;

  const fromName =
    isRecord(query.from) && typeof query.from.first_name === "string"
      ? query.from.first_name
      : "unknown";

  let message: CallbackQuery["message"];
  if (
    isRecord(query.message) &&
    typeof query.message.message_id === "number" &&
    isRecord(query.message.chat) &&
    typeof query.message.chat.id === "number"
  ) {
    message = {
      messageId: query.message.message_id,
      chatId: query.message.chat.id,
    };
  }

  return { id: query.id, fromName, data: query.data, message };
}

/** "accept_<id>" / "reject_<id>" */
export function parseCallbackData(
  data: string,
): { action: UserDecision; itemId: string } | null {
  const separator = data.indexOf("_");
  if (separator < 1) return null;

  const verb = data.slice(0, separator);
  const itemId = data.slice(separator + 1);
  if (!itemId) return null;

  if (verb === "accept") return { action: "accepted", itemId };
  if (verb === "reject") return { action: "rejected", itemId };
  return null;
}

export async function handleCallbackQuery(
  update: unknown,
  deps: { client: TelegramClient; delivery: DeliveryService },
): Promise<CallbackResult> {
  const query = parseCallbackUpdate(update);
  if (!query) {
    return { success: false };
  }

  logger.info(`Telegram callback: ${query.data} from ${query.fromName}`);

  const parsed = parseCallbackData(query.data);
  if (!parsed) {
    logger.error(`Invalid callback data: ${query.data}`);
    await deps.client.answerCallback(query.id, "Unknown action");
    return { success: false };
  }

  const { action, itemId } = parsed;
  try {
    const item = await deps.delivery.recordUserDecision(itemId, action);
    if (!item) {
      await deps.client.answerCallback(query.id, "⚠️ Posting not found");
      return { success: false, itemId };
    }

    const label = action === "accepted" ? "✅ INTERESTED" : "❌ NOT FOR ME";
    await deps.client.answerCallback(query.id, `${label}: ${item.title}`);
    if (query.message) {
      await deps.client.editMessage(
        query.message.chatId,
        query.message.messageId,
        `${label} — ${escapeHtml(item.title)} @ ${escapeHtml(item.company)}`,
      );
    }
    return { success: true, action, itemId };
  } catch (error) {
    if (error instanceof IllegalTransitionError) {
      await deps.client.answerCallback(query.id, "Already handled");
      return { success: false, itemId };
    }
    logger.error(`Callback handling failed: ${errorMessage(error)}`);
    await deps.client.answerCallback(query.id, "⚠️ Error processing");
    return { success: false, itemId };
  }
}
