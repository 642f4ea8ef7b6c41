import type { AttributeMap } from "../../src/runtime/path";
import type { MessageDirection } from "../../src/domain/helpdesk";
import type { IngestInput } from "../crm/helpdesk-service";
import type { TelegramPeerMessage } from "../bus/event-bus";
import { type IngestContext, inboxFor } from "./context";
import { logError, logInfo } from "../utils/logger";

/**
 * Helpdesk write for a message exchanged with a Telegram peer. Incoming
 * messages come from the peer; outgoing ones were sent to it from the
 * account itself (manual dispatch or another device).
 */
export function telegramIngestInput(
  message: TelegramPeerMessage,
  inboxId: number,
  direction: MessageDirection
): IngestInput | undefined {
  const peerId = message.peerId.trim();
  const username = message.username?.trim() || undefined;
  const text = message.text.trim();
  const searchKey = username ?? peerId;
  if (!searchKey || (!text && !message.attachmentPath)) {
    return undefined;
  }

  const customAttributes: AttributeMap = {};
  if (peerId) {
    customAttributes.telegram_user_id = peerId;
  }
  if (username) {
    customAttributes.telegram_username = username;
  }

  return {
    contact: {
      inboxId,
      searchKey,
      name: message.name?.trim() || searchKey,
      customAttributes,
    },
    content: text,
    direction,
    attachment: message.attachmentPath
      ? { path: message.attachmentPath, contentType: message.attachmentContentType }
      : undefined,
  };
}

export async function ingestTelegram(
  context: IngestContext,
  message: TelegramPeerMessage,
  direction: MessageDirection
): Promise<void> {
  try {
    const input = telegramIngestInput(message, inboxFor(context.inboxes, "telegram"), direction);
    if (!input) {
      logInfo("[ingest] empty telegram message skipped", { peerId: message.peerId, direction });
      return;
    }
    const result = await context.helpdesk.ingest(input);
    logInfo("[ingest] telegram -> helpdesk", { conversationId: result.conversationId, direction });
  } catch (error) {
    logError("[ingest] telegram ingestion failed", error, { peerId: message.peerId, direction });
  }
}
