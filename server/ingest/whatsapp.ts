import { isMissing, lookupText, orElse } from "../../src/runtime/path";
import type { IngestInput } from "../crm/helpdesk-service";
import type { WasenderMessage } from "../schemas/webhooks";
import { type IngestContext, inboxFor } from "./context";
import { logError, logInfo } from "../utils/logger";

/**
 * Text of a Wasender message: plain conversation text, else the extended
 * text (replies, links).
 */
export function wasenderText(message: WasenderMessage): string {
  const plain = lookupText(message, ["message", "conversation"]);
  if (!isMissing(plain)) {
    return plain;
  }
  return orElse(lookupText(message, ["message", "extendedTextMessage", "text"]), "");
}

/**
 * Helpdesk write for one WhatsApp message, or undefined when it carries no
 * sender. Media without a caption yields empty content.
 */
export function whatsappIngestInput(message: WasenderMessage, inboxId: number): IngestInput | undefined {
  const remote = message.key.remoteJid?.trim() || message.key.participant?.trim() || "";
  const msisdn = remote.split("@")[0];
  const text = wasenderText(message);
  if (!msisdn) {
    return undefined;
  }

  return {
    contact: {
      inboxId,
      searchKey: msisdn,
      name: message.pushName?.trim() || msisdn,
      phone: msisdn,
      customAttributes: { wa_remote_jid: remote },
    },
    content: text,
    direction: "incoming",
  };
}

export async function ingestWhatsapp(context: IngestContext, message: WasenderMessage): Promise<void> {
  try {
    const input = whatsappIngestInput(message, inboxFor(context.inboxes, "whatsapp"));
    if (!input) {
      logInfo("[ingest] whatsapp message without sender skipped", { messageId: message.key.id });
      return;
    }
    const result = await context.helpdesk.ingest(input);
    logInfo("[ingest] whatsapp -> helpdesk", { conversationId: result.conversationId, inboxId: input.contact.inboxId });
  } catch (error) {
    logError("[ingest] whatsapp ingestion failed", error, { messageId: message.key.id });
  }
}
