import { type AttributeMap, lookupText, orElse } from "../../src/runtime/path";
import type { IngestInput } from "../crm/helpdesk-service";
import type { VkIncomingEvent } from "../bus/event-bus";
import { type VkProfile, vkDisplayName } from "../services/vk";
import { type IngestContext, inboxFor } from "./context";
import { logError, logInfo } from "../utils/logger";

export type VkProfileLookup = (userId: string) => Promise<VkProfile>;

export interface VkIngestContext extends IngestContext {
  vkProfile?: VkProfileLookup;
}

/**
 * Helpdesk write for a VK `message_new`, enriched with the sender's profile.
 */
export function vkIngestInput(
  message: Record<string, unknown>,
  profile: VkProfile,
  inboxId: number
): IngestInput | undefined {
  const peerId = orElse(lookupText(message, ["peer_id"]), "");
  const fromId = orElse(lookupText(message, ["from_id"]), peerId);
  const text = orElse(lookupText(message, ["text"]), "");
  if (!fromId) {
    return undefined;
  }

  const customAttributes: AttributeMap = { vk_user_id: fromId, vk_peer_id: peerId };
  if (profile.bdate) {
    customAttributes.vk_bdate = profile.bdate;
  }
  const additionalAttributes: AttributeMap = {};
  if (profile.city) {
    additionalAttributes.city = profile.city;
  }

  return {
    contact: {
      inboxId,
      searchKey: fromId,
      name: vkDisplayName(profile) ?? fromId,
      customAttributes,
      additionalAttributes,
    },
    content: text,
    direction: "incoming",
  };
}

export async function ingestVk(context: VkIngestContext, event: VkIncomingEvent): Promise<void> {
  try {
    const inboxId = inboxFor(context.inboxes, "vk");
    const peerId = orElse(lookupText(event.message, ["peer_id"]), "");
    const fromId = orElse(lookupText(event.message, ["from_id"]), peerId);
    const profile = context.vkProfile && fromId ? await context.vkProfile(fromId) : {};

    const input = vkIngestInput(event.message, profile, inboxId);
    if (!input) {
      logInfo("[ingest] vk message without sender skipped", { peerId });
      return;
    }
    const result = await context.helpdesk.ingest(input);
    logInfo("[ingest] vk -> helpdesk", { conversationId: result.conversationId, inboxId });
  } catch (error) {
    logError("[ingest] vk ingestion failed", error);
  }
}
