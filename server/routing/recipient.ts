import { type PathKey, isMissing, lookupText } from "../../src/runtime/path";
import { type ChannelTag, isChannelTag } from "../../src/domain/channels";

interface RecipientSource {
  path: readonly PathKey[];
  prefix?: string;
}

/**
 * Where each network's recipient id lives on the helpdesk sender, in
 * priority order. Paths are relative to `conversation.meta.sender`.
 */
const RECIPIENT_SOURCES: Record<ChannelTag, readonly RecipientSource[]> = {
  whatsapp: [{ path: ["phone_number"] }],
  telegram: [
    { path: ["custom_attributes", "telegram_username"] },
    { path: ["additional_attributes", "social_telegram_user_name"] },
    { path: ["phone_number"] },
    { path: ["custom_attributes", "telegram_user_id"], prefix: "id:" },
    { path: ["additional_attributes", "social_telegram_user_id"], prefix: "id:" },
  ],
  vk: [{ path: ["custom_attributes", "vk_peer_id"] }, { path: ["custom_attributes", "vk_user_id"] }],
};

/**
 * Network recipient for an outgoing helpdesk event. Never reads a recipient
 * field from the helpdesk; it is always rebuilt from the sender's attributes.
 */
export function deriveRecipient(channel: string | undefined, event: unknown): string | undefined {
  if (!isChannelTag(channel)) {
    return undefined;
  }

  for (const source of RECIPIENT_SOURCES[channel]) {
    const value = lookupText(event, ["conversation", "meta", "sender", ...source.path]);
    if (!isMissing(value)) {
      return `${source.prefix ?? ""}${value}`;
    }
  }
  return undefined;
}
