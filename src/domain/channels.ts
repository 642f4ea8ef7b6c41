import type { MediaContent, TextContent } from "./content";

export const CHANNEL_TAGS = ["whatsapp", "telegram", "vk"] as const;

export type ChannelTag = (typeof CHANNEL_TAGS)[number];

export function isChannelTag(value: unknown): value is ChannelTag {
  return typeof value === "string" && CHANNEL_TAGS.some((tag) => tag === value);
}

export interface SendTextOptions {
  /** Telegram access hash (decimal string), needed to reach users that never wrote to us. */
  accessHash?: string;
  /**
   * When false the channel adapter must not swallow the echo of this message,
   * so it still reaches the helpdesk through the normal ingestion path.
   */
  suppressHelpdeskEcho?: boolean;
}

export interface TypingOptions {
  accessHash?: string;
}

/**
 * Outbound capability of one chat network, bound to one helpdesk inbox.
 */
export interface ChannelSender {
  readonly channel: ChannelTag;
  readonly inboxId: number;
  sendText(recipientId: string, content: TextContent, options?: SendTextOptions): Promise<void>;
  sendMedia(recipientId: string, media: MediaContent): Promise<void>;
  setTyping?(recipientId: string, options?: TypingOptions): Promise<void>;
}

export type ChannelRegistry = ReadonlyMap<ChannelTag, ChannelSender>;

export function createChannelRegistry(senders: Iterable<ChannelSender>): ChannelRegistry {
  const registry = new Map<ChannelTag, ChannelSender>();
  for (const sender of senders) {
    if (registry.has(sender.channel)) {
      throw new Error(`Duplicate sender for channel ${sender.channel}`);
    }
    registry.set(sender.channel, sender);
  }
  return registry;
}
