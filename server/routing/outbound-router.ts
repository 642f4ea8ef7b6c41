import { setTimeout as delay } from "timers/promises";
import { isMissing, lookupText } from "../../src/runtime/path";
import { type MediaContent, type MediaType, mediaContent, textContent } from "../../src/domain/content";
import { type ChannelRegistry, type ChannelSender, type ChannelTag, isChannelTag } from "../../src/domain/channels";
import { type HelpdeskAttachment, extractAttachments, helpdeskMessageEventSchema } from "./helpdesk-event";
import { deriveRecipient } from "./recipient";
import type { EventBus } from "../bus/event-bus";
import { AppError, BadRequestError, DispatchError, errorMessage } from "../utils/errors";
import { logError, logInfo, logWarn } from "../utils/logger";

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set(["ogg", "oga", "m4a", "mp3", "opus", "wav"]);
export const AUDIO_FILE_TYPES: ReadonlySet<string> = new Set(["audio", "voice"]);

interface PriorityMedia {
  mediaType: MediaType;
  matches(attachment: HelpdeskAttachment): boolean;
}

export function isAudioAttachment(attachment: HelpdeskAttachment): boolean {
  const fileType = (attachment.file_type ?? "").toLowerCase();
  const extension = (attachment.extension ?? "").replace(/^\.+/, "").toLowerCase();
  return AUDIO_FILE_TYPES.has(fileType) || AUDIO_EXTENSIONS.has(extension);
}

/**
 * Networks that get one attachment class forwarded as media alongside the
 * text. Other attachments are not forwarded.
 */
const PRIORITY_MEDIA: Partial<Record<ChannelTag, PriorityMedia>> = {
  telegram: { mediaType: "audio", matches: isAudioAttachment },
};

const SESSION_INVALIDATED_MARKERS = ["authorization has been invalidated", "terminating all sessions"];

export interface DirectDispatchRequest {
  channel: string;
  recipientId: string;
  text: string;
  typingSeconds: number;
  accessHash?: string;
}

export interface OutboundRouterOptions {
  senders: ChannelRegistry;
  helpdeskBaseUrl: string;
  bus?: EventBus;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Outbound Router
 *
 * Routes agent replies from the helpdesk to the network the conversation
 * belongs to. Delivery failures are logged here and never reach the caller;
 * only manual dispatch reports them.
 */
export class OutboundRouter {
  private readonly senders: ChannelRegistry;
  private readonly helpdeskBaseUrl: string;
  private readonly bus?: EventBus;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: OutboundRouterOptions) {
    this.senders = options.senders;
    this.helpdeskBaseUrl = options.helpdeskBaseUrl.replace(/\/+$/, "");
    this.bus = options.bus;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  async handleOutgoing(payload: unknown): Promise<void> {
    const parsed = helpdeskMessageEventSchema.safeParse(payload);
    if (!parsed.success) {
      logWarn("[router] Invalid helpdesk payload", { issues: parsed.error.errors.map((issue) => issue.message) });
      return;
    }

    const event = parsed.data;
    if (event.event !== "message_created") {
      logInfo("[router] Ignored helpdesk event", { event: event.event });
      return;
    }
    if (event.private) {
      logInfo("[router] Ignored private message");
      return;
    }
    if (event.message_type !== "outgoing") {
      logInfo("[router] Ignored message type", { messageType: event.message_type });
      return;
    }

    const channelValue = lookupText(payload, ["conversation", "meta", "channel"]);
    const channel = isMissing(channelValue) ? undefined : channelValue;
    const recipientId = deriveRecipient(channel, payload);
    if (!channel || !recipientId) {
      logWarn("[router] Missing channel or recipient", { channel, recipientId });
      return;
    }

    const text = (event.content ?? "").trim();
    const attachments = extractAttachments(payload);
    if (!text && attachments.length === 0) {
      logWarn("[router] Nothing to send", { channel, recipientId });
      return;
    }

    const sender = this.senderFor(channel);
    if (!sender) {
      logWarn("[router] No sender for channel", { channel });
      return;
    }

    if (text) {
      await this.deliver(sender, recipientId, "text", () => sender.sendText(recipientId, textContent(text)));
    }

    const priority = PRIORITY_MEDIA[sender.channel];
    if (priority && attachments.length > 0) {
      const media = this.firstMatchingMedia(attachments, priority);
      if (media) {
        await this.deliver(sender, recipientId, "media", () => sender.sendMedia(recipientId, media));
      } else if (!text) {
        logWarn("[router] No text and no forwardable attachment", {
          channel,
          fileTypes: attachments.map((attachment) => attachment.file_type ?? null),
        });
      }
    }
  }

  /**
   * Send a text straight to a network user, outside any helpdesk event.
   * Failures are thrown to the caller.
   */
  async dispatchDirect(request: DirectDispatchRequest): Promise<void> {
    if (request.channel !== "telegram") {
      throw new BadRequestError("Direct dispatch is only available for telegram", "unsupported_channel");
    }
    const sender = this.senders.get("telegram");
    if (!sender) {
      throw new BadRequestError("Telegram is not configured", "channel_not_configured");
    }

    const { recipientId, accessHash } = request;

    if (request.typingSeconds > 0 && sender.setTyping) {
      try {
        await sender.setTyping(recipientId, { accessHash });
        await this.sleep(request.typingSeconds * 1000);
      } catch (error) {
        logWarn("[router] Typing indicator failed, sending anyway", { recipientId, error: errorMessage(error) });
      }
    }

    try {
      // The echo must reach the helpdesk through telegram.outgoing
      await sender.sendText(recipientId, textContent(request.text), { accessHash, suppressHelpdeskEcho: false });
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      logError("[router] Direct dispatch failed", error, { recipientId });
      throw new DispatchError(dispatchFailureMessage(error), { recipientId });
    }

    logInfo("[router] Direct dispatch sent", { recipientId, text: preview(request.text) });

    if (this.bus) {
      const peerId = recipientId.trim().replace(/^id:/, "").trim();
      await this.bus.publish("telegram.outgoing", { peerId, text: request.text });
    }
  }

  private senderFor(channel: string): ChannelSender | undefined {
    return isChannelTag(channel) ? this.senders.get(channel) : undefined;
  }

  private firstMatchingMedia(attachments: HelpdeskAttachment[], priority: PriorityMedia): MediaContent | undefined {
    for (const attachment of attachments) {
      const url = (attachment.data_url || attachment.file_url || "").trim();
      if (!url || !priority.matches(attachment)) {
        continue;
      }
      return mediaContent({
        mediaType: priority.mediaType,
        url: this.absoluteUrl(url),
        filename: attachment.filename ?? undefined,
        mimeType: attachment.content_type ?? undefined,
      });
    }
    return undefined;
  }

  private absoluteUrl(url: string): string {
    return url.startsWith("/") && this.helpdeskBaseUrl ? `${this.helpdeskBaseUrl}${url}` : url;
  }

  private async deliver(
    sender: ChannelSender,
    recipientId: string,
    kind: "text" | "media",
    send: () => Promise<void>
  ): Promise<void> {
    try {
      await send();
      logInfo("[router] Outbound delivered", { channel: sender.channel, recipientId, kind });
    } catch (error) {
      logError("[router] Outbound delivery failed", error, { channel: sender.channel, recipientId, kind });
    }
  }
}

function dispatchFailureMessage(error: unknown): string {
  const message = errorMessage(error);
  if (SESSION_INVALIDATED_MARKERS.some((marker) => message.includes(marker))) {
    return "Telegram session was invalidated (all sessions were terminated). Log in again, update the session and restart the gateway.";
  }
  return `Dispatch failed: ${message}`;
}

function preview(text: string): string {
  return text.length > 80 ? `${text.slice(0, 80)}...` : text;
}
