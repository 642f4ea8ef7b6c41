import axios, { type AxiosInstance } from "axios";
import type { ChannelSender } from "../../src/domain/channels";
import type { Content, MediaContent, MediaType, TextContent } from "../../src/domain/content";
import { lookup } from "../../src/runtime/path";
import { ChannelApiError } from "../utils/errors";
import { logDebug } from "../utils/logger";

export interface WasenderSenderOptions {
  apiBaseUrl: string;
  apiKey: string;
  inboxId: number;
  timeoutMs?: number;
}

const MEDIA_URL_FIELD: Record<MediaType, string> = {
  image: "imageUrl",
  video: "videoUrl",
  audio: "audioUrl",
  document: "documentUrl",
};

/**
 * Request body of `POST /api/send-message` for each content variant.
 */
export function wasenderPayload(to: string, content: Content): Record<string, unknown> {
  switch (content.type) {
    case "text":
      return { to, text: content.text };
    case "media": {
      const payload: Record<string, unknown> = { to, [MEDIA_URL_FIELD[content.mediaType]]: content.url };
      if (content.caption) {
        payload.text = content.caption;
      }
      if (content.mediaType === "document" && content.filename) {
        payload.fileName = content.filename;
      }
      return payload;
    }
    case "sticker":
      return { to, stickerUrl: content.ref };
    case "contact":
      return { to, contactCard: { name: content.name, phone: content.phone } };
    case "location":
      return {
        to,
        location: { latitude: content.latitude, longitude: content.longitude, name: content.name },
      };
  }
}

/**
 * WhatsApp sender backed by the Wasender HTTP API
 */
export class WasenderSender implements ChannelSender {
  readonly channel = "whatsapp";
  readonly inboxId: number;
  private readonly http: AxiosInstance;

  constructor(options: WasenderSenderOptions) {
    this.inboxId = options.inboxId;
    this.http = axios.create({
      baseURL: options.apiBaseUrl.replace(/\/+$/, ""),
      timeout: options.timeoutMs ?? 15_000,
      headers: { Authorization: `Bearer ${options.apiKey}` },
    });
  }

  sendText(recipientId: string, content: TextContent): Promise<void> {
    return this.send(recipientId, content);
  }

  sendMedia(recipientId: string, media: MediaContent): Promise<void> {
    return this.send(recipientId, media);
  }

  async send(recipientId: string, content: Content): Promise<void> {
    let body: unknown;
    try {
      const response = await this.http.post<unknown>("/api/send-message", wasenderPayload(recipientId, content));
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new ChannelApiError(`Wasender send failed: ${error.response?.status ?? error.code ?? "network"}`, {
          channel: this.channel,
          status: error.response?.status,
          response: error.response?.data,
        });
      }
      throw error;
    }

    if (lookup(body, ["success"]) === false) {
      throw new ChannelApiError("Wasender rejected the message", { channel: this.channel, response: body });
    }
    logDebug("[wasender] Message sent", { to: recipientId, type: content.type });
  }
}
