import axios, { type AxiosInstance } from "axios";
import { randomInt } from "crypto";
import type { ChannelSender } from "../../src/domain/channels";
import type { Content, MediaContent, TextContent } from "../../src/domain/content";
import { asText, isMissing, isRecord, lookup, lookupArray, lookupText } from "../../src/runtime/path";
import { ChannelApiError, errorMessage } from "../utils/errors";
import { logDebug, logWarn } from "../utils/logger";

export interface VkApiOptions {
  apiBaseUrl: string;
  accessToken: string;
  apiVersion: string;
  timeoutMs?: number;
}

export interface VkSenderOptions extends VkApiOptions {
  inboxId: number;
}

/**
 * Profile fields used to enrich VK contacts
 */
export interface VkProfile {
  firstName?: string;
  lastName?: string;
  screenName?: string;
  bdate?: string;
  city?: string;
}

function createVkHttp(options: VkApiOptions): AxiosInstance {
  return axios.create({
    baseURL: options.apiBaseUrl.replace(/\/+$/, ""),
    timeout: options.timeoutMs ?? 10_000,
  });
}

/**
 * VK answers HTTP 200 with an `error` object on failure.
 */
function vkError(method: string, body: unknown): ChannelApiError | undefined {
  const error = lookup(body, ["error"]);
  if (!isRecord(error)) {
    return undefined;
  }
  const code = lookup(error, ["error_code"]);
  const message = lookupText(error, ["error_msg"]);
  return new ChannelApiError(`VK ${method} failed: ${isMissing(message) ? "unknown error" : message}`, {
    channel: "vk",
    code: isMissing(code) ? undefined : code,
  });
}

/**
 * `messages.send` parameters for each content variant. VK has no native
 * media-by-URL, so media goes out as a link under the caption.
 */
export function vkMessageParams(content: Content): Record<string, string> {
  switch (content.type) {
    case "text":
      return { message: content.text };
    case "media":
      return { message: content.caption ? `${content.caption}\n${content.url}` : content.url };
    case "sticker":
      return /^\d+$/.test(content.ref) ? { sticker_id: content.ref } : { message: content.ref };
    case "contact":
      return { message: [content.name, content.phone, content.org].filter(Boolean).join("\n") };
    case "location": {
      const params: Record<string, string> = {
        lat: String(content.latitude),
        long: String(content.longitude),
      };
      if (content.name) {
        params.message = content.name;
      }
      return params;
    }
  }
}

/**
 * VK community sender (`messages.send`)
 */
export class VkSender implements ChannelSender {
  readonly channel = "vk";
  readonly inboxId: number;
  private readonly http: AxiosInstance;
  private readonly accessToken: string;
  private readonly apiVersion: string;

  constructor(options: VkSenderOptions) {
    this.inboxId = options.inboxId;
    this.accessToken = options.accessToken;
    this.apiVersion = options.apiVersion;
    this.http = createVkHttp(options);
  }

  sendText(recipientId: string, content: TextContent): Promise<void> {
    return this.send(recipientId, content);
  }

  sendMedia(recipientId: string, media: MediaContent): Promise<void> {
    return this.send(recipientId, media);
  }

  async send(peerId: string, content: Content): Promise<void> {
    const params = new URLSearchParams({
      peer_id: peerId,
      random_id: String(randomInt(1, 2 ** 31 - 1)),
      access_token: this.accessToken,
      v: this.apiVersion,
      ...vkMessageParams(content),
    });

    let body: unknown;
    try {
      const response = await this.http.post<unknown>("/messages.send", params);
      body = response.data;
    } catch (error) {
      throw new ChannelApiError(`VK messages.send failed: ${errorMessage(error)}`, { channel: this.channel });
    }

    const failure = vkError("messages.send", body);
    if (failure) {
      throw failure;
    }
    logDebug("[vk] Message sent", { peerId, type: content.type });
  }
}

/**
 * Fetch name, birth date and city of a VK user. Any failure yields an empty
 * profile.
 */
export async function fetchVkProfile(options: VkApiOptions, userId: string): Promise<VkProfile> {
  try {
    const response = await createVkHttp(options).get<unknown>("/users.get", {
      params: {
        user_ids: userId,
        fields: "bdate,city,screen_name",
        access_token: options.accessToken,
        v: options.apiVersion,
      },
    });
    const failure = vkError("users.get", response.data);
    if (failure) {
      throw failure;
    }

    const users = lookupArray(response.data, ["response"]);
    const user = isMissing(users) ? undefined : users[0];
    if (!isRecord(user)) {
      return {};
    }

    const city = lookup(user, ["city"]);
    return {
      firstName: asText(user.first_name),
      lastName: asText(user.last_name),
      screenName: asText(user.screen_name),
      bdate: asText(user.bdate),
      city: isRecord(city) ? asText(city.title) : asText(city),
    };
  } catch (error) {
    logWarn("[vk] users.get failed", { userId, error: errorMessage(error) });
    return {};
  }
}

/**
 * Display name: "first last", else the screen name.
 */
export function vkDisplayName(profile: VkProfile): string | undefined {
  const fullName = [profile.firstName, profile.lastName].filter(Boolean).join(" ").trim();
  return fullName || profile.screenName;
}
