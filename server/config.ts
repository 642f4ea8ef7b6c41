import { z } from "zod";
import type { ChannelTag } from "../src/domain/channels";
import { ConfigurationError } from "./utils/errors";

/**
 * REQUEST_BODY_SIZE_LIMIT: maximum JSON body accepted on webhook routes.
 * Helpdesk payloads embed the whole conversation, so keep room above the
 * Express default of 100kb.
 */
export const REQUEST_BODY_SIZE_LIMIT = "10mb";

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const optionalInteger = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined)
  .pipe(z.coerce.number().int().optional());

/**
 * Environment schema. Channel blocks are all optional here; which of them
 * are enabled is decided in loadConfig.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),

  CHATWOOT_BASE_URL: z.string().url("CHATWOOT_BASE_URL must be a valid HTTP(S) URL"),
  CHATWOOT_ACCOUNT_ID: z.coerce.number().int().positive(),
  CHATWOOT_API_ACCESS_TOKEN: z.string().min(1, "CHATWOOT_API_ACCESS_TOKEN is required"),
  CHATWOOT_WEBHOOK_ID_WHATSAPP: optionalText,
  CHATWOOT_WEBHOOK_ID_TELEGRAM: optionalText,
  CHATWOOT_WEBHOOK_ID_VK: optionalText,

  WASENDER_WEBHOOK_ID: optionalText,
  WASENDER_WEBHOOK_SECRET: optionalText,
  WASENDER_API_KEY: optionalText,
  WASENDER_INBOX_ID: optionalInteger,
  WASENDER_API_BASE_URL: z.string().url().default("https://www.wasenderapi.com"),

  TG_INBOX_ID: optionalInteger,

  VK_CALLBACK_ID: optionalText,
  VK_GROUP_ID: optionalInteger,
  VK_ACCESS_TOKEN: optionalText,
  VK_SECRET: optionalText,
  VK_CONFIRMATION: optionalText,
  VK_API_VERSION: optionalText,
  VK_INBOX_ID: optionalInteger,
  VK_API_BASE_URL: z.string().url().default("https://api.vk.com/method"),

  DISPATCH_API_TOKEN: optionalText,
});

export type Env = z.infer<typeof envSchema>;

export interface HelpdeskConfig {
  baseUrl: string;
  accountId: number;
  apiAccessToken: string;
  channelByWebhookId: ReadonlyMap<string, ChannelTag>;
  inboxIdByChannel: Partial<Record<ChannelTag, number>>;
}

export interface WasenderConfig {
  webhookId: string;
  webhookSecret: string;
  apiKey: string;
  inboxId: number;
  apiBaseUrl: string;
}

/**
 * The Telegram session runs outside this service; only the helpdesk inbox
 * its messages belong to is configured here.
 */
export interface TelegramConfig {
  inboxId: number;
}

export interface VkConfig {
  callbackId: string;
  groupId: number;
  accessToken: string;
  secret: string;
  confirmation: string;
  apiVersion: string;
  inboxId: number;
  apiBaseUrl: string;
}

export interface AppConfig {
  env: Env["NODE_ENV"];
  port: number;
  helpdesk: HelpdeskConfig;
  wasender?: WasenderConfig;
  telegram?: TelegramConfig;
  vk?: VkConfig;
  /** Manual dispatch is disabled without it. */
  dispatchApiToken?: string;
}

function requireInbox(block: string, variable: string, value: number | undefined): number {
  if (value === undefined) {
    throw new ConfigurationError(`${variable} is required when ${block} is configured`, { variable });
  }
  return value;
}

function buildChannelMap(env: Env): Map<string, ChannelTag> {
  const mapping = new Map<string, ChannelTag>();
  if (env.CHATWOOT_WEBHOOK_ID_WHATSAPP) mapping.set(env.CHATWOOT_WEBHOOK_ID_WHATSAPP, "whatsapp");
  if (env.CHATWOOT_WEBHOOK_ID_TELEGRAM) mapping.set(env.CHATWOOT_WEBHOOK_ID_TELEGRAM, "telegram");
  if (env.CHATWOOT_WEBHOOK_ID_VK) mapping.set(env.CHATWOOT_WEBHOOK_ID_VK, "vk");
  return mapping;
}

/**
 * Build the typed configuration from environment variables.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const fields = parsed.error.errors.map((err) => `${err.path.join(".")}: ${err.message}`);
    throw new ConfigurationError(`Invalid configuration: ${fields.join("; ")}`, { fields });
  }
  const env = parsed.data;

  let wasender: WasenderConfig | undefined;
  if (env.WASENDER_WEBHOOK_ID && env.WASENDER_WEBHOOK_SECRET && env.WASENDER_API_KEY) {
    wasender = {
      webhookId: env.WASENDER_WEBHOOK_ID,
      webhookSecret: env.WASENDER_WEBHOOK_SECRET,
      apiKey: env.WASENDER_API_KEY,
      inboxId: requireInbox("Wasender", "WASENDER_INBOX_ID", env.WASENDER_INBOX_ID),
      apiBaseUrl: env.WASENDER_API_BASE_URL,
    };
  }

  let telegram: TelegramConfig | undefined;
  if (env.TG_INBOX_ID !== undefined) {
    telegram = { inboxId: env.TG_INBOX_ID };
  }

  let vk: VkConfig | undefined;
  if (
    env.VK_CALLBACK_ID &&
    env.VK_GROUP_ID !== undefined &&
    env.VK_ACCESS_TOKEN &&
    env.VK_SECRET &&
    env.VK_CONFIRMATION
  ) {
    vk = {
      callbackId: env.VK_CALLBACK_ID,
      groupId: env.VK_GROUP_ID,
      accessToken: env.VK_ACCESS_TOKEN,
      secret: env.VK_SECRET,
      confirmation: env.VK_CONFIRMATION,
      apiVersion: env.VK_API_VERSION ?? "5.199",
      inboxId: requireInbox("VK", "VK_INBOX_ID", env.VK_INBOX_ID),
      apiBaseUrl: env.VK_API_BASE_URL,
    };
  }

  const inboxIdByChannel: Partial<Record<ChannelTag, number>> = {};
  if (wasender) inboxIdByChannel.whatsapp = wasender.inboxId;
  if (telegram) inboxIdByChannel.telegram = telegram.inboxId;
  if (vk) inboxIdByChannel.vk = vk.inboxId;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    helpdesk: {
      baseUrl: env.CHATWOOT_BASE_URL.replace(/\/+$/, ""),
      accountId: env.CHATWOOT_ACCOUNT_ID,
      apiAccessToken: env.CHATWOOT_API_ACCESS_TOKEN,
      channelByWebhookId: buildChannelMap(env),
      inboxIdByChannel,
    },
    wasender,
    telegram,
    vk,
    dispatchApiToken: env.DISPATCH_API_TOKEN,
  };
}
