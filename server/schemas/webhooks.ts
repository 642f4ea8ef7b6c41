import { z } from "zod";
import { logWarn } from "../utils/logger";

const integerId = z.union([
  z.number().int(),
  z
    .string()
    .regex(/^-?\d+$/)
    .transform((value) => Number(value)),
]);

/**
 * Wasender Schemas
 */
export const wasenderMessageSchema = z
  .object({
    key: z
      .object({
        id: z.string().nullish(),
        remoteJid: z.string().nullish(),
        participant: z.string().nullish(),
        fromMe: z.boolean(),
      })
      .passthrough(),
    message: z.record(z.unknown()).nullish(),
    pushName: z.string().nullish(),
  })
  .passthrough();

export const wasenderWebhookSchema = z
  .object({
    event: z.string().min(1, "event is required"),
    data: z.unknown().optional(),
  })
  .passthrough();

export const wasenderUpsertDataSchema = z.object({
  messages: wasenderMessageSchema,
});

export type WasenderMessage = z.infer<typeof wasenderMessageSchema>;
export type WasenderWebhook = z.infer<typeof wasenderWebhookSchema>;

/**
 * Helpdesk Schemas
 * The outgoing-message shape itself is checked by the router; here the body
 * only has to be a JSON object.
 */
export const helpdeskWebhookSchema = z.record(z.unknown());

/**
 * VK Callback API Schemas
 */
export const vkCallbackSchema = z
  .object({
    type: z.string().min(1, "type is required"),
    group_id: integerId.optional(),
    secret: z.string().optional(),
    object: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type VkCallback = z.infer<typeof vkCallbackSchema>;

/**
 * Manual dispatch
 */
/**
 * Telegram access hashes are signed 64-bit integers. JSON numbers beyond
 * 2^53 arrive already rounded, so those are dropped; clients send large
 * hashes as decimal strings.
 */
function toAccessHash(value: unknown): string | undefined {
  if (typeof value === "number" && Number.isSafeInteger(value)) {
    return String(value);
  }
  if (typeof value === "number" && Number.isInteger(value)) {
    logWarn("[dispatch] access_hash beyond safe integer range ignored, send it as a string", { value });
    return undefined;
  }
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return value.trim();
  }
  return undefined;
}

export const dispatchSchema = z.object({
  recipient_id: z
    .union([z.string(), z.number()])
    .transform((value) => String(value).trim())
    .pipe(z.string().min(1, "recipient_id is required")),
  text: z.string().trim().min(1, "text is required"),
  typing_seconds: z.number().min(0).max(60).default(2),
  access_hash: z.unknown().transform(toAccessHash),
});

export type DispatchBody = z.infer<typeof dispatchSchema>;

export const webhookIdParamsSchema = z.object({
  webhookId: z.string().min(1).max(255),
});

export const callbackIdParamsSchema = z.object({
  callbackId: z.string().min(1).max(255),
});
