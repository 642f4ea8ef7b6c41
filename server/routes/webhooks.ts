import { Router } from "express";
import { lookup, lookupRecord, orElse } from "../../src/runtime/path";
import type { AppConfig } from "../config";
import type { EventBus } from "../bus/event-bus";
import { asyncHandler } from "../middleware/error-handler";
import { validateBody, validateParams } from "../middleware/validate";
import { webhookLimiter } from "../middleware/rate-limit";
import {
  callbackIdParamsSchema,
  helpdeskWebhookSchema,
  vkCallbackSchema,
  wasenderUpsertDataSchema,
  wasenderWebhookSchema,
  webhookIdParamsSchema,
} from "../schemas/webhooks";
import { BadRequestError, ForbiddenError, ServiceUnavailableError } from "../utils/errors";
import { logInfo, logWarn } from "../utils/logger";

export interface WebhooksRouterDeps {
  config: AppConfig;
  bus: EventBus;
}

function inboxIdOf(conversation: Record<string, unknown>): number | undefined {
  const raw = orElse(lookup(conversation, ["inbox_id"]), undefined) ?? orElse(lookup(conversation, ["inbox", "id"]), undefined);
  if (typeof raw === "number" && Number.isInteger(raw)) {
    return raw;
  }
  if (typeof raw === "string" && /^\d+$/.test(raw.trim())) {
    return Number(raw.trim());
  }
  return undefined;
}

/**
 * Inbound webhooks: Wasender (WhatsApp), helpdesk and VK Callback API.
 * Each accepted event is published on the bus and awaited before answering.
 */
export function createWebhooksRouter({ config, bus }: WebhooksRouterDeps): Router {
  const router = Router();
  router.use(webhookLimiter);

  router.post(
    "/wasender/webhook/:webhookId",
    validateParams(webhookIdParamsSchema),
    validateBody(wasenderWebhookSchema),
    asyncHandler(async (req, res) => {
      const wasender = config.wasender;
      if (!wasender) {
        throw new ServiceUnavailableError("Wasender is not configured", "channel_not_configured");
      }
      if (req.params.webhookId !== wasender.webhookId) {
        throw new ForbiddenError("Invalid webhook ID");
      }
      if (req.header("X-Webhook-Signature") !== wasender.webhookSecret) {
        throw new ForbiddenError("Invalid X-Webhook-Signature");
      }

      const webhook = wasenderWebhookSchema.parse(req.body);
      logInfo("[http] Wasender webhook accepted", { event: webhook.event, requestId: req.id });

      if (webhook.event !== "messages.upsert") {
        logInfo("[wasender] Ignored event", { event: webhook.event });
        res.json({ status: "ok" });
        return;
      }

      const upsert = wasenderUpsertDataSchema.safeParse(webhook.data);
      if (!upsert.success) {
        throw new BadRequestError(
          `Invalid upsert format: ${upsert.error.errors.map((err) => `${err.path.join(".")}: ${err.message}`).join(", ")}`,
          "invalid_upsert"
        );
      }

      const message = upsert.data.messages;
      if (message.key.fromMe) {
        logInfo("[wasender] Own message echo skipped", { messageId: message.key.id });
      } else {
        await bus.publish("whatsapp.incoming", message);
      }
      res.json({ status: "ok" });
    })
  );

  router.post(
    "/helpdesk/webhook/:webhookId",
    validateParams(webhookIdParamsSchema),
    validateBody(helpdeskWebhookSchema),
    asyncHandler(async (req, res) => {
      const channel = config.helpdesk.channelByWebhookId.get(req.params.webhookId);
      if (!channel) {
        throw new ForbiddenError("Unknown webhook ID");
      }

      const body = helpdeskWebhookSchema.parse(req.body);
      const conversation = orElse(lookupRecord(body, ["conversation"]), {});

      // Webhooks are account-wide: only events of this channel's inbox go through
      const payloadInbox = inboxIdOf(conversation);
      const expectedInbox = config.helpdesk.inboxIdByChannel[channel];
      if (expectedInbox !== undefined && payloadInbox !== undefined && payloadInbox !== expectedInbox) {
        logInfo("[helpdesk] Event for another inbox ignored", { channel, payloadInbox, expectedInbox });
        res.json({ status: "received" });
        return;
      }

      const meta = orElse(lookupRecord(conversation, ["meta"]), {});
      const payload = { ...body, conversation: { ...conversation, meta: { ...meta, channel } } };
      const event = body.event;
      const messageType = body.message_type;
      logInfo("[http] Helpdesk webhook accepted", { event, messageType, channel, requestId: req.id });

      if (event === "message_created") {
        if (messageType === "outgoing") {
          await bus.publish("helpdesk.outgoing", payload);
        } else if (messageType === "incoming") {
          // Our own mirrored messages
          logInfo("[helpdesk] Incoming message acknowledged", { channel });
        } else {
          logWarn("[helpdesk] Unknown message type", { messageType });
        }
      } else {
        logInfo("[helpdesk] Ignored event", { event });
      }

      res.json({ status: "received" });
    })
  );

  router.post(
    "/vk/callback/:callbackId",
    validateParams(callbackIdParamsSchema),
    asyncHandler(async (req, res) => {
      const vk = config.vk;
      if (!vk) {
        throw new ServiceUnavailableError("VK adapter is not configured", "channel_not_configured");
      }
      if (req.params.callbackId !== vk.callbackId) {
        throw new ForbiddenError("Invalid callback ID");
      }

      const parsed = vkCallbackSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new BadRequestError("Invalid VK callback body", "validation_error");
      }
      const callback = parsed.data;
      logInfo("[vk] Event received", { type: callback.type, groupId: callback.group_id });

      if (callback.type === "confirmation") {
        if (callback.group_id !== vk.groupId) {
          throw new BadRequestError("Invalid group_id");
        }
        await bus.publish("vk.confirmation", { groupId: vk.groupId });
        res.type("text/plain").send(vk.confirmation);
        return;
      }

      if (callback.secret !== vk.secret) {
        throw new ForbiddenError("Invalid secret");
      }
      if (callback.group_id !== vk.groupId) {
        throw new BadRequestError("Invalid group_id");
      }

      if (callback.type === "message_new") {
        const message = orElse(lookupRecord(callback.object, ["message"]), {});
        await bus.publish("vk.incoming", { message, raw: callback });
      } else {
        // Acknowledge anyway so VK does not retry
        logInfo("[vk] Ignored event type", { type: callback.type });
      }

      res.type("text/plain").send("ok");
    })
  );

  return router;
}
