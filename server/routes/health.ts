import { Router } from "express";
import type { AppConfig } from "../config";
import type { ChannelRegistry } from "../../src/domain/channels";

/**
 * Non-sensitive status: no tokens, secrets or webhook ids.
 */
export function createHealthRouter(config: AppConfig, senders: ChannelRegistry): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({
      ok: true,
      helpdesk: {
        account_id: config.helpdesk.accountId,
        base_url: config.helpdesk.baseUrl,
        channels_configured: [...new Set(config.helpdesk.channelByWebhookId.values())],
      },
      senders: [...senders.keys()],
      wasender: { enabled: Boolean(config.wasender) },
      telegram: {
        enabled: Boolean(config.telegram),
        inbox_id: config.telegram?.inboxId ?? null,
        sender_registered: senders.has("telegram"),
      },
      vk: {
        enabled: Boolean(config.vk),
        group_id: config.vk?.groupId ?? null,
      },
      dispatch: { enabled: Boolean(config.dispatchApiToken) },
    });
  });

  return router;
}
