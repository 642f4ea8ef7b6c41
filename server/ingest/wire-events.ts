import type { EventBus } from "../bus/event-bus";
import type { OutboundRouter } from "../routing/outbound-router";
import { ingestWhatsapp } from "./whatsapp";
import { ingestTelegram } from "./telegram";
import { type VkIngestContext, ingestVk } from "./vk";
import { logInfo } from "../utils/logger";

export interface WireEventsOptions extends VkIngestContext {
  router: OutboundRouter;
}

/**
 * Register the application handlers on the bus. Returns a function that
 * removes them again.
 */
export function wireEvents(bus: EventBus, options: WireEventsOptions): () => void {
  const { router, ...context } = options;

  const subscriptions = [
    bus.subscribe("whatsapp.incoming", (message) => ingestWhatsapp(context, message)),
    bus.subscribe("telegram.incoming", (message) => ingestTelegram(context, message, "incoming")),
    bus.subscribe("telegram.outgoing", (message) => ingestTelegram(context, message, "outgoing")),
    bus.subscribe("vk.incoming", (event) => ingestVk(context, event)),
    bus.subscribe("vk.confirmation", ({ groupId }) => {
      logInfo("[vk] Confirmation acknowledged", { groupId });
    }),
    bus.subscribe("helpdesk.outgoing", (payload) => router.handleOutgoing(payload)),
  ];

  return () => {
    for (const unsubscribe of subscriptions) {
      unsubscribe();
    }
  };
}
