import type { HelpdeskStores } from "../src/domain/helpdesk";
import { type ChannelRegistry, type ChannelSender, createChannelRegistry } from "../src/domain/channels";
import { ChatwootClient } from "../src/integrations/chatwoot";
import type { AppConfig } from "./config";
import { EventBus } from "./bus/event-bus";
import { HelpdeskService } from "./crm/helpdesk-service";
import { OutboundRouter } from "./routing/outbound-router";
import { wireEvents } from "./ingest/wire-events";
import type { VkProfileLookup } from "./ingest/vk";
import { WasenderSender } from "./services/wasender";
import { VkSender, fetchVkProfile } from "./services/vk";
import { ConfigurationError } from "./utils/errors";

export interface ServerContextOptions {
  /**
   * Senders living outside this process' HTTP stack, e.g. the Telegram
   * session. Each must report the inbox configured for its network.
   */
  extraSenders?: ChannelSender[];
  /** Replaces the Chatwoot client (tests). */
  stores?: HelpdeskStores;
  /** Replaces the VK `users.get` lookup (tests). */
  vkProfile?: VkProfileLookup;
}

export interface ServerContext {
  config: AppConfig;
  bus: EventBus;
  senders: ChannelRegistry;
  helpdesk: HelpdeskService;
  router: OutboundRouter;
  /** Detach the bus handlers. */
  dispose(): void;
}

function configuredSenders(config: AppConfig): ChannelSender[] {
  const senders: ChannelSender[] = [];
  if (config.wasender) {
    senders.push(
      new WasenderSender({
        apiBaseUrl: config.wasender.apiBaseUrl,
        apiKey: config.wasender.apiKey,
        inboxId: config.wasender.inboxId,
      })
    );
  }
  if (config.vk) {
    senders.push(new VkSender(config.vk));
  }
  return senders;
}

/**
 * Ingestion files messages under the configured inbox ids, so a sender
 * bound to another inbox would answer conversations it never received.
 */
export function assertSenderInboxes(config: AppConfig, senders: ChannelSender[]): void {
  for (const sender of senders) {
    const configured = config.helpdesk.inboxIdByChannel[sender.channel];
    if (configured === undefined) {
      throw new ConfigurationError(`Sender registered for ${sender.channel} but no inbox is configured for it`, {
        channel: sender.channel,
      });
    }
    if (sender.inboxId !== configured) {
      throw new ConfigurationError(`Sender for ${sender.channel} uses inbox ${sender.inboxId}, configured inbox is ${configured}`, {
        channel: sender.channel,
        senderInboxId: sender.inboxId,
        configuredInboxId: configured,
      });
    }
  }
}

/**
 * Build the service graph for a configuration: helpdesk client, channel
 * senders, bus and router, with the bus handlers wired.
 */
export function createServerContext(config: AppConfig, options: ServerContextOptions = {}): ServerContext {
  const stores =
    options.stores ??
    new ChatwootClient({
      baseUrl: config.helpdesk.baseUrl,
      accountId: config.helpdesk.accountId,
      apiAccessToken: config.helpdesk.apiAccessToken,
    });

  const allSenders = [...configuredSenders(config), ...(options.extraSenders ?? [])];
  assertSenderInboxes(config, allSenders);
  const senders = createChannelRegistry(allSenders);
  const bus = new EventBus();
  const helpdesk = new HelpdeskService(stores);
  const router = new OutboundRouter({ senders, helpdeskBaseUrl: config.helpdesk.baseUrl, bus });

  const vk = config.vk;
  const vkProfile = options.vkProfile ?? (vk ? (userId: string) => fetchVkProfile(vk, userId) : undefined);

  const dispose = wireEvents(bus, {
    helpdesk,
    inboxes: config.helpdesk.inboxIdByChannel,
    router,
    vkProfile,
  });

  return { config, bus, senders, helpdesk, router, dispose };
}
