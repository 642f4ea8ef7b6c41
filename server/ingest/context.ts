import type { ChannelTag } from "../../src/domain/channels";
import type { HelpdeskService } from "../crm/helpdesk-service";
import { ConfigurationError } from "../utils/errors";

export type InboxMap = Partial<Record<ChannelTag, number>>;

export interface IngestContext {
  helpdesk: HelpdeskService;
  inboxes: InboxMap;
}

/**
 * Helpdesk inbox bound to a network in the configuration.
 */
export function inboxFor(inboxes: InboxMap, channel: ChannelTag): number {
  const inboxId = inboxes[channel];
  if (inboxId === undefined) {
    throw new ConfigurationError(`No inbox configured for ${channel}`, { channel });
  }
  return inboxId;
}
