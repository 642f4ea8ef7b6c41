import { setImmediate as nextTick } from "timers/promises";
import type { WasenderMessage } from "../schemas/webhooks";
import { logError } from "../utils/logger";

/**
 * Message observed on the personal-account messaging network, already
 * normalized by the transport adapter.
 */
export interface TelegramPeerMessage {
  peerId: string;
  text: string;
  username?: string;
  name?: string;
  attachmentPath?: string;
  attachmentContentType?: string;
}

export interface VkIncomingEvent {
  message: Record<string, unknown>;
  raw: Record<string, unknown>;
}

export interface BusEvents {
  "whatsapp.incoming": WasenderMessage;
  "telegram.incoming": TelegramPeerMessage;
  "telegram.outgoing": TelegramPeerMessage;
  "vk.incoming": VkIncomingEvent;
  "vk.confirmation": { groupId: number };
  "helpdesk.outgoing": Record<string, unknown>;
}

export type BusTopic = keyof BusEvents;

export type BusHandler<K extends BusTopic> = (payload: BusEvents[K]) => Promise<void> | void;

type HandlerTable = { [K in BusTopic]?: Array<BusHandler<K>> };

/**
 * In-process publish/subscribe
 *
 * Every handler runs as its own task on a later turn of the event loop,
 * inside its own error boundary. A failing handler is logged and does not
 * affect the other handlers of the same event.
 */
export class EventBus {
  private readonly handlers: HandlerTable = {};

  subscribe<K extends BusTopic>(topic: K, handler: BusHandler<K>): () => void {
    const handlers: { [P in K]?: Array<BusHandler<P>> } = this.handlers;
    const list: Array<BusHandler<K>> = handlers[topic] ?? [];
    list.push(handler);
    handlers[topic] = list;
    return () => {
      const index = list.indexOf(handler);
      if (index >= 0) {
        list.splice(index, 1);
      }
    };
  }

  /**
   * Schedule every handler of `topic`. Settles once all of them settled;
   * never rejects.
   */
  async publish<K extends BusTopic>(topic: K, payload: BusEvents[K]): Promise<void> {
    const list: Array<BusHandler<K>> = [...(this.handlers[topic] ?? [])];
    await Promise.all(list.map((handler) => this.runTask(topic, handler, payload)));
  }

  listenerCount(topic: BusTopic): number {
    return this.handlers[topic]?.length ?? 0;
  }

  private async runTask<K extends BusTopic>(topic: K, handler: BusHandler<K>, payload: BusEvents[K]): Promise<void> {
    await nextTick();
    try {
      await handler(payload);
    } catch (error) {
      logError(`[bus] Handler for ${topic} failed`, error, { topic });
    }
  }
}
