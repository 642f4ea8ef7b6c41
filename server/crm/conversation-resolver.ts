import type { AttributeMap } from "../../src/runtime/path";
import {
  type ConversationStore,
  type HelpdeskConversation,
  REUSABLE_CONVERSATION_STATUSES,
  threadSourceId,
} from "../../src/domain/helpdesk";
import { KeyedMutex } from "../../src/runtime/keyed-mutex";
import { logDebug, logInfo } from "../utils/logger";

export interface EnsureConversationInput {
  inboxId: number;
  contactId: number;
  sourceId: string;
  customAttributes?: AttributeMap;
}

export function isReusable(conversation: HelpdeskConversation, sourceId: string): boolean {
  return (
    typeof conversation.status === "string" &&
    REUSABLE_CONVERSATION_STATUSES.has(conversation.status) &&
    threadSourceId(conversation) === sourceId
  );
}

/**
 * Conversation Resolver
 *
 * Reuses the contact's open or pending conversation for the thread, or opens
 * a new one. Resolved conversations are left alone. Calls for the same
 * (inbox, contact, source id) are serialized within the process.
 */
export class ConversationResolver {
  private readonly locks = new KeyedMutex();

  constructor(private readonly conversations: ConversationStore) {}

  ensureConversation(input: EnsureConversationInput): Promise<number> {
    const key = `${input.inboxId}:${input.contactId}:${input.sourceId}`;
    return this.locks.runExclusive(key, () => this.findOrCreate(input));
  }

  private async findOrCreate(input: EnsureConversationInput): Promise<number> {
    const existing = await this.conversations.listByContact(input.contactId);
    const reusable = existing.find((conversation) => isReusable(conversation, input.sourceId));
    if (reusable) {
      logDebug("[conversation] Reusing conversation", { conversationId: reusable.id, sourceId: input.sourceId });
      return reusable.id;
    }

    const created = await this.conversations.create({
      inboxId: input.inboxId,
      sourceId: input.sourceId,
      contactId: input.contactId,
      customAttributes: input.customAttributes,
    });
    logInfo("[conversation] Conversation created", {
      conversationId: created.id,
      contactId: input.contactId,
      inboxId: input.inboxId,
    });
    return created.id;
  }
}
