import { z } from "zod";
import { type AttributeMap, lookupText, isMissing } from "../runtime/path";

/**
 * Helpdesk entities and the store contracts the reconciliation engine works
 * against. Schemas are lenient: the helpdesk returns partial records in list
 * endpoints, and we only rely on the fields below.
 */

const numericId = z
  .union([z.number().int(), z.string().regex(/^\d+$/)])
  .transform((value) => Number(value));

const attributeMap = z
  .record(z.unknown())
  .nullish()
  .transform((value): AttributeMap => value ?? {});

export const contactInboxSchema = z.object({
  source_id: z.string().nullish(),
  inbox: z
    .object({
      id: numericId.nullish(),
    })
    .nullish(),
});

export const helpdeskContactSchema = z.object({
  id: numericId,
  name: z.string().nullish(),
  phone_number: z.string().nullish(),
  email: z.string().nullish(),
  identifier: z.string().nullish(),
  custom_attributes: attributeMap,
  additional_attributes: attributeMap,
  contact_inboxes: z
    .array(contactInboxSchema)
    .nullish()
    .transform((value) => value ?? []),
});

export const helpdeskConversationSchema = z
  .object({
    id: numericId,
    status: z.string().nullish(),
    inbox_id: numericId.nullish(),
  })
  .passthrough();

export type ContactInbox = z.infer<typeof contactInboxSchema>;
export type HelpdeskContact = z.infer<typeof helpdeskContactSchema>;
export type HelpdeskConversation = z.infer<typeof helpdeskConversationSchema>;

export type ConversationStatus = "open" | "pending" | "resolved" | "snoozed";

export const REUSABLE_CONVERSATION_STATUSES: ReadonlySet<string> = new Set<ConversationStatus>(["open", "pending"]);

export type MessageDirection = "incoming" | "outgoing";

export interface ContactFields {
  name?: string;
  phoneNumber?: string;
  email?: string;
  identifier?: string;
  customAttributes?: AttributeMap;
  additionalAttributes?: AttributeMap;
}

export interface NewConversation {
  inboxId: number;
  sourceId: string;
  contactId: number;
  customAttributes?: AttributeMap;
}

export interface AttachmentFile {
  path: string;
  contentType?: string;
}

export interface ContactStore {
  search(query: string): Promise<HelpdeskContact[]>;
  filterByAttributes(attributes: Record<string, string>): Promise<HelpdeskContact[]>;
  create(inboxId: number, fields: ContactFields): Promise<HelpdeskContact>;
  update(contactId: number, fields: ContactFields): Promise<HelpdeskContact | undefined>;
}

export interface ConversationStore {
  listByContact(contactId: number): Promise<HelpdeskConversation[]>;
  create(conversation: NewConversation): Promise<HelpdeskConversation>;
}

export interface MessageStore {
  create(conversationId: number, content: string, direction: MessageDirection): Promise<number>;
  createWithAttachment(
    conversationId: number,
    content: string,
    file: AttachmentFile,
    direction: MessageDirection
  ): Promise<number>;
}

export interface HelpdeskStores {
  contacts: ContactStore;
  conversations: ConversationStore;
  messages: MessageStore;
}

/**
 * Source id of the network thread a conversation is bound to.
 */
export function threadSourceId(conversation: HelpdeskConversation): string | undefined {
  const sourceId = lookupText(conversation, [
    "last_non_activity_message",
    "conversation",
    "contact_inbox",
    "source_id",
  ]);
  return isMissing(sourceId) ? undefined : sourceId;
}

export function sourceIdForInbox(contact: HelpdeskContact, inboxId: number): string | undefined {
  for (const contactInbox of contact.contact_inboxes) {
    if (contactInbox.inbox?.id === inboxId && contactInbox.source_id) {
      return contactInbox.source_id;
    }
  }
  return undefined;
}
