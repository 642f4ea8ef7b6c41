import type {
  AttachmentFile,
  ContactFields,
  ContactStore,
  ConversationStore,
  HelpdeskContact,
  HelpdeskConversation,
  HelpdeskStores,
  MessageDirection,
  MessageStore,
  NewConversation,
} from '../../src/domain/helpdesk';

export interface StoredMessage {
  id: number;
  conversationId: number;
  content: string;
  direction: MessageDirection;
  attachment?: AttachmentFile;
}

export interface ContactUpdate {
  contactId: number;
  fields: ContactFields;
}

/**
 * In-process helpdesk: the three stores over plain arrays. Search is a
 * case-insensitive substring match like the real one; new contacts get a
 * contact inbox whose source id is `source-<contactId>`.
 */
export class InMemoryHelpdesk implements HelpdeskStores {
  readonly contacts: ContactStore;
  readonly conversations: ConversationStore;
  readonly messages: MessageStore;

  readonly contactRecords: HelpdeskContact[] = [];
  readonly conversationRecords: HelpdeskConversation[] = [];
  readonly messageRecords: StoredMessage[] = [];
  readonly contactUpdates: ContactUpdate[] = [];

  private nextId = 100;

  constructor() {
    this.contacts = {
      search: async (query) => this.searchContacts(query),
      filterByAttributes: async (attributes) =>
        this.contactRecords.filter((contact) =>
          Object.entries(attributes).every(([key, value]) => String(contact.custom_attributes[key]) === value)
        ),
      create: async (inboxId, fields) => this.createContact(inboxId, fields),
      update: async (contactId, fields) => this.updateContact(contactId, fields),
    };
    this.conversations = {
      listByContact: async (contactId) =>
        this.conversationRecords.filter((conversation) => conversation.contact_id === contactId),
      create: async (conversation) => this.createConversation(conversation),
    };
    this.messages = {
      create: async (conversationId, content, direction) => this.storeMessage(conversationId, content, direction),
      createWithAttachment: async (conversationId, content, file, direction) =>
        this.storeMessage(conversationId, content, direction, file),
    };
  }

  addContact(contact: Partial<HelpdeskContact> & { id: number }): HelpdeskContact {
    const stored: HelpdeskContact = {
      name: null,
      phone_number: null,
      email: null,
      identifier: null,
      custom_attributes: {},
      additional_attributes: {},
      contact_inboxes: [],
      ...contact,
    };
    this.contactRecords.push(stored);
    return stored;
  }

  addConversation(fields: { id: number; contactId: number; inboxId: number; sourceId: string; status: string }) {
    const conversation: HelpdeskConversation = {
      id: fields.id,
      status: fields.status,
      inbox_id: fields.inboxId,
      contact_id: fields.contactId,
      last_non_activity_message: {
        conversation: { contact_inbox: { source_id: fields.sourceId } },
      },
    };
    this.conversationRecords.push(conversation);
    return conversation;
  }

  messagesIn(conversationId: number): StoredMessage[] {
    return this.messageRecords.filter((message) => message.conversationId === conversationId);
  }

  private allocateId(): number {
    this.nextId += 1;
    return this.nextId;
  }

  private searchContacts(query: string): HelpdeskContact[] {
    const needle = query.toLowerCase();
    return this.contactRecords.filter((contact) =>
      [contact.name, contact.identifier, contact.email, contact.phone_number].some(
        (value) => typeof value === 'string' && value.toLowerCase().includes(needle)
      )
    );
  }

  private createContact(inboxId: number, fields: ContactFields): HelpdeskContact {
    const id = this.allocateId();
    return this.addContact({
      id,
      name: fields.name ?? null,
      phone_number: fields.phoneNumber ? `+${fields.phoneNumber.replace(/^\+/, '')}` : null,
      email: fields.email ?? null,
      identifier: fields.identifier ?? null,
      custom_attributes: { ...(fields.customAttributes ?? {}) },
      additional_attributes: { ...(fields.additionalAttributes ?? {}) },
      contact_inboxes: [{ source_id: `source-${id}`, inbox: { id: inboxId } }],
    });
  }

  private updateContact(contactId: number, fields: ContactFields): HelpdeskContact | undefined {
    this.contactUpdates.push({ contactId, fields });
    const contact = this.contactRecords.find((candidate) => candidate.id === contactId);
    if (!contact) {
      return undefined;
    }
    if (fields.name !== undefined) contact.name = fields.name;
    if (fields.identifier !== undefined) contact.identifier = fields.identifier;
    if (fields.customAttributes) {
      contact.custom_attributes = { ...contact.custom_attributes, ...fields.customAttributes };
    }
    if (fields.additionalAttributes) {
      contact.additional_attributes = { ...contact.additional_attributes, ...fields.additionalAttributes };
    }
    return contact;
  }

  private createConversation(conversation: NewConversation): HelpdeskConversation {
    return this.addConversation({
      id: this.allocateId(),
      contactId: conversation.contactId,
      inboxId: conversation.inboxId,
      sourceId: conversation.sourceId,
      status: 'open',
    });
  }

  private storeMessage(
    conversationId: number,
    content: string,
    direction: MessageDirection,
    attachment?: AttachmentFile
  ): number {
    const id = this.allocateId();
    this.messageRecords.push({ id, conversationId, content, direction, attachment });
    return id;
  }
}
