/**
 * Chatwoot API Client
 *
 * Account-scoped client for the Chatwoot REST API v1. Only the calls the
 * bridge needs are implemented. The client exposes them as the three helpdesk
 * stores (`contacts`, `conversations`, `messages`) consumed by the
 * reconciliation engine.
 */

import axios, { type AxiosInstance, type Method } from "axios";
import FormData from "form-data";
import fs from "fs";
import path from "path";
import {
  type AttachmentFile,
  type ContactFields,
  type ContactStore,
  type ConversationStore,
  type HelpdeskContact,
  type HelpdeskConversation,
  type HelpdeskStores,
  type MessageDirection,
  type MessageStore,
  type NewConversation,
  helpdeskContactSchema,
  helpdeskConversationSchema,
} from "../domain/helpdesk";
import { isMissing, isRecord, lookup, lookupArray, lookupRecord, orElse } from "../runtime/path";
import { HelpdeskApiError, errorMessage } from "../../server/utils/errors";
import { logDebug } from "../../server/utils/logger";

export interface ChatwootConfig {
  baseUrl: string;
  accountId: number;
  apiAccessToken: string;
  timeoutMs?: number;
  uploadTimeoutMs?: number;
}

interface RequestOptions {
  params?: Record<string, string>;
  data?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 15_000;
const DEFAULT_UPLOAD_TIMEOUT_MS = 30_000;

export class ChatwootClient implements HelpdeskStores {
  readonly contacts: ContactStore;
  readonly conversations: ConversationStore;
  readonly messages: MessageStore;

  private readonly http: AxiosInstance;
  private readonly uploadTimeoutMs: number;

  constructor(config: ChatwootConfig) {
    const baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.uploadTimeoutMs = config.uploadTimeoutMs ?? DEFAULT_UPLOAD_TIMEOUT_MS;
    this.http = axios.create({
      baseURL: `${baseUrl}/api/v1/accounts/${config.accountId}`,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      // Both headers, older instances only read the first one
      headers: {
        api_access_token: config.apiAccessToken,
        Authorization: `Bearer ${config.apiAccessToken}`,
      },
    });

    this.contacts = {
      search: (query) => this.searchContacts(query),
      filterByAttributes: (attributes) => this.filterContacts(attributes),
      create: (inboxId, fields) => this.createContact(inboxId, fields),
      update: (contactId, fields) => this.updateContact(contactId, fields),
    };
    this.conversations = {
      listByContact: (contactId) => this.listConversations(contactId),
      create: (conversation) => this.createConversation(conversation),
    };
    this.messages = {
      create: (conversationId, content, direction) => this.createMessage(conversationId, content, direction),
      createWithAttachment: (conversationId, content, file, direction) =>
        this.createMessageWithAttachment(conversationId, content, file, direction),
    };
  }

  /**
   * Search contacts by name, identifier, email or phone
   */
  async searchContacts(query: string): Promise<HelpdeskContact[]> {
    const body = await this.request("GET", "/contacts/search", { params: { q: query } });
    return parseContactList(body);
  }

  /**
   * Filter contacts by attribute equality. Keys are raw attribute keys
   * (e.g. "vk_user_id"), never prefixed.
   */
  async filterContacts(attributes: Record<string, string>): Promise<HelpdeskContact[]> {
    const entries = Object.entries(attributes);
    const payload = entries.map(([key, value], index) => ({
      attribute_key: key,
      filter_operator: "equal_to",
      values: [value],
      ...(index < entries.length - 1 ? { query_operator: "and" } : {}),
    }));
    const body = await this.request("POST", "/contacts/filter", { data: { payload } });
    return parseContactList(body);
  }

  /**
   * Create a contact in a specific inbox (the API requires inbox_id)
   */
  async createContact(inboxId: number, fields: ContactFields): Promise<HelpdeskContact> {
    const body = await this.request("POST", "/contacts", {
      data: { inbox_id: inboxId, ...contactPayload(fields) },
    });
    const contact = parseCreatedContact(body);
    if (!contact) {
      throw new HelpdeskApiError("Chatwoot create contact returned no contact", { inboxId });
    }
    return contact;
  }

  async updateContact(contactId: number, fields: ContactFields): Promise<HelpdeskContact | undefined> {
    const body = await this.request("PATCH", `/contacts/${contactId}`, { data: contactPayload(fields) });
    return parseContact(orElse(lookupRecord(body, ["payload"]), body));
  }

  async listConversations(contactId: number): Promise<HelpdeskConversation[]> {
    const body = await this.request("GET", `/contacts/${contactId}/conversations`);
    const list = lookupArray(body, ["payload"]);
    return isMissing(list) ? [] : parseEach(list, parseConversation);
  }

  /**
   * Create a conversation bound to source_id in the given inbox
   */
  async createConversation(conversation: NewConversation): Promise<HelpdeskConversation> {
    const data: Record<string, unknown> = {
      source_id: conversation.sourceId,
      inbox_id: conversation.inboxId,
      contact_id: conversation.contactId,
    };
    if (conversation.customAttributes && Object.keys(conversation.customAttributes).length > 0) {
      data.custom_attributes = conversation.customAttributes;
    }

    const body = await this.request("POST", "/conversations", { data });
    const created =
      parseConversation(body) ??
      parseConversation(lookup(body, ["payload", "conversation"])) ??
      parseConversation(lookup(body, ["payload"]));
    if (!created) {
      throw new HelpdeskApiError("Chatwoot create conversation returned no id", {
        inboxId: conversation.inboxId,
        contactId: conversation.contactId,
      });
    }
    return created;
  }

  async createMessage(conversationId: number, content: string, direction: MessageDirection): Promise<number> {
    const body = await this.request("POST", `/conversations/${conversationId}/messages`, {
      data: { content, message_type: direction },
    });
    return messageId(body, conversationId);
  }

  /**
   * Send a message with one file attachment (multipart/form-data)
   */
  async createMessageWithAttachment(
    conversationId: number,
    content: string,
    file: AttachmentFile,
    direction: MessageDirection
  ): Promise<number> {
    const stream = fs.createReadStream(file.path);
    const form = new FormData();
    form.append("content", content);
    form.append("message_type", direction);
    form.append("attachments[]", stream, {
      filename: path.basename(file.path),
      contentType: file.contentType ?? "application/octet-stream",
    });

    try {
      const body = await this.request("POST", `/conversations/${conversationId}/messages`, {
        data: form,
        headers: form.getHeaders(),
        timeoutMs: this.uploadTimeoutMs,
      });
      return messageId(body, conversationId);
    } finally {
      stream.destroy();
    }
  }

  private async request(method: Method, url: string, options: RequestOptions = {}): Promise<unknown> {
    logDebug(`[chatwoot] ${method} ${url}`);
    try {
      const response = await this.http.request<unknown>({
        method,
        url,
        params: options.params,
        data: options.data,
        headers: options.headers,
        timeout: options.timeoutMs,
      });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new HelpdeskApiError(`Chatwoot ${method} ${url} failed: ${status ?? error.code ?? "network"} ${error.message}`, {
          method,
          url,
          status,
          response: error.response?.data,
        });
      }
      throw new HelpdeskApiError(`Chatwoot ${method} ${url} failed: ${errorMessage(error)}`, { method, url });
    }
  }
}

function contactPayload(fields: ContactFields): Record<string, unknown> {
  const payload: Record<string, unknown> = {};
  if (fields.name !== undefined) payload.name = fields.name;
  if (fields.phoneNumber) {
    payload.phone_number = fields.phoneNumber.startsWith("+") ? fields.phoneNumber : `+${fields.phoneNumber}`;
  }
  if (fields.email !== undefined) payload.email = fields.email;
  if (fields.identifier) payload.identifier = fields.identifier;
  if (fields.customAttributes !== undefined) payload.custom_attributes = fields.customAttributes;
  if (fields.additionalAttributes !== undefined) payload.additional_attributes = fields.additionalAttributes;
  return payload;
}

function parseContact(value: unknown): HelpdeskContact | undefined {
  const parsed = helpdeskContactSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function parseConversation(value: unknown): HelpdeskConversation | undefined {
  const parsed = helpdeskConversationSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function parseEach<T>(items: unknown[], parse: (item: unknown) => T | undefined): T[] {
  const result: T[] = [];
  for (const item of items) {
    const parsed = parse(item);
    if (parsed) {
      result.push(parsed);
    } else {
      logDebug("[chatwoot] skipped malformed list item");
    }
  }
  return result;
}

/**
 * Search and filter answer `{ payload: [...] }`; some versions nest the list
 * under `payload.contacts` or `payload.payload`.
 */
function parseContactList(body: unknown): HelpdeskContact[] {
  for (const candidate of [["payload"], ["payload", "contacts"], ["payload", "payload"]]) {
    const list = lookupArray(body, candidate);
    if (!isMissing(list)) {
      return parseEach(list, parseContact);
    }
  }
  return [];
}

/**
 * Create answers `{ payload: { contact, contact_inbox } }`, older versions
 * `{ contact }` or the bare contact. A contact_inbox next to the contact is
 * folded into its inbox bindings.
 */
function parseCreatedContact(body: unknown): HelpdeskContact | undefined {
  const payload = orElse(lookupRecord(body, ["payload"]), undefined);
  const contact =
    parseContact(payload?.contact) ?? parseContact(lookup(body, ["contact"])) ?? parseContact(body);
  if (!contact) {
    return undefined;
  }

  const contactInbox = payload?.contact_inbox;
  if (contact.contact_inboxes.length === 0 && isRecord(contactInbox)) {
    const parsed = helpdeskContactSchema.shape.contact_inboxes.safeParse([contactInbox]);
    if (parsed.success) {
      return { ...contact, contact_inboxes: parsed.data };
    }
  }
  return contact;
}

function messageId(body: unknown, conversationId: number): number {
  for (const candidate of [["id"], ["payload", "id"]]) {
    const id = lookup(body, candidate);
    if (typeof id === "number" && Number.isInteger(id)) {
      return id;
    }
    if (typeof id === "string" && /^\d+$/.test(id)) {
      return Number(id);
    }
  }
  throw new HelpdeskApiError("Chatwoot create message returned no id", { conversationId });
}
