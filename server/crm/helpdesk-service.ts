import fs from "fs";
import type { AttributeMap } from "../../src/runtime/path";
import type { AttachmentFile, HelpdeskStores, MessageDirection } from "../../src/domain/helpdesk";
import { type EnsureContactInput, IdentityResolver } from "./identity-resolver";
import { ConversationResolver } from "./conversation-resolver";
import { errorMessage } from "../utils/errors";
import { logDebug, logWarn } from "../utils/logger";

export interface IngestInput {
  contact: EnsureContactInput;
  content: string;
  direction: MessageDirection;
  attachment?: AttachmentFile;
  conversationAttributes?: AttributeMap;
}

export interface IngestResult {
  contactId: number;
  conversationId: number;
  /** Null when the input carried neither text nor an attachment. */
  messageId: number | null;
}

/**
 * Writes one network message into the helpdesk: contact, then conversation,
 * then the message itself. A message with no text and no attachment still
 * reconciles the contact and the conversation.
 */
export class HelpdeskService {
  readonly identities: IdentityResolver;
  readonly threads: ConversationResolver;

  constructor(private readonly stores: HelpdeskStores) {
    this.identities = new IdentityResolver(stores.contacts);
    this.threads = new ConversationResolver(stores.conversations);
  }

  async ingest(input: IngestInput): Promise<IngestResult> {
    const { contactId, sourceId } = await this.identities.ensureContact(input.contact);
    const conversationId = await this.threads.ensureConversation({
      inboxId: input.contact.inboxId,
      contactId,
      sourceId,
      customAttributes: input.conversationAttributes,
    });

    if (!input.content && !input.attachment) {
      logDebug("[helpdesk] Nothing to write, contact and conversation reconciled", { contactId, conversationId });
      return { contactId, conversationId, messageId: null };
    }

    const messageId = input.attachment
      ? await this.writeWithAttachment(conversationId, input.content, input.attachment, input.direction)
      : await this.stores.messages.create(conversationId, input.content, input.direction);

    logDebug("[helpdesk] Message written", { contactId, conversationId, messageId, direction: input.direction });
    return { contactId, conversationId, messageId };
  }

  /**
   * Uploads the file when it is still on disk and removes it afterwards.
   * A vanished file degrades to a plain text message.
   */
  private async writeWithAttachment(
    conversationId: number,
    content: string,
    attachment: AttachmentFile,
    direction: MessageDirection
  ): Promise<number> {
    if (!fs.existsSync(attachment.path)) {
      logWarn("[helpdesk] Attachment file missing, sending text only", { path: attachment.path });
      return this.stores.messages.create(conversationId, content, direction);
    }

    try {
      return await this.stores.messages.createWithAttachment(conversationId, content, attachment, direction);
    } finally {
      try {
        await fs.promises.unlink(attachment.path);
      } catch (error) {
        logWarn("[helpdesk] Could not remove attachment file", { path: attachment.path, error: errorMessage(error) });
      }
    }
  }
}
