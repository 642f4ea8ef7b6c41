import { z } from "zod";
import { isMissing, isRecord, lookupArray } from "../../src/runtime/path";

/**
 * Helpdesk `message_created` webhook, as far as the outbound router reads it.
 * Everything else on the payload is kept but not validated.
 */
export const helpdeskAttachmentSchema = z
  .object({
    file_type: z.string().nullish(),
    extension: z.string().nullish(),
    data_url: z.string().nullish(),
    file_url: z.string().nullish(),
    filename: z.string().nullish(),
    content_type: z.string().nullish(),
  })
  .passthrough();

export const helpdeskMessageEventSchema = z
  .object({
    event: z.string(),
    message_type: z.string().nullish(),
    private: z.boolean().nullish(),
    content: z.string().nullish(),
    conversation: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type HelpdeskAttachment = z.infer<typeof helpdeskAttachmentSchema>;
export type HelpdeskMessageEvent = z.infer<typeof helpdeskMessageEventSchema>;

const ATTACHMENT_LOCATIONS = [["attachments"], ["content_attributes", "attachments"], ["message", "attachments"]];

/**
 * Attachments of the event. The helpdesk puts them at the top level, under
 * `content_attributes` or under `message`; the first non-empty list wins.
 * Malformed entries are dropped.
 */
export function extractAttachments(event: unknown): HelpdeskAttachment[] {
  for (const location of ATTACHMENT_LOCATIONS) {
    const list = lookupArray(event, location);
    if (isMissing(list) || list.length === 0) {
      continue;
    }

    const attachments: HelpdeskAttachment[] = [];
    for (const item of list) {
      if (!isRecord(item)) {
        continue;
      }
      const parsed = helpdeskAttachmentSchema.safeParse(item);
      if (parsed.success) {
        attachments.push(parsed.data);
      }
    }
    if (attachments.length > 0) {
      return attachments;
    }
  }
  return [];
}
