import { type AttributeMap, asText } from "../../src/runtime/path";
import {
  type ContactFields,
  type ContactStore,
  type HelpdeskContact,
  sourceIdForInbox,
} from "../../src/domain/helpdesk";
import { errorMessage } from "../utils/errors";
import { logDebug, logInfo, logWarn } from "../utils/logger";

/**
 * Custom attribute keys that identify a person on a network. Contacts are
 * matched on these before any free-text search.
 */
export const NETWORK_ID_ATTRIBUTES = ["vk_user_id", "telegram_user_id"] as const;

export interface EnsureContactInput {
  inboxId: number;
  searchKey: string;
  name?: string;
  phone?: string;
  email?: string;
  customAttributes: AttributeMap;
  additionalAttributes?: AttributeMap;
}

export interface ResolvedContact {
  contactId: number;
  sourceId: string;
}

export type MergeResult = { ok: true; updated: boolean } | { ok: false; updated: boolean; failures: string[] };

export interface ContactPatch {
  identifier?: string;
  name?: string;
  customAttributes: AttributeMap;
  additionalAttributes?: AttributeMap;
}

/**
 * Stable identifier stored on contacts we create: `vk:<id>` wins over
 * `telegram:<id>`.
 */
export function networkIdentifier(customAttributes: AttributeMap): string | undefined {
  const vkUserId = asText(customAttributes.vk_user_id);
  if (vkUserId) {
    return `vk:${vkUserId}`;
  }
  const telegramUserId = asText(customAttributes.telegram_user_id);
  return telegramUserId ? `telegram:${telegramUserId}` : undefined;
}

/**
 * Push network attributes onto an existing contact, then fill its name if it
 * has none. The two updates are independent: a failed attribute update does
 * not skip the name. Store failures are reported in the result, never thrown.
 */
export async function mergeContactAttributes(
  contacts: ContactStore,
  contact: HelpdeskContact,
  patch: ContactPatch
): Promise<MergeResult> {
  let updated = false;
  const failures: string[] = [];

  if (Object.keys(patch.customAttributes).length > 0 || patch.additionalAttributes !== undefined) {
    const fields: ContactFields = { customAttributes: patch.customAttributes };
    if (patch.identifier) {
      fields.identifier = patch.identifier;
    }
    if (patch.additionalAttributes !== undefined) {
      fields.additionalAttributes = patch.additionalAttributes;
    }
    try {
      await contacts.update(contact.id, fields);
      updated = true;
    } catch (error) {
      failures.push(`attribute update failed: ${errorMessage(error)}`);
    }
  }

  const currentName = contact.name?.trim() ?? "";
  const suppliedName = patch.name?.trim() ?? "";
  if (!currentName && suppliedName) {
    try {
      await contacts.update(contact.id, { name: suppliedName });
      updated = true;
    } catch (error) {
      failures.push(`name update failed: ${errorMessage(error)}`);
    }
  }

  return failures.length > 0 ? { ok: false, updated, failures } : { ok: true, updated };
}

/**
 * Identity Resolver
 *
 * Finds or creates the helpdesk contact for a network user and returns the
 * source id that binds the user to the inbox.
 */
export class IdentityResolver {
  constructor(private readonly contacts: ContactStore) {}

  async ensureContact(input: EnsureContactInput): Promise<ResolvedContact> {
    const identifier = networkIdentifier(input.customAttributes);

    let contact =
      (await this.findByNetworkId(input.customAttributes)) ?? (await this.findBySearch(searchQueries(input)));

    if (contact) {
      const merge = await mergeContactAttributes(this.contacts, contact, {
        identifier,
        name: input.name,
        customAttributes: input.customAttributes,
        additionalAttributes: input.additionalAttributes,
      });
      if (!merge.ok) {
        logWarn("[identity] Contact merge failed", { contactId: contact.id, failures: merge.failures });
      }
    } else {
      contact = await this.contacts.create(input.inboxId, {
        name: input.name ?? input.searchKey,
        phoneNumber: input.phone,
        email: input.email,
        identifier,
        customAttributes: input.customAttributes,
        additionalAttributes: input.additionalAttributes,
      });
      logInfo("[identity] Contact created", { contactId: contact.id, inboxId: input.inboxId, identifier });
    }

    return {
      contactId: contact.id,
      sourceId: sourceIdForInbox(contact, input.inboxId) ?? input.searchKey,
    };
  }

  private async findByNetworkId(customAttributes: AttributeMap): Promise<HelpdeskContact | undefined> {
    const attributes: Record<string, string> = {};
    for (const key of NETWORK_ID_ATTRIBUTES) {
      const value = asText(customAttributes[key]);
      if (value) {
        attributes[key] = value;
      }
    }
    if (Object.keys(attributes).length === 0) {
      return undefined;
    }

    try {
      const [first] = await this.contacts.filterByAttributes(attributes);
      return first;
    } catch (error) {
      logWarn("[identity] Attribute filter failed", { attributes, error: errorMessage(error) });
      return undefined;
    }
  }

  private async findBySearch(queries: string[]): Promise<HelpdeskContact | undefined> {
    for (const query of queries) {
      try {
        const [first] = await this.contacts.search(query);
        if (first) {
          logDebug("[identity] Contact found by search", { query, contactId: first.id });
          return first;
        }
      } catch (error) {
        logWarn("[identity] Contact search failed", { query, error: errorMessage(error) });
      }
    }
    return undefined;
  }
}

function searchQueries(input: EnsureContactInput): string[] {
  const queries: string[] = [];
  const telegramUserId = asText(input.customAttributes.telegram_user_id);
  if (telegramUserId) {
    queries.push(`telegram:${telegramUserId}`);
  }
  const searchKey = input.searchKey.trim();
  if (searchKey && !queries.includes(searchKey)) {
    queries.push(searchKey);
  }
  return queries;
}
