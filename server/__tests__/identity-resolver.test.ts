import { describe, expect, it, vi } from 'vitest';
import { IdentityResolver, mergeContactAttributes, networkIdentifier } from '../crm/identity-resolver';
import { InMemoryHelpdesk } from '../../tests/support/in-memory-helpdesk';

const telegramInput = {
  inboxId: 5,
  searchKey: 'alice',
  name: 'Alice',
  customAttributes: { telegram_user_id: '42', telegram_username: 'alice' },
};

describe('networkIdentifier', () => {
  it('prefers the vk id over the telegram id', () => {
    expect(networkIdentifier({ vk_user_id: 7, telegram_user_id: '42' })).toBe('vk:7');
    expect(networkIdentifier({ telegram_user_id: '42' })).toBe('telegram:42');
    expect(networkIdentifier({ wa_remote_jid: 'x@s.whatsapp.net' })).toBeUndefined();
  });
});

describe('IdentityResolver', () => {
  it('creates a contact with a network identifier when nothing matches', async () => {
    const helpdesk = new InMemoryHelpdesk();
    const resolver = new IdentityResolver(helpdesk.contacts);

    const result = await resolver.ensureContact(telegramInput);

    expect(result).toEqual({ contactId: 101, sourceId: 'source-101' });
    expect(helpdesk.contactRecords).toHaveLength(1);
    expect(helpdesk.contactRecords[0]).toMatchObject({
      name: 'Alice',
      identifier: 'telegram:42',
      custom_attributes: { telegram_user_id: '42', telegram_username: 'alice' },
    });
  });

  it('resolves the same person to the same contact on repeated calls', async () => {
    const helpdesk = new InMemoryHelpdesk();
    const resolver = new IdentityResolver(helpdesk.contacts);

    const first = await resolver.ensureContact(telegramInput);
    const second = await resolver.ensureContact(telegramInput);

    expect(second).toEqual(first);
    expect(helpdesk.contactRecords).toHaveLength(1);
    expect(helpdesk.contactUpdates).toEqual([
      {
        contactId: 101,
        fields: {
          customAttributes: { telegram_user_id: '42', telegram_username: 'alice' },
          identifier: 'telegram:42',
        },
      },
    ]);
  });

  it('filters on exactly the network id attributes present', async () => {
    const helpdesk = new InMemoryHelpdesk();
    const filter = vi.spyOn(helpdesk.contacts, 'filterByAttributes');
    const resolver = new IdentityResolver(helpdesk.contacts);

    await resolver.ensureContact({
      inboxId: 3,
      searchKey: '7',
      customAttributes: { vk_user_id: '7', vk_peer_id: '2000000001' },
    });

    expect(filter).toHaveBeenCalledWith({ vk_user_id: '7' });
    expect(helpdesk.contactRecords[0].identifier).toBe('vk:7');
  });

  it('skips the attribute filter without network ids', async () => {
    const helpdesk = new InMemoryHelpdesk();
    const filter = vi.spyOn(helpdesk.contacts, 'filterByAttributes');
    const resolver = new IdentityResolver(helpdesk.contacts);

    await resolver.ensureContact({
      inboxId: 1,
      searchKey: '5511999999999',
      phone: '5511999999999',
      customAttributes: { wa_remote_jid: '5511999999999@s.whatsapp.net' },
    });

    expect(filter).not.toHaveBeenCalled();
    expect(helpdesk.contactRecords[0]).toMatchObject({
      name: '5511999999999',
      phone_number: '+5511999999999',
      identifier: null,
    });
  });

  it('searches the telegram identifier first, then the search key', async () => {
    const helpdesk = new InMemoryHelpdesk();
    const search = vi.spyOn(helpdesk.contacts, 'search');
    const resolver = new IdentityResolver(helpdesk.contacts);

    await resolver.ensureContact(telegramInput);

    expect(search.mock.calls.map(([query]) => query)).toEqual(['telegram:42', 'alice']);
  });

  it('falls back to text search when the attribute filter fails', async () => {
    const helpdesk = new InMemoryHelpdesk();
    helpdesk.addContact({
      id: 9,
      name: 'Alice',
      identifier: 'telegram:42',
      contact_inboxes: [{ source_id: 'tg-thread-42', inbox: { id: 5 } }],
    });
    vi.spyOn(helpdesk.contacts, 'filterByAttributes').mockRejectedValueOnce(new Error('filter unavailable'));
    const resolver = new IdentityResolver(helpdesk.contacts);

    const result = await resolver.ensureContact(telegramInput);

    expect(result).toEqual({ contactId: 9, sourceId: 'tg-thread-42' });
    expect(helpdesk.contactRecords).toHaveLength(1);
  });

  it('uses the search key as source id when the contact has no binding for the inbox', async () => {
    const helpdesk = new InMemoryHelpdesk();
    helpdesk.addContact({
      id: 9,
      name: 'Alice',
      custom_attributes: { telegram_user_id: '42' },
      contact_inboxes: [{ source_id: 'other-inbox', inbox: { id: 8 } }],
    });
    const resolver = new IdentityResolver(helpdesk.contacts);

    const result = await resolver.ensureContact(telegramInput);

    expect(result).toEqual({ contactId: 9, sourceId: 'alice' });
  });

  it('fills in a blank name but keeps an existing one', async () => {
    const helpdesk = new InMemoryHelpdesk();
    helpdesk.addContact({ id: 9, name: '  ', custom_attributes: { telegram_user_id: '42' } });
    helpdesk.addContact({ id: 10, name: 'Bob', custom_attributes: { telegram_user_id: '43' } });
    const resolver = new IdentityResolver(helpdesk.contacts);

    await resolver.ensureContact(telegramInput);
    await resolver.ensureContact({ ...telegramInput, customAttributes: { telegram_user_id: '43' } });

    expect(helpdesk.contactRecords.map((contact) => contact.name)).toEqual(['Alice', 'Bob']);
  });

  it('does not fail when merging into an existing contact fails', async () => {
    const helpdesk = new InMemoryHelpdesk();
    helpdesk.addContact({ id: 9, name: 'Alice', custom_attributes: { telegram_user_id: '42' } });
    vi.spyOn(helpdesk.contacts, 'update').mockRejectedValue(new Error('422 Unprocessable'));
    const resolver = new IdentityResolver(helpdesk.contacts);

    await expect(resolver.ensureContact(telegramInput)).resolves.toEqual({ contactId: 9, sourceId: 'alice' });
  });

  it('names a nameless contact even when its attributes cannot be updated', async () => {
    const helpdesk = new InMemoryHelpdesk();
    const contact = helpdesk.addContact({ id: 9, name: null, custom_attributes: { telegram_user_id: '42' } });
    vi.spyOn(helpdesk.contacts, 'update').mockRejectedValueOnce(new Error('422 Unprocessable'));
    const resolver = new IdentityResolver(helpdesk.contacts);

    await resolver.ensureContact(telegramInput);

    expect(contact.name).toBe('Alice');
  });

  it('propagates contact creation failures', async () => {
    const helpdesk = new InMemoryHelpdesk();
    vi.spyOn(helpdesk.contacts, 'create').mockRejectedValueOnce(new Error('create failed'));
    const resolver = new IdentityResolver(helpdesk.contacts);

    await expect(resolver.ensureContact(telegramInput)).rejects.toThrow('create failed');
  });
});

describe('mergeContactAttributes', () => {
  it('still fills a blank name when the attribute update fails', async () => {
    const helpdesk = new InMemoryHelpdesk();
    const contact = helpdesk.addContact({ id: 9, name: null });
    vi.spyOn(helpdesk.contacts, 'update').mockRejectedValueOnce(new Error('timeout'));

    const result = await mergeContactAttributes(helpdesk.contacts, contact, {
      customAttributes: { vk_user_id: '7' },
      name: 'Ivan',
    });

    expect(result).toEqual({ ok: false, updated: true, failures: ['attribute update failed: timeout'] });
    expect(helpdesk.contactUpdates).toEqual([{ contactId: 9, fields: { name: 'Ivan' } }]);
    expect(contact.name).toBe('Ivan');
  });

  it('reports every failing step', async () => {
    const helpdesk = new InMemoryHelpdesk();
    const contact = helpdesk.addContact({ id: 9, name: '  ' });
    vi.spyOn(helpdesk.contacts, 'update')
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('422 Unprocessable'));

    const result = await mergeContactAttributes(helpdesk.contacts, contact, {
      customAttributes: { vk_user_id: '7' },
      name: 'Ivan',
    });

    expect(result).toEqual({
      ok: false,
      updated: false,
      failures: ['attribute update failed: timeout', 'name update failed: 422 Unprocessable'],
    });
  });

  it('does nothing when there is nothing to merge', async () => {
    const helpdesk = new InMemoryHelpdesk();
    const contact = helpdesk.addContact({ id: 9, name: 'Ivan' });

    const result = await mergeContactAttributes(helpdesk.contacts, contact, { customAttributes: {} });

    expect(result).toEqual({ ok: true, updated: false });
    expect(helpdesk.contactUpdates).toEqual([]);
  });

  it('sends additional attributes even with no custom attributes', async () => {
    const helpdesk = new InMemoryHelpdesk();
    const contact = helpdesk.addContact({ id: 9, name: 'Ivan' });

    const result = await mergeContactAttributes(helpdesk.contacts, contact, {
      customAttributes: {},
      additionalAttributes: { city: 'Kazan' },
    });

    expect(result).toEqual({ ok: true, updated: true });
    expect(helpdesk.contactUpdates).toEqual([
      { contactId: 9, fields: { customAttributes: {}, additionalAttributes: { city: 'Kazan' } } },
    ]);
  });
});
