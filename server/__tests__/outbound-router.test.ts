import { describe, expect, it, vi } from 'vitest';
import { OutboundRouter, isAudioAttachment } from '../routing/outbound-router';
import { EventBus, type TelegramPeerMessage } from '../bus/event-bus';
import { createChannelRegistry } from '../../src/domain/channels';
import { BadRequestError, DispatchError } from '../utils/errors';
import { RecordingSender } from '../../tests/support/recording-sender';

const HELPDESK_URL = 'https://helpdesk.test/';

function outgoingEvent(channel: string, sender: Record<string, unknown>, extra: Record<string, unknown> = {}) {
  return {
    event: 'message_created',
    message_type: 'outgoing',
    private: false,
    content: 'Hello there',
    conversation: { meta: { channel, sender } },
    ...extra,
  };
}

const whatsappSender = { phone_number: '+5511999999999' };
const telegramSender = { custom_attributes: { telegram_username: 'alice' } };

function setup() {
  const whatsapp = new RecordingSender('whatsapp', 1);
  const telegram = new RecordingSender('telegram', 2);
  const bus = new EventBus();
  const sleep = vi.fn(async (_ms: number) => {});
  const router = new OutboundRouter({
    senders: createChannelRegistry([whatsapp, telegram]),
    helpdeskBaseUrl: HELPDESK_URL,
    bus,
    sleep,
  });
  return { whatsapp, telegram, bus, sleep, router };
}

describe('OutboundRouter.handleOutgoing', () => {
  it('sends agent replies to the whatsapp phone number', async () => {
    const { whatsapp, telegram, router } = setup();

    await router.handleOutgoing(outgoingEvent('whatsapp', whatsappSender));

    expect(whatsapp.sent).toEqual([{ kind: 'text', recipientId: '+5511999999999', text: 'Hello there' }]);
    expect(telegram.sent).toEqual([]);
  });

  it('never dispatches incoming or private messages or other events', async () => {
    const { whatsapp, router } = setup();

    await router.handleOutgoing(outgoingEvent('whatsapp', whatsappSender, { message_type: 'incoming' }));
    await router.handleOutgoing(outgoingEvent('whatsapp', whatsappSender, { private: true }));
    await router.handleOutgoing(outgoingEvent('whatsapp', whatsappSender, { event: 'conversation_updated' }));

    expect(whatsapp.sent).toEqual([]);
  });

  it('drops payloads that do not decode', async () => {
    const { whatsapp, router } = setup();

    await expect(router.handleOutgoing('not an event')).resolves.toBeUndefined();
    await expect(router.handleOutgoing({ message_type: 'outgoing' })).resolves.toBeUndefined();
    expect(whatsapp.sent).toEqual([]);
  });

  it('drops events without channel, recipient or content', async () => {
    const { whatsapp, router } = setup();

    await router.handleOutgoing({ ...outgoingEvent('whatsapp', whatsappSender), conversation: { meta: { sender: whatsappSender } } });
    await router.handleOutgoing(outgoingEvent('whatsapp', {}));
    await router.handleOutgoing(outgoingEvent('whatsapp', whatsappSender, { content: '   ' }));

    expect(whatsapp.sent).toEqual([]);
  });

  it('ignores channels without a sender', async () => {
    const { whatsapp, telegram, router } = setup();

    await router.handleOutgoing(outgoingEvent('vk', { custom_attributes: { vk_peer_id: '123' } }));

    expect(whatsapp.sent).toEqual([]);
    expect(telegram.sent).toEqual([]);
  });

  it('forwards the first audio attachment to telegram with a rebased url', async () => {
    const { telegram, router } = setup();

    await router.handleOutgoing(
      outgoingEvent('telegram', telegramSender, {
        attachments: [
          { file_type: 'image', data_url: '/rails/active_storage/photo.jpg' },
          { file_type: 'audio', data_url: '/rails/active_storage/voice.ogg', content_type: 'audio/ogg' },
          { file_type: 'audio', data_url: 'https://cdn.test/second.mp3' },
        ],
      })
    );

    expect(telegram.sent).toEqual([
      { kind: 'text', recipientId: 'alice', text: 'Hello there' },
      {
        kind: 'media',
        recipientId: 'alice',
        media: {
          type: 'media',
          mediaType: 'audio',
          url: 'https://helpdesk.test/rails/active_storage/voice.ogg',
          mimeType: 'audio/ogg',
        },
      },
    ]);
  });

  it('sends audio alone when there is no text, reading content_attributes', async () => {
    const { telegram, router } = setup();

    await router.handleOutgoing(
      outgoingEvent('telegram', telegramSender, {
        content: null,
        content_attributes: {
          attachments: [{ file_type: 'file', extension: '.OGG', data_url: '', file_url: 'https://cdn.test/v.ogg' }],
        },
      })
    );

    expect(telegram.sent).toEqual([
      { kind: 'media', recipientId: 'alice', media: { type: 'media', mediaType: 'audio', url: 'https://cdn.test/v.ogg' } },
    ]);
  });

  it('reads attachments nested under message', async () => {
    const { telegram, router } = setup();

    await router.handleOutgoing(
      outgoingEvent('telegram', telegramSender, {
        content: '',
        message: { attachments: [{ file_type: 'voice', data_url: 'https://cdn.test/voice.oga' }] },
      })
    );

    expect(telegram.sent).toHaveLength(1);
    expect(telegram.sent[0]).toMatchObject({ kind: 'media', recipientId: 'alice' });
  });

  it('sends nothing for telegram attachments without audio and no text', async () => {
    const { telegram, router } = setup();

    await router.handleOutgoing(
      outgoingEvent('telegram', telegramSender, {
        content: null,
        attachments: [{ file_type: 'image', data_url: 'https://cdn.test/photo.jpg' }],
      })
    );

    expect(telegram.sent).toEqual([]);
  });

  it('does not forward attachments on channels without a priority media class', async () => {
    const { whatsapp, router } = setup();

    await router.handleOutgoing(
      outgoingEvent('whatsapp', whatsappSender, {
        attachments: [{ file_type: 'audio', data_url: 'https://cdn.test/voice.ogg' }],
      })
    );

    expect(whatsapp.sent).toEqual([{ kind: 'text', recipientId: '+5511999999999', text: 'Hello there' }]);
  });

  it('still sends the audio when the text dispatch fails', async () => {
    const { telegram, router } = setup();
    vi.spyOn(telegram, 'sendText').mockRejectedValueOnce(new Error('FLOOD_WAIT'));

    await expect(
      router.handleOutgoing(
        outgoingEvent('telegram', telegramSender, {
          attachments: [{ file_type: 'audio', data_url: 'https://cdn.test/voice.ogg' }],
        })
      )
    ).resolves.toBeUndefined();

    expect(telegram.sent).toEqual([
      { kind: 'media', recipientId: 'alice', media: { type: 'media', mediaType: 'audio', url: 'https://cdn.test/voice.ogg' } },
    ]);
  });

  it('swallows media dispatch failures', async () => {
    const { telegram, router } = setup();
    vi.spyOn(telegram, 'sendMedia').mockRejectedValueOnce(new Error('file too big'));

    await expect(
      router.handleOutgoing(
        outgoingEvent('telegram', telegramSender, {
          attachments: [{ file_type: 'audio', data_url: 'https://cdn.test/voice.ogg' }],
        })
      )
    ).resolves.toBeUndefined();
    expect(telegram.sent).toEqual([{ kind: 'text', recipientId: 'alice', text: 'Hello there' }]);
  });
});

describe('OutboundRouter.dispatchDirect', () => {
  it('only supports telegram', async () => {
    const { router } = setup();

    await expect(
      router.dispatchDirect({ channel: 'whatsapp', recipientId: '+1', text: 'Hi', typingSeconds: 0 })
    ).rejects.toThrow(BadRequestError);
  });

  it('requires a configured telegram sender', async () => {
    const router = new OutboundRouter({
      senders: createChannelRegistry([new RecordingSender('whatsapp', 1)]),
      helpdeskBaseUrl: HELPDESK_URL,
    });

    await expect(
      router.dispatchDirect({ channel: 'telegram', recipientId: 'alice', text: 'Hi', typingSeconds: 0 })
    ).rejects.toThrow('Telegram is not configured');
  });

  it('shows typing, waits, sends and republishes the message', async () => {
    const { telegram, bus, sleep, router } = setup();
    const published: TelegramPeerMessage[] = [];
    bus.subscribe('telegram.outgoing', (message) => {
      published.push(message);
    });

    await router.dispatchDirect({
      channel: 'telegram',
      recipientId: 'id:42',
      text: 'Hi',
      typingSeconds: 2,
      accessHash: '-123',
    });

    expect(sleep).toHaveBeenCalledWith(2000);
    expect(telegram.sent).toEqual([
      { kind: 'typing', recipientId: 'id:42', options: { accessHash: '-123' } },
      {
        kind: 'text',
        recipientId: 'id:42',
        text: 'Hi',
        options: { accessHash: '-123', suppressHelpdeskEcho: false },
      },
    ]);
    expect(published).toEqual([{ peerId: '42', text: 'Hi' }]);
  });

  it('skips typing when typing_seconds is zero', async () => {
    const { telegram, sleep, router } = setup();

    await router.dispatchDirect({ channel: 'telegram', recipientId: 'alice', text: 'Hi', typingSeconds: 0 });

    expect(sleep).not.toHaveBeenCalled();
    expect(telegram.sent.map((item) => item.kind)).toEqual(['text']);
  });

  it('sends anyway when the typing indicator fails', async () => {
    const { telegram, sleep, router } = setup();
    vi.spyOn(telegram, 'setTyping').mockRejectedValueOnce(new Error('PEER_ID_INVALID'));

    await router.dispatchDirect({ channel: 'telegram', recipientId: 'alice', text: 'Hi', typingSeconds: 3 });

    expect(sleep).not.toHaveBeenCalled();
    expect(telegram.sent.map((item) => item.kind)).toEqual(['text']);
  });

  it('reports send failures as dispatch errors', async () => {
    const { telegram, router } = setup();
    vi.spyOn(telegram, 'sendText').mockRejectedValueOnce(new Error('USER_NOT_FOUND'));

    const failure = router.dispatchDirect({ channel: 'telegram', recipientId: 'ghost', text: 'Hi', typingSeconds: 0 });

    await expect(failure).rejects.toBeInstanceOf(DispatchError);
    await expect(failure).rejects.toThrow('Dispatch failed: USER_NOT_FOUND');
  });

  it('explains an invalidated session', async () => {
    const { telegram, router } = setup();
    vi.spyOn(telegram, 'sendText').mockRejectedValueOnce(
      new Error('The authorization has been invalidated, because of the user terminating all sessions')
    );

    await expect(
      router.dispatchDirect({ channel: 'telegram', recipientId: 'alice', text: 'Hi', typingSeconds: 0 })
    ).rejects.toThrow('Telegram session was invalidated');
  });
});

describe('isAudioAttachment', () => {
  it('matches audio file types and extensions', () => {
    expect(isAudioAttachment({ file_type: 'Voice' })).toBe(true);
    expect(isAudioAttachment({ file_type: 'file', extension: 'm4a' })).toBe(true);
    expect(isAudioAttachment({ file_type: 'file', extension: 'pdf' })).toBe(false);
    expect(isAudioAttachment({})).toBe(false);
  });
});
