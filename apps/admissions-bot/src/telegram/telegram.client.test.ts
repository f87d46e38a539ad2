import { afterEach, describe, expect, it, vi } from 'vitest';
import { TelegramClient, toReplyMarkup } from './telegram.client';

const fetchMock = vi.fn();

afterEach(() => {
  fetchMock.mockReset();
  vi.unstubAllGlobals();
});

function telegramReply(result: unknown): Response {
  return new Response(JSON.stringify({ ok: true, result }), { status: 200 });
}

describe('toReplyMarkup', () => {
  it('maps inline callback and url buttons', () => {
    expect(
      toReplyMarkup({
        kind: 'inline',
        rows: [[{ text: 'Book', callbackData: 'menu_book_tour' }], [{ text: 'Channel', url: 'https://t.me/test_channel' }]],
      }),
    ).toEqual({
      inline_keyboard: [[{ text: 'Book', callback_data: 'menu_book_tour' }], [{ text: 'Channel', url: 'https://t.me/test_channel' }]],
    });
  });

  it('maps the contact request and keyboard removal', () => {
    expect(toReplyMarkup({ kind: 'request_contact', text: 'Share' })).toEqual({
      keyboard: [[{ text: 'Share', request_contact: true }]],
      resize_keyboard: true,
      one_time_keyboard: true,
    });
    expect(toReplyMarkup({ kind: 'remove' })).toEqual({ remove_keyboard: true });
    expect(toReplyMarkup(undefined)).toBeUndefined();
  });
});

describe('TelegramClient', () => {
  it('sends a message and returns its id', async () => {
    vi.stubGlobal('fetch', fetchMock);
    fetchMock.mockResolvedValueOnce(telegramReply({ message_id: 321, chat: { id: 1001 } }));
    const client = new TelegramClient('test-token', 'https://telegram.example.test');

    const id = await client.send('1001', { text: 'Hello', keyboard: { kind: 'remove' } });

    expect(id).toBe(321);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://telegram.example.test/bottest-token/sendMessage');
    expect(JSON.parse(init.body)).toEqual({
      chat_id: '1001',
      text: 'Hello',
      reply_markup: { remove_keyboard: true },
      disable_web_page_preview: true,
    });
  });

  it('passes the long-poll offset and returns raw updates', async () => {
    vi.stubGlobal('fetch', fetchMock);
    fetchMock.mockResolvedValueOnce(telegramReply([{ update_id: 8 }]));
    const client = new TelegramClient('test-token', 'https://telegram.example.test');

    await expect(client.getUpdates(8, 25)).resolves.toEqual([{ update_id: 8 }]);
    expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({
      offset: 8,
      timeout: 25,
      allowed_updates: ['message', 'callback_query'],
    });
  });

  it('raises when Telegram refuses the call', async () => {
    vi.stubGlobal('fetch', fetchMock);
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({ ok: false, description: 'Bad Request: chat not found' }), { status: 400 }),
    );
    const client = new TelegramClient('test-token', 'https://telegram.example.test');

    await expect(client.answerCallback('cb-1')).rejects.toThrow('responded 400');
  });
});
