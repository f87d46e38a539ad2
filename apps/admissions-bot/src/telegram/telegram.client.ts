import { z } from 'zod';
import { serviceRequest } from '@admissions/http-client';
import type { ChatGateway, EditedMessage, Keyboard, OutgoingMessage } from '../chat/types';

const TELEGRAM_API = 'https://api.telegram.org';

const EnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown(),
  description: z.string().optional(),
});

const SentMessageSchema = z.object({ message_id: z.number() });
const UpdatesSchema = z.array(z.unknown());

type ReplyMarkup =
  | { inline_keyboard: ({ text: string; callback_data: string } | { text: string; url: string })[][] }
  | { keyboard: { text: string; request_contact: boolean }[][]; resize_keyboard: boolean; one_time_keyboard: boolean }
  | { remove_keyboard: true };

export function toReplyMarkup(keyboard: Keyboard | undefined): ReplyMarkup | undefined {
  if (!keyboard) return undefined;
  switch (keyboard.kind) {
    case 'inline':
      return {
        inline_keyboard: keyboard.rows.map((row) =>
          row.map((button) =>
            'url' in button ? { text: button.text, url: button.url } : { text: button.text, callback_data: button.callbackData },
          ),
        ),
      };
    case 'request_contact':
      return {
        keyboard: [[{ text: keyboard.text, request_contact: true }]],
        resize_keyboard: true,
        one_time_keyboard: true,
      };
    case 'remove':
      return { remove_keyboard: true };
  }
}

/** Telegram Bot API over HTTPS */
export class TelegramClient implements ChatGateway {
  private readonly baseUrl: string;

  constructor(token: string, apiUrl: string = TELEGRAM_API) {
    this.baseUrl = `${apiUrl}/bot${token}`;
  }

  private async call<S extends z.ZodTypeAny>(
    method: string,
    body: Record<string, unknown>,
    schema: S,
    timeout?: number,
  ): Promise<z.infer<S>> {
    const envelope = await serviceRequest(this.baseUrl, `/${method}`, EnvelopeSchema, { method: 'POST', body, timeout });
    if (!envelope.ok) {
      throw new Error(`telegram_${method}_failed: ${envelope.description ?? 'unknown error'}`);
    }
    return schema.parse(envelope.result);
  }

  async send(chatId: string, message: OutgoingMessage): Promise<number> {
    const sent = await this.call(
      'sendMessage',
      {
        chat_id: chatId,
        text: message.text,
        reply_markup: toReplyMarkup(message.keyboard),
        disable_web_page_preview: true,
      },
      SentMessageSchema,
    );
    return sent.message_id;
  }

  async edit(chatId: string, messageId: number, message: EditedMessage): Promise<void> {
    await this.call(
      'editMessageText',
      {
        chat_id: chatId,
        message_id: messageId,
        text: message.text,
        reply_markup: toReplyMarkup(message.keyboard),
        disable_web_page_preview: true,
      },
      z.unknown(),
    );
  }

  async answerCallback(callbackQueryId: string, text?: string): Promise<void> {
    await this.call('answerCallbackQuery', { callback_query_id: callbackQueryId, text }, z.unknown());
  }

  /** Long-polls for updates; entries are left raw and decoded one by one */
  getUpdates(offset: number, timeoutSeconds: number): Promise<unknown[]> {
    return this.call(
      'getUpdates',
      { offset, timeout: timeoutSeconds, allowed_updates: ['message', 'callback_query'] },
      UpdatesSchema,
      (timeoutSeconds + 10) * 1000,
    );
  }
}
