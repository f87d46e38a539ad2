import { z } from 'zod';
import { decodeCallbackData, decodeStaffStatus } from '../domain/callback-data';
import type { AdminCommand, FunnelEvent, StaffStatusEvent } from '../domain/events';

const ChatSchema = z.object({
  id: z.number(),
  type: z.string(),
  title: z.string().optional(),
});

const UserSchema = z.object({
  id: z.number(),
  username: z.string().optional(),
});

const MessageSchema = z.object({
  message_id: z.number(),
  chat: ChatSchema,
  from: UserSchema.optional(),
  text: z.string().optional(),
  contact: z.object({ phone_number: z.string() }).optional(),
});

const CallbackQuerySchema = z.object({
  id: z.string(),
  from: UserSchema,
  data: z.string().optional(),
  message: MessageSchema.optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number(),
  message: MessageSchema.optional(),
  callback_query: CallbackQuerySchema.optional(),
});

export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

export type InboundAction =
  | { kind: 'funnel'; event: FunnelEvent }
  | { kind: 'staff_status'; event: StaffStatusEvent }
  | { kind: 'admin'; command: AdminCommand };

export interface ChatInfo {
  id: string;
  type: string;
  title: string | null;
}

/** A Telegram update reduced to what the bot acts on */
export interface InboundUpdate {
  updateId: number;
  chat: ChatInfo;
  username: string | null;
  /** Message carrying the pressed button; null for typed input */
  messageId: number | null;
  messageText: string | null;
  callbackQueryId: string | null;
  action: InboundAction | null;
}

const MENU_WORDS = new Set(['menu', 'меню', 'menyu']);

/** Maps typed text to an action; unknown slash commands give null */
export function parseText(text: string): InboundAction | null {
  const trimmed = text.trim();
  if (trimmed.startsWith('/')) {
    const [head = '', ...rest] = trimmed.split(/\s+/);
    const command = head.split('@')[0].toLowerCase();
    switch (command) {
      case '/start':
        return { kind: 'funnel', event: { type: 'restart' } };
      case '/menu':
        return { kind: 'funnel', event: { type: 'menu' } };
      case '/getid':
        return { kind: 'admin', command: { type: 'getid' } };
      case '/stats':
        return { kind: 'admin', command: { type: 'stats' } };
      case '/broadcast':
        return { kind: 'admin', command: { type: 'broadcast', text: rest.join(' ') } };
      default:
        return null;
    }
  }
  if (MENU_WORDS.has(trimmed.toLowerCase())) {
    return { kind: 'funnel', event: { type: 'menu' } };
  }
  return { kind: 'funnel', event: { type: 'text', text } };
}

export function parseCallback(data: string): InboundAction | null {
  const staff = decodeStaffStatus(data);
  if (staff) return { kind: 'staff_status', event: staff };
  const event = decodeCallbackData(data);
  return event ? { kind: 'funnel', event } : null;
}

function chatInfo(chat: z.infer<typeof ChatSchema>): ChatInfo {
  return { id: String(chat.id), type: chat.type, title: chat.title ?? null };
}

/** Validates a raw update; null when it is malformed or of a kind the bot ignores */
export function decodeUpdate(raw: unknown): InboundUpdate | null {
  const parsed = TelegramUpdateSchema.safeParse(raw);
  if (!parsed.success) return null;
  const update = parsed.data;

  const query = update.callback_query;
  if (query?.message) {
    return {
      updateId: update.update_id,
      chat: chatInfo(query.message.chat),
      username: query.from.username ?? null,
      messageId: query.message.message_id,
      messageText: query.message.text ?? null,
      callbackQueryId: query.id,
      action: query.data ? parseCallback(query.data) : null,
    };
  }

  const message = update.message;
  if (message) {
    let action: InboundAction | null = null;
    if (message.contact) {
      action = { kind: 'funnel', event: { type: 'contact', phone: message.contact.phone_number } };
    } else if (message.text !== undefined) {
      action = parseText(message.text);
    }
    return {
      updateId: update.update_id,
      chat: chatInfo(message.chat),
      username: message.from?.username ?? null,
      messageId: null,
      messageText: message.text ?? null,
      callbackQueryId: null,
      action,
    };
  }

  return null;
}
