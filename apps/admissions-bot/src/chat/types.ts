export type InlineButton = { text: string; callbackData: string } | { text: string; url: string };

export interface InlineKeyboard {
  kind: 'inline';
  rows: InlineButton[][];
}

export type Keyboard = InlineKeyboard | { kind: 'request_contact'; text: string } | { kind: 'remove' };

export interface OutgoingMessage {
  text: string;
  keyboard?: Keyboard;
}

export interface EditedMessage {
  text: string;
  keyboard?: InlineKeyboard;
}

/** A reply to the user; `replace` edits the message a button was pressed on. */
export interface Reply extends OutgoingMessage {
  mode: 'send' | 'replace';
}

/** Outbound side of the chat platform */
export interface ChatGateway {
  /** Resolves to the id of the sent message */
  send(chatId: string, message: OutgoingMessage): Promise<number>;
  edit(chatId: string, messageId: number, message: EditedMessage): Promise<void>;
  answerCallback(callbackQueryId: string, text?: string): Promise<void>;
}

export function inline(rows: InlineButton[][]): InlineKeyboard {
  return { kind: 'inline', rows };
}
