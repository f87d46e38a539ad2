import { createHash, timingSafeEqual } from 'crypto';
import { createLogger } from '@admissions/observability';
import type { ChatGateway } from '../chat/types';
import type { LeadLinkRepository } from '../store/types';

const log = createLogger('crm-webhook');

const NOTE_FIELD = /^leads\[note\]\[(\d+)\]\[note\]\[(text|element_id)\]$/;

export interface CrmNote {
  leadId: number;
  text: string;
}

/** `X-Signature` is the hex md5 of the raw body followed by the shared secret */
export function verifySignature(rawBody: string, signature: string | undefined, secret: string): boolean {
  if (!signature) return false;
  const expected = Buffer.from(createHash('md5').update(rawBody + secret).digest('hex'));
  const given = Buffer.from(signature.trim().toLowerCase());
  return expected.length === given.length && timingSafeEqual(expected, given);
}

/** Reads note entries from a form-encoded amoCRM webhook body */
export function parseNotes(rawBody: string): CrmNote[] {
  const partial = new Map<string, { leadId?: number; text?: string }>();
  for (const [key, value] of new URLSearchParams(rawBody)) {
    const match = NOTE_FIELD.exec(key);
    if (!match) continue;
    const [, index, field] = match;
    const entry = partial.get(index) ?? {};
    if (field === 'text') entry.text = value;
    else entry.leadId = Number(value);
    partial.set(index, entry);
  }

  const notes: CrmNote[] = [];
  for (const { leadId, text } of partial.values()) {
    if (leadId !== undefined && Number.isInteger(leadId) && text !== undefined) notes.push({ leadId, text });
  }
  return notes;
}

export interface CrmWebhookDeps {
  leadLinks: LeadLinkRepository;
  chat: ChatGateway;
  secret: string;
  replyMarker: string;
}

/** Forwards staff replies, written in the CRM as marked notes, to the parent's chat */
export class CrmWebhookService {
  constructor(private readonly deps: CrmWebhookDeps) {}

  /** Returns how many notes reached a chat; anything unrecognized is dropped */
  async handle(rawBody: string, signature: string | undefined): Promise<number> {
    const { leadLinks, chat, secret, replyMarker } = this.deps;
    if (!verifySignature(rawBody, signature, secret)) {
      log.warn('Webhook with a missing or wrong signature ignored');
      return 0;
    }

    let forwarded = 0;
    for (const note of parseNotes(rawBody)) {
      const trimmed = note.text.trim();
      if (!trimmed.startsWith(replyMarker)) continue;
      const reply = trimmed.slice(replyMarker.length).trim();
      if (reply.length === 0) continue;

      const userId = await leadLinks.findUserByLead(note.leadId);
      if (!userId) {
        log.info({ leadId: note.leadId }, 'Reply for a lead with no chat');
        continue;
      }
      try {
        await chat.send(userId, { text: reply });
        forwarded += 1;
      } catch (error) {
        log.error({ leadId: note.leadId, error: error instanceof Error ? error.message : String(error) }, 'Reply not delivered');
      }
    }
    return forwarded;
  }
}
