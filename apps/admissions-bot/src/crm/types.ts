import type { AgeGroup, Enrollment, Locale, Program, TourStatus } from '@admissions/shared-kernel';

export interface ContactProfile {
  name: string | null;
  chatId: string;
  username: string | null;
  language: Locale;
}

export interface LeadDetails {
  name: string | null;
  childrenCount: number | null;
  childrenAges: AgeGroup[];
  program: Program | null;
  enrollment: Enrollment | null;
}

export interface LeadFields extends Partial<LeadDetails> {
  tourCampus?: string;
  tourDate?: string;
  tourTime?: string;
  tourStatus?: TourStatus;
}

/**
 * Best-effort CRM access. Implementations log and return `null`/`false`
 * instead of throwing.
 */
export interface CrmClient {
  upsertContact(phone: string, profile: ContactProfile): Promise<number | null>;
  createLead(contactId: number | null, phone: string, lead: LeadDetails): Promise<number | null>;
  updateLead(leadId: number, fields: LeadFields): Promise<boolean>;
  addNote(leadId: number, text: string): Promise<boolean>;
  createTask(leadId: number, text: string, dueAt: Date): Promise<boolean>;
}

/** Work queued for the sync dispatcher, keyed by the chat user it belongs to */
export type CrmCommand =
  | { kind: 'upsert_contact'; userId: string; phone: string; profile: ContactProfile }
  | { kind: 'create_lead'; userId: string; phone: string; profile: ContactProfile; lead: LeadDetails }
  | { kind: 'update_lead'; userId: string; fields: LeadFields }
  | { kind: 'add_note'; userId: string; text: string }
  | { kind: 'create_task'; userId: string; text: string; dueAt: Date };
