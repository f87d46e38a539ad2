import { z } from 'zod';
import { AGE_GROUPS, ENROLLMENTS, PROGRAMS, TOUR_STATUSES } from '@admissions/shared-kernel';
import type { FunnelState, Locale, TourStatus } from '@admissions/shared-kernel';

/** Qualification answers; `null` marks a step that has not been answered yet. */
export const FunnelAnswersSchema = z.object({
  name: z.string().nullable(),
  phone: z.string().nullable(),
  childrenCount: z.number().int().min(1).max(4).nullable(),
  currentChild: z.number().int().min(1).nullable(),
  childrenAges: z.array(z.enum(AGE_GROUPS)),
  program: z.enum(PROGRAMS).nullable(),
  enrollment: z.enum(ENROLLMENTS).nullable(),
  tourCampus: z.string().nullable(),
  tourDate: z.string().nullable(),
  tourTime: z.string().nullable(),
});

export type FunnelAnswers = z.infer<typeof FunnelAnswersSchema>;

export function emptyAnswers(): FunnelAnswers {
  return {
    name: null,
    phone: null,
    childrenCount: null,
    currentChild: null,
    childrenAges: [],
    program: null,
    enrollment: null,
    tourCampus: null,
    tourDate: null,
    tourTime: null,
  };
}

export interface UserRecord {
  id: string;
  username: string | null;
  language: Locale;
  state: FunnelState;
  answers: FunnelAnswers;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewUser {
  id: string;
  username: string | null;
  language: Locale;
}

export interface TourRecord {
  id: number;
  userId: string;
  phone: string;
  campus: string;
  /** ISO date in the school timezone */
  date: string;
  time: string;
  language: Locale;
  status: TourStatus;
  reminderSent: boolean;
  followupSent: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewTour = Pick<TourRecord, 'userId' | 'phone' | 'campus' | 'date' | 'time' | 'language'>;

export type TourFlag = 'reminderSent' | 'followupSent';

export interface LeadLink {
  userId: string;
  contactId: number | null;
  leadId: number;
  createdAt: Date;
  updatedAt: Date;
}

export type NewLeadLink = Pick<LeadLink, 'userId' | 'contactId' | 'leadId'>;

// ─── Tour status machine ───────────────────────────

export const TOUR_TRANSITIONS: Record<TourStatus, readonly TourStatus[]> = {
  booked: ['confirmed', 'cancelled', 'attended', 'no_show', 'rescheduled'],
  confirmed: ['cancelled', 'attended', 'no_show', 'rescheduled'],
  cancelled: [],
  attended: [],
  no_show: [],
  rescheduled: [],
};

export const ACTIVE_TOUR_STATUSES: readonly TourStatus[] = ['booked', 'confirmed'];

export function canTransitionTour(from: TourStatus, to: TourStatus): boolean {
  return TOUR_TRANSITIONS[from].includes(to);
}

/** Statuses a tour may currently hold for a move to `to` to be allowed */
export function tourStatusSources(to: TourStatus): TourStatus[] {
  return TOUR_STATUSES.filter((from) => canTransitionTour(from, to));
}
