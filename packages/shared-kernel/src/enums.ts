// ─── Locales ───────────────────────────────────────
export const LOCALES = ['ru', 'uz', 'en', 'tr'] as const;
export type Locale = (typeof LOCALES)[number];

// ─── Funnel states ─────────────────────────────────
export const FUNNEL_STATES = [
  'start',
  'awaiting_name',
  'awaiting_phone',
  'awaiting_children_count',
  'awaiting_child_age',
  'awaiting_program',
  'awaiting_enrollment',
  'ready',
  'booking_tour_campus',
  'booking_tour_date',
  'booking_tour_time',
] as const;
export type FunnelState = (typeof FUNNEL_STATES)[number];

// ─── Tour status ───────────────────────────────────
export const TOUR_STATUSES = ['booked', 'confirmed', 'cancelled', 'attended', 'no_show', 'rescheduled'] as const;
export type TourStatus = (typeof TOUR_STATUSES)[number];

/** Statuses staff can set from the status-check prompt */
export const STAFF_TOUR_STATUSES = ['attended', 'no_show', 'rescheduled'] as const;
export type StaffTourStatus = (typeof STAFF_TOUR_STATUSES)[number];

// ─── Qualification answers ─────────────────────────
export const AGE_GROUPS = ['3-6', '7-10', '11-14', '15-18'] as const;
export type AgeGroup = (typeof AGE_GROUPS)[number];

export const PROGRAMS = ['kindergarten', 'russian', 'ib', 'consultation'] as const;
export type Program = (typeof PROGRAMS)[number];

export const ENROLLMENTS = ['this_sem', 'next_year', 'exploring'] as const;
export type Enrollment = (typeof ENROLLMENTS)[number];

// ─── Menu and reminder actions ─────────────────────
export const MENU_ACTIONS = ['book_tour', 'addresses', 'contact_manager'] as const;
export type MenuAction = (typeof MENU_ACTIONS)[number];

export const REMINDER_ACTIONS = ['confirm', 'reschedule', 'cancel'] as const;
export type ReminderAction = (typeof REMINDER_ACTIONS)[number];

export function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return (values as readonly string[]).includes(value);
}
