// ─── Ports ─────────────────────────────────────────
export const PORTS = {
  ADMISSIONS_BOT: 3050,
} as const;

// ─── Daily batch schedules (cron, school timezone) ─
export const DEFAULT_JOB_SCHEDULES = {
  TOUR_REMINDERS: '0 10 * * *',
  TOUR_FOLLOWUPS: '0 11 * * *',
  TOUR_STATUS_CHECK: '0 12 * * *',
} as const;

// ─── Funnel limits ─────────────────────────────────
export const MIN_PHONE_DIGITS = 7;
export const MAX_CHILDREN = 4;
export const TOUR_DATE_OFFERS = 3;
export const TOUR_DATE_WINDOW_DAYS = 14;
