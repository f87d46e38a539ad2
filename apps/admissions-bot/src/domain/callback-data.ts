import {
  AGE_GROUPS,
  ENROLLMENTS,
  LOCALES,
  MAX_CHILDREN,
  MENU_ACTIONS,
  PROGRAMS,
  REMINDER_ACTIONS,
  isOneOf,
} from '@admissions/shared-kernel';
import type {
  AgeGroup,
  Enrollment,
  Locale,
  MenuAction,
  Program,
  ReminderAction,
  StaffTourStatus,
} from '@admissions/shared-kernel';
import type { FunnelEvent, StaffStatusEvent } from './events';

// Inline button payloads. Telegram caps callback data at 64 bytes.

export const callbackData = {
  language: (locale: Locale) => `lang_${locale}`,
  childrenCount: (count: number) => `children_${count}`,
  childAge: (age: AgeGroup) => `age_${age}`,
  program: (program: Program) => `program_${program}`,
  enrollment: (enrollment: Enrollment) => `enroll_${enrollment}`,
  campus: (campus: string) => `campus_${campus}`,
  tourDate: (date: string) => `date_${date}`,
  nextWeek: () => 'date_next_week',
  tourTime: (time: string) => `time_${time}`,
  menu: (action: MenuAction) => `menu_${action}`,
  reminder: (action: ReminderAction) => `reminder_${action}`,
  staffStatus: (tourId: number, status: StaffTourStatus) =>
    `admin_status_${tourId}_${status === 'no_show' ? 'noshow' : status}`,
};

const STAFF_STATUS_PATTERN = /^admin_status_(\d+)_(attended|noshow|no_show|rescheduled)$/;

export function decodeStaffStatus(data: string): StaffStatusEvent | null {
  const match = STAFF_STATUS_PATTERN.exec(data);
  if (!match) return null;
  const [, id, raw] = match;
  const status: StaffTourStatus = raw === 'attended' ? 'attended' : raw === 'rescheduled' ? 'rescheduled' : 'no_show';
  return { type: 'staff_status', tourId: Number(id), status };
}

/** Turns a callback token into a funnel event; unknown tokens give `null`. */
export function decodeCallbackData(data: string): FunnelEvent | null {
  const separator = data.indexOf('_');
  if (separator <= 0) return null;
  const prefix = data.slice(0, separator);
  const value = data.slice(separator + 1);

  switch (prefix) {
    case 'lang':
      return isOneOf(LOCALES, value) ? { type: 'language', locale: value } : null;
    case 'children': {
      const count = /^\d+$/.test(value) ? Number(value) : NaN;
      return count >= 1 && count <= MAX_CHILDREN ? { type: 'children_count', count } : null;
    }
    case 'age':
      return isOneOf(AGE_GROUPS, value) ? { type: 'child_age', age: value } : null;
    case 'program':
      return isOneOf(PROGRAMS, value) ? { type: 'program', program: value } : null;
    case 'enroll':
      return isOneOf(ENROLLMENTS, value) ? { type: 'enrollment', enrollment: value } : null;
    case 'campus':
      return value.length > 0 ? { type: 'campus', campus: value } : null;
    case 'date':
      if (value === 'next_week') return { type: 'tour_dates_next_week' };
      return /^\d{4}-\d{2}-\d{2}$/.test(value) ? { type: 'tour_date', date: value } : null;
    case 'time':
      return /^\d{2}:\d{2}$/.test(value) ? { type: 'tour_time', time: value } : null;
    case 'menu':
      return isOneOf(MENU_ACTIONS, value) ? { type: 'menu_action', action: value } : null;
    case 'reminder':
      return isOneOf(REMINDER_ACTIONS, value) ? { type: 'reminder_response', action: value } : null;
    default:
      return null;
  }
}
