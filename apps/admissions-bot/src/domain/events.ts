import type {
  AgeGroup,
  Enrollment,
  Locale,
  MenuAction,
  Program,
  ReminderAction,
  StaffTourStatus,
} from '@admissions/shared-kernel';

/** Events a user can raise in their own conversation */
export type FunnelEvent =
  | { type: 'restart' }
  | { type: 'menu' }
  | { type: 'language'; locale: Locale }
  | { type: 'text'; text: string }
  | { type: 'contact'; phone: string }
  | { type: 'children_count'; count: number }
  | { type: 'child_age'; age: AgeGroup }
  | { type: 'program'; program: Program }
  | { type: 'enrollment'; enrollment: Enrollment }
  | { type: 'menu_action'; action: MenuAction }
  | { type: 'campus'; campus: string }
  | { type: 'tour_date'; date: string }
  | { type: 'tour_dates_next_week' }
  | { type: 'tour_time'; time: string }
  | { type: 'reminder_response'; action: ReminderAction };

/** Raised from the staff chat against a specific tour */
export interface StaffStatusEvent {
  type: 'staff_status';
  tourId: number;
  status: StaffTourStatus;
}

export type AdminCommand =
  | { type: 'getid' }
  | { type: 'stats' }
  | { type: 'broadcast'; text: string };
