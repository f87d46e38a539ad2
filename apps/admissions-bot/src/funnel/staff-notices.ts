import type { Translator } from '../i18n/translator';
import type { TourRecord, UserRecord } from '../domain/types';
import { formatLongDate, formatTimestamp } from '../domain/schedule';
import { callbackData } from '../domain/callback-data';
import { inline } from '../chat/types';
import type { OutgoingMessage } from '../chat/types';

// Staff-facing texts stay in English regardless of the user's language.

function usernameLabel(user: Pick<UserRecord, 'username'>): string {
  return user.username ? `@${user.username}` : 'N/A';
}

export function newLeadNotice(user: UserRecord, now: Date, timezone: string): string {
  const { answers } = user;
  return [
    '🆕 New Lead from Telegram Bot',
    '',
    `👤 Name: ${answers.name ?? 'N/A'}`,
    `👤 Username: ${usernameLabel(user)}`,
    `📞 Phone: ${answers.phone ?? 'N/A'}`,
    `🌐 Language: ${user.language}`,
    `👶 Children: ${answers.childrenCount ?? 'N/A'}`,
    `📅 Ages: ${answers.childrenAges.join(', ')}`,
    `📚 Program: ${answers.program ?? 'N/A'}`,
    `🎓 Enrollment: ${answers.enrollment ?? 'N/A'}`,
    '',
    `💬 Chat ID: ${user.id}`,
    `⏰ Time: ${formatTimestamp(now, timezone)}`,
    '',
    '📋 Action: Call within 1 hour',
  ].join('\n');
}

interface BookedSlot {
  campus: string;
  date: string;
  time: string;
}

export function tourBookedNotice(t: Translator, user: UserRecord, slot: BookedSlot): string {
  return [
    '📅 New Tour Booking',
    '',
    `👤 Username: ${usernameLabel(user)}`,
    `Phone: ${user.answers.phone ?? 'N/A'}`,
    `Campus: ${t.t(`campuses.${slot.campus}`, 'en')}`,
    `Date: ${formatLongDate(slot.date, 'en')}`,
    `Time: ${slot.time}`,
    `Language: ${user.language}`,
  ].join('\n');
}

export function tourChangedNotice(user: UserRecord, tour: TourRecord, action: 'reschedule' | 'cancel'): string {
  return [
    `🔄 Tour ${action === 'reschedule' ? 'Reschedule' : 'Cancellation'}`,
    '',
    `👤 Username: ${usernameLabel(user)}`,
    `Phone: ${user.answers.phone ?? tour.phone}`,
    `Tour: ${tour.date} ${tour.time}`,
    `Campus: ${tour.campus}`,
  ].join('\n');
}

export function contactRequestNotice(user: UserRecord, now: Date, timezone: string): string {
  return [
    '💬 User wants to contact manager',
    '',
    `👤 Username: ${usernameLabel(user)}`,
    `Phone: ${user.answers.phone ?? 'Not provided'}`,
    `Chat ID: ${user.id}`,
    `Language: ${user.language}`,
    `Time: ${formatTimestamp(now, timezone)}`,
  ].join('\n');
}

/** Prompt asking staff to resolve a tour that took place yesterday */
export function tourStatusCheck(tour: TourRecord): OutgoingMessage {
  return {
    text: [
      '📋 Tour Status Check',
      '',
      `Lead: ${tour.phone}`,
      `Tour: Yesterday (${tour.date})`,
      `Time: ${tour.time}`,
      `Campus: ${tour.campus}`,
      '',
      'Did they attend?',
    ].join('\n'),
    keyboard: inline([
      [
        { text: '✅ Attended', callbackData: callbackData.staffStatus(tour.id, 'attended') },
        { text: '❌ No-Show', callbackData: callbackData.staffStatus(tour.id, 'no_show') },
      ],
      [{ text: '🔄 Rescheduled', callbackData: callbackData.staffStatus(tour.id, 'rescheduled') }],
    ]),
  };
}

export function staffStatusUpdated(status: string, original: string | null): string {
  return original ? `✅ Tour status updated to: ${status}\n\n${original}` : `✅ Tour status updated to: ${status}`;
}
