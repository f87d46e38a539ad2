import { AGE_GROUPS, ENROLLMENTS, LOCALES, MAX_CHILDREN, PROGRAMS, REMINDER_ACTIONS } from '@admissions/shared-kernel';
import type { Locale } from '@admissions/shared-kernel';
import { callbackData } from '../domain/callback-data';
import { formatButtonDate, formatLongDate, formatShortDate } from '../domain/schedule';
import { findCampus } from '../domain/settings';
import type { FunnelSettings } from '../domain/settings';
import type { TourRecord } from '../domain/types';
import { inline } from '../chat/types';
import type { InlineButton, OutgoingMessage, Reply } from '../chat/types';
import type { Translator } from '../i18n/translator';

type Mode = Reply['mode'];

function pairs<T>(items: T[]): T[][] {
  const rows: T[][] = [];
  for (let i = 0; i < items.length; i += 2) rows.push(items.slice(i, i + 2));
  return rows;
}

export function languagePicker(t: Translator): Reply {
  const buttons = LOCALES.map((locale) => ({ text: t.t('language_button', locale), callbackData: callbackData.language(locale) }));
  return { mode: 'send', text: t.t('language_prompt', t.defaultLocale), keyboard: inline(pairs(buttons)) };
}

export function namePrompt(t: Translator, locale: Locale): Reply {
  return { mode: 'replace', text: t.t('name_prompt', locale) };
}

export function languageChanged(t: Translator, locale: Locale): Reply {
  return { mode: 'send', text: t.t('language_changed', locale) };
}

export function phonePrompt(t: Translator, locale: Locale): Reply {
  return {
    mode: 'send',
    text: t.t('welcome', locale),
    keyboard: { kind: 'request_contact', text: t.t('share_contact', locale) },
  };
}

export function invalidPhone(t: Translator, locale: Locale): Reply {
  return { mode: 'send', text: t.t('invalid_phone', locale) };
}

export function phoneAccepted(t: Translator, locale: Locale): Reply {
  return { mode: 'send', text: t.t('phone_saved', locale), keyboard: { kind: 'remove' } };
}

export function childrenCountPrompt(t: Translator, locale: Locale): Reply {
  const buttons: InlineButton[] = [];
  for (let count = 1; count <= MAX_CHILDREN; count += 1) {
    buttons.push({ text: count === MAX_CHILDREN ? `${count}+` : String(count), callbackData: callbackData.childrenCount(count) });
  }
  return { mode: 'send', text: t.t('children_count', locale), keyboard: inline([buttons]) };
}

export function childAgePrompt(t: Translator, locale: Locale, childNumber: number): Reply {
  const buttons = AGE_GROUPS.map((age) => ({ text: t.t(`age_groups.${age}`, locale), callbackData: callbackData.childAge(age) }));
  return { mode: 'replace', text: t.t('child_age', locale, { num: childNumber }), keyboard: inline(pairs(buttons)) };
}

export function programPrompt(t: Translator, locale: Locale): Reply {
  const rows = PROGRAMS.map((program) => [{ text: t.t(`programs.${program}`, locale), callbackData: callbackData.program(program) }]);
  return { mode: 'replace', text: t.t('program_interest', locale), keyboard: inline(rows) };
}

export function enrollmentPrompt(t: Translator, locale: Locale): Reply {
  const rows = ENROLLMENTS.map((enrollment) => [
    { text: t.t(`enrollments.${enrollment}`, locale), callbackData: callbackData.enrollment(enrollment) },
  ]);
  return { mode: 'replace', text: t.t('enrollment_question', locale), keyboard: inline(rows) };
}

export function handoff(t: Translator, locale: Locale, settings: FunnelSettings): Reply {
  return {
    mode: 'replace',
    text: t.t('handoff', locale, { phone: settings.contactPhone }),
    keyboard: inline([[{ text: t.t('menu_buttons.channel', locale), url: settings.channelLink }]]),
  };
}

export function mainMenu(t: Translator, locale: Locale, settings: FunnelSettings, mode: Mode = 'send'): Reply {
  return {
    mode,
    text: t.t('menu', locale),
    keyboard: inline([
      [{ text: t.t('menu_buttons.book_tour', locale), callbackData: callbackData.menu('book_tour') }],
      [{ text: t.t('menu_buttons.addresses', locale), callbackData: callbackData.menu('addresses') }],
      [{ text: t.t('menu_buttons.contact_manager', locale), callbackData: callbackData.menu('contact_manager') }],
      [{ text: t.t('menu_buttons.channel', locale), url: settings.channelLink }],
    ]),
  };
}

export function campusAddresses(t: Translator, locale: Locale, settings: FunnelSettings): Reply {
  const blocks = settings.campuses.map(
    (campus) => `📍 ${t.t(`campuses.${campus.id}`, locale)}\n${campus.address}\n🗺 ${campus.map}`,
  );
  return { mode: 'replace', text: [t.t('campus_addresses', locale), ...blocks].join('\n\n') };
}

export function managerWillContact(t: Translator, locale: Locale): Reply {
  return { mode: 'replace', text: t.t('manager_will_contact', locale) };
}

export function campusPicker(t: Translator, locale: Locale, settings: FunnelSettings): Reply {
  const rows = settings.campuses.map((campus) => [
    { text: t.t(`campuses.${campus.id}`, locale), callbackData: callbackData.campus(campus.id) },
  ]);
  return { mode: 'replace', text: t.t('select_campus', locale), keyboard: inline(rows) };
}

export function datePicker(t: Translator, locale: Locale, dates: string[], withNextWeek: boolean): Reply {
  const rows: InlineButton[][] = dates.map((date) => [
    { text: formatButtonDate(date, locale), callbackData: callbackData.tourDate(date) },
  ]);
  if (withNextWeek) rows.push([{ text: t.t('next_week', locale), callbackData: callbackData.nextWeek() }]);
  return { mode: 'replace', text: t.t('select_date', locale), keyboard: inline(rows) };
}

export function timePicker(t: Translator, locale: Locale, settings: FunnelSettings): Reply {
  const rows = settings.tourTimes.map((time) => [{ text: time, callbackData: callbackData.tourTime(time) }]);
  return { mode: 'replace', text: t.t('select_time', locale), keyboard: inline(rows) };
}

interface TourSlot {
  campus: string;
  date: string;
  time: string;
}

function campusVars(t: Translator, locale: Locale, settings: FunnelSettings, campusId: string) {
  const campus = findCampus(settings, campusId);
  return {
    campus: t.t(`campuses.${campusId}`, locale),
    address: campus?.address ?? '',
    map: campus?.map ?? '',
  };
}

export function tourConfirmation(t: Translator, locale: Locale, settings: FunnelSettings, slot: TourSlot): Reply {
  return {
    mode: 'replace',
    text: t.t('tour_confirmed', locale, {
      ...campusVars(t, locale, settings, slot.campus),
      date: formatLongDate(slot.date, locale),
      time: slot.time,
    }),
  };
}

export function reminderConfirmed(t: Translator, locale: Locale): Reply {
  return { mode: 'replace', text: t.t('reminder_buttons.confirm', locale) };
}

export function rescheduleAcknowledged(t: Translator, locale: Locale): Reply {
  return { mode: 'replace', text: t.t('reschedule_message', locale) };
}

export function tourNotFound(t: Translator, locale: Locale): Reply {
  return { mode: 'replace', text: t.t('tour_not_found', locale) };
}

// ─── Batch messages ────────────────────────────────

export function tourReminder(t: Translator, settings: FunnelSettings, tour: TourRecord): OutgoingMessage {
  const locale = tour.language;
  const [confirm, reschedule, cancel] = REMINDER_ACTIONS.map((action) => ({
    text: t.t(`reminder_buttons.${action}`, locale),
    callbackData: callbackData.reminder(action),
  }));
  return {
    text: t.t('tour_reminder', locale, {
      ...campusVars(t, locale, settings, tour.campus),
      date: formatShortDate(tour.date, locale),
      time: tour.time,
    }),
    keyboard: inline([[confirm, reschedule], [cancel]]),
  };
}

export function tourFollowup(t: Translator, tour: TourRecord): OutgoingMessage {
  const locale = tour.language;
  return {
    text: t.t('post_tour_followup', locale),
    keyboard: inline([
      [{ text: t.t('contact_manager_notification', locale), callbackData: callbackData.menu('contact_manager') }],
    ]),
  };
}
