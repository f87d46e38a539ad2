import type { FunnelState, Locale, MenuAction, ReminderAction } from '@admissions/shared-kernel';
import type { FunnelEvent } from '../domain/events';
import { isValidPhone, normalizePhone } from '../domain/phone';
import { isBookableDate, offerTourDates } from '../domain/schedule';
import { findCampus } from '../domain/settings';
import type { FunnelSettings } from '../domain/settings';
import { emptyAnswers } from '../domain/types';
import type { FunnelAnswers, NewTour, TourRecord, UserRecord } from '../domain/types';
import type { Reply } from '../chat/types';
import type { ContactProfile, CrmCommand } from '../crm/types';
import type { Translator } from '../i18n/translator';
import * as prompts from './prompts';
import { contactRequestNotice, newLeadNotice, tourBookedNotice, tourChangedNotice } from './staff-notices';

export type FunnelEffect =
  | { type: 'book_tour'; tour: NewTour }
  | { type: 'set_tour_status'; tourId: number; from: TourRecord['status']; to: TourRecord['status'] }
  | { type: 'notify_staff'; text: string }
  | { type: 'crm'; command: CrmCommand };

export interface TransitionContext {
  t: Translator;
  settings: FunnelSettings;
  /** ISO date in the school timezone */
  today: string;
  now: Date;
  /** The user's booked tour, looked up for reminder responses */
  activeTour: TourRecord | null;
}

export interface TransitionResult {
  user: UserRecord;
  replies: Reply[];
  effects: FunnelEffect[];
  /** True when the event did not apply to the current state */
  ignored: boolean;
}

const MANAGER_TASK_DELAY_MS = 60 * 60 * 1000;
const NAME_STATES: readonly FunnelState[] = ['start', 'awaiting_name'];

function ignored(user: UserRecord): TransitionResult {
  return { user, replies: [], effects: [], ignored: true };
}

function result(user: UserRecord, replies: Reply[], effects: FunnelEffect[] = []): TransitionResult {
  return { user, replies, effects, ignored: false };
}

function update(user: UserRecord, state: FunnelState, answers: Partial<FunnelAnswers> = {}): UserRecord {
  return { ...user, state, answers: { ...user.answers, ...answers } };
}

function crm(command: CrmCommand): FunnelEffect {
  return { type: 'crm', command };
}

function profileOf(user: UserRecord): ContactProfile {
  return { name: user.answers.name, chatId: user.id, username: user.username, language: user.language };
}

function acceptPhone(user: UserRecord, raw: string, ctx: TransitionContext): TransitionResult {
  const locale = user.language;
  if (!isValidPhone(raw)) {
    return result(user, [prompts.invalidPhone(ctx.t, locale)]);
  }

  const phone = normalizePhone(raw, ctx.settings.phonePrefix);
  const next = update(user, 'awaiting_children_count', { phone });
  return result(
    next,
    [prompts.phoneAccepted(ctx.t, locale), prompts.childrenCountPrompt(ctx.t, locale)],
    [crm({ kind: 'upsert_contact', userId: user.id, phone, profile: profileOf(next) })],
  );
}

function completeQualification(user: UserRecord, ctx: TransitionContext): TransitionResult {
  const { answers } = user;
  const effects: FunnelEffect[] = [
    { type: 'notify_staff', text: newLeadNotice(user, ctx.now, ctx.settings.timezone) },
  ];
  if (answers.phone) {
    effects.push(
      crm({
        kind: 'create_lead',
        userId: user.id,
        phone: answers.phone,
        profile: profileOf(user),
        lead: {
          name: answers.name,
          childrenCount: answers.childrenCount,
          childrenAges: answers.childrenAges,
          program: answers.program,
          enrollment: answers.enrollment,
        },
      }),
    );
  }
  return result(user, [prompts.handoff(ctx.t, user.language, ctx.settings)], effects);
}

function handleMenuAction(user: UserRecord, action: MenuAction, ctx: TransitionContext): TransitionResult {
  const locale = user.language;
  switch (action) {
    case 'book_tour':
      if (!user.answers.phone) {
        return result(update(user, 'awaiting_phone'), [prompts.phonePrompt(ctx.t, locale)]);
      }
      return result(update(user, 'booking_tour_campus'), [prompts.campusPicker(ctx.t, locale, ctx.settings)]);

    case 'addresses':
      return result(user, [prompts.campusAddresses(ctx.t, locale, ctx.settings)]);

    case 'contact_manager':
      return result(
        user,
        [prompts.managerWillContact(ctx.t, locale)],
        [
          { type: 'notify_staff', text: contactRequestNotice(user, ctx.now, ctx.settings.timezone) },
          crm({
            kind: 'create_task',
            userId: user.id,
            text: 'Client asked a manager to get in touch',
            dueAt: new Date(ctx.now.getTime() + MANAGER_TASK_DELAY_MS),
          }),
        ],
      );
  }
}

function bookTour(user: UserRecord, time: string, ctx: TransitionContext): TransitionResult {
  const { phone, tourCampus, tourDate } = user.answers;
  if (!ctx.settings.tourTimes.includes(time) || !phone || !tourCampus || !tourDate) return ignored(user);

  const next = update(user, 'ready', { tourTime: time });
  const slot = { campus: tourCampus, date: tourDate, time };
  return result(
    next,
    [prompts.tourConfirmation(ctx.t, user.language, ctx.settings, slot)],
    [
      { type: 'book_tour', tour: { userId: user.id, phone, ...slot, language: user.language } },
      { type: 'notify_staff', text: tourBookedNotice(ctx.t, next, slot) },
      crm({ kind: 'update_lead', userId: user.id, fields: { tourCampus, tourDate, tourTime: time, tourStatus: 'booked' } }),
    ],
  );
}

function respondToReminder(user: UserRecord, action: ReminderAction, ctx: TransitionContext): TransitionResult {
  const locale = user.language;
  const tour = ctx.activeTour;
  if (!tour || tour.status !== 'booked') {
    return result(user, [prompts.tourNotFound(ctx.t, locale)]);
  }

  if (action === 'confirm') {
    return result(
      user,
      [prompts.reminderConfirmed(ctx.t, locale)],
      [
        { type: 'set_tour_status', tourId: tour.id, from: 'booked', to: 'confirmed' },
        crm({ kind: 'update_lead', userId: user.id, fields: { tourStatus: 'confirmed' } }),
      ],
    );
  }

  return result(
    user,
    [prompts.rescheduleAcknowledged(ctx.t, locale)],
    [
      { type: 'set_tour_status', tourId: tour.id, from: 'booked', to: 'cancelled' },
      { type: 'notify_staff', text: tourChangedNotice(user, tour, action) },
      crm({ kind: 'update_lead', userId: user.id, fields: { tourStatus: 'cancelled' } }),
    ],
  );
}

function selectLanguage(user: UserRecord, locale: Locale, ctx: TransitionContext): TransitionResult {
  if (NAME_STATES.includes(user.state)) {
    return result({ ...update(user, 'awaiting_name'), language: locale }, [prompts.namePrompt(ctx.t, locale)]);
  }
  return result({ ...user, language: locale }, [prompts.languageChanged(ctx.t, locale)]);
}

function handleText(user: UserRecord, text: string, ctx: TransitionContext): TransitionResult {
  const trimmed = text.trim();
  if (trimmed.length === 0) return ignored(user);

  switch (user.state) {
    case 'awaiting_name':
      return result(update(user, 'awaiting_phone', { name: trimmed }), [prompts.phonePrompt(ctx.t, user.language)]);
    case 'awaiting_phone':
      return acceptPhone(user, trimmed, ctx);
    default:
      return result(user, [], [crm({ kind: 'add_note', userId: user.id, text: `💬 Telegram: ${trimmed}` })]);
  }
}

/**
 * Applies one event to a user's conversation. Pure: persistence and delivery of
 * the returned replies and effects belong to the caller. Unmatched
 * (state, event) pairs come back as `ignored` with the user untouched.
 */
export function transition(user: UserRecord, event: FunnelEvent, ctx: TransitionContext): TransitionResult {
  const locale = user.language;
  const { state, answers } = user;

  switch (event.type) {
    case 'restart':
      return result({ ...user, state: 'start', answers: emptyAnswers() }, [prompts.languagePicker(ctx.t)]);

    case 'menu':
      return result(user, [prompts.mainMenu(ctx.t, locale, ctx.settings)]);

    case 'language':
      return selectLanguage(user, event.locale, ctx);

    case 'text':
      return handleText(user, event.text, ctx);

    case 'contact':
      return state === 'awaiting_phone' ? acceptPhone(user, event.phone, ctx) : ignored(user);

    case 'children_count':
      if (state !== 'awaiting_children_count') return ignored(user);
      return result(
        update(user, 'awaiting_child_age', { childrenCount: event.count, currentChild: 1, childrenAges: [] }),
        [prompts.childAgePrompt(ctx.t, locale, 1)],
      );

    case 'child_age': {
      if (state !== 'awaiting_child_age') return ignored(user);
      const childrenAges = [...answers.childrenAges, event.age];
      const current = answers.currentChild ?? 1;
      if (current < (answers.childrenCount ?? 1)) {
        return result(update(user, 'awaiting_child_age', { childrenAges, currentChild: current + 1 }), [
          prompts.childAgePrompt(ctx.t, locale, current + 1),
        ]);
      }
      return result(update(user, 'awaiting_program', { childrenAges }), [prompts.programPrompt(ctx.t, locale)]);
    }

    case 'program':
      if (state !== 'awaiting_program') return ignored(user);
      return result(update(user, 'awaiting_enrollment', { program: event.program }), [
        prompts.enrollmentPrompt(ctx.t, locale),
      ]);

    case 'enrollment':
      if (state !== 'awaiting_enrollment') return ignored(user);
      return completeQualification(update(user, 'ready', { enrollment: event.enrollment }), ctx);

    case 'menu_action':
      return handleMenuAction(user, event.action, ctx);

    case 'campus':
      if (state !== 'booking_tour_campus' || !findCampus(ctx.settings, event.campus)) return ignored(user);
      return result(update(user, 'booking_tour_date', { tourCampus: event.campus }), [
        prompts.datePicker(ctx.t, locale, offerTourDates(ctx.today, 0, { weekdays: ctx.settings.tourWeekdays }), true),
      ]);

    case 'tour_dates_next_week':
      if (state !== 'booking_tour_date') return ignored(user);
      return result(user, [
        prompts.datePicker(ctx.t, locale, offerTourDates(ctx.today, 7, { weekdays: ctx.settings.tourWeekdays }), false),
      ]);

    case 'tour_date':
      if (state !== 'booking_tour_date' || !isBookableDate(event.date, ctx.today, ctx.settings.tourWeekdays)) {
        return ignored(user);
      }
      return result(update(user, 'booking_tour_time', { tourDate: event.date }), [
        prompts.timePicker(ctx.t, locale, ctx.settings),
      ]);

    case 'tour_time':
      if (state !== 'booking_tour_time') return ignored(user);
      return bookTour(user, event.time, ctx);

    case 'reminder_response':
      return respondToReminder(user, event.action, ctx);
  }
}
