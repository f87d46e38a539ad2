import { bigint, boolean, date, integer, jsonb, pgEnum, pgTable, serial, text, timestamp } from 'drizzle-orm/pg-core';
import { FUNNEL_STATES, LOCALES, TOUR_STATUSES } from '@admissions/shared-kernel';
import type { FunnelAnswers } from '../../domain/types';

export const localeEnum = pgEnum('locale', LOCALES);
export const funnelStateEnum = pgEnum('funnel_state', FUNNEL_STATES);
export const tourStatusEnum = pgEnum('tour_status', TOUR_STATUSES);

export const botUsers = pgTable('bot_users', {
  id: text('id').primaryKey(),
  username: text('username'),
  language: localeEnum('language').default('ru').notNull(),
  state: funnelStateEnum('state').default('start').notNull(),
  answers: jsonb('answers').$type<FunnelAnswers>().notNull(),
  version: integer('version').default(0).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export const tours = pgTable('tours', {
  id: serial('id').primaryKey(),
  userId: text('user_id')
    .references(() => botUsers.id)
    .notNull(),
  phone: text('phone').notNull(),
  campus: text('campus').notNull(),
  date: date('date', { mode: 'string' }).notNull(),
  time: text('time').notNull(),
  language: localeEnum('language').notNull(),
  status: tourStatusEnum('status').default('booked').notNull(),
  reminderSent: boolean('reminder_sent').default(false).notNull(),
  followupSent: boolean('followup_sent').default(false).notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export const leadLinks = pgTable('lead_links', {
  userId: text('user_id')
    .primaryKey()
    .references(() => botUsers.id),
  contactId: bigint('contact_id', { mode: 'number' }),
  leadId: bigint('lead_id', { mode: 'number' }).notNull().unique(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export type UserRow = typeof botUsers.$inferSelect;
export type TourRow = typeof tours.$inferSelect;
export type LeadLinkRow = typeof leadLinks.$inferSelect;
