import { BaseEnvSchema, BoolFromString, CsvList, validateEnv } from '@admissions/config';
import { DEFAULT_JOB_SCHEDULES, LOCALES, PORTS } from '@admissions/shared-kernel';
import { z } from 'zod';
import rawCampuses from '../config/campuses.json';
import type { FunnelSettings } from './domain/settings';

const OptionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : null));

const OptionalId = z.preprocess(
  (value) => (value === '' || value === undefined ? null : value),
  z.coerce.number().int().positive().nullable(),
);

const EnvSchema = BaseEnvSchema.extend({
  PORT: z.coerce.number().default(PORTS.ADMISSIONS_BOT),

  TELEGRAM_BOT_TOKEN: z.string().min(1),
  TELEGRAM_API_URL: z.string().url().default('https://api.telegram.org'),
  TELEGRAM_POLLING_ENABLED: BoolFromString.default('true'),
  TELEGRAM_POLL_TIMEOUT_S: z.coerce.number().int().min(0).max(50).default(30),

  STORE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
  DATABASE_URL: z.string().optional(),

  SCHOOL_NAME: z.string().default('Cambridge School'),
  SCHOOL_TIMEZONE: z.string().default('Asia/Tashkent'),
  DEFAULT_LOCALE: z.enum(LOCALES).default('ru'),
  PHONE_PREFIX: z.string().default('+998'),
  CHANNEL_LINK: z.string().url().default('https://t.me/school_channel'),
  CONTACT_PHONE: z.string().default('+998 71 200 00 00'),
  STAFF_CHAT_ID: OptionalString,
  ADMIN_IDS: CsvList,
  TOUR_TIMES: CsvList,
  TOUR_WEEKDAYS: CsvList,

  REMINDER_CRON: z.string().default(DEFAULT_JOB_SCHEDULES.TOUR_REMINDERS),
  FOLLOWUP_CRON: z.string().default(DEFAULT_JOB_SCHEDULES.TOUR_FOLLOWUPS),
  STATUS_CHECK_CRON: z.string().default(DEFAULT_JOB_SCHEDULES.TOUR_STATUS_CHECK),

  CRM_ENABLED: BoolFromString.default('false'),
  KOMMO_ACCOUNT_URL: z.string().default(''),
  KOMMO_ACCESS_TOKEN: z.string().default(''),
  KOMMO_REFRESH_TOKEN: z.string().default(''),
  KOMMO_CLIENT_ID: z.string().default(''),
  KOMMO_CLIENT_SECRET: z.string().default(''),
  KOMMO_REDIRECT_URI: z.string().default(''),
  KOMMO_PIPELINE_ID: OptionalId,
  KOMMO_STATUS_ID: OptionalId,
  KOMMO_TOKEN_CACHE: z.string().default('.kommo-tokens.json'),

  CRM_WEBHOOK_SECRET: OptionalString,
  CRM_REPLY_MARKER: z.string().min(1).default('/reply'),

  SYNC_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  SYNC_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
})
  .refine((env) => env.STORE_DRIVER === 'memory' || Boolean(env.DATABASE_URL), {
    message: 'DATABASE_URL is required when STORE_DRIVER=postgres',
    path: ['DATABASE_URL'],
  })
  .refine((env) => !env.CRM_ENABLED || (env.KOMMO_ACCOUNT_URL !== '' && env.KOMMO_ACCESS_TOKEN !== ''), {
    message: 'KOMMO_ACCOUNT_URL and KOMMO_ACCESS_TOKEN are required when CRM_ENABLED=true',
    path: ['KOMMO_ACCOUNT_URL'],
  });

export type Env = z.infer<typeof EnvSchema>;

const CampusesSchema = z
  .array(z.object({ id: z.string().min(1), address: z.string().min(1), map: z.string().url() }))
  .min(1);

const TourTimeSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/);
const WeekdaySchema = z.coerce.number().int().min(1).max(7);

export const DEFAULT_TOUR_TIMES = ['10:00', '14:00', '16:00'];
export const DEFAULT_TOUR_WEEKDAYS = [1, 3, 5];

/** Funnel settings from the validated environment and config/campuses.json */
export function funnelSettings(env: Env): FunnelSettings {
  return {
    campuses: CampusesSchema.parse(rawCampuses),
    tourTimes: env.TOUR_TIMES.length > 0 ? z.array(TourTimeSchema).parse(env.TOUR_TIMES) : DEFAULT_TOUR_TIMES,
    tourWeekdays:
      env.TOUR_WEEKDAYS.length > 0 ? z.array(WeekdaySchema).parse(env.TOUR_WEEKDAYS) : DEFAULT_TOUR_WEEKDAYS,
    timezone: env.SCHOOL_TIMEZONE,
    defaultLocale: env.DEFAULT_LOCALE,
    phonePrefix: env.PHONE_PREFIX,
    channelLink: env.CHANNEL_LINK,
    contactPhone: env.CONTACT_PHONE,
    staffChatId: env.STAFF_CHAT_ID,
  };
}

export function loadEnv(): Env {
  return validateEnv(EnvSchema);
}
