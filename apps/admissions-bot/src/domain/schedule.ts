import { DateTime } from 'luxon';
import { TOUR_DATE_OFFERS, TOUR_DATE_WINDOW_DAYS } from '@admissions/shared-kernel';
import type { Locale } from '@admissions/shared-kernel';

export const ISO_DATE = 'yyyy-MM-dd';

export function todayIn(timezone: string, now: Date = new Date()): string {
  return DateTime.fromJSDate(now, { zone: timezone }).toFormat(ISO_DATE);
}

export function shiftDate(isoDate: string, days: number): string {
  return DateTime.fromISO(isoDate).plus({ days }).toFormat(ISO_DATE);
}

export interface DateOfferOptions {
  /** Luxon weekdays, 1 = Monday */
  weekdays: readonly number[];
  count?: number;
  windowDays?: number;
}

/**
 * Tour dates offered from `today` (inclusive), shifted by `offsetDays`.
 * Walks the window day by day and keeps the first `count` allowed weekdays.
 */
export function offerTourDates(today: string, offsetDays: number, options: DateOfferOptions): string[] {
  const { weekdays, count = TOUR_DATE_OFFERS, windowDays = TOUR_DATE_WINDOW_DAYS } = options;
  const start = DateTime.fromISO(today).plus({ days: offsetDays });
  const dates: string[] = [];

  for (let i = 0; i < windowDays && dates.length < count; i += 1) {
    const day = start.plus({ days: i });
    if (weekdays.includes(day.weekday)) dates.push(day.toFormat(ISO_DATE));
  }
  return dates;
}

export function isBookableDate(date: string, today: string, weekdays: readonly number[]): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) return false;
  const parsed = DateTime.fromISO(date);
  if (!parsed.isValid) return false;
  return weekdays.includes(parsed.weekday) && date >= today;
}

export function formatButtonDate(date: string, locale: Locale): string {
  return DateTime.fromISO(date).setLocale(locale).toFormat('ccc, d LLL');
}

export function formatLongDate(date: string, locale: Locale): string {
  return DateTime.fromISO(date).setLocale(locale).toFormat('cccc, d MMMM');
}

export function formatShortDate(date: string, locale: Locale): string {
  return DateTime.fromISO(date).setLocale(locale).toFormat('d MMMM');
}

export function formatTimestamp(now: Date, timezone: string): string {
  return DateTime.fromJSDate(now, { zone: timezone }).toFormat('yyyy-MM-dd HH:mm');
}
