import { describe, expect, it } from 'vitest';
import { formatButtonDate, formatTimestamp, isBookableDate, offerTourDates, shiftDate, todayIn } from './schedule';

const MON_WED_FRI = [1, 3, 5];

describe('offerTourDates', () => {
  it('offers the next three allowed weekdays from a Sunday', () => {
    expect(offerTourDates('2026-10-18', 0, { weekdays: MON_WED_FRI })).toEqual(['2026-10-19', '2026-10-21', '2026-10-23']);
  });

  it('includes today when it is an allowed weekday', () => {
    expect(offerTourDates('2026-10-19', 0, { weekdays: MON_WED_FRI })).toEqual(['2026-10-19', '2026-10-21', '2026-10-23']);
  });

  it('shifts the window for next week', () => {
    expect(offerTourDates('2026-10-18', 7, { weekdays: MON_WED_FRI })).toEqual(['2026-10-26', '2026-10-28', '2026-10-30']);
  });

  it('stops at the end of the window', () => {
    expect(offerTourDates('2026-10-18', 0, { weekdays: [1], windowDays: 14 })).toEqual(['2026-10-19', '2026-10-26']);
  });
});

describe('isBookableDate', () => {
  it('accepts allowed weekdays from today on', () => {
    expect(isBookableDate('2026-10-19', '2026-10-18', MON_WED_FRI)).toBe(true);
    expect(isBookableDate('2026-10-19', '2026-10-19', MON_WED_FRI)).toBe(true);
  });

  it('rejects past dates, wrong weekdays and garbage', () => {
    expect(isBookableDate('2026-10-16', '2026-10-18', MON_WED_FRI)).toBe(false);
    expect(isBookableDate('2026-10-20', '2026-10-18', MON_WED_FRI)).toBe(false);
    expect(isBookableDate('2026-02-30', '2026-01-01', MON_WED_FRI)).toBe(false);
    expect(isBookableDate('soon', '2026-10-18', MON_WED_FRI)).toBe(false);
  });
});

describe('date helpers', () => {
  it('resolves today in the school timezone', () => {
    // 20:30 UTC is already the next day in Tashkent (UTC+5)
    expect(todayIn('Asia/Tashkent', new Date('2026-10-18T20:30:00Z'))).toBe('2026-10-19');
    expect(todayIn('UTC', new Date('2026-10-18T20:30:00Z'))).toBe('2026-10-18');
  });

  it('shifts across month ends', () => {
    expect(shiftDate('2026-10-31', 1)).toBe('2026-11-01');
    expect(shiftDate('2026-11-01', -1)).toBe('2026-10-31');
  });

  it('formats button labels and timestamps', () => {
    expect(formatButtonDate('2026-10-19', 'en')).toBe('Mon, 19 Oct');
    expect(formatTimestamp(new Date('2026-10-18T05:00:00Z'), 'Asia/Tashkent')).toBe('2026-10-18 10:00');
  });
});
