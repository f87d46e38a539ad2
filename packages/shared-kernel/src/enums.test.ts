import { describe, expect, it } from 'vitest';
import { LOCALES, STAFF_TOUR_STATUSES, TOUR_STATUSES, isOneOf } from './enums';

describe('isOneOf', () => {
  it('narrows known values', () => {
    expect(isOneOf(LOCALES, 'uz')).toBe(true);
    expect(isOneOf(LOCALES, 'de')).toBe(false);
  });

  it('keeps staff statuses inside the tour status set', () => {
    expect(STAFF_TOUR_STATUSES.every((status) => isOneOf(TOUR_STATUSES, status))).toBe(true);
  });
});
