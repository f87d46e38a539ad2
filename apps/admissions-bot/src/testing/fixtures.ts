import type { FunnelSettings } from '../domain/settings';
import { emptyAnswers } from '../domain/types';
import type { FunnelAnswers, TourRecord, UserRecord } from '../domain/types';
import { CatalogTranslator, loadCatalog } from '../i18n/translator';

export const TEST_NOW = new Date('2026-10-18T07:00:00Z');
export const TEST_TODAY = '2026-10-18';

export const testSettings: FunnelSettings = {
  campuses: [
    { id: 'mu', address: '1 Test Street', map: 'https://maps.example.test/mu' },
    { id: 'yashnobod', address: '2 Test Avenue', map: 'https://maps.example.test/yashnobod' },
  ],
  tourTimes: ['10:00', '14:00', '16:00'],
  tourWeekdays: [1, 3, 5],
  timezone: 'Asia/Tashkent',
  defaultLocale: 'ru',
  phonePrefix: '+998',
  channelLink: 'https://t.me/test_channel',
  contactPhone: '+998 00 000 00 00',
  staffChatId: '-100200',
};

export const testTranslator = new CatalogTranslator(loadCatalog(), 'ru', { school: 'Test School' });

export function makeUser(overrides: Partial<Omit<UserRecord, 'answers'>> = {}, answers: Partial<FunnelAnswers> = {}): UserRecord {
  return {
    id: '1001',
    username: 'parent',
    language: 'en',
    state: 'start',
    version: 0,
    createdAt: TEST_NOW,
    updatedAt: TEST_NOW,
    ...overrides,
    answers: { ...emptyAnswers(), ...answers },
  };
}

export function makeTour(overrides: Partial<TourRecord> = {}): TourRecord {
  return {
    id: 1,
    userId: '1001',
    phone: '+998901234567',
    campus: 'mu',
    date: '2026-10-19',
    time: '14:00',
    language: 'en',
    status: 'booked',
    reminderSent: false,
    followupSent: false,
    createdAt: TEST_NOW,
    updatedAt: TEST_NOW,
    ...overrides,
  };
}
