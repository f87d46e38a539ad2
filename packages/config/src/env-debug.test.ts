import { describe, expect, it } from 'vitest';
import { isWatchedEnv, redactEnvValue } from './env-debug';

describe('redactEnvValue', () => {
  it('masks secret-looking variables', () => {
    expect(redactEnvValue('TELEGRAM_BOT_TOKEN', 'test-secret')).toBe('te****et');
    expect(redactEnvValue('CRM_CLIENT_SECRET', 'abc')).toBe('****');
  });

  it('hides credentials embedded in urls', () => {
    expect(redactEnvValue('DATABASE_URL', 'postgres://bot:pw@localhost:5432/admissions')).toBe(
      'postgres://****@localhost:5432/admissions',
    );
  });

  it('leaves plain values alone', () => {
    expect(redactEnvValue('SCHOOL_TIMEZONE', 'Asia/Tashkent')).toBe('Asia/Tashkent');
  });
});

describe('isWatchedEnv', () => {
  it('covers the service settings', () => {
    for (const name of ['SCHOOL_TIMEZONE', 'KOMMO_ACCOUNT_URL', 'KOMMO_CLIENT_SECRET', 'CRM_REPLY_MARKER', 'REMINDER_CRON', 'SYNC_MAX_ATTEMPTS']) {
      expect(isWatchedEnv(name)).toBe(true);
    }
  });

  it('skips unrelated variables', () => {
    expect(isWatchedEnv('HOME')).toBe(false);
    expect(isWatchedEnv('TIMEZONE')).toBe(false);
  });
});
