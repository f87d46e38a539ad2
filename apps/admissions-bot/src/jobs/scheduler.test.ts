import { beforeEach, describe, expect, it, vi } from 'vitest';
import cron from 'node-cron';
import { MemoryStore } from '../store/memory.store';
import { FakeChatGateway } from '../testing/fakes';
import { testSettings, testTranslator } from '../testing/fixtures';
import { JobScheduler } from './scheduler';
import { TourJobs } from './tour-jobs';

vi.mock('node-cron', () => ({
  default: {
    validate: vi.fn((expression: string) => expression.split(' ').length === 5),
    schedule: vi.fn(() => ({ stop: vi.fn() })),
  },
}));

const schedules = { reminders: '0 10 * * *', followups: '0 11 * * *', statusCheck: '0 12 * * *' };

function makeJobs(): TourJobs {
  const store = new MemoryStore();
  return new TourJobs({ tours: store.tours, chat: new FakeChatGateway(), t: testTranslator, settings: testSettings });
}

describe('JobScheduler', () => {
  beforeEach(() => {
    vi.mocked(cron.schedule).mockClear();
  });

  it('schedules the three jobs in the school timezone', () => {
    const scheduler = new JobScheduler(makeJobs(), schedules, 'Asia/Tashkent');
    scheduler.start();

    const calls = vi.mocked(cron.schedule).mock.calls;
    expect(calls.map((call) => call[0])).toEqual(['0 10 * * *', '0 11 * * *', '0 12 * * *']);
    expect(calls.map((call) => call[2])).toEqual([
      { timezone: 'Asia/Tashkent' },
      { timezone: 'Asia/Tashkent' },
      { timezone: 'Asia/Tashkent' },
    ]);
    scheduler.stop();
  });

  it('refuses an invalid expression', () => {
    const scheduler = new JobScheduler(makeJobs(), { ...schedules, followups: 'every morning' }, 'Asia/Tashkent');
    expect(() => scheduler.start()).toThrow('Invalid cron expression for tour-followups: every morning');
  });

  it('swallows a failing job', async () => {
    const scheduler = new JobScheduler(makeJobs(), schedules, 'Asia/Tashkent');
    await expect(scheduler.runJob('broken', () => Promise.reject(new Error('db down')))).resolves.toBeUndefined();
  });
});
