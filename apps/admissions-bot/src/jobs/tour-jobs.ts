import { createLogger } from '@admissions/observability';
import type { ChatGateway, OutgoingMessage } from '../chat/types';
import { shiftDate, todayIn } from '../domain/schedule';
import type { FunnelSettings } from '../domain/settings';
import type { TourFlag, TourRecord } from '../domain/types';
import { tourFollowup, tourReminder } from '../funnel/prompts';
import { tourStatusCheck } from '../funnel/staff-notices';
import type { Translator } from '../i18n/translator';
import type { TourRepository } from '../store/types';

const log = createLogger('tour-jobs');

export interface JobReport {
  candidates: number;
  sent: number;
  failed: number;
}

export interface TourJobsDeps {
  tours: TourRepository;
  chat: ChatGateway;
  t: Translator;
  settings: FunnelSettings;
  clock?: () => Date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Daily batch work over tours. A failing tour is logged and skipped;
 * each run always returns its report.
 */
export class TourJobs {
  private readonly clock: () => Date;

  constructor(private readonly deps: TourJobsDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  private relativeDate(days: number): string {
    return shiftDate(todayIn(this.deps.settings.timezone, this.clock()), days);
  }

  /** Reminds parents of tomorrow's booked tours, once per tour */
  async runReminders(): Promise<JobReport> {
    const candidates = await this.deps.tours.findDueForReminder(this.relativeDate(1));
    return this.sendClaimed(candidates, 'reminderSent', 'booked', (tour) =>
      tourReminder(this.deps.t, this.deps.settings, tour),
    );
  }

  /** Thanks parents who attended yesterday, once per tour */
  async runFollowups(): Promise<JobReport> {
    const candidates = await this.deps.tours.findDueForFollowup(this.relativeDate(-1));
    return this.sendClaimed(candidates, 'followupSent', 'attended', (tour) => tourFollowup(this.deps.t, tour));
  }

  /**
   * Asks staff to resolve yesterday's tours that are still `booked`.
   * Nothing is marked, so an unresolved tour comes up again on the next run.
   */
  async runStatusCheck(): Promise<JobReport> {
    const report: JobReport = { candidates: 0, sent: 0, failed: 0 };
    const { staffChatId } = this.deps.settings;
    if (staffChatId === null) {
      log.info('No staff chat configured, status check skipped');
      return report;
    }

    const candidates = await this.deps.tours.findUnresolved(this.relativeDate(-1));
    report.candidates = candidates.length;
    for (const tour of candidates) {
      try {
        await this.deps.chat.send(staffChatId, tourStatusCheck(tour));
        report.sent += 1;
      } catch (error) {
        report.failed += 1;
        log.error({ tourId: tour.id, error: errorMessage(error) }, 'Status check not delivered');
      }
    }
    return report;
  }

  private async sendClaimed(
    candidates: TourRecord[],
    flag: TourFlag,
    status: TourRecord['status'],
    render: (tour: TourRecord) => OutgoingMessage,
  ): Promise<JobReport> {
    const { tours, chat } = this.deps;
    const report: JobReport = { candidates: candidates.length, sent: 0, failed: 0 };

    for (const tour of candidates) {
      let claimed = false;
      try {
        claimed = await tours.claimFlag(tour.id, flag, status);
        if (!claimed) continue;
        await chat.send(tour.userId, render(tour));
        report.sent += 1;
      } catch (error) {
        report.failed += 1;
        log.error({ tourId: tour.id, flag, error: errorMessage(error) }, 'Tour message not delivered');
        if (claimed) await this.release(tour.id, flag);
      }
    }
    return report;
  }

  private async release(tourId: number, flag: TourFlag): Promise<void> {
    try {
      await this.deps.tours.releaseFlag(tourId, flag);
    } catch (error) {
      log.error({ tourId, flag, error: errorMessage(error) }, 'Claim not released');
    }
  }
}
