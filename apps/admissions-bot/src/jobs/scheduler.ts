import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { createLogger } from '@admissions/observability';
import type { JobReport, TourJobs } from './tour-jobs';

const log = createLogger('scheduler');

export interface JobSchedules {
  reminders: string;
  followups: string;
  statusCheck: string;
}

export class JobScheduler {
  private readonly tasks: ScheduledTask[] = [];

  constructor(
    private readonly jobs: TourJobs,
    private readonly schedules: JobSchedules,
    private readonly timezone: string,
  ) {}

  start(): void {
    this.register('tour-reminders', this.schedules.reminders, () => this.jobs.runReminders());
    this.register('tour-followups', this.schedules.followups, () => this.jobs.runFollowups());
    this.register('tour-status-check', this.schedules.statusCheck, () => this.jobs.runStatusCheck());
  }

  stop(): void {
    for (const task of this.tasks) task.stop();
    this.tasks.length = 0;
  }

  /** Runs a job, logging its report; never rejects */
  async runJob(name: string, run: () => Promise<JobReport>): Promise<void> {
    const startedAt = Date.now();
    try {
      const report = await run();
      log.info({ job: name, ...report, durationMs: Date.now() - startedAt }, 'Job finished');
    } catch (error) {
      log.error({ job: name, error: error instanceof Error ? error.message : String(error) }, 'Job failed');
    }
  }

  private register(name: string, expression: string, run: () => Promise<JobReport>): void {
    if (!cron.validate(expression)) {
      throw new Error(`Invalid cron expression for ${name}: ${expression}`);
    }
    const task = cron.schedule(
      expression,
      () => {
        void this.runJob(name, run);
      },
      { timezone: this.timezone },
    );
    this.tasks.push(task);
    log.info({ job: name, expression, timezone: this.timezone }, 'Job scheduled');
  }
}
