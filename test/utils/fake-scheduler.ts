import type { DateTime } from 'luxon';
import type { JobScheduler, RecurrenceRule, ScheduledJobHandle } from '../../src/jobs/job.scheduler.js';

interface RegisteredJob {
  rule: RecurrenceRule;
  onTick: (fireDate: Date) => void;
  cancelled: boolean;
}

/** Scheduler whose ticks are fired by the test. */
export class ManualJobScheduler implements JobScheduler {
  readonly jobs = new Map<string, RegisteredJob>();
  registrations = 0;

  constructor(private readonly now: () => DateTime) {}

  scheduleRecurring(name: string, rule: RecurrenceRule, onTick: (fireDate: Date) => void): ScheduledJobHandle {
    const job: RegisteredJob = { rule, onTick, cancelled: false };
    this.jobs.set(name, job);
    this.registrations++;

    return {
      nextInvocation: () => {
        if (job.cancelled) {
          return null;
        }
        const now = this.now().setZone(rule.tz);
        let next = now.set({ hour: rule.hour, minute: rule.minute, second: 0, millisecond: 0 });
        while (next <= now || (rule.weekday !== undefined && next.weekday !== rule.weekday)) {
          next = next.plus({ days: 1 });
        }
        return next.toJSDate();
      },
      cancel: () => {
        job.cancelled = true;
      },
    };
  }

  /** Fires a job as the timer library would. */
  fire(name: string, fireDate: DateTime): void {
    const job = this.jobs.get(name);
    if (!job || job.cancelled) {
      throw new Error(`No active job named ${name}`);
    }
    job.onTick(fireDate.toJSDate());
  }
}
