import schedule, { type RecurrenceSpecObjLit } from 'node-schedule';
import type { TimeOfDay } from '../config.js';

export interface ScheduledJobHandle {
  nextInvocation(): Date | null;
  cancel(): void;
}

/** Local time of day in `tz`; every day, or only on `weekday` (ISO, 1 = Monday) when set. */
export interface RecurrenceRule extends TimeOfDay {
  readonly tz: string;
  readonly weekday?: number;
}

/** Timer backend for the coordinator; swapped for a manual one in tests. */
export interface JobScheduler {
  scheduleRecurring(name: string, rule: RecurrenceRule, onTick: (fireDate: Date) => void): ScheduledJobHandle;
}

export class NodeScheduleJobScheduler implements JobScheduler {
  scheduleRecurring(name: string, rule: RecurrenceRule, onTick: (fireDate: Date) => void): ScheduledJobHandle {
    const spec: RecurrenceSpecObjLit = { hour: rule.hour, minute: rule.minute, tz: rule.tz };
    if (rule.weekday !== undefined) {
      // node-schedule counts Sunday as 0
      spec.dayOfWeek = rule.weekday % 7;
    }
    const job = schedule.scheduleJob(name, spec, (fireDate) => onTick(fireDate));

    return {
      nextInvocation: () => {
        const next = job.nextInvocation();
        // node-schedule hands back its own date wrapper
        return next ? new Date(next.getTime()) : null;
      },
      cancel: () => {
        job.cancel();
      },
    };
  }
}
