import type { DateTime } from 'luxon';
import type { AutoRenewConfig } from '../config.js';
import { Logger } from '../logger.js';
import { startOfWeekMonday } from '../utils/date.js';
import type { ScheduleService } from './schedule.service.js';
import type { ScheduleStore } from './schedule.store.js';

const logger = new Logger('schedule-renewal');

export interface RenewalResult {
  renewed: boolean;
  /** Whole and fractional weeks between now and the last assignment end; null when nothing is scheduled. */
  weeksRemaining: number | null;
  created: number;
}

/** Keeps the schedule topped up so the daily dispatch never runs out of assignments. */
export class ScheduleRenewal {
  constructor(
    private readonly store: ScheduleStore,
    private readonly service: ScheduleService,
    private readonly config: Pick<AutoRenewConfig, 'thresholdWeeks' | 'renewWeeks'>,
    private readonly timezone: string,
  ) {}

  check(now: DateTime): RenewalResult {
    const latestEnd = this.store.findLatestEnd();
    const latestStart = this.store.findLatestStart();
    const latest = this.store.findLatest();
    if (!latestEnd || !latestStart || !latest) {
      logger.warn('No schedule exists yet; generate one before auto-renewal can extend it');
      return { renewed: false, weeksRemaining: null, created: 0 };
    }

    const weeksRemaining = latestEnd.diff(now, 'weeks').weeks;
    if (weeksRemaining >= this.config.thresholdWeeks) {
      logger.debug(`Schedule covers ${weeksRemaining.toFixed(1)} more weeks, no renewal needed`);
      return { renewed: false, weeksRemaining, created: 0 };
    }

    const nextMonday = startOfWeekMonday(latestStart, this.timezone).plus({ weeks: 1 });
    logger.info(`Schedule ends in ${weeksRemaining.toFixed(1)} weeks, renewing from ${nextMonday.toISODate()}`, {
      weeks: this.config.renewWeeks,
    });
    const created = this.service.continueAfter(latest, nextMonday, this.config.renewWeeks);
    return { renewed: true, weeksRemaining, created: created.length };
  }
}
