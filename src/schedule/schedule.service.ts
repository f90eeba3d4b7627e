import type { DateTime } from 'luxon';
import { DEFAULT_UPCOMING_WEEKS } from '../constants.js';
import { Logger } from '../logger.js';
import type { RosterProvider } from '../roster/roster.types.js';
import { generateRotation, type ShiftOccurrence } from '../rotation/rotation.generator.js';
import { startOfWeekMonday, toZonedDateTime } from '../utils/date.js';
import type { ScheduleStore } from './schedule.store.js';
import type { AssignmentDraft, ShiftAssignment } from './schedule.types.js';

const logger = new Logger('schedule');

export class InvalidDateRangeError extends Error {
  constructor(
    public readonly start: string,
    public readonly end: string,
  ) {
    super(`End date ${end} is before start date ${start}`);
    this.name = 'InvalidDateRangeError';
  }
}

export type Clock = () => DateTime;

function toDraft(occurrence: ShiftOccurrence): AssignmentDraft {
  return {
    participantId: occurrence.participant.id,
    templateId: occurrence.template.id,
    weekIndex: occurrence.weekIndex,
    start: occurrence.start,
    end: occurrence.end,
  };
}

/** Generation and query API over the roster and the schedule store. */
export class ScheduleService {
  constructor(
    private readonly roster: RosterProvider,
    private readonly store: ScheduleStore,
    private readonly timezone: string,
    private readonly clock: Clock,
  ) {}

  /**
   * Generates `weeks` weeks starting with the week containing `startDate`.
   * Fails with `ScheduleAlreadyExistsError` when any occurrence already exists, unless `force` is set.
   */
  generate(startDate: DateTime | string, weeks: number, force = false): ShiftAssignment[] {
    const drafts = this.buildDrafts(toZonedDateTime(startDate, this.timezone), weeks);
    logger.info(`Generating ${weeks} week(s) of schedule (${drafts.length} shifts)`, { force });
    return this.store.createRange(drafts, { force });
  }

  /**
   * Generates `weeks` weeks from `startDate`, picking up the rotation after `previous`: the first new shift goes
   * to the active participant following `previous.participantId`. Falls back to the head of the roster when that
   * participant has left the rotation.
   */
  continueAfter(previous: ShiftAssignment, startDate: DateTime | string, weeks: number): ShiftAssignment[] {
    const roster = this.roster.listActiveParticipantsOrdered();
    const position = roster.findIndex((participant) => participant.id === previous.participantId);
    if (position === -1) {
      logger.warn(`${previous.participantName} is no longer in the rotation; continuing from the top of the roster`);
    }
    const counterOffset = position + 1;
    const drafts = this.buildDrafts(toZonedDateTime(startDate, this.timezone), weeks, counterOffset);
    logger.info(`Continuing rotation after ${previous.participantName} for ${weeks} week(s) (${drafts.length} shifts)`);
    return this.store.createRange(drafts);
  }

  /**
   * Rebuilds everything starting on or after `fromDate` with the current roster.
   * The rotation restarts from the week containing `fromDate`; earlier assignments are left alone.
   */
  regenerate(fromDate: DateTime | string, weeks: number): ShiftAssignment[] {
    const from = toZonedDateTime(fromDate, this.timezone);
    const drafts = this.buildDrafts(from, weeks);
    logger.info(`Regenerating schedule from ${from.toISODate()} for ${weeks} week(s)`);
    return this.store.regenerateFrom(from, drafts);
  }

  /** Assignments starting in the current local week. */
  current(): ShiftAssignment[] {
    const monday = startOfWeekMonday(this.clock(), this.timezone);
    return this.store.findByDateRange(monday, monday.plus({ weeks: 1 }).minus({ milliseconds: 1 }));
  }

  upcoming(weeks = DEFAULT_UPCOMING_WEEKS): ShiftAssignment[] {
    return this.store.findUpcoming(this.clock().setZone(this.timezone), weeks);
  }

  forParticipant(participantId: number): ShiftAssignment[] {
    return this.store.findByParticipant(participantId);
  }

  nextForParticipant(participantId: number): ShiftAssignment | null {
    return this.store.findNextForParticipant(participantId, this.clock());
  }

  /** Both bounds inclusive; date-only strings cover the whole end day. */
  byDateRange(start: DateTime | string, end: DateTime | string): ShiftAssignment[] {
    const rangeStart = toZonedDateTime(start, this.timezone);
    let rangeEnd = toZonedDateTime(end, this.timezone);
    if (typeof end === 'string' && !end.includes('T')) {
      rangeEnd = rangeEnd.endOf('day');
    }
    if (rangeEnd < rangeStart) {
      throw new InvalidDateRangeError(String(rangeStart.toISO()), String(rangeEnd.toISO()));
    }
    return this.store.findByDateRange(rangeStart, rangeEnd);
  }

  private buildDrafts(startDate: DateTime, weeks: number, counterOffset = 0): AssignmentDraft[] {
    return generateRotation({
      roster: this.roster.listActiveParticipantsOrdered(),
      templates: this.roster.listShiftTemplatesOrdered(),
      startDate,
      weekCount: weeks,
      timezone: this.timezone,
      counterOffset,
    }).map(toDraft);
  }
}
