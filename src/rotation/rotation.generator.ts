import type { DateTime } from 'luxon';
import type { Participant, ShiftTemplate } from '../roster/roster.types.js';
import { parseTimeOfDay, startOfWeekMonday, weekIndexOf } from '../utils/date.js';

export class NoParticipantsError extends Error {
  constructor() {
    super('No active participants available for rotation');
    this.name = 'NoParticipantsError';
  }
}

export class NoTemplatesError extends Error {
  constructor() {
    super('No shift templates configured. Create shift templates before generating a schedule.');
    this.name = 'NoTemplatesError';
  }
}

export class InvalidWeekCountError extends Error {
  constructor(public readonly weekCount: number) {
    super(`weekCount must be a positive integer, got ${weekCount}`);
    this.name = 'InvalidWeekCountError';
  }
}

export interface RotationInput {
  /** Active participants in rotation order. */
  roster: readonly Participant[];
  /** Templates in shift-number order. */
  templates: readonly ShiftTemplate[];
  /** Any moment in the first week; normalised to that week's Monday. */
  startDate: DateTime;
  weekCount: number;
  timezone: string;
  /** Shifts already handed out before `startDate`; the first occurrence goes to `roster[counterOffset % N]`. */
  counterOffset?: number;
}

/** One concrete instance of a template in a given week. */
export interface ShiftOccurrence {
  participant: Participant;
  template: ShiftTemplate;
  /** Week relative to the generation start (0-based). */
  weekOffset: number;
  /** Absolute week number, see `weekIndexOf`. */
  weekIndex: number;
  start: DateTime;
  end: DateTime;
}

/**
 * Circular rotation: a single counter advances across every occurrence (week by week, template by template)
 * and picks `roster[shiftsElapsed % N]`. No per-week balancing is applied; fairness comes from the counter.
 */
export function generateRotation({
  roster,
  templates,
  startDate,
  weekCount,
  timezone,
  counterOffset = 0,
}: RotationInput): ShiftOccurrence[] {
  if (roster.length === 0) {
    throw new NoParticipantsError();
  }
  if (templates.length === 0) {
    throw new NoTemplatesError();
  }
  if (!Number.isInteger(weekCount) || weekCount < 1) {
    throw new InvalidWeekCountError(weekCount);
  }

  const firstMonday = startOfWeekMonday(startDate, timezone);
  const occurrences: ShiftOccurrence[] = [];

  for (let week = 0; week < weekCount; week++) {
    const monday = firstMonday.plus({ weeks: week });
    const weekIndex = weekIndexOf(monday, timezone);

    templates.forEach((template, templateIndex) => {
      const shiftsElapsed = counterOffset + week * templates.length + templateIndex;
      const participant = roster[shiftsElapsed % roster.length];
      const start = occurrenceStart(monday, template);

      occurrences.push({
        participant,
        template,
        weekOffset: week,
        weekIndex,
        start,
        // Whole days of wall-clock time: a 24h shift spanning a DST change still ends at its local start time
        end: start.plus({ days: template.durationHours / 24 }),
      });
    });
  }

  return occurrences;
}

function occurrenceStart(monday: DateTime, template: ShiftTemplate): DateTime {
  const { hour, minute } = parseTimeOfDay(template.startTime);
  const startWeekday = template.weekdays[0] ?? 1;
  return monday.plus({ days: startWeekday - 1 }).set({ hour, minute, second: 0, millisecond: 0 });
}
