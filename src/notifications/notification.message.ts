import type { DateTime } from 'luxon';
import { MASK_VISIBLE_CHARS, SMS_SEGMENT_LENGTH } from '../constants.js';
import type { ShiftAssignment } from '../schedule/schedule.types.js';

const ELLIPSIS = '...';

/** Keeps a message inside one SMS segment. */
export function truncateToSegment(message: string, limit = SMS_SEGMENT_LENGTH): string {
  if (message.length <= limit) {
    return message;
  }
  return message.slice(0, limit - ELLIPSIS.length) + ELLIPSIS;
}

export function composeShiftStartMessage(
  senderName: string,
  assignment: Pick<ShiftAssignment, 'participantName' | 'durationHours' | 'end'>,
): string {
  const until = assignment.end.toFormat('ccc hh:mm a');
  return truncateToSegment(
    `${senderName}: ${assignment.participantName}, your on-call shift has started.\n` +
      `Duration: ${assignment.durationHours}h (until ${until})\n` +
      'Questions? Contact admin.',
  );
}

export function composeManualMessage(senderName: string, participantName: string): string {
  return truncateToSegment(`${senderName}: Test notification for ${participantName}.`);
}

/**
 * One line per shift of the week, in start order: `Tue-Wed 08:00 Bob` for a shift spanning two days.
 * Not truncated; the summary is sent as a multi-segment message.
 */
export function composeWeeklySummary(
  senderName: string,
  weekStart: DateTime,
  assignments: Pick<ShiftAssignment, 'participantName' | 'start' | 'end' | 'durationHours'>[],
): string {
  const week = weekStart.toFormat('LLL d');
  if (assignments.length === 0) {
    return `${senderName}: No on-call shifts scheduled for the week of ${week}.`;
  }

  const lines = assignments.map((assignment) => {
    const firstDay = assignment.start.toFormat('ccc');
    const lastDay = assignment.end.minus({ days: 1 }).toFormat('ccc');
    const days = assignment.durationHours > 24 ? `${firstDay}-${lastDay}` : firstDay;
    return `${days} ${assignment.start.toFormat('HH:mm')} ${assignment.participantName}`;
  });
  return [`${senderName}: On-call schedule for the week of ${week}`, ...lines].join('\n');
}

/** `+15551234567` → `********4567`; anything of four characters or fewer is fully hidden. */
export function maskAddress(address: string): string {
  if (address.length <= MASK_VISIBLE_CHARS) {
    return '*'.repeat(MASK_VISIBLE_CHARS);
  }
  return '*'.repeat(address.length - MASK_VISIBLE_CHARS) + address.slice(-MASK_VISIBLE_CHARS);
}
