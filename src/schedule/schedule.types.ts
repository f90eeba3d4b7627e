import type { DateTime } from 'luxon';

/** A persisted shift occurrence, joined with what dispatch and display need. */
export interface ShiftAssignment {
  id: number;
  participantId: number;
  participantName: string;
  primaryAddress: string;
  secondaryAddress: string | null;
  templateId: number;
  shiftNumber: number;
  durationHours: number;
  weekIndex: number;
  start: DateTime;
  end: DateTime;
  notified: boolean;
  notifiedAt: DateTime | null;
}

/** What generation hands to the store. */
export interface AssignmentDraft {
  participantId: number;
  templateId: number;
  weekIndex: number;
  start: DateTime;
  end: DateTime;
}

export interface AssignmentKey {
  templateId: number;
  weekIndex: number;
}
