export interface Participant {
  id: number;
  name: string;
  primaryAddress: string;
  secondaryAddress: string | null;
  isActive: boolean;
  /** Position in the rotation among active participants; null while inactive. */
  rotationOrder: number | null;
}

export interface ShiftTemplate {
  id: number;
  /** Unique; defines the order templates are filled in each week. */
  shiftNumber: number;
  /** ISO weekdays (1 = Monday … 7 = Sunday) the shift covers; the first one is the start day. */
  weekdays: number[];
  /** Positive multiple of 24. */
  durationHours: number;
  /** Local wall-clock start, `HH:mm`. */
  startTime: string;
}

/** Read-only view of the roster consumed by generation and manual dispatch. */
export interface RosterProvider {
  listActiveParticipantsOrdered(): Participant[];
  listShiftTemplatesOrdered(): ShiftTemplate[];
  getParticipant(id: number): Participant | null;
}

export interface NewParticipant {
  name: string;
  primaryAddress: string;
  secondaryAddress?: string | null;
  isActive?: boolean;
}

export interface NewShiftTemplate {
  shiftNumber: number;
  weekdays: number[];
  durationHours: number;
  startTime: string;
}
