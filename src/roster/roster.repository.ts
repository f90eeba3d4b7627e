import type Database from 'better-sqlite3';
import type { ParticipantEntity, ShiftTemplateEntity } from '../database/entities.js';
import { runInTransaction, runStatement } from '../database/persistence.js';
import { Logger } from '../logger.js';
import { isValidTimeOfDay } from '../utils/date.js';
import type { NewParticipant, NewShiftTemplate, Participant, RosterProvider, ShiftTemplate } from './roster.types.js';

const logger = new Logger('roster');

export class ParticipantNotFoundError extends Error {
  constructor(public readonly participantId: number) {
    super(`Participant ${participantId} not found`);
    this.name = 'ParticipantNotFoundError';
  }
}

export class RosterValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RosterValidationError';
  }
}

function toParticipant(row: ParticipantEntity): Participant {
  return {
    id: row.id,
    name: row.name,
    primaryAddress: row.primary_address,
    secondaryAddress: row.secondary_address,
    isActive: row.is_active === 1,
    rotationOrder: row.rotation_order,
  };
}

function toShiftTemplate(row: ShiftTemplateEntity): ShiftTemplate {
  const weekdays: unknown = JSON.parse(row.weekdays);
  return {
    id: row.id,
    shiftNumber: row.shift_number,
    weekdays: Array.isArray(weekdays) ? weekdays.filter((day): day is number => typeof day === 'number') : [],
    durationHours: row.duration_hours,
    startTime: row.start_time,
  };
}

/**
 * SQLite-backed roster: the ordered participant list and shift templates the rotation reads,
 * plus the maintenance operations that keep `rotation_order` contiguous (0..n-1) among active participants.
 */
export class RosterRepository implements RosterProvider {
  constructor(private readonly db: Database.Database) {}

  listActiveParticipantsOrdered(): Participant[] {
    const rows = runStatement('list active participants', () =>
      this.db
        .prepare(
          `
          SELECT * FROM participants
          WHERE is_active = 1
          ORDER BY rotation_order IS NULL, rotation_order, id
        `,
        )
        .all(),
    ) as ParticipantEntity[];
    return rows.map(toParticipant);
  }

  listAllParticipants(): Participant[] {
    const rows = runStatement('list participants', () =>
      this.db.prepare('SELECT * FROM participants ORDER BY id').all(),
    ) as ParticipantEntity[];
    return rows.map(toParticipant);
  }

  listShiftTemplatesOrdered(): ShiftTemplate[] {
    const rows = runStatement('list shift templates', () =>
      this.db.prepare('SELECT * FROM shift_templates ORDER BY shift_number').all(),
    ) as ShiftTemplateEntity[];
    return rows.map(toShiftTemplate);
  }

  getParticipant(id: number): Participant | null {
    const row = runStatement('get participant', () =>
      this.db.prepare('SELECT * FROM participants WHERE id = ?').get(id),
    ) as ParticipantEntity | undefined;
    return row ? toParticipant(row) : null;
  }

  /** Active participants are appended to the end of the rotation. */
  addParticipant(input: NewParticipant): Participant {
    if (!input.name.trim()) {
      throw new RosterValidationError('Participant name is required');
    }
    if (!input.primaryAddress.trim()) {
      throw new RosterValidationError('Participant primary address is required');
    }
    const isActive = input.isActive ?? true;

    const id = runInTransaction(this.db, 'add participant', () => {
      const rotationOrder = isActive ? this.nextRotationOrder() : null;
      const result = this.db
        .prepare(
          `
          INSERT INTO participants (name, primary_address, secondary_address, is_active, rotation_order)
          VALUES (?, ?, ?, ?, ?)
        `,
        )
        .run(input.name.trim(), input.primaryAddress.trim(), input.secondaryAddress ?? null, isActive ? 1 : 0, rotationOrder);
      return Number(result.lastInsertRowid);
    });

    return this.requireParticipant(id);
  }

  /**
   * Deactivation clears the participant's order and compacts the rest; reactivation appends at the end.
   * Both happen in one transaction so readers never see a gap or a duplicate.
   */
  setParticipantActive(id: number, active: boolean): Participant {
    runInTransaction(this.db, 'set participant active', () => {
      const current = this.requireParticipant(id);
      if (current.isActive === active) {
        return;
      }

      if (active) {
        this.db
          .prepare(
            `UPDATE participants SET is_active = 1, rotation_order = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?`,
          )
          .run(this.nextRotationOrder(), id);
      } else {
        this.db
          .prepare(
            `UPDATE participants SET is_active = 0, rotation_order = NULL, updated_at = CURRENT_TIMESTAMP WHERE id = ?`,
          )
          .run(id);
        this.compactRotationOrder();
      }
    });

    logger.info(`Participant ${id} ${active ? 'activated' : 'deactivated'}`);
    return this.requireParticipant(id);
  }

  /** `orderedIds` must list every active participant exactly once. */
  reorderParticipants(orderedIds: number[]): Participant[] {
    runInTransaction(this.db, 'reorder participants', () => {
      const activeIds = this.listActiveParticipantsOrdered().map((participant) => participant.id);
      const requested = new Set(orderedIds);
      if (
        requested.size !== orderedIds.length ||
        requested.size !== activeIds.length ||
        activeIds.some((activeId) => !requested.has(activeId))
      ) {
        throw new RosterValidationError('Rotation order must list every active participant exactly once');
      }

      // Clear first so the partial unique index never sees two rows on the same slot
      this.db.prepare('UPDATE participants SET rotation_order = NULL WHERE is_active = 1').run();
      const setOrder = this.db.prepare(
        'UPDATE participants SET rotation_order = ?, updated_at = CURRENT_TIMESTAMP WHERE id = ?',
      );
      orderedIds.forEach((participantId, index) => setOrder.run(index, participantId));
    });

    return this.listActiveParticipantsOrdered();
  }

  addShiftTemplate(input: NewShiftTemplate): ShiftTemplate {
    if (!Number.isInteger(input.shiftNumber)) {
      throw new RosterValidationError('Shift number must be an integer');
    }
    if (input.weekdays.length === 0 || input.weekdays.some((day) => !Number.isInteger(day) || day < 1 || day > 7)) {
      throw new RosterValidationError('Weekdays must be a non-empty list of ISO weekdays (1-7)');
    }
    if (!Number.isInteger(input.durationHours) || input.durationHours <= 0 || input.durationHours % 24 !== 0) {
      throw new RosterValidationError('Duration must be a positive multiple of 24 hours');
    }
    if (!isValidTimeOfDay(input.startTime)) {
      throw new RosterValidationError('Start time must be formatted as HH:mm');
    }

    const result = runStatement('add shift template', () =>
      this.db
        .prepare(
          `
          INSERT INTO shift_templates (shift_number, weekdays, duration_hours, start_time)
          VALUES (?, ?, ?, ?)
        `,
        )
        .run(input.shiftNumber, JSON.stringify(input.weekdays), input.durationHours, input.startTime),
    );

    return {
      id: Number(result.lastInsertRowid),
      shiftNumber: input.shiftNumber,
      weekdays: [...input.weekdays],
      durationHours: input.durationHours,
      startTime: input.startTime,
    };
  }

  private requireParticipant(id: number): Participant {
    const participant = this.getParticipant(id);
    if (!participant) {
      throw new ParticipantNotFoundError(id);
    }
    return participant;
  }

  private nextRotationOrder(): number {
    const row = this.db
      .prepare('SELECT MAX(rotation_order) AS max_order FROM participants WHERE is_active = 1')
      .get() as { max_order: number | null };
    return row.max_order === null ? 0 : row.max_order + 1;
  }

  private compactRotationOrder(): void {
    const setOrder = this.db.prepare('UPDATE participants SET rotation_order = ? WHERE id = ?');
    // Ascending walk: every target slot is already free when it is written
    this.listActiveParticipantsOrdered().forEach((participant, index) => {
      if (participant.rotationOrder !== index) {
        setOrder.run(index, participant.id);
      }
    });
  }
}
