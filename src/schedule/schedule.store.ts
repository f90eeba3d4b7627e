import type Database from 'better-sqlite3';
import type { DateTime } from 'luxon';
import type { ShiftAssignmentEntity, ShiftAssignmentRow } from '../database/entities.js';
import { runInTransaction, runStatement } from '../database/persistence.js';
import { Logger } from '../logger.js';
import { fromStorageTimestamp, toStorageTimestamp } from '../utils/date.js';
import type { AssignmentDraft, AssignmentKey, ShiftAssignment } from './schedule.types.js';

const logger = new Logger('schedule-store');

export class ScheduleAlreadyExistsError extends Error {
  constructor(public readonly conflicts: AssignmentKey[]) {
    super(
      `Schedule already exists for ${conflicts.length} requested shift occurrence(s). Use force to replace them.`,
    );
    this.name = 'ScheduleAlreadyExistsError';
  }
}

export interface CreateRangeOptions {
  /** Replace existing rows for the requested keys instead of failing. */
  force?: boolean;
}

const SELECT_ASSIGNMENTS = `
  SELECT
    sa.*,
    p.name AS participant_name,
    p.primary_address,
    p.secondary_address,
    st.shift_number,
    st.duration_hours
  FROM shift_assignments sa
  JOIN participants p ON p.id = sa.participant_id
  JOIN shift_templates st ON st.id = sa.template_id
`;

/**
 * Persistence for shift assignments. Every write is a single transaction:
 * a range is created completely or not at all, and regeneration never exposes a half-replaced schedule.
 */
export class ScheduleStore {
  constructor(
    private readonly db: Database.Database,
    private readonly timezone: string,
  ) {}

  /**
   * Inserts the drafts. Conflicting (template, week) keys fail the whole call unless `force` is set,
   * in which case the conflicting rows are replaced in the same transaction.
   */
  createRange(drafts: AssignmentDraft[], { force = false }: CreateRangeOptions = {}): ShiftAssignment[] {
    if (drafts.length === 0) {
      logger.warn('No schedule entries to save');
      return [];
    }

    const ids = runInTransaction(this.db, 'create schedule range', () => {
      const existing = drafts
        .map((draft) => this.findEntityByKey(draft))
        .filter((row): row is ShiftAssignmentEntity => row !== undefined);

      if (existing.length > 0 && !force) {
        throw new ScheduleAlreadyExistsError(
          existing.map((row) => ({ templateId: row.template_id, weekIndex: row.week_index })),
        );
      }

      if (existing.length > 0) {
        logger.info(`Force-replacing ${existing.length} existing assignments`);
        const deleteById = this.db.prepare('DELETE FROM shift_assignments WHERE id = ?');
        for (const row of existing) {
          deleteById.run(row.id);
        }
      }

      return drafts.map((draft) => this.insertDraft(draft, existing));
    });

    logger.info(`Saved ${ids.length} assignments`);
    return this.findByIds(ids);
  }

  /**
   * Deletes every assignment starting on or after `from` and inserts the drafts that also start on or after `from`.
   * Rows starting earlier are history and are never touched; drafts whose key such a row still holds are skipped.
   */
  regenerateFrom(from: DateTime, drafts: AssignmentDraft[]): ShiftAssignment[] {
    const fromTimestamp = toStorageTimestamp(from);

    const ids = runInTransaction(this.db, 'regenerate schedule', () => {
      const replaced = this.db
        .prepare('SELECT * FROM shift_assignments WHERE start_at >= ?')
        .all(fromTimestamp) as ShiftAssignmentEntity[];

      const deleted = this.db.prepare('DELETE FROM shift_assignments WHERE start_at >= ?').run(fromTimestamp);
      logger.info(`Deleted ${deleted.changes} assignments starting on or after ${from.toISO()}`);

      const inserted: number[] = [];
      for (const draft of drafts) {
        if (toStorageTimestamp(draft.start) < fromTimestamp) {
          continue;
        }
        if (this.findEntityByKey(draft)) {
          logger.warn('Skipping regenerated occurrence whose key is held by an earlier assignment', {
            templateId: draft.templateId,
            weekIndex: draft.weekIndex,
          });
          continue;
        }
        inserted.push(this.insertDraft(draft, replaced));
      }
      return inserted;
    });

    return this.findByIds(ids);
  }

  findById(id: number): ShiftAssignment | null {
    const row = runStatement('find assignment', () =>
      this.db.prepare(`${SELECT_ASSIGNMENTS} WHERE sa.id = ?`).get(id),
    ) as ShiftAssignmentRow | undefined;
    return row ? this.toAssignment(row) : null;
  }

  /** Assignments starting within `[start, end]`, ordered by start. */
  findByDateRange(start: DateTime, end: DateTime): ShiftAssignment[] {
    const rows = runStatement('find assignments by date range', () =>
      this.db
        .prepare(`${SELECT_ASSIGNMENTS} WHERE sa.start_at >= ? AND sa.start_at <= ? ORDER BY sa.start_at, st.shift_number`)
        .all(toStorageTimestamp(start), toStorageTimestamp(end)),
    ) as ShiftAssignmentRow[];
    return rows.map((row) => this.toAssignment(row));
  }

  findByParticipant(participantId: number, range?: { start?: DateTime; end?: DateTime }): ShiftAssignment[] {
    const conditions = ['sa.participant_id = ?'];
    const params: (string | number)[] = [participantId];
    if (range?.start) {
      conditions.push('sa.start_at >= ?');
      params.push(toStorageTimestamp(range.start));
    }
    if (range?.end) {
      conditions.push('sa.start_at <= ?');
      params.push(toStorageTimestamp(range.end));
    }

    const rows = runStatement('find assignments by participant', () =>
      this.db.prepare(`${SELECT_ASSIGNMENTS} WHERE ${conditions.join(' AND ')} ORDER BY sa.start_at`).all(...params),
    ) as ShiftAssignmentRow[];
    return rows.map((row) => this.toAssignment(row));
  }

  /** Assignments starting between `now` and `now + weeks`. */
  findUpcoming(now: DateTime, weeks: number): ShiftAssignment[] {
    return this.findByDateRange(now, now.plus({ weeks }));
  }

  findNextForParticipant(participantId: number, now: DateTime): ShiftAssignment | null {
    const row = runStatement('find next assignment', () =>
      this.db
        .prepare(`${SELECT_ASSIGNMENTS} WHERE sa.participant_id = ? AND sa.start_at >= ? ORDER BY sa.start_at LIMIT 1`)
        .get(participantId, toStorageTimestamp(now)),
    ) as ShiftAssignmentRow | undefined;
    return row ? this.toAssignment(row) : null;
  }

  /** Unnotified assignments starting within `[windowStart, windowEnd)`. */
  findDue(windowStart: DateTime, windowEnd: DateTime): ShiftAssignment[] {
    const rows = runStatement('find due assignments', () =>
      this.db
        .prepare(
          `${SELECT_ASSIGNMENTS}
          WHERE sa.notified = 0 AND sa.start_at >= ? AND sa.start_at < ?
          ORDER BY sa.start_at, st.shift_number`,
        )
        .all(toStorageTimestamp(windowStart), toStorageTimestamp(windowEnd)),
    ) as ShiftAssignmentRow[];
    return rows.map((row) => this.toAssignment(row));
  }

  /** Meant to run inside the caller's transaction together with the matching `sent` record. */
  markNotified(id: number, at: DateTime): void {
    this.db
      .prepare('UPDATE shift_assignments SET notified = 1, notified_at = ? WHERE id = ?')
      .run(toStorageTimestamp(at), id);
  }

  findLatestStart(): DateTime | null {
    const row = runStatement('find latest start', () =>
      this.db.prepare('SELECT MAX(start_at) AS value FROM shift_assignments').get(),
    ) as { value: string | null };
    return row.value ? fromStorageTimestamp(row.value, this.timezone) : null;
  }

  /** Last occurrence in rotation order: highest week, then highest shift number. */
  findLatest(): ShiftAssignment | null {
    const row = runStatement('find latest assignment', () =>
      this.db.prepare(`${SELECT_ASSIGNMENTS} ORDER BY sa.week_index DESC, st.shift_number DESC LIMIT 1`).get(),
    ) as ShiftAssignmentRow | undefined;
    return row ? this.toAssignment(row) : null;
  }

  findLatestEnd(): DateTime | null {
    const row = runStatement('find latest end', () =>
      this.db.prepare('SELECT MAX(end_at) AS value FROM shift_assignments').get(),
    ) as { value: string | null };
    return row.value ? fromStorageTimestamp(row.value, this.timezone) : null;
  }

  private findEntityByKey(key: AssignmentKey): ShiftAssignmentEntity | undefined {
    return this.db
      .prepare('SELECT * FROM shift_assignments WHERE template_id = ? AND week_index = ?')
      .get(key.templateId, key.weekIndex) as ShiftAssignmentEntity | undefined;
  }

  /** A replaced row for the same key and participant passes its notified state on. */
  private insertDraft(draft: AssignmentDraft, replaced: ShiftAssignmentEntity[]): number {
    const previous = replaced.find(
      (row) =>
        row.template_id === draft.templateId &&
        row.week_index === draft.weekIndex &&
        row.participant_id === draft.participantId &&
        row.notified === 1,
    );

    const result = this.db
      .prepare(
        `
        INSERT INTO shift_assignments (participant_id, template_id, week_index, start_at, end_at, notified, notified_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `,
      )
      .run(
        draft.participantId,
        draft.templateId,
        draft.weekIndex,
        toStorageTimestamp(draft.start),
        toStorageTimestamp(draft.end),
        previous ? 1 : 0,
        previous ? previous.notified_at : null,
      );
    return Number(result.lastInsertRowid);
  }

  private findByIds(ids: number[]): ShiftAssignment[] {
    if (ids.length === 0) {
      return [];
    }
    const placeholders = ids.map(() => '?').join(',');
    const rows = runStatement('load assignments', () =>
      this.db
        .prepare(`${SELECT_ASSIGNMENTS} WHERE sa.id IN (${placeholders}) ORDER BY sa.start_at, st.shift_number`)
        .all(...ids),
    ) as ShiftAssignmentRow[];
    return rows.map((row) => this.toAssignment(row));
  }

  private toAssignment(row: ShiftAssignmentRow): ShiftAssignment {
    return {
      id: row.id,
      participantId: row.participant_id,
      participantName: row.participant_name,
      primaryAddress: row.primary_address,
      secondaryAddress: row.secondary_address,
      templateId: row.template_id,
      shiftNumber: row.shift_number,
      durationHours: row.duration_hours,
      weekIndex: row.week_index,
      start: fromStorageTimestamp(row.start_at, this.timezone),
      end: fromStorageTimestamp(row.end_at, this.timezone),
      notified: row.notified === 1,
      notifiedAt: row.notified_at ? fromStorageTimestamp(row.notified_at, this.timezone) : null,
    };
  }
}
