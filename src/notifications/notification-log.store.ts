import type Database from 'better-sqlite3';
import { countBy } from 'lodash-es';
import type { DateTime } from 'luxon';
import type { NotificationRecordEntity } from '../database/entities.js';
import { runStatement } from '../database/persistence.js';
import { fromStorageTimestamp, toStorageTimestamp } from '../utils/date.js';
import type {
  NewNotificationRecord,
  NotificationRecord,
  NotificationSource,
  NotificationStats,
  NotificationStatus,
} from './notification.types.js';

function toStatus(value: string): NotificationStatus {
  return value === 'sent' || value === 'failed' ? value : 'pending';
}

function toSource(value: string): NotificationSource {
  return value === 'manual' || value === 'escalation' ? value : 'scheduled';
}

/**
 * Append-only audit log of notification deliveries.
 * No update or delete methods; the schema's triggers reject both.
 */
export class NotificationLogStore {
  constructor(
    private readonly db: Database.Database,
    private readonly timezone: string,
    private readonly clock: () => DateTime,
  ) {}

  /**
   * Writes one record. Callers that need the write to be atomic with other changes
   * (the `sent` record and the assignment's notified flag) run this inside their own transaction.
   */
  append(record: NewNotificationRecord): NotificationRecord {
    const result = runStatement('append notification record', () =>
      this.db
        .prepare(
          `
          INSERT INTO notification_records (
            assignment_id, participant_id, recipient_name, recipient_address,
            status, provider_id, error_message, attempts, source, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        `,
        )
        .run(
          record.assignmentId,
          record.participantId,
          record.recipientName,
          record.recipientAddress,
          record.status,
          record.providerId,
          record.errorMessage,
          record.attempts,
          record.source,
          toStorageTimestamp(this.clock()),
        ),
    );

    const stored = this.findById(Number(result.lastInsertRowid));
    if (!stored) {
      throw new Error(`Notification record ${result.lastInsertRowid} vanished after insert`);
    }
    return stored;
  }

  findById(id: number): NotificationRecord | null {
    const row = runStatement('find notification record', () =>
      this.db.prepare('SELECT * FROM notification_records WHERE id = ?').get(id),
    ) as NotificationRecordEntity | undefined;
    return row ? this.toRecord(row) : null;
  }

  listRecent(limit = 50): NotificationRecord[] {
    const rows = runStatement('list recent notification records', () =>
      this.db.prepare('SELECT * FROM notification_records ORDER BY created_at DESC, id DESC LIMIT ?').all(limit),
    ) as NotificationRecordEntity[];
    return rows.map((row) => this.toRecord(row));
  }

  listFailed(since?: DateTime): NotificationRecord[] {
    const rows = runStatement('list failed notification records', () =>
      since
        ? this.db
            .prepare(
              `SELECT * FROM notification_records WHERE status = 'failed' AND created_at >= ? ORDER BY created_at DESC, id DESC`,
            )
            .all(toStorageTimestamp(since))
        : this.db
            .prepare(`SELECT * FROM notification_records WHERE status = 'failed' ORDER BY created_at DESC, id DESC`)
            .all(),
    ) as NotificationRecordEntity[];
    return rows.map((row) => this.toRecord(row));
  }

  listByAssignment(assignmentId: number): NotificationRecord[] {
    const rows = runStatement('list notification records by assignment', () =>
      this.db.prepare('SELECT * FROM notification_records WHERE assignment_id = ? ORDER BY id').all(assignmentId),
    ) as NotificationRecordEntity[];
    return rows.map((row) => this.toRecord(row));
  }

  findByProviderId(providerId: string): NotificationRecord | null {
    const row = runStatement('find notification record by provider id', () =>
      this.db.prepare('SELECT * FROM notification_records WHERE provider_id = ? ORDER BY id DESC LIMIT 1').get(providerId),
    ) as NotificationRecordEntity | undefined;
    return row ? this.toRecord(row) : null;
  }

  getStats(since?: DateTime): NotificationStats {
    const rows = runStatement('notification stats', () =>
      since
        ? this.db.prepare('SELECT status FROM notification_records WHERE created_at >= ?').all(toStorageTimestamp(since))
        : this.db.prepare('SELECT status FROM notification_records').all(),
    ) as { status: string }[];

    const counts = countBy(rows, (row) => row.status);
    const total = rows.length;
    const sent = counts.sent ?? 0;

    return {
      total,
      sent,
      failed: counts.failed ?? 0,
      pending: counts.pending ?? 0,
      successRate: total === 0 ? 0 : Math.round((sent / total) * 10000) / 100,
    };
  }

  private toRecord(row: NotificationRecordEntity): NotificationRecord {
    return {
      id: row.id,
      assignmentId: row.assignment_id,
      participantId: row.participant_id,
      recipientName: row.recipient_name,
      recipientAddress: row.recipient_address,
      status: toStatus(row.status),
      providerId: row.provider_id,
      errorMessage: row.error_message,
      attempts: row.attempts,
      source: toSource(row.source),
      createdAt: fromStorageTimestamp(row.created_at, this.timezone),
    };
  }
}
