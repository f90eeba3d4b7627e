import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { DateTime } from 'luxon';
import { cleanupTestDatabase, createTestDatabaseWithMigrations, seedRoster } from '../../test/utils/database.js';
import {
  SAMPLE_PARTICIPANTS,
  SAMPLE_TEMPLATES,
  TEST_MONDAY,
  TEST_TIMEZONE,
  createTestClock,
} from '../../test/fixtures/test-data.js';
import { RosterRepository } from '../roster/roster.repository.js';
import { ScheduleService } from '../schedule/schedule.service.js';
import { ScheduleStore } from '../schedule/schedule.store.js';
import type { ShiftAssignment } from '../schedule/schedule.types.js';
import { NotificationLogStore } from './notification-log.store.js';
import type { NewNotificationRecord } from './notification.types.js';

describe('NotificationLogStore', () => {
  let db: Database.Database;
  let log: NotificationLogStore;
  let clock: ReturnType<typeof createTestClock>;
  let assignment: ShiftAssignment;

  beforeEach(() => {
    db = createTestDatabaseWithMigrations();
    seedRoster(db, { participants: SAMPLE_PARTICIPANTS, templates: SAMPLE_TEMPLATES });
    clock = createTestClock(TEST_MONDAY.set({ hour: 8 }));
    log = new NotificationLogStore(db, TEST_TIMEZONE, clock.now);
    const service = new ScheduleService(
      new RosterRepository(db),
      new ScheduleStore(db, TEST_TIMEZONE),
      TEST_TIMEZONE,
      clock.now,
    );
    [assignment] = service.generate(TEST_MONDAY, 1);
  });

  afterEach(() => {
    cleanupTestDatabase(db);
  });

  function recordFor(overrides: Partial<NewNotificationRecord> = {}): NewNotificationRecord {
    return {
      assignmentId: assignment.id,
      participantId: assignment.participantId,
      recipientName: assignment.participantName,
      recipientAddress: assignment.primaryAddress,
      status: 'sent',
      providerId: 'SMtest1',
      errorMessage: null,
      attempts: 1,
      source: 'scheduled',
      ...overrides,
    };
  }

  it('appends a record stamped with the clock', () => {
    const stored = log.append(recordFor());

    expect(stored).toMatchObject({
      assignmentId: assignment.id,
      recipientName: 'Alice',
      recipientAddress: '+15550000001',
      status: 'sent',
      providerId: 'SMtest1',
      attempts: 1,
      source: 'scheduled',
    });
    expect(stored.createdAt.toISO()).toBe('2025-03-03T08:00:00.000-06:00');
    expect(log.findById(stored.id)).toEqual(stored);
  });

  it('rejects updates and deletes at the schema level', () => {
    const stored = log.append(recordFor());

    expect(() => db.prepare(`UPDATE notification_records SET status = 'failed' WHERE id = ?`).run(stored.id)).toThrow(
      'notification records are append-only',
    );
    expect(() => db.prepare('DELETE FROM notification_records WHERE id = ?').run(stored.id)).toThrow(
      'notification records are append-only',
    );
    expect(log.findById(stored.id)?.status).toBe('sent');
  });

  it('keeps records and their snapshots when the assignment is deleted', () => {
    const stored = log.append(recordFor());

    db.prepare('DELETE FROM shift_assignments WHERE id = ?').run(assignment.id);

    expect(log.findById(stored.id)).toMatchObject({
      assignmentId: null,
      participantId: assignment.participantId,
      recipientName: 'Alice',
      recipientAddress: '+15550000001',
      status: 'sent',
    });
  });

  it('stores manual records without an assignment', () => {
    const stored = log.append(recordFor({ assignmentId: null, source: 'manual' }));
    expect(stored).toMatchObject({ assignmentId: null, source: 'manual' });
  });

  it('lists recent, failed and per-assignment records', () => {
    const first = log.append(recordFor());
    clock.set(clock.now().plus({ minutes: 5 }));
    const failed = log.append(
      recordFor({ status: 'failed', providerId: null, errorMessage: 'Invalid number', attempts: 1 }),
    );
    clock.set(clock.now().plus({ minutes: 5 }));
    const manual = log.append(recordFor({ assignmentId: null, source: 'manual', providerId: 'SMtest2' }));

    expect(log.listRecent(2).map((r) => r.id)).toEqual([manual.id, failed.id]);
    expect(log.listFailed().map((r) => r.errorMessage)).toEqual(['Invalid number']);
    expect(log.listFailed(clock.now())).toEqual([]);
    expect(log.listByAssignment(assignment.id).map((r) => r.id)).toEqual([first.id, failed.id]);
    expect(log.findByProviderId('SMtest2')?.id).toBe(manual.id);
    expect(log.findByProviderId('SMmissing')).toBeNull();
  });

  it('computes delivery stats', () => {
    expect(log.getStats()).toEqual({ total: 0, sent: 0, failed: 0, pending: 0, successRate: 0 });

    log.append(recordFor());
    log.append(recordFor({ providerId: 'SMtest2' }));
    log.append(recordFor({ status: 'failed', providerId: null, errorMessage: 'timeout', attempts: 3 }));

    expect(log.getStats()).toEqual({ total: 3, sent: 2, failed: 1, pending: 0, successRate: 66.67 });
    expect(log.getStats(DateTime.fromISO('2030-01-01', { zone: TEST_TIMEZONE })).total).toBe(0);
  });
});
