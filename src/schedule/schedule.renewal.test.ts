import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { DateTime } from 'luxon';
import { countBy } from 'lodash-es';
import { cleanupTestDatabase, createTestDatabaseWithMigrations, seedRoster } from '../../test/utils/database.js';
import {
  ALICE,
  BOB,
  CAROL,
  DANA,
  EVE,
  SAMPLE_PARTICIPANTS,
  SAMPLE_TEMPLATES,
  TEST_TIMEZONE,
} from '../../test/fixtures/test-data.js';
import { RosterRepository } from '../roster/roster.repository.js';
import { ScheduleRenewal } from './schedule.renewal.js';
import { ScheduleService } from './schedule.service.js';
import { ScheduleStore } from './schedule.store.js';

const NOW = DateTime.fromISO('2025-03-05T12:00', { zone: TEST_TIMEZONE });

describe('ScheduleRenewal', () => {
  let db: Database.Database;
  let store: ScheduleStore;
  let service: ScheduleService;
  let renewal: ScheduleRenewal;

  beforeEach(() => {
    db = createTestDatabaseWithMigrations();
    seedRoster(db, { participants: SAMPLE_PARTICIPANTS, templates: SAMPLE_TEMPLATES });
    store = new ScheduleStore(db, TEST_TIMEZONE);
    service = new ScheduleService(new RosterRepository(db), store, TEST_TIMEZONE, () => NOW);
    renewal = new ScheduleRenewal(store, service, { thresholdWeeks: 2, renewWeeks: 4 }, TEST_TIMEZONE);
  });

  afterEach(() => {
    cleanupTestDatabase(db);
  });

  it('does nothing when no schedule exists', () => {
    expect(renewal.check(NOW)).toEqual({ renewed: false, weeksRemaining: null, created: 0 });
  });

  it('extends the schedule from the Monday after the last scheduled week', () => {
    service.generate('2025-03-03', 2);

    const result = renewal.check(NOW);

    expect(result.renewed).toBe(true);
    expect(result.created).toBe(12);
    expect(result.weeksRemaining).toBeGreaterThan(1);
    expect(result.weeksRemaining).toBeLessThan(2);
    expect(service.byDateRange('2025-03-17', '2025-03-17')[0].participantName).toBe('Alice');
    expect(store.findLatestStart()?.toISO()).toBe('2025-04-10T08:00:00.000-05:00');
  });

  it('leaves a schedule with enough runway alone', () => {
    service.generate('2025-03-03', 6);

    const result = renewal.check(NOW);

    expect(result).toMatchObject({ renewed: false, created: 0 });
    expect(result.weeksRemaining).toBeGreaterThan(2);
  });
});

describe('ScheduleRenewal across several cycles', () => {
  let db: Database.Database;

  afterEach(() => {
    cleanupTestDatabase(db);
  });

  it('continues the rotation where the previous block stopped', () => {
    db = createTestDatabaseWithMigrations();
    seedRoster(db, { participants: [ALICE, BOB, CAROL, DANA, EVE], templates: SAMPLE_TEMPLATES });
    const store = new ScheduleStore(db, TEST_TIMEZONE);
    const service = new ScheduleService(new RosterRepository(db), store, TEST_TIMEZONE, () => NOW);
    const renewal = new ScheduleRenewal(store, service, { thresholdWeeks: 100, renewWeeks: 4 }, TEST_TIMEZONE);

    // 4 weeks x 3 shifts: the last one goes to Bob
    service.generate('2025-03-03', 4);
    for (let cycle = 0; cycle < 4; cycle++) {
      expect(renewal.check(NOW)).toMatchObject({ renewed: true, created: 12 });
    }

    expect(service.byDateRange('2025-03-31', '2025-03-31')[0].participantName).toBe('Carol');
    expect(service.byDateRange('2025-04-28', '2025-04-28')[0].participantName).toBe('Eve');
    const all = service.byDateRange('2025-03-03', '2025-07-20');
    expect(all).toHaveLength(60);
    expect(countBy(all, (assignment) => assignment.participantName)).toEqual({
      Alice: 12,
      Bob: 12,
      Carol: 12,
      Dana: 12,
      Eve: 12,
    });
  });

  it('starts from the top of the roster when the last participant has left', () => {
    db = createTestDatabaseWithMigrations();
    const { participants } = seedRoster(db, { participants: [ALICE, BOB, CAROL, DANA], templates: SAMPLE_TEMPLATES });
    const roster = new RosterRepository(db);
    const store = new ScheduleStore(db, TEST_TIMEZONE);
    const service = new ScheduleService(roster, store, TEST_TIMEZONE, () => NOW);
    const renewal = new ScheduleRenewal(store, service, { thresholdWeeks: 100, renewWeeks: 1 }, TEST_TIMEZONE);

    // 1 week x 3 shifts ends with Carol
    service.generate('2025-03-03', 1);
    roster.setParticipantActive(participants[2].id, false);
    renewal.check(NOW);

    expect(service.byDateRange('2025-03-10', '2025-03-16').map((a) => a.participantName)).toEqual([
      'Alice',
      'Bob',
      'Dana',
    ]);
  });
});
