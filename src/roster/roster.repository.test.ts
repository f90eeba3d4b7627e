import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { cleanupTestDatabase, createTestDatabaseWithMigrations, seedRoster } from '../../test/utils/database.js';
import { ALICE, BOB, CAROL, DANA, SAMPLE_TEMPLATES } from '../../test/fixtures/test-data.js';
import { ParticipantNotFoundError, RosterRepository, RosterValidationError } from './roster.repository.js';

describe('RosterRepository', () => {
  let db: Database.Database;
  let roster: RosterRepository;

  beforeEach(() => {
    db = createTestDatabaseWithMigrations();
    roster = new RosterRepository(db);
  });

  afterEach(() => {
    cleanupTestDatabase(db);
  });

  const activeNames = () => roster.listActiveParticipantsOrdered().map((p) => `${p.name}:${p.rotationOrder}`);

  it('appends active participants to the end of the rotation', () => {
    seedRoster(db, { participants: [ALICE, BOB, CAROL], templates: [] });
    expect(activeNames()).toEqual(['Alice:0', 'Bob:1', 'Carol:2']);
  });

  it('stores inactive participants without a rotation order', () => {
    const dana = roster.addParticipant({ ...DANA, isActive: false });
    expect(dana).toMatchObject({ isActive: false, rotationOrder: null });
    expect(roster.listActiveParticipantsOrdered()).toEqual([]);
    expect(roster.listAllParticipants()).toHaveLength(1);
  });

  it('compacts the order when a participant is deactivated and appends on reactivation', () => {
    const { participants } = seedRoster(db, { participants: [ALICE, BOB, CAROL], templates: [] });
    const bob = participants[1];

    expect(roster.setParticipantActive(bob.id, false)).toMatchObject({ isActive: false, rotationOrder: null });
    expect(activeNames()).toEqual(['Alice:0', 'Carol:1']);

    expect(roster.setParticipantActive(bob.id, true)).toMatchObject({ isActive: true, rotationOrder: 2 });
    expect(activeNames()).toEqual(['Alice:0', 'Carol:1', 'Bob:2']);
  });

  it('leaves the order alone when the active flag does not change', () => {
    const { participants } = seedRoster(db, { participants: [ALICE, BOB], templates: [] });
    roster.setParticipantActive(participants[0].id, true);
    expect(activeNames()).toEqual(['Alice:0', 'Bob:1']);
  });

  it('reorders the active participants', () => {
    const { participants } = seedRoster(db, { participants: [ALICE, BOB, CAROL], templates: [] });
    const [alice, bob, carol] = participants;

    roster.reorderParticipants([carol.id, alice.id, bob.id]);
    expect(activeNames()).toEqual(['Carol:0', 'Alice:1', 'Bob:2']);
  });

  it('rejects a reorder that does not list every active participant once', () => {
    const { participants } = seedRoster(db, { participants: [ALICE, BOB], templates: [] });
    const [alice, bob] = participants;

    expect(() => roster.reorderParticipants([alice.id])).toThrow(RosterValidationError);
    expect(() => roster.reorderParticipants([alice.id, alice.id])).toThrow(RosterValidationError);
    expect(() => roster.reorderParticipants([alice.id, bob.id, 999])).toThrow(RosterValidationError);
    expect(activeNames()).toEqual(['Alice:0', 'Bob:1']);
  });

  it('reports unknown participants', () => {
    expect(roster.getParticipant(42)).toBeNull();
    expect(() => roster.setParticipantActive(42, false)).toThrow(ParticipantNotFoundError);
  });

  it('validates participant input', () => {
    expect(() => roster.addParticipant({ name: '  ', primaryAddress: '+15550000009' })).toThrow(
      'Participant name is required',
    );
    expect(() => roster.addParticipant({ name: 'Eve', primaryAddress: '' })).toThrow(
      'Participant primary address is required',
    );
  });

  describe('shift templates', () => {
    it('lists templates by shift number with their weekdays', () => {
      roster.addShiftTemplate(SAMPLE_TEMPLATES[2]);
      roster.addShiftTemplate(SAMPLE_TEMPLATES[0]);
      roster.addShiftTemplate(SAMPLE_TEMPLATES[1]);

      expect(roster.listShiftTemplatesOrdered().map((t) => [t.shiftNumber, t.weekdays, t.durationHours])).toEqual([
        [1, [1], 24],
        [2, [2, 3], 48],
        [3, [4], 24],
      ]);
    });

    it('validates weekdays, duration and start time', () => {
      const valid = SAMPLE_TEMPLATES[0];
      expect(() => roster.addShiftTemplate({ ...valid, weekdays: [] })).toThrow(RosterValidationError);
      expect(() => roster.addShiftTemplate({ ...valid, weekdays: [8] })).toThrow(RosterValidationError);
      expect(() => roster.addShiftTemplate({ ...valid, durationHours: 12 })).toThrow(
        'Duration must be a positive multiple of 24 hours',
      );
      expect(() => roster.addShiftTemplate({ ...valid, startTime: '8am' })).toThrow(
        'Start time must be formatted as HH:mm',
      );
      expect(roster.listShiftTemplatesOrdered()).toEqual([]);
    });
  });
});
