import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createTestDatabase } from '../test/utils/database.js';
import { FakeGateway } from '../test/utils/fake-gateway.js';
import { ManualJobScheduler } from '../test/utils/fake-scheduler.js';
import { SAMPLE_PARTICIPANTS, SAMPLE_TEMPLATES, TEST_CONFIG, TEST_MONDAY, createTestClock } from '../test/fixtures/test-data.js';
import { createApplication, type Application } from './app.js';
import { AppTask } from './app.types.js';
import { handler } from './index.js';

function bodyOf(response: { body: string }): Record<string, unknown> {
  const parsed: unknown = JSON.parse(response.body);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`Unexpected response body: ${response.body}`);
  }
  return { ...parsed };
}

describe('handler', () => {
  let app: Application;
  let gateway: FakeGateway;

  beforeEach(() => {
    const clock = createTestClock(TEST_MONDAY.set({ hour: 9 }));
    gateway = new FakeGateway();
    app = createApplication(TEST_CONFIG, {
      db: createTestDatabase(),
      gateway,
      scheduler: new ManualJobScheduler(clock.now),
      clock: clock.now,
      sleep: async () => {},
    });
    SAMPLE_PARTICIPANTS.forEach((participant) => app.roster.addParticipant(participant));
    SAMPLE_TEMPLATES.forEach((template) => app.roster.addShiftTemplate(template));
  });

  afterEach(async () => {
    await app.close();
    vi.unstubAllEnvs();
  });

  it('rejects an unknown task', async () => {
    const response = await handler({ task: 'make_coffee' }, app);

    expect(response.statusCode).toBe(400);
    expect(bodyOf(response).error).toBe('Invalid task event (see `AppEvent` in app.types.ts).');
  });

  it('rejects a task with missing fields', async () => {
    const response = await handler({ task: AppTask.GENERATE_SCHEDULE, weeks: 2 }, app);

    expect(response.statusCode).toBe(400);
    expect(bodyOf(response).details).toEqual(['start_date: Required']);
  });

  it('generates a schedule', async () => {
    const response = await handler({ task: AppTask.GENERATE_SCHEDULE, start_date: '2025-03-03', weeks: 2 }, app);

    expect(response.statusCode).toBe(200);
    expect(bodyOf(response)).toMatchObject({ message: 'Task completed successfully', result: { created: 6 } });
  });

  it('reports a conflict when the schedule already exists', async () => {
    await handler({ task: AppTask.GENERATE_SCHEDULE, start_date: '2025-03-03', weeks: 1 }, app);

    const response = await handler({ task: AppTask.GENERATE_SCHEDULE, start_date: '2025-03-03', weeks: 1 }, app);

    expect(response.statusCode).toBe(409);
    const body = bodyOf(response);
    expect(body.error).toBe('ScheduleAlreadyExistsError');
    expect(body.conflicts).toHaveLength(3);
  });

  it('replaces an existing schedule with force', async () => {
    await handler({ task: AppTask.GENERATE_SCHEDULE, start_date: '2025-03-03', weeks: 1 }, app);

    const response = await handler(
      { task: AppTask.GENERATE_SCHEDULE, start_date: '2025-03-03', weeks: 1, force: true },
      app,
    );

    expect(response.statusCode).toBe(200);
    expect(bodyOf(response)).toMatchObject({ result: { created: 3 } });
  });

  it('maps validation errors to 400', async () => {
    const response = await handler({ task: AppTask.GENERATE_SCHEDULE, start_date: '2025-03-03', weeks: 0 }, app);

    expect(response.statusCode).toBe(400);
    expect(bodyOf(response)).toEqual({
      error: 'InvalidWeekCountError',
      details: 'weekCount must be a positive integer, got 0',
    });
  });

  it('regenerates from a date', async () => {
    await handler({ task: AppTask.GENERATE_SCHEDULE, start_date: '2025-03-03', weeks: 2 }, app);

    const response = await handler({ task: AppTask.REGENERATE_SCHEDULE, from_date: '2025-03-10', weeks: 1 }, app);

    expect(response.statusCode).toBe(200);
    expect(bodyOf(response)).toMatchObject({ result: { created: 3 } });
  });

  it('dispatches the assignments due today on demand', async () => {
    await handler({ task: AppTask.GENERATE_SCHEDULE, start_date: '2025-03-03', weeks: 1 }, app);

    const response = await handler({ task: AppTask.DISPATCH_NOW }, app);

    expect(response.statusCode).toBe(200);
    expect(bodyOf(response)).toMatchObject({
      result: { outcome: 'completed', detail: { total: 1, sent: 1, failed: 0, skipped: 0 } },
    });
    expect(gateway.calls.map((call) => call.address)).toEqual(['+15550000001']);
  });

  it('sends a manual message', async () => {
    const [alice] = app.roster.listActiveParticipantsOrdered();

    const response = await handler({ task: AppTask.SEND_MANUAL, participant_id: alice.id, message: 'Drill' }, app);

    expect(response.statusCode).toBe(200);
    expect(bodyOf(response)).toMatchObject({ result: { participantName: 'Alice', status: 'sent' } });
    expect(gateway.calls).toEqual([{ address: '+15550000001', body: 'Drill' }]);
  });

  it('sends the weekly summary to the escalation contacts on demand', async () => {
    await handler({ task: AppTask.GENERATE_SCHEDULE, start_date: '2025-03-03', weeks: 1 }, app);

    const response = await handler({ task: AppTask.SEND_WEEKLY_SUMMARY }, app);

    expect(response.statusCode).toBe(200);
    expect(bodyOf(response)).toMatchObject({
      result: {
        outcome: 'completed',
        detail: { weekStart: '2025-03-03', shifts: 3, total: 1, sent: 1, failed: 0 },
      },
    });
    expect(gateway.calls).toEqual([
      {
        address: '+15550000100',
        body: 'On-Call: On-call schedule for the week of Mar 3\nMon 08:00 Alice\nTue-Wed 08:00 Bob\nThu 08:00 Carol',
      },
    ]);
  });

  it('returns 404 for an unknown participant', async () => {
    const response = await handler({ task: AppTask.SEND_MANUAL, participant_id: 999 }, app);

    expect(response.statusCode).toBe(404);
    expect(bodyOf(response)).toEqual({ error: 'ParticipantNotFoundError', details: 'Participant 999 not found' });
  });

  it('reports job status', async () => {
    const response = await handler({ task: AppTask.JOB_STATUS }, app);

    expect(response.statusCode).toBe(200);
    expect(bodyOf(response).result).toEqual({ running: false, inFlight: [], nextRunTime: null });
  });

  it('reports configuration errors without an application', async () => {
    vi.stubEnv('TIMEZONE', 'Not/AZone');

    const response = await handler({ task: AppTask.JOB_STATUS });

    expect(response.statusCode).toBe(500);
    expect(bodyOf(response)).toEqual({ error: 'Configuration error', missing: [], invalid: ['TIMEZONE'] });
  });
});
