import 'dotenv/config';

import { createApplication, type Application } from './app.js';
import { AppTask, appEventSchema, type AppEvent, type TaskResponse } from './app.types.js';
import { ConfigurationError, loadConfig } from './config.js';
import { Logger } from './logger.js';
import { ParticipantNotFoundError, RosterValidationError } from './roster/roster.repository.js';
import { InvalidWeekCountError, NoParticipantsError, NoTemplatesError } from './rotation/rotation.generator.js';
import { InvalidDateRangeError } from './schedule/schedule.service.js';
import { ScheduleAlreadyExistsError } from './schedule/schedule.store.js';

const logger = new Logger('main');

function respond(statusCode: number, payload: unknown): TaskResponse {
  return { statusCode, body: JSON.stringify(payload) };
}

function statusCodeFor(error: unknown): number {
  if (
    error instanceof NoParticipantsError ||
    error instanceof NoTemplatesError ||
    error instanceof InvalidWeekCountError ||
    error instanceof InvalidDateRangeError ||
    error instanceof RosterValidationError
  ) {
    return 400;
  }
  if (error instanceof ParticipantNotFoundError) {
    return 404;
  }
  if (error instanceof ScheduleAlreadyExistsError) {
    return 409;
  }
  return 500;
}

/**
 * Runs one task. Without an `app` a fresh application is built from the environment and closed afterwards,
 * except for `serve`, which keeps it until the process is signalled.
 */
export async function handler(event?: unknown, app?: Application): Promise<TaskResponse> {
  const parsed = appEventSchema.safeParse(event);
  if (!parsed.success) {
    logger.error('Invalid task event (see `AppEvent` in app.types.ts).', { issues: parsed.error.issues });
    return respond(400, {
      error: 'Invalid task event (see `AppEvent` in app.types.ts).',
      details: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'event'}: ${issue.message}`),
    });
  }

  let application: Application;
  try {
    application = app ?? createApplication(loadConfig());
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      return respond(500, { error: 'Configuration error', missing: error.missing, invalid: error.invalid });
    }
    logger.error('Error starting application:', error);
    return respond(500, { error: 'Startup failed.', details: error instanceof Error ? error.message : 'Unknown error' });
  }

  const ownsApplication = !app && parsed.data.task !== AppTask.SERVE;
  try {
    const result = await runTask(parsed.data, application);
    return respond(200, { message: 'Task completed successfully', result });
  } catch (error) {
    const statusCode = statusCodeFor(error);
    logger.error(`Task ${parsed.data.task} failed:`, error);
    return respond(statusCode, {
      error: error instanceof Error ? error.name : 'Error',
      details: error instanceof Error ? error.message : 'Unknown error',
      ...(error instanceof ScheduleAlreadyExistsError ? { conflicts: error.conflicts } : {}),
    });
  } finally {
    if (ownsApplication) {
      await application.close();
    }
  }
}

async function runTask(event: AppEvent, app: Application): Promise<unknown> {
  switch (event.task) {
    case AppTask.SERVE:
      return serve(app);
    case AppTask.GENERATE_SCHEDULE: {
      const created = app.schedule.generate(event.start_date, event.weeks, event.force ?? false);
      return { created: created.length, assignments: created };
    }
    case AppTask.REGENERATE_SCHEDULE: {
      const created = app.schedule.regenerate(event.from_date, event.weeks);
      return { created: created.length, assignments: created };
    }
    case AppTask.DISPATCH_NOW:
      return app.coordinator.triggerNow();
    case AppTask.SEND_MANUAL:
      return app.dispatcher.dispatchNow(event.participant_id, event.message);
    case AppTask.SEND_WEEKLY_SUMMARY:
      return app.coordinator.triggerWeeklySummary();
    case AppTask.JOB_STATUS:
      return app.coordinator.status();
  }
}

async function serve(app: Application) {
  const catchUps = await app.coordinator.start();

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    app
      .close()
      .then(() => logger.flush())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return { serving: true, catchUps, status: app.coordinator.status() };
}

// For direct execution
if (process.argv[1] && import.meta.url === new URL(process.argv[1], 'file://').href) {
  handler({ task: AppTask.SERVE })
    .then((response) => {
      if (response.statusCode !== 200) {
        logger.error('Failed to start', { response: response.body });
        process.exit(1);
      }
    })
    .catch((error: unknown) => {
      logger.error('Failed to start', error);
      process.exit(1);
    });
}
