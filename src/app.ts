import type Database from 'better-sqlite3';
import { DateTime } from 'luxon';
import type { AppConfig } from './config.js';
import { openDatabase } from './database/db.js';
import { getDatabasePath } from './database/getDatabasePath.js';
import { runMigrations } from './database/migration-runner.js';
import { runSeedData } from './database/seed-data-runner.js';
import { createGateway } from './gateway/gateway.factory.js';
import type { MessagingGateway } from './gateway/gateway.types.js';
import { JobRunStore } from './jobs/job-run.store.js';
import { JobCoordinator } from './jobs/job.coordinator.js';
import { NodeScheduleJobScheduler, type JobScheduler } from './jobs/job.scheduler.js';
import { Logger } from './logger.js';
import { NotificationLogStore } from './notifications/notification-log.store.js';
import { NotificationDispatcher } from './notifications/notification.dispatcher.js';
import { RosterRepository } from './roster/roster.repository.js';
import { ScheduleRenewal } from './schedule/schedule.renewal.js';
import { ScheduleService } from './schedule/schedule.service.js';
import { ScheduleStore } from './schedule/schedule.store.js';
import type { Sleep } from './utils/retry.js';

const logger = new Logger('app');

export interface Application {
  readonly config: AppConfig;
  readonly db: Database.Database;
  readonly roster: RosterRepository;
  readonly scheduleStore: ScheduleStore;
  readonly schedule: ScheduleService;
  readonly renewal: ScheduleRenewal;
  readonly notificationLog: NotificationLogStore;
  readonly dispatcher: NotificationDispatcher;
  readonly coordinator: JobCoordinator;
  /** Stops the jobs if they run and closes the database. */
  close(): Promise<void>;
}

/** Seams for tests: everything that touches the outside world can be replaced. */
export interface ApplicationOverrides {
  db?: Database.Database;
  gateway?: MessagingGateway;
  scheduler?: JobScheduler;
  clock?: () => DateTime;
  sleep?: Sleep;
  migrationsPath?: string;
  seedDataPath?: string;
}

/** Composition root: wires every component once, in dependency order. */
export function createApplication(config: AppConfig, overrides: ApplicationOverrides = {}): Application {
  Logger.setLevel(config.logLevel);
  const clock = overrides.clock ?? (() => DateTime.now().setZone(config.timezone));
  const db = overrides.db ?? openDatabase(getDatabasePath(config.databasePath));

  runMigrations(db, overrides.migrationsPath);
  if (config.seedExampleData) {
    const applied = runSeedData(db, overrides.seedDataPath);
    logger.info(`Applied ${applied.length} seed data file(s)`);
  }

  const roster = new RosterRepository(db);
  const scheduleStore = new ScheduleStore(db, config.timezone);
  const schedule = new ScheduleService(roster, scheduleStore, config.timezone, clock);
  const renewal = new ScheduleRenewal(scheduleStore, schedule, config.autoRenew, config.timezone);
  const notificationLog = new NotificationLogStore(db, config.timezone, clock);
  const gateway = overrides.gateway ?? createGateway(config.gateway, config.senderName, config.gatewayTimeoutMs);

  const dispatcher = new NotificationDispatcher(db, roster, scheduleStore, notificationLog, gateway, {
    senderName: config.senderName,
    timezone: config.timezone,
    concurrency: config.dispatchConcurrency,
    escalationContacts: config.escalation.contacts,
    sleep: overrides.sleep,
    clock,
  });

  const coordinator = new JobCoordinator(
    overrides.scheduler ?? new NodeScheduleJobScheduler(),
    new JobRunStore(db),
    dispatcher,
    renewal,
    config,
    clock,
  );

  return {
    config,
    db,
    roster,
    scheduleStore,
    schedule,
    renewal,
    notificationLog,
    dispatcher,
    coordinator,
    async close() {
      if (coordinator.status().running) {
        await coordinator.stop();
      }
      if (db.open) {
        db.close();
      }
    },
  };
}
