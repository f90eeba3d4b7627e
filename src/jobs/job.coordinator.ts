import { DateTime, Info } from 'luxon';
import type { AutoRenewConfig, EscalationConfig, TimeOfDay } from '../config.js';
import { JobName } from '../constants.js';
import { Logger } from '../logger.js';
import type { NotificationDispatcher } from '../notifications/notification.dispatcher.js';
import type { DispatchSummary, WeeklySummaryResult } from '../notifications/notification.types.js';
import type { ScheduleRenewal } from '../schedule/schedule.renewal.js';
import type { JobRunStore } from './job-run.store.js';
import type { JobScheduler, ScheduledJobHandle } from './job.scheduler.js';

const logger = new Logger('job-coordinator');

export type JobTickResult =
  | { outcome: 'completed'; job: JobName; detail: Record<string, unknown> }
  | { outcome: 'failed'; job: JobName; error: string }
  | { outcome: 'coalesced'; job: JobName }
  | { outcome: 'already-ran'; job: JobName; runKey: string }
  | { outcome: 'dropped'; job: JobName; lateByMs: number };

export interface JobCoordinatorStatus {
  running: boolean;
  inFlight: JobName[];
  /** Next daily dispatch; null while stopped. */
  nextRunTime: DateTime | null;
}

export interface JobCoordinatorConfig {
  timezone: string;
  dailySend: TimeOfDay;
  misfireGraceMs: number;
  autoRenew: Pick<AutoRenewConfig, 'enabled' | 'at'>;
  escalation: Pick<EscalationConfig, 'enabled' | 'weekday' | 'at'>;
}

interface JobDefinition {
  name: JobName;
  at: TimeOfDay;
  /** ISO weekday for a weekly job; daily when unset. */
  weekday?: number;
  run: (scheduledFor: DateTime) => Promise<Record<string, unknown>>;
}

function summarize(summary: DispatchSummary): Record<string, unknown> {
  return { total: summary.total, sent: summary.sent, failed: summary.failed, skipped: summary.skipped };
}

function summarizeWeekly(summary: WeeklySummaryResult): Record<string, unknown> {
  return {
    weekStart: summary.weekStart.toISODate(),
    shifts: summary.shifts,
    total: summary.total,
    sent: summary.sent,
    failed: summary.failed,
  };
}

/**
 * Owns the background jobs: the daily dispatch, the auto-renewal check and the weekly escalation summary.
 * Each job runs at most once at a time (overlapping ticks coalesce) and at most once per local day
 * (the `job_runs` claim). Ticks later than the grace window are dropped. A tick never throws.
 */
export class JobCoordinator {
  private readonly handles = new Map<JobName, ScheduledJobHandle>();
  private readonly inFlight = new Set<JobName>();
  private readonly pending = new Set<Promise<JobTickResult>>();
  private readonly dispatchJob: JobDefinition;
  private readonly summaryJob: JobDefinition;
  private readonly jobs: JobDefinition[];
  private running = false;

  constructor(
    private readonly scheduler: JobScheduler,
    private readonly runs: JobRunStore,
    private readonly dispatcher: NotificationDispatcher,
    private readonly renewal: ScheduleRenewal,
    private readonly config: JobCoordinatorConfig,
    private readonly clock: () => DateTime,
  ) {
    this.dispatchJob = {
      name: JobName.DAILY_DISPATCH,
      at: config.dailySend,
      run: async (scheduledFor) => summarize(await this.dispatcher.dispatchDue(scheduledFor)),
    };
    this.jobs = [this.dispatchJob];
    if (config.autoRenew.enabled) {
      this.jobs.push({
        name: JobName.AUTO_RENEWAL,
        at: config.autoRenew.at,
        run: async () => ({ ...this.renewal.check(this.clock()) }),
      });
    }
    this.summaryJob = {
      name: JobName.WEEKLY_ESCALATION_SUMMARY,
      at: config.escalation.at,
      weekday: config.escalation.weekday,
      run: async (scheduledFor) => summarizeWeekly(await this.dispatcher.dispatchWeeklySummary(scheduledFor)),
    };
    if (config.escalation.enabled) {
      this.jobs.push(this.summaryJob);
    }
  }

  /** Registers the jobs, then runs any of today's ticks that were missed within the grace window. */
  async start(): Promise<JobTickResult[]> {
    if (this.running) {
      logger.warn('Job coordinator already running; ignoring start()');
      return [];
    }
    this.running = true;

    for (const job of this.jobs) {
      const rule = { ...job.at, tz: this.config.timezone, weekday: job.weekday };
      const handle = this.scheduler.scheduleRecurring(job.name, rule, (fireDate) => {
        void this.track(this.onTick(job, fireDate));
      });
      this.handles.set(job.name, handle);
      logger.info(`Scheduled ${job.name} ${describeRecurrence(job)} ${this.config.timezone}`);
    }

    const catchUps: Promise<JobTickResult>[] = [];
    for (const job of this.jobs) {
      const catchUp = this.catchUp(job);
      if (catchUp) {
        catchUps.push(this.track(catchUp));
      }
    }
    return Promise.all(catchUps);
  }

  /** Cancels the timers and waits for ticks already in progress. */
  async stop(): Promise<void> {
    if (!this.running) {
      logger.warn('Job coordinator is not running; ignoring stop()');
      return;
    }
    this.running = false;
    for (const handle of this.handles.values()) {
      handle.cancel();
    }
    this.handles.clear();
    await Promise.all(this.pending);
    logger.info('Job coordinator stopped');
  }

  /** Runs the daily dispatch now, outside the per-day claim. Still coalesces with a dispatch in flight. */
  triggerNow(): Promise<JobTickResult> {
    return this.track(this.execute(this.dispatchJob, this.clock(), false));
  }

  /** Sends the weekly escalation summary now, whether or not the weekly job is enabled. */
  triggerWeeklySummary(): Promise<JobTickResult> {
    return this.track(this.execute(this.summaryJob, this.clock(), false));
  }

  status(): JobCoordinatorStatus {
    const next = this.handles.get(JobName.DAILY_DISPATCH)?.nextInvocation() ?? null;
    return {
      running: this.running,
      inFlight: [...this.inFlight],
      nextRunTime: next ? DateTime.fromJSDate(next).setZone(this.config.timezone) : null,
    };
  }

  private onTick(job: JobDefinition, fireDate: Date): Promise<JobTickResult> {
    const scheduledFor = DateTime.fromJSDate(fireDate).setZone(this.config.timezone);
    const lateByMs = this.clock().diff(scheduledFor).toMillis();
    if (lateByMs > this.config.misfireGraceMs) {
      logger.warn(`Dropping ${job.name} tick scheduled for ${scheduledFor.toISO()}: ${lateByMs}ms late`);
      return Promise.resolve({ outcome: 'dropped', job: job.name, lateByMs });
    }
    return this.execute(job, scheduledFor, true);
  }

  private catchUp(job: JobDefinition): Promise<JobTickResult> | null {
    const now = this.clock().setZone(this.config.timezone);
    const scheduledFor = now.set({ hour: job.at.hour, minute: job.at.minute, second: 0, millisecond: 0 });
    if (job.weekday !== undefined && now.weekday !== job.weekday) {
      return null;
    }
    if (now < scheduledFor || this.runs.isClaimed(job.name, runKeyOf(scheduledFor))) {
      return null;
    }

    const lateByMs = now.diff(scheduledFor).toMillis();
    if (lateByMs > this.config.misfireGraceMs) {
      logger.warn(`Missed ${job.name} run for ${scheduledFor.toISODate()} is outside the grace window; skipping`);
      return null;
    }

    logger.info(`Catching up missed ${job.name} run scheduled for ${scheduledFor.toISO()}`);
    return this.execute(job, scheduledFor, true);
  }

  private async execute(job: JobDefinition, scheduledFor: DateTime, claim: boolean): Promise<JobTickResult> {
    if (this.inFlight.has(job.name)) {
      logger.info(`${job.name} is already running; coalescing tick`);
      return { outcome: 'coalesced', job: job.name };
    }
    // Set before the first await so a concurrent tick sees it
    this.inFlight.add(job.name);

    const runKey = runKeyOf(scheduledFor);
    let claimed = false;
    try {
      if (claim) {
        claimed = this.runs.claim(job.name, runKey, this.clock());
        if (!claimed) {
          logger.info(`${job.name} already ran for ${runKey}`);
          return { outcome: 'already-ran', job: job.name, runKey };
        }
      }

      const detail = await job.run(scheduledFor);
      if (claimed) {
        this.runs.finish(job.name, runKey, 'succeeded', this.clock(), JSON.stringify(detail));
      }
      logger.info(`${job.name} completed`, detail);
      return { outcome: 'completed', job: job.name, detail };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`${job.name} failed:`, error);
      if (claimed) {
        this.recordFailure(job.name, runKey, message);
      }
      return { outcome: 'failed', job: job.name, error: message };
    } finally {
      this.inFlight.delete(job.name);
    }
  }

  private recordFailure(job: JobName, runKey: string, message: string) {
    try {
      this.runs.finish(job, runKey, 'failed', this.clock(), message);
    } catch (error) {
      logger.error(`Could not record failure of ${job} for ${runKey}:`, error);
    }
  }

  private track(tick: Promise<JobTickResult>): Promise<JobTickResult> {
    const tracked: Promise<JobTickResult> = tick.finally(() => this.pending.delete(tracked));
    this.pending.add(tracked);
    return tracked;
  }
}

function runKeyOf(scheduledFor: DateTime): string {
  return scheduledFor.toISODate() ?? 'invalid-date';
}

function formatTime({ hour, minute }: TimeOfDay): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

function describeRecurrence(job: JobDefinition): string {
  if (job.weekday === undefined) {
    return `daily at ${formatTime(job.at)}`;
  }
  const day = Info.weekdays('long')[job.weekday - 1];
  return `weekly on ${day} at ${formatTime(job.at)}`;
}
