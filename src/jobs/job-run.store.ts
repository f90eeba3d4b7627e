import type Database from 'better-sqlite3';
import type { DateTime } from 'luxon';
import type { JobRunEntity } from '../database/entities.js';
import { runStatement } from '../database/persistence.js';
import { toStorageTimestamp } from '../utils/date.js';

export type JobRunStatus = 'running' | 'succeeded' | 'failed';

export interface JobRun {
  jobName: string;
  runKey: string;
  startedAt: string;
  finishedAt: string | null;
  status: JobRunStatus;
  detail: string | null;
}

function toStatus(value: string): JobRunStatus {
  return value === 'succeeded' || value === 'failed' ? value : 'running';
}

/** Per-day execution claims; the (job, run key) primary key allows exactly one claim. */
export class JobRunStore {
  constructor(private readonly db: Database.Database) {}

  /** @returns false when the run was already claimed */
  claim(jobName: string, runKey: string, at: DateTime): boolean {
    const result = runStatement('claim job run', () =>
      this.db
        .prepare(
          `INSERT OR IGNORE INTO job_runs (job_name, run_key, started_at, status) VALUES (?, ?, ?, 'running')`,
        )
        .run(jobName, runKey, toStorageTimestamp(at)),
    );
    return result.changes === 1;
  }

  finish(jobName: string, runKey: string, status: Exclude<JobRunStatus, 'running'>, at: DateTime, detail?: string) {
    runStatement('finish job run', () =>
      this.db
        .prepare('UPDATE job_runs SET status = ?, finished_at = ?, detail = ? WHERE job_name = ? AND run_key = ?')
        .run(status, toStorageTimestamp(at), detail ?? null, jobName, runKey),
    );
  }

  isClaimed(jobName: string, runKey: string): boolean {
    const row = runStatement('check job run', () =>
      this.db.prepare('SELECT 1 AS found FROM job_runs WHERE job_name = ? AND run_key = ?').get(jobName, runKey),
    );
    return row !== undefined;
  }

  find(jobName: string, runKey: string): JobRun | null {
    const row = runStatement('find job run', () =>
      this.db.prepare('SELECT * FROM job_runs WHERE job_name = ? AND run_key = ?').get(jobName, runKey),
    ) as JobRunEntity | undefined;
    if (!row) {
      return null;
    }
    return {
      jobName: row.job_name,
      runKey: row.run_key,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      status: toStatus(row.status),
      detail: row.detail,
    };
  }
}
