/**
 * Core constants shared by the rotation engine.
 *
 * NOTE: Keep this file free of side-effects. Everything here must be
 * deterministically initialised at module load.
 */

/** One SMS segment; longer messages are truncated with a trailing ellipsis. */
export const SMS_SEGMENT_LENGTH = 160;

/** Delay before attempts 1, 2 and 3 of a gateway send. */
export const RETRY_DELAYS_MS: readonly number[] = Object.freeze([0, 60_000, 120_000]);

/** Characters left visible at the end of a masked address. */
export const MASK_VISIBLE_CHARS = 4;

export const DEFAULT_UPCOMING_WEEKS = 4;

/** Names of the coordinator's background jobs, also the `job_runs.job_name` values. */
export enum JobName {
  DAILY_DISPATCH = 'daily_dispatch',
  AUTO_RENEWAL = 'auto_renewal',
  WEEKLY_ESCALATION_SUMMARY = 'weekly_escalation_summary',
}
