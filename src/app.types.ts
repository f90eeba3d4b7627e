import { z } from 'zod';

/** The tasks the entry point can run. */
export enum AppTask {
  /** Start the background jobs and keep running until SIGINT/SIGTERM. */
  SERVE = 'serve',
  GENERATE_SCHEDULE = 'generate_schedule',
  // Rebuild the schedule from a date after roster changes
  REGENERATE_SCHEDULE = 'regenerate_schedule',
  DISPATCH_NOW = 'dispatch_now',
  SEND_MANUAL = 'send_manual',
  SEND_WEEKLY_SUMMARY = 'send_weekly_summary',
  JOB_STATUS = 'job_status',
}

const isoDate = z.string().min(1, 'must be an ISO date');

export const appEventSchema = z.discriminatedUnion('task', [
  z.object({ task: z.literal(AppTask.SERVE) }),
  z.object({
    task: z.literal(AppTask.GENERATE_SCHEDULE),
    start_date: isoDate,
    weeks: z.number(),
    force: z.boolean().optional(),
  }),
  z.object({
    task: z.literal(AppTask.REGENERATE_SCHEDULE),
    from_date: isoDate,
    weeks: z.number(),
  }),
  z.object({ task: z.literal(AppTask.DISPATCH_NOW) }),
  z.object({
    task: z.literal(AppTask.SEND_MANUAL),
    participant_id: z.number().int(),
    message: z.string().optional(),
  }),
  z.object({ task: z.literal(AppTask.SEND_WEEKLY_SUMMARY) }),
  z.object({ task: z.literal(AppTask.JOB_STATUS) }),
]);

/** The object the entry point needs to know what task to run. */
export type AppEvent = z.infer<typeof appEventSchema>;

export interface TaskResponse {
  statusCode: number;
  body: string;
}
