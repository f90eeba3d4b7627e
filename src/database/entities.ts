/** Row shapes exactly as stored in SQLite (snake_case, 0/1 booleans, UTC ISO timestamps). */

export interface ParticipantEntity {
  id: number;
  name: string;
  primary_address: string;
  secondary_address: string | null;
  is_active: number;
  rotation_order: number | null;
  created_at?: string;
  updated_at?: string;
}

export interface ShiftTemplateEntity {
  id: number;
  shift_number: number;
  /** JSON array of ISO weekdays, first entry is the start day. */
  weekdays: string;
  duration_hours: number;
  start_time: string;
  created_at?: string;
}

export interface ShiftAssignmentEntity {
  id: number;
  participant_id: number;
  template_id: number;
  week_index: number;
  start_at: string;
  end_at: string;
  notified: number;
  notified_at: string | null;
  created_at?: string;
}

/** Assignment joined with the participant and template columns the engine needs. */
export interface ShiftAssignmentRow extends ShiftAssignmentEntity {
  participant_name: string;
  primary_address: string;
  secondary_address: string | null;
  shift_number: number;
  duration_hours: number;
}

export interface NotificationRecordEntity {
  id: number;
  assignment_id: number | null;
  participant_id: number | null;
  recipient_name: string;
  recipient_address: string;
  status: string;
  provider_id: string | null;
  error_message: string | null;
  attempts: number;
  source: string;
  created_at: string;
}

export interface JobRunEntity {
  job_name: string;
  run_key: string;
  started_at: string;
  finished_at: string | null;
  status: string;
  detail: string | null;
}

export type Insertable<T> = Omit<T, 'id' | 'created_at' | 'updated_at'>;
