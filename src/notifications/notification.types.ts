import type { DateTime } from 'luxon';

export type NotificationStatus = 'sent' | 'failed' | 'pending';

export type NotificationSource = 'scheduled' | 'manual' | 'escalation';

/** One delivery attempt sequence to one address, as stored in the audit log. */
export interface NotificationRecord {
  id: number;
  /** Null for manual sends, and once the assignment has been deleted. */
  assignmentId: number | null;
  participantId: number | null;
  recipientName: string;
  recipientAddress: string;
  status: NotificationStatus;
  providerId: string | null;
  errorMessage: string | null;
  attempts: number;
  source: NotificationSource;
  createdAt: DateTime;
}

export type NewNotificationRecord = Omit<NotificationRecord, 'id' | 'createdAt'>;

export interface NotificationStats {
  total: number;
  sent: number;
  failed: number;
  pending: number;
  /** Percentage of sent over total, rounded to two decimals; 0 when there are no records. */
  successRate: number;
}

export interface AddressDeliveryResult {
  /** Masked for display. */
  address: string;
  status: 'sent' | 'failed';
  attempts: number;
  providerId: string | null;
  error: string | null;
  recordId: number;
}

export type AssignmentDispatchStatus = 'sent' | 'failed' | 'skipped';

export interface AssignmentDispatchResult {
  assignmentId: number;
  participantName: string;
  status: AssignmentDispatchStatus;
  deliveries: AddressDeliveryResult[];
  /** Set when the dispatch itself broke (e.g. the audit log could not be written). */
  error?: string;
}

export interface DispatchSummary {
  asOf: DateTime;
  total: number;
  sent: number;
  failed: number;
  skipped: number;
  results: AssignmentDispatchResult[];
}

export interface WeeklySummaryResult {
  /** Monday the summary covers. */
  weekStart: DateTime;
  shifts: number;
  total: number;
  sent: number;
  failed: number;
  deliveries: AddressDeliveryResult[];
}

export interface ManualDispatchResult {
  participantId: number;
  participantName: string;
  status: 'sent' | 'failed';
  deliveries: AddressDeliveryResult[];
}
