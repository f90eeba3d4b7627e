import type Database from 'better-sqlite3';
import { chunk } from 'lodash-es';
import type { DateTime } from 'luxon';
import type { EscalationContact } from '../config.js';
import { runInTransaction } from '../database/persistence.js';
import { isRetryableGatewayError } from '../gateway/gateway.errors.js';
import type { GatewayReceipt, MessagingGateway } from '../gateway/gateway.types.js';
import { Logger } from '../logger.js';
import { ParticipantNotFoundError } from '../roster/roster.repository.js';
import type { RosterProvider } from '../roster/roster.types.js';
import type { ScheduleStore } from '../schedule/schedule.store.js';
import type { ShiftAssignment } from '../schedule/schedule.types.js';
import { localDayWindow, startOfWeekMonday } from '../utils/date.js';
import {
  DEFAULT_RETRY_POLICY,
  defaultSleep,
  runWithRetry,
  type RetryPolicy,
  type RetryResult,
  type Sleep,
} from '../utils/retry.js';
import type { NotificationLogStore } from './notification-log.store.js';
import {
  composeManualMessage,
  composeShiftStartMessage,
  composeWeeklySummary,
  maskAddress,
} from './notification.message.js';
import type {
  AddressDeliveryResult,
  AssignmentDispatchResult,
  DispatchSummary,
  ManualDispatchResult,
  NotificationSource,
  WeeklySummaryResult,
} from './notification.types.js';

const logger = new Logger('dispatcher');

export interface DispatcherOptions {
  senderName: string;
  timezone: string;
  concurrency: number;
  /** Recipients of the weekly summary. */
  escalationContacts?: readonly EscalationContact[];
  retryPolicy?: RetryPolicy;
  sleep?: Sleep;
  clock: () => DateTime;
}

interface Recipient {
  participantId: number | null;
  name: string;
  address: string;
}

function addressesOf(primary: string, secondary: string | null): string[] {
  return secondary && secondary !== primary ? [primary, secondary] : [primary];
}

/**
 * Sends shift-start notifications for due assignments and on-demand messages,
 * recording every delivery in the notification log.
 */
export class NotificationDispatcher {
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(
    private readonly db: Database.Database,
    private readonly roster: RosterProvider,
    private readonly schedule: ScheduleStore,
    private readonly log: NotificationLogStore,
    private readonly gateway: MessagingGateway,
    private readonly options: DispatcherOptions,
  ) {
    this.retryPolicy = options.retryPolicy ?? { ...DEFAULT_RETRY_POLICY, isRetryable: isRetryableGatewayError };
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Notifies every unnotified assignment starting on `asOf`'s local calendar day. */
  async dispatchDue(asOf: DateTime): Promise<DispatchSummary> {
    const window = localDayWindow(asOf, this.options.timezone);
    const due = this.schedule.findDue(window.start, window.end);
    logger.info(`Found ${due.length} assignment(s) due on ${window.start.toISODate()}`);

    const results: AssignmentDispatchResult[] = [];
    for (const batch of chunk(due, this.options.concurrency)) {
      results.push(
        ...(await Promise.all(
          batch.map((assignment) =>
            this.dispatchAssignment(assignment.id).catch((error: unknown) => this.abandoned(assignment, error)),
          ),
        )),
      );
    }

    const summary: DispatchSummary = {
      asOf,
      total: results.length,
      sent: results.filter((result) => result.status === 'sent').length,
      failed: results.filter((result) => result.status === 'failed').length,
      skipped: results.filter((result) => result.status === 'skipped').length,
      results,
    };
    logger.info('Dispatch finished', {
      total: summary.total,
      sent: summary.sent,
      failed: summary.failed,
      skipped: summary.skipped,
    });
    return summary;
  }

  /**
   * Sends to a participant regardless of the schedule. The message is recorded with no assignment.
   * @throws ParticipantNotFoundError
   */
  async dispatchNow(participantId: number, messageOverride?: string): Promise<ManualDispatchResult> {
    const participant = this.roster.getParticipant(participantId);
    if (!participant) {
      throw new ParticipantNotFoundError(participantId);
    }

    const body = messageOverride?.trim()
      ? messageOverride
      : composeManualMessage(this.options.senderName, participant.name);
    const deliveries: AddressDeliveryResult[] = [];
    for (const address of addressesOf(participant.primaryAddress, participant.secondaryAddress)) {
      const recipient = { participantId: participant.id, name: participant.name, address };
      const result = await this.sendWithRetry(recipient, body);
      deliveries.push(this.recordDelivery(recipient, result, null, 'manual'));
    }

    const status = deliveries.some((delivery) => delivery.status === 'sent') ? 'sent' : 'failed';
    logger.info(`Manual notification to ${participant.name} ${status}`);
    return { participantId: participant.id, participantName: participant.name, status, deliveries };
  }

  /**
   * Sends the coming week's shifts to every escalation contact. On a Monday that is the current week;
   * on any other day, the week starting the following Monday.
   */
  async dispatchWeeklySummary(asOf: DateTime): Promise<WeeklySummaryResult> {
    const local = asOf.setZone(this.options.timezone);
    const weekStart =
      local.weekday === 1 ? local.startOf('day') : startOfWeekMonday(local, this.options.timezone).plus({ weeks: 1 });
    const assignments = this.schedule.findByDateRange(weekStart, weekStart.plus({ weeks: 1 }).minus({ milliseconds: 1 }));
    const contacts = this.options.escalationContacts ?? [];
    if (contacts.length === 0) {
      logger.warn('No escalation contacts configured; weekly summary not sent');
    }

    const body = composeWeeklySummary(this.options.senderName, weekStart, assignments);
    const deliveries: AddressDeliveryResult[] = [];
    for (const contact of contacts) {
      const recipient = { participantId: null, name: contact.name, address: contact.address };
      const result = await this.sendWithRetry(recipient, body);
      deliveries.push(this.recordDelivery(recipient, result, null, 'escalation'));
    }

    const sent = deliveries.filter((delivery) => delivery.status === 'sent').length;
    logger.info(`Weekly summary for ${weekStart.toISODate()} sent to ${sent}/${deliveries.length} contact(s)`, {
      shifts: assignments.length,
    });
    return {
      weekStart,
      shifts: assignments.length,
      total: deliveries.length,
      sent,
      failed: deliveries.length - sent,
      deliveries,
    };
  }

  private async dispatchAssignment(assignmentId: number): Promise<AssignmentDispatchResult> {
    // Re-read: the assignment may have been regenerated or notified since the due query
    const assignment = this.schedule.findById(assignmentId);
    if (!assignment || assignment.notified) {
      logger.info(`Skipping assignment ${assignmentId}: ${assignment ? 'already notified' : 'no longer exists'}`);
      return {
        assignmentId,
        participantName: assignment?.participantName ?? '',
        status: 'skipped',
        deliveries: [],
      };
    }

    const body = composeShiftStartMessage(this.options.senderName, assignment);
    const deliveries: AddressDeliveryResult[] = [];
    let notified = false;

    for (const address of addressesOf(assignment.primaryAddress, assignment.secondaryAddress)) {
      const recipient = { participantId: assignment.participantId, name: assignment.participantName, address };
      const result = await this.sendWithRetry(recipient, body);
      if (result.success && !notified) {
        deliveries.push(this.recordSentAndMarkNotified(recipient, result, assignment));
        notified = true;
      } else {
        deliveries.push(this.recordDelivery(recipient, result, assignment.id, 'scheduled'));
      }
    }

    return {
      assignmentId: assignment.id,
      participantName: assignment.participantName,
      status: notified ? 'sent' : 'failed',
      deliveries,
    };
  }

  /** One assignment's failure is reported in the summary; the rest of the day's dispatch carries on. */
  private abandoned(assignment: ShiftAssignment, error: unknown): AssignmentDispatchResult {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Dispatch of assignment ${assignment.id} for ${assignment.participantName} aborted`, {
      error: message,
    });
    return {
      assignmentId: assignment.id,
      participantName: assignment.participantName,
      status: 'failed',
      deliveries: [],
      error: message,
    };
  }

  private sendWithRetry(recipient: Recipient, body: string): Promise<RetryResult<GatewayReceipt>> {
    const masked = maskAddress(recipient.address);
    return runWithRetry(
      (attempt) => {
        logger.debug(`Sending to ${masked} via ${this.gateway.name} (attempt ${attempt})`);
        return this.gateway.send(recipient.address, body);
      },
      this.retryPolicy,
      this.sleep,
      (state) => {
        if (state.phase === 'succeeded') return;
        logger.warn(`Send to ${masked} failed (attempt ${state.attempts}, ${state.phase})`, {
          error: state.lastError?.message,
        });
      },
    );
  }

  /** The `sent` record and the notified flag are committed together. */
  private recordSentAndMarkNotified(
    recipient: Recipient,
    result: RetryResult<GatewayReceipt>,
    assignment: ShiftAssignment,
  ): AddressDeliveryResult {
    return runInTransaction(this.db, 'record sent notification', () => {
      const delivery = this.recordDelivery(recipient, result, assignment.id, 'scheduled');
      this.schedule.markNotified(assignment.id, this.options.clock());
      return delivery;
    });
  }

  private recordDelivery(
    recipient: Recipient,
    result: RetryResult<GatewayReceipt>,
    assignmentId: number | null,
    source: NotificationSource,
  ): AddressDeliveryResult {
    const record = this.log.append({
      assignmentId,
      participantId: recipient.participantId,
      recipientName: recipient.name,
      recipientAddress: recipient.address,
      status: result.success ? 'sent' : 'failed',
      providerId: result.success ? result.result.providerId : null,
      errorMessage: result.success ? null : result.error.message,
      attempts: result.attempts,
      source,
    });

    if (!result.success) {
      logger.error(`Notification to ${maskAddress(recipient.address)} failed after ${result.attempts} attempt(s)`, {
        phase: result.phase,
        error: result.error.message,
      });
    }

    return {
      address: maskAddress(recipient.address),
      status: record.status === 'sent' ? 'sent' : 'failed',
      attempts: record.attempts,
      providerId: record.providerId,
      error: record.errorMessage,
      recordId: record.id,
    };
  }
}
