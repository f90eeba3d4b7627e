import twilio from 'twilio';
import type { TwilioGatewayConfig } from '../config.js';
import { Logger } from '../logger.js';
import {
  GatewayError,
  GatewayPermanentError,
  GatewayRetryableError,
  readErrorField,
  withTimeout,
} from './gateway.errors.js';
import type { GatewayReceipt, MessagingGateway } from './gateway.types.js';

const logger = new Logger('gateway.twilio');

const GATEWAY_NAME = 'twilio';

const RETRYABLE_HTTP_STATUSES = new Set([429, 500, 502, 503, 504]);
// Invalid number, unsupported region, not a mobile number, landline, wrong format
const PERMANENT_CODES = new Set([21211, 21408, 21614, 21217, 21601]);
// Auth hiccup, rate limit, unsubscribed-then-resubscribed, carrier queue/delivery errors
const RETRYABLE_CODES = new Set([20003, 20429, 21610, 30001, 30002, 30003, 30004, 30005, 30006]);

/** The part of the Twilio client the gateway uses. */
export interface TwilioMessagesClient {
  messages: {
    create(params: { to: string; from: string; body: string }): Promise<{ sid: string; status: string }>;
  };
}

/**
 * Maps a Twilio REST error (or anything else thrown by the client) to a gateway error.
 * Errors without an HTTP status are network failures and stay retryable.
 */
export function classifyTwilioError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = readErrorField(error, 'status');
  const code = readErrorField(error, 'code');
  const numericCode = typeof code === 'number' ? code : null;

  if (typeof status !== 'number') {
    return new GatewayRetryableError(message, GATEWAY_NAME, numericCode, { cause: error });
  }
  if (RETRYABLE_HTTP_STATUSES.has(status)) {
    return new GatewayRetryableError(message, GATEWAY_NAME, numericCode ?? status, { cause: error });
  }
  if (numericCode !== null && PERMANENT_CODES.has(numericCode)) {
    return new GatewayPermanentError(message, GATEWAY_NAME, numericCode, { cause: error });
  }
  if (numericCode !== null && RETRYABLE_CODES.has(numericCode)) {
    return new GatewayRetryableError(message, GATEWAY_NAME, numericCode, { cause: error });
  }
  return new GatewayPermanentError(message, GATEWAY_NAME, numericCode ?? status, { cause: error });
}

export class TwilioSmsGateway implements MessagingGateway {
  readonly name = GATEWAY_NAME;

  constructor(
    private readonly client: TwilioMessagesClient,
    private readonly fromNumber: string,
    private readonly timeoutMs: number,
  ) {}

  static fromConfig(config: TwilioGatewayConfig, timeoutMs: number): TwilioSmsGateway {
    const client = twilio(config.accountSid, config.authToken);
    return new TwilioSmsGateway(client, config.fromNumber, timeoutMs);
  }

  async send(address: string, body: string): Promise<GatewayReceipt> {
    try {
      const message = await withTimeout(
        this.client.messages.create({ to: address, from: this.fromNumber, body }),
        this.timeoutMs,
        GATEWAY_NAME,
      );
      logger.debug('Twilio accepted message', { sid: message.sid, status: message.status });
      return { providerId: message.sid, status: message.status };
    } catch (error) {
      throw classifyTwilioError(error);
    }
  }
}
