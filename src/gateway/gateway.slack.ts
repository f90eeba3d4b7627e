import { WebClient } from '@slack/web-api';
import type { SlackGatewayConfig } from '../config.js';
import { Logger } from '../logger.js';
import {
  GatewayError,
  GatewayPermanentError,
  GatewayRetryableError,
  readErrorField,
  withTimeout,
} from './gateway.errors.js';
import type { GatewayReceipt, MessagingGateway } from './gateway.types.js';

const logger = new Logger('gateway.slack');

const GATEWAY_NAME = 'slack';

const RETRYABLE_PLATFORM_ERRORS = new Set([
  'ratelimited',
  'internal_error',
  'service_unavailable',
  'fatal_error',
  'request_timeout',
]);

/** The part of the Slack Web API client the gateway uses. */
export interface SlackChatClient {
  chat: {
    postMessage(args: { channel: string; text: string; username?: string }): Promise<{
      ok?: boolean;
      ts?: string;
      error?: string;
    }>;
  };
}

/**
 * Maps `@slack/web-api` errors by their `code`: rate limits, request failures and 5xx are retried;
 * platform errors are permanent unless Slack reports a transient condition.
 */
export function classifySlackError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = readErrorField(error, 'code');

  switch (code) {
    case 'slack_webapi_rate_limited_error':
    case 'slack_webapi_request_error':
      return new GatewayRetryableError(message, GATEWAY_NAME, code, { cause: error });
    case 'slack_webapi_http_error': {
      const statusCode = readErrorField(error, 'statusCode');
      return typeof statusCode === 'number' && statusCode >= 500
        ? new GatewayRetryableError(message, GATEWAY_NAME, statusCode, { cause: error })
        : new GatewayPermanentError(message, GATEWAY_NAME, typeof statusCode === 'number' ? statusCode : code, {
            cause: error,
          });
    }
    case 'slack_webapi_platform_error': {
      const data = readErrorField(error, 'data');
      const platformError = readErrorField(data, 'error');
      const reason = typeof platformError === 'string' ? platformError : 'unknown_error';
      return RETRYABLE_PLATFORM_ERRORS.has(reason)
        ? new GatewayRetryableError(message, GATEWAY_NAME, reason, { cause: error })
        : new GatewayPermanentError(message, GATEWAY_NAME, reason, { cause: error });
    }
    default:
      return new GatewayRetryableError(message, GATEWAY_NAME, null, { cause: error });
  }
}

/** Sends direct messages; the address is a Slack user or channel id. */
export class SlackDirectMessageGateway implements MessagingGateway {
  readonly name = GATEWAY_NAME;

  constructor(
    private readonly client: SlackChatClient,
    private readonly username: string,
    private readonly timeoutMs: number,
  ) {}

  static fromConfig(config: SlackGatewayConfig, username: string, timeoutMs: number): SlackDirectMessageGateway {
    // Retries belong to the dispatcher's retry loop, not the client
    const client = new WebClient(config.token, {
      timeout: timeoutMs,
      retryConfig: { retries: 0 },
      rejectRateLimitedCalls: true,
    });
    return new SlackDirectMessageGateway(client, username, timeoutMs);
  }

  async send(address: string, body: string): Promise<GatewayReceipt> {
    let response: Awaited<ReturnType<SlackChatClient['chat']['postMessage']>>;
    try {
      response = await withTimeout(
        this.client.chat.postMessage({ channel: address, text: body, username: this.username }),
        this.timeoutMs,
        GATEWAY_NAME,
      );
    } catch (error) {
      throw classifySlackError(error);
    }

    if (!response.ok || !response.ts) {
      const reason = response.error ?? 'unknown_error';
      throw RETRYABLE_PLATFORM_ERRORS.has(reason)
        ? new GatewayRetryableError(`Slack rejected message: ${reason}`, GATEWAY_NAME, reason)
        : new GatewayPermanentError(`Slack rejected message: ${reason}`, GATEWAY_NAME, reason);
    }

    logger.debug('Slack accepted message', { ts: response.ts });
    return { providerId: response.ts, status: 'sent' };
  }
}
