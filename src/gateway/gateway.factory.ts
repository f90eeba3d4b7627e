import type { GatewayConfig } from '../config.js';
import { SlackDirectMessageGateway } from './gateway.slack.js';
import { TwilioSmsGateway } from './gateway.twilio.js';
import type { MessagingGateway } from './gateway.types.js';

export function createGateway(config: GatewayConfig, senderName: string, timeoutMs: number): MessagingGateway {
  switch (config.provider) {
    case 'twilio':
      return TwilioSmsGateway.fromConfig(config, timeoutMs);
    case 'slack':
      return SlackDirectMessageGateway.fromConfig(config, senderName, timeoutMs);
  }
}
