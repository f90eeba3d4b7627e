/** What a provider reports for an accepted message. */
export interface GatewayReceipt {
  providerId: string;
  status: string;
}

/**
 * A messaging provider. `send` resolves with a receipt or rejects with a
 * `GatewayRetryableError` / `GatewayPermanentError` (see `gateway.errors.ts`).
 */
export interface MessagingGateway {
  readonly name: string;
  send(address: string, body: string): Promise<GatewayReceipt>;
}
