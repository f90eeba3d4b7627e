export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly gateway: string,
    public readonly code: string | number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

/** Transient failure; the send may succeed if attempted again. */
export class GatewayRetryableError extends GatewayError {
  constructor(message: string, gateway: string, code: string | number | null = null, options?: { cause?: unknown }) {
    super(message, gateway, code, options);
    this.name = 'GatewayRetryableError';
  }
}

export class GatewayTimeoutError extends GatewayRetryableError {
  constructor(
    gateway: string,
    public readonly timeoutMs: number,
  ) {
    super(`${gateway} request timed out after ${timeoutMs}ms`, gateway, 'timeout');
    this.name = 'GatewayTimeoutError';
  }
}

/** The provider rejected the message for good (bad address, opted out, auth). */
export class GatewayPermanentError extends GatewayError {
  constructor(message: string, gateway: string, code: string | number | null = null, options?: { cause?: unknown }) {
    super(message, gateway, code, options);
    this.name = 'GatewayPermanentError';
  }
}

/** Anything that is not explicitly permanent is retried, including plain network errors. */
export function isRetryableGatewayError(error: unknown): boolean {
  return !(error instanceof GatewayPermanentError);
}

/**
 * Races `promise` against a timer. The timer is always cleared so no handle outlives the call.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, gateway: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new GatewayTimeoutError(gateway, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** Reads a named property off an unknown thrown value. */
export function readErrorField(error: unknown, field: string): unknown {
  if (typeof error === 'object' && error !== null && field in error) {
    return Reflect.get(error, field);
  }
  return undefined;
}
