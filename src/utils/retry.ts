import { RETRY_DELAYS_MS } from '../constants.js';

export interface RetryPolicy {
  /** Delay before each attempt; its length is the maximum number of attempts. */
  delaysMs: readonly number[];
  /** Returning false aborts without further attempts. */
  isRetryable: (error: unknown) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  delaysMs: RETRY_DELAYS_MS,
  isRetryable: () => true,
};

export type RetryState =
  | { phase: 'pending'; attempts: number; lastError: Error | null }
  | { phase: 'succeeded'; attempts: number }
  | { phase: 'exhausted'; attempts: number; lastError: Error }
  | { phase: 'aborted'; attempts: number; lastError: Error };

export type RetryEvent = { type: 'success' } | { type: 'failure'; error: unknown };

export type RetryResult<T> =
  | { success: true; result: T; attempts: number }
  | { success: false; error: Error; attempts: number; phase: 'exhausted' | 'aborted' };

export const initialRetryState = (): RetryState => ({ phase: 'pending', attempts: 0, lastError: null });

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Transition function. Terminal states are returned unchanged. */
export function advanceRetryState(state: RetryState, event: RetryEvent, policy: RetryPolicy): RetryState {
  if (state.phase !== 'pending') {
    return state;
  }

  const attempts = state.attempts + 1;
  if (event.type === 'success') {
    return { phase: 'succeeded', attempts };
  }

  const lastError = toError(event.error);
  if (!policy.isRetryable(event.error)) {
    return { phase: 'aborted', attempts, lastError };
  }
  if (attempts >= policy.delaysMs.length) {
    return { phase: 'exhausted', attempts, lastError };
  }
  return { phase: 'pending', attempts, lastError };
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Drives `fn` through the retry state machine, waiting `policy.delaysMs[n]` before attempt n+1.
 * Never throws; the outcome is in the result.
 */
export async function runWithRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  sleep: Sleep = defaultSleep,
  onAttemptFailed?: (state: RetryState) => void,
): Promise<RetryResult<T>> {
  let state = initialRetryState();

  while (state.phase === 'pending') {
    const attempt = state.attempts + 1;
    await sleep(policy.delaysMs[state.attempts] ?? 0);

    try {
      const result = await fn(attempt);
      state = advanceRetryState(state, { type: 'success' }, policy);
      return { success: true, result, attempts: state.attempts };
    } catch (error) {
      state = advanceRetryState(state, { type: 'failure', error }, policy);
      onAttemptFailed?.(state);
    }
  }

  if (state.phase === 'succeeded') {
    // Unreachable: success returns from inside the loop
    throw new Error('Retry loop finished in an unexpected state');
  }
  return { success: false, error: state.lastError, attempts: state.attempts, phase: state.phase };
}
