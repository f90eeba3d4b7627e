import { describe, it, expect, vi } from 'vitest';
import {
  advanceRetryState,
  DEFAULT_RETRY_POLICY,
  initialRetryState,
  runWithRetry,
  type RetryPolicy,
  type RetryState,
} from './retry.js';

class PermanentFailure extends Error {}

const policy: RetryPolicy = {
  delaysMs: [0, 60_000, 120_000],
  isRetryable: (error) => !(error instanceof PermanentFailure),
};

describe('retry state machine', () => {
  describe('advanceRetryState', () => {
    it('moves from pending to succeeded on success', () => {
      expect(advanceRetryState(initialRetryState(), { type: 'success' }, policy)).toEqual({
        phase: 'succeeded',
        attempts: 1,
      });
    });

    it('stays pending after a retryable failure while attempts remain', () => {
      const next = advanceRetryState(initialRetryState(), { type: 'failure', error: new Error('busy') }, policy);
      expect(next).toMatchObject({ phase: 'pending', attempts: 1 });
    });

    it('exhausts after the last attempt', () => {
      const third: RetryState = { phase: 'pending', attempts: 2, lastError: new Error('busy') };
      const next = advanceRetryState(third, { type: 'failure', error: new Error('still busy') }, policy);
      expect(next).toMatchObject({ phase: 'exhausted', attempts: 3 });
    });

    it('aborts on a non-retryable error', () => {
      const next = advanceRetryState(
        initialRetryState(),
        { type: 'failure', error: new PermanentFailure('bad number') },
        policy,
      );
      expect(next).toMatchObject({ phase: 'aborted', attempts: 1 });
    });

    it('leaves terminal states unchanged', () => {
      const done: RetryState = { phase: 'succeeded', attempts: 2 };
      expect(advanceRetryState(done, { type: 'failure', error: new Error('late') }, policy)).toBe(done);
    });

    it('wraps non-Error failures', () => {
      const next = advanceRetryState(initialRetryState(), { type: 'failure', error: 'socket hang up' }, policy);
      expect(next.phase === 'pending' && next.lastError?.message).toBe('socket hang up');
    });
  });

  describe('runWithRetry', () => {
    it('succeeds on the first attempt after the zero delay', async () => {
      const sleep = vi.fn(async () => {});
      const fn = vi.fn(async () => 'ok');

      const result = await runWithRetry(fn, policy, sleep);

      expect(result).toEqual({ success: true, result: 'ok', attempts: 1 });
      expect(sleep.mock.calls).toEqual([[0]]);
    });

    it('waits 0, 60 and 120 seconds before the three attempts and then gives up', async () => {
      const sleep = vi.fn(async () => {});
      const fn = vi.fn(async (attempt: number) => {
        throw new Error(`attempt ${attempt} failed`);
      });

      const result = await runWithRetry(fn, policy, sleep);

      expect(fn).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls).toEqual([[0], [60_000], [120_000]]);
      expect(result).toMatchObject({ success: false, attempts: 3, phase: 'exhausted' });
      expect(!result.success && result.error.message).toBe('attempt 3 failed');
    });

    it('recovers when a later attempt succeeds', async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error('timeout')).mockResolvedValueOnce('delivered');

      const result = await runWithRetry(fn, policy, async () => {});

      expect(result).toEqual({ success: true, result: 'delivered', attempts: 2 });
    });

    it('stops immediately on a permanent error', async () => {
      const sleep = vi.fn(async () => {});
      const fn = vi.fn(async () => {
        throw new PermanentFailure('invalid number');
      });

      const result = await runWithRetry(fn, policy, sleep);

      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(result).toMatchObject({ success: false, attempts: 1, phase: 'aborted' });
    });

    it('reports every failed attempt', async () => {
      const states: string[] = [];
      await runWithRetry(
        async () => {
          throw new Error('down');
        },
        policy,
        async () => {},
        (state) => states.push(`${state.phase}:${state.attempts}`),
      );
      expect(states).toEqual(['pending:1', 'pending:2', 'exhausted:3']);
    });

    it('retries everything by default', () => {
      expect(DEFAULT_RETRY_POLICY.delaysMs).toEqual([0, 60_000, 120_000]);
      expect(DEFAULT_RETRY_POLICY.isRetryable(new PermanentFailure('x'))).toBe(true);
    });
  });
});
